import { describe, expect, it } from 'vitest';
import { InvalidParameterError } from '../exceptions';
import { Intensity, Orientation, Trigger } from '../models/enums';
import { buildActuatorPayload, buildSettingsPayload, buildTriggerPayload } from './commands';

describe('buildSettingsPayload', () => {
  it('packs wrist, button and intensity as single bytes', () => {
    expect(buildSettingsPayload(Orientation.RIGHT, Orientation.LEFT, Intensity.HIGH)).toEqual(
      Uint8Array.of(1, 0, 2)
    );
  });

  it('rejects values outside the enums', () => {
    const unknown: number = 7;
    expect(() => buildSettingsPayload(unknown, Orientation.LEFT, Intensity.LOW)).toThrow(
      'Unknown wrist orientation: 7'
    );
    expect(() => buildSettingsPayload(Orientation.LEFT, Orientation.LEFT, unknown)).toThrow(
      InvalidParameterError
    );
  });
});

describe('buildActuatorPayload', () => {
  it('writes duration little-endian followed by four intensities', () => {
    expect(buildActuatorPayload(300, 0, 10, 25, 100)).toEqual(
      Uint8Array.of(0x2c, 0x01, 0, 10, 25, 100)
    );
  });

  it('accepts the maximum duration', () => {
    expect(buildActuatorPayload(0xffff, 0, 0, 0, 0)).toEqual(Uint8Array.of(0xff, 0xff, 0, 0, 0, 0));
  });

  it.each([
    [65536, 0],
    [-1, 0],
    [10, 101],
    [10, 1.5],
  ])('rejects duration %d with intensity %d', (duration, intensity) => {
    expect(() => buildActuatorPayload(duration, intensity, 0, 0, 0)).toThrow(InvalidParameterError);
  });

  it('names the offending field', () => {
    expect(() => buildActuatorPayload(10, 0, 0, 0, 120)).toThrow(
      'bottomRight must be an integer in 0-100, got 120'
    );
  });
});

describe('buildTriggerPayload', () => {
  it('encodes the trigger character', () => {
    expect(buildTriggerPayload(Trigger.CONFETTI)).toEqual(Uint8Array.of(0x70));
    expect(buildTriggerPayload(Trigger.WAVING_HAND)).toEqual(Uint8Array.of(0x61));
  });
});
