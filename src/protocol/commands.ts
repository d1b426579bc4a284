/**
 * Payload builders for the small fixed-size Moment characteristics.
 */

import { InvalidParameterError } from '../exceptions';
import { Intensity, Orientation, Trigger } from '../models/enums';
import { MAX_ACTUATOR_DURATION_MS, MAX_ACTUATOR_INTENSITY } from './constants';

function assertIntegerInRange(value: number, max: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidParameterError(`${label} must be an integer in 0-${max}, got ${value}`);
  }
}

function assertEnumMember(value: number | string, members: object, label: string): void {
  if (!Object.values(members).includes(value)) {
    throw new InvalidParameterError(`Unknown ${label}: ${value}`);
  }
}

/**
 * Build settings characteristic payload.
 *
 * Fields are packed one by one, never through a struct layout.
 *
 * Format:
 *   [wrist:1][button:1][intensity:1]
 *   - wrist, button: 0 = left, 1 = right
 *   - intensity: 0 = low, 1 = medium, 2 = high
 */
export function buildSettingsPayload(
  wristOrientation: Orientation,
  buttonOrientation: Orientation,
  intensityLevel: Intensity
): Uint8Array {
  assertEnumMember(wristOrientation, Orientation, 'wrist orientation');
  assertEnumMember(buttonOrientation, Orientation, 'button orientation');
  assertEnumMember(intensityLevel, Intensity, 'intensity level');

  return Uint8Array.of(wristOrientation, buttonOrientation, intensityLevel);
}

/**
 * Build actuator characteristic payload.
 *
 * Format:
 *   [duration:2LE][topLeft:1][topRight:1][bottomLeft:1][bottomRight:1]
 *   - duration: milliseconds, little-endian uint16
 *   - intensities: 0-100
 *
 * @throws {InvalidParameterError} If any field is out of range
 */
export function buildActuatorPayload(
  duration: number,
  topLeft: number,
  topRight: number,
  bottomLeft: number,
  bottomRight: number
): Uint8Array {
  assertIntegerInRange(duration, MAX_ACTUATOR_DURATION_MS, 'duration');
  assertIntegerInRange(topLeft, MAX_ACTUATOR_INTENSITY, 'topLeft');
  assertIntegerInRange(topRight, MAX_ACTUATOR_INTENSITY, 'topRight');
  assertIntegerInRange(bottomLeft, MAX_ACTUATOR_INTENSITY, 'bottomLeft');
  assertIntegerInRange(bottomRight, MAX_ACTUATOR_INTENSITY, 'bottomRight');

  const buffer = new ArrayBuffer(6);
  const view = new DataView(buffer);
  view.setUint16(0, duration, true); // little-endian
  view.setUint8(2, topLeft);
  view.setUint8(3, topRight);
  view.setUint8(4, bottomLeft);
  view.setUint8(5, bottomRight);
  return new Uint8Array(buffer);
}

/**
 * Build pattern trigger payload: the trigger's character as UTF-8.
 */
export function buildTriggerPayload(trigger: Trigger): Uint8Array {
  assertEnumMember(trigger, Trigger, 'trigger');
  return new TextEncoder().encode(trigger);
}
