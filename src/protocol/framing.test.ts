import { describe, expect, it } from 'vitest';
import { PayloadTooLargeError } from '../exceptions';
import { MAX_PAYLOAD_SIZE, PACKET_SIZE } from './constants';
import { framePayload, packetCountFor } from './framing';

function payloadOf(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (i * 7 + 3) & 0xff);
}

function concat(packets: Uint8Array[]): Uint8Array {
  const total = packets.reduce((sum, packet) => sum + packet.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const packet of packets) {
    out.set(packet, offset);
    offset += packet.length;
  }
  return out;
}

describe('packetCountFor', () => {
  it.each([
    [0, 1],
    [1, 1],
    [19, 1],
    [20, 2],
    [21, 2],
    [39, 2],
    [40, 3],
    [400, 21],
    [5099, 255],
    [5100, 256],
  ])('returns %i bytes -> %i packets', (length, expected) => {
    expect(packetCountFor(length)).toBe(expected);
  });
});

describe('framePayload', () => {
  it('frames an empty payload as the reset signal', () => {
    expect(framePayload(new Uint8Array(0))).toEqual([Uint8Array.of(0)]);
  });

  it('prefixes a single byte payload with its packet count', () => {
    expect(framePayload(Uint8Array.of(0xab))).toEqual([Uint8Array.of(1, 0xab)]);
  });

  it.each([
    [1, [2]],
    [19, [20]],
    [20, [20, 1]],
    [21, [20, 2]],
    [39, [20, 20]],
    [40, [20, 20, 1]],
  ])('splits %i bytes into packets of %j bytes', (length, sizes) => {
    const packets = framePayload(payloadOf(length));
    expect(packets.map((packet) => packet.length)).toEqual(sizes);
  });

  it('keeps every packet within the packet size', () => {
    const packets = framePayload(payloadOf(400));

    expect(packets).toHaveLength(21);
    for (const packet of packets.slice(0, -1)) {
      expect(packet.length).toBe(PACKET_SIZE);
    }
    expect(packets[packets.length - 1].length).toBe(1);
  });

  it('reassembles to the count byte followed by the payload', () => {
    const payload = payloadOf(57);
    const joined = concat(framePayload(payload));

    expect(joined[0]).toBe(3);
    expect(joined.subarray(1)).toEqual(payload);
  });

  it('accepts the largest payload that fits 255 packets', () => {
    const packets = framePayload(payloadOf(MAX_PAYLOAD_SIZE));

    expect(packets).toHaveLength(255);
    expect(packets[0][0]).toBe(255);
  });

  it('rejects payloads needing more than 255 packets', () => {
    expect(() => framePayload(payloadOf(MAX_PAYLOAD_SIZE + 1))).toThrow(PayloadTooLargeError);
  });
});
