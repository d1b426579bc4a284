/**
 * Packet framing for the UART bytecode channel.
 */

import { PayloadTooLargeError } from '../exceptions';
import { MAX_PACKET_COUNT, MAX_PAYLOAD_SIZE, PACKET_SIZE } from './constants';

/**
 * Number of packets a payload occupies once the count header is prepended.
 *
 * @returns 1 for an empty payload, otherwise ceil((length + 1) / PACKET_SIZE)
 */
export function packetCountFor(payloadLength: number): number {
  if (payloadLength === 0) {
    return 1;
  }
  return Math.ceil((payloadLength + 1) / PACKET_SIZE);
}

/**
 * Frame a payload into BLE-sized packets.
 *
 * Format:
 *   [packetCount:1][payload...] sliced into PACKET_SIZE chunks
 *   - packetCount: ceil((payload.length + 1) / 20)
 *   - empty payload: a single [0x00] packet (the firmware's reset signal)
 *
 * @param payload - Complete logical message
 * @returns Packets in transmission order, each at most PACKET_SIZE bytes
 * @throws {PayloadTooLargeError} If the packet count does not fit in one byte
 */
export function framePayload(payload: Uint8Array): Uint8Array[] {
  if (payload.length === 0) {
    return [Uint8Array.of(0)];
  }

  const packetCount = packetCountFor(payload.length);
  if (packetCount > MAX_PACKET_COUNT) {
    throw new PayloadTooLargeError(
      `Payload of ${payload.length} bytes needs ${packetCount} packets ` +
        `(maximum ${MAX_PACKET_COUNT}, i.e. ${MAX_PAYLOAD_SIZE} bytes)`
    );
  }

  const framed = new Uint8Array(payload.length + 1);
  framed[0] = packetCount;
  framed.set(payload, 1);

  const packets: Uint8Array[] = [];
  for (let offset = 0; offset < framed.length; offset += PACKET_SIZE) {
    packets.push(framed.slice(offset, offset + PACKET_SIZE));
  }

  return packets;
}
