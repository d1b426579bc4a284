/**
 * Decoding of values read from, or handed to, the device.
 */

import { DecodeError } from '../exceptions';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decode a base64 bytecode string.
 *
 * Only canonical padded base64 is accepted; whitespace and URL-safe
 * characters are rejected.
 *
 * @param bytecode - Base64 representation of compiled bytecode
 * @returns Decoded bytes
 * @throws {DecodeError} If the string is not valid base64
 */
export function decodeBase64Bytecode(bytecode: string): Uint8Array {
  if (!BASE64_PATTERN.test(bytecode)) {
    throw new DecodeError('Invalid base64 encoded bytecode string.');
  }
  return new Uint8Array(Buffer.from(bytecode, 'base64'));
}

/**
 * Decode a string characteristic value as UTF-8.
 *
 * @param data - Raw characteristic value
 * @param label - Characteristic description used in the error message
 * @throws {DecodeError} If the bytes are not valid UTF-8
 */
export function decodeTextValue(data: Uint8Array, label: string): string {
  const textDecoder = new TextDecoder('utf-8', { fatal: true });

  try {
    return textDecoder.decode(data);
  } catch (e) {
    throw new DecodeError(`Unable to extract string data from ${label} characteristic.`, {
      cause: e,
    });
  }
}
