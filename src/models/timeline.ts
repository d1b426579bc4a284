/**
 * Timeline message model.
 */

/**
 * A protocol-buffer message that can serialise itself, such as a generated
 * haptic timeline. Only the binary encoding is needed to send it.
 */
export interface TimelineMessage {
  toBinary(): Uint8Array;
}
