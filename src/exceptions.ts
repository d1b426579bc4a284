/**
 * Exception classes for the Moment SDK.
 */

export class MomentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MomentError';
  }
}

export class BLEConnectionError extends MomentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BLEConnectionError';
  }
}

/**
 * A command was issued while no session is connected.
 */
export class NotConnectedError extends BLEConnectionError {
  constructor(message: string = 'Not connected to device') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

export class BLETimeoutError extends MomentError {
  constructor(message: string) {
    super(message);
    this.name = 'BLETimeoutError';
  }
}

export class DiscoveryError extends MomentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiscoveryError';
  }
}

/**
 * The resolved peripheral does not advertise the expected device name.
 */
export class UnexpectedDeviceError extends MomentError {
  constructor(message: string) {
    super(message);
    this.name = 'UnexpectedDeviceError';
  }
}

export class ProtocolError extends MomentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export class DecodeError extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export class PayloadTooLargeError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * A queued write was dropped because an earlier write on the same
 * session failed.
 */
export class WriteAbortedError extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WriteAbortedError';
  }
}

export class RemoteCompileError extends MomentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteCompileError';
  }
}

export class InvalidParameterError extends MomentError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}
