/**
 * Enums for Moment device commands and session state.
 */

/**
 * Wrist and pair-button orientation.
 */
export enum Orientation {
  LEFT = 0,
  RIGHT = 1,
}

/**
 * Global haptic intensity level.
 */
export enum Intensity {
  LOW = 0,
  MEDIUM = 1,
  HIGH = 2,
}

/**
 * Pre-loaded patterns, keyed by the character the firmware expects on the
 * pattern trigger characteristic.
 */
export enum Trigger {
  CONFETTI = 'p',
  POINT_LEFT = 'l',
  POINT_RIGHT = 'r',
  LEFT_FIST = 's',
  RIGHT_FIST = 't',
  HANDS_RAISED = 'u',
  WAVING_HAND = 'a',
  HUSHED = 'q',
  FLUSHED = 'w',
  GRIMACING = 'f',
  SMILING = 'd',
  GRINNING = 'm',
  LAUGHING = 'k',
}

/**
 * Device session lifecycle.
 */
export enum ConnectionState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  FAILED = 'failed',
}
