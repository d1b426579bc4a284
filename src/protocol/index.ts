/**
 * Protocol layer exports for Moment BLE communication.
 */

export * from './constants';
export * from './commands';
export * from './framing';
export * from './responses';
