/**
 * Models layer exports for Moment device structures.
 */

export * from './enums';
export * from './timeline';
