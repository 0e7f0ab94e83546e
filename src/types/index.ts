/**
 * Types barrel export
 */

export * from './result';
export * from './connection';
export * from './node';
export * from './status';
export * from './remote';
