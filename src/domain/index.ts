/**
 * Domain model exports.
 */

export * from './errors';
export * from './grid';
export * from './radar';
export * from './result';
