/**
 * Domain Types - Unified exports
 */

export * from './result';
export * from './action';
