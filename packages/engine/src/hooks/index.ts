/**
 * Run hooks
 *
 * @module @flowkit/engine/hooks
 */

export * from './types.js';
export * from './runner.js';
export * from './tracker.js';
