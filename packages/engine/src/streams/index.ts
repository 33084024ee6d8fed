/**
 * Stream primitives
 *
 * @module @flowkit/engine/streams
 */

export * from './async-lock.js';
export * from './records.js';
export * from './iterators.js';
export * from './tee.js';
export * from './async-tee.js';
export * from './merge.js';
