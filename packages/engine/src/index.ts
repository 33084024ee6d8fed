/**
 * @flowkit/engine - Streaming composition engine
 *
 * This package provides:
 * - The four-mode unit-of-work contract (invoke, ainvoke, stream, astream)
 * - Execution configuration, executors and run hooks
 * - Sequence tee and stream merge primitives
 * - Combinators: parallel map, identity and merge-assign
 *
 * @module @flowkit/engine
 */

export * from './config/index.js';
export * from './hooks/index.js';
export * from './streams/index.js';
export * from './units/index.js';
