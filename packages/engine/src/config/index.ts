/**
 * Execution configuration and executors
 *
 * @module @flowkit/engine/config
 */

export * from './execution-config.js';
export * from './executor.js';
