/**
 * @flowkit/evaluation - Run evaluation glue
 *
 * Maps execution records and dataset rows onto string evaluators, and
 * scores pairs of predictions by embedding distance.
 *
 * @module @flowkit/evaluation
 */

export * from './schemas.js';
export * from './messages.js';
export * from './run-mapper.js';
export * from './example-mapper.js';
export * from './string-run-evaluator.js';
export * from './embedding-distance.js';
