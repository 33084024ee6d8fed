/**
 * Units of work and combinators
 *
 * @module @flowkit/engine/units
 */

export * from './base.js';
export * from './function-unit.js';
export * from './identity.js';
export * from './parallel-map.js';
export * from './merge-assign.js';
