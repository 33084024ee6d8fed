/**
 * @flowkit/core - Shared foundations for Flowkit packages
 *
 * - Reliability: error taxonomy and structured logging
 * - Config: engine defaults read from the environment
 */

export * from './reliability/index.js';
export * from './config/index.js';
