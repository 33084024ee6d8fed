/**
 * Reliability Primitives
 *
 * This module provides:
 * - Error taxonomy for consistent failure handling
 * - Structured JSON logging
 *
 * @module @flowkit/core/reliability
 */

// Errors
export {
  type FlowkitErrorCode,
  type FlowkitErrorOptions,
  FlowkitError,
  TypeMismatchError,
  UnitFailureError,
  SourceMappingError,
  ConfigurationError,
  RecursionLimitError,
  isFlowkitError,
  errorMessage,
  toErrorRecord,
  wrapError,
} from './errors.js';

// Observability
export {
  type LogLevel,
  type LogEntry,
  Logger,
  getLogger,
  resolveLogLevel,
} from './observability.js';
