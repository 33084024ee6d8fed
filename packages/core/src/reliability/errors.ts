/**
 * Error Taxonomy
 *
 * Standard error types raised by units of work, the engine and the
 * evaluation glue.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error knows if it's retryable (the engine itself never retries)
 * - Every error can become a structured log record
 *
 * @module @flowkit/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard Flowkit error codes
 */
export type FlowkitErrorCode =
  // Data shape errors
  | 'TYPE_MISMATCH'
  | 'SOURCE_MAPPING_ERROR'

  // Execution errors
  | 'UNIT_FAILURE'
  | 'RECURSION_LIMIT'

  // Internal errors
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR'
  | 'UNHANDLED_ERROR';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Flowkit error options
 */
export interface FlowkitErrorOptions {
  /** Error code */
  code: FlowkitErrorCode;

  /** Whether the error is retryable */
  retryable?: boolean;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: unknown;
}

/**
 * Base Flowkit error class
 *
 * All Flowkit errors extend this for consistent handling.
 */
export class FlowkitError extends Error {
  readonly code: FlowkitErrorCode;
  readonly retryable: boolean;
  readonly context?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly timestamp: Date;

  constructor(message: string, options: FlowkitErrorOptions) {
    super(message);
    this.name = 'FlowkitError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * Type mismatch - an item is not the shape a combinator requires
 */
export class TypeMismatchError extends FlowkitError {
  readonly expected: string;
  readonly received: string;

  constructor(
    message: string,
    options: {
      expected: string;
      received: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'TYPE_MISMATCH',
      retryable: false,
      context: options.context,
    });
    this.name = 'TypeMismatchError';
    this.expected = options.expected;
    this.received = options.received;
  }
}

/**
 * Unit failure - a condition raised by the logic of a unit of work.
 *
 * The message is the original condition's message; `unit` names the unit
 * that raised it and `step` the parallel-map key it ran under, if any.
 */
export class UnitFailureError extends FlowkitError {
  readonly unit: string;
  readonly step?: string;

  constructor(
    message: string,
    options: {
      unit: string;
      step?: string;
      cause?: unknown;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'UNIT_FAILURE',
      retryable: false,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'UnitFailureError';
    this.unit = options.unit;
    this.step = options.step;
  }

  /**
   * Copy of this failure attributed to a parallel-map step.
   * A failure that already names a step keeps the innermost one.
   */
  withStep(step: string): UnitFailureError {
    if (this.step !== undefined) {
      return this;
    }
    return new UnitFailureError(this.message, {
      unit: this.unit,
      step,
      cause: this.cause,
      context: this.context,
    });
  }
}

/**
 * Source mapping error - a required key is missing from a run or example record
 */
export class SourceMappingError extends FlowkitError {
  readonly sourceId?: string;

  constructor(
    message: string,
    options?: {
      sourceId?: string;
      cause?: unknown;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'SOURCE_MAPPING_ERROR',
      retryable: false,
      cause: options?.cause,
      context: options?.context,
    });
    this.name = 'SourceMappingError';
    this.sourceId = options?.sourceId;
  }
}

/**
 * Configuration error - invalid settings or an unsupported execution mode
 */
export class ConfigurationError extends FlowkitError {
  readonly fieldErrors?: Record<string, string>;

  constructor(
    message: string,
    options?: {
      fieldErrors?: Record<string, string>;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      retryable: false,
      context: options?.context,
    });
    this.name = 'ConfigurationError';
    this.fieldErrors = options?.fieldErrors;
  }
}

/**
 * Recursion limit error - nested calls went deeper than allowed
 */
export class RecursionLimitError extends FlowkitError {
  readonly limit: number;

  constructor(unit: string, limit: number) {
    super(`Recursion limit of ${limit} reached while running ${unit}`, {
      code: 'RECURSION_LIMIT',
      retryable: false,
      context: { unit },
    });
    this.name = 'RecursionLimitError';
    this.limit = limit;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Check if a value is a Flowkit error
 */
export function isFlowkitError(error: unknown): error is FlowkitError {
  return error instanceof FlowkitError;
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert error to a structured record for logs
 */
export function toErrorRecord(error: unknown, context?: Record<string, unknown>): {
  type: 'error';
  code: FlowkitErrorCode;
  message: string;
  retryable: boolean;
  timestamp: string;
  context?: Record<string, unknown>;
} {
  if (error instanceof FlowkitError) {
    return {
      type: 'error',
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      timestamp: error.timestamp.toISOString(),
      context: { ...error.context, ...context },
    };
  }

  return {
    type: 'error',
    code: 'UNHANDLED_ERROR',
    message: errorMessage(error),
    retryable: false,
    timestamp: new Date().toISOString(),
    context,
  };
}

/**
 * Wrap any error as a FlowkitError
 */
export function wrapError(error: unknown, defaults?: Partial<FlowkitErrorOptions>): FlowkitError {
  if (error instanceof FlowkitError) {
    return error;
  }

  return new FlowkitError(errorMessage(error), {
    code: defaults?.code ?? 'UNHANDLED_ERROR',
    retryable: defaults?.retryable ?? false,
    context: defaults?.context,
    cause: error,
  });
}
