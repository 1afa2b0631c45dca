/**
 * Error Taxonomy
 *
 * Standard error types shared by discovery and invocation.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Nothing is retried internally; a failure always surfaces as a typed error
 * - Every error serializes for logs via toJSON()
 *
 * @module @stepgraph/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

export type StepGraphErrorCode =
  // Discovery / registration
  | 'CONFIGURATION_ERROR'
  | 'SCHEMA_DERIVATION_ERROR'

  // Invocation
  | 'INVALID_INPUT'
  | 'INVALID_UPSTREAM'
  | 'VALIDATION_ERROR'
  | 'SERIALIZATION_ERROR'
  | 'STEP_NOT_FOUND'

  | 'INTERNAL_ERROR';

// =============================================================================
// Base Error Class
// =============================================================================

export interface StepGraphErrorOptions {
  code: StepGraphErrorCode;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: unknown;
}

/**
 * Base error class
 *
 * All stepgraph errors extend this for consistent handling.
 */
export class StepGraphError extends Error {
  readonly code: StepGraphErrorCode;
  readonly context?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(message: string, options: StepGraphErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StepGraphError';
    this.code = options.code;
    this.context = options.context;
    this.timestamp = new Date();

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
 * Configuration error: bad environment or an invalid discovery unit.
 * Fatal for the load in progress.
 */
export class ConfigurationError extends StepGraphError {
  readonly unitId?: string;

  constructor(
    message: string,
    options?: {
      unitId?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      context: options?.context,
      cause: options?.cause,
    });
    this.name = 'ConfigurationError';
    this.unitId = options?.unitId;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

export function isStepGraphError(error: unknown): error is StepGraphError {
  return error instanceof StepGraphError;
}

/**
 * Get the error code, INTERNAL_ERROR for anything that is not ours
 */
export function getErrorCode(error: unknown): StepGraphErrorCode {
  return isStepGraphError(error) ? error.code : 'INTERNAL_ERROR';
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
