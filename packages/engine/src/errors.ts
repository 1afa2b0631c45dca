/**
 * Engine Errors
 *
 * Typed failures for registration and step invocation. Each one maps to a
 * single stage so callers can tell a bad payload from a bad step definition.
 *
 * @module @stepgraph/engine/errors
 */

import { StepGraphError } from '@stepgraph/core';

/**
 * A step's parameter or return type could not be resolved into a schema.
 * Only the offending step fails to register.
 */
export class SchemaDerivationError extends StepGraphError {
  readonly stepName: string;
  readonly parameterName?: string;

  constructor(
    message: string,
    stepName: string,
    options?: { parameterName?: string; cause?: unknown }
  ) {
    super(message, {
      code: 'SCHEMA_DERIVATION_ERROR',
      context: { stepName, parameterName: options?.parameterName },
      cause: options?.cause,
    });
    this.name = 'SchemaDerivationError';
    this.stepName = stepName;
    this.parameterName = options?.parameterName;
  }
}

/**
 * Explicit input JSON was malformed or not an object
 */
export class InvalidInputError extends StepGraphError {
  readonly stepName: string;

  constructor(message: string, stepName: string, cause?: unknown) {
    super(message, { code: 'INVALID_INPUT', context: { stepName }, cause });
    this.name = 'InvalidInputError';
    this.stepName = stepName;
  }
}

/**
 * Upstream results JSON was malformed or not an object
 */
export class InvalidUpstreamError extends StepGraphError {
  readonly stepName: string;

  constructor(message: string, stepName: string, cause?: unknown) {
    super(message, { code: 'INVALID_UPSTREAM', context: { stepName }, cause });
    this.name = 'InvalidUpstreamError';
    this.stepName = stepName;
  }
}

/**
 * One offending argument
 */
export interface FieldIssue {
  /** Dotted path of the field, parameter name first */
  field: string;
  message: string;
}

/**
 * Resolved arguments failed validation against the step's parameters
 */
export class ValidationError extends StepGraphError {
  readonly stepName: string;
  readonly issues: readonly FieldIssue[];

  constructor(stepName: string, issues: FieldIssue[]) {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super(`Invalid arguments for step "${stepName}": ${summary}`, {
      code: 'VALIDATION_ERROR',
      context: { stepName, issues },
    });
    this.name = 'ValidationError';
    this.stepName = stepName;
    this.issues = issues;
  }

  /** Distinct offending field names, in issue order */
  get fields(): string[] {
    return [...new Set(this.issues.map((issue) => issue.field))];
  }
}

/**
 * The step's result could not be encoded under its return type
 */
export class SerializationError extends StepGraphError {
  readonly stepName: string;

  constructor(message: string, stepName: string, cause?: unknown) {
    super(message, { code: 'SERIALIZATION_ERROR', context: { stepName }, cause });
    this.name = 'SerializationError';
    this.stepName = stepName;
  }
}

export class StepNotFoundError extends StepGraphError {
  readonly stepName: string;

  constructor(stepName: string, available: string[]) {
    super(`Step "${stepName}" is not registered`, {
      code: 'STEP_NOT_FOUND',
      context: { stepName, available },
    });
    this.name = 'StepNotFoundError';
    this.stepName = stepName;
  }
}
