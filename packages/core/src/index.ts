/**
 * stepgraph - Core
 *
 * Shared ambient stack for the stepgraph packages:
 *
 * - Structured logging and telemetry context
 * - Error taxonomy
 * - Environment configuration
 *
 * @module @stepgraph/core
 */

export * from './telemetry/index.js';

export {
  type StepGraphErrorCode,
  type StepGraphErrorOptions,
  StepGraphError,
  ConfigurationError,
  isStepGraphError,
  getErrorCode,
  toError,
} from './reliability/errors.js';

export * from './config/index.js';
