/**
 * Invocation Engine
 *
 * Runs one step given two JSON documents supplied by the caller:
 * - explicit input: parameter name to value
 * - upstream results: step name to that step's result
 *
 * Pipeline:
 * 1. Parse both documents (empty means `{}`)
 * 2. Resolve arguments: upstream results fill parameters the explicit input leaves out
 * 3. Validate against the step's parameter set
 * 4. Dispatch with `this` bound to a StepContext; promises are awaited
 * 5. Serialize the result under the declared return type
 *
 * Errors thrown by the step itself propagate unchanged.
 *
 * @module @stepgraph/engine/invocation/engine
 */

import type { z } from 'zod';
import {
  deriveContext,
  generateInvocationId,
  getLogger,
  runWithContext,
  type Logger,
} from '@stepgraph/core';
import {
  InvalidInputError,
  InvalidUpstreamError,
  SerializationError,
  StepNotFoundError,
  ValidationError,
  type FieldIssue,
} from '../errors.js';
import type { Registry } from '../registry.js';
import { isPromiseLike } from '../utils.js';
import type { StepContext, StepDescriptor } from '../step/types.js';

export interface InvokeOptions {
  /** Handed to the step as `this.signal`; an aborted signal stops dispatch */
  signal?: AbortSignal;
  logger?: Logger;
}

type JsonObject = Record<string, unknown>;

// =============================================================================
// Public API
// =============================================================================

/**
 * Invoke a step and return its JSON-encoded result
 *
 * @throws {InvalidInputError} Explicit input is malformed or not an object
 * @throws {InvalidUpstreamError} Upstream results are malformed or not an object
 * @throws {ValidationError} Arguments are missing or mismatched
 * @throws {SerializationError} The result does not fit the return type
 */
export async function invokeStep(
  step: StepDescriptor,
  explicitInputJson: string,
  upstreamResultsJson: string,
  options: InvokeOptions = {}
): Promise<string> {
  const input = parseJsonObject(explicitInputJson, step.name, 'input');
  const upstream = parseJsonObject(upstreamResultsJson, step.name, 'upstream');
  const args = validateArguments(step, resolveArguments(step, input, upstream));

  options.signal?.throwIfAborted();

  const logger = options.logger ?? getLogger();
  const context = deriveContext('invocation', {
    stepName: step.name,
    invocationId: generateInvocationId(),
  });

  return runWithContext(context, () => dispatch(step, args, logger, options.signal));
}

/**
 * Look a step up by name and invoke it
 *
 * @throws {StepNotFoundError}
 */
export function invokeStepByName(
  registry: Registry,
  stepName: string,
  explicitInputJson: string,
  upstreamResultsJson: string,
  options?: InvokeOptions
): Promise<string> {
  const step = registry.steps.get(stepName);
  if (!step) {
    return Promise.reject(new StepNotFoundError(stepName, registry.steps.names()));
  }
  return invokeStep(step, explicitInputJson, upstreamResultsJson, options);
}

/**
 * Merge upstream results into explicit input. Explicit values always win;
 * an upstream value only fills a parameter the input does not mention.
 * Neither argument is modified.
 */
export function resolveArguments(
  step: Pick<StepDescriptor, 'paramsFromStepResults'>,
  input: JsonObject,
  upstream: JsonObject
): JsonObject {
  const resolved: JsonObject = { ...input };
  for (const [parameterName, sourceStepName] of Object.entries(step.paramsFromStepResults)) {
    if (!Object.hasOwn(resolved, parameterName) && Object.hasOwn(upstream, sourceStepName)) {
      resolved[parameterName] = upstream[sourceStepName];
    }
  }
  return resolved;
}

/**
 * Encode a step result under the step's return type
 *
 * @throws {SerializationError}
 */
export function serializeResult(step: Pick<StepDescriptor, 'name' | 'returnSchema'>, result: unknown): string {
  const { schema } = step.returnSchema;
  if (!schema) {
    return result === undefined ? 'null' : JSON.stringify(String(result));
  }

  const parsed = schema.safeParse(result);
  if (!parsed.success) {
    throw new SerializationError(
      `Result of step "${step.name}" does not match its return type: ${formatIssues(parsed.error)}`,
      step.name,
      parsed.error
    );
  }

  try {
    return JSON.stringify(parsed.data) ?? 'null';
  } catch (error) {
    throw new SerializationError(
      `Result of step "${step.name}" cannot be encoded as JSON`,
      step.name,
      error
    );
  }
}

// =============================================================================
// Stages
// =============================================================================

function parseJsonObject(text: string, stepName: string, source: 'input' | 'upstream'): JsonObject {
  const fail = (message: string, cause?: unknown): Error =>
    source === 'input'
      ? new InvalidInputError(`Invalid explicit input for step "${stepName}": ${message}`, stepName, cause)
      : new InvalidUpstreamError(`Invalid upstream results for step "${stepName}": ${message}`, stepName, cause);

  if (!text.trim()) {
    return {};
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw fail(error instanceof Error ? error.message : 'malformed JSON', error);
  }

  if (!isJsonObject(value)) {
    throw fail(`expected a JSON object, got ${describeJson(value)}`);
  }
  return value;
}

function validateArguments(step: StepDescriptor, args: JsonObject): JsonObject {
  const parsed = step.paramSet.argsSchema.safeParse(args);
  if (parsed.success) {
    return parsed.data;
  }

  const issues: FieldIssue[] = parsed.error.issues.flatMap((issue): FieldIssue[] => {
    if (issue.code === 'unrecognized_keys') {
      return issue.keys.map((key) => ({ field: key, message: 'Unexpected parameter' }));
    }
    const [parameterName] = issue.path;
    const field = issue.path.join('.') || '(arguments)';
    if (
      issue.path.length === 1 &&
      typeof parameterName === 'string' &&
      !Object.hasOwn(args, parameterName) &&
      Object.hasOwn(step.paramsFromStepResults, parameterName)
    ) {
      return [
        {
          field,
          message: `Missing result from upstream step "${step.paramsFromStepResults[parameterName]}"`,
        },
      ];
    }
    return [{ field, message: issue.message }];
  });

  throw new ValidationError(step.name, issues);
}

async function dispatch(
  step: StepDescriptor,
  args: JsonObject,
  logger: Logger,
  signal: AbortSignal | undefined
): Promise<string> {
  const context: StepContext = { stepName: step.name, signal, logger };
  const startedAt = Date.now();

  let result: unknown;
  try {
    const returned = step.run.call(context, args);
    result = isPromiseLike(returned) ? await returned : returned;
  } catch (error) {
    logger.stepInvocation(step.name, false, Date.now() - startedAt, error);
    throw error;
  }

  logger.stepInvocation(step.name, true, Date.now() - startedAt);
  return serializeResult(step, result);
}

// =============================================================================
// Helpers
// =============================================================================

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeJson(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
