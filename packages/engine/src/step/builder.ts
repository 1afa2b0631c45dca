/**
 * Step Builder
 *
 * Turns a function plus its declared signature into a frozen StepDescriptor.
 *
 * @example
 * ```typescript
 * const add = buildStep(
 *   registry,
 *   { params: { a: z.number().int(), b: z.number().int() }, returns: z.number().int() },
 *   function add({ a, b }) {
 *     return a + b;
 *   }
 * );
 * ```
 *
 * @module @stepgraph/engine/step/builder
 */

import type { z } from 'zod';
import { ConfigurationError } from '@stepgraph/core';
import { extractDependencyEdges } from '../schema/annotations.js';
import { deriveSchema } from '../schema/deriver.js';
import type { ParamShape, StepArgs, StepOutput } from '../schema/params.js';
import type { Registry } from '../registry.js';
import { captureSourceLocation } from './source-location.js';
import type { SourceLocation, StepDescriptor, StepFunction, StepOptions } from './types.js';

/**
 * Build a step and register it
 *
 * @throws {ConfigurationError} When the step has no usable name
 * @throws {SchemaDerivationError} When a parameter or return type cannot be resolved
 */
export function buildStep<
  P extends ParamShape = Record<never, never>,
  R extends z.ZodTypeAny | undefined = undefined,
>(
  registry: Registry,
  options: StepOptions<P, R>,
  fn: StepFunction<P, R>
): StepDescriptor<StepArgs<P>, StepOutput<R>> {
  const step = createStepDescriptor(options, fn, captureSourceLocation(buildStep));
  registry.steps.register(step);
  return step;
}

/**
 * Build a step without registering it
 */
export function defineStep<
  P extends ParamShape = Record<never, never>,
  R extends z.ZodTypeAny | undefined = undefined,
>(options: StepOptions<P, R>, fn: StepFunction<P, R>): StepDescriptor<StepArgs<P>, StepOutput<R>> {
  return createStepDescriptor(options, fn, captureSourceLocation(defineStep));
}

/**
 * @internal Shared by the builders and the discovery registrar, each of
 *   which captures the location at its own public entry point
 */
export function createStepDescriptor<P extends ParamShape, R extends z.ZodTypeAny | undefined>(
  options: StepOptions<P, R>,
  fn: StepFunction<P, R>,
  sourceLocation: SourceLocation | undefined
): StepDescriptor<StepArgs<P>, StepOutput<R>> {
  const name = options.name ?? fn.name;
  if (!name.trim()) {
    throw new ConfigurationError(
      'Step has no name: pass a named function or set the name option'
    );
  }

  const { parameters, returns } = deriveSchema(name, options.params, options.returns);

  const paramsFromStepResults: Record<string, string> = {};
  for (const edge of extractDependencyEdges(parameters.parameters)) {
    paramsFromStepResults[edge.parameterName] = edge.sourceStepName;
  }
  const dependsOn = [...new Set(Object.values(paramsFromStepResults))];

  return Object.freeze({
    name,
    description: options.description,
    setupScript: options.setupScript,
    postExecutionScript: options.postExecutionScript,
    metadata: options.metadata ? Object.freeze({ ...options.metadata }) : undefined,
    sandboxId: options.sandboxId,
    credentialBindings: options.credentialBindings
      ? Object.freeze({ ...options.credentialBindings })
      : undefined,
    dependsOn: Object.freeze(dependsOn),
    paramsFromStepResults: Object.freeze(paramsFromStepResults),
    paramSet: Object.freeze(parameters),
    returnSchema: Object.freeze(returns),
    sourceLocation,
    run: fn,
  });
}
