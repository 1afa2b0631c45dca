/**
 * Step Types
 *
 * @module @stepgraph/engine/step/types
 */

import type { z } from 'zod';
import type { Logger } from '@stepgraph/core';
import type { ParamShape, StepArgs, StepOutput } from '../schema/params.js';
import type { ParameterSet, ReturnSchema } from '../schema/types.js';

/**
 * Receiver a step callable runs with. Never part of its parameters.
 */
export interface StepContext {
  readonly stepName: string;
  /** Caller's cancellation signal, passed through untouched */
  readonly signal?: AbortSignal;
  readonly logger: Logger;
}

/**
 * Where a step was declared. Paths are project-relative when possible.
 */
export interface SourceLocation {
  readonly filePath: string;
  readonly line: number;
}

export interface StepOptions<
  P extends ParamShape = Record<never, never>,
  R extends z.ZodTypeAny | undefined = undefined,
> {
  /** Overrides the function's own name */
  name?: string;
  description?: string;
  /** Script the backend runs before the step */
  setupScript?: string;
  /** Script the backend runs after the step */
  postExecutionScript?: string;
  metadata?: Record<string, unknown>;
  /** Execution environment the step runs in; backend default when absent */
  sandboxId?: string;
  /** Credential name to credential ID */
  credentialBindings?: Record<string, string>;
  params?: P;
  returns?: R;
}

export type StepFunction<P extends ParamShape, R extends z.ZodTypeAny | undefined> = (
  this: StepContext,
  args: StepArgs<P>
) => StepOutput<R> | Promise<StepOutput<R>>;

/**
 * Immutable description of one step plus its callable
 */
export interface StepDescriptor<Args = Record<string, unknown>, Result = unknown> {
  readonly name: string;
  readonly description?: string;
  readonly setupScript?: string;
  readonly postExecutionScript?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
  readonly sandboxId?: string;
  readonly credentialBindings?: Readonly<Record<string, string>>;

  /** Distinct upstream step names, in first-seen parameter order */
  readonly dependsOn: readonly string[];
  /** Parameter name to the step whose result feeds it */
  readonly paramsFromStepResults: Readonly<Record<string, string>>;
  readonly paramSet: ParameterSet;
  readonly returnSchema: ReturnSchema;
  readonly sourceLocation?: SourceLocation;

  run(this: StepContext, args: Args): Result | Promise<Result>;
}
