/**
 * Pipeline Types
 *
 * @module @stepgraph/engine/pipeline/types
 */

import type { JsonSchema } from '../schema/types.js';

/**
 * A named group of steps declared by one discovery unit
 */
export interface PipelineDescriptor {
  readonly name: string;
  readonly description?: string;
  /** Id of the unit that declared the pipeline */
  readonly modulePath: string;
  /** Member step names, in declaration order */
  readonly members: readonly string[];
}

/**
 * Execution graph of one pipeline, derived from the live registry
 */
export interface PipelineDAG {
  readonly pipeline: PipelineDescriptor;
  /** Member step name to its full dependsOn, external edges included */
  readonly dag: Readonly<Record<string, readonly string[]>>;
  readonly rootSteps: readonly string[];
  readonly leafSteps: readonly string[];
  /** Root step name to its parameter schema */
  readonly inputJsonSchema: Readonly<Record<string, JsonSchema>>;
  /** Leaf step name to its return schema */
  readonly outputJsonSchema: Readonly<Record<string, JsonSchema>>;
}
