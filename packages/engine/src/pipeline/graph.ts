/**
 * Pipeline DAG
 *
 * The graph is never declared. Each member's edges come from its own
 * `dependsOn`, which in turn comes from produced-by-step markers on its
 * parameters.
 *
 * @module @stepgraph/engine/pipeline/graph
 */

import type { JsonSchema } from '../schema/types.js';
import type { StepRegistry } from '../step/registry.js';
import type { StepDescriptor } from '../step/types.js';
import type { PipelineDAG, PipelineDescriptor } from './types.js';

/**
 * Compute a pipeline's DAG from the current registry contents.
 *
 * - `dag[step]` is the step's full dependsOn. Edges to non-members are kept
 *   as they are but not expanded.
 * - Roots have no dependencies at all.
 * - Leaves are named in no other member's dependsOn.
 * - Members absent from the registry are skipped.
 */
export function computePipelineDag(pipeline: PipelineDescriptor, steps: StepRegistry): PipelineDAG {
  const members: StepDescriptor[] = [];
  for (const name of new Set(pipeline.members)) {
    const step = steps.get(name);
    if (step) {
      members.push(step);
    }
  }

  const referenced = new Set<string>();
  for (const member of members) {
    for (const dependency of member.dependsOn) {
      if (dependency !== member.name) {
        referenced.add(dependency);
      }
    }
  }

  const dag: Record<string, readonly string[]> = {};
  const rootSteps: string[] = [];
  const leafSteps: string[] = [];
  const inputJsonSchema: Record<string, JsonSchema> = {};
  const outputJsonSchema: Record<string, JsonSchema> = {};

  for (const member of members) {
    dag[member.name] = [...member.dependsOn];
    if (member.dependsOn.length === 0) {
      rootSteps.push(member.name);
      inputJsonSchema[member.name] = member.paramSet.jsonSchema;
    }
    if (!referenced.has(member.name)) {
      leafSteps.push(member.name);
      outputJsonSchema[member.name] = member.returnSchema.jsonSchema;
    }
  }

  return { pipeline, dag, rootSteps, leafSteps, inputJsonSchema, outputJsonSchema };
}
