/**
 * Descriptor Dumps
 *
 * Wire-format views of steps and pipelines for the execution backend.
 * Field names are snake_case and absent optional values are `null`. Dumps
 * are copies; editing one leaves the registered descriptors as they were.
 *
 * @module @stepgraph/engine/dsl/dump
 */

import { computePipelineDag } from '../pipeline/graph.js';
import type { PipelineDAG } from '../pipeline/types.js';
import type { Registry } from '../registry.js';
import type { JsonSchema } from '../schema/types.js';
import type { StepDescriptor } from '../step/types.js';

export interface StepDump {
  name: string;
  description: string | null;
  setup_script: string | null;
  post_execution_script: string | null;
  metadata: Record<string, unknown> | null;
  execution_environment_id: string | null;
  depends_on: string[];
  file_path: string | null;
  file_line_number: number | null;
  params_json_schema: JsonSchema;
  return_json_schema: JsonSchema;
  params_from_step_results: Record<string, string>;
  credential_bindings: Record<string, string> | null;
}

export interface PipelineDump {
  name: string;
  description: string | null;
  module_path: string;
  steps: string[];
  dag: Record<string, string[]>;
  root_steps: string[];
  leaf_steps: string[];
  input_json_schema: Record<string, JsonSchema>;
  output_json_schema: Record<string, JsonSchema>;
}

export interface DslDump {
  steps: Record<string, StepDump>;
  pipelines: Record<string, PipelineDump>;
}

export function dumpStep(step: StepDescriptor): StepDump {
  return {
    name: step.name,
    description: step.description ?? null,
    setup_script: step.setupScript ?? null,
    post_execution_script: step.postExecutionScript ?? null,
    metadata: step.metadata ? { ...step.metadata } : null,
    execution_environment_id: step.sandboxId ?? null,
    depends_on: [...step.dependsOn],
    file_path: step.sourceLocation?.filePath ?? null,
    file_line_number: step.sourceLocation?.line ?? null,
    params_json_schema: structuredClone(step.paramSet.jsonSchema),
    return_json_schema: structuredClone(step.returnSchema.jsonSchema),
    params_from_step_results: { ...step.paramsFromStepResults },
    credential_bindings: step.credentialBindings ? { ...step.credentialBindings } : null,
  };
}

export function dumpPipeline(graph: PipelineDAG): PipelineDump {
  const dag: Record<string, string[]> = {};
  for (const [name, dependsOn] of Object.entries(graph.dag)) {
    dag[name] = [...dependsOn];
  }
  return {
    name: graph.pipeline.name,
    description: graph.pipeline.description ?? null,
    module_path: graph.pipeline.modulePath,
    steps: Object.keys(dag),
    dag,
    root_steps: [...graph.rootSteps],
    leaf_steps: [...graph.leafSteps],
    input_json_schema: structuredClone(graph.inputJsonSchema),
    output_json_schema: structuredClone(graph.outputJsonSchema),
  };
}

/**
 * Everything registered, as one document
 */
export function buildDsl(registry: Registry): DslDump {
  const steps: Record<string, StepDump> = {};
  for (const step of registry.steps.list()) {
    steps[step.name] = dumpStep(step);
  }
  const pipelines: Record<string, PipelineDump> = {};
  for (const pipeline of registry.pipelines.list()) {
    pipelines[pipeline.name] = dumpPipeline(computePipelineDag(pipeline, registry.steps));
  }
  return { steps, pipelines };
}
