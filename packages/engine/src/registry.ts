/**
 * Registry
 *
 * The store that step builds and discovery write into. Create one per
 * process, or one per test, and pass it explicitly.
 *
 * @module @stepgraph/engine/registry
 */

import type { Logger } from '@stepgraph/core';
import { StepRegistry } from './step/registry.js';
import { PipelineRegistry } from './pipeline/registry.js';

export interface Registry {
  readonly steps: StepRegistry;
  readonly pipelines: PipelineRegistry;
  /** Drop every step and pipeline */
  reset(): void;
}

export function createRegistry(options: { logger?: Logger } = {}): Registry {
  const steps = new StepRegistry(options.logger);
  const pipelines = new PipelineRegistry(options.logger);
  return {
    steps,
    pipelines,
    reset() {
      steps.clear();
      pipelines.clear();
    },
  };
}
