/**
 * Pipeline Registry
 *
 * @module @stepgraph/engine/pipeline/registry
 */

import { getLogger, type Logger } from '@stepgraph/core';
import type { PipelineDescriptor } from './types.js';

/**
 * Name-keyed store of pipelines, last write wins
 */
export class PipelineRegistry {
  private readonly pipelines = new Map<string, PipelineDescriptor>();

  constructor(private readonly logger?: Logger) {}

  register(pipeline: PipelineDescriptor): boolean {
    const replaced = this.pipelines.has(pipeline.name);
    this.pipelines.set(pipeline.name, pipeline);
    (this.logger ?? getLogger()).debug(replaced ? 'Pipeline re-registered' : 'Pipeline registered', {
      eventName: replaced ? 'pipeline.replaced' : 'pipeline.registered',
      pipelineName: pipeline.name,
      unitId: pipeline.modulePath,
      members: pipeline.members,
    });
    return replaced;
  }

  get(name: string): PipelineDescriptor | undefined {
    return this.pipelines.get(name);
  }

  has(name: string): boolean {
    return this.pipelines.has(name);
  }

  names(): string[] {
    return [...this.pipelines.keys()];
  }

  list(): PipelineDescriptor[] {
    return [...this.pipelines.values()];
  }

  get size(): number {
    return this.pipelines.size;
  }

  clear(): void {
    this.pipelines.clear();
  }
}
