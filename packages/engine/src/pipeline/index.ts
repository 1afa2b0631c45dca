/**
 * Pipeline Module
 *
 * @module @stepgraph/engine/pipeline
 */

export * from './types.js';
export { PipelineRegistry } from './registry.js';
export {
  type PipelineOptions,
  type PipelineHandle,
  type UnitRegistrar,
  type DiscoveryUnit,
  type UnitDiscovery,
  type DiscoveryResult,
  defineUnit,
  discoverUnit,
  discover,
} from './discovery.js';
export { computePipelineDag } from './graph.js';
