/**
 * stepgraph - Engine
 *
 * Declarative steps and pipelines:
 *
 * - Schema derivation from typed parameter declarations
 * - Data-flow edges from produced-by-step markers
 * - Step registry, unit discovery and pipeline DAGs
 * - Single-step invocation over JSON
 * - Descriptor dumps for the execution backend
 *
 * @module @stepgraph/engine
 */

export * from './errors.js';

export { type Registry, createRegistry } from './registry.js';

export * from './schema/index.js';

export * from './step/index.js';

export * from './pipeline/index.js';

export * from './invocation/index.js';

export * from './dsl/index.js';
