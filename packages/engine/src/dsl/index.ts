/**
 * DSL Module
 *
 * @module @stepgraph/engine/dsl
 */

export * from './dump.js';
