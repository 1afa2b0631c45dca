/**
 * Schema Module
 *
 * Parameter declarations, annotations, and schema derivation.
 *
 * @module @stepgraph/engine/schema
 */

export * from './types.js';
export * from './annotations.js';
export * from './params.js';
export * from './deriver.js';
