/**
 * Step Module
 *
 * @module @stepgraph/engine/step
 */

export * from './types.js';
export { StepRegistry } from './registry.js';
export { buildStep, defineStep } from './builder.js';
export {
  captureSourceLocation,
  parseFrame,
  toProjectRelative,
  findProjectRoot,
} from './source-location.js';
