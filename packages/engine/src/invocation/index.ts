/**
 * Invocation Module
 *
 * @module @stepgraph/engine/invocation
 */

export {
  type InvokeOptions,
  invokeStep,
  invokeStepByName,
  resolveArguments,
  serializeResult,
} from './engine.js';
