/**
 * Parameter Annotations
 *
 * Per-parameter metadata tags, and the produced-by-step marker that turns a
 * parameter into a data-flow edge.
 *
 * A marker is a string tag `step:<name>`. When a parameter carries several
 * markers, the FIRST one in declaration order wins; later markers are kept
 * as plain tags and ignored for dependency purposes.
 *
 * @module @stepgraph/engine/schema/annotations
 */

import type { z } from 'zod';
import type { DependencyEdge, ParameterSpec } from './types.js';

export const STEP_RESULT_PREFIX = 'step:';

/**
 * A step, by literal name or by an already-built descriptor
 */
export type StepReference = string | { readonly name: string };

/**
 * A type carrying metadata tags
 */
export class Annotated<S extends z.ZodTypeAny = z.ZodTypeAny> {
  constructor(
    readonly type: S,
    readonly tags: readonly unknown[]
  ) {}
}

/**
 * Attach metadata tags to a type. Annotating an annotated type appends the
 * new tags after the existing ones.
 */
export function annotated<S extends z.ZodTypeAny>(
  type: S | Annotated<S>,
  ...tags: unknown[]
): Annotated<S> {
  if (type instanceof Annotated) {
    return new Annotated(type.type, [...type.tags, ...tags]);
  }
  return new Annotated(type, tags);
}

/**
 * Build a produced-by-step marker.
 *
 * A descriptor reference resolves to its effective name right now; step
 * descriptors are frozen, so that name can no longer change.
 */
export function stepResult(ref: StepReference): string {
  const name = typeof ref === 'string' ? ref : ref.name;
  return `${STEP_RESULT_PREFIX}${name}`;
}

/**
 * Declare that a parameter's value is the result of another step
 *
 * @example
 * ```typescript
 * params: { document: fromStep(loadDocument, DocumentSchema) }
 * ```
 */
export function fromStep<S extends z.ZodTypeAny>(
  ref: StepReference,
  type: S | Annotated<S>
): Annotated<S> {
  return annotated(type, stepResult(ref));
}

/**
 * Split a declared parameter type into the real type and its tags
 */
export function extractAnnotations(declared: unknown): { type: unknown; tags: readonly unknown[] } {
  if (declared instanceof Annotated) {
    return { type: declared.type, tags: declared.tags };
  }
  return { type: declared, tags: [] };
}

/**
 * Find the produced-by-step marker among a parameter's tags
 *
 * @returns The referenced step name, or undefined when there is no marker
 */
export function matchStepResult(tags: readonly unknown[]): string | undefined {
  for (const tag of tags) {
    if (typeof tag === 'string' && tag.startsWith(STEP_RESULT_PREFIX)) {
      const name = tag.slice(STEP_RESULT_PREFIX.length).trim();
      if (name) {
        return name;
      }
    }
  }
  return undefined;
}

/**
 * Data-flow edges of a parameter list, one per marked parameter
 */
export function extractDependencyEdges(parameters: readonly ParameterSpec[]): DependencyEdge[] {
  const edges: DependencyEdge[] = [];
  for (const parameter of parameters) {
    const sourceStepName = matchStepResult(parameter.tags);
    if (sourceStepName) {
      edges.push({ parameterName: parameter.name, sourceStepName });
    }
  }
  return edges;
}
