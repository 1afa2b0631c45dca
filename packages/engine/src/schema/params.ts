/**
 * Parameter Declarations
 *
 * How step authors declare parameters. A plain zod schema is a positional
 * parameter; `param()`, `rest()` and `keywords()` add defaults and variadic
 * collection; `field()` attaches constraints that merge into the schema.
 *
 * @module @stepgraph/engine/schema/params
 */

import type { z } from 'zod';
import type { Annotated } from './annotations.js';

// =============================================================================
// Field Constraints
// =============================================================================

export interface FieldInfo<T = unknown> {
  default?: T;
  description?: string;
  /** Inclusive lower bound (numbers) */
  minimum?: number;
  /** Inclusive upper bound (numbers) */
  maximum?: number;
  /** Minimum length (strings, arrays) */
  minLength?: number;
  /** Maximum length (strings, arrays) */
  maxLength?: number;
  /** Pattern a string must match */
  pattern?: RegExp | string;
}

/**
 * Constraint-carrying default. Its constraints are merged into the
 * parameter's schema instead of being treated as the default value itself.
 */
export class Field<T = unknown> {
  constructor(readonly info: FieldInfo<T>) {}

  get hasDefault(): boolean {
    return Object.hasOwn(this.info, 'default');
  }
}

export function field<T>(info: FieldInfo<T>): Field<T> {
  return new Field(info);
}

// =============================================================================
// Parameter Declarations
// =============================================================================

export type ParamKind = 'positional' | 'rest' | 'keywords';

export interface ParamOptions<S extends z.ZodTypeAny = z.ZodTypeAny> {
  default?: z.input<S> | Field<z.input<S>>;
  description?: string;
}

export class ParamDecl<S extends z.ZodTypeAny = z.ZodTypeAny, K extends ParamKind = ParamKind> {
  constructor(
    readonly kind: K,
    /** Absent only for untyped variadic parameters */
    readonly type: S | Annotated<S> | undefined,
    readonly options: ParamOptions<S> = {}
  ) {}
}

/**
 * Positional parameter with a default and/or description
 *
 * @example
 * ```typescript
 * params: { retries: param(z.number().int(), { default: field({ default: 3, minimum: 0 }) }) }
 * ```
 */
export function param<S extends z.ZodTypeAny>(
  type: S | Annotated<S>,
  options: ParamOptions<S> = {}
): ParamDecl<S, 'positional'> {
  return new ParamDecl('positional', type, options);
}

/**
 * Collects any number of extra positional values into an array.
 * Untyped elements when `elementType` is omitted.
 */
export function rest<S extends z.ZodTypeAny = z.ZodUnknown>(
  elementType?: S | Annotated<S>
): ParamDecl<S, 'rest'> {
  return new ParamDecl('rest', elementType);
}

/**
 * Collects any number of extra named values into a string-keyed record.
 * Untyped values when `valueType` is omitted.
 */
export function keywords<S extends z.ZodTypeAny = z.ZodUnknown>(
  valueType?: S | Annotated<S>
): ParamDecl<S, 'keywords'> {
  return new ParamDecl('keywords', valueType);
}

// =============================================================================
// Type-level Mapping
// =============================================================================

export type ParamEntry = z.ZodTypeAny | Annotated | ParamDecl;

export type ParamShape = Record<string, ParamEntry>;

type ArgOf<E> =
  E extends ParamDecl<infer S, infer K>
    ? K extends 'rest'
      ? z.output<S>[]
      : K extends 'keywords'
        ? Record<string, z.output<S>>
        : z.output<S>
    : E extends Annotated<infer S>
      ? z.output<S>
      : E extends z.ZodTypeAny
        ? z.output<E>
        : never;

/**
 * Validated argument object a step callable receives
 */
export type StepArgs<P extends ParamShape> = { [K in keyof P]: ArgOf<P[K]> };

/**
 * What a step callable may return: the return schema's input, or anything
 * when the step is untyped
 */
export type StepOutput<R> = R extends z.ZodTypeAny ? z.input<R> : unknown;
