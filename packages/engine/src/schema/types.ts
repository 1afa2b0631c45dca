/**
 * Schema Types
 *
 * Derived, immutable descriptions of a step's parameters and return value.
 *
 * @module @stepgraph/engine/schema/types
 */

import type { z } from 'zod';

/**
 * A JSON Schema document (draft-07)
 */
export type JsonSchema = Record<string, unknown>;

/**
 * How a parameter collects its values
 */
export type VariadicKind = 'none' | 'positional-rest' | 'keyword-rest';

/**
 * One derived parameter
 */
export interface ParameterSpec {
  readonly name: string;
  /** Human-readable type, e.g. `integer`, `array<string>`, `any` */
  readonly declaredType: string;
  /** Never true for variadic parameters */
  readonly required: boolean;
  readonly hasDefault: boolean;
  readonly defaultValue?: unknown;
  readonly variadicKind: VariadicKind;
  readonly description?: string;
  /** Metadata tags stripped from the declared type */
  readonly tags: readonly unknown[];
  /** Effective validator, defaults and merged constraints included */
  readonly schema: z.ZodTypeAny;
  readonly jsonSchema: JsonSchema;
}

/**
 * Ordered parameters of a step plus the validator for the whole argument object
 */
export interface ParameterSet {
  readonly parameters: readonly ParameterSpec[];
  readonly argsSchema: z.AnyZodObject;
  readonly jsonSchema: JsonSchema;
}

/**
 * Declared return type. Untyped when `schema` is absent.
 */
export interface ReturnSchema {
  readonly declaredType: string;
  readonly jsonSchema: JsonSchema;
  readonly schema?: z.ZodTypeAny;
}

/**
 * A parameter whose value is produced by another step
 */
export interface DependencyEdge {
  readonly parameterName: string;
  readonly sourceStepName: string;
}
