/**
 * Schema Deriver
 *
 * Turns declared parameters and return types into validators and JSON Schema.
 *
 * Derivation is strict: a declared type that is not a schema, or one that
 * cannot be rendered as JSON Schema, fails the step with
 * SchemaDerivationError. Nothing is silently downgraded to `any`.
 *
 * @module @stepgraph/engine/schema/deriver
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { SchemaDerivationError } from '../errors.js';
import { extractAnnotations } from './annotations.js';
import { Field, ParamDecl, type FieldInfo, type ParamShape } from './params.js';
import type {
  JsonSchema,
  ParameterSet,
  ParameterSpec,
  ReturnSchema,
  VariadicKind,
} from './types.js';

// =============================================================================
// Public API
// =============================================================================

export interface DerivedSchema {
  parameters: ParameterSet;
  returns: ReturnSchema;
}

/**
 * Derive both halves of a step's signature
 *
 * @throws {SchemaDerivationError}
 */
export function deriveSchema(
  stepName: string,
  params: ParamShape | undefined,
  returns: unknown
): DerivedSchema {
  return {
    parameters: deriveParameters(stepName, params),
    returns: deriveReturn(stepName, returns),
  };
}

/**
 * Derive the parameter set of a step, in declaration order
 *
 * @throws {SchemaDerivationError}
 */
export function deriveParameters(stepName: string, params: ParamShape = {}): ParameterSet {
  const parameters: ParameterSpec[] = [];
  const variadicSeen = new Set<VariadicKind>();

  for (const [name, entry] of Object.entries(params)) {
    const parameter = deriveParameter(stepName, name, entry);
    if (parameter.variadicKind !== 'none') {
      if (variadicSeen.has(parameter.variadicKind)) {
        throw new SchemaDerivationError(
          `Step "${stepName}" declares more than one ${parameter.variadicKind} parameter`,
          stepName,
          { parameterName: name }
        );
      }
      variadicSeen.add(parameter.variadicKind);
    }
    parameters.push(parameter);
  }

  const shape: z.ZodRawShape = {};
  for (const parameter of parameters) {
    shape[parameter.name] = parameter.schema;
  }
  const argsSchema = z.object(shape).strict();

  return {
    parameters: Object.freeze(parameters),
    argsSchema,
    jsonSchema: renderJsonSchema(stepName, argsSchema),
  };
}

/**
 * Derive the return schema of a step. Undefined means untyped.
 *
 * @throws {SchemaDerivationError}
 */
export function deriveReturn(stepName: string, returns: unknown): ReturnSchema {
  if (returns === undefined) {
    return { declaredType: 'any', jsonSchema: {} };
  }
  if (!(returns instanceof z.ZodType)) {
    throw new SchemaDerivationError(
      `Return type of step "${stepName}" is not a schema (got ${typeof returns})`,
      stepName
    );
  }
  return {
    declaredType: describeType(returns),
    jsonSchema: renderJsonSchema(stepName, returns),
    schema: returns,
  };
}

/**
 * JSON Schema (draft-07) for a zod type, inlined with no `$ref`s
 */
export function toJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const generated: JsonSchema = {
    ...zodToJsonSchema(schema, { $refStrategy: 'none', target: 'jsonSchema7' }),
  };
  delete generated.$schema;
  return generated;
}

/**
 * Short readable name for a zod type
 */
export function describeType(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodAny || schema instanceof z.ZodUnknown) return 'any';
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBigInt) return 'bigint';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodDate) return 'date';
  if (schema instanceof z.ZodNull) return 'null';
  if (schema instanceof z.ZodUndefined || schema instanceof z.ZodVoid) return 'undefined';
  if (schema instanceof z.ZodLiteral) return JSON.stringify(schema.value);
  if (schema instanceof z.ZodEnum) {
    return schema.options.map((option: unknown) => JSON.stringify(option)).join(' | ');
  }
  if (schema instanceof z.ZodArray) return `array<${describeType(schema.element)}>`;
  if (schema instanceof z.ZodRecord) return `record<string, ${describeType(schema.valueSchema)}>`;
  if (schema instanceof z.ZodTuple) return 'tuple';
  if (schema instanceof z.ZodObject) return 'object';
  if (schema instanceof z.ZodUnion) {
    return schema.options.map((option: z.ZodTypeAny) => describeType(option)).join(' | ');
  }
  if (schema instanceof z.ZodOptional) return `${describeType(schema.unwrap())} | undefined`;
  if (schema instanceof z.ZodNullable) return `${describeType(schema.unwrap())} | null`;
  if (schema instanceof z.ZodDefault) return describeType(schema.removeDefault());
  if (schema instanceof z.ZodEffects) return describeType(schema.innerType());
  // Resolving a lazy type here could throw before rendering reports it properly
  if (schema instanceof z.ZodLazy) return 'lazy';
  return 'unknown';
}

// =============================================================================
// Parameters
// =============================================================================

function deriveParameter(stepName: string, name: string, entry: unknown): ParameterSpec {
  const decl = entry instanceof ParamDecl ? entry : new ParamDecl('positional', undefined);
  const { type, tags } = extractAnnotations(entry instanceof ParamDecl ? entry.type : entry);
  const description = decl.options.description;

  if (decl.kind === 'rest' || decl.kind === 'keywords') {
    const element = type === undefined ? z.unknown() : requireSchema(stepName, name, type);
    const collected =
      decl.kind === 'rest' ? z.array(element) : z.record(z.string(), element);
    const defaultValue = decl.kind === 'rest' ? [] : {};
    const schema = describe(
      decl.kind === 'rest'
        ? z.array(element).default(() => [])
        : z.record(z.string(), element).default(() => ({})),
      description
    );
    return {
      name,
      declaredType: describeType(collected),
      required: false,
      hasDefault: true,
      defaultValue,
      variadicKind: decl.kind === 'rest' ? 'positional-rest' : 'keyword-rest',
      description,
      tags,
      schema,
      jsonSchema: renderJsonSchema(stepName, schema, name),
    };
  }

  const base = requireSchema(stepName, name, type);
  const declaredDefault: unknown = decl.options.default;
  let schema = base;
  let hasDefault = false;
  let defaultValue: unknown;
  let fieldDescription: string | undefined;

  if (declaredDefault instanceof Field) {
    schema = applyConstraints(stepName, name, base, declaredDefault.info);
    fieldDescription = declaredDefault.info.description;
    if (declaredDefault.hasDefault) {
      hasDefault = true;
      defaultValue = declaredDefault.info.default;
    }
  } else if (declaredDefault !== undefined) {
    hasDefault = true;
    defaultValue = declaredDefault;
  }

  // Untyped means unconstrained, not optional: the key itself must be present
  if (!hasDefault && isUntyped(base)) {
    schema = schema.refine((value) => value !== undefined, { message: 'Required' });
  }

  const effectiveDescription = description ?? fieldDescription;
  schema = describe(schema, effectiveDescription);
  if (hasDefault) {
    schema = schema.default(cloneFactory(stepName, name, defaultValue));
  }

  // Rendering first: it reports a broken lazy type before isOptional() resolves it
  const jsonSchema = renderJsonSchema(stepName, schema, name);

  return {
    name,
    declaredType: describeType(base),
    required: !hasDefault && !schema.isOptional(),
    hasDefault,
    ...(hasDefault ? { defaultValue } : {}),
    variadicKind: 'none',
    description: effectiveDescription,
    tags,
    schema,
    jsonSchema,
  };
}

function isUntyped(schema: z.ZodTypeAny): boolean {
  return schema instanceof z.ZodAny || schema instanceof z.ZodUnknown;
}

function requireSchema(stepName: string, name: string, type: unknown): z.ZodTypeAny {
  if (type instanceof z.ZodType) {
    return type;
  }
  throw new SchemaDerivationError(
    `Parameter "${name}" of step "${stepName}" has no resolvable type (got ${type === null ? 'null' : typeof type})`,
    stepName,
    { parameterName: name }
  );
}

function describe(schema: z.ZodTypeAny, description: string | undefined): z.ZodTypeAny {
  return description ? schema.describe(description) : schema;
}

/**
 * Each invocation gets its own copy of a default
 */
function cloneFactory(stepName: string, name: string, value: unknown): () => unknown {
  try {
    structuredClone(value);
  } catch (error) {
    throw new SchemaDerivationError(
      `Default of parameter "${name}" of step "${stepName}" cannot be copied`,
      stepName,
      { parameterName: name, cause: error }
    );
  }
  return () => structuredClone(value);
}

/**
 * Merge field constraints into a schema
 */
function applyConstraints(
  stepName: string,
  name: string,
  base: z.ZodTypeAny,
  info: FieldInfo
): z.ZodTypeAny {
  const inapplicable = (constraint: string): SchemaDerivationError =>
    new SchemaDerivationError(
      `Constraint "${constraint}" does not apply to parameter "${name}" of step "${stepName}" (${describeType(base)})`,
      stepName,
      { parameterName: name }
    );

  let schema = base;

  if (info.minimum !== undefined || info.maximum !== undefined) {
    if (!(schema instanceof z.ZodNumber)) {
      throw inapplicable(info.minimum !== undefined ? 'minimum' : 'maximum');
    }
    let numeric = schema;
    if (info.minimum !== undefined) numeric = numeric.gte(info.minimum);
    if (info.maximum !== undefined) numeric = numeric.lte(info.maximum);
    schema = numeric;
  }

  if (info.pattern !== undefined) {
    if (!(schema instanceof z.ZodString)) {
      throw inapplicable('pattern');
    }
    schema = schema.regex(
      typeof info.pattern === 'string' ? new RegExp(info.pattern) : info.pattern
    );
  }

  if (info.minLength !== undefined || info.maxLength !== undefined) {
    const constraint = info.minLength !== undefined ? 'minLength' : 'maxLength';
    if (schema instanceof z.ZodString) {
      let text = schema;
      if (info.minLength !== undefined) text = text.min(info.minLength);
      if (info.maxLength !== undefined) text = text.max(info.maxLength);
      schema = text;
    } else if (schema instanceof z.ZodArray) {
      let list = schema;
      if (info.minLength !== undefined) list = list.min(info.minLength);
      if (info.maxLength !== undefined) list = list.max(info.maxLength);
      schema = list;
    } else {
      throw inapplicable(constraint);
    }
  }

  return schema;
}

// =============================================================================
// JSON Schema
// =============================================================================

function renderJsonSchema(stepName: string, schema: z.ZodTypeAny, parameterName?: string): JsonSchema {
  try {
    return deepFreeze(toJsonSchema(schema));
  } catch (error) {
    const subject = parameterName
      ? `parameter "${parameterName}" of step "${stepName}"`
      : `step "${stepName}"`;
    throw new SchemaDerivationError(
      `Cannot derive JSON Schema for ${subject}: ${error instanceof Error ? error.message : String(error)}`,
      stepName,
      { parameterName, cause: error }
    );
  }
}

/**
 * Descriptors publish their schemas; nothing downstream may edit them
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
