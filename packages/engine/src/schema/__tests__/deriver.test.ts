/**
 * Schema Deriver Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { SchemaDerivationError } from '../../errors.js';
import { annotated } from '../annotations.js';
import {
  deriveParameters,
  deriveReturn,
  deriveSchema,
  describeType,
  toJsonSchema,
} from '../deriver.js';
import { field, keywords, param, rest } from '../params.js';

describe('Schema Deriver', () => {
  describe('deriveParameters', () => {
    it('should derive required parameters in declaration order', () => {
      const set = deriveParameters('add', { a: z.number().int(), b: z.number().int() });

      expect(set.parameters.map((p) => p.name)).toEqual(['a', 'b']);
      expect(set.parameters.map((p) => p.required)).toEqual([true, true]);
      expect(set.parameters[0].declaredType).toBe('integer');
      expect(set.parameters[0].variadicKind).toBe('none');
      expect(set.jsonSchema).toEqual({
        type: 'object',
        properties: {
          a: { type: 'integer' },
          b: { type: 'integer' },
        },
        required: ['a', 'b'],
        additionalProperties: false,
      });
    });

    it('should derive an empty set when there are no parameters', () => {
      const set = deriveParameters('noop');

      expect(set.parameters).toEqual([]);
      expect(set.jsonSchema.type).toBe('object');
      expect(set.jsonSchema.properties).toEqual({});
    });

    it('should make defaulted parameters optional', () => {
      const set = deriveParameters('greet', {
        name: param(z.string(), { default: 'World', description: 'Who to greet' }),
      });
      const [name] = set.parameters;

      expect(name.required).toBe(false);
      expect(name.hasDefault).toBe(true);
      expect(name.defaultValue).toBe('World');
      expect(name.description).toBe('Who to greet');
      expect(name.jsonSchema).toMatchObject({
        type: 'string',
        default: 'World',
        description: 'Who to greet',
      });
      expect(set.argsSchema.parse({})).toEqual({ name: 'World' });
    });

    it('should make parameters that accept undefined optional without a default', () => {
      const [note] = deriveParameters('annotate', { note: z.string().optional() }).parameters;

      expect(note.required).toBe(false);
      expect(note.hasDefault).toBe(false);
      expect(note.declaredType).toBe('string | undefined');
      expect('defaultValue' in note).toBe(false);
    });

    it('should treat untyped parameters as any', () => {
      const [value] = deriveParameters('echo', { value: z.unknown() }).parameters;

      expect(value.declaredType).toBe('any');
      expect(value.jsonSchema).toEqual({});
    });

    it('should keep untyped parameters without a default required', () => {
      const set = deriveParameters('echo', { value: z.unknown(), other: z.any() });

      expect(set.parameters.map((p) => p.required)).toEqual([true, true]);
      expect(set.jsonSchema.required).toEqual(['value', 'other']);
      expect(set.argsSchema.safeParse({ value: null, other: 0 }).success).toBe(true);
      expect(set.argsSchema.safeParse({ value: 'only one' }).success).toBe(false);
    });

    it('should reject argument keys that are not parameters', () => {
      const set = deriveParameters('add', { a: z.number() });

      expect(set.jsonSchema.additionalProperties).toBe(false);
      expect(set.argsSchema.safeParse({ a: 1 }).success).toBe(true);
      expect(set.argsSchema.safeParse({ a: 1, b: 2 }).success).toBe(false);
    });

    it('should hand out a fresh copy of a default on every parse', () => {
      const set = deriveParameters('collect', {
        items: param(z.array(z.string()), { default: [] }),
      });

      const first = set.argsSchema.parse({});
      const second = set.argsSchema.parse({});

      expect(first.items).toEqual([]);
      expect(first.items).not.toBe(second.items);
    });

    it('should reject defaults that cannot be copied', () => {
      expect(() =>
        deriveParameters('broken', {
          callback: param(z.unknown(), { default: () => 1 }),
        })
      ).toThrow('Default of parameter "callback" of step "broken" cannot be copied');
    });
  });

  describe('variadic parameters', () => {
    it('should normalize rest to an array defaulting to empty', () => {
      const set = deriveParameters('sum', { values: rest(z.number()) });
      const [values] = set.parameters;

      expect(values.variadicKind).toBe('positional-rest');
      expect(values.required).toBe(false);
      expect(values.declaredType).toBe('array<number>');
      expect(values.defaultValue).toEqual([]);
      expect(set.argsSchema.parse({})).toEqual({ values: [] });
      expect(set.argsSchema.parse({ values: [1, 2] })).toEqual({ values: [1, 2] });
    });

    it('should normalize keywords to a record defaulting to empty', () => {
      const set = deriveParameters('tag', { extra: keywords() });
      const [extra] = set.parameters;

      expect(extra.variadicKind).toBe('keyword-rest');
      expect(extra.required).toBe(false);
      expect(extra.declaredType).toBe('record<string, any>');
      expect(set.argsSchema.parse({})).toEqual({ extra: {} });
    });

    it('should count every parameter kind', () => {
      const set = deriveParameters('mixed', {
        first: z.string(),
        second: param(z.number(), { default: 1 }),
        rest: rest(),
        options: keywords(z.boolean()),
      });

      expect(set.parameters).toHaveLength(4);
      expect(set.parameters.filter((p) => p.required).map((p) => p.name)).toEqual(['first']);
      expect(set.jsonSchema.required).toEqual(['first']);
    });

    it('should reject a second positional-rest parameter', () => {
      expect(() => deriveParameters('twice', { a: rest(), b: rest() })).toThrow(
        'Step "twice" declares more than one positional-rest parameter'
      );
    });

    it('should reject a second keyword-rest parameter', () => {
      expect(() => deriveParameters('twice', { a: keywords(), b: keywords() })).toThrow(
        SchemaDerivationError
      );
    });
  });

  describe('field constraints', () => {
    it('should merge numeric bounds into the schema', () => {
      const set = deriveParameters('batch', {
        size: param(z.number().int(), {
          default: field({ default: 10, minimum: 1, maximum: 100, description: 'Batch size' }),
        }),
      });
      const [size] = set.parameters;

      expect(size.required).toBe(false);
      expect(size.defaultValue).toBe(10);
      expect(size.description).toBe('Batch size');
      expect(size.jsonSchema).toMatchObject({
        type: 'integer',
        minimum: 1,
        maximum: 100,
        default: 10,
      });
      expect(set.argsSchema.safeParse({ size: 0 }).success).toBe(false);
      expect(set.argsSchema.safeParse({ size: 100 }).success).toBe(true);
    });

    it('should keep a constrained parameter required when the field has no default', () => {
      const set = deriveParameters('named', {
        label: param(z.string(), { default: field({ minLength: 2, pattern: '^[a-z]+$' }) }),
      });
      const [label] = set.parameters;

      expect(label.required).toBe(true);
      expect(label.hasDefault).toBe(false);
      expect(set.argsSchema.safeParse({ label: 'ab' }).success).toBe(true);
      expect(set.argsSchema.safeParse({ label: 'a' }).success).toBe(false);
      expect(set.argsSchema.safeParse({ label: 'AB' }).success).toBe(false);
    });

    it('should apply length bounds to arrays', () => {
      const set = deriveParameters('pick', {
        ids: param(z.array(z.string()), { default: field({ maxLength: 1 }) }),
      });

      expect(set.argsSchema.safeParse({ ids: ['a', 'b'] }).success).toBe(false);
    });

    it('should reject constraints that do not apply to the type', () => {
      expect(() =>
        deriveParameters('greet', {
          name: param(z.string(), { default: field({ minimum: 1 }) }),
        })
      ).toThrow('Constraint "minimum" does not apply to parameter "name" of step "greet" (string)');
    });
  });

  describe('annotations', () => {
    it('should strip tags from the type and keep them on the parameter', () => {
      const [doc] = deriveParameters('index', {
        doc: annotated(z.string(), 'step:load', { audit: true }),
      }).parameters;

      expect(doc.declaredType).toBe('string');
      expect(doc.tags).toEqual(['step:load', { audit: true }]);
      expect(doc.required).toBe(true);
    });
  });

  describe('resolution failures', () => {
    it('should reject a parameter whose type is not a schema', () => {
      const declared = JSON.parse('{"value": "string"}');

      expect(() => deriveParameters('typo', declared)).toThrow(
        'Parameter "value" of step "typo" has no resolvable type (got string)'
      );
    });

    it('should reject a lazy type that cannot be resolved', () => {
      const unresolved = z.lazy(() => {
        throw new Error('not yet defined');
      });

      let caught: unknown;
      try {
        deriveParameters('walk', { node: unresolved });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SchemaDerivationError);
      const error = caught instanceof SchemaDerivationError ? caught : undefined;
      expect(error?.stepName).toBe('walk');
      expect(error?.parameterName).toBe('node');
      expect(error?.code).toBe('SCHEMA_DERIVATION_ERROR');
      expect(error?.message).toBe(
        'Cannot derive JSON Schema for parameter "node" of step "walk": not yet defined'
      );
    });
  });

  describe('deriveReturn', () => {
    it('should be untyped without a return type', () => {
      expect(deriveReturn('greet', undefined)).toEqual({ declaredType: 'any', jsonSchema: {} });
    });

    it('should describe a declared return type', () => {
      const returns = deriveReturn('add', z.number().int());

      expect(returns.declaredType).toBe('integer');
      expect(returns.jsonSchema).toEqual({ type: 'integer' });
      expect(returns.schema).toBeDefined();
    });

    it('should reject a return type that is not a schema', () => {
      expect(() => deriveReturn('add', 'int')).toThrow(
        'Return type of step "add" is not a schema (got string)'
      );
    });
  });

  describe('deriveSchema', () => {
    it('should derive both halves', () => {
      const derived = deriveSchema('add', { a: z.number() }, z.number());

      expect(derived.parameters.parameters).toHaveLength(1);
      expect(derived.returns.declaredType).toBe('number');
    });
  });

  describe('describeType', () => {
    it('should name common types', () => {
      expect(describeType(z.boolean())).toBe('boolean');
      expect(describeType(z.array(z.number().int()))).toBe('array<integer>');
      expect(describeType(z.record(z.string(), z.string()))).toBe('record<string, string>');
      expect(describeType(z.enum(['a', 'b']))).toBe('"a" | "b"');
      expect(describeType(z.union([z.string(), z.number()]))).toBe('string | number');
      expect(describeType(z.string().nullable())).toBe('string | null');
      expect(describeType(z.object({ id: z.string() }))).toBe('object');
    });
  });

  describe('toJsonSchema', () => {
    it('should inline nested objects and drop the $schema marker', () => {
      const user = z.object({ id: z.string() });

      expect(toJsonSchema(z.object({ owner: user, reviewer: user }))).toEqual({
        type: 'object',
        properties: {
          owner: {
            type: 'object',
            properties: { id: { type: 'string' } },
            required: ['id'],
            additionalProperties: false,
          },
          reviewer: {
            type: 'object',
            properties: { id: { type: 'string' } },
            required: ['id'],
            additionalProperties: false,
          },
        },
        required: ['owner', 'reviewer'],
        additionalProperties: false,
      });
    });
  });
});
