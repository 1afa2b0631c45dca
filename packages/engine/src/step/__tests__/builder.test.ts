/**
 * Step Builder Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { ConfigurationError, createLogger, setLogger } from '@stepgraph/core';
import { SchemaDerivationError } from '../../errors.js';
import { createRegistry, type Registry } from '../../registry.js';
import { fromStep, stepResult, annotated } from '../../schema/annotations.js';
import { keywords, param, rest } from '../../schema/params.js';
import { buildStep, defineStep } from '../builder.js';

describe('buildStep', () => {
  let registry: Registry;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogger(createLogger('test-service', { prettyPrint: false, minSeverity: 'DEBUG' }));
    registry = createRegistry();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    setLogger(null);
  });

  it('should build and register a typed step', () => {
    const add = buildStep(
      registry,
      { params: { a: z.number().int(), b: z.number().int() }, returns: z.number().int() },
      function add({ a, b }) {
        return a + b;
      }
    );

    expect(add.name).toBe('add');
    expect(add.paramSet.parameters).toHaveLength(2);
    expect(add.returnSchema.declaredType).toBe('integer');
    expect(add.dependsOn).toEqual([]);
    expect(registry.steps.get('add')).toBe(add);
  });

  it('should prefer the name option over the function name', () => {
    const step = buildStep(registry, { name: 'renamed' }, function original() {
      return 'x';
    });

    expect(step.name).toBe('renamed');
    expect(registry.steps.has('original')).toBe(false);
  });

  it('should reject a step without a name', () => {
    expect(() => buildStep(registry, {}, () => 1)).toThrow(ConfigurationError);
    expect(registry.steps.size).toBe(0);
  });

  it('should copy the descriptive options', () => {
    const step = buildStep(
      registry,
      {
        description: 'Loads the corpus',
        setupScript: 'setup.sh',
        postExecutionScript: 'cleanup.sh',
        metadata: { owner: 'data' },
        sandboxId: 'sandbox-1',
        credentialBindings: { storage: 'cred-1' },
      },
      function load() {
        return null;
      }
    );

    expect(step.description).toBe('Loads the corpus');
    expect(step.setupScript).toBe('setup.sh');
    expect(step.postExecutionScript).toBe('cleanup.sh');
    expect(step.metadata).toEqual({ owner: 'data' });
    expect(step.sandboxId).toBe('sandbox-1');
    expect(step.credentialBindings).toEqual({ storage: 'cred-1' });
  });

  it('should count every kind of parameter and leave out the receiver', () => {
    const step = buildStep(
      registry,
      {
        params: {
          first: z.string(),
          second: param(z.number(), { default: 2 }),
          extra: rest(z.string()),
          options: keywords(),
        },
      },
      function mixed({ first }) {
        return `${this.stepName}:${first}`;
      }
    );

    expect(step.paramSet.parameters.map((p) => p.name)).toEqual([
      'first',
      'second',
      'extra',
      'options',
    ]);
  });

  describe('dependencies', () => {
    it('should resolve a literal marker', () => {
      const step = buildStep(
        registry,
        { params: { data: fromStep('load', z.string()) } },
        function transform({ data }) {
          return data.toUpperCase();
        }
      );

      expect(step.dependsOn).toEqual(['load']);
      expect(step.paramsFromStepResults).toEqual({ data: 'load' });
    });

    it('should resolve a descriptor reference to its effective name', () => {
      const load = buildStep(registry, { name: 'load_corpus' }, function load() {
        return 'text';
      });
      const step = buildStep(
        registry,
        { params: { data: fromStep(load, z.string()) } },
        function transform({ data }) {
          return data;
        }
      );

      expect(step.dependsOn).toEqual(['load_corpus']);
    });

    it('should deduplicate upstream steps in first-seen order', () => {
      const step = buildStep(
        registry,
        {
          params: {
            a: fromStep('left', z.string()),
            b: fromStep('right', z.string()),
            c: annotated(z.string(), stepResult('left')),
          },
        },
        function merge() {
          return '';
        }
      );

      expect(step.dependsOn).toEqual(['left', 'right']);
      expect(step.paramsFromStepResults).toEqual({ a: 'left', b: 'right', c: 'left' });
    });
  });

  it('should freeze the descriptor', () => {
    const step = buildStep(registry, {}, function frozen() {
      return 1;
    });

    expect(Object.isFrozen(step)).toBe(true);
    expect(Object.isFrozen(step.dependsOn)).toBe(true);
    expect(Object.isFrozen(step.paramSet.parameters)).toBe(true);
  });

  it('should capture the declaring file', () => {
    const step = buildStep(registry, {}, function located() {
      return 1;
    });

    expect(step.sourceLocation?.filePath).toMatch(/builder\.test\.ts$/);
    expect(step.sourceLocation?.line).toBeGreaterThan(0);
  });

  it('should capture the declaring file despite an invalid unrelated variable', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    const own = createRegistry({
      logger: createLogger('test-service', { prettyPrint: false, minSeverity: 'DEBUG' }),
    });

    const step = buildStep(own, { returns: z.string() }, function greet() {
      return 'hello';
    });

    expect(own.steps.get('greet')).toBe(step);
    expect(step.sourceLocation?.filePath).toMatch(/builder\.test\.ts$/);
  });

  it('should freeze the derived JSON Schemas', () => {
    const step = buildStep(
      registry,
      { params: { a: z.number() }, returns: z.object({ total: z.number() }) },
      function total({ a }) {
        return { total: a };
      }
    );

    expect(Object.isFrozen(step.paramSet.jsonSchema)).toBe(true);
    expect(Object.isFrozen(step.paramSet.jsonSchema.properties)).toBe(true);
    expect(Object.isFrozen(step.paramSet.parameters[0].jsonSchema)).toBe(true);
    expect(Object.isFrozen(step.returnSchema.jsonSchema.required)).toBe(true);
  });

  it('should let the last registration win', () => {
    const first = buildStep(registry, { name: 'dup' }, function one() {
      return 1;
    });
    const second = buildStep(registry, { name: 'dup' }, function two() {
      return 2;
    });

    expect(first).not.toBe(second);
    expect(registry.steps.get('dup')).toBe(second);
    expect(registry.steps.size).toBe(1);
  });

  it('should not register a step whose schema cannot be derived', () => {
    const declared = JSON.parse('{"value": 7}');

    expect(() => buildStep(registry, { params: declared }, function broken() {})).toThrow(
      SchemaDerivationError
    );
    expect(registry.steps.has('broken')).toBe(false);
  });
});

describe('defineStep', () => {
  it('should build without registering', () => {
    const registry = createRegistry();

    const step = defineStep({}, function standalone() {
      return 1;
    });

    expect(step.name).toBe('standalone');
    expect(registry.steps.size).toBe(0);
  });
});
