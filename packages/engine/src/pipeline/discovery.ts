/**
 * Pipeline Discovery
 *
 * A discovery unit is one independently loadable collection of step
 * declarations, typically one module. Its `register` callback declares steps
 * and at most one pipeline through a registrar.
 *
 * Two membership styles:
 * - Implicit: the unit creates a pipeline and declares steps on the unit.
 *   Every step of the unit is a member.
 * - Explicit: steps are declared through `pipeline.step(...)` and only those
 *   are members. Standalone unit steps are then a configuration error.
 *
 * Declarations are staged and reach the registry only once `register`
 * returns without error. Writing to the registry directly from inside
 * `register` is a configuration error.
 *
 * @module @stepgraph/engine/pipeline/discovery
 */

import type { z } from 'zod';
import { ConfigurationError, deriveContext, getLogger, runWithContext } from '@stepgraph/core';
import type { ParamShape, StepArgs, StepOutput } from '../schema/params.js';
import type { Registry } from '../registry.js';
import { isPromiseLike } from '../utils.js';
import { createStepDescriptor } from '../step/builder.js';
import { captureSourceLocation } from '../step/source-location.js';
import type { StepDescriptor, StepFunction, StepOptions } from '../step/types.js';
import type { PipelineDescriptor } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface PipelineOptions {
  name: string;
  description?: string;
}

export interface PipelineHandle {
  readonly name: string;
  readonly description?: string;

  /** Declare a step as an explicit member of this pipeline */
  step<P extends ParamShape = Record<never, never>, R extends z.ZodTypeAny | undefined = undefined>(
    options: StepOptions<P, R>,
    fn: StepFunction<P, R>
  ): StepDescriptor<StepArgs<P>, StepOutput<R>>;
}

export interface UnitRegistrar {
  readonly unitId: string;

  /** Declare a standalone step */
  step<P extends ParamShape = Record<never, never>, R extends z.ZodTypeAny | undefined = undefined>(
    options: StepOptions<P, R>,
    fn: StepFunction<P, R>
  ): StepDescriptor<StepArgs<P>, StepOutput<R>>;

  /** Declare the unit's pipeline; at most once per unit */
  pipeline(options: PipelineOptions): PipelineHandle;
}

export interface DiscoveryUnit {
  readonly id: string;
  register(registrar: UnitRegistrar): void;
}

export interface UnitDiscovery {
  readonly unitId: string;
  /** Steps the unit declared, in declaration order */
  readonly stepNames: readonly string[];
  readonly pipeline?: PipelineDescriptor;
}

export interface DiscoveryResult {
  readonly units: readonly UnitDiscovery[];
  readonly stepNames: readonly string[];
  readonly pipelineNames: readonly string[];
}

// =============================================================================
// Unit Definition
// =============================================================================

export function defineUnit(id: string, register: (registrar: UnitRegistrar) => void): DiscoveryUnit {
  if (!id.trim()) {
    throw new ConfigurationError('Discovery unit id must not be empty');
  }
  return { id, register };
}

// =============================================================================
// Staging
// =============================================================================

type Membership = 'standalone' | 'pipeline';

class UnitStage {
  readonly steps: StepDescriptor[] = [];
  readonly standalone: string[] = [];
  readonly explicitMembers: string[] = [];
  pipeline?: PipelineOptions;
  closed = false;

  constructor(readonly unitId: string) {}

  add(step: StepDescriptor, membership: Membership): void {
    this.assertOpen();
    if (membership === 'standalone' && this.explicitMembers.length > 0) {
      throw this.mixedStyles(step.name);
    }
    if (membership === 'pipeline' && this.standalone.length > 0) {
      throw this.mixedStyles(step.name);
    }
    this.steps.push(step);
    (membership === 'standalone' ? this.standalone : this.explicitMembers).push(step.name);
  }

  openPipeline(options: PipelineOptions): void {
    this.assertOpen();
    if (this.pipeline) {
      throw new ConfigurationError(
        `Unit "${this.unitId}" declares more than one pipeline ("${this.pipeline.name}", "${options.name}")`,
        { unitId: this.unitId }
      );
    }
    if (!options.name.trim()) {
      throw new ConfigurationError(`Unit "${this.unitId}" declares a pipeline with an empty name`, {
        unitId: this.unitId,
      });
    }
    this.pipeline = options;
  }

  assertOpen(): void {
    if (this.closed) {
      throw new ConfigurationError(
        `Unit "${this.unitId}" is no longer registering; declarations must happen inside register()`,
        { unitId: this.unitId }
      );
    }
  }

  private mixedStyles(stepName: string): ConfigurationError {
    return new ConfigurationError(
      `Unit "${this.unitId}" mixes pipeline.step() and standalone step() declarations (at step "${stepName}")`,
      { unitId: this.unitId, context: { stepName } }
    );
  }
}

class StagedPipeline implements PipelineHandle {
  readonly name: string;
  readonly description?: string;

  constructor(
    private readonly stage: UnitStage,
    options: PipelineOptions
  ) {
    this.name = options.name;
    this.description = options.description;
  }

  step<P extends ParamShape = Record<never, never>, R extends z.ZodTypeAny | undefined = undefined>(
    options: StepOptions<P, R>,
    fn: StepFunction<P, R>
  ): StepDescriptor<StepArgs<P>, StepOutput<R>> {
    this.stage.assertOpen();
    const step = createStepDescriptor(options, fn, captureSourceLocation(StagedPipeline.prototype.step));
    this.stage.add(step, 'pipeline');
    return step;
  }
}

class StagedRegistrar implements UnitRegistrar {
  constructor(private readonly stage: UnitStage) {}

  get unitId(): string {
    return this.stage.unitId;
  }

  step<P extends ParamShape = Record<never, never>, R extends z.ZodTypeAny | undefined = undefined>(
    options: StepOptions<P, R>,
    fn: StepFunction<P, R>
  ): StepDescriptor<StepArgs<P>, StepOutput<R>> {
    this.stage.assertOpen();
    const step = createStepDescriptor(options, fn, captureSourceLocation(StagedRegistrar.prototype.step));
    this.stage.add(step, 'standalone');
    return step;
  }

  pipeline(options: PipelineOptions): PipelineHandle {
    this.stage.openPipeline(options);
    return new StagedPipeline(this.stage, options);
  }
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * Run one unit's registration and commit its declarations
 *
 * @throws {ConfigurationError} On an invalid unit; the registry is left untouched
 * @throws {SchemaDerivationError} When one of the unit's steps cannot be derived
 */
export function discoverUnit(unit: DiscoveryUnit, registry: Registry): UnitDiscovery {
  return runWithContext(deriveContext('discovery', { unitId: unit.id }), () => {
    const stage = new UnitStage(unit.id);
    const release = registry.steps.holdForUnit(unit.id);
    try {
      const outcome: unknown = unit.register(new StagedRegistrar(stage));
      if (isPromiseLike(outcome)) {
        throw new ConfigurationError(`Unit "${unit.id}" must register synchronously`, {
          unitId: unit.id,
        });
      }
    } finally {
      stage.closed = true;
      release();
    }

    const stepNames = [...new Set(stage.steps.map((step) => step.name))];
    for (const step of stage.steps) {
      registry.steps.register(step);
    }

    let pipeline: PipelineDescriptor | undefined;
    if (stage.pipeline) {
      const members = stage.explicitMembers.length > 0 ? [...new Set(stage.explicitMembers)] : stepNames;
      pipeline = Object.freeze({
        name: stage.pipeline.name,
        description: stage.pipeline.description,
        modulePath: unit.id,
        members: Object.freeze(members),
      });
      registry.pipelines.register(pipeline);
    }

    getLogger().unitDiscovered(unit.id, stepNames.length, pipeline?.name);
    return { unitId: unit.id, stepNames, pipeline };
  });
}

/**
 * Discover units in order. The first failing unit stops discovery; units
 * before it stay registered.
 */
export function discover(units: Iterable<DiscoveryUnit>, registry: Registry): DiscoveryResult {
  const discovered: UnitDiscovery[] = [];
  for (const unit of units) {
    discovered.push(discoverUnit(unit, registry));
  }
  return {
    units: discovered,
    stepNames: [...new Set(discovered.flatMap((unit) => unit.stepNames))],
    pipelineNames: discovered.flatMap((unit) => (unit.pipeline ? [unit.pipeline.name] : [])),
  };
}
