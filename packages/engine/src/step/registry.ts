/**
 * Step Registry
 *
 * Name-keyed store of step descriptors. Registering under an existing name
 * replaces the earlier descriptor (last write wins), which is what module
 * reloads and test re-runs rely on.
 *
 * @module @stepgraph/engine/step/registry
 */

import { ConfigurationError, getLogger, type Logger } from '@stepgraph/core';
import type { StepDescriptor } from './types.js';

export class StepRegistry {
  private readonly steps = new Map<string, StepDescriptor>();
  private registeringUnit?: string;

  constructor(private readonly logger?: Logger) {}

  /**
   * @internal Held by discovery while a unit's register callback runs, so
   *   steps bypassing the unit's registrar are rejected
   * @returns Release function
   */
  holdForUnit(unitId: string): () => void {
    const previous = this.registeringUnit;
    this.registeringUnit = unitId;
    return () => {
      this.registeringUnit = previous;
    };
  }

  /**
   * Add a step, replacing any step of the same name
   *
   * @returns Whether an earlier step was replaced
   * @throws {ConfigurationError} While a discovery unit is registering
   */
  register(step: StepDescriptor): boolean {
    if (this.registeringUnit !== undefined) {
      throw new ConfigurationError(
        `Step "${step.name}" was registered directly while unit "${this.registeringUnit}" is registering; declare it through the unit's registrar`,
        { unitId: this.registeringUnit, context: { stepName: step.name } }
      );
    }
    const replaced = this.steps.has(step.name);
    this.steps.set(step.name, step);
    (this.logger ?? getLogger()).stepRegistered(step.name, replaced, {
      dependsOn: step.dependsOn,
    });
    return replaced;
  }

  get(name: string): StepDescriptor | undefined {
    return this.steps.get(name);
  }

  has(name: string): boolean {
    return this.steps.has(name);
  }

  /** Registered names, in registration order */
  names(): string[] {
    return [...this.steps.keys()];
  }

  list(): StepDescriptor[] {
    return [...this.steps.values()];
  }

  get size(): number {
    return this.steps.size;
  }

  /**
   * Read-only copy of the current contents
   */
  snapshot(): ReadonlyMap<string, StepDescriptor> {
    return new Map(this.steps);
  }

  clear(): void {
    this.steps.clear();
  }
}
