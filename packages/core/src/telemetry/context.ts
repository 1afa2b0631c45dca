/**
 * Telemetry Context Module
 *
 * Defines the telemetry context that flows through discovery and step
 * invocation, so every log line emitted inside a step body (or while a
 * unit registers) carries the same correlation fields.
 *
 * @module @stepgraph/core/telemetry/context
 */

import { AsyncLocalStorage } from 'async_hooks';
import {
  generateTraceId,
  generateSpanId,
  type TraceId,
  type SpanId,
  type InvocationId,
} from './ids.js';

// =============================================================================
// Telemetry Context Types
// =============================================================================

/**
 * Source of the telemetry event
 */
export type TelemetrySource = 'discovery' | 'invocation' | 'cli' | 'internal';

/**
 * Severity levels (aligned with Cloud Logging)
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';

/**
 * Core telemetry context
 */
export interface TelemetryContext {
  // === Distributed Tracing ===
  /** W3C Trace Context trace ID (32 hex chars) */
  traceId: TraceId;
  /** W3C Trace Context span ID (16 hex chars) */
  spanId: SpanId;
  /** Parent span ID if this is a child span */
  parentSpanId?: SpanId;

  // === Resource Identifiers ===
  /** Step being registered or invoked */
  stepName?: string;
  /** Pipeline the step belongs to */
  pipelineName?: string;
  /** Discovery unit being loaded */
  unitId?: string;
  /** Single invocation of a step */
  invocationId?: InvocationId;

  // === Source Metadata ===
  source: TelemetrySource;
  serviceVersion?: string;
  environment?: string;

  /** Timestamp when context was created */
  timestamp: Date;
}

export type PartialTelemetryContext = Partial<TelemetryContext>;

// =============================================================================
// Async Local Storage for Context Propagation
// =============================================================================

const telemetryStorage = new AsyncLocalStorage<TelemetryContext>();

/**
 * Get the current telemetry context from async local storage
 */
export function getCurrentContext(): TelemetryContext | undefined {
  return telemetryStorage.getStore();
}

/**
 * Run a function with a telemetry context.
 *
 * The function's return value (a promise included) is handed back as is.
 */
export function runWithContext<T>(ctx: TelemetryContext, fn: () => T): T {
  return telemetryStorage.run(ctx, fn);
}

// =============================================================================
// Context Creation
// =============================================================================

/**
 * Create a new root telemetry context
 */
export function createContext(
  source: TelemetrySource,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    source,
    timestamp: new Date(),
    environment: process.env.DEPLOYMENT_ENV || process.env.NODE_ENV || 'dev',
    serviceVersion: process.env.APP_VERSION || '0.0.0',
    ...overrides,
  };
}

/**
 * Create a child context (new span under same trace)
 */
export function createChildContext(
  parent: TelemetryContext,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  return {
    ...parent,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    timestamp: new Date(),
    ...overrides,
  };
}

/**
 * Child of the active context when there is one, else a new root context
 */
export function deriveContext(
  source: TelemetrySource,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  const current = getCurrentContext();
  return current
    ? createChildContext(current, { source, ...overrides })
    : createContext(source, overrides);
}
