/**
 * Telemetry Module
 *
 * - W3C Trace Context compatible correlation IDs
 * - AsyncLocalStorage-based context propagation
 * - Structured JSON logging with secret redaction
 *
 * @module @stepgraph/core/telemetry
 */

export {
  type TraceId,
  type SpanId,
  type InvocationId,
  generateTraceId,
  generateSpanId,
  generateInvocationId,
} from './ids.js';

export {
  type TelemetrySource,
  type Severity,
  type TelemetryContext,
  type PartialTelemetryContext,
  getCurrentContext,
  runWithContext,
  createContext,
  createChildContext,
  deriveContext,
} from './context.js';

export {
  type LoggerConfig,
  type LogEntry,
  Logger,
  getLogger,
  setLogger,
  createLogger,
  isSeverity,
} from './logger.js';
