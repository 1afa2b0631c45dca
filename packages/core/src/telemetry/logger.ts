/**
 * Structured Logger Module
 *
 * Provides structured JSON logging with:
 * - Automatic telemetry context injection
 * - Secret/token redaction
 * - Cloud Logging compatible severities
 * - Consistent field names
 *
 * @module @stepgraph/core/telemetry/logger
 */

import { getCurrentContext, type TelemetryContext, type Severity } from './context.js';
import { readConfigFromEnv } from '../config/index.js';

// =============================================================================
// Logger Configuration
// =============================================================================

export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Whether to pretty print (for development) */
  prettyPrint?: boolean;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns, applied to every string value */
  redactionPatterns?: RegExp[];
}

/**
 * Default redaction patterns for sensitive string values
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,
  /-----BEGIN[A-Z ]*PRIVATE KEY-----[\s\S]*?-----END[A-Z ]*PRIVATE KEY-----/g,
];

/**
 * Field names whose values are always replaced
 */
const SENSITIVE_KEY_PATTERN = /password|secret|api[_-]?key|token|authorization/i;

const REDACTED = '[REDACTED]';

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
};

// =============================================================================
// Log Entry Types
// =============================================================================

export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;

  labels?: {
    service: string;
    version?: string;
    environment?: string;
  };

  traceId?: string;
  spanId?: string;
  stepName?: string;
  pipelineName?: string;
  unitId?: string;
  invocationId?: string;
  eventName?: string;

  error?: {
    message: string;
    name?: string;
    code?: string;
    stack?: string;
  };

  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Structured logger with telemetry context integration
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? (process.env.NODE_ENV === 'development'),
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  notice(message: string, data?: Record<string, unknown>): void {
    this.log('NOTICE', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', message, { ...data, ...this.formatError(error) });
  }

  critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('CRITICAL', message, { ...data, ...this.formatError(error) });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log a step landing in the registry
   */
  stepRegistered(stepName: string, replaced: boolean, data?: Record<string, unknown>): void {
    this.debug(replaced ? 'Step re-registered' : 'Step registered', {
      eventName: replaced ? 'step.replaced' : 'step.registered',
      stepName,
      ...data,
    });
  }

  /**
   * Log the outcome of loading one discovery unit
   */
  unitDiscovered(unitId: string, stepCount: number, pipelineName?: string): void {
    this.info('Discovery unit loaded', {
      eventName: 'unit.discovered',
      unitId,
      stepCount,
      pipelineName,
    });
  }

  /**
   * Log the end of one step invocation
   */
  stepInvocation(
    stepName: string,
    success: boolean,
    durationMs: number,
    error?: unknown
  ): void {
    if (success) {
      this.info('Step completed', {
        eventName: 'step.success',
        stepName,
        durationMs,
      });
      return;
    }
    this.error('Step failed', error, {
      eventName: 'step.failure',
      stepName,
      durationMs,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.config.minSeverity]) {
      return;
    }

    const entry = this.buildLogEntry(severity, message, getCurrentContext(), data);
    this.output(this.redactEntry(entry));
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    ctx: TelemetryContext | undefined,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      labels: {
        service: this.config.serviceName,
        version: ctx?.serviceVersion || process.env.APP_VERSION,
        environment: ctx?.environment || process.env.DEPLOYMENT_ENV,
      },
      ...this.config.defaultFields,
    };

    if (ctx) {
      entry.traceId = ctx.traceId;
      entry.spanId = ctx.spanId;
      if (ctx.stepName) entry.stepName = ctx.stepName;
      if (ctx.pipelineName) entry.pipelineName = ctx.pipelineName;
      if (ctx.unitId) entry.unitId = ctx.unitId;
      if (ctx.invocationId) entry.invocationId = ctx.invocationId;
    }

    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private formatError(error: unknown): Record<string, unknown> {
    if (error === undefined || error === null) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        error: {
          message: error.message,
          name: error.name,
          code,
          stack: error.stack,
        },
      };
    }

    return {
      error: {
        message: String(error),
      },
    };
  }

  private redactEntry(entry: LogEntry): LogEntry {
    const redacted: LogEntry = { ...entry };
    for (const [key, value] of Object.entries(entry)) {
      redacted[key] = this.redactValue(key, value);
    }
    return redacted;
  }

  private redactValue(key: string, value: unknown): unknown {
    if (SENSITIVE_KEY_PATTERN.test(key) && value !== undefined && value !== null) {
      return REDACTED;
    }
    if (typeof value === 'string') {
      let out = value;
      for (const pattern of this.redactionPatterns) {
        out = out.replace(pattern, REDACTED);
      }
      return out;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue('', item));
    }
    if (value && typeof value === 'object' && !(value instanceof Date)) {
      const nested: Record<string, unknown> = {};
      for (const [nestedKey, nestedValue] of Object.entries(value)) {
        nested[nestedKey] = this.redactValue(nestedKey, nestedValue);
      }
      return nested;
    }
    return value;
  }

  private output(entry: LogEntry): void {
    const output = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    switch (entry.severity) {
      case 'ERROR':
      case 'CRITICAL':
        console.error(output);
        break;
      case 'WARNING':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

// =============================================================================
// Default Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the default logger instance, configured from the environment
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const config = readConfigFromEnv();
    defaultLogger = new Logger({
      serviceName: config.serviceName,
      minSeverity: config.logLevel,
      prettyPrint: config.prettyLogs,
    });
  }
  return defaultLogger;
}

/**
 * Set a custom default logger (pass null to fall back to the environment)
 */
export function setLogger(logger: Logger | null): void {
  defaultLogger = logger;
}

export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    serviceName,
    ...config,
  });
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && Object.hasOwn(SEVERITY_ORDER, value);
}
