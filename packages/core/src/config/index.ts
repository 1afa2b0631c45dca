/**
 * Environment Configuration
 *
 * Reads stepgraph configuration from environment variables.
 *
 * Environment Variables:
 * - STEPGRAPH_SERVICE_NAME: Service name stamped on log entries (default: stepgraph)
 * - STEPGRAPH_LOG_LEVEL / LOG_LEVEL: Minimum log severity (default: INFO)
 * - STEPGRAPH_PRETTY_LOGS: Pretty-print log JSON (default: true only in development)
 * - STEPGRAPH_PROJECT_ROOT: Root that step source paths are made relative to
 *
 * @module @stepgraph/core/config
 */

import { z } from 'zod';
import { ConfigurationError } from '../reliability/errors.js';

export const LogLevel = z.enum(['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL']);

export type LogLevel = z.infer<typeof LogLevel>;

export const StepGraphConfig = z.object({
  /** Service name for log labels */
  serviceName: z.string().min(1).default('stepgraph'),

  /** Minimum severity to log */
  logLevel: LogLevel.default('INFO'),

  /** Pretty-print log entries */
  prettyLogs: z.boolean().default(false),

  /** Root directory for project-relative step source paths */
  projectRoot: z.string().min(1).optional(),
});

export type StepGraphConfig = z.infer<typeof StepGraphConfig>;

type Env = Record<string, string | undefined>;

/**
 * Read configuration from environment variables
 *
 * @throws {ConfigurationError} If a variable holds an invalid value
 */
export function readConfigFromEnv(env: Env = process.env): StepGraphConfig {
  const pretty = env.STEPGRAPH_PRETTY_LOGS;

  const result = StepGraphConfig.safeParse({
    serviceName: env.STEPGRAPH_SERVICE_NAME || undefined,
    logLevel: (env.STEPGRAPH_LOG_LEVEL || env.LOG_LEVEL)?.toUpperCase(),
    prettyLogs: pretty === undefined ? env.NODE_ENV === 'development' : pretty === 'true',
    projectRoot: env.STEPGRAPH_PROJECT_ROOT || undefined,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid stepgraph environment configuration: ${details}`, {
      cause: result.error,
    });
  }

  return result.data;
}
