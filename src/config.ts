/**
 * Environment-driven configuration
 *
 * Values come from process.env (the CLI loads .env via dotenv first) and are
 * validated with zod. Anything invalid is a ConfigurationError naming the
 * offending variable.
 */

import { z } from 'zod';
import { DEFAULT_METRICS_PREFIX } from './constants.js';
import { ConfigurationError } from './errors.js';
import { LogLevel, parseLogLevel } from './logger.js';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return LogLevel.INFO;
      const level = parseLogLevel(value);
      if (level === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'expected one of DEBUG, INFO, WARN, ERROR, SILENT',
        });
        return z.NEVER;
      }
      return level;
    }),
  LOG_FORMAT: z.enum(['console', 'json']).default('console'),
  METRICS_ENABLED: booleanString.default('false'),
  METRICS_PREFIX: z
    .string()
    .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'must be a valid Prometheus metric name prefix')
    .default(DEFAULT_METRICS_PREFIX),
  REDACT_PARAMS: z
    .string()
    .default('')
    .transform(value => value.split(',').map(key => key.trim()).filter(key => key.length > 0)),
});

export interface DecoderConfig {
  logLevel: LogLevel;
  logFormat: 'console' | 'json';
  metricsEnabled: boolean;
  metricsPrefix: string;
  redactParams: string[];
}

export function loadConfig(env: Record<string, string | undefined> = process.env): DecoderConfig {
  const parsed = envSchema.safeParse({
    LOG_LEVEL: emptyToUndefined(env.LOG_LEVEL),
    LOG_FORMAT: emptyToUndefined(env.LOG_FORMAT),
    METRICS_ENABLED: emptyToUndefined(env.METRICS_ENABLED),
    METRICS_PREFIX: emptyToUndefined(env.METRICS_PREFIX),
    REDACT_PARAMS: emptyToUndefined(env.REDACT_PARAMS),
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue.path[0] ?? 'environment');
    throw new ConfigurationError(`Invalid ${variable}: ${issue.message}`, {
      variable,
      issues: parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    });
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    logFormat: parsed.data.LOG_FORMAT,
    metricsEnabled: parsed.data.METRICS_ENABLED,
    metricsPrefix: parsed.data.METRICS_PREFIX,
    redactParams: parsed.data.REDACT_PARAMS,
  };
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
