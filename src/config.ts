import { z } from 'zod';
import { DEFAULT_ANALYTICS_SETTINGS } from './analytics';
import { ConfigurationError } from './errors';
import { AnalyticsSettings } from './types';
import { parseDelta, parseStartTime } from './window';

const unsetIfEmpty = (value: unknown) => (value === '' ? undefined : value);

const text = z.preprocess(unsetIfEmpty, z.string().optional());

const count = (fallback: number, min: number) =>
  z.preprocess(unsetIfEmpty, z.coerce.number().int().min(min).default(fallback));

const EnvSchema = z.object({
  LOG_FILE: text,
  START: text,
  DELTA: text,
  COMMANDS: text,
  SLOW_REQUEST_MS: count(DEFAULT_ANALYTICS_SETTINGS.slowRequestMs, 0),
  QUEUE_PEAK_THRESHOLD: count(DEFAULT_ANALYTICS_SETTINGS.queuePeakThreshold, 0),
  TOP_IPS_LIMIT: count(DEFAULT_ANALYTICS_SETTINGS.topIpsLimit, 1),
  VERBOSE: text,
});

export interface Config {
  logFile?: string;
  startTime?: Date;
  delta?: number; // ms
  commands: string[];
  analytics: AnalyticsSettings;
  verbose: boolean;
}

export function splitCommands(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`invalid environment: ${details.join('; ')}`);
  }
  const vars = result.data;
  return {
    logFile: vars.LOG_FILE,
    startTime: vars.START !== undefined ? parseStartTime(vars.START) : undefined,
    delta: vars.DELTA !== undefined ? parseDelta(vars.DELTA) : undefined,
    commands: vars.COMMANDS !== undefined ? splitCommands(vars.COMMANDS) : [],
    analytics: {
      slowRequestMs: vars.SLOW_REQUEST_MS,
      queuePeakThreshold: vars.QUEUE_PEAK_THRESHOLD,
      topIpsLimit: vars.TOP_IPS_LIMIT,
    },
    verbose: vars.VERBOSE === '1' || vars.VERBOSE === 'true',
  };
}
