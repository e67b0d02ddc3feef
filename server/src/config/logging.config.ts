/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

/** Accepts LOG_LEVEL in any case; unknown values fall back to info */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = (raw || 'info').trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  if (normalized === 'critical') return 'fatal';
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production';

  return {
    level: parseLogLevel(env.LOG_LEVEL),
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,x-api-key,key,apiKey,api_key,googleMapsApiKey,secret')
      .split(',').map(f => f.trim()).filter(f => f.length > 0),
  };
}
