/**
 * Crawl and conversion progress log.
 *
 * Everything goes to stderr so stdout stays free for `--help` and `--version`
 * output. Records carry `service: docsite-to-pdf` plus per-call fields such as
 * `{ url, depth }` or `{ index, total }`.
 */
import { createRequire } from 'node:module';
import pino from 'pino';
import type { LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);

export const VALID_LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof VALID_LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

/** `LOG_LEVEL`, case-insensitive; unknown values fall back to info. */
function levelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && isLogLevel(envLevel) ? envLevel : 'info';
}

/** Human-readable lines while developing, when the optional pino-pretty resolves. */
function usePrettyOutput(): boolean {
  if (process.env.NODE_ENV !== 'development') return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not available, using JSON logs:', e);
    return false;
  }
}

const options: LoggerOptions = {
  level: levelFromEnv(),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: {
    service: 'docsite-to-pdf',
  },
};

export const logger = usePrettyOutput()
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

/**
 * `--verbose`: show per-link and per-page details (links processed, settle
 * waits, conversion paths). An explicit `LOG_LEVEL=trace` is kept.
 */
export function enableVerboseLogging(): void {
  if (logger.level !== 'trace') {
    logger.level = 'debug';
  }
}
