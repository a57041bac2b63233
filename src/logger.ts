/**
 * Structured logging with pino
 */
import { createRequire } from 'node:module';
import pino from 'pino';
import type { Logger } from 'pino';

const require = createRequire(import.meta.url);
const isDev = process.env.NODE_ENV === 'development';

/**
 * Check if pino-pretty is available in development mode.
 * Falls back to JSON logs if the module is missing.
 */
function isPinoPrettyAvailable(): boolean {
  if (!isDev) return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not available, using JSON logs:', e);
    return false;
  }
}

const VALID_LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

type LogLevel = (typeof VALID_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LOG_LEVELS as readonly string[]).includes(value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

const options = {
  level: getLogLevel(),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: {
    service: 'tube-trail',
  },
};

export const logger = isPinoPrettyAvailable()
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

/** The logging surface components depend on. */
export type CrawlLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Per-invocation context threaded through every component call.
 * `verbose` replaces any process-wide flag.
 */
export interface RunContext {
  verbose: boolean;
  logger: CrawlLogger;
}

export function createRunContext(verbose: boolean): RunContext {
  return {
    verbose,
    logger: verbose ? logger.child({}, { level: 'debug' }) : logger,
  };
}
