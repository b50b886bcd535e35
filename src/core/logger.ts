import { pino, type Level, type Logger, type LoggerOptions } from 'pino';
import { env } from './env.js';
import type { Verbosity } from './types.js';

// Pretty output everywhere except production and tests
const usePretty = !env.isProduction && !env.isTest;

const baseOptions: LoggerOptions = {
  level: env.isTest ? 'silent' : env.LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'env-recon',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.authorization', '*.cookie', '*.password', '*.secret'],
    censor: '[REDACTED]',
  },
};

// Logs go to stderr; stdout carries the discovery echo
export const logger: Logger = usePretty
  ? pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service',
          singleLine: false,
          destination: 2,
        },
      },
    })
  : pino(baseOptions, pino.destination(2));

const moduleLoggers = new Set<Logger>();

// Child logger factory for modules
export function createModuleLogger(module: string): Logger {
  const child = logger.child({ module });
  moduleLoggers.add(child);
  return child;
}

/**
 * Console verbosity → pino level. `quiet` still lets fatal diagnostics through.
 */
export const VERBOSITY_LEVELS: Record<Verbosity, Level> = {
  debug: 'debug',
  verbose: 'info',
  discovery: 'warn',
  quiet: 'fatal',
};

/**
 * Re-level the root logger and every module logger created so far
 */
export function applyVerbosity(verbosity: Verbosity): void {
  const level = VERBOSITY_LEVELS[verbosity];
  logger.level = level;
  for (const child of moduleLoggers) {
    child.level = level;
  }
}

/**
 * Whether discovery lines are echoed to stdout
 */
export function echoesDiscoveries(verbosity: Verbosity): boolean {
  return verbosity !== 'quiet';
}
