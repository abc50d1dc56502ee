import pino from 'pino';

/**
 * Structured logging for the plan compiler.
 *
 * JSON lines in production, pino-pretty in development, silent under test.
 * `LOG_LEVEL` overrides the default level.
 */

const env = process.env.NODE_ENV;
const isTest = env === 'test';
const isDevelopment = env !== 'production';

const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

const transport =
  isDevelopment && !isTest
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined;

export const logger = pino({
  level: isTest ? 'silent' : logLevel,
  transport,
  base: { env, service: 'w3a-plan-compiler' },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Child logger tagged with a module name or other bindings.
 *
 * @example
 * const log = createLogger({ module: 'policy-store' });
 * log.info({ district: '08A' }, 'Overlay merged');
 */
export function createLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}

export interface RequestContext {
  requestId?: string;
  path?: string;
  method?: string;
}

export function createRequestLogger(context: RequestContext): pino.Logger {
  return logger.child({ module: 'http', ...context });
}

export function logError(
  log: pino.Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));
  log.error({ err: { name: err.name, message: err.message, stack: err.stack }, ...context }, message);
}

/** Logs how long an operation took since `startTime` (ms epoch). */
export function logTiming(
  log: pino.Logger,
  operation: string,
  startTime: number,
  context?: Record<string, unknown>
): void {
  const durationMs = Date.now() - startTime;
  log.debug({ operation, durationMs, ...context }, `${operation} completed in ${durationMs}ms`);
}
