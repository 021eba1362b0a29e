import pino, { Bindings, Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function defaultLogLevel(environment: string | undefined): LogLevel {
  return environment === 'test' ? 'silent' : 'info';
}

/**
 * Level used while the module loads, before configuration is parsed. An
 * unknown value falls back to the default here; `loadAppConfig` rejects it.
 */
export function resolveLogLevel(raw: string | undefined, environment: string | undefined): LogLevel {
  const candidate = raw?.trim().toLowerCase();
  const known = LOG_LEVELS.find((level) => level === candidate);
  return known ?? defaultLogLevel(environment);
}

const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL, process.env.NODE_ENV),
  base: { service: 'plot-record-service' },
  timestamp: pino.stdTimeFunctions.isoTime,
  messageKey: 'message',
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie'],
    remove: true,
  },
});

export function getLogger(bindings: Bindings = {}): Logger {
  return Object.keys(bindings).length ? logger.child(bindings) : logger;
}

// pino-http attaches a per-request child logger as `req.log`.
export function getRequestLogger(req: { log?: Logger }): Logger {
  return req.log ?? logger;
}

export default logger;
