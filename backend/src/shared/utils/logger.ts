/**
 * Structured logger using Pino
 *
 * - JSON to stdout in production, pino-pretty in development, silent in tests
 * - Level from LOG_LEVEL (debug in dev, info in prod)
 * - Bot token and secrets redacted
 * - Child loggers per service; add correlation fields (principalId,
 *   shareToken, groupId) on each log call
 *
 * Usage:
 * ```typescript
 * const log = createChildLogger({ service: 'ShareRegistry' });
 * log.info({ principalId, shareToken }, 'Share created');
 *
 * try {
 *   await operation();
 * } catch (err) {
 *   log.error({ err }, 'Operation failed');
 * }
 * ```
 */

import pino, { type Logger } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isTestEnv = nodeEnv === 'test' || process.env.VITEST === 'true';
const isDevelopment = nodeEnv !== 'production' && !isTestEnv;
const logLevel = isTestEnv ? 'silent' : process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Service filtering for diagnostics (LOG_SERVICES=ShareRegistry,DeliveryEngine)
const allowedServices = process.env.LOG_SERVICES?.split(',').map((s) => s.trim()).filter(Boolean) ?? [];

function buildTransport(): ReturnType<typeof pino.transport> | undefined {
  if (isTestEnv) {
    return undefined;
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (isDevelopment) {
    targets.push({
      level: logLevel,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,env',
        singleLine: false,
        messageFormat: '[{service}] {msg}',
      },
    });
  } else {
    targets.push({
      level: logLevel,
      target: 'pino/file',
      options: { destination: 1 },
    });
  }

  if (process.env.ENABLE_FILE_LOGGING === 'true') {
    targets.push({
      level: 'info',
      target: 'pino/file',
      options: {
        destination: process.env.LOG_FILE_PATH || './logs/app.log',
        mkdir: true,
      },
    });
  }

  return pino.transport({ targets });
}

const options: pino.LoggerOptions = {
  level: logLevel,
  serializers: {
    err: pino.stdSerializers.err,
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
  },
  base: {
    env: nodeEnv,
    service: 'relayshare',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers["x-telegram-bot-api-secret-token"]',
      'botToken',
      'password',
      'secret',
    ],
    remove: true,
  },
};

const transport = buildTransport();

export const logger: Logger = transport ? pino(options, transport) : pino(options);

/**
 * Create a child logger with additional context
 *
 * When LOG_SERVICES is set, services not listed log at `warn` and above only.
 */
export const createChildLogger = (context: Record<string, unknown>): Logger => {
  const child = logger.child(context);
  const service = typeof context.service === 'string' ? context.service : undefined;
  if (allowedServices.length > 0 && service && !allowedServices.includes(service) && !isTestEnv) {
    child.level = 'warn';
  }
  return child;
};
