import { pino, type Logger, type LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(env: NodeJS.ProcessEnv): LevelWithSilent {
  const configured = env.LOG_LEVEL?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === configured);
  if (match) return match;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment
 */
function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const pretty = env.LOG_PRETTY === 'true' || env.NODE_ENV === 'development';

  return pino({
    level: resolveLevel(env),
    base: {
      env: env.NODE_ENV || 'development',
      service: 'pncp-digest',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
