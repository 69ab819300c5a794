import pino from 'pino';

let baseLogger: pino.Logger | undefined;

function getBaseLogger(): pino.Logger {
  if (baseLogger) {
    return baseLogger;
  }

  const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level };

  baseLogger = pino(loggerOptions);
  return baseLogger;
}

/** Short sortable id used to tie together every log line of one import. */
export function generateImportId(): string {
  return `imp-${Date.now().toString(36)}-${Math.random().toString(36).substring(2, 8)}`;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getBaseLogger().child({ ...context });
}

export type Logger = pino.Logger;
