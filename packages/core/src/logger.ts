import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const pinoLogger = pino({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  transport:
    isProduction || isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
  base: {
    env: process.env.NODE_ENV || 'development',
  },
});

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, obj?: LogContext): void;
  info(message: string, obj?: LogContext): void;
  warn(message: string, obj?: LogContext): void;
  error(message: string, obj?: LogContext): void;
  fatal(message: string, obj?: LogContext): void;
  child(bindings: LogContext): Logger;
}

// Message first, context second; pino wants the reverse
function wrap(target: pino.Logger): Logger {
  const emit = (level: pino.Level) => (message: string, obj?: LogContext) => {
    if (obj) {
      target[level](obj, message);
    } else {
      target[level](message);
    }
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal'),
    child: (bindings) => wrap(target.child(bindings)),
  };
}

export const logger: Logger = wrap(pinoLogger);

export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
