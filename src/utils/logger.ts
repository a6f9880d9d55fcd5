import winston from 'winston';
import pino from 'pino';

// Determine environment and logger preference
const isDevelopment = !process.env.NODE_ENV || process.env.NODE_ENV === 'development';
export const loggerType = process.env.LOGGER?.toLowerCase() || (isDevelopment ? 'winston' : 'pino');
const logLevel = process.env.LOG_LEVEL?.toLowerCase() || (isDevelopment ? 'debug' : 'info');

const SERVICE_NAME = 'zoneplayer-client';

// Winston numbers levels in ascending verbosity: error < warn < info < debug < trace
const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    trace: 4
  },
  colors: {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    debug: 'blue',
    trace: 'gray'
  }
};

type LogMethod = (message: string, ...args: unknown[]) => void;

/**
 * Logger interface shared by the Winston and Pino back ends
 */
export interface Logger {
  error: LogMethod;
  warn: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  trace: LogMethod;
  always: LogMethod;  // logs regardless of level
  level: string;
}

function isMeta(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Error);
}

function createWinstonLogger(): Logger {
  winston.addColors(customLevels.colors);

  const winstonLogger = winston.createLogger({
    levels: customLevels.levels,
    level: logLevel === 'silent' ? 'error' : logLevel,
    silent: logLevel === 'silent',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true })
    ),
    defaultMeta: { service: SERVICE_NAME },
    transports: [
      new winston.transports.Console({
        format: isDevelopment
          ? winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
          : winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
          )
      })
    ]
  });

  const write = (level: string, message: string, args: unknown[]): void => {
    winstonLogger.log(level, message, ...args);
  };

  return {
    error: (message, ...args) => write('error', message, args),
    warn: (message, ...args) => write('warn', message, args),
    info: (message, ...args) => write('info', message, args),
    debug: (message, ...args) => write('debug', message, args),
    trace: (message, ...args) => write('trace', message, args),
    always: (message, ...args) => {
      if (!winstonLogger.silent) {
        write('info', message, args);
      }
    },
    get level() { return winstonLogger.silent ? 'silent' : winstonLogger.level; },
    set level(level: string) {
      winstonLogger.silent = level === 'silent';
      if (level !== 'silent') {
        winstonLogger.level = level;
      }
    }
  };
}

function createPinoLogger(): Logger {
  const pinoLogger = pino({
    level: logLevel,
    base: {
      service: SERVICE_NAME
    },
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => {
        return { level: label };
      }
    }
  });

  // Pino takes the merge object first, Winston takes it last
  const write = (level: 'error' | 'warn' | 'info' | 'debug' | 'trace', message: string, args: unknown[]): void => {
    const [meta] = args;
    if (isMeta(meta)) {
      pinoLogger[level](meta, message);
    } else if (meta instanceof Error) {
      pinoLogger[level]({ err: meta }, message);
    } else if (meta !== undefined) {
      pinoLogger[level]({ data: meta }, message);
    } else {
      pinoLogger[level](message);
    }
  };

  return {
    error: (message, ...args) => write('error', message, args),
    warn: (message, ...args) => write('warn', message, args),
    info: (message, ...args) => write('info', message, args),
    debug: (message, ...args) => write('debug', message, args),
    trace: (message, ...args) => write('trace', message, args),
    always: (message, ...args) => {
      if (pinoLogger.level !== 'silent') {
        write('info', message, args);
      }
    },
    get level() { return pinoLogger.level; },
    set level(level: string) { pinoLogger.level = level; }
  };
}

const logger: Logger = loggerType === 'pino' ? createPinoLogger() : createWinstonLogger();

export default logger;
