import winston from 'winston';
import { loggingConfig, type LogServiceName } from '@core/config/logging';

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Outside debug mode only errors reach the terminal, tersely
    if (process.env.CHUNKSHELL_DEBUG !== 'true') {
      if (!level.includes('error')) {
        return '';
      }
      return `Error: ${String(message)}`;
    }

    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

function resolveLevel(fallback: string): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.CHUNKSHELL_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
}

const silentConsole = () => process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL;

/**
 * Factory for per-service winston loggers.
 */
export class LoggerFactory {
  private readonly created = new Map<LogServiceName, winston.Logger>();

  createServiceLogger(serviceName: LogServiceName): winston.Logger {
    const existing = this.created.get(serviceName);
    if (existing) {
      return existing;
    }

    const serviceConfig = loggingConfig.services[serviceName];
    const level = resolveLevel(serviceConfig.level);

    const serviceLogger = winston.createLogger({
      level,
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      transports: silentConsole()
        ? [new winston.transports.Console({ silent: true })]
        : [new winston.transports.Console({ format: consoleFormat, level })]
    });

    this.created.set(serviceName, serviceLogger);
    return serviceLogger;
  }

  all(): winston.Logger[] {
    return Array.from(this.created.values());
  }
}

export const loggerFactory = new LoggerFactory();

export const logger = winston.createLogger({
  level: resolveLevel(loggingConfig.defaultLevel),
  levels: loggingConfig.levels,
  transports: silentConsole()
    ? [new winston.transports.Console({ silent: true })]
    : [new winston.transports.Console({ format: consoleFormat })]
});

export function createServiceLogger(serviceName: LogServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

/**
 * Sends every logger's output to a JSON log file as well.
 */
export function enableFileLogging(filename: string): void {
  const transport = new winston.transports.File({
    filename,
    format: fileFormat,
    maxsize: loggingConfig.files.maxSize,
    maxFiles: loggingConfig.files.maxFiles,
    tailable: loggingConfig.files.tailable
  });
  for (const target of [logger, ...loggerFactory.all()]) {
    target.add(transport);
  }
}

/**
 * Changes the level of the main logger and every service logger.
 */
export function setLogLevel(level: string): void {
  for (const target of [logger, ...loggerFactory.all()]) {
    target.level = level;
    for (const transport of target.transports) {
      transport.level = level;
    }
  }
}

export const accumulatorLogger = createServiceLogger('accumulator');
export const macroLogger = createServiceLogger('macro');
export const rewriteLogger = createServiceLogger('rewrite');
export const resolverLogger = createServiceLogger('resolver');
export const compilerLogger = createServiceLogger('compiler');
export const executionLogger = createServiceLogger('execution');
export const metaLogger = createServiceLogger('meta');
export const sessionLogger = createServiceLogger('session');
export const cliLogger = createServiceLogger('cli');

export default logger;
