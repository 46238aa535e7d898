import winston from 'winston';
import { getLogLevel, loggingConfig } from './config.js';
import type { LogService } from './config.js';

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  }),
);

const loggers = new Map<LogService, winston.Logger>();

/**
 * Returns the shared logger of a service, creating it on first use.
 * Output goes to stderr so generated source written to stdout stays clean.
 */
export function getLogger(service: LogService): winston.Logger {
  let logger = loggers.get(service);
  if (!logger) {
    logger = winston.createLogger({
      levels: loggingConfig.levels,
      level: getLogLevel(service),
      defaultMeta: { service },
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: Object.keys(loggingConfig.levels),
        }),
      ],
    });
    loggers.set(service, logger);
  }
  return logger;
}
