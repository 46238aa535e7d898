import winston from 'winston';

export const loggingConfig = {
  // npm levels: error, warn, info, http, verbose, debug, silly
  levels: winston.config.npm.levels,

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
  },

  services: {
    parser: { level: 'warn' },
    resolver: { level: 'warn' },
    codegen: { level: 'info' },
    io: { level: 'warn' },
  },
};

export type LogService = keyof typeof loggingConfig.services;

/** Package name written into generated Go and Java sources when none is given. */
export const DEFAULT_PACKAGE_NAME = 'schema';

/** File extension of the schema files picked up when a directory is given. */
export const SCHEMA_FILE_EXTENSION = '.xsd';

/**
 * Picks the log level for a service.
 *
 * `LOG_LEVEL` wins over everything; under test the level drops to `TEST_LOG_LEVEL`
 * (default `error`); `XSD_TYPEGEN_DEBUG=true` turns on debug output.
 */
export function getLogLevel(service: LogService, env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  if (env.NODE_ENV === 'test') {
    return env.TEST_LOG_LEVEL || 'error';
  }
  if (env.XSD_TYPEGEN_DEBUG === 'true') {
    return 'debug';
  }
  return loggingConfig.services[service].level;
}
