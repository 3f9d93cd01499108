export { getLogger, initLogger, type LogMethod, type Logger, type LoggerOptions } from './logger.js';
export { loggerEnvSchema, logLevels, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
