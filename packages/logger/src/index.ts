export { configureLogger, getLogger, resetLogger, type Logger, type LoggerOptions } from './logger.js';
export { LOG_LEVELS, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
