export { buildApp } from './app.js';
export type { AppOptions } from './app.js';
export { loadConfig, ConfigError, LOG_LEVELS } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export { toErrorReply, registerErrorHandlers } from './errors.js';
export type { ErrorBody, ErrorReply } from './errors.js';
export { wrapPinoLogger } from './logger.js';
