export * from './core';
export * from './config';
export * from './constants';
export * from './errors';
export * from './result';
export { Logger, LogLevel, createLogger, parseLogLevel } from './logger';
