export { type Logger, type LogLevel, ConsoleLogger, SilentLogger, createLogger } from './logger.js';
