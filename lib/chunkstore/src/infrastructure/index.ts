// Infrastructure - production implementations of ports

export { ConsoleLogger, type ConsoleLoggerOptions } from './logging/console-logger';
