export * from './transactions';
export * from './lib';
export { Logger, logger, type LogLevel, type LogSink } from './utils/logger';
