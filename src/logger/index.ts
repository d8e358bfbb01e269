export { type Logger, LogLevel } from './Logger';
export { NULL_LOGGER } from './NullLogger';
export { ConsoleLogger, measureTime } from './ConsoleLogger';
export { fail, failIf, logSafely } from './helpers';
