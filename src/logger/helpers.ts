import { type Logger, LogLevel } from './Logger';
import { NULL_LOGGER } from './NullLogger';

/** Logs at `level`. An exception thrown by the logger is dropped. */
export function logSafely(
	logger: Logger,
	level: LogLevel,
	message: string,
	context?: Record<string, unknown>,
): void {
	try {
		logger[level](message, context);
	} catch {
		/* a broken logger must not mask the encoder error */
	}
}

/**
 * Log at ERROR and throw. Always throws.
 *
 * A string becomes a plain `Error`; an `Error` instance is thrown as is, so typed encoder errors
 * keep their class.
 *
 * @param error - Message or error to log and throw.
 * @param logger - Logger to use, defaults to NULL_LOGGER.
 * @param context - Optional structured context for the log.
 */
export function fail(
	error: string | Error,
	logger: Logger = NULL_LOGGER,
	context?: Record<string, unknown>,
): never {
	const err = typeof error === 'string' ? new Error(error) : error;
	logSafely(logger, LogLevel.ERROR, err.message, context);
	throw err;
}

/**
 * Throw if a condition is true. On return, the compiler knows the condition is false.
 *
 * @param condition - Condition that must be false to continue.
 * @param error - Message or error to throw if the condition holds.
 * @param logger - Logger to use, defaults to NULL_LOGGER.
 * @param context - Optional structured context for the log.
 */
export function failIf(
	condition: boolean,
	error: string | Error | (() => Error),
	logger: Logger = NULL_LOGGER,
	context?: Record<string, unknown>,
): asserts condition is false {
	if (condition) fail(typeof error === 'function' ? error() : error, logger, context);
}
