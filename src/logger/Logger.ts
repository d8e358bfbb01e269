/**
 * Log levels, ordered from most severe (fatal) to least severe (trace).
 */
export const LogLevel = {
	FATAL: 'fatal',
	ERROR: 'error',
	WARN: 'warn',
	INFO: 'info',
	DEBUG: 'debug',
	TRACE: 'trace',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export interface Logger {
	fatal(message: string, context?: Record<string, unknown>): void;
	error(message: string, context?: Record<string, unknown>): void;
	warn(message: string, context?: Record<string, unknown>): void;
	info(message: string, context?: Record<string, unknown>): void;
	debug(message: string, context?: Record<string, unknown>): void;
	trace(message: string, context?: Record<string, unknown>): void;
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
}
