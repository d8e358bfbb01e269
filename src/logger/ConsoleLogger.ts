import { type Logger, LogLevel } from './Logger';

const SEVERITY: Record<LogLevel, number> = {
	[LogLevel.FATAL]: 0,
	[LogLevel.ERROR]: 1,
	[LogLevel.WARN]: 2,
	[LogLevel.INFO]: 3,
	[LogLevel.DEBUG]: 4,
	[LogLevel.TRACE]: 5,
};

/**
 * Writes encoder diagnostics to the console.
 *
 * `{key}` placeholders in a message are filled from `context`; context keys that were not
 * substituted are passed along as a trailing object. Every line starts with the upper-cased level
 * in brackets.
 *
 * @example
 *
 * ```ts
 * const logger = new ConsoleLogger(LogLevel.DEBUG);
 * logger.debug('encoded {bytes} bytes', { bytes: 9, ms: 0 });
 * // [DEBUG] encoded 9 bytes { ms: 0 }
 * ```
 */
export class ConsoleLogger implements Logger {
	private minLevel: LogLevel;

	constructor(minLevel: LogLevel = LogLevel.INFO) {
		this.minLevel = minLevel;
	}

	private enabled(level: LogLevel): boolean {
		return SEVERITY[level] <= SEVERITY[this.minLevel];
	}

	// Not static: tests spy on the console methods
	private method(level: LogLevel): (message: string, ...rest: unknown[]) => void {
		switch (level) {
			case LogLevel.FATAL:
			case LogLevel.ERROR:
				return console.error;
			case LogLevel.WARN:
				return console.warn;
			case LogLevel.INFO:
				return console.info;
			case LogLevel.DEBUG:
				return console.debug;
			case LogLevel.TRACE:
				return console.trace;
			default:
				return console.log;
		}
	}

	private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (!this.enabled(level)) return;
		const fn = this.method(level);
		const prefix = `[${level.toUpperCase()}] `;
		if (!context) {
			fn(prefix + message);
			return;
		}
		const rest: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(context)) {
			rest[k] = v instanceof Error ? { name: v.name, message: v.message, stack: v.stack } : v;
		}
		const line = message.replace(/\{(\w+)\}/g, (match: string, key: string) => {
			if (!(key in rest) || rest[key] === undefined) return match;
			const value = String(rest[key]);
			delete rest[key];
			return value;
		});
		if (Object.keys(rest).length > 0) fn(prefix + line, rest);
		else fn(prefix + line);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, context);
	}
	error(message: string, context?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, context);
	}
	warn(message: string, context?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, context);
	}
	info(message: string, context?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, context);
	}
	debug(message: string, context?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, context);
	}
	trace(message: string, context?: Record<string, unknown>): void {
		this.emit(LogLevel.TRACE, message, context);
	}
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		this.emit(level, message, context);
	}
}

/**
 * Starts a millisecond timer.
 *
 * @returns An object whose `elapsed` method reports the time since the timer started.
 */
export function measureTime() {
	const start = Date.now();
	return {
		elapsed: () => Date.now() - start,
	};
}
