import { fail, type Logger, NULL_LOGGER } from '../../logger';

export const DEFAULT_MAX_DEPTH = 512;

/**
 * Encoder configuration.
 *
 * @example
 *
 *     const encoder = new Encoder(sink, { canonicalKeys: true, logger: new ConsoleLogger(LogLevel.DEBUG) });
 */
export type EncoderOptions = {
	/**
	 * Receives debug lines per top-level value, duplicate-key warnings and errors.
	 *
	 * @default NULL_LOGGER
	 */
	logger?: Logger;
	/**
	 * Sort map pairs by their encoded key bytes for reproducible output. Records keep declaration
	 * order regardless.
	 *
	 * @default false
	 */
	canonicalKeys?: boolean;
	/**
	 * Deepest nesting accepted before {@link EncodingDepthError} is thrown. The top-level value is
	 * depth 0.
	 *
	 * @default 512
	 */
	maxDepth?: number;
};

export type ResolvedEncoderOptions = Required<EncoderOptions>;

export function resolveEncoderOptions(options: EncoderOptions = {}): ResolvedEncoderOptions {
	const logger = options.logger ?? NULL_LOGGER;
	const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
	if (!Number.isInteger(maxDepth) || maxDepth < 0) {
		fail(new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`), logger);
	}
	return {
		logger,
		canonicalKeys: options.canonicalKeys ?? false,
		maxDepth,
	};
}
