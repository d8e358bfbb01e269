/** Base class of every error raised while encoding a value. */
export class EncodeError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'EncodeError';
		Object.setPrototypeOf(this, EncodeError.prototype);
	}
}

/**
 * Thrown when the byte sink rejects a write. The sink's own error is kept as `cause`. Bytes
 * written before the failure stay in the sink.
 */
export class SinkWriteError extends EncodeError {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = 'SinkWriteError';
		Object.setPrototypeOf(this, SinkWriteError.prototype);
	}
}

/** Thrown when a value has no CBOR representation. Not retryable. */
export class UnsupportedTypeError extends EncodeError {
	/** Location of the offending value, e.g. `$.items[2].owner`. */
	path: string;

	constructor(description: string, path = '$') {
		super(`Unsupported type: ${description} at ${path}`);
		this.path = path;
		this.name = 'UnsupportedTypeError';
		Object.setPrototypeOf(this, UnsupportedTypeError.prototype);
	}
}

/** Thrown for integers outside the range the integer major types can carry. */
export class EncodingRangeError extends EncodeError {
	constructor(message: string) {
		super(message);
		this.name = 'EncodingRangeError';
		Object.setPrototypeOf(this, EncodingRangeError.prototype);
	}
}

/** Thrown when a value nests deeper than the encoder's `maxDepth`. */
export class EncodingDepthError extends EncodeError {
	depth: number;

	constructor(depth: number) {
		super(`Maximum nesting depth of ${depth} exceeded`);
		this.depth = depth;
		this.name = 'EncodingDepthError';
		Object.setPrototypeOf(this, EncodingDepthError.prototype);
	}
}
