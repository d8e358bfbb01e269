import { SinkWriteError } from '../model/Errors';
import { type ByteSink } from './ByteSink';

/**
 * Forwards every chunk to a callback, e.g. `(chunk) => fs.writeSync(fd, chunk)`.
 *
 * Byte-string payloads are passed through without copying, so a chunk may alias the encoded
 * value's own bytes.
 */
export class CallbackSink implements ByteSink {
	private readonly onChunk: (chunk: Uint8Array) => void;

	constructor(onChunk: (chunk: Uint8Array) => void) {
		this.onChunk = onChunk;
	}

	write(bytes: Uint8Array): void {
		try {
			this.onChunk(bytes);
		} catch (error) {
			throw new SinkWriteError('Sink callback failed', error);
		}
	}
}
