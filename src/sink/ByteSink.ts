import { SinkWriteError } from '../model/Errors';

/**
 * Destination for encoded bytes. `write` either accepts the whole chunk or throws; the encoder never
 * reads back or seeks.
 */
export interface ByteSink {
	write(bytes: Uint8Array): void;
}

/**
 * Hands `bytes` to the sink, turning any failure into a {@link SinkWriteError}.
 */
export function writeBytes(sink: ByteSink, bytes: Uint8Array): void {
	try {
		sink.write(bytes);
	} catch (error) {
		if (error instanceof SinkWriteError) throw error;
		throw new SinkWriteError(`Sink rejected a write of ${bytes.length} bytes`, error);
	}
}
