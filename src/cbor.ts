import { Encoder } from './encoder/Encoder';
import { type EncoderOptions } from './encoder/types/options';
import { type CborValue } from './model/Value';
import { fromNative } from './native';
import { BufferSink } from './sink/BufferSink';

/** Encodes an already-built {@link CborValue} into a fresh byte array. */
export function encodeValue(value: CborValue, options?: EncoderOptions): Uint8Array {
	const sink = new BufferSink();
	new Encoder(sink, options).encode(value);
	return sink.bytes();
}

/**
 * Encodes a plain JavaScript value (see {@link fromNative} for the mapping) into a fresh byte array.
 *
 * @example
 *
 * ```ts
 * encodeCBOR({ a: 1, b: [2, 3] }); // a2 61 61 01 61 62 82 02 03
 * ```
 */
export function encodeCBOR(input: unknown, options?: EncoderOptions): Uint8Array {
	return encodeValue(fromNative(input), options);
}
