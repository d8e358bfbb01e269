import { utf8ToBytes } from '@noble/hashes/utils';
import { type Logger, NULL_LOGGER } from '../logger';
import { type CborValue, type MapEntry } from '../model/Value';
import { BufferSink } from '../sink/BufferSink';
import { type ByteSink, writeBytes } from '../sink/ByteSink';
import { Bytes } from '../utils/Bytes';
import { MajorType } from './constants';
import { writeInteger } from './integer';

/**
 * Encodes a nested item into `sink`. `pathSegment` is appended to the parent's path for error
 * reports, e.g. `[3]` or `.name`.
 */
export type ItemEncoder = (value: CborValue, sink: ByteSink, pathSegment: string) => void;

export function writeByteSequence(sink: ByteSink, bytes: Uint8Array): void {
	writeInteger(sink, MajorType.ByteString, bytes.length);
	if (bytes.length > 0) writeBytes(sink, bytes);
}

/** Length prefix counts UTF-8 bytes, not UTF-16 code units. */
export function writeTextSequence(sink: ByteSink, text: string): void {
	const utf8 = utf8ToBytes(text);
	writeInteger(sink, MajorType.TextString, utf8.length);
	if (utf8.length > 0) writeBytes(sink, utf8);
}

export function writeArray(
	sink: ByteSink,
	items: readonly CborValue[],
	encodeItem: ItemEncoder,
): void {
	writeInteger(sink, MajorType.Array, items.length);
	items.forEach((item, i) => encodeItem(item, sink, `[${i}]`));
}

export interface MapWriteOptions {
	/** Sort pairs by the bytewise order of their encoded keys (RFC 8949 §4.2.1). */
	canonicalKeys?: boolean;
	logger?: Logger;
}

/**
 * Writes a definite-length map. Pairs keep the order of `entries` unless `canonicalKeys` is set.
 */
export function writeAssociativeContainer(
	sink: ByteSink,
	entries: readonly MapEntry[],
	encodeItem: ItemEncoder,
	options: MapWriteOptions = {},
): void {
	const { canonicalKeys = false, logger = NULL_LOGGER } = options;
	if (!canonicalKeys) {
		writeInteger(sink, MajorType.Map, entries.length);
		entries.forEach(([key, value], i) => {
			encodeItem(key, sink, `[key ${i}]`);
			encodeItem(value, sink, `[value ${i}]`);
		});
		return;
	}

	const keyed = entries.map(([key, value], i) => {
		const keySink = new BufferSink(16);
		encodeItem(key, keySink, `[key ${i}]`);
		return { key: keySink.bytes(), value, index: i };
	});
	keyed.sort((a, b) => Bytes.compare(a.key, b.key));
	for (let i = 1; i < keyed.length; i++) {
		if (Bytes.equals(keyed[i - 1].key, keyed[i].key)) {
			logger.warn('duplicate map key {key}', { key: Bytes.toHex(keyed[i].key) });
		}
	}

	writeInteger(sink, MajorType.Map, keyed.length);
	for (const { key, value, index } of keyed) {
		writeBytes(sink, key);
		encodeItem(value, sink, `[value ${index}]`);
	}
}
