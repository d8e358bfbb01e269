import { failIf, type Logger, LogLevel, logSafely, measureTime } from '../logger';
import { EncodingDepthError, UnsupportedTypeError } from '../model/Errors';
import { type CborValue } from '../model/Value';
import { type ByteSink } from '../sink/ByteSink';
import { MajorType, SimpleValue } from './constants';
import {
	type ItemEncoder,
	writeArray,
	writeAssociativeContainer,
	writeByteSequence,
	writeTextSequence,
} from './containers';
import { writeFloat } from './float';
import { writeHeader } from './header';
import { writeInteger } from './integer';
import { writeRecord } from './record';
import { type EncoderOptions, resolveEncoderOptions, type ResolvedEncoderOptions } from './types/options';

/**
 * Writes {@link CborValue}s to a sink as minimal-width CBOR.
 *
 * One encoder owns its sink; encoders on different sinks share nothing. Each `encode` call writes
 * one complete item unless it throws, in which case the bytes already written stay in the sink.
 *
 * @example
 *
 * ```ts
 * const sink = new BufferSink();
 * new Encoder(sink).encode(Value.array([Value.int(1), Value.float(1.5)]));
 * sink.bytes(); // 82 01 f9 3e 00
 * ```
 */
export class Encoder {
	private readonly sink: ByteSink;
	private readonly options: ResolvedEncoderOptions;
	private written = 0;

	constructor(sink: ByteSink, options?: EncoderOptions) {
		this.options = resolveEncoderOptions(options);
		this.sink = {
			write: (bytes) => {
				sink.write(bytes);
				this.written += bytes.length;
			},
		};
	}

	private get logger(): Logger {
		return this.options.logger;
	}

	/** Total bytes this encoder has handed to its sink. */
	get bytesWritten(): number {
		return this.written;
	}

	encode(value: CborValue): void {
		const timer = measureTime();
		const start = this.written;
		try {
			this.encodeItem(value, this.sink, 0, '$');
		} catch (error) {
			logSafely(this.logger, LogLevel.ERROR, 'failed to encode {kind} value', {
				kind: value.kind,
				error,
			});
			throw error;
		}
		logSafely(this.logger, LogLevel.DEBUG, 'encoded {kind} value', {
			kind: value.kind,
			bytes: this.written - start,
			ms: timer.elapsed(),
		});
	}

	private encodeItem(value: CborValue, sink: ByteSink, depth: number, path: string): void {
		const { maxDepth, canonicalKeys, logger } = this.options;
		failIf(depth > maxDepth, () => new EncodingDepthError(maxDepth));
		const nested: ItemEncoder = (item, itemSink, segment) =>
			this.encodeItem(item, itemSink, depth + 1, path + segment);

		let current = value;
		// a chain of refs collapses to its innermost target
		while (current.kind === 'ref') {
			if (current.target === null) {
				writeHeader(sink, MajorType.SimpleValue, SimpleValue.Null);
				return;
			}
			current = current.target;
		}

		switch (current.kind) {
			case 'nil':
				writeHeader(sink, MajorType.SimpleValue, SimpleValue.Null);
				return;
			case 'bool':
				writeHeader(sink, MajorType.SimpleValue, current.value ? SimpleValue.True : SimpleValue.False);
				return;
			case 'int':
				if (current.value >= 0n) {
					writeInteger(sink, MajorType.UnsignedInteger, current.value);
				} else {
					writeInteger(sink, MajorType.NegativeInteger, -(current.value + 1n));
				}
				return;
			case 'uint':
				writeInteger(sink, MajorType.UnsignedInteger, current.value);
				return;
			case 'bytes':
				writeByteSequence(sink, current.value);
				return;
			case 'array':
				writeArray(sink, current.items, nested);
				return;
			case 'text':
				writeTextSequence(sink, current.value);
				return;
			case 'map':
				writeAssociativeContainer(sink, current.entries, nested, { canonicalKeys, logger });
				return;
			case 'record':
				writeRecord(sink, current.fields, nested, logger);
				return;
			case 'float':
				writeFloat(sink, current.value);
				return;
			default: {
				const unknown: never = current;
				throw new UnsupportedTypeError(describe(unknown), path);
			}
		}
	}
}

function describe(value: unknown): string {
	if (typeof value === 'object' && value !== null && 'kind' in value) {
		return `value kind ${String(value.kind)}`;
	}
	return typeof value;
}
