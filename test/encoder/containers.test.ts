import { bytesToHex } from '@noble/hashes/utils';
import { describe, expect, test, vi } from 'vitest';
import {
	Encoder,
	type ItemEncoder,
	writeArray,
	writeAssociativeContainer,
	writeByteSequence,
	writeTextSequence,
} from '../../src/encoder';
import type { Logger } from '../../src/logger';
import { type MapEntry, Value } from '../../src/model/Value';
import { BufferSink } from '../../src/sink';

const encodeItem: ItemEncoder = (value, sink) => new Encoder(sink).encode(value);

function stubLogger(): Logger {
	return {
		fatal: vi.fn(),
		error: vi.fn(),
		warn: vi.fn(),
		info: vi.fn(),
		debug: vi.fn(),
		trace: vi.fn(),
		log: vi.fn(),
	};
}

describe('writeByteSequence', () => {
	test.each([
		{ bytes: [], hex: '40' },
		{ bytes: [1, 2, 3, 4], hex: '4401020304' },
		{ bytes: [0x68, 0x65, 0x6c, 0x6c, 0x6f], hex: '4568656c6c6f' },
	])('$bytes -> $hex', ({ bytes, hex }) => {
		const sink = new BufferSink();
		writeByteSequence(sink, new Uint8Array(bytes));
		expect(bytesToHex(sink.bytes())).toBe(hex);
	});

	test('long byte strings take an extended length', () => {
		const sink = new BufferSink();
		writeByteSequence(sink, new Uint8Array(300).fill(0xaa));
		const out = sink.bytes();
		expect(out.length).toBe(303);
		expect(bytesToHex(out.subarray(0, 4))).toBe('59012caa');
	});
});

describe('writeTextSequence', () => {
	test.each([
		{ text: '', hex: '60' },
		{ text: 'a', hex: '6161' },
		{ text: 'IETF', hex: '6449455446' },
		{ text: '"\\', hex: '62225c' },
		{ text: 'ü', hex: '62c3bc' },
		{ text: '水', hex: '63e6b0b4' },
		{ text: '\u{10151}', hex: '64f0908591' },
	])('$text -> $hex', ({ text, hex }) => {
		const sink = new BufferSink();
		writeTextSequence(sink, text);
		expect(bytesToHex(sink.bytes())).toBe(hex);
	});

	test('length counts UTF-8 bytes rather than UTF-16 code units', () => {
		const text = '水'.repeat(8);
		const sink = new BufferSink();
		writeTextSequence(sink, text);
		expect(text.length).toBe(8);
		expect(bytesToHex(sink.bytes().subarray(0, 2))).toBe('7818');
	});
});

describe('writeArray', () => {
	test('writes the count, then every item in order', () => {
		const sink = new BufferSink();
		writeArray(sink, [Value.int(1), Value.array([Value.int(2), Value.int(3)])], encodeItem);
		expect(bytesToHex(sink.bytes())).toBe('8201820203');
	});

	test('hands each item its index as the path segment', () => {
		const spy = vi.fn<ItemEncoder>();
		writeArray(new BufferSink(), [Value.nil(), Value.bool(true)], spy);
		expect(spy.mock.calls.map((call) => call[2])).toEqual(['[0]', '[1]']);
	});

	test('an empty array is a single byte', () => {
		const sink = new BufferSink();
		writeArray(sink, [], encodeItem);
		expect(bytesToHex(sink.bytes())).toBe('80');
	});
});

describe('writeAssociativeContainer', () => {
	const entries: MapEntry[] = [
		[Value.int(10), Value.nil()],
		[Value.text('a'), Value.nil()],
		[Value.int(-1), Value.nil()],
		[Value.int(100), Value.nil()],
	];

	test('keeps the given order by default', () => {
		const sink = new BufferSink();
		writeAssociativeContainer(sink, entries, encodeItem);
		expect(bytesToHex(sink.bytes())).toBe('a40af66161f620f61864f6');
	});

	test('sorts by encoded key bytes when canonicalKeys is set', () => {
		const sink = new BufferSink();
		writeAssociativeContainer(sink, entries, encodeItem, { canonicalKeys: true });
		expect(bytesToHex(sink.bytes())).toBe('a40af61864f620f66161f6');
	});

	test('canonical order is independent of insertion order', () => {
		const forward = new BufferSink();
		const backward = new BufferSink();
		writeAssociativeContainer(forward, entries, encodeItem, { canonicalKeys: true });
		writeAssociativeContainer(backward, [...entries].reverse(), encodeItem, { canonicalKeys: true });
		expect(forward.bytes()).toEqual(backward.bytes());
	});

	test('warns about duplicate keys in canonical mode', () => {
		const logger = stubLogger();
		const sink = new BufferSink();
		writeAssociativeContainer(
			sink,
			[
				[Value.text('x'), Value.int(1)],
				[Value.text('x'), Value.int(2)],
			],
			encodeItem,
			{ canonicalKeys: true, logger },
		);
		expect(logger.warn).toHaveBeenCalledWith('duplicate map key {key}', { key: '6178' });
		expect(bytesToHex(sink.bytes())).toBe('a2617801617802');
	});

	test('an empty map is a single byte', () => {
		const sink = new BufferSink();
		writeAssociativeContainer(sink, [], encodeItem);
		expect(bytesToHex(sink.bytes())).toBe('a0');
	});
});
