import { bytesToHex } from '@noble/hashes/utils';
import { describe, expect, test } from 'vitest';
import { CBOR_TAGS, encodeCBOR, encodeValue, Value } from '../src';

const tests: Array<{ hex: string; input: unknown }> = [
	{ hex: '00', input: 0 },
	{ hex: '01', input: 1 },
	{ hex: '0a', input: 10 },
	{ hex: '17', input: 23 },
	{ hex: '1818', input: 24 },
	{ hex: '1819', input: 25 },
	{ hex: '1864', input: 100 },
	{ hex: '1903e8', input: 1000 },
	{ hex: '1a000f4240', input: 1000000 },
	{ hex: '1b000000e8d4a51000', input: 1000000000000 },
	{ hex: '1bffffffffffffffff', input: 18446744073709551615n },
	{ hex: '20', input: -1 },
	{ hex: '29', input: -10 },
	{ hex: '3863', input: -100 },
	{ hex: '3903e7', input: -1000 },
	{ hex: '3bffffffffffffffff', input: -18446744073709551616n },
	{ hex: 'f98000', input: -0 },
	{ hex: 'f93e00', input: 1.5 },
	{ hex: 'f93800', input: 0.5 },
	{ hex: 'fb3ff199999999999a', input: 1.1 },
	{ hex: 'fb7e37e43c8800759c', input: 1.0e300 },
	{ hex: 'fbc010666666666666', input: -4.1 },
	{ hex: 'f97c00', input: Infinity },
	{ hex: 'f97e00', input: NaN },
	{ hex: 'f9fc00', input: -Infinity },
	{ hex: 'f4', input: false },
	{ hex: 'f5', input: true },
	{ hex: 'f6', input: null },
	{ hex: 'f6', input: undefined },
	{ hex: '40', input: new Uint8Array([]) },
	{ hex: '4401020304', input: new Uint8Array([1, 2, 3, 4]) },
	{ hex: '60', input: '' },
	{ hex: '6161', input: 'a' },
	{ hex: '6449455446', input: 'IETF' },
	{ hex: '62225c', input: '"\\' },
	{ hex: '62c3bc', input: 'ü' },
	{ hex: '63e6b0b4', input: '水' },
	{ hex: '64f0908591', input: '\u{10151}' },
	{ hex: '80', input: [] },
	{ hex: '83010203', input: [1, 2, 3] },
	{ hex: '8301820203820405', input: [1, [2, 3], [4, 5]] },
	{
		hex: '98190102030405060708090a0b0c0d0e0f101112131415161718181819',
		input: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20, 21, 22, 23, 24, 25],
	},
	{ hex: 'a0', input: {} },
	{ hex: 'a201020304', input: new Map([[1, 2], [3, 4]]) },
	{ hex: 'a26161016162820203', input: { a: 1, b: [2, 3] } },
	{ hex: '826161a161626163', input: ['a', { b: 'c' }] },
	{ hex: 'a56161614161626142616361436164614461656145', input: { a: 'A', b: 'B', c: 'C', d: 'D', e: 'E' } },
];

describe('encodeCBOR', () => {
	test.each(tests)('returns $hex', ({ hex, input }) => {
		expect(bytesToHex(encodeCBOR(input))).toBe(hex);
	});

	test('encodes maps with 0..23 keys using the short form initial byte', () => {
		for (let n = 0; n <= 23; n++) {
			const obj: Record<string, number> = {};
			for (let i = 0; i < n; i++) obj[`k${i}`] = i;
			expect(encodeCBOR(obj)[0]).toBe(0xa0 | n);
		}
		const big: Record<string, number> = {};
		for (let i = 0; i < 24; i++) big[`k${i}`] = i;
		expect(bytesToHex(encodeCBOR(big).subarray(0, 2))).toBe('b818');
	});

	test('tagged class instances honour rename, omitempty and skip', () => {
		class Sample {
			static [CBOR_TAGS] = { AField: 'a', BField: 'b', Omit1: 'c,omitempty', Omit2: ',omitempty', Ignore: '-' };
			AField = 1;
			BField = [2, 3];
			Omit1 = 0;
			Omit2 = 0;
			Ignore = 12345;
		}
		expect(bytesToHex(encodeCBOR(new Sample()))).toBe('a26161016162820203');
	});

	test('canonicalKeys gives reproducible map bytes', () => {
		const first = encodeCBOR(new Map<string, number>([['b', 1], ['a', 2]]), { canonicalKeys: true });
		const second = encodeCBOR(new Map<string, number>([['a', 2], ['b', 1]]), { canonicalKeys: true });
		expect(bytesToHex(first)).toBe('a2616102616201');
		expect(second).toEqual(first);
	});
});

describe('encodeValue', () => {
	test('explicit floats stay floats even when integral', () => {
		expect(bytesToHex(encodeValue(Value.float(1)))).toBe('f93c00');
		expect(bytesToHex(encodeValue(Value.float(100000)))).toBe('fa47c35000');
		expect(bytesToHex(encodeCBOR(100000))).toBe('1a000186a0');
	});
});
