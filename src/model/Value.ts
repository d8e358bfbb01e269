import { failIf } from '../logger';
import { EncodingRangeError } from './Errors';

/** Brand carried by every value built through {@link Value}. */
export const VALUE: unique symbol = Symbol.for('cbor-minimal.value');

export const UINT64_MAX = 0xffff_ffff_ffff_ffffn;
/** Smallest integer major type 1 can carry: -1 - (2^64 - 1). */
export const NEGATIVE_INT_MIN = -0x1_0000_0000_0000_0000n;

type Tagged<K extends string> = {
	readonly [VALUE]: true;
	readonly kind: K;
};

export type NilValue = Tagged<'nil'>;
export type BoolValue = Tagged<'bool'> & { readonly value: boolean };
/** Signed integer. Non-negative values are written as major type 0, negative ones as type 1. */
export type IntValue = Tagged<'int'> & { readonly value: bigint };
export type UintValue = Tagged<'uint'> & { readonly value: bigint };
export type FloatValue = Tagged<'float'> & { readonly value: number };
export type BytesValue = Tagged<'bytes'> & { readonly value: Uint8Array };
export type TextValue = Tagged<'text'> & { readonly value: string };
export type ArrayValue = Tagged<'array'> & { readonly items: readonly CborValue[] };
export type MapEntry = readonly [key: CborValue, value: CborValue];
export type MapValue = Tagged<'map'> & { readonly entries: readonly MapEntry[] };

/**
 * A named field of a record. `tag` holds the field directives, e.g. `"id,omitempty"` or `"-"`.
 */
export type RecordField = {
	readonly name: string;
	readonly value: CborValue;
	readonly tag?: string;
};
export type RecordValue = Tagged<'record'> & { readonly fields: readonly RecordField[] };

/** Optional/pointer. A `null` target encodes as CBOR null; otherwise the target is encoded. */
export type RefValue = Tagged<'ref'> & { readonly target: CborValue | null };

export type CborValue =
	| NilValue
	| BoolValue
	| IntValue
	| UintValue
	| FloatValue
	| BytesValue
	| TextValue
	| ArrayValue
	| MapValue
	| RecordValue
	| RefValue;

export type CborKind = CborValue['kind'];

function toInteger(value: number | bigint, kind: string): bigint {
	if (typeof value === 'bigint') return value;
	failIf(
		!Number.isInteger(value),
		() => new EncodingRangeError(`${kind} value must be an integer, got ${value}`),
	);
	return BigInt(value);
}

const NIL: NilValue = Object.freeze<NilValue>({ [VALUE]: true, kind: 'nil' });

/**
 * Constructors for {@link CborValue}. Integer constructors reject values outside the range the
 * integer major types can carry.
 *
 * @example
 *
 * ```ts
 * const point = Value.record([
 * 	{ name: 'X', value: Value.int(3), tag: 'x' },
 * 	{ name: 'Label', value: Value.text(''), tag: 'label,omitempty' },
 * ]);
 * ```
 */
export const Value = {
	nil(): NilValue {
		return NIL;
	},
	bool(value: boolean): BoolValue {
		return { [VALUE]: true, kind: 'bool', value };
	},
	int(value: number | bigint): IntValue {
		const n = toInteger(value, 'int');
		failIf(
			n < NEGATIVE_INT_MIN || n > UINT64_MAX,
			() => new EncodingRangeError(`int value ${n} is outside [-2^64, 2^64 - 1]`),
		);
		return { [VALUE]: true, kind: 'int', value: n };
	},
	uint(value: number | bigint): UintValue {
		const n = toInteger(value, 'uint');
		failIf(
			n < 0n || n > UINT64_MAX,
			() => new EncodingRangeError(`uint value ${n} is outside [0, 2^64 - 1]`),
		);
		return { [VALUE]: true, kind: 'uint', value: n };
	},
	float(value: number): FloatValue {
		return { [VALUE]: true, kind: 'float', value };
	},
	bytes(value: Uint8Array | ArrayBufferLike | readonly number[]): BytesValue {
		let bytes: Uint8Array;
		if (value instanceof Uint8Array) bytes = value;
		else if ('byteLength' in value) bytes = new Uint8Array(value);
		else bytes = Uint8Array.from(value);
		return { [VALUE]: true, kind: 'bytes', value: bytes };
	},
	text(value: string): TextValue {
		return { [VALUE]: true, kind: 'text', value };
	},
	array(items: Iterable<CborValue>): ArrayValue {
		return { [VALUE]: true, kind: 'array', items: Array.from(items) };
	},
	map(entries: Iterable<MapEntry>): MapValue {
		return { [VALUE]: true, kind: 'map', entries: Array.from(entries) };
	},
	record(fields: Iterable<RecordField>): RecordValue {
		return { [VALUE]: true, kind: 'record', fields: Array.from(fields) };
	},
	ref(target: CborValue | null): RefValue {
		return { [VALUE]: true, kind: 'ref', target };
	},
	/** True for values built through this namespace. */
	isValue(input: unknown): input is CborValue {
		return typeof input === 'object' && input !== null && VALUE in input;
	},
};
