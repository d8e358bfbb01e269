import { UnsupportedTypeError } from './model/Errors';
import { type CborValue, type RecordField, Value } from './model/Value';

/**
 * Field tags for objects converted by {@link fromNative}. Set it on an object or as a static on its
 * class; keys are property names, values are tags such as `"id,omitempty"` or `"-"`.
 *
 * @example
 *
 * ```ts
 * class Invoice {
 * 	static [CBOR_TAGS] = { amount: 'a', memo: 'm,omitempty', draft: '-' };
 * 	constructor(public amount: number, public memo = '', public draft = false) {}
 * }
 * ```
 */
export const CBOR_TAGS: unique symbol = Symbol.for('cbor-minimal.tags');

export type FieldTags = Readonly<Record<string, string>>;

function isFieldTags(input: unknown): input is FieldTags {
	return (
		typeof input === 'object' &&
		input !== null &&
		Object.values(input).every((tag) => typeof tag === 'string')
	);
}

function tagsOf(input: object): FieldTags | undefined {
	const own: unknown = Reflect.get(input, CBOR_TAGS);
	if (isFieldTags(own)) return own;
	const ctor: unknown = Reflect.get(input, 'constructor');
	if (typeof ctor === 'function') {
		const inherited: unknown = Reflect.get(ctor, CBOR_TAGS);
		if (isFieldTags(inherited)) return inherited;
	}
	return undefined;
}

function isPlainObject(input: object): boolean {
	const proto: unknown = Object.getPrototypeOf(input);
	return proto === Object.prototype || proto === null;
}

function fromNumber(n: number): CborValue {
	if (Number.isSafeInteger(n) && !Object.is(n, -0)) return Value.int(n);
	return Value.float(n);
}

/**
 * Converts a plain JavaScript value into a {@link CborValue}.
 *
 * - `null` and `undefined` become nil.
 * - Safe integers become integers; `-0`, fractions, unsafe integers, `NaN` and infinities become
 *   floats.
 * - `bigint` becomes an integer (range checked).
 * - `Uint8Array`, `Uint8ClampedArray`, `ArrayBuffer` and `DataView` become byte strings; other typed
 *   arrays and arrays become arrays.
 * - `Map` becomes a map with converted keys and values.
 * - Plain objects and objects carrying {@link CBOR_TAGS} become records, fields in `Object.keys`
 *   order.
 * - Values already built with `Value.*` pass through.
 *
 * @throws {UnsupportedTypeError} For functions, symbols, circular references and objects that are
 *   neither plain nor tagged (`Date`, `Set`, class instances, ...).
 */
export function fromNative(input: unknown): CborValue {
	return convert(input, '$', new WeakSet());
}

function convert(input: unknown, path: string, ancestors: WeakSet<object>): CborValue {
	switch (typeof input) {
		case 'undefined':
			return Value.nil();
		case 'boolean':
			return Value.bool(input);
		case 'number':
			return fromNumber(input);
		case 'bigint':
			return Value.int(input);
		case 'string':
			return Value.text(input);
		case 'symbol':
		case 'function':
			throw new UnsupportedTypeError(typeof input, path);
	}
	if (input === null || typeof input !== 'object') return Value.nil();
	if (Value.isValue(input)) return input;

	if (input instanceof Uint8Array || input instanceof Uint8ClampedArray) {
		return Value.bytes(new Uint8Array(input.buffer, input.byteOffset, input.byteLength));
	}
	if (input instanceof ArrayBuffer) return Value.bytes(new Uint8Array(input));
	if (input instanceof DataView) {
		return Value.bytes(new Uint8Array(input.buffer, input.byteOffset, input.byteLength));
	}
	if (input instanceof Float32Array || input instanceof Float64Array) {
		return Value.array(Array.from(input, (n) => Value.float(n)));
	}
	if (
		input instanceof Int8Array ||
		input instanceof Int16Array ||
		input instanceof Int32Array ||
		input instanceof Uint16Array ||
		input instanceof Uint32Array
	) {
		return Value.array(Array.from(input, (n) => Value.int(n)));
	}
	if (input instanceof BigInt64Array) return Value.array(Array.from(input, (n) => Value.int(n)));
	if (input instanceof BigUint64Array) return Value.array(Array.from(input, (n) => Value.uint(n)));

	if (ancestors.has(input)) throw new UnsupportedTypeError('circular reference', path);
	ancestors.add(input);
	try {
		if (Array.isArray(input)) {
			return Value.array(input.map((item: unknown, i) => convert(item, `${path}[${i}]`, ancestors)));
		}
		if (input instanceof Map) {
			const entries: Array<readonly [CborValue, CborValue]> = [];
			let i = 0;
			for (const [key, value] of input) {
				entries.push([
					convert(key, `${path}[key ${i}]`, ancestors),
					convert(value, `${path}[value ${i}]`, ancestors),
				]);
				i++;
			}
			return Value.map(entries);
		}
		const tags = tagsOf(input);
		if (tags === undefined && !isPlainObject(input)) {
			const name: unknown = Reflect.get(input, 'constructor');
			const label = typeof name === 'function' && name.name ? name.name : 'object';
			throw new UnsupportedTypeError(label, path);
		}
		const fields: RecordField[] = Object.keys(input).map((name) => ({
			name,
			value: convert(Reflect.get(input, name), `${path}.${name}`, ancestors),
			tag: tags?.[name],
		}));
		return Value.record(fields);
	} finally {
		ancestors.delete(input);
	}
}
