/** CBOR major types written by this encoder. Major type 6 (tags) is never emitted. */
export const MajorType = {
	UnsignedInteger: 0,
	NegativeInteger: 1,
	ByteString: 2,
	TextString: 3,
	Array: 4,
	Map: 5,
	SimpleValue: 7,
} as const;

export type MajorType = (typeof MajorType)[keyof typeof MajorType];

/** Additional-info values announcing a trailing big-endian integer of 1, 2, 4 or 8 bytes. */
export const Minor = {
	MaxInline: 23,
	Uint8: 24,
	Uint16: 25,
	Uint32: 26,
	Uint64: 27,
	Float16: 25,
	Float32: 26,
	Float64: 27,
} as const;

/** Simple values carried in the minor field of major type 7. */
export const SimpleValue = {
	False: 20,
	True: 21,
	Null: 22,
} as const;
