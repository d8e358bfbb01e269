// ==========================
// Public API Surface
// ==========================
export { encodeCBOR, encodeValue } from './cbor';
export { fromNative, CBOR_TAGS, type FieldTags } from './native';
export {
	Value,
	type CborValue,
	type CborKind,
	type NilValue,
	type BoolValue,
	type IntValue,
	type UintValue,
	type FloatValue,
	type BytesValue,
	type TextValue,
	type ArrayValue,
	type MapValue,
	type MapEntry,
	type RecordValue,
	type RecordField,
	type RefValue,
} from './model/Value';

// Encoder components
export * from './encoder';

// Sinks
export { type ByteSink, BufferSink, CallbackSink } from './sink';

// Logging & errors
export { LogLevel, type Logger, ConsoleLogger, NULL_LOGGER } from './logger';
export {
	EncodeError,
	SinkWriteError,
	UnsupportedTypeError,
	EncodingRangeError,
	EncodingDepthError,
} from './model/Errors';

// Low-level helpers
export { Bytes } from './utils/Bytes';
