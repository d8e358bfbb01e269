export { Encoder } from './Encoder';
export { MajorType, Minor, SimpleValue } from './constants';
export { writeHeader, writeHeaderWithPayload, type PayloadWidth } from './header';
export { writeInteger } from './integer';
export { minimizeFloat, writeFloat, type FloatWidth, type MinimizedFloat } from './float';
export {
	writeArray,
	writeAssociativeContainer,
	writeByteSequence,
	writeTextSequence,
	type ItemEncoder,
	type MapWriteOptions,
} from './containers';
export { isEmptyValue, resolveRecordFields, writeRecord, type ResolvedField } from './record';
export { parseFieldTag, type FieldDirective } from './tags';
export {
	DEFAULT_MAX_DEPTH,
	resolveEncoderOptions,
	type EncoderOptions,
	type ResolvedEncoderOptions,
} from './types/options';
