import { type Logger, NULL_LOGGER } from '../logger';
import { type CborValue, type RecordField } from '../model/Value';
import { type ByteSink } from '../sink/ByteSink';
import { MajorType } from './constants';
import { type ItemEncoder, writeTextSequence } from './containers';
import { writeInteger } from './integer';
import { parseFieldTag } from './tags';

/**
 * Zero value test behind `omitempty`. Records and references to a present value are never empty.
 */
export function isEmptyValue(value: CborValue): boolean {
	switch (value.kind) {
		case 'nil':
			return true;
		case 'bool':
			return !value.value;
		case 'int':
		case 'uint':
			return value.value === 0n;
		case 'float':
			return value.value === 0;
		case 'bytes':
		case 'text':
			return value.value.length === 0;
		case 'array':
			return value.items.length === 0;
		case 'map':
			return value.entries.length === 0;
		case 'ref':
			return value.target === null;
		case 'record':
			return false;
	}
}

export interface ResolvedField {
	key: string;
	value: CborValue;
}

/** Applies each field's tag and returns the fields that will be written, in declaration order. */
export function resolveRecordFields(
	fields: readonly RecordField[],
	logger: Logger = NULL_LOGGER,
): ResolvedField[] {
	const resolved: ResolvedField[] = [];
	for (const field of fields) {
		const directive = parseFieldTag(field.tag ?? '');
		if (directive.skip) {
			logger.trace('skipping field {field}', { field: field.name });
			continue;
		}
		if (directive.omitEmpty && isEmptyValue(field.value)) {
			logger.trace('omitting empty field {field}', { field: field.name });
			continue;
		}
		resolved.push({ key: directive.rename || field.name, value: field.value });
	}
	return resolved;
}

/** Writes a record as a map of text keys, counting only the fields that survive their tags. */
export function writeRecord(
	sink: ByteSink,
	fields: readonly RecordField[],
	encodeItem: ItemEncoder,
	logger: Logger = NULL_LOGGER,
): void {
	const resolved = resolveRecordFields(fields, logger);
	writeInteger(sink, MajorType.Map, resolved.length);
	for (const { key, value } of resolved) {
		writeTextSequence(sink, key);
		encodeItem(value, sink, `.${key}`);
	}
}
