/** What a field tag asks of a record field. */
export interface FieldDirective {
	/** The field is never written. */
	skip: boolean;
	/** Key to write instead of the declared name; empty keeps the declared name. */
	rename: string;
	/** Leave the field out when its value is empty. */
	omitEmpty: boolean;
	/** Every option after the name, recognized or not. */
	options: readonly string[];
}

/**
 * Parses a field tag such as `"id"`, `",omitempty"`, `"label,omitempty"` or `"-"`.
 *
 * Only a tag that is exactly `-` skips the field; `-,` renames it to `-`. Unknown options are kept in
 * `options` but have no effect.
 */
export function parseFieldTag(tag: string): FieldDirective {
	if (tag === '-') {
		return { skip: true, rename: '', omitEmpty: false, options: [] };
	}
	const comma = tag.indexOf(',');
	const rename = comma === -1 ? tag : tag.slice(0, comma);
	const options = comma === -1 ? [] : tag.slice(comma + 1).split(',');
	return { skip: false, rename, omitEmpty: options.includes('omitempty'), options };
}
