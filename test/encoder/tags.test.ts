import { describe, expect, test } from 'vitest';
import { parseFieldTag } from '../../src/encoder';

describe('parseFieldTag', () => {
	test.each([
		{ tag: '', skip: false, rename: '', omitEmpty: false, options: [] },
		{ tag: 'a', skip: false, rename: 'a', omitEmpty: false, options: [] },
		{ tag: 'c,omitempty', skip: false, rename: 'c', omitEmpty: true, options: ['omitempty'] },
		{ tag: ',omitempty', skip: false, rename: '', omitEmpty: true, options: ['omitempty'] },
		{ tag: '-', skip: true, rename: '', omitEmpty: false, options: [] },
		{ tag: '-,', skip: false, rename: '-', omitEmpty: false, options: [''] },
		{ tag: 'id,string', skip: false, rename: 'id', omitEmpty: false, options: ['string'] },
		{
			tag: 'id,string,omitempty',
			skip: false,
			rename: 'id',
			omitEmpty: true,
			options: ['string', 'omitempty'],
		},
	])('"$tag"', ({ tag, ...expected }) => {
		expect(parseFieldTag(tag)).toEqual(expected);
	});

	test('options are matched exactly', () => {
		expect(parseFieldTag('a, omitempty').omitEmpty).toBe(false);
		expect(parseFieldTag('a,OMITEMPTY').omitEmpty).toBe(false);
	});
});
