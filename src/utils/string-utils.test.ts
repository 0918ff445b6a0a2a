import { describe, test, expect } from 'vitest';
import { capitalize, collapseWhitespace, escapeRegExp } from './string-utils';

describe('capitalize', () => {
	test('uppercases the first letter and leaves the rest', () => {
		expect(capitalize('hello')).toBe('Hello');
		expect(capitalize('mcDonald')).toBe('McDonald');
	});

	test('skips leading punctuation', () => {
		expect(capitalize("'tis")).toBe("'Tis");
		expect(capitalize('...and')).toBe('...And');
	});

	test('only touches the first letter run', () => {
		expect(capitalize("don't")).toBe("Don't");
		expect(capitalize('s.o.s.')).toBe('S.o.s.');
	});

	test('never capitalizes a letter glued to a digit', () => {
		expect(capitalize('3d')).toBe('3d');
		expect(capitalize('12.5kg')).toBe('12.5kg');
	});

	test('handles accented letters', () => {
		expect(capitalize('émile')).toBe('Émile');
	});

	test('leaves values without letters unchanged', () => {
		expect(capitalize('')).toBe('');
		expect(capitalize('2024')).toBe('2024');
	});
});

describe('escapeRegExp', () => {
	test('escapes regular expression syntax', () => {
		expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c');
		expect(escapeRegExp('w/o')).toBe('w/o');
	});
});

describe('collapseWhitespace', () => {
	test('trims and collapses runs of whitespace', () => {
		expect(collapseWhitespace('  a \t  b ')).toBe('a b');
	});
});
