import { describe, test, expect } from 'vitest';
import { classifyTokens, createTitleCaser, reassemble, titleCase } from './title-case';
import { createLexicon, defaultLexiconSource } from './utils/lexicon';

describe('titleCase', () => {
	test('lowercases short function words between capitalized words', () => {
		expect(titleCase("a tramp's wallet stored by an english goldsmith during his wanderings in germany and france"))
			.toBe("A Tramp's Wallet Stored by an English Goldsmith During His Wanderings in Germany and France");
	});

	test('ignores a leading ellipsis when finding the first word', () => {
		expect(titleCase('...and it comes out here')).toBe('...And It Comes out Here');
	});

	test('skips a free-standing ellipsis or period at either end', () => {
		expect(titleCase('... and it comes out here')).toBe('... And It Comes out Here');
		expect(titleCase('the world we live in ...')).toBe('The World We Live In ...');
		expect(titleCase('a place to go to .')).toBe('A Place to Go To .');
	});

	test('uppercases period-delimited acronyms and keeps trailing punctuation', () => {
		expect(titleCase('s.o.s. aphrodite!')).toBe('S.O.S. Aphrodite!');
	});

	test('capitalizes only the first word of a leading multi-word preposition', () => {
		expect(titleCase('out of the hurly-burly; or, life in an odd corner'))
			.toBe('Out of the Hurly-Burly; or, Life in an Odd Corner');
	});

	test('returns an empty line unchanged', () => {
		expect(titleCase('')).toBe('');
	});

	test('capitalizes only the last word of a trailing multi-word preposition', () => {
		expect(titleCase('entering the city with the horse i got off of'))
			.toBe('Entering the City With the Horse I Got off Of');
	});

	test('capitalizes a last word that carries a period', () => {
		expect(titleCase('the delmonico cook book: how to buy food, how to cook it, and how to serve it.'))
			.toBe('The Delmonico Cook Book: How to Buy Food, How to Cook It, and How to Serve It.');
	});

	test('keeps contraction variants of "and" lowercase', () => {
		expect(titleCase("toys 'n' games")).toBe("Toys 'n' Games");
		expect(titleCase('rock ’n’ roll')).toBe('Rock ’n’ Roll');
	});

	test('uppercases acronyms anywhere in the title', () => {
		expect(titleCase('life in the u.s.a. today')).toBe('Life in the U.S.A. Today');
	});

	test('never changes the case of ordinals', () => {
		expect(titleCase('the 1st of many')).toBe('The 1st of Many');
		expect(titleCase('22nd century')).toBe('22nd Century');
		expect(titleCase('back to the 3RD')).toBe('Back to the 3RD');
	});

	test('handles Latin-1 accented words', () => {
		expect(titleCase('émile and the détectives')).toBe('Émile and the Détectives');
		expect(titleCase('notes on vis-à-vis relations')).toBe('Notes on vis-à-vis Relations');
	});

	test('keeps words that already contain capitals', () => {
		expect(titleCase('NASA and the iPhone era')).toBe('NASA and the iPhone Era');
	});

	test('returns titles without letters unchanged', () => {
		expect(titleCase('?!')).toBe('?!');
		expect(titleCase('2024')).toBe('2024');
		expect(titleCase('   ')).toBe('   ');
	});

	test('capitalizes a function word standing alone', () => {
		expect(titleCase('a')).toBe('A');
		expect(titleCase('the end')).toBe('The End');
	});

	test('preserves separators exactly', () => {
		expect(titleCase('hello,  world — again')).toBe('Hello,  World — Again');
	});

	test('is idempotent on its own output', () => {
		const inputs = [
			"a tramp's wallet stored by an english goldsmith during his wanderings in germany and france",
			'...and it comes out here',
			's.o.s. aphrodite!',
			'out of the hurly-burly; or, life in an odd corner',
			'entering the city with the horse i got off of',
			"toys 'n' games",
			'the 1st of many',
		];
		for (const input of inputs) {
			const once = titleCase(input);
			expect(titleCase(once)).toBe(once);
		}
	});
});

describe('classifyTokens', () => {
	test('assigns a category to every token', () => {
		const tokens = classifyTokens('s.o.s. aphrodite!', createLexicon(defaultLexiconSource));
		expect(tokens.map(token => [token.category, token.value])).toEqual([
			['acronym', 'S.O.S.'],
			['verbatim', ' '],
			['word', 'Aphrodite'],
			['verbatim', '!'],
		]);
	});
});

describe('reassemble', () => {
	test('joins classified tokens without adding anything', () => {
		const lexicon = createLexicon(defaultLexiconSource);
		expect(reassemble(classifyTokens('out of the hurly-burly', lexicon))).toBe('out of the Hurly-Burly');
	});
});

describe('createTitleCaser', () => {
	test('binds a custom lexicon', () => {
		const toTitleCase = createTitleCaser(createLexicon(defaultLexiconSource, { maxFunctionWordLength: 4 }));
		expect(toTitleCase('entering the city with the horse i got off of'))
			.toBe('Entering the City with the Horse I Got off Of');
	});
});
