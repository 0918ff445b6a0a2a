export type TokenKind = 'word' | 'separator';

export interface Token {
	kind: TokenKind;
	value: string;
	// UTF-16 offsets into the original title, end exclusive
	start: number;
	end: number;
}

export type TokenCategory =
	| 'acronym'        // S.O.S., M.A.S.H.
	| 'ordinal'        // 1st, 22nd, '90s
	| 'function_word'  // a, of, the, 'n'
	| 'word'           // ordinary lowercase word
	| 'verbatim';      // everything else, passed through

export interface ClassifiedToken extends Token {
	category: TokenCategory;
}

export interface WordTokenIndex {
	first: number;
	last: number;
}

export interface PhrasePattern {
	phrase: string;
	pattern: RegExp;
}

export interface Lexicon {
	readonly maxFunctionWordLength: number;
	readonly functionWords: ReadonlySet<string>;
	readonly phrases: readonly PhrasePattern[];
}

/**
 * Raw lexicon as stored in JSON, before validation and compilation.
 */
export interface LexiconSource {
	readonly maxFunctionWordLength: number;
	readonly functionWords: readonly string[];
	readonly phrases: readonly string[];
}

export type TitleCaser = (input: string) => string;

export type FilterFunction = (value: string, param?: string) => string;
