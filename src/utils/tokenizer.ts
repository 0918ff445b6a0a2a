// Title tokenizer
// Splits a title into alternating runs of word-constituent characters
// (letters, digits, periods, apostrophes) and everything else.
//
// Tokenization is lossless: joining every token value gives back the input.

import { Token, TokenKind, WordTokenIndex } from '../types/types';
import { hasAlphanumeric, isWordChar } from './char-classes';

// ============================================================================
// Main Tokenizer Function
// ============================================================================

/**
 * Tokenize a title at every boundary between word and non-word characters.
 * An empty title produces no tokens.
 */
export function tokenize(input: string): Token[] {
	const tokens: Token[] = [];
	let start = 0;
	let pos = 0;
	let kind: TokenKind | null = null;

	// Iterate by code point so surrogate pairs never straddle a boundary
	for (const char of input) {
		const charKind: TokenKind = isWordChar(char) ? 'word' : 'separator';
		if (kind !== null && charKind !== kind) {
			tokens.push({ kind, value: input.slice(start, pos), start, end: pos });
			start = pos;
		}
		kind = charKind;
		pos += char.length;
	}

	if (kind !== null) {
		tokens.push({ kind, value: input.slice(start, pos), start, end: pos });
	}

	return tokens;
}

// ============================================================================
// Word Positions
// ============================================================================

function isRealWord(token: Token): boolean {
	return token.kind === 'word' && hasAlphanumeric(token.value);
}

/**
 * Find the first and last tokens that are actual words. Leading and trailing
 * punctuation runs (an ellipsis, quotes, a lone period) are skipped. Both are
 * -1 when the title has no words at all.
 */
export function findWordTokenIndex(tokens: readonly Token[]): WordTokenIndex {
	const first = tokens.findIndex(isRealWord);
	if (first === -1) {
		return { first: -1, last: -1 };
	}

	let last = first;
	for (let i = tokens.length - 1; i > first; i--) {
		if (isRealWord(tokens[i])) {
			last = i;
			break;
		}
	}

	return { first, last };
}

export function joinTokens(tokens: readonly Pick<Token, 'value'>[]): string {
	return tokens.map(token => token.value).join('');
}

export function formatToken(token: Token): string {
	return `${token.kind}(${JSON.stringify(token.value)}) at ${token.start}-${token.end}`;
}
