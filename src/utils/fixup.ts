// Phrasal fixup pass
// Runs on the reassembled title rather than on tokens: phrase matches span
// token boundaries, and the first/last word must skip punctuation-only runs.
//
// Phrase lowercasing has to run before the first/last word capitalization.
// Otherwise "Out of the Hurly-Burly" would lose the capital on "Out".

import { Lexicon } from '../types/types';
import { isOrdinalLike } from './classifier';
import { debugLog } from './debug';
import { capitalize } from './string-utils';
import { findWordTokenIndex, tokenize } from './tokenizer';

/**
 * Lowercase every occurrence of the lexicon's multi-word prepositions,
 * whatever casing the per-token pass gave their words.
 */
export function lowercasePhrases(title: string, lexicon: Lexicon): string {
	let result = title;
	for (const { phrase, pattern } of lexicon.phrases) {
		const next = result.replace(pattern, match => match.toLowerCase());
		if (next !== result) {
			debugLog('Fixup', `Lowercased phrase "${phrase}"`);
		}
		result = next;
	}
	return result;
}

/**
 * Capitalize the first and last actual words of a title, ignoring leading and
 * trailing punctuation. Ordinal-like words keep their case.
 */
export function capitalizeBoundaryWords(title: string): string {
	const tokens = tokenize(title);
	const { first, last } = findWordTokenIndex(tokens);
	if (first === -1) {
		return title;
	}

	const values = tokens.map(token => token.value);
	for (const index of new Set([first, last])) {
		if (!isOrdinalLike(values[index])) {
			values[index] = capitalize(values[index]);
		}
	}

	return values.join('');
}

export function applyPhrasalFixups(title: string, lexicon: Lexicon): string {
	return capitalizeBoundaryWords(lowercasePhrases(title, lexicon));
}
