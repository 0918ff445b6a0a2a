import { ClassifiedToken, Lexicon, TitleCaser } from './types/types';
import { classifyToken } from './utils/classifier';
import { debugLog, isDebugMode } from './utils/debug';
import { applyPhrasalFixups } from './utils/fixup';
import { defaultLexicon } from './utils/lexicon';
import { formatToken, joinTokens, tokenize } from './utils/tokenizer';

export function classifyTokens(title: string, lexicon: Lexicon): ClassifiedToken[] {
	return tokenize(title).map(token => {
		const { category, value } = classifyToken(token.value, lexicon);
		return { ...token, category, value };
	});
}

/**
 * Join classified tokens back together. Tokens already carry every original
 * separator, so nothing is added or removed.
 */
export function reassemble(tokens: readonly ClassifiedToken[]): string {
	return joinTokens(tokens);
}

/**
 * Convert a single line to title case.
 *
 * Short articles, conjunctions and prepositions are lowercased, other words
 * capitalized, period-delimited acronyms uppercased and ordinals left alone.
 * The first and last words are always capitalized unless ordinal-like.
 *
 * @example
 * titleCase('out of the hurly-burly; or, life in an odd corner');
 * // 'Out of the Hurly-Burly; or, Life in an Odd Corner'
 */
export function titleCase(input: string, lexicon: Lexicon = defaultLexicon): string {
	const tokens = classifyTokens(input, lexicon);
	if (isDebugMode()) {
		debugLog('TitleCase', 'Classified tokens:', tokens.map(token => `${token.category} ${formatToken(token)}`));
	}

	const reassembled = reassemble(tokens);
	debugLog('TitleCase', 'Reassembled:', reassembled);

	const result = applyPhrasalFixups(reassembled, lexicon);
	debugLog('TitleCase', 'Result:', result);
	return result;
}

export function createTitleCaser(lexicon: Lexicon): TitleCaser {
	return (input: string) => titleCase(input, lexicon);
}
