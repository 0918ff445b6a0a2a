import { Lexicon, TokenCategory } from '../types/types';
import { APOSTROPHES, DIGITS, LETTERS, LOWERCASE_LETTERS } from './char-classes';
import { capitalize } from './string-utils';

// Two or more single letters, each followed by a period: S.O.S., M.A.S.H.
const ACRONYM_RE = new RegExp(`^(?:[${LETTERS}]\\.){2,}$`, 'u');
// Digits directly followed by a letter, after optional punctuation: 1st, '90s
const ORDINAL_RE = new RegExp(`^[^${LETTERS}${DIGITS}]*[${DIGITS}]+[${LETTERS}]`, 'u');
const ORDINARY_WORD_RE = new RegExp(`^[${LOWERCASE_LETTERS}${APOSTROPHES}]+$`, 'u');

export interface ClassificationRule {
	category: TokenCategory;
	matches: (value: string, lexicon: Lexicon) => boolean;
	apply: (value: string) => string;
}

export interface Classification {
	category: TokenCategory;
	value: string;
}

export function isOrdinalLike(value: string): boolean {
	return ORDINAL_RE.test(value);
}

/**
 * Per-token rules, in priority order. The first rule that matches decides
 * the token's category; tokens matching none are passed through verbatim.
 */
export const classificationRules: readonly ClassificationRule[] = [
	{
		category: 'acronym',
		matches: value => ACRONYM_RE.test(value),
		apply: value => value.toUpperCase(),
	},
	{
		category: 'ordinal',
		matches: value => isOrdinalLike(value),
		apply: value => value,
	},
	{
		category: 'function_word',
		matches: (value, lexicon) => lexicon.functionWords.has(value.toLowerCase()),
		apply: value => value.toLowerCase(),
	},
	{
		category: 'word',
		matches: value => ORDINARY_WORD_RE.test(value),
		apply: capitalize,
	},
];

export function classifyToken(value: string, lexicon: Lexicon): Classification {
	const rule = classificationRules.find(candidate => candidate.matches(value, lexicon));
	if (!rule) {
		return { category: 'verbatim', value };
	}
	return { category: rule.category, value: rule.apply(value) };
}
