import { FilterFunction, Lexicon } from '../../types/types';
import { titleCase } from '../../title-case';
import { debugLog } from '../debug';
import { createLexicon, defaultLexicon, defaultLexiconSource, MAX_FUNCTION_WORD_LENGTH_LIMIT } from '../lexicon';
import { memoize } from '../memoize';

const lexiconForLength = memoize((maxFunctionWordLength: number): Lexicon =>
	createLexicon(defaultLexiconSource, { maxFunctionWordLength })
);

function resolveLexicon(param?: string): Lexicon {
	if (!param) {
		return defaultLexicon;
	}

	// Remove surrounding quotes (both single and double)
	const cleaned = param.trim().replace(/^(['"])(.*)\1$/, '$2');
	const length = Number(cleaned);
	if (!Number.isInteger(length) || length < 1 || length > MAX_FUNCTION_WORD_LENGTH_LIMIT) {
		debugLog('title', `Ignoring invalid function word length: ${param}`);
		return defaultLexicon;
	}
	return lexiconForLength(length);
}

/**
 * Title-case a value. JSON input is walked recursively: every string, and
 * every object key, is title-cased and the result serialized back to JSON.
 * Anything else is treated as a single title.
 */
export function titleCaseValue(input: string, lexicon: Lexicon): string {
	const toTitleCase = (str: string): string => titleCase(str, lexicon);

	const processValue = (value: unknown): unknown => {
		if (typeof value === 'string') {
			return toTitleCase(value);
		} else if (Array.isArray(value)) {
			return value.map(processValue);
		} else if (typeof value === 'object' && value !== null) {
			const result: { [key: string]: unknown } = {};
			for (const [key, val] of Object.entries(value)) {
				result[toTitleCase(key)] = processValue(val);
			}
			return result;
		}
		return value;
	};

	let parsedInput: unknown;
	try {
		parsedInput = JSON.parse(input);
	} catch {
		// Not JSON, so it is a plain title
		return toTitleCase(input);
	}

	if (typeof parsedInput === 'string' || (typeof parsedInput === 'object' && parsedInput !== null)) {
		return JSON.stringify(processValue(parsedInput));
	}
	// Bare numbers, booleans and null are titles too
	return toTitleCase(input);
}

/**
 * The optional param sets the longest function word (in letters) that stays
 * lowercase, e.g. `title:4` also lowercases "with" and "from".
 */
export const title: FilterFunction = (input, param) => titleCaseValue(input, resolveLexicon(param));
