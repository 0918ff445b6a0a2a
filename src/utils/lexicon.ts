/**
 * Lexicon - the word lists that drive function-word lowercasing.
 *
 * The bundled lexicon is loaded from data/lexicon.json and validated when this
 * module is first imported, so a malformed lexicon stops the process before any
 * title is processed. Custom lexicons go through the same validation.
 */

import fs from 'fs';
import { z } from 'zod';
import { Lexicon, LexiconSource, PhrasePattern } from '../types/types';
import { LETTERS, DIGITS, countLetters, isWordChar } from './char-classes';
import { debugLog } from './debug';
import { escapeRegExp } from './string-utils';
import lexiconJson from '../data/lexicon.json';

export const MAX_FUNCTION_WORD_LENGTH_LIMIT = 20;

export class LexiconError extends Error {
	constructor(message: string, readonly issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
		this.name = 'LexiconError';
	}
}

const LexiconSourceSchema = z.object({
	maxFunctionWordLength: z.number().int().min(1).max(MAX_FUNCTION_WORD_LENGTH_LIMIT),
	functionWords: z.array(z.string().min(1)),
	phrases: z.array(z.string().min(1)),
});

export interface LexiconOverrides {
	maxFunctionWordLength?: number;
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function isSingleWord(value: string): boolean {
	return Array.from(value).every(isWordChar);
}

/**
 * Compile a phrase into a case-insensitive whole-word pattern. The words of a
 * multi-word phrase may be separated by any run of whitespace.
 */
export function compilePhrase(phrase: string): PhrasePattern {
	const body = phrase.split(/\s+/).map(escapeRegExp).join('\\s+');
	const boundary = `${LETTERS}${DIGITS}`;
	try {
		return {
			phrase,
			pattern: new RegExp(`(?<![${boundary}])${body}(?![${boundary}])`, 'giu'),
		};
	} catch (error) {
		throw new LexiconError(`Phrase "${phrase}" does not compile`, [describeError(error)]);
	}
}

export function parseLexiconSource(source: unknown): LexiconSource {
	const parseResult = LexiconSourceSchema.safeParse(source);
	if (!parseResult.success) {
		throw new LexiconError('Invalid lexicon format', formatIssues(parseResult.error));
	}
	return parseResult.data;
}

/**
 * Validate a raw lexicon and build the immutable structure used by the
 * title-casing passes. Throws `LexiconError` on any inconsistency.
 */
export function createLexicon(source: unknown, overrides: LexiconOverrides = {}): Lexicon {
	const data = parseLexiconSource(source);
	const maxFunctionWordLength = overrides.maxFunctionWordLength ?? data.maxFunctionWordLength;
	if (!Number.isInteger(maxFunctionWordLength) || maxFunctionWordLength < 1 || maxFunctionWordLength > MAX_FUNCTION_WORD_LENGTH_LIMIT) {
		throw new LexiconError(`Function word length must be an integer between 1 and ${MAX_FUNCTION_WORD_LENGTH_LIMIT}, got ${maxFunctionWordLength}`);
	}

	const issues: string[] = [];

	for (const word of data.functionWords) {
		if (!isSingleWord(word)) {
			issues.push(`function word "${word}" is not a single word`);
		}
	}
	for (const phrase of data.phrases) {
		if (phrase !== phrase.trim()) {
			issues.push(`phrase "${phrase}" has surrounding whitespace`);
		} else if (phrase !== phrase.toLowerCase()) {
			issues.push(`phrase "${phrase}" is not lowercase`);
		}
	}
	if (issues.length > 0) {
		throw new LexiconError('Invalid lexicon entries', issues);
	}

	// Length counts letters only, so o'er and c. sit with the three-letter words
	const functionWords = new Set(
		data.functionWords
			.map(word => word.toLowerCase())
			.filter(word => countLetters(word) <= maxFunctionWordLength)
	);
	const phrases = Array.from(new Set(data.phrases)).map(compilePhrase);

	debugLog('Lexicon', 'Created lexicon', {
		maxFunctionWordLength,
		functionWords: functionWords.size,
		phrases: phrases.length,
	});

	return Object.freeze({
		maxFunctionWordLength,
		functionWords,
		phrases: Object.freeze(phrases),
	});
}

/**
 * Read and validate a lexicon from a JSON file.
 */
export function loadLexiconFile(filePath: string, overrides: LexiconOverrides = {}): Lexicon {
	let raw: string;
	try {
		raw = fs.readFileSync(filePath, 'utf8');
	} catch (error) {
		throw new LexiconError(`Cannot read lexicon file ${filePath}`, [describeError(error)]);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new LexiconError(`Lexicon file ${filePath} is not valid JSON`, [describeError(error)]);
	}

	return createLexicon(parsed, overrides);
}

function freezeSource(source: LexiconSource): LexiconSource {
	return Object.freeze({
		maxFunctionWordLength: source.maxFunctionWordLength,
		functionWords: Object.freeze([...source.functionWords]),
		phrases: Object.freeze([...source.phrases]),
	});
}

export const defaultLexiconSource: LexiconSource = freezeSource(parseLexiconSource(lexiconJson));

export const defaultLexicon: Lexicon = createLexicon(defaultLexiconSource);
