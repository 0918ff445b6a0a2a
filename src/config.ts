import { z } from 'zod';
import { Lexicon } from './types/types';
import { createLexicon, defaultLexicon, defaultLexiconSource, loadLexiconFile, MAX_FUNCTION_WORD_LENGTH_LIMIT } from './utils/lexicon';

export class ConfigError extends Error {
	constructor(message: string, readonly issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
		this.name = 'ConfigError';
	}
}

const booleanFlag = z
	.enum(['1', '0', 'true', 'false', 'on', 'off', 'yes', 'no'])
	.transform(value => ['1', 'true', 'on', 'yes'].includes(value));

const EnvSchema = z.object({
	TITLECASE_DEBUG: z.preprocess(
		value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
		booleanFlag.optional()
	),
	TITLECASE_LEXICON: z.string().trim().min(1).optional(),
	TITLECASE_MAX_FUNCTION_WORD_LENGTH: z.coerce.number().int().min(1).max(MAX_FUNCTION_WORD_LENGTH_LIMIT).optional(),
});

export interface TitleCaseConfig {
	debug: boolean;
	lexiconPath?: string;
	maxFunctionWordLength?: number;
}

/**
 * Read configuration from environment variables. Empty values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TitleCaseConfig {
	const relevant = Object.fromEntries(
		Object.entries(env).filter(([key, value]) => key.startsWith('TITLECASE_') && value !== undefined && value !== '')
	);

	const parseResult = EnvSchema.safeParse(relevant);
	if (!parseResult.success) {
		throw new ConfigError(
			'Invalid environment configuration',
			parseResult.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
		);
	}

	const { TITLECASE_DEBUG, TITLECASE_LEXICON, TITLECASE_MAX_FUNCTION_WORD_LENGTH } = parseResult.data;
	return {
		debug: TITLECASE_DEBUG ?? false,
		lexiconPath: TITLECASE_LEXICON,
		maxFunctionWordLength: TITLECASE_MAX_FUNCTION_WORD_LENGTH,
	};
}

/**
 * Build the lexicon a configuration asks for, reusing the bundled one when
 * nothing is overridden.
 */
export function resolveLexicon(config: Pick<TitleCaseConfig, 'lexiconPath' | 'maxFunctionWordLength'>): Lexicon {
	const overrides = config.maxFunctionWordLength === undefined ? {} : { maxFunctionWordLength: config.maxFunctionWordLength };
	if (config.lexiconPath) {
		return loadLexiconFile(config.lexiconPath, overrides);
	}
	if (config.maxFunctionWordLength !== undefined) {
		return createLexicon(defaultLexiconSource, overrides);
	}
	return defaultLexicon;
}
