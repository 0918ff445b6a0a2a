/**
 * Line-oriented shell around the title-casing core.
 *
 * Words given on the command line form one title. Without them every line of
 * the input stream is title-cased; blank lines stay blank.
 */

import { once } from 'events';
import fs from 'fs';
import path from 'path';
import readline from 'readline';
import { z } from 'zod';
import { ConfigError, loadConfig, resolveLexicon } from './config';
import { createTitleCaser } from './title-case';
import { TitleCaser } from './types/types';
import { debugLog, setDebugMode } from './utils/debug';
import { titleCaseValue } from './utils/filters/title';
import { LexiconError } from './utils/lexicon';
import { collapseWhitespace } from './utils/string-utils';

export const PROGRAM_NAME = 'title-caser';

export const USAGE = `Usage: ${PROGRAM_NAME} [options] [words...]

Title-cases the given words, or every line of standard input.

Options:
  --json              Treat each line as JSON and title-case every string in it
  --max-length <n>    Longest function word, in letters, kept lowercase
  -V, --version       Print the version and exit
  -h, --help          Print this help and exit

Environment:
  TITLECASE_DEBUG                     Log each step to stderr (1/0)
  TITLECASE_LEXICON                   Path to a lexicon JSON file
  TITLECASE_MAX_FUNCTION_WORD_LENGTH  Same as --max-length
`;

export interface CliStreams {
	input: NodeJS.ReadableStream;
	output: NodeJS.WritableStream;
	error: NodeJS.WritableStream;
}

export interface CliOptions {
	json: boolean;
	version: boolean;
	help: boolean;
	maxFunctionWordLength?: number;
	words: string[];
}

const PackageSchema = z.object({ version: z.string() });

export function readVersion(): string {
	const packagePath = path.join(__dirname, '..', 'package.json');
	const parseResult = PackageSchema.safeParse(JSON.parse(fs.readFileSync(packagePath, 'utf8')));
	if (!parseResult.success) {
		throw new ConfigError(`No version in ${packagePath}`);
	}
	return parseResult.data.version;
}

/**
 * Parse command line arguments. Everything after `--` is a word, even if it
 * looks like an option.
 */
export function parseArgs(args: string[]): CliOptions {
	const options: CliOptions = { json: false, version: false, help: false, words: [] };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === '--') {
			options.words.push(...args.slice(i + 1));
			break;
		}
		switch (arg) {
			case '--json':
				options.json = true;
				break;
			case '-V':
			case '--version':
				options.version = true;
				break;
			case '-h':
			case '--help':
				options.help = true;
				break;
			case '--max-length': {
				const value = args[i + 1];
				const length = Number(value);
				if (value === undefined || !Number.isInteger(length) || length < 1) {
					throw new ConfigError(`--max-length expects a positive integer, got ${value ?? 'nothing'}`);
				}
				options.maxFunctionWordLength = length;
				i++;
				break;
			}
			default:
				if (arg.startsWith('-') && arg.length > 1) {
					throw new ConfigError(`Unknown option: ${arg}`);
				}
				options.words.push(arg);
		}
	}

	return options;
}

// Waits for 'drain' when the stream buffer is full
async function write(stream: NodeJS.WritableStream, text: string): Promise<void> {
	if (!stream.write(text)) {
		await once(stream, 'drain');
	}
}

async function processLines(input: NodeJS.ReadableStream, output: NodeJS.WritableStream, transform: TitleCaser): Promise<void> {
	const lines = readline.createInterface({ input, crlfDelay: Infinity });
	let count = 0;
	for await (const line of lines) {
		const trimmed = line.trim();
		await write(output, trimmed ? `${transform(trimmed)}\n` : '\n');
		count++;
	}
	debugLog('Cli', `Processed ${count} lines`);
}

/**
 * Run the command line interface and resolve with the process exit code.
 */
export async function run(args: string[], streams: CliStreams, env: NodeJS.ProcessEnv = process.env): Promise<number> {
	let options: CliOptions;
	let transform: TitleCaser;

	try {
		options = parseArgs(args);
		if (options.help) {
			await write(streams.output, USAGE);
			return 0;
		}
		if (options.version) {
			await write(streams.output, `${PROGRAM_NAME} ${readVersion()}\n`);
			return 0;
		}

		const config = loadConfig(env);
		setDebugMode(config.debug);
		debugLog('Cli', 'Configuration:', config);

		const maxFunctionWordLength = options.maxFunctionWordLength ?? config.maxFunctionWordLength;
		const lexicon = resolveLexicon({ lexiconPath: config.lexiconPath, maxFunctionWordLength });
		transform = options.json ? (line: string) => titleCaseValue(line, lexicon) : createTitleCaser(lexicon);
	} catch (error) {
		if (error instanceof ConfigError || error instanceof LexiconError) {
			await write(streams.error, `${PROGRAM_NAME}: ${error.message}\n`);
			return 1;
		}
		throw error;
	}

	if (options.words.length > 0) {
		await write(streams.output, `${transform(collapseWhitespace(options.words.join(' ')))}\n`);
		return 0;
	}

	await processLines(streams.input, streams.output, transform);
	return 0;
}
