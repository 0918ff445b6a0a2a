// Character classes shared by the tokenizer, classifier and fixup pass.
// Letters cover ASCII and the Latin-1 Supplement, minus the × and ÷ signs.

export const LETTERS = 'A-Za-z\\u00C0-\\u00D6\\u00D8-\\u00F6\\u00F8-\\u00FF';
export const LOWERCASE_LETTERS = 'a-z\\u00DF-\\u00F6\\u00F8-\\u00FF';
export const DIGITS = '0-9';
// Straight apostrophe, modifier letter apostrophe and right single quote
export const APOSTROPHES = "'\\u02BC\\u2019";
export const WORD_CHARS = `${LETTERS}${DIGITS}.${APOSTROPHES}`;

const WORD_CHAR_RE = new RegExp(`^[${WORD_CHARS}]$`, 'u');
const LETTER_RE = new RegExp(`^[${LETTERS}]$`, 'u');
const ALPHANUMERIC_RE = new RegExp(`[${LETTERS}${DIGITS}]`, 'u');

export function isWordChar(char: string): boolean {
	return WORD_CHAR_RE.test(char);
}

export function isLetter(char: string): boolean {
	return LETTER_RE.test(char);
}

// False for runs of periods and apostrophes such as an ellipsis
export function hasAlphanumeric(value: string): boolean {
	return ALPHANUMERIC_RE.test(value);
}

export function countLetters(value: string): number {
	let count = 0;
	for (const char of value) {
		if (isLetter(char)) {
			count++;
		}
	}
	return count;
}
