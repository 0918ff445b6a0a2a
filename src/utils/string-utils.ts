import { DIGITS, LETTERS } from './char-classes';

// A letter that starts a run of letters which is not glued to a digit
const CAPITALIZABLE_LETTER_RE = new RegExp(`(?<![${LETTERS}${DIGITS}])[${LETTERS}]`, 'u');

export function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Uppercase the first letter of a value and leave the rest alone.
 *
 * Unlike `str.charAt(0).toUpperCase()`, leading punctuation is skipped
 * (`'tis` becomes `'Tis`) and letters that follow a digit are never touched,
 * so `3d` stays `3d`.
 */
export function capitalize(value: string): string {
	return value.replace(CAPITALIZABLE_LETTER_RE, letter => letter.toUpperCase());
}

export function collapseWhitespace(value: string): string {
	return value.trim().replace(/\s+/g, ' ');
}
