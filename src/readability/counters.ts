/**
 * Counting primitives shared by every readability formula
 *
 * Each counter accepts raw text and normalizes it itself, so any of them can
 * be called standalone.
 */

import { preprocess } from './preprocess.js';

const NON_LETTER = /[^A-Za-z]+/g;
const NON_TERMINATOR = /[^.!?]/g;
const NON_SPACE = /[^ ]/g;
const NON_LOWER_ALPHA = /[^a-z]/g;
const CONSONANT_RUN = /[^aeiouy]+/;
const WHITESPACE_RUN = /\s+/;
const LOWER_CASE_START = /^[a-z]/;

/**
 * Whitespace-delimited tokens of canonical text. Punctuation stays attached,
 * so `dog.` is one token of length 4.
 */
export function tokenize(canonical: string): string[] {
	return canonical.split(WHITESPACE_RUN).filter((token) => token.length > 0);
}

/**
 * Proper-noun filter: a capitalized first character is taken as a name.
 * This is a heuristic, not entity recognition.
 */
export function startsLowerCase(token: string): boolean {
	return LOWER_CASE_START.test(token);
}

/**
 * Canonical-text counts. These skip normalization and expect the output of
 * {@link preprocess}.
 */
export function countLetters(canonical: string): number {
	return canonical.replace(NON_LETTER, '').length;
}

export function countTerminators(canonical: string): number {
	return canonical.replace(NON_TERMINATOR, '').length;
}

export function countSpaces(canonical: string): number {
	return canonical.replace(NON_SPACE, '').length;
}

export function letterCount(text: string): number {
	return countLetters(preprocess(text));
}

/**
 * Terminators in the canonical text, never less than 1.
 * Abbreviations and honorifics end sentences too.
 */
export function sentenceCount(text: string): number {
	return Math.max(1, countTerminators(preprocess(text)));
}

/**
 * Spaces plus one. Empty text counts as one word.
 */
export function wordCount(text: string): number {
	return 1 + countSpaces(preprocess(text));
}

/**
 * Estimate syllables by counting runs of vowels (`y` included).
 * Every word has at least one.
 */
export function syllableCount(word: string): number {
	const letters = word.toLowerCase().replace(NON_LOWER_ALPHA, '');
	const clusters = letters.split(CONSONANT_RUN).filter((fragment) => fragment !== '');
	return Math.max(1, clusters.length);
}

export function totalSyllables(text: string): number {
	return tokenize(preprocess(text)).reduce((total, word) => total + syllableCount(word), 0);
}

export function avgWordsPerSentence(text: string): number {
	const canonical = preprocess(text);
	return wordCount(canonical) / sentenceCount(canonical);
}

export function avgSyllablesPerWord(text: string): number {
	const canonical = preprocess(text);
	return totalSyllables(canonical) / wordCount(canonical);
}

/**
 * Tokens of six characters or more. With `includeCapitalized` off, only
 * tokens starting with a lower-case letter count.
 */
export function sixLetterWordCount(text: string, includeCapitalized = true): number {
	return tokenize(preprocess(text)).filter(
		(word) => word.length >= 6 && (includeCapitalized || startsLowerCase(word))
	).length;
}

/**
 * Tokens of three syllables or more, with the same capitalization filter
 * as {@link sixLetterWordCount}.
 */
export function threeSyllableWordCount(text: string, includeCapitalized = true): number {
	return tokenize(preprocess(text)).filter(
		(word) => syllableCount(word) >= 3 && (includeCapitalized || startsLowerCase(word))
	).length;
}

/**
 * Share of words with three or more syllables, as a percentage.
 * Capitalized tokens are left out by default, as Gunning Fog expects.
 */
export function percentThreeSyllableWords(text: string, includeCapitalized = false): number {
	const canonical = preprocess(text);
	return (100 * threeSyllableWordCount(canonical, includeCapitalized)) / wordCount(canonical);
}
