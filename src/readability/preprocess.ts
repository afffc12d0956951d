/**
 * Text normalization for readability scoring
 *
 * Produces canonical text: ASCII only, words separated by single spaces,
 * every sentence closed by a single `.` and one following space, no markup.
 * Applying `preprocess` to its own output returns it unchanged.
 */

// Closing tags of block elements end a sentence
const FULL_STOP_TAGS = ['li', 'p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'dd'] as const;

const NON_ASCII = /[\u0080-\uFFFF]/g;
const FULL_STOP_TAG = new RegExp(`</(?:${FULL_STOP_TAGS.join('|')})>`, 'g');
const HTML_TAG = /<[^>]+>/g;
const WORD_SEPARATOR = /[,:;()\-]/g;
const TERMINATOR = /[.!?]/g;
const LEADING_WHITESPACE = /^\s+/;
const LINE_BREAK = /[ ]*(\n|\r\n|\r)[ ]*/g;
const REPEATED_TERMINATOR = /([.])[.\s]+/g;
const UNPADDED_TERMINATOR = /\s*([.])/g;
const WHITESPACE_RUN = /\s+/g;
const TRAILING_WHITESPACE = /\s+$/;

/**
 * Decompose accented characters and drop whatever has no ASCII form.
 */
export function toAscii(text: string): string {
	return text.normalize('NFKD').replace(NON_ASCII, '');
}

export function preprocess(text: string): string {
	return toAscii(text)
		.replace(FULL_STOP_TAG, '.')
		.replace(HTML_TAG, '')
		.replace(WORD_SEPARATOR, ' ')
		.replace(TERMINATOR, '.')
		.replace(LEADING_WHITESPACE, '')
		.replace(LINE_BREAK, ' ')
		.replace(REPEATED_TERMINATOR, '.')
		.replace(UNPADDED_TERMINATOR, '. ')
		.replace(WHITESPACE_RUN, ' ')
		.replace(TRAILING_WHITESPACE, '');
}
