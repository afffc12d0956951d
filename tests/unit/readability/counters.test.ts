/**
 * Counter tests
 */

import {
	avgSyllablesPerWord,
	avgWordsPerSentence,
	letterCount,
	percentThreeSyllableWords,
	sentenceCount,
	sixLetterWordCount,
	startsLowerCase,
	syllableCount,
	threeSyllableWordCount,
	tokenize,
	totalSyllables,
	wordCount,
} from '../../../src/readability/counters.js';

const PANGRAM = 'The quick brown fox jumps over the lazy dog.';

describe('Counters', () => {
	describe('sentence, word and letter counts', () => {
		it('should count a two-sentence text', () => {
			expect(sentenceCount('Hi. Bye.')).toBe(2);
			expect(wordCount('Hi. Bye.')).toBe(2);
			expect(letterCount('Hi. Bye.')).toBe(4);
		});

		it('should count HTML paragraphs as sentences', () => {
			const html = '<p>Hello world</p><p>Goodbye</p>';
			expect(sentenceCount(html)).toBe(2);
			expect(wordCount(html)).toBe(3);
		});

		it('should floor sentence and word counts at one', () => {
			expect(sentenceCount('')).toBe(1);
			expect(wordCount('')).toBe(1);
			expect(letterCount('')).toBe(0);
			expect(sentenceCount('just some words')).toBe(1);
			expect(wordCount('just some words')).toBe(3);
		});

		it('should ignore digits and punctuation when counting letters', () => {
			expect(letterCount('R2-D2 beeps 3 times!')).toBe(12);
			expect(wordCount('R2-D2 beeps 3 times!')).toBe(5);
		});

		it('should not count a tab-separated terminator as a word', () => {
			expect(wordCount('a\t.b')).toBe(2);
			expect(sentenceCount('a\t.b')).toBe(1);
		});

		it('should count the pangram', () => {
			expect(wordCount(PANGRAM)).toBe(9);
			expect(sentenceCount(PANGRAM)).toBe(1);
			expect(letterCount(PANGRAM)).toBe(35);
		});
	});

	describe('syllableCount', () => {
		const cases: Array<[string, number]> = [
			['the', 1],
			['over', 2],
			['lazy', 2],
			['create', 2],
			['rhythm', 1],
			['queue', 1],
			['beautiful', 3],
			['Anderson,', 3],
			['library.', 3],
		];

		it.each(cases)('should count %s as %i', (word, expected) => {
			expect(syllableCount(word)).toBe(expected);
		});

		it('should give every token at least one syllable', () => {
			expect(syllableCount('')).toBe(1);
			expect(syllableCount('123')).toBe(1);
			expect(syllableCount('?!')).toBe(1);
		});
	});

	describe('totals and averages', () => {
		it('should sum syllables over tokens', () => {
			expect(totalSyllables(PANGRAM)).toBe(11);
			expect(totalSyllables('')).toBe(0);
		});

		it('should average words per sentence', () => {
			expect(avgWordsPerSentence('Hi. Bye.')).toBe(1);
			expect(avgWordsPerSentence(PANGRAM)).toBe(9);
		});

		it('should average syllables per word', () => {
			expect(avgSyllablesPerWord(PANGRAM)).toBe(11 / 9);
			expect(avgSyllablesPerWord('')).toBe(0);
		});
	});

	describe('long word counts', () => {
		const names = 'George Washington visited Boston yesterday.';
		const words = 'Anderson went to the beautiful library.';

		it('should include capitalized six-letter words by default', () => {
			expect(sixLetterWordCount(names)).toBe(5);
			expect(sixLetterWordCount(names, true)).toBe(5);
		});

		it('should exclude capitalized six-letter words on request', () => {
			expect(sixLetterWordCount(names, false)).toBe(2);
		});

		it('should count trailing terminators toward word length', () => {
			expect(sixLetterWordCount('Go to sleep.')).toBe(1);
			expect(sixLetterWordCount('Go to sleep')).toBe(0);
		});

		it('should filter three-syllable words by capitalization', () => {
			expect(threeSyllableWordCount(words)).toBe(3);
			expect(threeSyllableWordCount(words, false)).toBe(2);
		});

		it('should exclude capitalized words from the percentage by default', () => {
			expect(percentThreeSyllableWords(words)).toBe((100 * 2) / 6);
			expect(percentThreeSyllableWords(words, true)).toBe(50);
		});
	});

	describe('helpers', () => {
		it('should split canonical text on whitespace', () => {
			expect(tokenize('Hello world. Goodbye.')).toEqual(['Hello', 'world.', 'Goodbye.']);
			expect(tokenize('')).toEqual([]);
		});

		it('should treat only lower-case initials as common words', () => {
			expect(startsLowerCase('boston')).toBe(true);
			expect(startsLowerCase('Boston')).toBe(false);
			expect(startsLowerCase('123456')).toBe(false);
		});
	});
});
