/**
 * One-pass text statistics
 *
 * Normalizes once and derives every count the formulas need. The values
 * match the standalone counters exactly.
 */

import {
	countLetters,
	countSpaces,
	countTerminators,
	startsLowerCase,
	syllableCount,
	tokenize,
} from './counters.js';
import { preprocess } from './preprocess.js';
import type { TextStatistics } from './types.js';

export function analyzeText(text: string): TextStatistics {
	const canonical = preprocess(text);
	const stats: TextStatistics = {
		canonical,
		letters: countLetters(canonical),
		words: 1 + countSpaces(canonical),
		sentences: Math.max(1, countTerminators(canonical)),
		syllables: 0,
		sixLetterWords: 0,
		sixLetterLowerCaseWords: 0,
		threeSyllableWords: 0,
		threeSyllableLowerCaseWords: 0,
	};

	for (const token of tokenize(canonical)) {
		const syllables = syllableCount(token);
		const lowerCase = startsLowerCase(token);
		stats.syllables += syllables;

		if (token.length >= 6) {
			stats.sixLetterWords++;
			if (lowerCase) stats.sixLetterLowerCaseWords++;
		}
		if (syllables >= 3) {
			stats.threeSyllableWords++;
			if (lowerCase) stats.threeSyllableLowerCaseWords++;
		}
	}

	return stats;
}

export function averageWordsPerSentence(stats: TextStatistics): number {
	return stats.words / stats.sentences;
}

export function averageSyllablesPerWord(stats: TextStatistics): number {
	return stats.syllables / stats.words;
}

export function percentThreeSyllableLowerCaseWords(stats: TextStatistics): number {
	return (100 * stats.threeSyllableLowerCaseWords) / stats.words;
}
