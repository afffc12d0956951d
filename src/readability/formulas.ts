/**
 * Readability formulas
 *
 * Every formula exists twice: over precomputed {@link TextStatistics}, and as
 * a standalone `(text) => number` function. Both evaluate the same expression
 * in the same order, so they agree to the last bit.
 */

import {
	analyzeText,
	averageSyllablesPerWord,
	averageWordsPerSentence,
	percentThreeSyllableLowerCaseWords,
} from './statistics.js';
import type { MetricFormula, MetricName, TextStatistics } from './types.js';

// Readability indices: higher scores imply easier reading

const fleschKincaidEaseOf: MetricFormula = (stats) =>
	206.835 - 1.015 * averageWordsPerSentence(stats) - 84.6 * averageSyllablesPerWord(stats);

/** Flesch variant for Dutch */
const doumaOf: MetricFormula = (stats) =>
	206.84 - 0.33 * averageWordsPerSentence(stats) - 0.77 * averageSyllablesPerWord(stats);

/** Flesch variant for French */
const kandelMolesOf: MetricFormula = (stats) =>
	209 - 1.15 * averageWordsPerSentence(stats) - 0.68 * averageSyllablesPerWord(stats);

/** Italian */
const gulpeaseOf: MetricFormula = (stats) =>
	89 + (300 * stats.sentences - 10 * stats.letters) / stats.words;

/** Spanish */
const fernandezHuertaOf: MetricFormula = (stats) => {
	const factor = 100 / stats.words;
	return 206.84 - 0.6 * factor * stats.syllables - 1.02 * factor * stats.sentences;
};

// Grade level estimators: higher scores imply more advanced material

const fleschKincaidGradeOf: MetricFormula = (stats) =>
	0.39 * averageWordsPerSentence(stats) + 11.8 * averageSyllablesPerWord(stats) - 15.59;

const gunningFogOf: MetricFormula = (stats) =>
	0.4 * (averageWordsPerSentence(stats) + percentThreeSyllableLowerCaseWords(stats));

const colemanLiauOf: MetricFormula = (stats) =>
	(5.89 * stats.letters) / stats.words - (0.3 * stats.sentences) / stats.words - 15.8;

const smogOf: MetricFormula = (stats) =>
	1.043 * Math.sqrt(stats.threeSyllableWords * (30 / stats.sentences) + 3.1291);

const ariOf: MetricFormula = (stats) =>
	(4.71 * stats.letters) / stats.words + (0.5 * stats.words) / stats.sentences - 21.43;

// Other indices: higher scores imply harder reading

const lixOf: MetricFormula = (stats) =>
	(100 * stats.sixLetterWords) / stats.words + stats.words / stats.sentences;

/** Generalized LIX */
const rixOf: MetricFormula = (stats) => stats.sixLetterWords / stats.sentences;

export const FORMULAS: Readonly<Record<MetricName, MetricFormula>> = {
	flesch_kincaid_ease: fleschKincaidEaseOf,
	gulpease: gulpeaseOf,
	douma: doumaOf,
	kandel_moles: kandelMolesOf,
	fernandez_huerta: fernandezHuertaOf,
	flesch_kincaid_grade: fleschKincaidGradeOf,
	gunning_fog: gunningFogOf,
	coleman_liau: colemanLiauOf,
	smog: smogOf,
	ari: ariOf,
	lix: lixOf,
	rix: rixOf,
};

export function computeMetric(name: MetricName, stats: TextStatistics): number {
	return FORMULAS[name](stats);
}

const scoreText =
	(formula: MetricFormula) =>
	(text: string): number =>
		formula(analyzeText(text));

/** Flesch reading ease */
export const fleschKincaidEase = scoreText(fleschKincaidEaseOf);
export const douma = scoreText(doumaOf);
export const kandelMoles = scoreText(kandelMolesOf);
export const gulpease = scoreText(gulpeaseOf);
export const fernandezHuerta = scoreText(fernandezHuertaOf);
export const fleschKincaidGrade = scoreText(fleschKincaidGradeOf);
export const gunningFog = scoreText(gunningFogOf);
export const colemanLiau = scoreText(colemanLiauOf);
export const smog = scoreText(smogOf);
/** Automated Readability Index */
export const ari = scoreText(ariOf);
export const lix = scoreText(lixOf);
export const rix = scoreText(rixOf);
