/**
 * Readability metric names and result shapes
 */

export const METRIC_NAMES = [
	'flesch_kincaid_ease',
	'gulpease',
	'douma',
	'kandel_moles',
	'fernandez_huerta',
	'flesch_kincaid_grade',
	'gunning_fog',
	'coleman_liau',
	'smog',
	'ari',
	'lix',
	'rix',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type ReadabilityMetrics = Record<MetricName, number>;

/**
 * - `ease`: higher scores read more easily
 * - `grade`: school grade level, higher is more advanced
 * - `difficulty`: higher scores read harder, not a grade level
 */
export type MetricCategory = 'ease' | 'grade' | 'difficulty';

export interface MetricDescriptor {
	name: MetricName;
	label: string;
	category: MetricCategory;
	description: string;
}

/**
 * Counts gathered in a single pass over canonical text.
 */
export interface TextStatistics {
	canonical: string;
	letters: number;
	/** Spaces plus one, at least 1 */
	words: number;
	/** At least 1 */
	sentences: number;
	syllables: number;
	sixLetterWords: number;
	/** Six-letter words that do not start with a capital */
	sixLetterLowerCaseWords: number;
	threeSyllableWords: number;
	/** Three-syllable words that do not start with a capital */
	threeSyllableLowerCaseWords: number;
}

export type MetricFormula = (stats: TextStatistics) => number;
