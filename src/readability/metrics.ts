/**
 * Aggregate readability scoring
 */

import { Loggers } from '../core/logger.js';
import { FORMULAS } from './formulas.js';
import { analyzeText } from './statistics.js';
import type { MetricDescriptor, MetricName, ReadabilityMetrics } from './types.js';
import { METRIC_NAMES } from './types.js';

const logger = Loggers.readability;

export const METRIC_DESCRIPTORS: readonly MetricDescriptor[] = [
	{
		name: 'flesch_kincaid_ease',
		label: 'Flesch reading ease',
		category: 'ease',
		description: 'Sentence length and syllables per word; roughly 0 (hard) to 100 (easy)',
	},
	{
		name: 'gulpease',
		label: 'Gulpease index',
		category: 'ease',
		description: 'Letters and sentences per word, calibrated for Italian; 0 to 100',
	},
	{
		name: 'douma',
		label: 'Douma',
		category: 'ease',
		description: 'Flesch reading ease adapted to Dutch',
	},
	{
		name: 'kandel_moles',
		label: 'Kandel-Moles',
		category: 'ease',
		description: 'Flesch reading ease adapted to French',
	},
	{
		name: 'fernandez_huerta',
		label: 'Fernandez Huerta',
		category: 'ease',
		description: 'Flesch reading ease adapted to Spanish',
	},
	{
		name: 'flesch_kincaid_grade',
		label: 'Flesch-Kincaid grade level',
		category: 'grade',
		description: 'US school grade from sentence length and syllables per word',
	},
	{
		name: 'gunning_fog',
		label: 'Gunning fog index',
		category: 'grade',
		description: 'Grade from sentence length and the share of lower-case words with 3+ syllables',
	},
	{
		name: 'coleman_liau',
		label: 'Coleman-Liau index',
		category: 'grade',
		description: 'Grade from letters and sentences per word',
	},
	{
		name: 'smog',
		label: 'SMOG grade',
		category: 'grade',
		description: 'Grade from words of three or more syllables per 30 sentences',
	},
	{
		name: 'ari',
		label: 'Automated readability index',
		category: 'grade',
		description: 'Grade from letters per word and words per sentence',
	},
	{
		name: 'lix',
		label: 'LIX',
		category: 'difficulty',
		description: 'Words per sentence plus the percentage of words of six or more characters',
	},
	{
		name: 'rix',
		label: 'RIX',
		category: 'difficulty',
		description: 'Words of six or more characters per sentence',
	},
];

export function isMetricName(value: unknown): value is MetricName {
	return typeof value === 'string' && METRIC_NAMES.some((name) => name === value);
}

/**
 * Score a text on every metric, or on the given subset. Counting happens once
 * and is shared by all formulas.
 */
export function readabilityMetrics(text: string): ReadabilityMetrics;
export function readabilityMetrics(
	text: string,
	names: readonly MetricName[]
): Partial<ReadabilityMetrics>;
export function readabilityMetrics(
	text: string,
	names: readonly MetricName[] = METRIC_NAMES
): Partial<ReadabilityMetrics> {
	const stats = analyzeText(text);
	logger.debug('Scoring text', {
		letters: stats.letters,
		words: stats.words,
		sentences: stats.sentences,
		syllables: stats.syllables,
		metrics: names.length,
	});

	const result: Partial<ReadabilityMetrics> = {};
	for (const name of names) {
		result[name] = FORMULAS[name](stats);
	}
	return result;
}
