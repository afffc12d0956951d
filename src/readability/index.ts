export { preprocess, toAscii } from './preprocess.js';
export {
	avgSyllablesPerWord,
	avgWordsPerSentence,
	letterCount,
	percentThreeSyllableWords,
	sentenceCount,
	sixLetterWordCount,
	syllableCount,
	threeSyllableWordCount,
	tokenize,
	totalSyllables,
	wordCount,
} from './counters.js';
export { analyzeText } from './statistics.js';
export {
	FORMULAS,
	ari,
	colemanLiau,
	computeMetric,
	douma,
	fernandezHuerta,
	fleschKincaidEase,
	fleschKincaidGrade,
	gulpease,
	gunningFog,
	kandelMoles,
	lix,
	rix,
	smog,
} from './formulas.js';
export { METRIC_DESCRIPTORS, isMetricName, readabilityMetrics } from './metrics.js';
export { METRIC_NAMES } from './types.js';
export type {
	MetricCategory,
	MetricDescriptor,
	MetricFormula,
	MetricName,
	ReadabilityMetrics,
	TextStatistics,
} from './types.js';
