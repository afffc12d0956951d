/**
 * Readability tool handlers
 */

import { ErrorCode, createError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { isStringArray, validateInput } from '../core/validation.js';
import {
	METRIC_DESCRIPTORS,
	METRIC_NAMES,
	analyzeText,
	computeMetric,
	isMetricName,
	preprocess,
	readabilityMetrics,
} from '../readability/index.js';
import type { MetricName } from '../readability/index.js';
import {
	averageSyllablesPerWord,
	averageWordsPerSentence,
	percentThreeSyllableLowerCaseWords,
} from '../readability/statistics.js';
import type { ValidationSchema } from '../types/index.js';
import type { HandlerContext, HandlerResult, ToolDefinition } from './types.js';
import { getStringArg, jsonResult } from './types.js';

const logger = getLogger('handlers:readability');

const textProperty = {
	type: 'string',
	description: 'Text to score; HTML markup is accepted',
};

function textSchema(context: HandlerContext): ValidationSchema {
	return {
		text: { type: 'string', required: true, maxLength: context.config.maxTextLength },
	};
}

function readText(args: Record<string, unknown>, context: HandlerContext): string {
	validateInput(args, textSchema(context));
	return getStringArg(args, 'text');
}

export const readabilityMetricsHandler: ToolDefinition = {
	name: 'readability_metrics',
	description: 'Compute readability scores (Flesch-Kincaid, Gunning Fog, SMOG, LIX and more) for a text',
	inputSchema: {
		type: 'object',
		properties: {
			text: textProperty,
			metrics: {
				type: 'array',
				items: { type: 'string', enum: [...METRIC_NAMES] },
				description: 'Metrics to compute; all of them when omitted',
			},
		},
		required: ['text'],
	},
	handler: async (args, context): Promise<HandlerResult> => {
		validateInput(args, {
			...textSchema(context),
			metrics: {
				type: 'array',
				required: false,
				custom: (value) => {
					if (!isStringArray(value)) return 'metrics must be an array of metric names';
					const unknown = value.filter((name) => !isMetricName(name));
					return (
						unknown.length === 0 ||
						`Unknown metrics: ${unknown.join(', ')} (expected one of: ${METRIC_NAMES.join(', ')})`
					);
				},
			},
		});
		const text = getStringArg(args, 'text');

		const requested = args.metrics;
		const names: readonly MetricName[] = Array.isArray(requested)
			? requested.filter(isMetricName)
			: METRIC_NAMES;

		const scores = readabilityMetrics(text, names);
		logger.debug('Readability metrics computed', { metrics: names.length, length: text.length });
		return jsonResult(scores);
	},
};

export const readabilityScoreHandler: ToolDefinition = {
	name: 'readability_score',
	description: 'Compute a single readability score for a text',
	inputSchema: {
		type: 'object',
		properties: {
			text: textProperty,
			metric: {
				type: 'string',
				enum: [...METRIC_NAMES],
				description: 'Metric to compute',
			},
		},
		required: ['text', 'metric'],
	},
	handler: async (args, context): Promise<HandlerResult> => {
		validateInput(args, {
			...textSchema(context),
			metric: { type: 'string', required: true, enum: METRIC_NAMES },
		});
		const text = getStringArg(args, 'text');
		const metric = args.metric;
		if (!isMetricName(metric)) {
			throw createError(ErrorCode.INVALID_INPUT, { metric }, `Unknown metric: ${String(metric)}`);
		}

		const score = computeMetric(metric, analyzeText(text));
		return jsonResult({ metric, score });
	},
};

export const textStatisticsHandler: ToolDefinition = {
	name: 'text_statistics',
	description: 'Letter, word, sentence and syllable counts used by the readability formulas',
	inputSchema: {
		type: 'object',
		properties: { text: textProperty },
		required: ['text'],
	},
	handler: async (args, context): Promise<HandlerResult> => {
		const stats = analyzeText(readText(args, context));
		return jsonResult({
			letters: stats.letters,
			words: stats.words,
			sentences: stats.sentences,
			syllables: stats.syllables,
			sixLetterWords: stats.sixLetterWords,
			threeSyllableWords: stats.threeSyllableWords,
			averageWordsPerSentence: averageWordsPerSentence(stats),
			averageSyllablesPerWord: averageSyllablesPerWord(stats),
			percentThreeSyllableWords: percentThreeSyllableLowerCaseWords(stats),
		});
	},
};

export const preprocessTextHandler: ToolDefinition = {
	name: 'preprocess_text',
	description: 'Normalize text the way the readability formulas see it (markup stripped, sentences unified)',
	inputSchema: {
		type: 'object',
		properties: { text: textProperty },
		required: ['text'],
	},
	handler: async (args, context): Promise<HandlerResult> => {
		const canonical = preprocess(readText(args, context));
		return {
			content: [{ type: 'text', text: canonical }],
			data: canonical,
		};
	},
};

export const listReadabilityMetricsHandler: ToolDefinition = {
	name: 'list_readability_metrics',
	description: 'Describe the available readability metrics',
	inputSchema: {
		type: 'object',
		properties: {},
	},
	handler: async (): Promise<HandlerResult> =>
		jsonResult(
			METRIC_DESCRIPTORS.map(({ name, label, category, description }) => ({
				name,
				label,
				category,
				description,
			}))
		),
};

export const readabilityHandlers: ToolDefinition[] = [
	readabilityMetricsHandler,
	readabilityScoreHandler,
	textStatisticsHandler,
	preprocessTextHandler,
	listReadabilityMetricsHandler,
];
