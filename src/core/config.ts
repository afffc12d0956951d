/**
 * Environment configuration
 * Parses and validates the variables the server reads at startup
 */

import { getLogger } from './logger.js';

const logger = getLogger('config');

export const SERVER_NAME = 'readability-mcp';
export const SERVER_VERSION = '1.0.0';

/** 10M characters */
export const DEFAULT_MAX_TEXT_LENGTH = 10_000_000;

export interface ServerConfig {
	name: string;
	version: string;
	maxTextLength: number;
	quiet: boolean;
}

/**
 * Safely parse a non-negative integer environment variable
 */
export function parseEnvInt(value: string | undefined, defaultValue: number, name: string): number {
	if (!value) return defaultValue;

	const trimmed = value.trim();
	if (!/^\d+$/.test(trimmed)) {
		logger.warn(`Invalid integer for ${name}: "${value}", using default ${defaultValue}`);
		return defaultValue;
	}

	const parsed = parseInt(trimmed, 10);
	if (!Number.isSafeInteger(parsed)) {
		logger.warn(`${name} out of range: ${trimmed}, using default ${defaultValue}`);
		return defaultValue;
	}

	return parsed;
}

/**
 * Safely parse boolean environment variable
 */
export function parseEnvBool(value: string | undefined, defaultValue: boolean): boolean {
	if (!value) return defaultValue;

	const lower = value.toLowerCase().trim();
	if (['true', '1', 'yes', 'on'].includes(lower)) return true;
	if (['false', '0', 'no', 'off'].includes(lower)) return false;

	logger.warn(`Invalid boolean value: "${value}", using default ${defaultValue}`);
	return defaultValue;
}

/**
 * Get validated server configuration
 */
export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
	const config: ServerConfig = {
		name: SERVER_NAME,
		version: SERVER_VERSION,
		maxTextLength: parseEnvInt(
			env.READABILITY_MAX_TEXT_LENGTH,
			DEFAULT_MAX_TEXT_LENGTH,
			'READABILITY_MAX_TEXT_LENGTH'
		),
		quiet: parseEnvBool(env.READABILITY_QUIET, false),
	};

	if (config.maxTextLength === 0) {
		logger.warn('READABILITY_MAX_TEXT_LENGTH is 0, using default');
		config.maxTextLength = DEFAULT_MAX_TEXT_LENGTH;
	}

	logger.debug('Server configuration loaded', {
		maxTextLength: config.maxTextLength,
		quiet: config.quiet,
	});

	return config;
}
