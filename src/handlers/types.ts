/**
 * Handler types and interfaces
 */

import type { ServerConfig } from '../core/config.js';
import { ErrorCode, createError } from '../core/errors.js';
import type { JSONValue } from '../types/index.js';

export interface HandlerContext {
	config: ServerConfig;
}

export interface TextContent {
	type: 'text';
	text: string;
}

export interface HandlerResult {
	content: TextContent[];
	/** Structured payload, also rendered as JSON in the text block */
	data?: JSONValue;
	isError?: boolean;
}

export type ToolHandler = (
	args: Record<string, unknown>,
	context: HandlerContext
) => Promise<HandlerResult>;

export interface ToolDefinition {
	name: string;
	description: string;
	inputSchema: {
		type: 'object';
		properties: Record<string, JSONValue>;
		required?: string[];
	};
	handler: ToolHandler;
}

export class HandlerError extends Error {
	constructor(
		message: string,
		public code: string = 'HANDLER_ERROR',
		public details?: unknown
	) {
		super(message);
		this.name = 'HandlerError';
	}
}

export function jsonResult(data: JSONValue): HandlerResult {
	return {
		content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
		data,
	};
}

export function getStringArg(args: Record<string, unknown>, key: string): string {
	const value = args[key];
	if (typeof value !== 'string') {
		throw createError(
			ErrorCode.TYPE_MISMATCH,
			{ key, expectedType: 'string', actualType: typeof value },
			`Expected string for ${key}, got ${typeof value}`
		);
	}
	return value;
}
