/**
 * Handler registry and dispatcher
 */

import { AppError } from '../core/errors.js';
import { isObject } from '../core/validation.js';
import { readabilityHandlers } from './readability-handlers.js';
import type { HandlerContext, HandlerResult, ToolDefinition } from './types.js';
import { HandlerError } from './types.js';

const allHandlers: ToolDefinition[] = [...readabilityHandlers];

// Create handler map for fast lookup
const handlerMap = new Map<string, ToolDefinition>();
for (const handler of allHandlers) {
	handlerMap.set(handler.name, handler);
}

function getHandler(toolName: string): ToolDefinition {
	const handler = handlerMap.get(toolName);
	if (!handler) {
		throw new HandlerError(`Unknown tool: ${toolName}`, 'UNKNOWN_TOOL');
	}
	return handler;
}

/**
 * Get all tool definitions
 */
export function getAllTools(): Array<Omit<ToolDefinition, 'handler'>> {
	return allHandlers.map((h) => ({
		name: h.name,
		description: h.description,
		inputSchema: h.inputSchema,
	}));
}

/**
 * Execute a tool handler
 */
export async function executeHandler(
	toolName: string,
	args: Record<string, unknown>,
	context: HandlerContext
): Promise<HandlerResult> {
	const handler = getHandler(toolName);

	try {
		return await handler.handler(args, context);
	} catch (error) {
		if (error instanceof HandlerError) {
			throw error;
		}

		if (error instanceof AppError) {
			throw new HandlerError(error.message, error.code, error.details);
		}

		// Wrap unexpected errors
		throw new HandlerError(
			`Handler execution failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
			'HANDLER_ERROR',
			error
		);
	}
}

/**
 * Validate handler arguments against the tool's input schema
 */
export function validateHandlerArgs(toolName: string, args: Record<string, unknown>): void {
	const handler = getHandler(toolName);

	// Check required properties
	const required = handler.inputSchema.required || [];
	for (const prop of required) {
		if (!(prop in args) || args[prop] === undefined) {
			throw new HandlerError(`Missing required argument: ${prop}`, 'MISSING_ARGUMENT');
		}
	}

	// Validate property types
	const properties = handler.inputSchema.properties;
	for (const [key, value] of Object.entries(args)) {
		const schema = properties[key];
		if (!isObject(schema)) {
			continue; // Allow extra properties
		}

		const actualType = Array.isArray(value) ? 'array' : typeof value;
		if (typeof schema.type === 'string' && actualType !== schema.type) {
			throw new HandlerError(
				`Invalid type for ${key}: expected ${schema.type}, got ${actualType}`,
				'INVALID_TYPE'
			);
		}

		// Validate enum values
		const options: readonly unknown[] | undefined = Array.isArray(schema.enum) ? schema.enum : undefined;
		if (options && !options.includes(value)) {
			throw new HandlerError(
				`Invalid value for ${key}: must be one of ${options.join(', ')}`,
				'INVALID_VALUE'
			);
		}
	}
}

export { HandlerError } from './types.js';
export type { HandlerContext, HandlerResult, ToolDefinition } from './types.js';
