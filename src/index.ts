#!/usr/bin/env node
/**
 * Readability MCP Server entry point
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { getServerConfig } from './core/config.js';
import { handleError } from './core/errors.js';
import { Loggers } from './core/logger.js';
import {
	executeHandler,
	getAllTools,
	HandlerError,
	validateHandlerArgs,
	type HandlerContext,
} from './handlers/index.js';

const logger = Loggers.main;

const context: HandlerContext = {
	config: getServerConfig(),
};

const server = new Server(
	{
		name: context.config.name,
		version: context.config.version,
	},
	{
		capabilities: {
			tools: {},
		},
	}
);

// Handle tool listing
server.setRequestHandler(ListToolsRequestSchema, async () => ({
	tools: getAllTools(),
}));

// Handle tool execution
server.setRequestHandler(CallToolRequestSchema, async (request) => {
	const { name, arguments: args = {} } = request.params;

	try {
		validateHandlerArgs(name, args);
		const result = await executeHandler(name, args, context);

		return {
			content: result.content,
			isError: result.isError,
		};
	} catch (error) {
		if (error instanceof HandlerError) {
			Loggers.handlers.warn('Tool call rejected', { tool: name, code: error.code });
			return {
				content: [{ type: 'text', text: `Error: ${error.message}` }],
				isError: true,
			};
		}

		// Log unexpected errors
		logger.error('Unexpected error', { tool: name, error: handleError(error, name) });

		return {
			content: [{ type: 'text', text: 'An unexpected error occurred' }],
			isError: true,
		};
	}
});

async function main(): Promise<void> {
	const transport = new StdioServerTransport();
	await server.connect(transport);
	if (!context.config.quiet) {
		logger.info('Readability MCP Server started', {
			version: context.config.version,
			tools: getAllTools().length,
		});
	}
}

// Handle graceful shutdown
process.on('SIGINT', () => {
	logger.info('Shutting down...');
	server
		.close()
		.catch((error: unknown) => logger.error('Error while closing server', { error: handleError(error) }))
		.finally(() => process.exit(0));
});

main().catch((error: unknown) => {
	logger.fatal('Failed to start server', { error: handleError(error) });
	process.exit(1);
});
