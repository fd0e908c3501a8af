/**
 * graph-reasoner MCP Server
 *
 * MCP server exposing graph queries and rule application:
 * run-query, apply-rules, check-rules.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import {
    ReasonerException,
    createInvalidArgumentError,
    serializeReasonerError,
} from './types/index.js';
import * as Handlers from './handlers/index.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, ServerContainer } from './container.js';

export const VERSION = '1.0.0';

type ToolHandler = (args: unknown, container: ServerContainer) => Promise<unknown>;

export const toolHandlers: Record<string, ToolHandler> = {
    'run-query': Handlers.runQueryHandler,
    'apply-rules': Handlers.applyRulesHandler,
    'check-rules': Handlers.checkRulesHandler,
};

// Kept a type alias so it stays assignable to the SDK's ServerResult
export type ToolCallResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

/**
 * Dispatch a tool call and wrap the outcome as MCP text content
 */
export async function callTool(name: string, args: unknown, container: ServerContainer): Promise<ToolCallResult> {
    try {
        const handler = toolHandlers[name];
        if (!handler) {
            throw createInvalidArgumentError(`Unknown tool: ${name}`, { tool: name });
        }

        const result = await handler(args ?? {}, container);
        return {
            content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        };
    } catch (error) {
        // Handle structured ReasonerException
        if (error instanceof ReasonerException) {
            container.logger.warn(`Tool ${name} failed: ${error.message}`, { code: error.code });
            return {
                content: [{ type: 'text', text: JSON.stringify(serializeReasonerError(error.error), null, 2) }],
                isError: true,
            };
        }

        // Handle generic errors
        const errorMessage = error instanceof Error ? error.message : String(error);
        container.logger.error(`Tool ${name} crashed: ${errorMessage}`);
        return {
            content: [{
                type: 'text',
                text: JSON.stringify({
                    error: errorMessage,
                    type: error instanceof Error ? error.constructor.name : 'Error',
                }),
            }],
            isError: true,
        };
    }
}

/**
 * Create and configure the MCP server
 */
export function createServer(container: ServerContainer = createContainer()): Server {
    const server = new Server(
        {
            name: 'graph-reasoner',
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    // Handle list_tools request
    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    // Handle call_tool request
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return callTool(name, args, container);
    });

    return server;
}

/**
 * Run the MCP server
 */
export async function runServer(): Promise<void> {
    const container = createContainer();
    const server = createServer(container);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    container.logger.info('Server listening on stdio', { version: VERSION });
}
