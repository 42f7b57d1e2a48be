/**
 * go-annotate MCP Server
 *
 * MCP server exposing GO molecular-function annotation and rule-based
 * protein classification as tools. One term graph is kept for the life
 * of the process.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import {
    AnnotationException,
    createInvalidInputError,
    serializeAnnotationError,
} from './types/index.js';
import * as Handlers from './handlers/index.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, AnnotationContainer } from './container.js';
import { VERSION } from './version.js';

type ToolHandler = (args: unknown, container: AnnotationContainer) => Promise<object>;

const toolHandlers: Record<string, ToolHandler> = {
    'annotate-proteins': Handlers.annotateProteinsHandler,
    'classify-proteins': Handlers.classifyProteinsHandler,
    'get-term': Handlers.getTermHandler,
    'check-rules': Handlers.checkRulesHandler,
};

/**
 * Create and configure the MCP server
 */
export function createServer(container: AnnotationContainer = createContainer()): Server {
    const server = new Server(
        {
            name: 'go-annotate',
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

        try {
            const handler = toolHandlers[name];
            if (!handler) {
                throw createInvalidInputError(`Unknown tool: ${name}`);
            }

            const result = await handler(args ?? {}, container);

            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(result, null, 2),
                    },
                ],
            };
        } catch (error) {
            // Handle structured AnnotationException
            if (error instanceof AnnotationException) {
                return {
                    content: [
                        {
                            type: 'text',
                            text: JSON.stringify(serializeAnnotationError(error.error), null, 2),
                        },
                    ],
                    isError: true,
                };
            }

            // Handle generic errors
            const errorMessage = error instanceof Error ? error.message : String(error);
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify({
                            error: errorMessage,
                            type: error instanceof Error ? error.constructor.name : 'Error',
                        }),
                    },
                ],
                isError: true,
            };
        }
    });

    return server;
}

/**
 * Run the MCP server over stdio
 */
export async function runServer(): Promise<void> {
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
}
