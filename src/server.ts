import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
    Tool
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import BookingBlotter from './booking-blotter.js';
import { Config } from './config.js';
import { NameList, loadNameListCsv, parseNameList } from './core/name-list.js';
import { ConfigError, ExportError, RunError, errorMessage } from './errors.js';
import { logger } from './logger.js';

const SearchBookingsArgs = z.object({
    names: z.union([z.string(), z.array(z.string())]).optional(),
    namesFile: z.string().min(1).optional(),
    concurrency: z.number().int().min(1).max(10).optional(),
    confirmLargeBatch: z.boolean().optional(),
    wait: z.boolean().optional()
}).refine(args => args.names !== undefined || args.namesFile !== undefined, {
    message: 'Either names or namesFile is required'
});

const RunIdArgs = z.object({
    runId: z.string().min(1)
});

const ExportResultsArgs = z.object({
    runId: z.string().min(1),
    format: z.enum(['csv', 'json']),
    outputPath: z.string().min(1).optional(),
    filter: z.object({
        text: z.string().optional(),
        field: z.string().optional(),
        status: z.enum(['In Custody', 'Released', 'Unknown']).optional()
    }).optional(),
    sort: z.object({
        field: z.string().min(1),
        ascending: z.boolean().optional()
    }).optional()
});

export const TOOLS: Tool[] = [
    {
        name: 'search_bookings',
        description: 'Search the booking blotter for a list of names ("Lastname, Firstname") in parallel',
        inputSchema: {
            type: 'object',
            properties: {
                names: {
                    oneOf: [
                        { type: 'string' },
                        { type: 'array', items: { type: 'string' } }
                    ],
                    description: 'Names as "Lastname, Firstname", one per line or one per array entry'
                },
                namesFile: {
                    type: 'string',
                    description: 'CSV file with last names in the first column and first names in the second'
                },
                concurrency: {
                    type: 'number',
                    description: 'Maximum number of parallel browser sessions',
                    minimum: 1,
                    maximum: 10
                },
                confirmLargeBatch: {
                    type: 'boolean',
                    description: 'Required to search more names than the large batch threshold'
                },
                wait: {
                    type: 'boolean',
                    description: 'Wait for the run to finish and return its report'
                }
            }
        }
    },
    {
        name: 'search_status',
        description: 'Report progress, per-name outcome and statistics for a search run',
        inputSchema: {
            type: 'object',
            properties: {
                runId: { type: 'string', description: 'Run id returned by search_bookings' }
            },
            required: ['runId']
        }
    },
    {
        name: 'cancel_search',
        description: 'Cancel a pending or running search run',
        inputSchema: {
            type: 'object',
            properties: {
                runId: { type: 'string', description: 'Run id returned by search_bookings' }
            },
            required: ['runId']
        }
    },
    {
        name: 'export_results',
        description: 'Export the booking records of a finished run to CSV or JSON',
        inputSchema: {
            type: 'object',
            properties: {
                runId: { type: 'string', description: 'Run id returned by search_bookings' },
                format: { type: 'string', enum: ['csv', 'json'] },
                outputPath: { type: 'string', description: 'Destination file; defaults to the output directory' },
                filter: {
                    type: 'object',
                    properties: {
                        text: { type: 'string' },
                        field: { type: 'string' },
                        status: { type: 'string', enum: ['In Custody', 'Released', 'Unknown'] }
                    }
                },
                sort: {
                    type: 'object',
                    properties: {
                        field: { type: 'string' },
                        ascending: { type: 'boolean' }
                    },
                    required: ['field']
                }
            },
            required: ['runId', 'format']
        }
    }
];

export type ToolResponse = {
    content: Array<{ type: 'text'; text: string }>;
};

function respond(value: unknown): ToolResponse {
    return {
        content: [
            {
                type: 'text',
                text: JSON.stringify(value, null, 2)
            }
        ]
    };
}

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
        throw new McpError(
            ErrorCode.InvalidParams,
            parsed.error.errors.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ')
        );
    }
    return parsed.data;
}

async function readNames(names: string | string[] | undefined, namesFile: string | undefined): Promise<NameList> {
    if (namesFile) {
        return loadNameListCsv(namesFile);
    }
    const text = Array.isArray(names) ? names.join('\n') : (names ?? '');
    return parseNameList(text);
}

function notFound(runId: string): McpError {
    return new McpError(ErrorCode.InvalidParams, `Unknown run: ${runId}`);
}

export async function callTool(
    blotter: BookingBlotter,
    config: Config,
    name: string,
    args: unknown
): Promise<ToolResponse> {
    switch (name) {
        case 'search_bookings': {
            const { names, namesFile, concurrency, confirmLargeBatch, wait } = parseArgs(SearchBookingsArgs, args);
            const list = await readNames(names, namesFile);
            if (list.queries.length === 0) {
                throw new McpError(ErrorCode.InvalidParams, 'No valid names given; expected "Lastname, Firstname"');
            }

            const threshold = config.search.largeBatchThreshold;
            if (list.queries.length > threshold && !confirmLargeBatch) {
                throw new McpError(
                    ErrorCode.InvalidParams,
                    `${list.queries.length} names exceeds ${threshold}; set confirmLargeBatch to run this many searches`
                );
            }

            const runId = blotter.startSearch(list.queries, { concurrency });
            const report = wait ? await blotter.waitForRun(runId) : blotter.getRunReport(runId);
            return respond({ runId, queued: list.queries.length, rejected: list.rejected, report });
        }

        case 'search_status': {
            const { runId } = parseArgs(RunIdArgs, args);
            const report = blotter.getRunReport(runId);
            if (!report) {
                throw notFound(runId);
            }
            return respond(report);
        }

        case 'cancel_search': {
            const { runId } = parseArgs(RunIdArgs, args);
            if (!blotter.getRunReport(runId)) {
                throw notFound(runId);
            }
            return respond({ runId, cancelled: blotter.cancel(runId) });
        }

        case 'export_results': {
            const { runId, format, outputPath, filter, sort } = parseArgs(ExportResultsArgs, args);
            const result = await blotter.exportRun(runId, { format, outputPath, filter, sort });
            return respond(result);
        }

        default:
            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
}

function toMcpError(error: unknown): McpError {
    if (error instanceof McpError) {
        return error;
    }
    if (error instanceof RunError || error instanceof ExportError || error instanceof ConfigError) {
        return new McpError(ErrorCode.InvalidRequest, error.message);
    }
    return new McpError(ErrorCode.InternalError, errorMessage(error));
}

export function createServer(blotter: BookingBlotter, config: Config): Server {
    const server = new Server(
        {
            name: config.server.name,
            version: config.server.version
        },
        {
            capabilities: {
                tools: {}
            }
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        try {
            return await callTool(blotter, config, request.params.name, request.params.arguments);
        } catch (error) {
            logger.error(`Error executing ${request.params.name}: ${errorMessage(error)}`, 'server');
            throw toMcpError(error);
        }
    });

    server.onerror = (error) => {
        logger.error(`[MCP Error] ${errorMessage(error)}`, 'server');
    };

    return server;
}
