import {Server} from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ListPromptsRequestSchema,
    type CallToolRequest,
} from "@modelcontextprotocol/sdk/types.js";
import {zodToJsonSchema} from "zod-to-json-schema";

import {EditFileArgsSchema, AppendTextArgsSchema} from './tools/schemas.js';
import * as handlers from './handlers/index.js';
import {ServerResult} from './types.js';
import {VERSION} from './version.js';
import {createErrorResponse, formatError} from './error-handlers.js';
import {logToStderr, logger} from './utils/logger.js';

// Store startup messages to send after initialization
const deferredMessages: string[] = [];
function deferLog(message: string) {
    deferredMessages.push(message);
}

// Function to flush deferred messages after initialization
export function flushDeferredMessages() {
    for (const message of deferredMessages.splice(0)) {
        logger.info(message);
    }
}

export const server = new Server(
    {
        name: "pattern-edit",
        version: VERSION,
    },
    {
        capabilities: {
            tools: {},
            resources: {},
            prompts: {},
            logging: {},
        },
    },
);

server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
        resources: [],
    };
});

server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
        prompts: [],
    };
});

export function listTools() {
    return [
        {
            name: "edit_file",
            description: `
                Edit a text file by locating regions with regular-expression patterns instead of line numbers.

                Takes:
                - file_path: Path of the file, relative to the server's base directory
                - operations: Ordered list of edits. Each edit has a kind:
                  - delete: removes the text matched by start_pattern, or the block from start_pattern
                    through the first end_pattern match after it (the end match is removed too)
                  - replace: same target as delete, replaced by content
                  - insert: adds content right after the match of after_pattern, or right before the
                    match of before_pattern
                - content: Lines of text (one array element per line) for insert and replace
                - expected_content: Exact text the target must currently contain. Strongly recommended;
                  the edit is refused when the text differs in any character, whitespace included.

                Patterns are matched against the whole file (multi-line, ^ and $ match at line breaks,
                case-sensitive, Unicode mode). Escape only regex syntax characters such as \\. \\( \\[ \\\\;
                outside a character class, escapes like \\" \\- or "\\ " make the pattern invalid.
                A start or anchor pattern that matches more than once is rejected as ambiguous: add
                surrounding context until it matches exactly once.

                Edits run in order, each against the text left by the previous one. The first failing
                edit stops the request and nothing is written to the file.`,
            inputSchema: zodToJsonSchema(EditFileArgsSchema),
            annotations: {
                title: "Edit File By Pattern",
                readOnlyHint: false,
                destructiveHint: true,
                openWorldHint: false,
            },
        },
        {
            name: "append_text",
            description: `
                Add lines to the end of a file. Each array element becomes one line.

                With ensure_newline (default true) a missing final line break is added before
                the new lines. Use this instead of edit_file when content only needs adding at the end.`,
            inputSchema: zodToJsonSchema(AppendTextArgsSchema),
            annotations: {
                title: "Append Text",
                readOnlyHint: false,
                destructiveHint: false,
                openWorldHint: false,
            },
        },
    ];
}

server.setRequestHandler(ListToolsRequestSchema, async () => {
    logToStderr('debug', 'Generating tools list...');
    return {
        tools: listTools(),
    };
});

/**
 * Dispatch a tool call. Failures come back as error results, never as
 * rejected promises.
 */
export async function callTool(name: string, args: unknown): Promise<ServerResult> {
    const startTime = Date.now();

    try {
        let result: ServerResult;

        switch (name) {
            case "edit_file":
                result = await handlers.handleEditFile(args);
                break;

            case "append_text":
                result = await handlers.handleAppendText(args);
                break;

            default:
                logger.warning(`Unknown tool requested: ${name}`);
                result = {
                    content: [{type: "text", text: `Error: Unknown tool: ${name}`}],
                    isError: true,
                };
        }

        logToStderr('debug', `${name} finished in ${Date.now() - startTime}ms${result.isError ? ' with errors' : ''}`);
        return result;
    } catch (error) {
        const errorMessage = formatError(error);
        logger.error(`Error in ${name}: ${errorMessage}`);
        return createErrorResponse(errorMessage);
    }
}

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest): Promise<ServerResult> => {
    const {name, arguments: args} = request.params;
    return callTool(name, args);
});

deferLog(`Server ${VERSION} ready`);
