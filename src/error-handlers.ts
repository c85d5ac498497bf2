import { ZodError } from 'zod';
import { ServerResult } from './types.js';
import { logger } from './utils/logger.js';

/**
 * Build an error result for a tool call
 */
export function createErrorResponse(message: string): ServerResult {
    logger.debug(`Tool error: ${message}`);
    return {
        content: [{ type: "text", text: `Error: ${message}` }],
        isError: true,
    };
}

/**
 * Readable one-line message for anything a handler may throw
 */
export function formatError(error: unknown): string {
    if (error instanceof ZodError) {
        const issues = error.issues.map(issue => {
            const where = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
            return `${where}: ${issue.message}`;
        });
        return `Invalid arguments: ${issues.join('; ')}`;
    }
    return error instanceof Error ? error.message : String(error);
}
