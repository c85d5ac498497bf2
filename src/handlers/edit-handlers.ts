import { appendText } from '../tools/append.js';
import { performPatternEdits } from '../tools/edit.js';
import { validatePath, withFileLock } from '../tools/filesystem.js';
import { AppendTextArgsSchema, EditFileArgsSchema } from '../tools/schemas.js';
import { ServerResult } from '../types.js';
import { logger } from '../utils/logger.js';

/**
 * Handle edit_file command
 * Applies ordered pattern edits with optional content verification
 */
export async function handleEditFile(args: unknown): Promise<ServerResult> {
    const parsed = EditFileArgsSchema.parse(args);
    return performPatternEdits(parsed.file_path, parsed.operations);
}

/**
 * Handle append_text command
 */
export async function handleAppendText(args: unknown): Promise<ServerResult> {
    const parsed = AppendTextArgsSchema.parse(args);
    if (parsed.content.length === 0) {
        throw new Error('No content provided to append');
    }

    const filePath = await validatePath(parsed.file_path);
    await withFileLock(filePath, () => appendText(filePath, parsed.content, parsed.ensure_newline));

    const count = parsed.content.length;
    logger.info(`Appended ${count} line(s) to ${parsed.file_path}`);
    return {
        content: [{
            type: "text",
            text: `Successfully appended ${count} line${count > 1 ? 's' : ''} to: ${parsed.file_path}`,
        }],
    };
}
