import { formatContentBlock } from './edit/edit-applier.js';
import { detectLineEnding, endsWithLineBreak } from '../utils/lineEndingHandler.js';
import { readTextFile, writeTextFile } from './filesystem.js';

/**
 * Append lines to the end of a document. Every appended line ends with the
 * document's line ending. With ensureNewline, a non-empty document that
 * lacks a final line break gets one first.
 */
export function appendLines(document: string, lines: readonly string[], ensureNewline: boolean = true): string {
    if (lines.length === 0) {
        throw new Error('No content provided to append');
    }

    const lineEnding = detectLineEnding(document);
    const needsNewline = ensureNewline && document.length > 0 && !endsWithLineBreak(document);

    return document + (needsNewline ? lineEnding : '') + formatContentBlock(lines, lineEnding) + lineEnding;
}

/**
 * Append lines to a file that has already passed path validation
 */
export async function appendText(filePath: string, lines: readonly string[], ensureNewline: boolean = true): Promise<void> {
    const current = await readTextFile(filePath);
    await writeTextFile(filePath, appendLines(current, lines, ensureNewline));
}
