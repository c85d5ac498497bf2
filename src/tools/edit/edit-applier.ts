import {
    detectLineEnding,
    endsWithLineBreak,
    normalizeLineEndings,
    startsWithLineBreak,
    stripTrailingLineBreak,
    trailingLineBreak,
    type LineEndingStyle,
} from '../../utils/lineEndingHandler.js';
import { EditEngineError, EditEngineErrorCode } from './errors.js';
import type { AppliedEdit, ResolvedEdit, Span } from './types.js';

/**
 * Join content lines into one block using the document's line ending.
 * A line may carry its own trailing break; it is dropped so the seam is
 * decided here and nowhere else.
 */
export function formatContentBlock(lines: readonly string[], lineEnding: LineEndingStyle): string {
    return lines
        .map(line => stripTrailingLineBreak(normalizeLineEndings(line, lineEnding)))
        .join(lineEnding);
}

function assertSpan(document: string, span: Span): void {
    if (span.start < 0 || span.end < span.start || span.end > document.length) {
        throw new EditEngineError(
            `Span [${span.start}, ${span.end}) is outside a document of length ${document.length}`,
            EditEngineErrorCode.INVALID_SPAN,
            { span, length: document.length }
        );
    }
}

function splice(document: string, span: Span, text: string): string {
    return document.slice(0, span.start) + text + document.slice(span.end);
}

function applyDelete(document: string, span: Span): AppliedEdit {
    return {
        document: splice(document, span, ''),
        span: { start: span.start, end: span.start },
    };
}

function applyReplace(document: string, span: Span, lines: readonly string[], lineEnding: LineEndingStyle): AppliedEdit {
    const removed = document.slice(span.start, span.end);
    // Replaced lines keep their own separator style, which can differ from the
    // rest of a mixed document.
    const seam = trailingLineBreak(removed);
    const ownStyle = /\r|\n/.test(removed) ? detectLineEnding(removed) : lineEnding;
    let block = formatContentBlock(lines, ownStyle);
    if (lines.length > 0 && seam !== null) {
        block += seam;
    }

    return {
        document: splice(document, span, block),
        span: { start: span.start, end: span.start + block.length },
    };
}

function applyInsert(document: string, at: number, lines: readonly string[], lineEnding: LineEndingStyle): AppliedEdit {
    const before = document.slice(0, at);
    const after = document.slice(at);
    const block = formatContentBlock(lines, lineEnding);

    const atLineStart = at === 0 || endsWithLineBreak(before);
    const lead = atLineStart ? '' : lineEnding;
    const trail = !atLineStart && (after.length === 0 || startsWithLineBreak(after)) ? '' : lineEnding;

    return {
        document: before + lead + block + trail + after,
        span: { start: at + lead.length, end: at + lead.length + block.length },
    };
}

/**
 * Produce the document that results from one resolved edit. Pure: no I/O
 * and no state outside the arguments.
 */
export function applyEdit(document: string, edit: ResolvedEdit): AppliedEdit {
    const lineEnding = detectLineEnding(document);

    switch (edit.kind) {
        case 'delete':
            assertSpan(document, edit.span);
            return applyDelete(document, edit.span);

        case 'replace':
            assertSpan(document, edit.span);
            return applyReplace(document, edit.span, edit.content, lineEnding);

        case 'insert':
            assertSpan(document, { start: edit.at, end: edit.at });
            return applyInsert(document, edit.at, edit.content, lineEnding);
    }
}
