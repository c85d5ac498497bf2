import type { MatchResult, PatternRole, Span } from './types.js';

/**
 * Flags every edit pattern is compiled with: global scan, line-anchored
 * `^`/`$`, Unicode code points.
 */
export const PATTERN_FLAGS = 'gmu';

const ESCAPE_HINT = 'in Unicode mode only syntax characters may be escaped, so write " - or a space outside a character class without a backslash';

type CompiledPattern =
    | { ok: true; regex: RegExp }
    | { ok: false; reason: string };

export function compilePattern(pattern: string): CompiledPattern {
    if (pattern === '') {
        return { ok: false, reason: 'Empty patterns are not allowed' };
    }
    try {
        return { ok: true, regex: new RegExp(pattern, PATTERN_FLAGS) };
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return { ok: false, reason: /: Invalid (\w+ )?escape$/i.test(reason) ? `${reason} (${ESCAPE_HINT})` : reason };
    }
}

/**
 * All non-overlapping matches of regex in document, first to last
 */
function findAll(document: string, regex: RegExp): Span[] {
    const spans: Span[] = [];
    for (const match of document.matchAll(regex)) {
        const start = match.index ?? 0;
        spans.push({ start, end: start + match[0].length });
    }
    return spans;
}

/**
 * Resolve a pattern that must match exactly once.
 */
export function locateUnique(document: string, pattern: string, role: PatternRole): MatchResult {
    const compiled = compilePattern(pattern);
    if (!compiled.ok) {
        return { status: 'invalid_pattern', pattern, role, reason: compiled.reason };
    }

    const spans = findAll(document, compiled.regex);
    if (spans.length === 0) {
        return { status: 'not_found', pattern, role };
    }
    if (spans.length > 1) {
        return { status: 'ambiguous', pattern, role, count: spans.length };
    }
    return { status: 'found', span: spans[0] };
}

/**
 * Locate the span denoted by a start pattern and an optional end pattern.
 *
 * Without an end pattern the span is the start pattern's unique match.
 * With one, the span runs to the end of the first end-pattern match that
 * begins at or after the end of the start match.
 */
export function locate(document: string, startPattern: string, endPattern?: string): MatchResult {
    const start = locateUnique(document, startPattern, 'start');
    if (start.status !== 'found' || endPattern === undefined) {
        return start;
    }

    const compiled = compilePattern(endPattern);
    if (!compiled.ok) {
        return { status: 'invalid_pattern', pattern: endPattern, role: 'end', reason: compiled.reason };
    }

    const regex = compiled.regex;
    regex.lastIndex = start.span.end;
    const endMatch = regex.exec(document);
    if (!endMatch) {
        return { status: 'not_found', pattern: endPattern, role: 'end' };
    }

    return {
        status: 'found',
        span: { start: start.span.start, end: endMatch.index + endMatch[0].length },
    };
}

/**
 * Resolve the anchor of an insert edit. Same uniqueness rule as `locate`.
 */
export function locateAnchor(document: string, pattern: string, role: 'after' | 'before'): MatchResult {
    return locateUnique(document, pattern, role);
}
