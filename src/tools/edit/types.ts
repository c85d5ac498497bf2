/**
 * Type definitions for the pattern edit engine.
 * Single source of truth for every type shared across the edit modules.
 */

// ═══════════════════════════════════════════════════════════════════════
// Requests
// ═══════════════════════════════════════════════════════════════════════

export type EditKind = 'insert' | 'delete' | 'replace';

/**
 * One requested transformation. Patterns are regular expressions matched
 * against the whole document.
 */
export interface EditSpec {
    kind: EditKind;
    /** Start of the target span (delete/replace). */
    startPattern?: string;
    /** Closes a block started by `startPattern`; the match is part of the span. */
    endPattern?: string;
    /** Insert anchor: content goes right after the match. */
    afterPattern?: string;
    /** Insert anchor: content goes right before the match. */
    beforePattern?: string;
    expectedContent?: string;
    content?: string[];
}

// ═══════════════════════════════════════════════════════════════════════
// Matching
// ═══════════════════════════════════════════════════════════════════════

/** Half-open [start, end) range of UTF-16 offsets into a document. */
export interface Span {
    start: number;
    end: number;
}

/** 1-based, inclusive. */
export interface LineRange {
    start: number;
    end: number;
}

export type PatternRole = 'start' | 'end' | 'after' | 'before';

export type MatchResult =
    | { status: 'found'; span: Span }
    | { status: 'not_found'; pattern: string; role: PatternRole }
    | { status: 'ambiguous'; pattern: string; role: PatternRole; count: number }
    | { status: 'invalid_pattern'; pattern: string; role: PatternRole; reason: string };

export type VerificationResult =
    | { ok: true }
    | { ok: false; expected: string; actual: string };

// ═══════════════════════════════════════════════════════════════════════
// Application
// ═══════════════════════════════════════════════════════════════════════

/** An edit whose target has been located and checked. */
export type ResolvedEdit =
    | { kind: 'delete'; span: Span }
    | { kind: 'replace'; span: Span; content: string[] }
    | { kind: 'insert'; at: number; content: string[] };

export interface AppliedEdit {
    document: string;
    /** Region the edit occupies in the new document (empty for deletes). */
    span: Span;
}

// ═══════════════════════════════════════════════════════════════════════
// Outcomes
// ═══════════════════════════════════════════════════════════════════════

export type EditOutcome =
    | { index: number; status: 'applied'; kind: EditKind; span: Span; lines: LineRange }
    | { index: number; status: 'verification_failed'; span: Span; expected: string; actual: string }
    | { index: number; status: 'pattern_not_found'; pattern: string; role: PatternRole }
    | { index: number; status: 'pattern_ambiguous'; pattern: string; role: PatternRole; count: number }
    | { index: number; status: 'invalid_spec'; reason: string };

export interface EditSessionResult {
    /** Final text, or the text reached when processing stopped. */
    document: string;
    /** One entry per attempted edit, in request order. */
    outcomes: EditOutcome[];
    ok: boolean;
    /** Index of the edit that stopped the session. */
    failedIndex?: number;
}
