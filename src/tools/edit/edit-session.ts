import { applyEdit } from './edit-applier.js';
import { EditEngineError, EditEngineErrorCode } from './errors.js';
import { locate, locateAnchor } from './pattern-matcher.js';
import type {
    EditOutcome,
    EditSessionResult,
    EditSpec,
    MatchResult,
    ResolvedEdit,
    Span,
} from './types.js';
import { verify } from './verifier.js';
import { lineNumberAt } from '../../utils/lineEndingHandler.js';

/**
 * Structural check of one edit. Returns the reason it cannot run, or null.
 */
export function validateEditSpec(spec: EditSpec): string | null {
    const kind: string = spec.kind;
    const patterns: Array<[keyof EditSpec, string | undefined]> = [
        ['startPattern', spec.startPattern],
        ['endPattern', spec.endPattern],
        ['afterPattern', spec.afterPattern],
        ['beforePattern', spec.beforePattern],
    ];
    for (const [field, value] of patterns) {
        if (value === '') {
            return `${field} must not be empty`;
        }
    }

    switch (spec.kind) {
        case 'delete':
        case 'replace':
            if (spec.startPattern === undefined) {
                return `${spec.kind} requires startPattern`;
            }
            if (spec.afterPattern !== undefined || spec.beforePattern !== undefined) {
                return `${spec.kind} does not take afterPattern or beforePattern`;
            }
            if (spec.kind === 'delete' && spec.content !== undefined) {
                return 'delete does not take content';
            }
            if (spec.kind === 'replace' && spec.content === undefined) {
                return 'replace requires content';
            }
            return null;

        case 'insert':
            if (spec.startPattern !== undefined || spec.endPattern !== undefined) {
                return 'insert takes afterPattern or beforePattern, not startPattern/endPattern';
            }
            if (spec.afterPattern === undefined && spec.beforePattern === undefined) {
                return 'insert requires afterPattern or beforePattern';
            }
            if (spec.afterPattern !== undefined && spec.beforePattern !== undefined) {
                return 'insert takes only one of afterPattern and beforePattern';
            }
            if (spec.content === undefined || spec.content.length === 0) {
                return 'insert requires at least one content line';
            }
            return null;

        default:
            return `Unknown edit kind: ${kind}`;
    }
}

/**
 * Turn a failed match into the outcome reported for the edit
 */
function matchFailure(index: number, match: Exclude<MatchResult, { status: 'found' }>): EditOutcome {
    switch (match.status) {
        case 'not_found':
            return { index, status: 'pattern_not_found', pattern: match.pattern, role: match.role };
        case 'ambiguous':
            return { index, status: 'pattern_ambiguous', pattern: match.pattern, role: match.role, count: match.count };
        case 'invalid_pattern':
            return { index, status: 'invalid_spec', reason: `Invalid ${match.role} pattern '${match.pattern}': ${match.reason}` };
    }
}

type Resolution =
    | { ok: true; span: Span; edit: ResolvedEdit }
    | { ok: false; outcome: EditOutcome };

function resolve(document: string, spec: EditSpec, index: number): Resolution {
    if (spec.kind === 'insert') {
        const role = spec.afterPattern !== undefined ? 'after' : 'before';
        const pattern = spec.afterPattern ?? spec.beforePattern ?? '';
        const match = locateAnchor(document, pattern, role);
        if (match.status !== 'found') {
            return { ok: false, outcome: matchFailure(index, match) };
        }
        const at = role === 'after' ? match.span.end : match.span.start;
        return { ok: true, span: match.span, edit: { kind: 'insert', at, content: spec.content ?? [] } };
    }

    const match = locate(document, spec.startPattern ?? '', spec.endPattern);
    if (match.status !== 'found') {
        return { ok: false, outcome: matchFailure(index, match) };
    }
    const edit: ResolvedEdit = spec.kind === 'replace'
        ? { kind: 'replace', span: match.span, content: spec.content ?? [] }
        : { kind: 'delete', span: match.span };
    return { ok: true, span: match.span, edit };
}

function describeValue(value: unknown): string {
    return value === null ? 'null' : typeof value;
}

/**
 * Applies an ordered list of edits to one document.
 *
 * Each edit is resolved against the text produced by the edits before it,
 * so positions never need shifting. The first failing edit stops the run;
 * edits applied before it stay applied in the returned document.
 *
 * A session runs once.
 */
export class EditSession {
    private document: string;
    private readonly edits: readonly EditSpec[];
    private readonly outcomes: EditOutcome[] = [];
    private consumed = false;

    constructor(document: string, edits: readonly EditSpec[]) {
        if (typeof document !== 'string') {
            throw new EditEngineError('Document must be a string', EditEngineErrorCode.INVALID_DOCUMENT, {
                received: describeValue(document),
            });
        }
        if (!Array.isArray(edits)) {
            throw new EditEngineError('Edits must be an array', EditEngineErrorCode.INVALID_EDITS, {
                received: describeValue(edits),
            });
        }
        this.document = document;
        this.edits = edits;
    }

    run(): EditSessionResult {
        if (this.consumed) {
            throw new EditEngineError('Edit session has already run', EditEngineErrorCode.SESSION_CONSUMED);
        }
        this.consumed = true;

        for (let index = 0; index < this.edits.length; index++) {
            const outcome = this.step(this.edits[index], index);
            this.outcomes.push(outcome);
            if (outcome.status !== 'applied') {
                return { document: this.document, outcomes: [...this.outcomes], ok: false, failedIndex: index };
            }
        }

        return { document: this.document, outcomes: [...this.outcomes], ok: true };
    }

    private step(spec: EditSpec, index: number): EditOutcome {
        const invalid = validateEditSpec(spec);
        if (invalid !== null) {
            return { index, status: 'invalid_spec', reason: invalid };
        }

        const resolution = resolve(this.document, spec, index);
        if (!resolution.ok) {
            return resolution.outcome;
        }

        const verification = verify(this.document, resolution.span, spec.expectedContent);
        if (!verification.ok) {
            return {
                index,
                status: 'verification_failed',
                span: resolution.span,
                expected: verification.expected,
                actual: verification.actual,
            };
        }

        const applied = applyEdit(this.document, resolution.edit);
        this.document = applied.document;
        const lastChar = Math.max(applied.span.start, applied.span.end - 1);
        return {
            index,
            status: 'applied',
            kind: spec.kind,
            span: applied.span,
            lines: {
                start: lineNumberAt(applied.document, applied.span.start),
                end: lineNumberAt(applied.document, lastChar),
            },
        };
    }
}

export function applyEdits(document: string, edits: readonly EditSpec[]): EditSessionResult {
    return new EditSession(document, edits).run();
}
