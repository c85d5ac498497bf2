import { highlightDifferences, showWhitespace } from './diff.js';
import type { EditOutcome, PatternRole } from './types.js';

const ROLE_LABELS: Record<PatternRole, string> = {
    start: 'Start pattern',
    end: 'End pattern',
    after: 'After pattern',
    before: 'Before pattern',
};

/**
 * One human-readable line (or short paragraph) per outcome, addressed to the
 * agent that sent the request.
 */
export function describeOutcome(outcome: EditOutcome): string {
    const prefix = `Edit ${outcome.index + 1}`;

    switch (outcome.status) {
        case 'applied': {
            const where = outcome.lines.start === outcome.lines.end
                ? `line ${outcome.lines.start}`
                : `lines ${outcome.lines.start}-${outcome.lines.end}`;
            return `${prefix}: ${outcome.kind} applied at ${where}`;
        }
        case 'pattern_not_found':
            return `${prefix}: ${ROLE_LABELS[outcome.role]} '${outcome.pattern}' not found`;
        case 'pattern_ambiguous':
            return `${prefix}: ${ROLE_LABELS[outcome.role]} '${outcome.pattern}' matched ${outcome.count} times. ` +
                `Add surrounding context to the pattern so it matches exactly once.`;
        case 'verification_failed':
            return `${prefix}: Content verification failed.\n` +
                `Expected: ${showWhitespace(outcome.expected)}\n` +
                `Actual:   ${showWhitespace(outcome.actual)}\n` +
                `Differences: ${showWhitespace(highlightDifferences(outcome.expected, outcome.actual))}`;
        case 'invalid_spec':
            return `${prefix}: Invalid edit: ${outcome.reason}`;
    }
}
