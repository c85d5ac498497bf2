import type { Span, VerificationResult } from './types.js';

/**
 * Check the text currently at span against the caller's expectation.
 * Comparison is exact, including whitespace and line endings. An omitted
 * expectation always passes.
 */
export function verify(document: string, span: Span, expectedContent?: string): VerificationResult {
    if (expectedContent === undefined) {
        return { ok: true };
    }

    const actual = document.slice(span.start, span.end);
    if (actual === expectedContent) {
        return { ok: true };
    }
    return { ok: false, expected: expectedContent, actual };
}
