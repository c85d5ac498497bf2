export type LineEndingStyle = '\r\n' | '\n' | '\r';

/**
 * Detect the dominant line ending of a text. Ties and texts without any
 * line break fall back to '\n'.
 */
export function detectLineEnding(content: string): LineEndingStyle {
    let crlf = 0;
    let lf = 0;
    let cr = 0;

    for (let i = 0; i < content.length; i++) {
        const ch = content[i];
        if (ch === '\r') {
            if (content[i + 1] === '\n') {
                crlf++;
                i++;
            } else {
                cr++;
            }
        } else if (ch === '\n') {
            lf++;
        }
    }

    if (crlf > lf && crlf > cr) return '\r\n';
    if (cr > lf && cr > crlf) return '\r';
    return '\n';
}

/**
 * Rewrite every line break in text to the given style
 */
export function normalizeLineEndings(text: string, lineEnding: LineEndingStyle): string {
    return text.replace(/\r\n|\r|\n/g, lineEnding);
}

export function endsWithLineBreak(text: string): boolean {
    return text.endsWith('\n') || text.endsWith('\r');
}

export function startsWithLineBreak(text: string): boolean {
    return text.startsWith('\n') || text.startsWith('\r');
}

/**
 * The line break text ends with, if any
 */
export function trailingLineBreak(text: string): LineEndingStyle | null {
    if (text.endsWith('\r\n')) return '\r\n';
    if (text.endsWith('\n')) return '\n';
    if (text.endsWith('\r')) return '\r';
    return null;
}

/**
 * Drop a single trailing line break ('\r\n', '\n' or '\r')
 */
export function stripTrailingLineBreak(text: string): string {
    if (text.endsWith('\r\n')) return text.slice(0, -2);
    if (endsWithLineBreak(text)) return text.slice(0, -1);
    return text;
}

/**
 * 1-based line number of the character at offset
 */
export function lineNumberAt(text: string, offset: number): number {
    let line = 1;
    const limit = Math.min(offset, text.length);
    for (let i = 0; i < limit; i++) {
        const ch = text[i];
        if (ch === '\n') {
            line++;
        } else if (ch === '\r' && text[i + 1] !== '\n') {
            line++;
        }
    }
    return line;
}
