/**
 * Generates a character-level diff using standard {-removed-}{+added+} format
 * @param expected The text the caller expected
 * @param actual The text that was found
 * @returns A formatted string showing character-level differences
 */
export function highlightDifferences(expected: string, actual: string): string {
    let prefixLength = 0;
    const minLength = Math.min(expected.length, actual.length);

    while (prefixLength < minLength &&
           expected[prefixLength] === actual[prefixLength]) {
        prefixLength++;
    }

    let suffixLength = 0;
    while (suffixLength < minLength - prefixLength &&
           expected[expected.length - 1 - suffixLength] === actual[actual.length - 1 - suffixLength]) {
        suffixLength++;
    }

    const commonPrefix = expected.substring(0, prefixLength);
    const commonSuffix = expected.substring(expected.length - suffixLength);

    const expectedDiff = expected.substring(prefixLength, expected.length - suffixLength);
    const actualDiff = actual.substring(prefixLength, actual.length - suffixLength);

    return `${commonPrefix}{-${expectedDiff}-}{+${actualDiff}+}${commonSuffix}`;
}

/**
 * Make line breaks and tabs visible so whitespace-only differences can be read
 */
export function showWhitespace(text: string): string {
    return text
        .replace(/\r/g, '\\r')
        .replace(/\n/g, '\\n')
        .replace(/\t/g, '\\t');
}
