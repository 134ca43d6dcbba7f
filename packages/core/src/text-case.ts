/**
 * Line-oriented text case transforms used by `devflow text`.
 */

export const TEXT_CASES = ['lower', 'upper', 'sentence', 'title'] as const;
export type TextCase = typeof TEXT_CASES[number];

/**
 * Trim the line, then upper-case its first character and lower-case the rest.
 * Blank lines become empty strings.
 */
export function toSentenceCase(line: string): string {
    const trimmed = line.trim();
    if (!trimmed) return '';
    return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}

/**
 * Capitalize every word. A word is a run of letters or digits; everything
 * else (spaces, hyphens, underscores, punctuation) is kept as a separator.
 *
 * @example
 * ```typescript
 * toTitleCase('hello WORLD-wide web')  // 'Hello World-Wide Web'
 * ```
 */
export function toTitleCase(line: string): string {
    return line.replace(/[\p{L}\p{N}]+/gu, word =>
        word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
    );
}

export function convertCase(line: string, textCase: TextCase): string {
    switch (textCase) {
        case 'lower':
            return line.toLowerCase();
        case 'upper':
            return line.toUpperCase();
        case 'sentence':
            return toSentenceCase(line);
        case 'title':
            return toTitleCase(line);
    }
}

export function isTextCase(value: string): value is TextCase {
    return (TEXT_CASES as readonly string[]).includes(value);
}
