/**
 * Text utility functions for rewriting Python sources.
 */

/**
 * Orders imported names case-insensitively, falling back to code-point
 * order so that `Path` and `path` still sort deterministically.
 */
export function compareNames(a: string, b: string): number {
    const lowerA = a.toLowerCase();
    const lowerB = b.toLowerCase();
    if (lowerA !== lowerB) {
        return lowerA < lowerB ? -1 : 1;
    }
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Returns the offset of the first character of the line holding `offset`.
 */
export function lineStartAt(text: string, offset: number): number {
    let i = offset;
    while (i > 0 && text[i - 1] !== '\n' && text[i - 1] !== '\r') {
        i--;
    }
    return i;
}

/**
 * Returns the offset just past the line break that ends the line holding
 * `offset`, or the text length on the last line.
 */
export function lineEndAfter(text: string, offset: number): number {
    let i = offset;
    while (i < text.length && text[i] !== '\n' && text[i] !== '\r') {
        i++;
    }
    if (text[i] === '\r' && text[i + 1] === '\n') {
        return i + 2;
    }
    return i < text.length ? i + 1 : i;
}

/**
 * Returns the line break style of `text`: the first one found, or `\n`.
 */
export function detectLineBreak(text: string): string {
    const match = /\r\n|\n|\r/.exec(text);
    return match ? match[0] : '\n';
}

/**
 * Returns `true` when only whitespace separates `from` and `to`.
 */
export function isBlank(text: string, from: number, to: number): boolean {
    return /^[ \t\f]*$/.test(text.slice(from, to));
}
