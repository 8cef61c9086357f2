/**
 * Shorten text to at most `maxLength` characters (code points), ending in
 * "..." when cut.
 */
export function truncate(text: string, maxLength: number): string {
    const chars = Array.from(text);
    if (chars.length <= maxLength) return text;
    return `${chars.slice(0, Math.max(0, maxLength - 3)).join('')}...`;
}

/**
 * Compare strings by Unicode code point, so characters outside the Basic
 * Multilingual Plane sort after U+E000–U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
    const left = Array.from(a);
    const right = Array.from(b);
    const length = Math.min(left.length, right.length);

    for (let i = 0; i < length; i++) {
        const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
        if (diff !== 0) return diff;
    }
    return left.length - right.length;
}
