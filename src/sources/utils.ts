/**
 * Shared utilities for source adapters.
 */

const DOI_PREFIXES = ['https://doi.org/', 'http://doi.org/', 'doi:'];

/**
 * Normalize a DOI to its bare form.
 * "https://doi.org/10.1234/test" → "10.1234/test", "DOI:10.1/x" → "10.1/x"
 */
export function normalizeDoi(doi: string): string {
    const trimmed = doi.trim();
    const lower = trimmed.toLowerCase();

    for (const prefix of DOI_PREFIXES) {
        if (lower.startsWith(prefix)) {
            return trimmed.slice(prefix.length).trim();
        }
    }

    return trimmed;
}

/**
 * Bare DOI from a provider field, or undefined when the field is empty.
 */
export function stripDoiPrefix(doi: string | null | undefined): string | undefined {
    if (!doi) return undefined;
    return normalizeDoi(doi) || undefined;
}

/**
 * Keep a provider string only when it is non-empty.
 */
export function nonEmpty(value: string | null | undefined): string | undefined {
    return value ? value : undefined;
}
