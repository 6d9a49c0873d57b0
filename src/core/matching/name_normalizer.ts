import credentialData from '../../data/credentials.json';

const IGNORED = new Set([...credentialData.titles, ...credentialData.credentials]);

export function normalizeText(value: string): string {
    return value
        .toLowerCase()
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[^a-z0-9]+/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Name tokens with titles, credential suffixes and single-letter initials removed.
 * "Dr. Jane A. Doe, LCSW" -> ["jane", "doe"]
 */
export function nameTokens(value: string): string[] {
    const tokens = normalizeText(value)
        .split(' ')
        .filter((token) => token.length > 1 && !IGNORED.has(token));
    return [...new Set(tokens)];
}

export function jaccard(a: readonly string[], b: readonly string[]): number {
    const left = new Set(a);
    const right = new Set(b);
    if (left.size === 0 && right.size === 0) return 0;

    let shared = 0;
    for (const token of left) {
        if (right.has(token)) shared++;
    }
    return shared / (left.size + right.size - shared);
}

/** Order-insensitive key: "Doe, Jane" and "JANE DOE LCSW" share one. */
export function nameKey(value: string): string {
    return [...nameTokens(value)].sort().join(' ');
}

/**
 * Stricter than nameKey: initials stay, so "Jane A. Doe" and "Jane B. Doe"
 * get different keys. Only titles and credentials are dropped.
 */
export function personKey(value: string): string {
    const tokens = normalizeText(value)
        .split(' ')
        .filter((token) => token !== '' && !IGNORED.has(token));
    return [...new Set(tokens)].sort().join(' ');
}
