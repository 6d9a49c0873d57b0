import { CandidateIdentifiers, ScoreFactor, ScoredCandidate } from '../../types';
import { personKey } from './name_normalizer';

/**
 * Lowercase host, no `www.`, no fragment, no utm_* params, sorted query,
 * no trailing slash.
 */
export function normalizeProfileUrl(raw: string): string {
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        return raw.trim().toLowerCase().replace(/\/+$/, '');
    }

    const host = url.hostname.toLowerCase().replace(/^www\./, '');
    const params = [...url.searchParams.entries()]
        .filter(([key]) => !key.toLowerCase().startsWith('utm_'))
        .sort(([a, av], [b, bv]) => a.localeCompare(b) || av.localeCompare(bv));
    const query = params.length > 0 ? `?${new URLSearchParams(params).toString()}` : '';
    const path = url.pathname.replace(/\/+$/, '');
    const port = url.port ? `:${url.port}` : '';

    return `${url.protocol}//${host}${port}${path}${query}`;
}

export function identifiersConflict(a: CandidateIdentifiers, b: CandidateIdentifiers): boolean {
    if (a.npi && b.npi && a.npi !== b.npi) return true;
    if (a.license_number && b.license_number && a.license_number !== b.license_number) return true;
    return false;
}

/**
 * Collapses per-site duplicates: same normalized URL or same normalized name,
 * and never across conflicting identifiers (different people).
 */
export class CandidateDeduplicator {
    static dedupe(candidates: readonly ScoredCandidate[]): ScoredCandidate[] {
        let current = [...candidates];

        // Merging can make a survivor equal to an earlier one; repeat to a fixpoint.
        for (;;) {
            const next = this.pass(current);
            if (next.length === current.length) return next;
            current = next;
        }
    }

    static isDuplicate(a: ScoredCandidate, b: ScoredCandidate): boolean {
        if (a.site_id !== b.site_id) return false;
        if (identifiersConflict(a.extracted_identifiers, b.extracted_identifiers)) return false;
        if (normalizeProfileUrl(a.profile_url) === normalizeProfileUrl(b.profile_url)) return true;

        const key = personKey(a.display_name);
        return key !== '' && key === personKey(b.display_name);
    }

    static merge(a: ScoredCandidate, b: ScoredCandidate): ScoredCandidate {
        const [winner, loser] = b.score > a.score ? [b, a] : [a, b];
        const seen = new Set(winner.rationale.map((factor) => factor.factor));
        const rationale: ScoreFactor[] = [
            ...winner.rationale,
            ...loser.rationale.filter((factor) => !seen.has(factor.factor)),
        ];

        return {
            ...winner,
            rationale,
            extracted_identifiers: { ...loser.extracted_identifiers, ...this.defined(winner.extracted_identifiers) },
        };
    }

    private static pass(candidates: ScoredCandidate[]): ScoredCandidate[] {
        const out: ScoredCandidate[] = [];
        for (const candidate of candidates) {
            const index = out.findIndex((existing) => this.isDuplicate(existing, candidate));
            if (index === -1) {
                out.push(candidate);
            } else {
                out[index] = this.merge(out[index], candidate);
            }
        }
        return out;
    }

    private static defined(ids: CandidateIdentifiers): CandidateIdentifiers {
        const out: CandidateIdentifiers = {};
        if (ids.npi) out.npi = ids.npi;
        if (ids.license_number) out.license_number = ids.license_number;
        return out;
    }
}
