import { describe, expect, it } from 'vitest';
import { CandidateDeduplicator, normalizeProfileUrl } from '../../src/core/matching/candidate_deduplicator';
import { ScoredCandidate } from '../../src/types';

function scored(overrides: Partial<ScoredCandidate> = {}): ScoredCandidate {
    return {
        site_id: 'pt',
        profile_url: 'https://www.psychologytoday.com/us/therapists/jane-doe/1',
        display_name: 'Jane Doe',
        snippet_text: '',
        extracted_identifiers: {},
        fetched_at: '2025-01-06T09:00:00.000Z',
        score: 0.5,
        rationale: [],
        ...overrides,
    };
}

describe('normalizeProfileUrl', () => {
    it('drops www, fragments, tracking params and trailing slashes', () => {
        expect(normalizeProfileUrl('https://WWW.Example.com/Therapists/Jane/?utm_source=x&b=2&a=1#top'))
            .toBe('https://example.com/Therapists/Jane?a=1&b=2');
    });

    it('keeps explicit ports', () => {
        expect(normalizeProfileUrl('http://localhost:8080/p/1/')).toBe('http://localhost:8080/p/1');
    });
});

describe('CandidateDeduplicator', () => {

    it('collapses the same profile URL and keeps the higher score', () => {
        const out = CandidateDeduplicator.dedupe([
            scored({ score: 0.3, snippet_text: 'jacksonville, fl' }),
            scored({ profile_url: 'https://psychologytoday.com/us/therapists/jane-doe/1/', score: 0.4, snippet_text: 'Jacksonville, FL' }),
        ]);

        expect(out).toHaveLength(1);
        expect(out[0].score).toBe(0.4);
        expect(out[0].snippet_text).toBe('Jacksonville, FL');
    });

    it('collapses the same normalized name under different URLs', () => {
        const out = CandidateDeduplicator.dedupe([
            scored({ profile_url: 'https://example.com/a', display_name: 'Jane Doe, LCSW' }),
            scored({ profile_url: 'https://example.com/b', display_name: 'Doe, Jane' }),
        ]);
        expect(out).toHaveLength(1);
        expect(out[0].profile_url).toBe('https://example.com/a');
    });

    it('keeps people whose middle initials differ apart', () => {
        const out = CandidateDeduplicator.dedupe([
            scored({ profile_url: 'https://example.com/a', display_name: 'Jane A. Doe' }),
            scored({ profile_url: 'https://example.com/b', display_name: 'Jane B. Doe, LCSW' }),
        ]);
        expect(out.map((c) => c.display_name)).toEqual(['Jane A. Doe', 'Jane B. Doe, LCSW']);
    });

    it('still collapses the same initial written differently', () => {
        const out = CandidateDeduplicator.dedupe([
            scored({ profile_url: 'https://example.com/a', display_name: 'Dr. Jane A. Doe' }),
            scored({ profile_url: 'https://example.com/b', display_name: 'Doe, Jane A' }),
        ]);
        expect(out).toHaveLength(1);
    });

    it('never merges candidates with conflicting NPIs', () => {
        const out = CandidateDeduplicator.dedupe([
            scored({ profile_url: 'https://example.com/a', extracted_identifiers: { npi: '1234567890' } }),
            scored({ profile_url: 'https://example.com/b', extracted_identifiers: { npi: '9876543210' } }),
        ]);
        expect(out).toHaveLength(2);
    });

    it('never merges across sites', () => {
        const out = CandidateDeduplicator.dedupe([scored({ site_id: 'pt' }), scored({ site_id: 'zencare' })]);
        expect(out).toHaveLength(2);
    });

    it('unions rationale and fills identifiers from the loser', () => {
        const winner = scored({
            score: 0.9,
            rationale: [{ factor: 'npi_match', weight: 0.9, detail: 'NPI 1234567890 matches' }],
            extracted_identifiers: { npi: '1234567890' },
        });
        const loser = scored({
            score: 0.4,
            rationale: [
                { factor: 'npi_match', weight: 0.9, detail: 'ignored' },
                { factor: 'location_match', weight: 0.1, detail: 'location "FL" found' },
            ],
            extracted_identifiers: { license_number: 'LCSW12345' },
        });

        const merged = CandidateDeduplicator.merge(loser, winner);

        expect(merged.score).toBe(0.9);
        expect(merged.rationale).toEqual([
            { factor: 'npi_match', weight: 0.9, detail: 'NPI 1234567890 matches' },
            { factor: 'location_match', weight: 0.1, detail: 'location "FL" found' },
        ]);
        expect(merged.extracted_identifiers).toEqual({ npi: '1234567890', license_number: 'LCSW12345' });
    });

    it('keeps the first candidate on a score tie', () => {
        const first = scored({ snippet_text: 'first' });
        const second = scored({ snippet_text: 'second' });
        expect(CandidateDeduplicator.merge(first, second).snippet_text).toBe('first');
    });

    it('is idempotent', () => {
        const input = [
            scored({ profile_url: 'https://example.com/a', display_name: 'Jane Doe' }),
            scored({ profile_url: 'https://example.com/b', display_name: 'John Roe' }),
            scored({ profile_url: 'https://example.com/c', display_name: 'Jane Doe', score: 0.7 }),
            scored({ profile_url: 'https://example.com/b/', display_name: 'J. Roe' }),
        ];
        const once = CandidateDeduplicator.dedupe(input);
        expect(once).toHaveLength(2);
        expect(CandidateDeduplicator.dedupe(once)).toEqual(once);
    });
});
