/**
 * 🧹 CANDIDATE EXTRACTOR
 * Canonicalizes whatever an adapter lifted from markup. Garbage in gives an
 * empty list out; nothing here throws.
 */

import { Candidate, CandidateIdentifiers } from '../../types';
import { RawCandidate } from '../adapters/types';
import credentialData from '../../data/credentials.json';

const LABELLED_NPI = /\bNPI\b[\s#:.-]*(?:number|no\.?)?[\s#:.-]*(\d{10})(?!\d)/i;
const BARE_NPI = /(?<!\d)(\d{10})(?!\d)/;
const LABELLED_LICENSE = /\b(?:license|lic\.?)\s*(?:number|no\.?|#)?\s*[:#]?\s*([A-Z]{0,5}[-\s]?\d{3,10})\b/i;

const CREDENTIALS = new Set(credentialData.credentials);

export interface ExtractionContext {
    site_id: string;
    base_url: string;
    fetched_at: string;
}

export class CandidateExtractor {
    static extract(raw: readonly RawCandidate[], context: ExtractionContext): Candidate[] {
        const out: Candidate[] = [];
        for (const entry of raw) {
            const display_name = this.normalizeDisplayName(entry.display_name);
            const profile_url = this.resolveUrl(entry.profile_url, context.base_url);
            if (!display_name || !profile_url) continue;

            const snippet_text = this.squash(entry.snippet_text);
            out.push({
                site_id: context.site_id,
                profile_url,
                display_name,
                snippet_text,
                extracted_identifiers: this.extractIdentifiers(`${display_name} ${snippet_text}`),
                fetched_at: context.fetched_at,
            });
        }
        return out;
    }

    /**
     * NPI: a labelled number wins over a bare 10-digit run. License: labelled only.
     */
    static extractIdentifiers(text: string): CandidateIdentifiers {
        const identifiers: CandidateIdentifiers = {};

        const npi = LABELLED_NPI.exec(text) ?? BARE_NPI.exec(text);
        if (npi) identifiers.npi = npi[1];

        const license = LABELLED_LICENSE.exec(text);
        if (license) identifiers.license_number = this.normalizeLicense(license[1]);

        return identifiers;
    }

    static normalizeLicense(value: string): string {
        return value.toUpperCase().replace(/[^A-Z0-9]/g, '');
    }

    /**
     * Collapses whitespace; ALL-CAPS or all-lower names become Title Case,
     * credential suffixes stay upper case.
     */
    static normalizeDisplayName(value: string): string {
        const name = this.squash(value);
        if (!/[a-z]/i.test(name)) return '';
        if (name !== name.toUpperCase() && name !== name.toLowerCase()) return name;

        return name
            .split(' ')
            .map((word) => {
                const bare = word.toLowerCase().replace(/[^a-z-]/g, '');
                if (CREDENTIALS.has(bare) && bare.length > 2) return word.toUpperCase();
                return word
                    .toLowerCase()
                    .replace(/(^|[-'])([a-z])/g, (_, sep: string, ch: string) => `${sep}${ch.toUpperCase()}`);
            })
            .join(' ');
    }

    static resolveUrl(href: string, base: string): string | null {
        const trimmed = href.trim();
        if (!trimmed) return null;
        try {
            const url = new URL(trimmed, base);
            if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
            return url.toString();
        } catch {
            return null;
        }
    }

    private static squash(value: string): string {
        return value.replace(/\s+/g, ' ').trim();
    }
}
