/**
 * 🎯 IDENTITY MATCHER
 * Deterministic candidate scoring. Same identity + candidate + weights, same
 * score and rationale, every time.
 */

import {
    DEFAULT_THRESHOLDS,
    DEFAULT_WEIGHTS,
    ConfidenceThresholds,
    ScoringWeights,
} from '../../config/discovery_config';
import { Candidate, ScoreFactor, ScoredCandidate, TherapistIdentity } from '../../types';
import { ScoringInconsistencyError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { CandidateExtractor } from '../extraction/candidate_extractor';
import { jaccard, nameTokens, normalizeText } from './name_normalizer';
import stateNames from '../../data/us_states.json';

const STATES: Record<string, string> = stateNames;

export interface PartitionedCandidates {
    kept: ScoredCandidate[];
    excluded_count: number;
    auto_confirm_proposal: string | null;
}

function round4(value: number): number {
    return Math.round(value * 10000) / 10000;
}

function containsWord(haystack: string, needle: string): boolean {
    if (!needle) return false;
    return ` ${haystack} `.includes(` ${needle} `);
}

export class IdentityMatcher {
    constructor(
        private readonly weights: ScoringWeights = DEFAULT_WEIGHTS,
        private readonly thresholds: ConfidenceThresholds = DEFAULT_THRESHOLDS
    ) { }

    score(identity: TherapistIdentity, candidate: Candidate): ScoredCandidate {
        const w = this.weights;
        const rationale: ScoreFactor[] = [];
        const found = candidate.extracted_identifiers;

        const npiMatch = Boolean(identity.npi && found.npi && identity.npi === found.npi);
        const wantedLicense = identity.license_number ? CandidateExtractor.normalizeLicense(identity.license_number) : '';
        const foundLicense = found.license_number ? CandidateExtractor.normalizeLicense(found.license_number) : '';
        const licenseMatch = Boolean(wantedLicense && foundLicense && wantedLicense === foundLicense);

        if (npiMatch && licenseMatch) {
            rationale.push({ factor: 'npi_match', weight: w.npi_match, detail: `NPI ${found.npi} matches` });
            rationale.push({ factor: 'license_match', weight: w.license_match, detail: `license ${foundLicense} matches` });
            return { ...candidate, score: 1, rationale };
        }

        if (npiMatch) {
            rationale.push({ factor: 'npi_match', weight: w.npi_match, detail: `NPI ${found.npi} matches` });
        } else if (identity.npi && found.npi) {
            rationale.push({ factor: 'npi_conflict', weight: w.npi_conflict, detail: `NPI ${found.npi} differs from ${identity.npi}` });
        }

        if (licenseMatch) {
            rationale.push({ factor: 'license_match', weight: w.license_match, detail: `license ${foundLicense} matches` });
        } else if (wantedLicense && foundLicense) {
            rationale.push({
                factor: 'license_conflict',
                weight: w.license_conflict,
                detail: `license ${foundLicense} differs from ${wantedLicense}`,
            });
        }

        const similarity = jaccard(nameTokens(identity.full_name), nameTokens(candidate.display_name));
        if (similarity > 0) {
            rationale.push({
                factor: 'name_similarity',
                weight: round4(w.name_similarity * similarity),
                detail: `name token overlap ${round4(similarity)}`,
            });
        }

        const place = this.matchLocation(identity, candidate);
        if (place) {
            rationale.push({ factor: 'location_match', weight: w.location_match, detail: `location "${place}" found` });
        }

        const raw = rationale.reduce((sum, factor) => sum + factor.weight, 0);
        if (!Number.isFinite(raw)) {
            const error = new ScoringInconsistencyError(`Non-finite score for ${candidate.profile_url}`, {
                site_id: candidate.site_id,
                rationale,
            });
            Logger.fatal('[IdentityMatcher] scoring produced a non-finite value', { error, site_id: candidate.site_id });
            throw error;
        }

        return { ...candidate, score: round4(Math.min(1, Math.max(0, raw))), rationale };
    }

    scoreAll(identity: TherapistIdentity, candidates: readonly Candidate[]): ScoredCandidate[] {
        return candidates.map((candidate) => this.score(identity, candidate));
    }

    /**
     * Drops candidates under the low cutoff and orders the rest by score.
     * The top candidate at/above the high cutoff is proposed, never applied.
     */
    partition(scored: readonly ScoredCandidate[]): PartitionedCandidates {
        const kept = scored
            .filter((candidate) => candidate.score >= this.thresholds.low_confidence)
            .sort((a, b) => b.score - a.score || a.profile_url.localeCompare(b.profile_url));

        const top = kept[0];
        return {
            kept,
            excluded_count: scored.length - kept.length,
            auto_confirm_proposal: top && top.score >= this.thresholds.high_confidence ? top.profile_url : null,
        };
    }

    private matchLocation(identity: TherapistIdentity, candidate: Candidate): string | null {
        const raw = `${candidate.display_name} ${candidate.snippet_text}`;
        const text = normalizeText(raw);

        if (identity.state) {
            const code = identity.state.toUpperCase();
            if (/^[A-Z]{2}$/.test(code) && new RegExp(`\\b${code}\\b`).test(raw)) return code;
            const stateName = STATES[code];
            if (stateName && containsWord(text, normalizeText(stateName))) return stateName;
        }
        if (identity.city && containsWord(text, normalizeText(identity.city))) {
            return identity.city;
        }
        return null;
    }
}
