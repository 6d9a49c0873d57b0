import { describe, expect, it } from 'vitest';
import { ProfileStateMachine, isConfirmedStatus } from '../../src/core/lifecycle/profile_state_machine';
import { DiscoveryResult, OutcomeKind, ProfileRecord, ProfileStatus } from '../../src/types';
import { InvalidTransitionError } from '../../src/utils/errors';

const AT = '2025-01-06T09:00:00.000Z';
const DONE = '2025-01-06T09:00:05.000Z';
const URL_A = 'https://www.psychologytoday.com/us/therapists/jane-doe/1';
const URL_B = 'https://www.psychologytoday.com/us/therapists/jane-doe-2/2';

function result(kind: OutcomeKind, scores: number[] = []): DiscoveryResult {
    return {
        site_id: 'pt',
        outcome_kind: kind,
        candidates: scores.map((score, i) => ({
            site_id: 'pt',
            profile_url: i === 0 ? URL_A : URL_B,
            display_name: 'Jane Doe',
            snippet_text: '',
            extracted_identifiers: {},
            fetched_at: DONE,
            score,
            rationale: [],
        })),
        error_detail: kind === 'hard_block' ? 'Hard block on pt: retry budget exhausted after 3 attempts (429)' : null,
        attempts: 1,
        excluded_count: 0,
        auto_confirm_proposal: null,
        diagnostics: [],
        completed_at: DONE,
    };
}

function searched(kind: OutcomeKind, scores: number[] = []): ProfileRecord {
    const fresh = ProfileStateMachine.newRecord('t-1', 'pt');
    const searching = ProfileStateMachine.apply(fresh, { type: 'search_requested' }, AT);
    return ProfileStateMachine.apply(searching, { type: 'search_completed', result: result(kind, scores) }, DONE);
}

describe('ProfileStateMachine', () => {

    it('starts unknown and moves to searching', () => {
        const record = ProfileStateMachine.apply(ProfileStateMachine.newRecord('t-1', 'pt'), { type: 'search_requested' }, AT);

        expect(record.status).toBe(ProfileStatus.SEARCHING);
        expect(record.history).toEqual([{ at: AT, event: 'search_requested', from: ProfileStatus.UNKNOWN, to: ProfileStatus.SEARCHING }]);
    });

    it('maps search outcomes to statuses', () => {
        expect(searched('success', [0.9]).status).toBe(ProfileStatus.FOUND_UNCONFIRMED);
        expect(searched('success').status).toBe(ProfileStatus.NOT_FOUND);
        expect(searched('no_results').status).toBe(ProfileStatus.NOT_FOUND);
        expect(searched('soft_block').status).toBe(ProfileStatus.BLOCKED);
        expect(searched('hard_block').status).toBe(ProfileStatus.BLOCKED);
        expect(searched('network_failure').status).toBe(ProfileStatus.SEARCH_FAILED);
    });

    it('records pending candidates and the top score', () => {
        const record = searched('success', [0.6, 0.95]);

        expect(record.pending_candidates).toEqual([
            { profile_url: URL_A, score: 0.6 },
            { profile_url: URL_B, score: 0.95 },
        ]);
        expect(record.confidence_score).toBe(0.95);
        expect(record.last_checked_at).toBe(DONE);
    });

    it('keeps the block reason in history', () => {
        const record = searched('hard_block');
        expect(record.history[1].detail).toBe('Hard block on pt: retry budget exhausted after 3 attempts (429)');
    });

    it('abandons a stuck search back to the status it started from', () => {
        const blocked = searched('hard_block');
        const searching = ProfileStateMachine.apply(blocked, { type: 'search_requested' }, DONE);
        const reset = ProfileStateMachine.apply(searching, { type: 'search_abandoned', reason: 'stale search' }, DONE);

        expect(ProfileStateMachine.searchStartedAt(searching)).toBe(DONE);
        expect(reset.status).toBe(ProfileStatus.BLOCKED);
        expect(reset.history[reset.history.length - 1]).toEqual({
            at: DONE,
            event: 'search_abandoned',
            from: ProfileStatus.SEARCHING,
            to: ProfileStatus.BLOCKED,
            detail: 'stale search',
        });
        expect(() => ProfileStateMachine.apply(blocked, { type: 'search_abandoned', reason: 'x' }, DONE)).toThrow(InvalidTransitionError);
    });

    it('restores the previous status when the search was skipped', () => {
        const found = searched('success', [0.9]);
        const searching = ProfileStateMachine.apply(found, { type: 'search_requested' }, AT);
        const skipped = ProfileStateMachine.apply(searching, { type: 'search_completed', result: result('skipped') }, DONE);

        expect(skipped.status).toBe(ProfileStatus.FOUND_UNCONFIRMED);
        expect(skipped.pending_candidates).toEqual(found.pending_candidates);
        expect(skipped.history).toHaveLength(4);
        expect(skipped.history[3].detail).toBe('pt: skipped (not run)');
    });

    it('rejects a completed search that was never requested', () => {
        const fresh = ProfileStateMachine.newRecord('t-1', 'pt');
        expect(() => ProfileStateMachine.apply(fresh, { type: 'search_completed', result: result('success') }, AT))
            .toThrow(InvalidTransitionError);
    });

    describe('confirmation', () => {
        it('confirms one of the pending candidates', () => {
            const record = ProfileStateMachine.apply(
                searched('success', [0.6, 0.95]),
                { type: 'confirmed', profile_url: URL_B, target: ProfileStatus.ACTIVE_MANAGED },
                AT
            );

            expect(record.status).toBe(ProfileStatus.ACTIVE_MANAGED);
            expect(record.profile_url).toBe(URL_B);
            expect(record.confidence_score).toBe(0.95);
            expect(record.pending_candidates).toEqual([]);
        });

        it('allows confirming without a URL', () => {
            const record = ProfileStateMachine.apply(
                searched('success', [0.6]),
                { type: 'confirmed', profile_url: null, target: ProfileStatus.NEEDS_CLAIMING },
                AT
            );

            expect(record.status).toBe(ProfileStatus.NEEDS_CLAIMING);
            expect(record.profile_url).toBeNull();
            expect(record.confidence_score).toBeNull();
        });

        it('rejects a URL that was not a candidate', () => {
            expect(() => ProfileStateMachine.apply(
                searched('success', [0.6]),
                { type: 'confirmed', profile_url: 'https://example.com/other', target: ProfileStatus.ACTIVE_MANAGED },
                AT
            )).toThrow('https://example.com/other is not among the pending candidates');
        });

        it('only confirms from found_unconfirmed', () => {
            expect(() => ProfileStateMachine.apply(
                searched('no_results'),
                { type: 'confirmed', profile_url: null, target: ProfileStatus.EXISTS_UNMANAGED },
                AT
            )).toThrow(InvalidTransitionError);
        });
    });

    describe('withdrawal', () => {
        it('withdraws a confirmed profile', () => {
            const confirmed = ProfileStateMachine.apply(
                searched('success', [0.9]),
                { type: 'confirmed', profile_url: URL_A, target: ProfileStatus.THERAPIST_MANAGED },
                AT
            );
            const withdrawn = ProfileStateMachine.apply(confirmed, { type: 'withdrawn', reason: 'therapist request' }, DONE);

            expect(withdrawn.status).toBe(ProfileStatus.WITHDRAWN);
            expect(withdrawn.profile_url).toBe(URL_A);
            expect(withdrawn.history[withdrawn.history.length - 1]).toEqual({
                at: DONE,
                event: 'withdrawn',
                from: ProfileStatus.THERAPIST_MANAGED,
                to: ProfileStatus.WITHDRAWN,
                detail: 'therapist request',
            });
        });

        it('cannot withdraw an unconfirmed profile', () => {
            expect(() => ProfileStateMachine.apply(searched('success', [0.9]), { type: 'withdrawn' }, AT))
                .toThrow(InvalidTransitionError);
        });
    });

    it('does not search a confirmed or withdrawn profile', () => {
        const confirmed = ProfileStateMachine.apply(
            searched('success', [0.9]),
            { type: 'confirmed', profile_url: URL_A, target: ProfileStatus.ACTIVE_MANAGED },
            AT
        );
        expect(ProfileStateMachine.canApply(confirmed, 'search_requested')).toBe(false);
        expect(ProfileStateMachine.canApply(searched('hard_block'), 'search_requested')).toBe(true);
    });

    it('records inspections without changing status', () => {
        const confirmed = ProfileStateMachine.apply(
            searched('success', [0.9]),
            { type: 'confirmed', profile_url: URL_A, target: ProfileStatus.ACTIVE_MANAGED },
            AT
        );
        const inspected = ProfileStateMachine.apply(confirmed, { type: 'inspected', detail: 'profile matches stored identity' }, DONE);

        expect(inspected.status).toBe(ProfileStatus.ACTIVE_MANAGED);
        expect(inspected.last_checked_at).toBe(DONE);
        expect(inspected.history).toHaveLength(confirmed.history.length + 1);
    });

    it('never mutates the input record', () => {
        const fresh = ProfileStateMachine.newRecord('t-1', 'pt');
        ProfileStateMachine.apply(fresh, { type: 'search_requested' }, AT);

        expect(fresh.status).toBe(ProfileStatus.UNKNOWN);
        expect(fresh.history).toEqual([]);
    });

    it('recognizes confirmed statuses', () => {
        expect(isConfirmedStatus('active_managed')).toBe(true);
        expect(isConfirmedStatus('found_unconfirmed')).toBe(false);
    });
});
