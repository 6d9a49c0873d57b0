/**
 * 🔁 PROFILE STATE MACHINE
 *
 *   unknown -> searching -> found_unconfirmed | not_found | blocked | search_failed
 *   found_unconfirmed -> (human) active_managed | exists_unmanaged | needs_claiming | therapist_managed
 *   confirmed -> withdrawn
 *   searching -> (abandoned) status before the search
 *
 * Pure: every transition returns a new record with one more history entry.
 * The engine never picks a confirmed sub-state on its own.
 */

import { ConfirmedStatus, DiscoveryResult, ProfileRecord, ProfileStatus } from '../../types';
import { InvalidTransitionError } from '../../utils/errors';

export type ProfileEvent =
    | { type: 'search_requested' }
    | { type: 'search_completed'; result: DiscoveryResult }
    | { type: 'confirmed'; profile_url: string | null; target: ConfirmedStatus }
    | { type: 'withdrawn'; reason?: string }
    | { type: 'search_abandoned'; reason: string }
    | { type: 'inspected'; detail: string };

export const CONFIRMED_STATUSES: readonly ConfirmedStatus[] = [
    ProfileStatus.ACTIVE_MANAGED,
    ProfileStatus.EXISTS_UNMANAGED,
    ProfileStatus.NEEDS_CLAIMING,
    ProfileStatus.THERAPIST_MANAGED,
];

const SEARCHABLE: readonly ProfileStatus[] = [
    ProfileStatus.UNKNOWN,
    ProfileStatus.FOUND_UNCONFIRMED,
    ProfileStatus.NOT_FOUND,
    ProfileStatus.BLOCKED,
    ProfileStatus.SEARCH_FAILED,
];

const ALLOWED_FROM: Record<ProfileEvent['type'], readonly ProfileStatus[]> = {
    search_requested: SEARCHABLE,
    search_completed: [ProfileStatus.SEARCHING],
    search_abandoned: [ProfileStatus.SEARCHING],
    confirmed: [ProfileStatus.FOUND_UNCONFIRMED],
    withdrawn: CONFIRMED_STATUSES,
    inspected: Object.values(ProfileStatus),
};

export function isConfirmedStatus(value: string): value is ConfirmedStatus {
    return CONFIRMED_STATUSES.some((status) => status === value);
}

export class ProfileStateMachine {
    static newRecord(therapistId: string, directoryId: string): ProfileRecord {
        return {
            therapist_id: therapistId,
            directory_id: directoryId,
            status: ProfileStatus.UNKNOWN,
            profile_url: null,
            last_checked_at: null,
            confidence_score: null,
            history: [],
            pending_candidates: [],
        };
    }

    static canApply(record: ProfileRecord, type: ProfileEvent['type']): boolean {
        return ALLOWED_FROM[type].includes(record.status);
    }

    static apply(record: ProfileRecord, event: ProfileEvent, at: string): ProfileRecord {
        if (!this.canApply(record, event.type)) {
            throw new InvalidTransitionError(record.status, event.type);
        }

        switch (event.type) {
            case 'search_requested':
                return this.move(record, event.type, ProfileStatus.SEARCHING, at);

            case 'search_completed':
                return this.complete(record, event.result, at);

            case 'confirmed':
                return this.confirm(record, event.profile_url, event.target, at);

            case 'withdrawn':
                return this.move(record, event.type, ProfileStatus.WITHDRAWN, at, event.reason);

            case 'search_abandoned':
                return this.move(record, event.type, this.statusBeforeSearch(record), at, event.reason);

            case 'inspected':
                return { ...this.move(record, event.type, record.status, at, event.detail), last_checked_at: at };
        }
    }

    /**
     * State a record was in before its current search started.
     */
    static statusBeforeSearch(record: ProfileRecord): ProfileStatus {
        for (let i = record.history.length - 1; i >= 0; i--) {
            const entry = record.history[i];
            if (entry.event === 'search_requested') return entry.from;
        }
        return ProfileStatus.UNKNOWN;
    }

    /** When the current search was requested, or null if the record never searched. */
    static searchStartedAt(record: ProfileRecord): string | null {
        for (let i = record.history.length - 1; i >= 0; i--) {
            const entry = record.history[i];
            if (entry.event === 'search_requested') return entry.at;
        }
        return null;
    }

    // =========================================================================
    // PRIVATE HELPERS
    // =========================================================================

    private static complete(record: ProfileRecord, result: DiscoveryResult, at: string): ProfileRecord {
        const detail = `${result.site_id}: ${result.outcome_kind}`;

        switch (result.outcome_kind) {
            case 'skipped':
                return this.move(record, 'search_completed', this.statusBeforeSearch(record), at, `${detail} (${result.error_detail ?? 'not run'})`);

            case 'soft_block':
            case 'hard_block':
                return this.searched(this.move(record, 'search_completed', ProfileStatus.BLOCKED, at, result.error_detail ?? detail), result);

            case 'network_failure':
                return this.searched(this.move(record, 'search_completed', ProfileStatus.SEARCH_FAILED, at, result.error_detail ?? detail), result);

            case 'success':
            case 'no_results': {
                const found = result.candidates.length > 0;
                const next = this.move(
                    record,
                    'search_completed',
                    found ? ProfileStatus.FOUND_UNCONFIRMED : ProfileStatus.NOT_FOUND,
                    at,
                    `${detail}, ${result.candidates.length} candidate(s)`
                );
                return {
                    ...this.searched(next, result),
                    confidence_score: found ? Math.max(...result.candidates.map((c) => c.score)) : null,
                };
            }
        }
    }

    private static searched(record: ProfileRecord, result: DiscoveryResult): ProfileRecord {
        return {
            ...record,
            last_checked_at: result.completed_at,
            pending_candidates: result.candidates.map((c) => ({ profile_url: c.profile_url, score: c.score })),
        };
    }

    private static confirm(record: ProfileRecord, url: string | null, target: ConfirmedStatus, at: string): ProfileRecord {
        if (!isConfirmedStatus(target)) {
            throw new InvalidTransitionError(record.status, 'confirmed', `"${target}" is not a confirmed status`);
        }

        let score: number | null = null;
        if (url !== null) {
            const chosen = record.pending_candidates.find((c) => c.profile_url === url);
            if (!chosen) {
                throw new InvalidTransitionError(record.status, 'confirmed', `${url} is not among the pending candidates`);
            }
            score = chosen.score;
        }

        return {
            ...this.move(record, 'confirmed', target, at, url ?? 'confirmed without a profile URL'),
            profile_url: url,
            confidence_score: score,
            pending_candidates: [],
        };
    }

    private static move(record: ProfileRecord, event: string, to: ProfileStatus, at: string, detail?: string): ProfileRecord {
        return {
            ...record,
            status: to,
            history: [...record.history, { at, event, from: record.status, to, ...(detail ? { detail } : {}) }],
        };
    }
}
