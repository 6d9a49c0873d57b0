/**
 * 📇 PROFILE TRACKER
 * Repository-backed entry points: every search, confirmation, withdrawal and
 * inspection loads the (therapist, directory) record, applies one state
 * machine transition and writes it back.
 */

import { ConfirmedStatus, DirectoryConfig, DiscoveryResult, ProfileRecord, ProfileStatus } from '../../types';
import { RecordNotFoundError, ScoringInconsistencyError, toError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { BatchDiscoveryReport, BatchOptions, BatchUnit, DiscoveryOrchestrator, unitKey } from '../discovery/discovery_orchestrator';
import { Clock, systemClock } from '../fetch/site_rate_limiter';
import { ProfileComparison, ProfileInspector, ScrapedProfile } from '../profile/profile_inspector';
import { ProfileRepository, StoredIdentity } from '../../repository/types';
import { ProfileEvent, ProfileStateMachine } from './profile_state_machine';

export interface TrackerDeps {
    repository: ProfileRepository;
    orchestrator: DiscoveryOrchestrator;
    inspector?: ProfileInspector;
    clock?: Clock;
    /** Age after which a record left in "searching" is reset before a new search. */
    staleSearchMs?: number;
}

export const DEFAULT_STALE_SEARCH_MS = 30 * 60_000;

export interface TrackedSearch {
    record: ProfileRecord;
    result: DiscoveryResult;
}

export interface Inspection {
    record: ProfileRecord;
    profile: ScrapedProfile;
    comparison: ProfileComparison;
}

export class ProfileTracker {
    private readonly repository: ProfileRepository;
    private readonly orchestrator: DiscoveryOrchestrator;
    private readonly inspector: ProfileInspector;
    private readonly clock: Clock;
    private readonly staleSearchMs: number;

    constructor(deps: TrackerDeps) {
        this.repository = deps.repository;
        this.orchestrator = deps.orchestrator;
        this.inspector = deps.inspector ?? new ProfileInspector();
        this.clock = deps.clock ?? systemClock;
        this.staleSearchMs = deps.staleSearchMs ?? DEFAULT_STALE_SEARCH_MS;
    }

    async search(therapistId: string, directoryId: string): Promise<TrackedSearch> {
        const identity = await this.requireIdentity(therapistId);
        await this.requireDirectory(directoryId);

        const searching = await this.save(await this.loadForSearch(therapistId, directoryId), { type: 'search_requested' });

        let result: DiscoveryResult;
        try {
            result = await this.orchestrator.searchOne(identity, directoryId);
        } catch (e) {
            // Put the record back where it was before surfacing the fault.
            await this.save(searching, { type: 'search_completed', result: this.aborted(directoryId, toError(e)) });
            throw e;
        }

        const record = await this.save(searching, { type: 'search_completed', result });
        return { record, result };
    }

    /**
     * Pairs whose record cannot start a search (confirmed, withdrawn, already
     * searching) are reported as skipped and left untouched. A record is only
     * marked "searching" once its unit actually starts.
     */
    async searchBatch(
        therapistIds: readonly string[],
        directoryIds: readonly string[],
        options: BatchOptions = {}
    ): Promise<BatchDiscoveryReport> {
        const identities: StoredIdentity[] = [];
        for (const therapistId of therapistIds) {
            identities.push(await this.requireIdentity(therapistId));
        }
        for (const directoryId of directoryIds) {
            await this.requireDirectory(directoryId);
        }

        const eligible = new Set<string>();
        for (const identity of identities) {
            for (const directoryId of directoryIds) {
                const record = await this.loadForSearch(identity.therapist_id, directoryId);
                if (!ProfileStateMachine.canApply(record, 'search_requested')) {
                    Logger.info(`[ProfileTracker] ${directoryId} not searchable from "${record.status}"`, {
                        therapist_id: identity.therapist_id,
                        directory_id: directoryId,
                    });
                    continue;
                }
                eligible.add(unitKey(identity, directoryId));
            }
        }

        // Records marked "searching" whose unit has not reported back yet.
        const started = new Map<string, ProfileRecord>();

        try {
            return await this.orchestrator.searchBatch(identities, directoryIds, {
                ...options,
                include: (unit) => eligible.has(unit.key) && (options.include?.(unit) ?? true),
                onUnitStart: async (unit) => {
                    // Stored identities always carry an id, so identity_key is the therapist id.
                    const record = await this.loadForSearch(unit.identity_key, unit.site_id);
                    if (ProfileStateMachine.canApply(record, 'search_requested')) {
                        started.set(unit.key, await this.save(record, { type: 'search_requested' }));
                    }
                    await options.onUnitStart?.(unit);
                },
                onUnitComplete: async (unit, result) => {
                    await this.recordBatchOutcome(unit, result, started, eligible);
                    await options.onUnitComplete?.(unit, result);
                },
            });
        } catch (e) {
            if (e instanceof ScoringInconsistencyError) {
                for (const [key, record] of started) {
                    await this.save(record, { type: 'search_completed', result: this.aborted(record.directory_id, e) });
                    started.delete(key);
                }
            }
            throw e;
        }
    }

    async confirm(
        therapistId: string,
        directoryId: string,
        profileUrl: string | null,
        targetStatus: ConfirmedStatus
    ): Promise<ProfileRecord> {
        const record = await this.transition(therapistId, directoryId, {
            type: 'confirmed',
            profile_url: profileUrl,
            target: targetStatus,
        });
        Logger.info(`[ProfileTracker] ✅ confirmed as ${targetStatus}`, {
            therapist_id: therapistId,
            directory_id: directoryId,
            url: profileUrl ?? undefined,
        });
        return record;
    }

    async withdraw(therapistId: string, directoryId: string, reason?: string): Promise<ProfileRecord> {
        return this.transition(therapistId, directoryId, { type: 'withdrawn', reason });
    }

    /**
     * Releases a record stuck in "searching" (crashed run, lost write) back to
     * the status it had before that search, whatever its age.
     */
    async reset(therapistId: string, directoryId: string, reason = 'search reset by operator'): Promise<ProfileRecord> {
        return this.transition(therapistId, directoryId, { type: 'search_abandoned', reason });
    }

    /**
     * Scrapes the live profile (the confirmed URL unless one is given) and
     * compares it with the stored identity. Records when it was last checked.
     */
    async inspect(therapistId: string, directoryId: string, url?: string): Promise<Inspection> {
        const identity = await this.requireIdentity(therapistId);
        const directory = await this.requireDirectory(directoryId);
        const record = await this.load(therapistId, directoryId);

        const target = url ?? record.profile_url;
        if (!target) {
            throw new RecordNotFoundError('Profile URL', `${therapistId}::${directoryId}`);
        }

        const profile = await this.inspector.scrapeProfile(target, directory, this.orchestrator.policyFor(directory));
        const comparison = this.inspector.compare(identity, profile);
        const detail = comparison.differences.length > 0 ? comparison.differences.join('; ') : 'profile matches stored identity';
        const updated = await this.save(record, { type: 'inspected', detail });

        return { record: updated, profile, comparison };
    }

    // =========================================================================
    // PRIVATE HELPERS
    // =========================================================================

    private async transition(therapistId: string, directoryId: string, event: ProfileEvent): Promise<ProfileRecord> {
        const record = await this.load(therapistId, directoryId);
        return this.save(record, event);
    }

    private async save(record: ProfileRecord, event: ProfileEvent): Promise<ProfileRecord> {
        const next = ProfileStateMachine.apply(record, event, new Date(this.clock.now()).toISOString());
        await this.repository.upsertProfileRecord(next);
        Logger.debug(`[ProfileTracker] ${record.status} -> ${next.status}`, {
            therapist_id: next.therapist_id,
            directory_id: next.directory_id,
            event: event.type,
        });
        return next;
    }

    /**
     * Units that started get their completion written. Units that never started
     * (halted site) are recorded in one go, skipped ones are left alone. A failed
     * completion write falls back to restoring the pre-search status.
     */
    private async recordBatchOutcome(
        unit: BatchUnit,
        result: DiscoveryResult,
        started: Map<string, ProfileRecord>,
        eligible: ReadonlySet<string>
    ): Promise<void> {
        const searching = started.get(unit.key) ?? (await this.startUnstarted(unit, result, eligible));
        started.delete(unit.key);
        if (!searching) return;

        try {
            await this.save(searching, { type: 'search_completed', result });
        } catch (e) {
            const error = toError(e);
            Logger.logError('[ProfileTracker] could not store search outcome, restoring record', error, {
                therapist_id: searching.therapist_id,
                directory_id: searching.directory_id,
            });
            await this.save(searching, { type: 'search_completed', result: this.aborted(searching.directory_id, error) });
        }
    }

    private async startUnstarted(
        unit: BatchUnit,
        result: DiscoveryResult,
        eligible: ReadonlySet<string>
    ): Promise<ProfileRecord | null> {
        if (!eligible.has(unit.key) || result.outcome_kind === 'skipped') return null;
        const record = await this.loadForSearch(unit.identity_key, unit.site_id);
        if (!ProfileStateMachine.canApply(record, 'search_requested')) return null;
        return this.save(record, { type: 'search_requested' });
    }

    /** Loads a record, first releasing a "searching" state older than the stale threshold. */
    private async loadForSearch(therapistId: string, directoryId: string): Promise<ProfileRecord> {
        const record = await this.load(therapistId, directoryId);
        if (record.status !== ProfileStatus.SEARCHING) return record;

        const startedAt = ProfileStateMachine.searchStartedAt(record);
        const age = startedAt ? this.clock.now() - Date.parse(startedAt) : Number.POSITIVE_INFINITY;
        if (age < this.staleSearchMs) return record;

        Logger.warn('[ProfileTracker] releasing stale search', {
            therapist_id: therapistId,
            directory_id: directoryId,
            started_at: startedAt ?? undefined,
        });
        return this.save(record, { type: 'search_abandoned', reason: `stale search since ${startedAt ?? 'unknown'}` });
    }

    private async load(therapistId: string, directoryId: string): Promise<ProfileRecord> {
        const existing = await this.repository.getProfileRecord(therapistId, directoryId);
        return existing ?? ProfileStateMachine.newRecord(therapistId, directoryId);
    }

    private async requireIdentity(therapistId: string): Promise<StoredIdentity> {
        const identity = await this.repository.getIdentity(therapistId);
        if (!identity) throw new RecordNotFoundError('Therapist', therapistId);
        return identity;
    }

    private async requireDirectory(directoryId: string): Promise<DirectoryConfig> {
        const directories = await this.repository.listDirectories();
        const directory = directories.find((d) => d.directory_id === directoryId);
        if (!directory) throw new RecordNotFoundError('Directory', directoryId);
        return directory;
    }

    private aborted(directoryId: string, error: Error): DiscoveryResult {
        return {
            site_id: directoryId,
            outcome_kind: 'skipped',
            candidates: [],
            error_detail: `aborted: ${error.message}`,
            attempts: 0,
            excluded_count: 0,
            auto_confirm_proposal: null,
            diagnostics: [],
            completed_at: new Date(this.clock.now()).toISOString(),
        };
    }
}
