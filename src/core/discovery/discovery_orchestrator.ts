/**
 * 🧭 DISCOVERY ORCHESTRATOR
 * adapter -> fetch -> extract -> score -> dedupe -> threshold, for one
 * (identity, site) unit or a whole identities x sites batch.
 *
 * Batch model: sites run in parallel (p-limit), units of one site run in
 * order on that site's worker, so a hard block halts the rest of that site
 * and its render session is released as soon as its last unit is done.
 */

import pLimit from 'p-limit';

import { DEFAULT_DISCOVERY_CONFIG, DiscoveryConfig } from '../../config/discovery_config';
import { DirectoryConfig, DiscoveryResult, OutcomeKind, SitePolicy, TherapistIdentity } from '../../types';
import { ScoringInconsistencyError, toError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { AdapterRegistry, createDefaultRegistry } from '../adapters/registry';
import { RawCandidate, SiteAdapter } from '../adapters/types';
import { CandidateExtractor } from '../extraction/candidate_extractor';
import { RenderSession, RenderSessionFactory } from '../fetch/render_session';
import { SiteFetcher } from '../fetch/site_fetcher';
import { Clock, systemClock } from '../fetch/site_rate_limiter';
import { CandidateDeduplicator } from '../matching/candidate_deduplicator';
import { IdentityMatcher } from '../matching/identity_matcher';
import { normalizeText } from '../matching/name_normalizer';
import { parseIdentity } from '../validation';
import { RenderScope } from './render_scope';

export interface BatchUnit {
    key: string;
    identity_key: string;
    identity: TherapistIdentity;
    site_id: string;
}

export interface BatchOptions {
    signal?: AbortSignal;
    /** Overall wall-clock budget; exceeded => remaining units are skipped. */
    budgetMs?: number;
    concurrency?: number;
    /** Units returning false are reported as skipped without a request. */
    include?: (unit: BatchUnit) => boolean;
    onUnitStart?: (unit: BatchUnit) => void | Promise<void>;
    onUnitComplete?: (unit: BatchUnit, result: DiscoveryResult) => void | Promise<void>;
}

export interface BatchDiscoveryReport {
    results: Map<string, DiscoveryResult>;
    units: BatchUnit[];
    halted_sites: string[];
    cancelled: boolean;
    budget_exhausted: boolean;
    started_at: string;
    finished_at: string;
}

export interface OrchestratorDeps {
    directories: readonly DirectoryConfig[];
    config?: DiscoveryConfig;
    registry?: AdapterRegistry;
    fetcher?: SiteFetcher;
    renderFactory?: RenderSessionFactory;
    clock?: Clock;
    concurrency?: number;
}

interface UnitContext {
    isHalted: () => boolean;
    renderSession?: () => Promise<RenderSession>;
}

export function identityKey(identity: TherapistIdentity): string {
    if (identity.therapist_id) return identity.therapist_id;
    if (identity.npi) return `npi:${identity.npi}`;
    return `name:${normalizeText(identity.full_name).replace(/ /g, '-')}`;
}

export function unitKey(identity: TherapistIdentity, siteId: string): string {
    return `${identityKey(identity)}::${siteId}`;
}

export class DiscoveryOrchestrator {
    private directories = new Map<string, DirectoryConfig>();
    private readonly config: DiscoveryConfig;
    private readonly registry: AdapterRegistry;
    private readonly fetcher: SiteFetcher;
    private readonly matcher: IdentityMatcher;
    private readonly renderFactory?: RenderSessionFactory;
    private readonly clock: Clock;
    private readonly concurrency: number;

    constructor(deps: OrchestratorDeps) {
        for (const directory of deps.directories) {
            this.directories.set(directory.directory_id, directory);
        }
        this.config = deps.config ?? DEFAULT_DISCOVERY_CONFIG;
        this.registry = deps.registry ?? createDefaultRegistry();
        this.clock = deps.clock ?? systemClock;
        this.fetcher = deps.fetcher ?? new SiteFetcher({ clock: this.clock });
        this.matcher = new IdentityMatcher(this.config.weights, this.config.thresholds);
        this.renderFactory = deps.renderFactory;
        this.concurrency = deps.concurrency ?? 4;
    }

    get siteIds(): string[] {
        return [...this.directories.keys()];
    }

    policyFor(directory: DirectoryConfig, adapter: SiteAdapter = this.registry.resolve(directory)): SitePolicy {
        return { ...this.config.default_site_policy, ...adapter.defaultPolicy, ...directory.site_policy };
    }

    /**
     * Single (identity, site) search. Throws only for invalid identity input and
     * scoring inconsistencies; everything else comes back as a classified result.
     */
    async searchOne(identity: TherapistIdentity, siteId: string): Promise<DiscoveryResult> {
        const query = parseIdentity(identity);
        const scope = this.renderFactory ? new RenderScope(this.renderFactory, siteId) : null;
        try {
            return await this.runUnit(query, siteId, { isHalted: () => false, renderSession: scope?.acquire });
        } finally {
            await scope?.release();
        }
    }

    async searchBatch(
        identities: readonly TherapistIdentity[],
        siteIds: readonly string[],
        options: BatchOptions = {}
    ): Promise<BatchDiscoveryReport> {
        const queries = this.uniqueQueries(identities);
        const sites = [...new Set(siteIds)];
        const startedAt = this.clock.now();
        const deadline = options.budgetMs !== undefined ? startedAt + options.budgetMs : Number.POSITIVE_INFINITY;

        const results = new Map<string, DiscoveryResult>();
        const halted = new Set<string>();
        const units: BatchUnit[] = [];
        let budgetExhausted = false;

        const stopReason = (): string | null => {
            if (options.signal?.aborted) return 'batch cancelled';
            if (this.clock.now() >= deadline) {
                budgetExhausted = true;
                return 'batch budget exhausted';
            }
            return null;
        };

        const report = async (unit: BatchUnit, result: DiscoveryResult): Promise<void> => {
            results.set(unit.key, result);
            await this.invokeHook('onUnitComplete', unit, () => options.onUnitComplete?.(unit, result));
        };

        const runSite = async (siteId: string): Promise<void> => {
            const scope = this.renderFactory ? new RenderScope(this.renderFactory, siteId) : null;
            const siteUnits = queries.map((identity) => ({
                key: unitKey(identity, siteId),
                identity_key: identityKey(identity),
                identity,
                site_id: siteId,
            }));
            units.push(...siteUnits);

            try {
                for (const unit of siteUnits) {
                    const reason = stopReason();
                    if (reason) {
                        await report(unit, this.result(siteId, 'skipped', { error_detail: reason }));
                        continue;
                    }
                    if (options.include && !options.include(unit)) {
                        await report(unit, this.result(siteId, 'skipped', { error_detail: 'excluded by caller' }));
                        continue;
                    }
                    if (halted.has(siteId)) {
                        await report(
                            unit,
                            this.result(siteId, 'hard_block', {
                                error_detail: `Site ${siteId} is halted for the rest of this run`,
                                diagnostics: [
                                    'not attempted: earlier hard block on this site',
                                    ...this.manualSearchHint(unit.identity, siteId),
                                ],
                            })
                        );
                        continue;
                    }

                    await this.invokeHook('onUnitStart', unit, () => options.onUnitStart?.(unit));
                    const result = await this.runUnit(unit.identity, siteId, {
                        isHalted: () => halted.has(siteId),
                        renderSession: scope?.acquire,
                    });
                    if (result.outcome_kind === 'hard_block') {
                        halted.add(siteId);
                        Logger.warn(`[Orchestrator] ⛔ ${siteId} halted for the rest of the run`, { site_id: siteId });
                    }
                    await report(unit, result);
                }
            } finally {
                await scope?.release();
            }
        };

        const limit = pLimit(options.concurrency ?? this.concurrency);
        await Promise.all(sites.map((siteId) => limit(() => runSite(siteId))));

        const cancelled = options.signal?.aborted ?? false;
        Logger.info('[Orchestrator] batch finished', {
            units: units.length,
            halted_sites: [...halted],
            cancelled,
            budget_exhausted: budgetExhausted,
            duration_ms: this.clock.now() - startedAt,
        });

        return {
            results,
            units,
            halted_sites: [...halted],
            cancelled,
            budget_exhausted: budgetExhausted,
            started_at: new Date(startedAt).toISOString(),
            finished_at: new Date(this.clock.now()).toISOString(),
        };
    }

    // =========================================================================
    // PIPELINE
    // =========================================================================

    private async runUnit(identity: TherapistIdentity, siteId: string, ctx: UnitContext): Promise<DiscoveryResult> {
        try {
            return await this.pipeline(identity, siteId, ctx);
        } catch (e) {
            if (e instanceof ScoringInconsistencyError) {
                Logger.fatal('[Orchestrator] scoring inconsistency', { error: e, site_id: siteId });
                throw e;
            }
            const error = toError(e);
            Logger.logError('[Orchestrator] unit failed', error, { site_id: siteId });
            return this.result(siteId, 'network_failure', { error_detail: error.message });
        }
    }

    private async pipeline(identity: TherapistIdentity, siteId: string, ctx: UnitContext): Promise<DiscoveryResult> {
        const directory = this.directories.get(siteId);
        if (!directory) {
            return this.result(siteId, 'network_failure', { error_detail: `Unknown directory: ${siteId}` });
        }

        const adapter = this.registry.resolve(directory);
        const policy = this.policyFor(directory, adapter);
        const request = adapter.buildSearchRequest(identity, directory);
        const diagnostics: string[] = [`adapter=${adapter.key}`];

        const fetched = await this.fetcher.fetch(request.url, policy, {
            siteId,
            isHalted: ctx.isHalted,
            renderSession: policy.allow_render_fallback ? ctx.renderSession : undefined,
        });

        if (fetched.status_kind !== 'success' || fetched.body === null) {
            diagnostics.push(`manual search: ${request.url}`);
            return this.result(siteId, fetched.status_kind, {
                attempts: fetched.attempts,
                error_detail: fetched.error_detail,
                diagnostics,
            });
        }
        if (fetched.rendered) diagnostics.push('served by render fallback');

        let raw: RawCandidate[];
        try {
            raw = adapter.parseResults(fetched.body, request);
        } catch (e) {
            const error = toError(e);
            Logger.logError('[Orchestrator] result markup unparsable', error, { site_id: siteId, url: request.url });
            diagnostics.push(`parse failure: ${error.message}`);
            return this.result(siteId, 'success', { attempts: fetched.attempts, diagnostics });
        }

        if (raw.length === 0 && adapter.detectNoResults?.(fetched.body, request)) {
            return this.result(siteId, 'no_results', { attempts: fetched.attempts, diagnostics });
        }

        const fetchedAt = new Date(this.clock.now()).toISOString();
        const candidates = CandidateExtractor.extract(raw, { site_id: siteId, base_url: request.base_url, fetched_at: fetchedAt });
        if (candidates.length < raw.length) {
            diagnostics.push(`${raw.length - candidates.length} entries dropped by extractor`);
        }

        const scored = this.matcher.scoreAll(identity, candidates);
        const unique = CandidateDeduplicator.dedupe(scored);
        if (unique.length < scored.length) {
            diagnostics.push(`${scored.length - unique.length} duplicates collapsed`);
        }
        const { kept, excluded_count, auto_confirm_proposal } = this.matcher.partition(unique);

        Logger.debug(`[Orchestrator] ${siteId}: ${kept.length} kept, ${excluded_count} below cutoff`, { site_id: siteId });
        return this.result(siteId, 'success', {
            candidates: kept,
            attempts: fetched.attempts,
            excluded_count,
            auto_confirm_proposal,
            diagnostics,
        });
    }

    /** One query per identity key; repeats would collide on the result key. */
    private uniqueQueries(identities: readonly TherapistIdentity[]): TherapistIdentity[] {
        const seen = new Set<string>();
        const queries: TherapistIdentity[] = [];
        for (const identity of identities) {
            const query = parseIdentity(identity);
            const key = identityKey(query);
            if (seen.has(key)) continue;
            seen.add(key);
            queries.push(query);
        }
        return queries;
    }

    private manualSearchHint(identity: TherapistIdentity, siteId: string): string[] {
        const directory = this.directories.get(siteId);
        if (!directory) return [];
        try {
            return [`manual search: ${this.registry.resolve(directory).buildSearchRequest(identity, directory).url}`];
        } catch (e) {
            Logger.logError('[Orchestrator] no manual search URL', toError(e), { site_id: siteId });
            return [];
        }
    }

    private result(siteId: string, kind: OutcomeKind, fields: Partial<DiscoveryResult> = {}): DiscoveryResult {
        return {
            site_id: siteId,
            outcome_kind: kind,
            candidates: [],
            error_detail: null,
            attempts: 0,
            excluded_count: 0,
            auto_confirm_proposal: null,
            diagnostics: [],
            completed_at: new Date(this.clock.now()).toISOString(),
            ...fields,
        };
    }

    private async invokeHook(name: string, unit: BatchUnit, hook: () => void | Promise<void>): Promise<void> {
        try {
            await hook();
        } catch (e) {
            if (e instanceof ScoringInconsistencyError) throw e;
            Logger.logError(`[Orchestrator] ${name} hook failed`, toError(e), { site_id: unit.site_id, unit: unit.key });
        }
    }
}
