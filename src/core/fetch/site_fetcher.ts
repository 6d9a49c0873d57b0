/**
 * 🌐 SITE FETCHER
 * One logical fetch = up to `max_retries + 1` HTTP attempts, each paced by the
 * site's rate limiter and sent under a fresh identity, plus at most one render
 * attempt when soft blocks exhaust the budget. Never throws: every path ends in
 * a classified FetchOutcome.
 */

import { SitePolicy } from '../../types';
import { HardBlockError, NetworkFailureError, SoftBlockError, toError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { AttemptClass, BlockClassifier, BlockSignature } from './block_classifier';
import { AxiosTransport, HttpResponse, HttpTransport } from './http_transport';
import { IdentityRotator, RequestIdentity } from './identity_rotator';
import { RenderSession } from './render_session';
import { Clock, SiteRateLimiter, systemClock } from './site_rate_limiter';

export type FetchStatusKind = 'success' | 'soft_block' | 'hard_block' | 'network_failure';

export interface AttemptRecord {
    attempt: number;
    mode: 'http' | 'render';
    identity: string;
    http_status: number | null;
    classification: AttemptClass;
    signal?: string;
}

export interface FetchOutcome {
    status_kind: FetchStatusKind;
    body: string | null;
    http_status: number | null;
    attempts: number;
    attempt_log: AttemptRecord[];
    error_detail: string | null;
    rendered: boolean;
}

export interface FetchOptions {
    siteId: string;
    /** Checked before every attempt; true stops the fetch with a hard block. */
    isHalted?: () => boolean;
    /** Lazily acquires the site's render session. */
    renderSession?: () => Promise<RenderSession>;
}

export interface SiteFetcherDeps {
    transport?: HttpTransport;
    limiter?: SiteRateLimiter;
    clock?: Clock;
    random?: () => number;
}

interface AttemptResult {
    response: HttpResponse | null;
    signature: BlockSignature;
    classification: AttemptClass;
}

export class SiteFetcher {
    private readonly transport: HttpTransport;
    private readonly limiter: SiteRateLimiter;
    private readonly clock: Clock;
    private readonly random: () => number;
    private rotators = new Map<string, IdentityRotator>();

    constructor(deps: SiteFetcherDeps = {}) {
        this.clock = deps.clock ?? systemClock;
        this.transport = deps.transport ?? new AxiosTransport();
        this.limiter = deps.limiter ?? new SiteRateLimiter(this.clock);
        this.random = deps.random ?? Math.random;
    }

    async fetch(url: string, policy: SitePolicy, options: FetchOptions): Promise<FetchOutcome> {
        const { siteId } = options;
        const rotator = this.getRotator(siteId);
        const log: AttemptRecord[] = [];
        const maxAttempts = policy.max_retries + 1;
        let last: AttemptResult | null = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (options.isHalted?.()) {
                return this.halted(siteId, log);
            }

            if (attempt > 1) {
                await this.clock.sleep(this.backoffDelay(policy, attempt - 1));
            }

            const identity = attempt > 1 && policy.rotate_identity ? rotator.rotate() : rotator.current();
            const result = await this.limiter.schedule(siteId, policy.min_delay_ms, () =>
                this.attemptHttp(url, identity, policy.timeout_ms)
            );
            log.push(this.record(attempt, 'http', identity, result));
            last = result;

            if (result.classification === 'success' && result.response) {
                return this.done('success', result.response, log, false);
            }

            if (result.classification === 'soft_block') {
                Logger.warn(`[SiteFetcher] 🚫 attempt ${attempt}/${maxAttempts} soft-blocked`, {
                    site_id: siteId,
                    url,
                    error: new SoftBlockError(siteId, result.signature.raw_signal ?? result.signature.type),
                });
            }
        }

        if (last?.classification === 'soft_block') {
            return this.afterSoftBlocks(url, policy, options, rotator, log);
        }

        const failure = new NetworkFailureError(
            `Network failure on ${siteId} after ${log.length} attempts (${last?.signature.raw_signal ?? 'unknown'})`,
            { siteId, url }
        );
        Logger.logError('[SiteFetcher] retries exhausted', failure, { site_id: siteId, url });
        return {
            status_kind: 'network_failure',
            body: null,
            http_status: last?.response?.status ?? null,
            attempts: log.length,
            attempt_log: log,
            error_detail: failure.message,
            rendered: false,
        };
    }

    /**
     * Exponential backoff for the n-th retry: base * 2^(n-1) + jitter.
     */
    backoffDelay(policy: SitePolicy, retry: number): number {
        const jitter = Math.floor(this.random() * policy.jitter_ms);
        return policy.backoff_base_ms * Math.pow(2, retry - 1) + jitter;
    }

    // =========================================================================
    // PRIVATE HELPERS
    // =========================================================================

    private async afterSoftBlocks(
        url: string,
        policy: SitePolicy,
        options: FetchOptions,
        rotator: IdentityRotator,
        log: AttemptRecord[]
    ): Promise<FetchOutcome> {
        const { siteId } = options;

        if (policy.allow_render_fallback && options.renderSession && !options.isHalted?.()) {
            const identity = rotator.rotate();
            const result = await this.attemptRender(url, identity, policy, options);
            log.push(this.record(log.length + 1, 'render', identity, result));
            if (result.classification === 'success' && result.response) {
                Logger.info('[SiteFetcher] 🖥️ render fallback succeeded', { site_id: siteId, url });
                return this.done('success', result.response, log, true);
            }
        }

        const lastSignal = log[log.length - 1]?.signal ?? 'blocked';
        const block = new HardBlockError(siteId, `retry budget exhausted after ${log.length} attempts (${lastSignal})`);
        Logger.logError('[SiteFetcher] ⛔ hard block', block, { site_id: siteId, url });
        return {
            status_kind: 'hard_block',
            body: null,
            http_status: this.lastStatus(log),
            attempts: log.length,
            attempt_log: log,
            error_detail: block.message,
            rendered: log.some((entry) => entry.mode === 'render'),
        };
    }

    private async attemptHttp(url: string, identity: RequestIdentity, timeoutMs: number): Promise<AttemptResult> {
        try {
            const response = await this.transport.get({ url, headers: identity.headers, timeoutMs });
            const signature = BlockClassifier.classify(response.status, response.body, url);
            return { response, signature, classification: BlockClassifier.toAttemptClass(signature.type) };
        } catch (e) {
            const signature = BlockClassifier.classifyError(toError(e), url);
            return { response: null, signature, classification: BlockClassifier.toAttemptClass(signature.type) };
        }
    }

    private async attemptRender(
        url: string,
        identity: RequestIdentity,
        policy: SitePolicy,
        options: FetchOptions
    ): Promise<AttemptResult> {
        try {
            const acquire = options.renderSession;
            if (!acquire) {
                throw new Error('no render session available');
            }
            const session = await acquire();
            return await this.limiter.schedule(options.siteId, policy.min_delay_ms, async () => {
                const response = await session.render(url, identity, policy.timeout_ms);
                const signature = BlockClassifier.classify(response.status, response.body, url);
                return { response, signature, classification: BlockClassifier.toAttemptClass(signature.type) };
            });
        } catch (e) {
            const error = toError(e);
            Logger.logError('[SiteFetcher] render attempt failed', error, { site_id: options.siteId, url });
            const signature = BlockClassifier.classifyError(error, url);
            return { response: null, signature, classification: 'network_failure' };
        }
    }

    private halted(siteId: string, log: AttemptRecord[]): FetchOutcome {
        const block = new HardBlockError(siteId, 'site halted for the rest of the run');
        Logger.warn('[SiteFetcher] site halted, no further requests', { site_id: siteId });
        return {
            status_kind: 'hard_block',
            body: null,
            http_status: this.lastStatus(log),
            attempts: log.length,
            attempt_log: log,
            error_detail: block.message,
            rendered: false,
        };
    }

    private done(kind: FetchStatusKind, response: HttpResponse, log: AttemptRecord[], rendered: boolean): FetchOutcome {
        return {
            status_kind: kind,
            body: response.body,
            http_status: response.status,
            attempts: log.length,
            attempt_log: log,
            error_detail: null,
            rendered,
        };
    }

    private record(attempt: number, mode: 'http' | 'render', identity: RequestIdentity, result: AttemptResult): AttemptRecord {
        return {
            attempt,
            mode,
            identity: identity.label,
            http_status: result.response?.status ?? null,
            classification: result.classification,
            signal: result.signature.raw_signal,
        };
    }

    private lastStatus(log: AttemptRecord[]): number | null {
        for (let i = log.length - 1; i >= 0; i--) {
            const status = log[i].http_status;
            if (status !== null) return status;
        }
        return null;
    }

    private getRotator(siteId: string): IdentityRotator {
        let rotator = this.rotators.get(siteId);
        if (!rotator) {
            rotator = new IdentityRotator(Math.floor(this.random() * 1000));
            this.rotators.set(siteId, rotator);
        }
        return rotator;
    }
}
