import { describe, expect, it } from 'vitest';
import { DEFAULT_DISCOVERY_CONFIG, DiscoveryConfig } from '../../src/config/discovery_config';
import { createDefaultRegistry } from '../../src/core/adapters/registry';
import { RawCandidate, SearchRequest, SiteAdapter } from '../../src/core/adapters/types';
import {
    BatchUnit,
    DiscoveryOrchestrator,
    OrchestratorDeps,
    identityKey,
    unitKey,
} from '../../src/core/discovery/discovery_orchestrator';
import { HttpRequest } from '../../src/core/fetch/http_transport';
import { SiteFetcher } from '../../src/core/fetch/site_fetcher';
import { DirectoryConfig, TherapistIdentity } from '../../src/types';
import { IdentityValidationError } from '../../src/utils/errors';
import {
    FAST_POLICY,
    FakeClock,
    FakeRenderFactory,
    ScriptedTransport,
    Step,
    fixture,
    ok,
    sequence,
    status,
} from '../helpers/fakes';

const PT_HOST = 'www.psychologytoday.com';
const DEN_HOST = 'www.therapyden.com';
const JANE_URL = 'https://www.psychologytoday.com/us/therapists/jane-doe-jacksonville-fl/123456';

const DIRECTORIES: DirectoryConfig[] = [
    {
        directory_id: 'pt',
        name: 'Psychology Today',
        base_url: 'https://www.psychologytoday.com',
        adapter_key: 'psychology_today',
        site_policy: { min_delay_ms: 0, allow_render_fallback: false },
    },
    {
        directory_id: 'den',
        name: 'TherapyDen',
        base_url: 'https://www.therapyden.com',
        adapter_key: 'therapyden',
        site_policy: { min_delay_ms: 0 },
    },
];

const CONFIG: DiscoveryConfig = { ...DEFAULT_DISCOVERY_CONFIG, default_site_policy: FAST_POLICY };

const jane: TherapistIdentity = { therapist_id: 't-1', full_name: 'Jane Doe', npi: '1234567890' };
const john: TherapistIdentity = { therapist_id: 't-2', full_name: 'John Roe' };

function route(routes: Record<string, () => Step>): (request: HttpRequest) => Step {
    return (request) => {
        const host = new URL(request.url).hostname;
        const handler = routes[host];
        return handler ? handler() : new Error(`no route for ${host}`);
    };
}

function setup(routes: Record<string, () => Step>, deps: Partial<OrchestratorDeps> = {}) {
    const clock = new FakeClock();
    const transport = new ScriptedTransport(route(routes));
    const fetcher = new SiteFetcher({ transport, clock, random: () => 0 });
    const orchestrator = new DiscoveryOrchestrator({ directories: DIRECTORIES, config: CONFIG, fetcher, clock, ...deps });
    return { clock, transport, orchestrator };
}

class ExplodingAdapter implements SiteAdapter {
    readonly key = 'exploding';
    readonly defaultPolicy = {};

    buildSearchRequest(): SearchRequest {
        throw new Error('boom');
    }

    parseResults(): RawCandidate[] {
        return [];
    }
}

describe('DiscoveryOrchestrator', () => {

    // =========================================================================
    // SINGLE SEARCH
    // =========================================================================

    describe('searchOne', () => {
        it('finds an NPI-confirmed profile and proposes it', async () => {
            const { orchestrator } = setup({ [PT_HOST]: () => ok(fixture('pt_results.html')) });

            const result = await orchestrator.searchOne(jane, 'pt');

            expect(result.outcome_kind).toBe('success');
            expect(result.attempts).toBe(1);
            expect(result.candidates).toHaveLength(1);
            expect(result.candidates[0].profile_url).toBe(JANE_URL);
            expect(result.candidates[0].score).toBe(1);
            expect(result.candidates[0].rationale.map((f) => f.factor)).toEqual(['npi_match', 'name_similarity']);
            expect(result.excluded_count).toBe(1);
            expect(result.auto_confirm_proposal).toBe(JANE_URL);
            expect(result.diagnostics).toEqual(['adapter=psychology_today']);
        });

        it('succeeds with no candidates after two soft-blocked retries', async () => {
            const empty = '<html><body><div class="results"></div><p>Refine your search</p></body></html>';
            const { transport, orchestrator } = setup({ [PT_HOST]: sequence(status(403), status(403), ok(empty)) });

            const result = await orchestrator.searchOne(jane, 'pt');

            expect(result.outcome_kind).toBe('success');
            expect(result.attempts).toBe(3);
            expect(result.candidates).toEqual([]);
            expect(transport.requests).toHaveLength(3);
        });

        it('reports a hard block when every attempt is rate limited', async () => {
            const { transport, orchestrator } = setup({ [PT_HOST]: () => status(429, '') });

            const result = await orchestrator.searchOne(jane, 'pt');

            expect(result.outcome_kind).toBe('hard_block');
            expect(result.attempts).toBe(3);
            expect(result.error_detail).toBe('Hard block on pt: retry budget exhausted after 3 attempts (429)');
            expect(transport.requests).toHaveLength(3);
            expect(result.diagnostics).toEqual(['adapter=psychology_today', `manual search: ${transport.requests[0].url}`]);
        });

        it('accepts a results page that loads a captcha script for its contact form', async () => {
            const page = fixture('pt_results.html').replace(
                '</body>',
                '<script src="https://www.google.com/recaptcha/api.js" async defer></script></body>'
            );
            const { transport, orchestrator } = setup({ [PT_HOST]: () => ok(page) });

            const result = await orchestrator.searchOne(jane, 'pt');

            expect(result.outcome_kind).toBe('success');
            expect(result.attempts).toBe(1);
            expect(result.candidates.map((c) => c.profile_url)).toEqual([JANE_URL]);
            expect(transport.requests).toHaveLength(1);
        });

        it('collapses the same profile listed twice', async () => {
            const { orchestrator } = setup({ [PT_HOST]: () => ok(fixture('pt_duplicates.html')) });

            const result = await orchestrator.searchOne({ full_name: 'Jane Doe', state: 'FL' }, 'pt');

            expect(result.candidates).toHaveLength(1);
            expect(result.candidates[0].score).toBe(0.4);
            expect(result.candidates[0].profile_url).toBe(`${JANE_URL}/`);
            expect(result.auto_confirm_proposal).toBeNull();
            expect(result.diagnostics).toEqual(['adapter=psychology_today', '1 duplicates collapsed']);
        });

        it('turns unparsable markup into an empty success with a diagnostic', async () => {
            const { orchestrator } = setup({ [PT_HOST]: () => ok('') });

            const result = await orchestrator.searchOne(jane, 'pt');

            expect(result.outcome_kind).toBe('success');
            expect(result.candidates).toEqual([]);
            expect(result.diagnostics).toEqual([
                'adapter=psychology_today',
                'parse failure: Result markup for pt could not be parsed: empty document',
            ]);
        });

        it('reports an explicit no-results page', async () => {
            const { orchestrator } = setup({ [PT_HOST]: () => ok('<html><body><h2>No therapists found</h2></body></html>') });

            const result = await orchestrator.searchOne(jane, 'pt');

            expect(result.outcome_kind).toBe('no_results');
            expect(result.attempts).toBe(1);
        });

        it('rejects an invalid identity before any request', async () => {
            const { transport, orchestrator } = setup({ [PT_HOST]: () => ok('<html></html>') });

            await expect(orchestrator.searchOne({ full_name: 'Jane Doe', npi: '12345' }, 'pt')).rejects.toThrow(IdentityValidationError);
            expect(transport.requests).toHaveLength(0);
        });

        it('reports unknown directories as network failures', async () => {
            const { orchestrator } = setup({});

            const result = await orchestrator.searchOne(jane, 'nope');

            expect(result.outcome_kind).toBe('network_failure');
            expect(result.error_detail).toBe('Unknown directory: nope');
        });

        it('classifies unexpected adapter errors instead of throwing', async () => {
            const { orchestrator } = setup({}, {
                directories: [{ directory_id: 'boom', name: 'Boom', base_url: 'https://boom.example.com', adapter_key: 'exploding' }],
                registry: createDefaultRegistry().register(new ExplodingAdapter()),
            });

            const result = await orchestrator.searchOne(jane, 'boom');

            expect(result.outcome_kind).toBe('network_failure');
            expect(result.error_detail).toBe('boom');
        });

        it('opens and releases a render session around a single search', async () => {
            const renderFactory = new FakeRenderFactory(ok(fixture('pt_results.html')));
            const { orchestrator } = setup({ [PT_HOST]: () => status(403) }, {
                directories: [{ ...DIRECTORIES[0], site_policy: { min_delay_ms: 0, allow_render_fallback: true } }],
                renderFactory,
            });

            const result = await orchestrator.searchOne(jane, 'pt');

            expect(result.outcome_kind).toBe('success');
            expect(result.attempts).toBe(4);
            expect(result.diagnostics).toEqual(['adapter=psychology_today', 'served by render fallback']);
            expect(renderFactory.opened).toEqual(['pt']);
            expect(renderFactory.closed).toBe(1);
        });
    });

    // =========================================================================
    // BATCH
    // =========================================================================

    describe('searchBatch', () => {
        it('halts a hard-blocked site for the rest of the batch', async () => {
            const { transport, orchestrator } = setup({
                [PT_HOST]: () => status(429, ''),
                [DEN_HOST]: () => ok(fixture('therapist_cards.html')),
            });

            const report = await orchestrator.searchBatch([jane, john], ['pt', 'den']);

            expect(report.results.size).toBe(4);
            expect(report.halted_sites).toEqual(['pt']);
            expect(report.results.get('t-1::pt')?.outcome_kind).toBe('hard_block');
            expect(report.results.get('t-1::pt')?.attempts).toBe(3);

            const skipped = report.results.get('t-2::pt');
            expect(skipped?.outcome_kind).toBe('hard_block');
            expect(skipped?.attempts).toBe(0);
            const johnSearch = createDefaultRegistry().resolve(DIRECTORIES[0]).buildSearchRequest(john, DIRECTORIES[0]);
            expect(skipped?.diagnostics).toEqual([
                'not attempted: earlier hard block on this site',
                `manual search: ${johnSearch.url}`,
            ]);
            expect(transport.requestsTo(PT_HOST)).toHaveLength(3);

            expect(report.results.get('t-1::den')?.outcome_kind).toBe('success');
            expect(report.results.get('t-2::den')?.outcome_kind).toBe('success');
        });

        it('searches an identity given twice only once', async () => {
            const { transport, orchestrator } = setup({ [DEN_HOST]: () => ok(fixture('therapist_cards.html')) });

            const report = await orchestrator.searchBatch([jane, { ...jane }], ['den']);

            expect(report.units.map((u) => u.key)).toEqual(['t-1::den']);
            expect(report.results.size).toBe(1);
            expect(report.results.get('t-1::den')?.outcome_kind).toBe('success');
            expect(transport.requests).toHaveLength(1);
        });

        it('skips every unit when cancelled up front', async () => {
            const { transport, orchestrator } = setup({ [PT_HOST]: () => ok('<html></html>') });
            const controller = new AbortController();
            controller.abort();

            const report = await orchestrator.searchBatch([jane, john], ['pt'], { signal: controller.signal });

            expect(report.cancelled).toBe(true);
            expect([...report.results.values()].map((r) => [r.outcome_kind, r.error_detail])).toEqual([
                ['skipped', 'batch cancelled'],
                ['skipped', 'batch cancelled'],
            ]);
            expect(transport.requests).toHaveLength(0);
        });

        it('stops issuing units once cancelled mid-run', async () => {
            const { transport, orchestrator } = setup({ [DEN_HOST]: () => ok(fixture('therapist_cards.html')) });
            const controller = new AbortController();

            const report = await orchestrator.searchBatch([jane, john], ['den'], {
                signal: controller.signal,
                onUnitComplete: () => controller.abort(),
            });

            expect(report.results.get('t-1::den')?.outcome_kind).toBe('success');
            expect(report.results.get('t-2::den')?.outcome_kind).toBe('skipped');
            expect(transport.requests).toHaveLength(1);
        });

        it('skips the remaining units once the budget is spent', async () => {
            const { orchestrator } = setup({ [DEN_HOST]: sequence(status(503), ok(fixture('therapist_cards.html'))) });

            const report = await orchestrator.searchBatch([jane, john], ['den'], { budgetMs: 5 });

            expect(report.budget_exhausted).toBe(true);
            expect(report.results.get('t-1::den')?.outcome_kind).toBe('success');
            expect(report.results.get('t-2::den')?.error_detail).toBe('batch budget exhausted');
        });

        it('reports units excluded by the caller as skipped', async () => {
            const { transport, orchestrator } = setup({ [DEN_HOST]: () => ok(fixture('therapist_cards.html')) });

            const report = await orchestrator.searchBatch([jane, john], ['den'], {
                include: (unit) => unit.identity_key === 't-1',
            });

            expect(report.results.get('t-2::den')?.error_detail).toBe('excluded by caller');
            expect(transport.requests).toHaveLength(1);
        });

        it('calls hooks for every unit and survives a failing hook', async () => {
            const { orchestrator } = setup({ [DEN_HOST]: () => ok(fixture('therapist_cards.html')) });
            const started: string[] = [];
            const completed: string[] = [];

            const report = await orchestrator.searchBatch([jane, john], ['den'], {
                onUnitStart: (unit: BatchUnit) => {
                    started.push(unit.key);
                },
                onUnitComplete: (unit: BatchUnit) => {
                    completed.push(unit.key);
                    throw new Error('hook broke');
                },
            });

            expect(started).toEqual(['t-1::den', 't-2::den']);
            expect(completed).toEqual(['t-1::den', 't-2::den']);
            expect(report.results.size).toBe(2);
        });

        it('shares one render session per site and closes it when the site is done', async () => {
            const renderFactory = new FakeRenderFactory(ok(fixture('pt_results.html')));
            const { orchestrator } = setup({ [PT_HOST]: () => status(403) }, {
                directories: [{ ...DIRECTORIES[0], site_policy: { min_delay_ms: 0, allow_render_fallback: true } }],
                renderFactory,
            });

            const report = await orchestrator.searchBatch([jane, john], ['pt']);

            expect(report.results.get('t-1::pt')?.outcome_kind).toBe('success');
            expect(report.results.get('t-2::pt')?.outcome_kind).toBe('success');
            expect(renderFactory.opened).toEqual(['pt']);
            expect(renderFactory.sessions[0].renders).toHaveLength(2);
            expect(renderFactory.closed).toBe(1);
        });
    });

    // =========================================================================
    // KEYS AND POLICY
    // =========================================================================

    it('derives identity keys from id, NPI or name', () => {
        expect(identityKey(jane)).toBe('t-1');
        expect(identityKey({ full_name: 'Jane Doe', npi: '1234567890' })).toBe('npi:1234567890');
        expect(identityKey({ full_name: 'Jane  Doe, LCSW' })).toBe('name:jane-doe-lcsw');
        expect(unitKey(jane, 'pt')).toBe('t-1::pt');
    });

    it('layers default, adapter and directory policies', () => {
        const { orchestrator } = setup({});
        const policy = orchestrator.policyFor({ ...DIRECTORIES[0], site_policy: { max_retries: 5 } });

        expect(policy).toEqual({ ...FAST_POLICY, min_delay_ms: 4000, allow_render_fallback: true, max_retries: 5 });
    });
});
