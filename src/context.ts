import { EnvConfig, config as envConfig } from './config';
import { DEFAULT_DISCOVERY_CONFIG_PATH, loadDiscoveryConfig } from './config/discovery_config';
import { DiscoveryOrchestrator } from './core/discovery/discovery_orchestrator';
import { PuppeteerRenderSessionFactory } from './core/fetch/render_session';
import { SiteFetcher } from './core/fetch/site_fetcher';
import { ProfileTracker } from './core/lifecycle/profile_tracker';
import { ProfileInspector } from './core/profile/profile_inspector';
import { SqliteProfileRepository } from './repository/sqlite_repository';
import { ManagedProfileRepository } from './repository/types';
import { Logger } from './utils/logger';

export interface DiscoveryContext {
    env: EnvConfig;
    repository: ManagedProfileRepository;
    orchestrator: DiscoveryOrchestrator;
    tracker: ProfileTracker;
}

/**
 * Wires the SQLite repository, YAML scoring config and optional render
 * fallback from the environment.
 */
export async function createDiscoveryContext(
    env: EnvConfig = envConfig,
    repository: ManagedProfileRepository = new SqliteProfileRepository(env.SQLITE_PATH)
): Promise<DiscoveryContext> {
    const discovery = loadDiscoveryConfig(env.DISCOVERY_CONFIG_PATH ?? DEFAULT_DISCOVERY_CONFIG_PATH);
    const directories = await repository.listDirectories();

    if (!env.CHROME_PATH) {
        Logger.debug('[Context] CHROME_PATH not set, render fallback disabled');
    }

    // One fetcher, so searches and inspections share per-site pacing.
    const fetcher = new SiteFetcher();
    const orchestrator = new DiscoveryOrchestrator({
        directories,
        fetcher,
        config: discovery,
        renderFactory: env.CHROME_PATH ? new PuppeteerRenderSessionFactory(env.CHROME_PATH) : undefined,
        concurrency: env.BATCH_CONCURRENCY,
    });
    const tracker = new ProfileTracker({
        repository,
        orchestrator,
        inspector: new ProfileInspector(fetcher),
        staleSearchMs: env.STALE_SEARCH_MS,
    });

    return { env, repository, orchestrator, tracker };
}
