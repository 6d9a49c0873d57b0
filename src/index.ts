export * from './types';
export * from './utils/errors';
export { Logger, ErrorCategory } from './utils/logger';
export { config, loadEnvConfig } from './config';
export * from './config/discovery_config';
export { parseIdentity, parseDirectory, IdentitySchema, DirectorySchema } from './core/validation';

export { BlockClassifier, BlockType } from './core/fetch/block_classifier';
export { SiteRateLimiter, systemClock } from './core/fetch/site_rate_limiter';
export type { Clock } from './core/fetch/site_rate_limiter';
export { IdentityRotator } from './core/fetch/identity_rotator';
export { AxiosTransport } from './core/fetch/http_transport';
export type { HttpTransport, HttpRequest, HttpResponse } from './core/fetch/http_transport';
export { PuppeteerRenderSessionFactory } from './core/fetch/render_session';
export type { RenderSession, RenderSessionFactory } from './core/fetch/render_session';
export { SiteFetcher } from './core/fetch/site_fetcher';
export type { FetchOutcome, FetchOptions } from './core/fetch/site_fetcher';

export type { SiteAdapter, SearchRequest, RawCandidate } from './core/adapters/types';
export { BaseSiteAdapter } from './core/adapters/base_adapter';
export { PsychologyTodayAdapter } from './core/adapters/psychology_today';
export { ZencareAdapter, TherapyDenAdapter } from './core/adapters/therapist_card_adapter';
export { SelectorAdapter } from './core/adapters/selector_adapter';
export { GenericAdapter } from './core/adapters/generic_adapter';
export { AdapterRegistry, createDefaultRegistry } from './core/adapters/registry';

export { CandidateExtractor } from './core/extraction/candidate_extractor';
export { IdentityMatcher } from './core/matching/identity_matcher';
export { CandidateDeduplicator, normalizeProfileUrl } from './core/matching/candidate_deduplicator';

export { DiscoveryOrchestrator, identityKey, unitKey } from './core/discovery/discovery_orchestrator';
export type { BatchOptions, BatchUnit, BatchDiscoveryReport } from './core/discovery/discovery_orchestrator';
export { ProfileStateMachine, CONFIRMED_STATUSES, isConfirmedStatus } from './core/lifecycle/profile_state_machine';
export type { ProfileEvent } from './core/lifecycle/profile_state_machine';
export { ProfileTracker } from './core/lifecycle/profile_tracker';
export { ProfileInspector } from './core/profile/profile_inspector';
export type { ScrapedProfile, ProfileComparison } from './core/profile/profile_inspector';

export type { ProfileRepository, ManagedProfileRepository, StoredIdentity } from './repository/types';
export { InMemoryProfileRepository } from './repository/memory_repository';
export { SqliteProfileRepository } from './repository/sqlite_repository';
export { loadSeed, loadSeedFile } from './repository/seed_loader';
export { createDiscoveryContext } from './context';
