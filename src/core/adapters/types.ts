import { DirectoryConfig, SitePolicy, TherapistIdentity } from '../../types';

export interface SearchRequest {
    site_id: string;
    url: string;
    /** Base for resolving relative profile links. */
    base_url: string;
    directory: DirectoryConfig;
}

/** Unnormalized record as lifted from result markup. */
export interface RawCandidate {
    display_name: string;
    profile_url: string;
    snippet_text: string;
}

export interface SiteAdapter {
    readonly key: string;
    /** Overrides applied on top of the global default policy. */
    readonly defaultPolicy: Partial<SitePolicy>;
    buildSearchRequest(identity: TherapistIdentity, directory: DirectoryConfig): SearchRequest;
    /** May throw; the orchestrator turns a throw into an empty result with a diagnostic. */
    parseResults(body: string, request: SearchRequest): RawCandidate[];
    detectNoResults?(body: string, request: SearchRequest): boolean;
}
