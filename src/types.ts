export type TherapistIdentity = Readonly<{
    therapist_id?: string;
    full_name: string;
    npi?: string; // 10 digits when present
    license_number?: string;
    state?: string; // Two-letter code, e.g. "FL"
    city?: string;
    credentials?: string;
    specialties?: readonly string[];
}>;

export type CandidateIdentifiers = {
    npi?: string;
    license_number?: string;
};

export type Candidate = {
    site_id: string;
    profile_url: string;
    display_name: string;
    snippet_text: string;
    extracted_identifiers: CandidateIdentifiers;
    fetched_at: string;
};

export type ScoreFactorKind =
    | 'npi_match'
    | 'license_match'
    | 'name_similarity'
    | 'location_match'
    | 'npi_conflict'
    | 'license_conflict';

export type ScoreFactor = {
    factor: ScoreFactorKind;
    weight: number;
    detail: string;
};

export type ScoredCandidate = Candidate & {
    score: number;
    rationale: ScoreFactor[];
};

export type OutcomeKind =
    | 'success'
    | 'soft_block'
    | 'hard_block'
    | 'network_failure'
    | 'no_results'
    | 'skipped';

export type DiscoveryResult = {
    site_id: string;
    outcome_kind: OutcomeKind;
    candidates: ScoredCandidate[];
    error_detail: string | null;
    attempts: number;
    excluded_count: number; // Candidates scored below the low-confidence cutoff
    auto_confirm_proposal: string | null; // Profile URL at/above the high-confidence cutoff
    diagnostics: string[];
    completed_at: string;
};

export enum ProfileStatus {
    UNKNOWN = 'unknown',
    SEARCHING = 'searching',
    FOUND_UNCONFIRMED = 'found_unconfirmed',
    NOT_FOUND = 'not_found',
    BLOCKED = 'blocked',
    SEARCH_FAILED = 'search_failed',
    ACTIVE_MANAGED = 'active_managed',
    EXISTS_UNMANAGED = 'exists_unmanaged',
    NEEDS_CLAIMING = 'needs_claiming',
    THERAPIST_MANAGED = 'therapist_managed',
    WITHDRAWN = 'withdrawn',
}

export type ConfirmedStatus =
    | ProfileStatus.ACTIVE_MANAGED
    | ProfileStatus.EXISTS_UNMANAGED
    | ProfileStatus.NEEDS_CLAIMING
    | ProfileStatus.THERAPIST_MANAGED;

export type ProfileHistoryEntry = {
    at: string;
    event: string;
    from: ProfileStatus;
    to: ProfileStatus;
    detail?: string;
};

export type PendingCandidate = {
    profile_url: string;
    score: number;
};

export type ProfileRecord = {
    therapist_id: string;
    directory_id: string;
    status: ProfileStatus;
    profile_url: string | null;
    last_checked_at: string | null;
    confidence_score: number | null;
    history: ProfileHistoryEntry[];
    pending_candidates: PendingCandidate[];
};

export type SitePolicy = {
    min_delay_ms: number;
    max_retries: number;
    backoff_base_ms: number;
    jitter_ms: number;
    timeout_ms: number;
    allow_render_fallback: boolean;
    rotate_identity: boolean;
};

export type SelectorConfig = {
    search_url: string; // Template with {name}, {state}, {city}, {location}
    profile_selector: string;
    name_selector: string;
    profile_url_selector?: string;
    credentials_selector?: string;
    location_selector?: string;
    no_results_text?: string;
};

export type DirectoryConfig = {
    directory_id: string;
    name: string;
    base_url: string;
    adapter_key: string;
    site_policy?: Partial<SitePolicy>;
    selectors?: SelectorConfig;
};
