import { DirectoryConfig, TherapistIdentity } from '../../types';
import { BaseSiteAdapter, buildUrl, locationOf } from './base_adapter';
import { RawCandidate, SearchRequest } from './types';

const DEFAULT_BASE = 'https://www.psychologytoday.com';

/**
 * Psychology Today result pages. Card markup changes often, so the profile
 * link shape (/us/therapists/<slug>/<numeric id>) is the fallback.
 */
export class PsychologyTodayAdapter extends BaseSiteAdapter {
    readonly key = 'psychology_today';
    readonly defaultPolicy = {
        min_delay_ms: 4000,
        allow_render_fallback: true,
    };

    protected readonly noResultsPatterns = [
        /no (therapists|results) (were )?found/i,
        /we couldn't find any/i,
    ];

    buildSearchRequest(identity: TherapistIdentity, directory: DirectoryConfig): SearchRequest {
        const base = directory.base_url || DEFAULT_BASE;
        const location = locationOf(identity);
        const url = buildUrl(new URL('/us/therapists', base).toString(), {
            search: identity.full_name,
            near: location,
            specialty: identity.specialties?.join(','),
        });
        return { site_id: directory.directory_id, url, base_url: base, directory };
    }

    parseResults(body: string, request: SearchRequest): RawCandidate[] {
        return this.parseCards(body, request, {
            cards: '.profile-card, .results-row, .therapist-card, .result-item',
            names: ['.profile-title', '.profile-name a', '.name a', 'h3 a', 'h2 a', 'h4 a', "a[href*='/therapists/']"],
            linkPattern: /\/therapists\/[a-z0-9-]+\/\d+/i,
        });
    }
}
