import { DirectoryConfig, TherapistIdentity } from '../../types';
import { BaseSiteAdapter, buildUrl, locationOf } from './base_adapter';
import { RawCandidate, SearchRequest } from './types';

/**
 * Directories rendering `div.therapist-card` blocks with an `h3.therapist-name`
 * link. Their search takes location and specialty only; the name is matched
 * by the scorer.
 */
export abstract class TherapistCardAdapter extends BaseSiteAdapter {
    protected abstract readonly defaultBase: string;

    buildSearchRequest(identity: TherapistIdentity, directory: DirectoryConfig): SearchRequest {
        const base = directory.base_url || this.defaultBase;
        const url = buildUrl(new URL('/therapists', base).toString(), {
            location: locationOf(identity),
            specialty: identity.specialties?.join(','),
        });
        return { site_id: directory.directory_id, url, base_url: base, directory };
    }

    parseResults(body: string, request: SearchRequest): RawCandidate[] {
        return this.parseCards(body, request, {
            cards: 'div.therapist-card',
            names: ['h3.therapist-name a', 'h3.therapist-name', '.therapist-name'],
            link: 'h3.therapist-name a',
        });
    }
}

export class ZencareAdapter extends TherapistCardAdapter {
    readonly key = 'zencare';
    protected readonly defaultBase = 'https://zencare.co';
}

export class TherapyDenAdapter extends TherapistCardAdapter {
    readonly key = 'therapyden';
    protected readonly defaultBase = 'https://www.therapyden.com';
    readonly defaultPolicy = { min_delay_ms: 2500 };
}
