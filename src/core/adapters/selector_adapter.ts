import { DirectoryConfig, SelectorConfig, TherapistIdentity } from '../../types';
import { ConfigurationError } from '../../utils/errors';
import { BaseSiteAdapter, locationOf } from './base_adapter';
import { RawCandidate, SearchRequest } from './types';

const PLACEHOLDER = /\{(name|state|city|location)\}/g;

function requireSelectors(directory: DirectoryConfig): SelectorConfig {
    if (!directory.selectors) {
        throw new ConfigurationError(`Directory ${directory.directory_id} uses the selector adapter but has no selectors`);
    }
    return directory.selectors;
}

/**
 * Adapter driven entirely by the selector config stored on the directory.
 * Lets operators onboard a site with stable markup without shipping code.
 */
export class SelectorAdapter extends BaseSiteAdapter {
    readonly key = 'selector';

    buildSearchRequest(identity: TherapistIdentity, directory: DirectoryConfig): SearchRequest {
        const selectors = requireSelectors(directory);
        const values: Record<string, string> = {
            name: identity.full_name,
            state: identity.state ?? '',
            city: identity.city ?? '',
            location: locationOf(identity),
        };
        const filled = selectors.search_url.replace(PLACEHOLDER, (_, field: string) => encodeURIComponent(values[field] ?? ''));
        return {
            site_id: directory.directory_id,
            url: new URL(filled, directory.base_url).toString(),
            base_url: directory.base_url,
            directory,
        };
    }

    parseResults(body: string, request: SearchRequest): RawCandidate[] {
        const selectors = requireSelectors(request.directory);
        return this.parseCards(body, request, {
            cards: selectors.profile_selector,
            names: [selectors.name_selector],
            link: selectors.profile_url_selector,
        });
    }

    detectNoResults(body: string, request: SearchRequest): boolean {
        const marker = request.directory.selectors?.no_results_text;
        if (marker && body.toLowerCase().includes(marker.toLowerCase())) {
            return true;
        }
        return super.detectNoResults(body, request);
    }
}
