import { DirectoryConfig, TherapistIdentity } from '../../types';
import { BaseSiteAdapter, buildUrl, locationOf, squash } from './base_adapter';
import { RawCandidate, SearchRequest } from './types';

const CARD_CLASS = /profile|therapist|provider|card|result/i;
const NAME_CLASS = /name|title/i;
const PROFILE_LINK = /\/(therapists?|providers?|profiles?|counselors?)\/[^/?#]+/i;

/**
 * Heuristic fallback for every directory without a bespoke adapter:
 * `/search?q=` plus card and link-pattern extraction.
 */
export class GenericAdapter extends BaseSiteAdapter {
    readonly key = 'generic';
    readonly defaultPolicy = { min_delay_ms: 3000 };

    buildSearchRequest(identity: TherapistIdentity, directory: DirectoryConfig): SearchRequest {
        const base = directory.base_url.replace(/\/+$/, '');
        const url = buildUrl(`${base}/search`, {
            q: identity.full_name,
            location: locationOf(identity),
        });
        return { site_id: directory.directory_id, url, base_url: directory.base_url, directory };
    }

    parseResults(body: string, request: SearchRequest): RawCandidate[] {
        const $ = this.load(body, request);
        const out: RawCandidate[] = [];

        $('div[class], article[class], li[class]').each((_, el) => {
            const card = $(el);
            if (!CARD_CLASS.test(card.attr('class') ?? '')) return;
            // Innermost cards that carry a heading
            const nested = card.find('div[class], article[class], li[class]').filter((__, inner) => {
                const node = $(inner);
                return CARD_CLASS.test(node.attr('class') ?? '') && node.find('h1, h2, h3, h4').length > 0;
            });
            if (nested.length > 0) return;

            const headings = card.find('h1, h2, h3, h4');
            const named = headings.filter((__, h) => NAME_CLASS.test($(h).attr('class') ?? '')).first();
            const heading = named.length > 0 ? named : headings.first();
            const name = squash(heading.text());
            const href = heading.find('a').first().attr('href') ?? card.find('a[href]').first().attr('href');
            if (!name || !href) return;

            out.push({ display_name: name, profile_url: href, snippet_text: squash(card.text()) });
        });

        if (out.length > 0) return out;

        $('a[href]').each((_, el) => {
            const link = $(el);
            const href = link.attr('href');
            const name = squash(link.text());
            if (!href || !PROFILE_LINK.test(href)) return;
            if (name.split(' ').length < 2) return;
            out.push({ display_name: name, profile_url: href, snippet_text: squash(link.parent().text()) });
        });
        return out;
    }
}
