import * as cheerio from 'cheerio';

import { DirectoryConfig, SitePolicy, TherapistIdentity } from '../../types';
import { ParseFailureError, toError } from '../../utils/errors';
import { RawCandidate, SearchRequest, SiteAdapter } from './types';

export interface CardLayout {
    cards: string;
    /** Tried in order; the first hit inside a card is the name. */
    names: string[];
    /** Link inside the card holding the profile URL; defaults to the name link. */
    link?: string;
    /** Fallback when no card matched: anchors whose href matches are candidates. */
    linkPattern?: RegExp;
}

const WHITESPACE = /\s+/g;

export function squash(value: string): string {
    return value.replace(WHITESPACE, ' ').trim();
}

export function locationOf(identity: TherapistIdentity): string {
    if (identity.city && identity.state) return `${identity.city}, ${identity.state}`;
    return identity.city ?? identity.state ?? '';
}

export function buildUrl(base: string, params: Record<string, string | undefined>): string {
    const url = new URL(base);
    for (const [key, value] of Object.entries(params)) {
        if (value) url.searchParams.set(key, value);
    }
    return url.toString();
}

/**
 * Shared plumbing for adapters that read result cards out of server-rendered HTML.
 */
export abstract class BaseSiteAdapter implements SiteAdapter {
    abstract readonly key: string;
    readonly defaultPolicy: Partial<SitePolicy> = {};
    protected readonly noResultsPatterns: RegExp[] = [/no (therapists|results|matches|providers) (were )?found/i];

    abstract buildSearchRequest(identity: TherapistIdentity, directory: DirectoryConfig): SearchRequest;

    abstract parseResults(body: string, request: SearchRequest): RawCandidate[];

    detectNoResults(body: string, _request: SearchRequest): boolean {
        const text = squash(cheerio.load(body).root().text());
        return this.noResultsPatterns.some((pattern) => pattern.test(text));
    }

    protected load(body: string, request: SearchRequest): cheerio.CheerioAPI {
        if (!body.trim()) {
            throw new ParseFailureError(request.site_id, 'empty document');
        }
        return cheerio.load(body);
    }

    protected parseCards(body: string, request: SearchRequest, layout: CardLayout): RawCandidate[] {
        const $ = this.load(body, request);
        const out: RawCandidate[] = [];

        try {
            $(layout.cards).each((_, el) => {
                const card = $(el);
                // Nested matches are inner parts of an outer card.
                if (card.parents(layout.cards).length > 0) return;

                let name = '';
                let href: string | undefined;
                for (const selector of layout.names) {
                    const hit = card.find(selector).first();
                    if (hit.length === 0) continue;
                    name = squash(hit.text());
                    href = hit.is('a') ? hit.attr('href') : hit.find('a').first().attr('href');
                    if (name) break;
                }
                if (layout.link) {
                    href = card.find(layout.link).first().attr('href') ?? href;
                }
                if (!name || !href) return;

                out.push({ display_name: name, profile_url: href, snippet_text: squash(card.text()) });
            });
        } catch (e) {
            throw new ParseFailureError(request.site_id, toError(e).message);
        }

        if (out.length === 0 && layout.linkPattern) {
            const pattern = layout.linkPattern;
            $('a[href]').each((_, el) => {
                const link = $(el);
                const href = link.attr('href');
                const name = squash(link.text());
                if (!href || !name || !pattern.test(href)) return;
                out.push({ display_name: name, profile_url: href, snippet_text: squash(link.parent().text()) });
            });
        }

        return out;
    }
}
