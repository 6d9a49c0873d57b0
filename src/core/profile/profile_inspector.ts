/**
 * 🔎 PROFILE INSPECTOR
 * Reads a live profile page and compares it with the stored identity, so an
 * operator can tell whether a confirmed listing has drifted.
 */

import * as cheerio from 'cheerio';

import { DEFAULT_SITE_POLICY } from '../../config/discovery_config';
import { DirectoryConfig, SitePolicy, TherapistIdentity } from '../../types';
import { HardBlockError, NetworkFailureError, ParseFailureError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { squash } from '../adapters/base_adapter';
import { SiteFetcher } from '../fetch/site_fetcher';
import { nameKey, normalizeText } from '../matching/name_normalizer';

export interface ScrapedProfile {
    url: string;
    name: string;
    credentials: string;
    location: string;
    specialties: string[];
    bio: string;
}

export interface ProfileComparison {
    name_match: boolean;
    location_match: boolean;
    specialties_match: boolean;
    differences: string[];
}

const FALLBACK_SELECTORS = {
    name: 'h1[class*="name"], h1[class*="title"], h2[class*="name"], h1',
    credentials: '.profile-credentials, .therapist-credentials, [class*="credentials"], [class*="title"]:not(h1):not(h2)',
    location: '.profile-location, .therapist-location, [class*="location"], [class*="address"], address',
    specialties: '.profile-specialties, .therapist-specialties, [class*="specialties"]',
    bio: '.profile-bio, [class*="bio"], [class*="about"], [class*="description"]',
};

function splitList(text: string): string[] {
    return text
        .split(/[,;\n•]/)
        .map((part) => squash(part))
        .filter(Boolean);
}

export class ProfileInspector {
    constructor(private readonly fetcher: SiteFetcher = new SiteFetcher()) { }

    /**
     * Fetches and parses a profile page. Blocks and network failures are thrown
     * here: an inspection is an explicit operator action, not a batch unit.
     */
    async scrapeProfile(url: string, directory: DirectoryConfig, policy: SitePolicy = DEFAULT_SITE_POLICY): Promise<ScrapedProfile> {
        const outcome = await this.fetcher.fetch(url, { ...policy, ...directory.site_policy }, { siteId: directory.directory_id });

        if (outcome.status_kind === 'hard_block' || outcome.status_kind === 'soft_block') {
            throw new HardBlockError(directory.directory_id, outcome.error_detail ?? 'profile page blocked');
        }
        if (outcome.status_kind !== 'success' || outcome.body === null) {
            throw new NetworkFailureError(outcome.error_detail ?? `Could not fetch ${url}`, { url, directory_id: directory.directory_id });
        }

        const profile = this.parseProfile(outcome.body, url, directory);
        Logger.info('[ProfileInspector] profile scraped', { directory_id: directory.directory_id, url });
        return profile;
    }

    parseProfile(body: string, url: string, directory?: DirectoryConfig): ScrapedProfile {
        if (!body.trim()) {
            throw new ParseFailureError(directory?.directory_id ?? 'unknown', 'empty profile page');
        }

        const $ = cheerio.load(body);
        const configured = directory?.selectors;
        const firstText = (selector: string): string => squash($(selector).first().text());

        const specialtiesNode = $(FALLBACK_SELECTORS.specialties).first();
        const items = specialtiesNode.find('li');
        const specialties = items.length > 0
            ? items.toArray().map((li) => squash($(li).text())).filter(Boolean)
            : splitList(specialtiesNode.text());

        const metaDescription = $('meta[name="description"]').attr('content') ?? '';

        return {
            url,
            name: firstText(FALLBACK_SELECTORS.name),
            credentials: firstText(configured?.credentials_selector ?? FALLBACK_SELECTORS.credentials),
            location: firstText(configured?.location_selector ?? FALLBACK_SELECTORS.location),
            specialties,
            bio: firstText(FALLBACK_SELECTORS.bio) || squash(metaDescription),
        };
    }

    compare(identity: TherapistIdentity, profile: ScrapedProfile): ProfileComparison {
        const name_match = nameKey(identity.full_name) !== '' && nameKey(identity.full_name) === nameKey(profile.name);

        const location = normalizeText(profile.location);
        const wanted = [identity.city, identity.state].filter((part): part is string => Boolean(part)).map(normalizeText);
        const location_match = wanted.length > 0 && wanted.every((part) => ` ${location} `.includes(` ${part} `));

        const stored = new Set((identity.specialties ?? []).map(normalizeText));
        const live = new Set(profile.specialties.map(normalizeText));
        const specialties_match = stored.size === live.size && [...stored].every((s) => live.has(s));

        const differences: string[] = [];
        if (!name_match) differences.push(`Name mismatch: "${profile.name}" vs "${identity.full_name}"`);
        if (!location_match) differences.push(`Location mismatch: "${profile.location}"`);
        if (!specialties_match) differences.push('Specialties mismatch');

        return { name_match, location_match, specialties_match, differences };
    }
}
