/**
 * 📊 DISCOVERY CONFIG
 * Scoring weights, thresholds and the default site policy, read from YAML.
 * The numbers are tuning knobs, not contracts: validate against labelled data
 * before changing them in production.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';

import { SitePolicy } from '../types';
import { ConfigurationError, toError } from '../utils/errors';

export const DEFAULT_DISCOVERY_CONFIG_PATH = path.join(__dirname, '../../config/discovery.yaml');

const WeightsSchema = z.object({
    npi_match: z.number().min(0).max(1),
    license_match: z.number().min(0).max(1),
    name_similarity: z.number().min(0).max(1),
    location_match: z.number().min(0).max(1),
    npi_conflict: z.number().max(0),
    license_conflict: z.number().max(0),
});

const ThresholdsSchema = z
    .object({
        low_confidence: z.number().min(0).max(1),
        high_confidence: z.number().min(0).max(1),
    })
    .refine((t) => t.low_confidence <= t.high_confidence, {
        message: 'low_confidence must not exceed high_confidence',
    });

export const SitePolicySchema = z.object({
    min_delay_ms: z.number().int().min(0),
    max_retries: z.number().int().min(0).max(10),
    backoff_base_ms: z.number().int().min(0),
    jitter_ms: z.number().int().min(0),
    timeout_ms: z.number().int().min(100),
    allow_render_fallback: z.boolean(),
    rotate_identity: z.boolean(),
});

const DiscoveryConfigSchema = z.object({
    weights: WeightsSchema,
    thresholds: ThresholdsSchema,
    default_site_policy: SitePolicySchema,
});

export type ScoringWeights = z.infer<typeof WeightsSchema>;
export type ConfidenceThresholds = z.infer<typeof ThresholdsSchema>;
export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;

export const DEFAULT_WEIGHTS: ScoringWeights = {
    npi_match: 0.9,
    license_match: 0.6,
    name_similarity: 0.3,
    location_match: 0.1,
    npi_conflict: -0.5,
    license_conflict: -0.3,
};

export const DEFAULT_THRESHOLDS: ConfidenceThresholds = {
    low_confidence: 0.25,
    high_confidence: 0.85,
};

export const DEFAULT_SITE_POLICY: SitePolicy = {
    min_delay_ms: 1500,
    max_retries: 2,
    backoff_base_ms: 1000,
    jitter_ms: 250,
    timeout_ms: 15000,
    allow_render_fallback: false,
    rotate_identity: true,
};

export const DEFAULT_DISCOVERY_CONFIG: DiscoveryConfig = {
    weights: DEFAULT_WEIGHTS,
    thresholds: DEFAULT_THRESHOLDS,
    default_site_policy: DEFAULT_SITE_POLICY,
};

export function parseDiscoveryConfig(raw: unknown): DiscoveryConfig {
    const result = DiscoveryConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid discovery config: ${issues.join('; ')}`);
    }
    return result.data;
}

export function loadDiscoveryConfig(filePath: string = DEFAULT_DISCOVERY_CONFIG_PATH): DiscoveryConfig {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf8');
    } catch (e) {
        throw new ConfigurationError(`Cannot read discovery config at ${filePath}: ${toError(e).message}`);
    }
    return parseDiscoveryConfig(yaml.load(text));
}
