/**
 * ✅ INPUT SCHEMAS
 * Identities and directory records are validated once, at the boundary.
 * Everything past this point trusts their shape.
 */

import { z } from 'zod';

import { SitePolicySchema } from '../config/discovery_config';
import { DirectoryConfig, TherapistIdentity } from '../types';
import { ConfigurationError, IdentityValidationError } from '../utils/errors';

export const IdentitySchema = z.object({
    therapist_id: z.string().min(1).optional(),
    full_name: z.string().trim().min(2, 'full_name is required'),
    npi: z
        .string()
        .regex(/^\d{10}$/, 'npi must be exactly 10 digits')
        .optional(),
    license_number: z.string().trim().min(1).optional(),
    state: z
        .string()
        .trim()
        .regex(/^[A-Za-z]{2}$/, 'state must be a two-letter code')
        .transform((s) => s.toUpperCase())
        .optional(),
    city: z.string().trim().min(1).optional(),
    credentials: z.string().trim().optional(),
    specialties: z.array(z.string().trim().min(1)).optional(),
});

export const SelectorConfigSchema = z.object({
    search_url: z.string().min(1),
    profile_selector: z.string().min(1),
    name_selector: z.string().min(1),
    profile_url_selector: z.string().min(1).optional(),
    credentials_selector: z.string().min(1).optional(),
    location_selector: z.string().min(1).optional(),
    no_results_text: z.string().min(1).optional(),
});

export const DirectorySchema = z.object({
    directory_id: z.string().min(1),
    name: z.string().min(1),
    base_url: z.string().url(),
    adapter_key: z.string().min(1).default('generic'),
    site_policy: SitePolicySchema.partial().optional(),
    selectors: SelectorConfigSchema.optional(),
});

function describe(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Returns a frozen identity; rejects malformed input before any request is made.
 */
export function parseIdentity(input: unknown): TherapistIdentity {
    const result = IdentitySchema.safeParse(input);
    if (!result.success) {
        throw new IdentityValidationError(`Invalid identity: ${describe(result.error)}`);
    }
    const { specialties, ...rest } = result.data;
    return Object.freeze({ ...rest, ...(specialties ? { specialties: Object.freeze([...specialties]) } : {}) });
}

export function parseDirectory(input: unknown): DirectoryConfig {
    const result = DirectorySchema.safeParse(input);
    if (!result.success) {
        throw new ConfigurationError(`Invalid directory: ${describe(result.error)}`);
    }
    return result.data;
}
