import * as fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';

import { DirectorySchema, IdentitySchema, parseDirectory, parseIdentity } from '../core/validation';
import { ConfigurationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { ManagedProfileRepository } from './types';

const SeedSchema = z.object({
    therapists: z.array(IdentitySchema.extend({ therapist_id: z.string().min(1) })).default([]),
    directories: z.array(DirectorySchema).default([]),
});

export interface SeedSummary {
    therapists: number;
    directories: number;
}

/**
 * Loads therapists and directories from a YAML document into the repository.
 * Existing rows with the same ids are updated.
 */
export async function loadSeed(text: string, repository: ManagedProfileRepository): Promise<SeedSummary> {
    const parsed = SeedSchema.safeParse(yaml.load(text));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid seed file: ${issues.join('; ')}`);
    }

    for (const raw of parsed.data.therapists) {
        const identity = parseIdentity(raw);
        await repository.saveIdentity({ ...identity, therapist_id: raw.therapist_id });
    }
    for (const raw of parsed.data.directories) {
        await repository.saveDirectory(parseDirectory(raw));
    }

    const summary = { therapists: parsed.data.therapists.length, directories: parsed.data.directories.length };
    Logger.info('[Seed] loaded', { ...summary });
    return summary;
}

export async function loadSeedFile(filePath: string, repository: ManagedProfileRepository): Promise<SeedSummary> {
    return loadSeed(fs.readFileSync(filePath, 'utf8'), repository);
}
