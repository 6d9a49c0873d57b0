/**
 * 🗄️ SQLITE REPOSITORY
 * Tables:
 * - therapists: identities
 * - directories: directory records with adapter key, policy overrides and selectors
 * - therapist_profiles: one row per (therapist, directory), never deleted
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { DirectorySchema, IdentitySchema } from '../core/validation';
import { DirectoryConfig, ProfileRecord, ProfileStatus } from '../types';
import { Logger } from '../utils/logger';
import { ManagedProfileRepository, StoredIdentity } from './types';

const HistorySchema = z.array(
    z.object({
        at: z.string(),
        event: z.string(),
        from: z.nativeEnum(ProfileStatus),
        to: z.nativeEnum(ProfileStatus),
        detail: z.string().optional(),
    })
);

const PendingSchema = z.array(z.object({ profile_url: z.string(), score: z.number() }));

const ProfileRowSchema = z.object({
    therapist_id: z.string(),
    directory_id: z.string(),
    status: z.nativeEnum(ProfileStatus),
    profile_url: z.string().nullable(),
    last_checked_at: z.string().nullable(),
    confidence_score: z.number().nullable(),
    history: z.string(),
    pending_candidates: z.string(),
});

const TherapistRowSchema = z.object({
    therapist_id: z.string(),
    full_name: z.string(),
    npi: z.string().nullable(),
    license_number: z.string().nullable(),
    state: z.string().nullable(),
    city: z.string().nullable(),
    credentials: z.string().nullable(),
    specialties: z.string().nullable(),
});

const DirectoryRowSchema = z.object({
    directory_id: z.string(),
    name: z.string(),
    base_url: z.string(),
    adapter_key: z.string(),
    site_policy: z.string().nullable(),
    selectors: z.string().nullable(),
});

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS therapists (
        therapist_id TEXT PRIMARY KEY,
        full_name TEXT NOT NULL,
        npi TEXT,
        license_number TEXT,
        state TEXT,
        city TEXT,
        credentials TEXT,
        specialties TEXT,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS directories (
        directory_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        base_url TEXT NOT NULL,
        adapter_key TEXT NOT NULL DEFAULT 'generic',
        site_policy TEXT,
        selectors TEXT,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS therapist_profiles (
        therapist_id TEXT NOT NULL,
        directory_id TEXT NOT NULL,
        status TEXT NOT NULL,
        profile_url TEXT,
        last_checked_at TEXT,
        confidence_score REAL,
        history TEXT NOT NULL DEFAULT '[]',
        pending_candidates TEXT NOT NULL DEFAULT '[]',
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (therapist_id, directory_id)
    );

    CREATE INDEX IF NOT EXISTS idx_profiles_therapist ON therapist_profiles(therapist_id);
    CREATE INDEX IF NOT EXISTS idx_profiles_status ON therapist_profiles(status);
`;

function parseJson(text: string | null): unknown {
    return text === null ? undefined : JSON.parse(text);
}

export class SqliteProfileRepository implements ManagedProfileRepository {
    private readonly db: Database.Database;

    constructor(filePath: string) {
        if (filePath !== ':memory:') {
            fs.mkdirSync(path.dirname(filePath), { recursive: true });
        }
        this.db = new Database(filePath);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('busy_timeout = 30000');
        this.db.exec(SCHEMA);
        Logger.debug(`🗄️ SQLite ready: ${filePath}`);
    }

    async getIdentity(therapistId: string): Promise<StoredIdentity | null> {
        const row = this.db.prepare('SELECT * FROM therapists WHERE therapist_id = ?').get(therapistId);
        return row === undefined ? null : this.toIdentity(row);
    }

    async getProfileRecord(therapistId: string, directoryId: string): Promise<ProfileRecord | null> {
        const row = this.db
            .prepare('SELECT * FROM therapist_profiles WHERE therapist_id = ? AND directory_id = ?')
            .get(therapistId, directoryId);
        return row === undefined ? null : this.toRecord(row);
    }

    async upsertProfileRecord(record: ProfileRecord): Promise<void> {
        this.db
            .prepare(
                `INSERT INTO therapist_profiles
                    (therapist_id, directory_id, status, profile_url, last_checked_at, confidence_score, history, pending_candidates)
                 VALUES (@therapist_id, @directory_id, @status, @profile_url, @last_checked_at, @confidence_score, @history, @pending_candidates)
                 ON CONFLICT (therapist_id, directory_id) DO UPDATE SET
                    status = excluded.status,
                    profile_url = excluded.profile_url,
                    last_checked_at = excluded.last_checked_at,
                    confidence_score = excluded.confidence_score,
                    history = excluded.history,
                    pending_candidates = excluded.pending_candidates,
                    updated_at = CURRENT_TIMESTAMP`
            )
            .run({
                ...record,
                history: JSON.stringify(record.history),
                pending_candidates: JSON.stringify(record.pending_candidates),
            });
    }

    async listDirectories(): Promise<DirectoryConfig[]> {
        const rows = this.db.prepare('SELECT * FROM directories ORDER BY directory_id').all();
        return rows.map((row) => this.toDirectory(row));
    }

    async saveIdentity(identity: StoredIdentity): Promise<void> {
        this.db
            .prepare(
                `INSERT INTO therapists (therapist_id, full_name, npi, license_number, state, city, credentials, specialties)
                 VALUES (@therapist_id, @full_name, @npi, @license_number, @state, @city, @credentials, @specialties)
                 ON CONFLICT (therapist_id) DO UPDATE SET
                    full_name = excluded.full_name,
                    npi = excluded.npi,
                    license_number = excluded.license_number,
                    state = excluded.state,
                    city = excluded.city,
                    credentials = excluded.credentials,
                    specialties = excluded.specialties`
            )
            .run({
                therapist_id: identity.therapist_id,
                full_name: identity.full_name,
                npi: identity.npi ?? null,
                license_number: identity.license_number ?? null,
                state: identity.state ?? null,
                city: identity.city ?? null,
                credentials: identity.credentials ?? null,
                specialties: identity.specialties ? JSON.stringify(identity.specialties) : null,
            });
    }

    async saveDirectory(directory: DirectoryConfig): Promise<void> {
        this.db
            .prepare(
                `INSERT INTO directories (directory_id, name, base_url, adapter_key, site_policy, selectors)
                 VALUES (@directory_id, @name, @base_url, @adapter_key, @site_policy, @selectors)
                 ON CONFLICT (directory_id) DO UPDATE SET
                    name = excluded.name,
                    base_url = excluded.base_url,
                    adapter_key = excluded.adapter_key,
                    site_policy = excluded.site_policy,
                    selectors = excluded.selectors`
            )
            .run({
                directory_id: directory.directory_id,
                name: directory.name,
                base_url: directory.base_url,
                adapter_key: directory.adapter_key,
                site_policy: directory.site_policy ? JSON.stringify(directory.site_policy) : null,
                selectors: directory.selectors ? JSON.stringify(directory.selectors) : null,
            });
    }

    async listProfileRecords(therapistId?: string): Promise<ProfileRecord[]> {
        const rows = therapistId
            ? this.db.prepare('SELECT * FROM therapist_profiles WHERE therapist_id = ? ORDER BY directory_id').all(therapistId)
            : this.db.prepare('SELECT * FROM therapist_profiles ORDER BY therapist_id, directory_id').all();
        return rows.map((row) => this.toRecord(row));
    }

    async close(): Promise<void> {
        this.db.close();
    }

    // =========================================================================
    // ROW MAPPING
    // =========================================================================

    private toRecord(raw: unknown): ProfileRecord {
        const row = ProfileRowSchema.parse(raw);
        return {
            ...row,
            history: HistorySchema.parse(JSON.parse(row.history)),
            pending_candidates: PendingSchema.parse(JSON.parse(row.pending_candidates)),
        };
    }

    private toIdentity(raw: unknown): StoredIdentity {
        const row = TherapistRowSchema.parse(raw);
        const identity = IdentitySchema.parse({
            full_name: row.full_name,
            npi: row.npi ?? undefined,
            license_number: row.license_number ?? undefined,
            state: row.state ?? undefined,
            city: row.city ?? undefined,
            credentials: row.credentials ?? undefined,
            specialties: parseJson(row.specialties),
        });
        return { ...identity, therapist_id: row.therapist_id };
    }

    private toDirectory(raw: unknown): DirectoryConfig {
        const row = DirectoryRowSchema.parse(raw);
        return DirectorySchema.parse({
            ...row,
            site_policy: parseJson(row.site_policy),
            selectors: parseJson(row.selectors),
        });
    }
}
