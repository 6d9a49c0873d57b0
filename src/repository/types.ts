import { DirectoryConfig, ProfileRecord, TherapistIdentity } from '../types';

export type StoredIdentity = TherapistIdentity & { therapist_id: string };

/**
 * Durable state crosses this boundary only. The engine never persists on its own.
 */
export interface ProfileRepository {
    getIdentity(therapistId: string): Promise<StoredIdentity | null>;
    getProfileRecord(therapistId: string, directoryId: string): Promise<ProfileRecord | null>;
    upsertProfileRecord(record: ProfileRecord): Promise<void>;
    listDirectories(): Promise<DirectoryConfig[]>;
}

/** Write side used by seeding and the CLI. */
export interface ManagedProfileRepository extends ProfileRepository {
    saveIdentity(identity: StoredIdentity): Promise<void>;
    saveDirectory(directory: DirectoryConfig): Promise<void>;
    listProfileRecords(therapistId?: string): Promise<ProfileRecord[]>;
    close(): Promise<void>;
}
