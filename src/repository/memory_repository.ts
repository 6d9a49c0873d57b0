import { DirectoryConfig, ProfileRecord } from '../types';
import { ManagedProfileRepository, StoredIdentity } from './types';

function recordKey(therapistId: string, directoryId: string): string {
    return `${therapistId}::${directoryId}`;
}

function copy(record: ProfileRecord): ProfileRecord {
    return {
        ...record,
        history: record.history.map((entry) => ({ ...entry })),
        pending_candidates: record.pending_candidates.map((candidate) => ({ ...candidate })),
    };
}

/**
 * In-process repository. Records are copied on the way in and out so callers
 * cannot mutate stored state behind the repository's back.
 */
export class InMemoryProfileRepository implements ManagedProfileRepository {
    private identities = new Map<string, StoredIdentity>();
    private directories = new Map<string, DirectoryConfig>();
    private records = new Map<string, ProfileRecord>();

    async getIdentity(therapistId: string): Promise<StoredIdentity | null> {
        return this.identities.get(therapistId) ?? null;
    }

    async getProfileRecord(therapistId: string, directoryId: string): Promise<ProfileRecord | null> {
        const record = this.records.get(recordKey(therapistId, directoryId));
        return record ? copy(record) : null;
    }

    async upsertProfileRecord(record: ProfileRecord): Promise<void> {
        this.records.set(recordKey(record.therapist_id, record.directory_id), copy(record));
    }

    async listDirectories(): Promise<DirectoryConfig[]> {
        return [...this.directories.values()];
    }

    async saveIdentity(identity: StoredIdentity): Promise<void> {
        this.identities.set(identity.therapist_id, identity);
    }

    async saveDirectory(directory: DirectoryConfig): Promise<void> {
        this.directories.set(directory.directory_id, directory);
    }

    async listProfileRecords(therapistId?: string): Promise<ProfileRecord[]> {
        return [...this.records.values()]
            .filter((record) => !therapistId || record.therapist_id === therapistId)
            .map(copy);
    }

    async close(): Promise<void> {
        this.records.clear();
    }
}
