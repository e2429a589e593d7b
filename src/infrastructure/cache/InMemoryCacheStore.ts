import { PersistedCacheRecord } from '../../domain/entities/CacheEntry';
import { ICacheStore } from '../../domain/ports/ICacheStore';

/**
 * Cache store kept in process memory. Used in tests and when persistence is disabled.
 * Records are stored serialized so loads behave like a real store.
 */
export class InMemoryCacheStore implements ICacheStore {
    private documents: Map<string, string> = new Map();

    async save(record: PersistedCacheRecord): Promise<void> {
        this.documents.set(record.key, JSON.stringify(record));
    }

    async remove(key: string): Promise<void> {
        this.documents.delete(key);
    }

    async loadAll(): Promise<{ records: unknown[]; failures: Array<{ location: string; error: unknown }> }> {
        const records: unknown[] = [];
        const failures: Array<{ location: string; error: unknown }> = [];

        for (const [key, document] of this.documents) {
            try {
                records.push(JSON.parse(document));
            } catch (error) {
                failures.push({ location: key, error });
            }
        }
        return { records, failures };
    }

    /**
     * Writes a raw document under a key, bypassing serialization (for tests).
     */
    putRaw(key: string, document: string): void {
        this.documents.set(key, document);
    }

    has(key: string): boolean {
        return this.documents.has(key);
    }

    size(): number {
        return this.documents.size;
    }
}
