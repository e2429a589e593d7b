import { PersistedCacheRecord } from '../entities/CacheEntry';

/**
 * Durable storage behind ResultCache.
 * Implementations: file system, Redis, in-memory.
 */
export interface ICacheStore {
    /**
     * Writes (or overwrites) the record for its key.
     */
    save(record: PersistedCacheRecord): Promise<void>;

    remove(key: string): Promise<void>;

    /**
     * Returns every stored document as raw parsed JSON.
     * Validation is the cache's job; undecodable documents are reported in `failures`.
     */
    loadAll(): Promise<{ records: unknown[]; failures: Array<{ location: string; error: unknown }> }>;
}
