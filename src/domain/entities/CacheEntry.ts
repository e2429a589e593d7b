/**
 * Cache entry owned by ResultCache. Mutated only through its API.
 */
export interface CacheEntry<T = unknown> {
    key: string;
    value: T;
    createdAt: Date;
    expiresAt: Date;
    hitCount: number;
    qualityTag: string;
    contentHash: string;
}

/**
 * Durable form of a cache entry: one self-describing JSON document per key.
 */
export interface PersistedCacheRecord {
    key: string;
    value: unknown;
    metadata: {
        createdAt: string;
        expiresAt: string;
        hitCount: number;
        qualityTag: string;
        contentHash: string;
    };
}

export type CacheStrategy = 'aggressive' | 'balanced' | 'conservative' | 'no_cache';

export const CACHE_STRATEGIES: readonly CacheStrategy[] = ['aggressive', 'balanced', 'conservative', 'no_cache'];

/**
 * TTL in milliseconds for each strategy.
 */
export const CACHE_STRATEGY_TTL_MS: Record<CacheStrategy, number> = {
    aggressive: 5 * 60 * 1000,
    balanced: 60 * 60 * 1000,
    conservative: 24 * 60 * 60 * 1000,
    no_cache: 0,
};

export function isCacheStrategy(value: string): value is CacheStrategy {
    return CACHE_STRATEGIES.some(strategy => strategy === value);
}

export function toPersistedRecord(entry: CacheEntry): PersistedCacheRecord {
    return {
        key: entry.key,
        value: entry.value,
        metadata: {
            createdAt: entry.createdAt.toISOString(),
            expiresAt: entry.expiresAt.toISOString(),
            hitCount: entry.hitCount,
            qualityTag: entry.qualityTag,
            contentHash: entry.contentHash,
        },
    };
}

export function fromPersistedRecord(record: PersistedCacheRecord): CacheEntry {
    const createdAt = new Date(record.metadata.createdAt);
    const expiresAt = new Date(record.metadata.expiresAt);
    if (isNaN(createdAt.getTime()) || isNaN(expiresAt.getTime())) {
        throw new Error(`Invalid timestamps in cache record ${record.key}`);
    }
    return {
        key: record.key,
        value: record.value,
        createdAt,
        expiresAt,
        hitCount: record.metadata.hitCount,
        qualityTag: record.metadata.qualityTag,
        contentHash: record.metadata.contentHash,
    };
}
