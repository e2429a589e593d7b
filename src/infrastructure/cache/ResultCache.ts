import crypto from 'crypto';
import Ajv from 'ajv';
import recordSchema from './cache-record.schema.json';
import {
    CacheEntry,
    PersistedCacheRecord,
    fromPersistedRecord,
    toPersistedRecord,
} from '../../domain/entities/CacheEntry';
import { ICacheStore } from '../../domain/ports/ICacheStore';
import { CacheError, errorMessage } from '../../domain/errors/PipelineErrors';

export interface ResultCacheOptions<V> {
    /** Accepts values loaded from the store; anything else is skipped on load */
    isValue: (value: unknown) => value is V;
    clock?: () => number;
}

const ajv = new Ajv({ allErrors: true });
const validateRecord = ajv.compile<PersistedCacheRecord>(recordSchema);

/**
 * TTL- and quality-aware result cache with durable persistence.
 *
 * Entries live in memory and are mirrored to an ICacheStore on every write; opening the cache
 * loads every stored entry that has not yet expired. Expiry is checked lazily on read and there
 * is no capacity bound (one entry per subject and variant).
 *
 * In-memory reads and writes complete within one event-loop turn, so a reader never sees a
 * half-written entry. Store operations for the same key are queued so they land in call order.
 */
export class ResultCache<V> {
    private readonly entries: Map<string, CacheEntry<V>> = new Map();
    private readonly storeQueues: Map<string, Promise<void>> = new Map();
    private readonly clock: () => number;

    private constructor(
        private readonly store: ICacheStore,
        private readonly options: ResultCacheOptions<V>
    ) {
        this.clock = options.clock ?? (() => Date.now());
    }

    /**
     * Creates a cache and eagerly loads the store's unexpired entries.
     * Undecodable or invalid documents are skipped (and left untouched in the store).
     */
    static async open<V>(store: ICacheStore, options: ResultCacheOptions<V>): Promise<ResultCache<V>> {
        const cache = new ResultCache<V>(store, options);
        await cache.load();
        return cache;
    }

    /**
     * Returns the cached value if present, unexpired, and (when maxAgeMs is given) no older
     * than maxAgeMs. A hit increments the entry's hit count.
     */
    async get(key: string, maxAgeMs?: number): Promise<V | null> {
        const entry = this.entries.get(key);
        if (!entry) {
            return null;
        }

        const now = this.clock();
        if (now >= entry.expiresAt.getTime()) {
            console.log(`[ResultCache] Cache expired for ${key}`);
            await this.invalidate(key);
            return null;
        }

        if (maxAgeMs !== undefined && now - entry.createdAt.getTime() > maxAgeMs) {
            console.log(`[ResultCache] Cache too old for ${key} (maxAge=${maxAgeMs}ms)`);
            return null;
        }

        entry.hitCount++;
        console.log(`[ResultCache] Cache HIT for ${key} (hits: ${entry.hitCount})`);
        return entry.value;
    }

    /**
     * Stores a value and persists it before resolving.
     * If persistence fails the in-memory entry is kept and a CacheError is thrown.
     */
    async set(
        key: string,
        value: V,
        ttlMs: number,
        qualityTag: string = 'unknown',
        contentHash?: string
    ): Promise<CacheEntry<V>> {
        const now = this.clock();
        const entry: CacheEntry<V> = {
            key,
            value,
            createdAt: new Date(now),
            expiresAt: new Date(now + ttlMs),
            hitCount: 0,
            qualityTag,
            contentHash: contentHash ?? ResultCache.hashValue(value),
        };

        this.entries.set(key, entry);
        console.log(`[ResultCache] Cache SET for ${key} (TTL: ${ttlMs}ms, quality: ${qualityTag})`);

        const record = toPersistedRecord(entry);
        await this.enqueue(key, () => this.store.save(record));
        return { ...entry };
    }

    /**
     * Removes an entry from memory and the store.
     */
    async invalidate(key: string): Promise<boolean> {
        const existed = this.entries.delete(key);
        await this.enqueue(key, () => this.store.remove(key));
        return existed;
    }

    /**
     * Removes every entry whose key contains the substring. Returns how many were removed.
     */
    async invalidatePattern(substring: string): Promise<number> {
        const keys = this.keys().filter(key => key.includes(substring));
        await Promise.all(keys.map(key => this.invalidate(key)));
        if (keys.length > 0) {
            console.log(`[ResultCache] Invalidated ${keys.length} entries matching "${substring}"`);
        }
        return keys.length;
    }

    /**
     * Metadata snapshot without counting a hit. Includes expired entries not yet evicted.
     */
    getEntry(key: string): CacheEntry<V> | null {
        const entry = this.entries.get(key);
        return entry ? { ...entry } : null;
    }

    keys(): string[] {
        return Array.from(this.entries.keys());
    }

    size(): number {
        return this.entries.size;
    }

    /**
     * Evicts expired entries. Returns the number removed.
     */
    async cleanup(): Promise<number> {
        const now = this.clock();
        const expired = Array.from(this.entries.values())
            .filter(entry => now >= entry.expiresAt.getTime())
            .map(entry => entry.key);

        await Promise.all(expired.map(key => this.invalidate(key)));
        return expired.length;
    }

    /**
     * Stable content hash used for change detection: sha256 over key-sorted JSON, 16 hex chars.
     */
    static hashValue(value: unknown): string {
        return crypto.createHash('sha256').update(stableStringify(value)).digest('hex').substring(0, 16);
    }

    private async load(): Promise<void> {
        let loaded: Awaited<ReturnType<ICacheStore['loadAll']>>;
        try {
            loaded = await this.store.loadAll();
        } catch (error) {
            console.warn(`[ResultCache] Could not read cache store, starting empty: ${errorMessage(error)}`);
            return;
        }

        for (const failure of loaded.failures) {
            console.warn(`[ResultCache] Failed to load cache from ${failure.location}: ${errorMessage(failure.error)}`);
        }

        const now = this.clock();
        let skipped = 0;
        for (const raw of loaded.records) {
            const entry = this.decode(raw);
            if (!entry) {
                skipped++;
                continue;
            }
            if (now >= entry.expiresAt.getTime()) {
                continue;
            }
            this.entries.set(entry.key, entry);
        }

        console.log(
            `[ResultCache] Loaded ${this.entries.size} entries from store` +
            (skipped + loaded.failures.length > 0 ? ` (${skipped + loaded.failures.length} skipped)` : '')
        );
    }

    private decode(raw: unknown): CacheEntry<V> | null {
        if (!validateRecord(raw)) {
            console.warn(`[ResultCache] Skipping malformed cache record: ${ajv.errorsText(validateRecord.errors)}`);
            return null;
        }

        let entry: CacheEntry;
        try {
            entry = fromPersistedRecord(raw);
        } catch (error) {
            console.warn(`[ResultCache] Skipping cache record ${raw.key}: ${errorMessage(error)}`);
            return null;
        }

        if (!this.options.isValue(entry.value)) {
            console.warn(`[ResultCache] Skipping cache record ${raw.key}: unexpected value shape`);
            return null;
        }
        return { ...entry, value: entry.value };
    }

    /**
     * Runs a store operation after any earlier one for the same key.
     */
    private async enqueue(key: string, operation: () => Promise<void>): Promise<void> {
        const previous = this.storeQueues.get(key) ?? Promise.resolve();
        const current = previous.then(operation);
        const settled = current.catch(() => undefined);
        this.storeQueues.set(key, settled);

        try {
            await current;
        } catch (error) {
            throw error instanceof CacheError
                ? error
                : new CacheError(`Cache store operation failed: ${errorMessage(error)}`, key, error);
        } finally {
            if (this.storeQueues.get(key) === settled) {
                this.storeQueues.delete(key);
            }
        }
    }
}

/**
 * JSON serialization with object keys sorted, so equal values hash equally.
 */
export function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value) ?? 'null';
    }
    if (value instanceof Date) {
        return JSON.stringify(value.toISOString());
    }
    if (Array.isArray(value)) {
        return `[${value.map(item => stableStringify(item)).join(',')}]`;
    }
    const parts = Object.entries(value)
        .filter(([, item]) => item !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${parts.join(',')}}`;
}
