import Redis from 'ioredis';
import { PersistedCacheRecord } from '../../domain/entities/CacheEntry';
import { ICacheStore } from '../../domain/ports/ICacheStore';
import { CacheError, errorMessage } from '../../domain/errors/PipelineErrors';

/**
 * Cache store backed by Redis: one string key per cache entry under a prefix.
 * Redis-side expiry mirrors the entry's expiresAt so stale documents clean themselves up.
 */
export class RedisCacheStore implements ICacheStore {
    private readonly client: Redis;

    constructor(
        redisUrlOrClient: string | Redis,
        private readonly prefix: string = 'live-intel:cache:'
    ) {
        this.client = typeof redisUrlOrClient === 'string'
            ? new Redis(redisUrlOrClient, {
                retryStrategy: (times) => Math.min(times * 50, 2000),
                maxRetriesPerRequest: 3,
            })
            : redisUrlOrClient;

        this.client.on('error', (err) => {
            console.error('[RedisCacheStore] Connection error:', err);
        });
    }

    async save(record: PersistedCacheRecord): Promise<void> {
        const ttlMs = new Date(record.metadata.expiresAt).getTime() - Date.now();
        try {
            if (ttlMs > 0) {
                await this.client.set(this.prefix + record.key, JSON.stringify(record), 'PX', ttlMs);
            } else {
                await this.client.del(this.prefix + record.key);
            }
        } catch (error) {
            throw new CacheError(`Redis save failed: ${errorMessage(error)}`, record.key, error);
        }
    }

    async remove(key: string): Promise<void> {
        try {
            await this.client.del(this.prefix + key);
        } catch (error) {
            throw new CacheError(`Redis delete failed: ${errorMessage(error)}`, key, error);
        }
    }

    async loadAll(): Promise<{ records: unknown[]; failures: Array<{ location: string; error: unknown }> }> {
        const records: unknown[] = [];
        const failures: Array<{ location: string; error: unknown }> = [];

        try {
            const keys = await this.scanKeys();
            if (keys.length === 0) {
                return { records, failures };
            }

            const documents = await this.client.mget(...keys);
            keys.forEach((key, index) => {
                const document = documents[index];
                if (document === null) return; // expired between SCAN and MGET
                try {
                    records.push(JSON.parse(document));
                } catch (error) {
                    failures.push({ location: key, error });
                }
            });
        } catch (error) {
            throw new CacheError(`Redis load failed: ${errorMessage(error)}`, null, error);
        }

        return { records, failures };
    }

    async disconnect(): Promise<void> {
        await this.client.quit();
    }

    private async scanKeys(): Promise<string[]> {
        const keys: string[] = [];
        let cursor = '0';
        do {
            const [next, batch] = await this.client.scan(cursor, 'MATCH', `${this.prefix}*`, 'COUNT', 100);
            keys.push(...batch);
            cursor = next;
        } while (cursor !== '0');
        return keys;
    }
}
