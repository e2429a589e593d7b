import fs from 'fs';
import os from 'os';
import path from 'path';
import { ResultCache } from '../../../../src/infrastructure/cache/ResultCache';
import { InMemoryCacheStore } from '../../../../src/infrastructure/cache/InMemoryCacheStore';
import { FileCacheStore } from '../../../../src/infrastructure/cache/FileCacheStore';
import { ICacheStore } from '../../../../src/domain/ports/ICacheStore';
import { PersistedCacheRecord } from '../../../../src/domain/entities/CacheEntry';
import { CacheError } from '../../../../src/domain/errors/PipelineErrors';

const isString = (value: unknown): value is string => typeof value === 'string';

class FailingStore implements ICacheStore {
    async save(_record: PersistedCacheRecord): Promise<void> {
        throw new Error('disk full');
    }

    async remove(_key: string): Promise<void> {
        throw new Error('disk full');
    }

    async loadAll(): Promise<{ records: unknown[]; failures: Array<{ location: string; error: unknown }> }> {
        throw new Error('store offline');
    }
}

describe('ResultCache', () => {
    let now: number;
    let store: InMemoryCacheStore;
    let cache: ResultCache<string>;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        now = 0;
        store = new InMemoryCacheStore();
        cache = await ResultCache.open(store, { isValue: isString, clock: () => now });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('get and set', () => {
        it('should return a stored value and count hits', async () => {
            await cache.set('live_dashboard_acmeco_structured', '# Acme', 60000, 'high');

            expect(await cache.get('live_dashboard_acmeco_structured')).toBe('# Acme');
            expect(await cache.get('live_dashboard_acmeco_structured')).toBe('# Acme');
            expect(cache.getEntry('live_dashboard_acmeco_structured')?.hitCount).toBe(2);
        });

        it('should return null for unknown keys', async () => {
            expect(await cache.get('missing')).toBeNull();
        });

        it('should persist every write to the store', async () => {
            await cache.set('k', 'v', 60000);

            expect(store.has('k')).toBe(true);
        });

        it('should drop expired entries on read', async () => {
            await cache.set('k', 'v', 1000);

            now = 1000;

            expect(await cache.get('k')).toBeNull();
            expect(cache.size()).toBe(0);
            expect(store.has('k')).toBe(false);
        });

        it('should treat entries older than maxAge as misses without evicting them', async () => {
            await cache.set('k', 'v', 3600000);

            now = 2000;

            expect(await cache.get('k', 1000)).toBeNull();
            expect(await cache.get('k', 5000)).toBe('v');
            expect(cache.size()).toBe(1);
        });

        it('should record metadata for new entries', async () => {
            now = 5000;
            const entry = await cache.set('k', 'v', 1000, 'medium');

            expect(entry.createdAt).toEqual(new Date(5000));
            expect(entry.expiresAt).toEqual(new Date(6000));
            expect(entry.hitCount).toBe(0);
            expect(entry.qualityTag).toBe('medium');
            expect(entry.contentHash).toBe(ResultCache.hashValue('v'));
        });

        it('should keep the in-memory entry when persistence fails', async () => {
            const failing = await ResultCache.open(new FailingStore(), { isValue: isString, clock: () => now });

            await expect(failing.set('k', 'v', 60000)).rejects.toBeInstanceOf(CacheError);
            expect(await failing.get('k')).toBe('v');
        });
    });

    describe('persistence', () => {
        it('should reload unexpired entries with their metadata', async () => {
            await cache.set('long', 'kept', 10000, 'high');
            await cache.set('short', 'gone', 1000, 'low');
            const original = cache.getEntry('long');

            now = 5000;
            const reopened = await ResultCache.open(store, { isValue: isString, clock: () => now });

            expect(reopened.keys()).toEqual(['long']);
            expect(reopened.getEntry('long')).toEqual({
                key: 'long',
                value: 'kept',
                createdAt: new Date(0),
                expiresAt: new Date(10000),
                hitCount: 0,
                qualityTag: 'high',
                contentHash: original?.contentHash,
            });
        });

        it('should skip malformed documents', async () => {
            const valid: PersistedCacheRecord = {
                key: 'ok',
                value: 'fine',
                metadata: {
                    createdAt: new Date(0).toISOString(),
                    expiresAt: new Date(10000).toISOString(),
                    hitCount: 0,
                    qualityTag: 'high',
                    contentHash: 'abc',
                },
            };
            store.putRaw('ok', JSON.stringify(valid));
            store.putRaw('truncated', '{"key": "truncated", "val');
            store.putRaw('no-metadata', JSON.stringify({ key: 'no-metadata', value: 'x' }));
            store.putRaw('wrong-shape', JSON.stringify({ ...valid, key: 'wrong-shape', value: 42 }));
            store.putRaw('bad-date', JSON.stringify({
                ...valid,
                key: 'bad-date',
                metadata: { ...valid.metadata, createdAt: 'yesterday' },
            }));

            const reopened = await ResultCache.open(store, { isValue: isString, clock: () => now });

            expect(reopened.keys()).toEqual(['ok']);
            expect(await reopened.get('ok')).toBe('fine');
        });

        it('should start empty when the store cannot be read', async () => {
            const reopened = await ResultCache.open(new FailingStore(), { isValue: isString });

            expect(reopened.size()).toBe(0);
        });

        it('should survive a restart on the file store', async () => {
            const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'result-cache-'));
            try {
                const fileStore = new FileCacheStore(directory);
                const first = await ResultCache.open(fileStore, { isValue: isString });
                await first.set('live_dashboard_acmeco_brief', '# Acme: Brief', 60000, 'high');

                expect(fs.existsSync(fileStore.fileFor('live_dashboard_acmeco_brief'))).toBe(true);

                const second = await ResultCache.open(new FileCacheStore(directory), { isValue: isString });
                expect(await second.get('live_dashboard_acmeco_brief')).toBe('# Acme: Brief');
            } finally {
                fs.rmSync(directory, { recursive: true, force: true });
            }
        });
    });

    describe('invalidation', () => {
        beforeEach(async () => {
            await cache.set('live_dashboard_acmeco_structured', 'a', 60000);
            await cache.set('live_dashboard_acmeco_brief', 'b', 60000);
            await cache.set('live_dashboard_globex_structured', 'c', 60000);
        });

        it('should remove a single key', async () => {
            expect(await cache.invalidate('live_dashboard_acmeco_brief')).toBe(true);
            expect(await cache.invalidate('live_dashboard_acmeco_brief')).toBe(false);
            expect(store.has('live_dashboard_acmeco_brief')).toBe(false);
        });

        it('should remove every key containing a substring', async () => {
            expect(await cache.invalidatePattern('_acmeco_')).toBe(2);
            expect(cache.keys()).toEqual(['live_dashboard_globex_structured']);
            expect(store.size()).toBe(1);
        });

        it('should evict only expired entries on cleanup', async () => {
            await cache.set('short', 'd', 100);

            now = 100;

            expect(await cache.cleanup()).toBe(1);
            expect(cache.size()).toBe(3);
        });
    });

    describe('hashValue', () => {
        it('should ignore key order', () => {
            expect(ResultCache.hashValue({ a: 1, b: [1, 2] })).toBe(ResultCache.hashValue({ b: [1, 2], a: 1 }));
        });

        it('should produce 16 hex characters', () => {
            expect(ResultCache.hashValue('anything')).toMatch(/^[0-9a-f]{16}$/);
        });
    });
});
