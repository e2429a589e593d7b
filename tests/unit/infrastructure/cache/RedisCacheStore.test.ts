import { RedisCacheStore } from '../../../../src/infrastructure/cache/RedisCacheStore';
import { PersistedCacheRecord } from '../../../../src/domain/entities/CacheEntry';
import { CacheError } from '../../../../src/domain/errors/PipelineErrors';

const mockDocuments = new Map<string, string>();
const mockSet = jest.fn();

jest.mock('ioredis', () => ({
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({
        on: jest.fn(),
        set: (key: string, value: string, mode: string, ttlMs: number) => {
            mockSet(key, mode, ttlMs);
            mockDocuments.set(key, value);
            return Promise.resolve('OK');
        },
        del: (key: string) => Promise.resolve(mockDocuments.delete(key) ? 1 : 0),
        scan: (_cursor: string, _match: string, pattern: string) => {
            const prefix = pattern.slice(0, -1);
            return Promise.resolve(['0', Array.from(mockDocuments.keys()).filter(key => key.startsWith(prefix))]);
        },
        mget: (...keys: string[]) => Promise.resolve(keys.map(key => mockDocuments.get(key) ?? null)),
        quit: jest.fn().mockResolvedValue('OK'),
    })),
}));

function recordFor(key: string, expiresInMs: number): PersistedCacheRecord {
    return {
        key,
        value: { content: '# Acme' },
        metadata: {
            createdAt: new Date().toISOString(),
            expiresAt: new Date(Date.now() + expiresInMs).toISOString(),
            hitCount: 0,
            qualityTag: 'high',
            contentHash: 'abc123',
        },
    };
}

describe('RedisCacheStore', () => {
    let store: RedisCacheStore;

    beforeEach(() => {
        mockDocuments.clear();
        mockSet.mockClear();
        store = new RedisCacheStore('redis://localhost:6379', 'test:');
    });

    it('should save documents under the prefix with a matching expiry', async () => {
        await store.save(recordFor('live_dashboard_acmeco_structured', 60000));

        expect(mockDocuments.has('test:live_dashboard_acmeco_structured')).toBe(true);
        const [key, mode, ttlMs] = mockSet.mock.calls[0];
        expect(key).toBe('test:live_dashboard_acmeco_structured');
        expect(mode).toBe('PX');
        expect(ttlMs).toBeGreaterThan(59000);
        expect(ttlMs).toBeLessThanOrEqual(60000);
    });

    it('should delete instead of saving an already expired record', async () => {
        mockDocuments.set('test:stale', '{}');

        await store.save(recordFor('stale', -1000));

        expect(mockSet).not.toHaveBeenCalled();
        expect(mockDocuments.has('test:stale')).toBe(false);
    });

    it('should load every document under the prefix', async () => {
        const record = recordFor('live_dashboard_acmeco_brief', 60000);
        await store.save(record);
        mockDocuments.set('other:key', '{}');

        const loaded = await store.loadAll();

        expect(loaded.records).toEqual([record]);
        expect(loaded.failures).toEqual([]);
    });

    it('should report undecodable documents as failures', async () => {
        mockDocuments.set('test:broken', 'not json');

        const loaded = await store.loadAll();

        expect(loaded.records).toEqual([]);
        expect(loaded.failures).toHaveLength(1);
        expect(loaded.failures[0].location).toBe('test:broken');
    });

    it('should remove a single key', async () => {
        await store.save(recordFor('k', 60000));

        await store.remove('k');

        expect(mockDocuments.size).toBe(0);
    });

    it('should wrap client failures in CacheError', async () => {
        mockSet.mockImplementationOnce(() => {
            throw new Error('connection lost');
        });

        await expect(store.save(recordFor('k', 60000))).rejects.toBeInstanceOf(CacheError);
    });
});
