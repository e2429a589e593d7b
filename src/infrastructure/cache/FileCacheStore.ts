import fs from 'fs/promises';
import path from 'path';
import { PersistedCacheRecord } from '../../domain/entities/CacheEntry';
import { ICacheStore } from '../../domain/ports/ICacheStore';
import { CacheError, errorMessage } from '../../domain/errors/PipelineErrors';

const EXTENSION = '.json';

/**
 * Cache store writing one JSON document per key into a directory.
 * Writes go through a temp file and a rename so readers never see half a document.
 */
export class FileCacheStore implements ICacheStore {
    private readonly directory: string;

    constructor(directory: string) {
        this.directory = path.resolve(directory);
    }

    async save(record: PersistedCacheRecord): Promise<void> {
        const target = this.fileFor(record.key);
        const temp = `${target}.${process.pid}.${Date.now()}.tmp`;

        try {
            await fs.mkdir(this.directory, { recursive: true });
            await fs.writeFile(temp, JSON.stringify(record, null, 2), 'utf-8');
            await fs.rename(temp, target);
        } catch (error) {
            await fs.rm(temp, { force: true }).catch(() => undefined);
            throw new CacheError(`Failed to persist cache entry: ${errorMessage(error)}`, record.key, error);
        }
    }

    async remove(key: string): Promise<void> {
        try {
            await fs.rm(this.fileFor(key), { force: true });
        } catch (error) {
            throw new CacheError(`Failed to remove cache entry: ${errorMessage(error)}`, key, error);
        }
    }

    async loadAll(): Promise<{ records: unknown[]; failures: Array<{ location: string; error: unknown }> }> {
        const records: unknown[] = [];
        const failures: Array<{ location: string; error: unknown }> = [];

        let files: string[];
        try {
            files = await fs.readdir(this.directory);
        } catch (error) {
            if (isNotFound(error)) {
                return { records, failures };
            }
            throw new CacheError(`Failed to list cache directory: ${errorMessage(error)}`, null, error);
        }

        for (const file of files.filter(name => name.endsWith(EXTENSION)).sort()) {
            const location = path.join(this.directory, file);
            try {
                records.push(JSON.parse(await fs.readFile(location, 'utf-8')));
            } catch (error) {
                failures.push({ location, error });
            }
        }

        return { records, failures };
    }

    fileFor(key: string): string {
        return path.join(this.directory, `${encodeURIComponent(key)}${EXTENSION}`);
    }
}

function isNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
