import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { normalizeWhitespace, sha256, stableStringify } from './helpers.js';

export interface CacheEntryMeta {
    kind: string;
    promptVersion: string;
}

export interface CacheEntry extends CacheEntryMeta {
    key: string;
    createdAt: string;
    value: unknown;
}

/**
 * Durable key/value store for model outputs. Writes must be idempotent per key.
 */
export interface CacheStore {
    get(key: string): Promise<unknown | undefined>;
    put(key: string, value: unknown, meta: CacheEntryMeta): Promise<void>;
}

function normalizePayload(value: unknown): unknown {
    if (typeof value === 'string') return normalizeWhitespace(value);
    if (Array.isArray(value)) return value.map(normalizePayload);
    if (value && typeof value === 'object') {
        return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, normalizePayload(v)]));
    }
    return value;
}

/**
 * Content-addressed key of a model call. The prompt version is part of the hashed input,
 * so bumping it makes every earlier entry unreachable without deleting it.
 */
export function cacheKey(promptVersion: string, kind: string, payload: unknown): string {
    return sha256(stableStringify([promptVersion, kind, normalizePayload(payload)]));
}

/**
 * One JSON file per key under `dir`. Entries are written to a temporary file and renamed into place,
 * so an interrupted run never leaves a half-written entry behind.
 */
export class FileCacheStore implements CacheStore {
    dir: string;

    constructor(dir: string) {
        this.dir = dir;
    }

    private entryPath(key: string) {
        if (!/^[a-f0-9]{16,128}$/.test(key)) throw new Error(`Invalid cache key: ${key}`);
        return path.join(this.dir, `${key}.json`);
    }

    async get(key: string): Promise<unknown | undefined> {
        let raw: string;
        try {
            raw = await fs.readFile(this.entryPath(key), 'utf8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
            throw err;
        }
        try {
            const entry: Partial<CacheEntry> = JSON.parse(raw);
            return entry.key === key ? entry.value : undefined;
        } catch {
            console.warn(`[cache] ignoring unreadable entry ${key}`);
            return undefined;
        }
    }

    async put(key: string, value: unknown, meta: CacheEntryMeta): Promise<void> {
        const target = this.entryPath(key);
        await fs.mkdir(this.dir, { recursive: true });
        const entry: CacheEntry = { key, ...meta, createdAt: new Date().toISOString(), value };
        const tmp = path.join(this.dir, `.${key}.${randomUUID()}.tmp`);
        await fs.writeFile(tmp, JSON.stringify(entry), 'utf8');
        await fs.rename(tmp, target);
    }
}

export class MemoryCacheStore implements CacheStore {
    entries = new Map<string, CacheEntry>();

    async get(key: string) {
        return this.entries.get(key)?.value;
    }

    async put(key: string, value: unknown, meta: CacheEntryMeta) {
        this.entries.set(key, { key, ...meta, createdAt: new Date().toISOString(), value });
    }
}
