/**
 * Generated Image Cache
 *
 * Holds bytes of AI-generated images so they can be served back by id from
 * GET /generated/:id. Entries are immutable once stored; there is no update
 * operation. Bounded by entry count and age.
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { decodeDataUrl } from '../../domain/entities/GenerationRequest';
import { CacheMiss } from '../../domain/errors/PipelineErrors';

export interface CachedImage {
    readonly id: string;
    readonly bytes: Buffer;
    readonly mediaType: string;
    readonly createdAt: number;
}

/**
 * Produces the id for a new entry. Must never return the id of a different
 * content already in the cache.
 */
export type IdentityGenerator = (bytes: Buffer) => string;

export const randomIdentity: IdentityGenerator = () => uuidv4().replace(/-/g, '');

export const contentHashIdentity: IdentityGenerator = (bytes) =>
    createHash('sha256').update(bytes).digest('hex');

export interface GeneratedImageCacheOptions {
    identity?: IdentityGenerator;
    /** Oldest entries are evicted beyond this count (0 = unbounded) */
    maxEntries?: number;
    /** Entries older than this are treated as missing (0 = no expiry) */
    ttlSeconds?: number;
    /** Injectable clock */
    now?: () => number;
}

export class GeneratedImageCache {
    private readonly entries = new Map<string, CachedImage>();
    private readonly identity: IdentityGenerator;
    private readonly maxEntries: number;
    private readonly ttlMs: number;
    private readonly now: () => number;

    constructor(options: GeneratedImageCacheOptions = {}) {
        this.identity = options.identity ?? randomIdentity;
        this.maxEntries = options.maxEntries ?? 0;
        this.ttlMs = (options.ttlSeconds ?? 0) * 1000;
        this.now = options.now ?? Date.now;
    }

    /**
     * Stores bytes and returns their id. With a content-derived identity,
     * storing identical bytes again returns the existing id untouched.
     */
    store(bytes: Buffer, mediaType: string = 'application/octet-stream'): string {
        const id = this.identity(bytes);
        const existing = this.lookup(id);
        if (existing) {
            if (!existing.bytes.equals(bytes)) {
                throw new Error(`Identity collision for generated image ${id}`);
            }
            return id;
        }

        this.entries.set(id, Object.freeze({
            id,
            bytes: Buffer.from(bytes),
            mediaType: mediaType || 'application/octet-stream',
            createdAt: this.now(),
        }));
        this.evictOverflow();
        return id;
    }

    /**
     * Decodes an inline data URL and stores its payload.
     */
    storeDataUrl(dataUrl: string): string {
        const { bytes, mediaType } = decodeDataUrl(dataUrl);
        return this.store(bytes, mediaType);
    }

    /**
     * Returns a copy of the entry or throws CacheMiss.
     */
    retrieve(id: string): CachedImage {
        const entry = this.get(id);
        if (!entry) {
            throw new CacheMiss(id);
        }
        return entry;
    }

    get(id: string): CachedImage | null {
        const entry = this.lookup(id);
        // Stored buffers never leave the cache; callers get their own bytes.
        return entry ? { ...entry, bytes: Buffer.from(entry.bytes) } : null;
    }

    size(): number {
        return this.entries.size;
    }

    /**
     * Removes expired entries. Returns how many were removed.
     */
    cleanup(): number {
        let removed = 0;
        for (const [id, entry] of this.entries) {
            if (this.isExpired(entry)) {
                this.entries.delete(id);
                removed++;
            }
        }
        return removed;
    }

    private lookup(id: string): CachedImage | undefined {
        const entry = this.entries.get(id);
        if (entry && this.isExpired(entry)) {
            this.entries.delete(id);
            return undefined;
        }
        return entry;
    }

    private isExpired(entry: CachedImage): boolean {
        return this.ttlMs > 0 && this.now() - entry.createdAt > this.ttlMs;
    }

    private evictOverflow(): void {
        if (this.maxEntries <= 0) return;
        // Map iteration order is insertion order, so the first key is the oldest.
        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }
    }
}
