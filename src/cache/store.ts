import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import type { CacheConfig } from '../shared/config.js';
import { resolvePath, epochSeconds } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { ProgramItemSchema, type ProgramItem } from '../source/program.js';

export const CacheEntrySchema = z.object({
  /** Epoch seconds. */
  storedAt: z.number(),
  items: z.array(ProgramItemSchema),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface CacheStatus {
  path: string;
  exists: boolean;
  storedAt: number | null;
  ageSeconds: number | null;
  fresh: boolean;
  count: number;
}

/**
 * Single JSON file holding the last extraction. There is no locking: two
 * overlapping runs can interleave their writes.
 */
export class CacheStore {
  readonly path: string;

  constructor(
    filePath: string,
    private readonly ttlSeconds: number = 3600,
  ) {
    this.path = resolvePath(filePath);
  }

  static fromConfig(cache: CacheConfig): CacheStore {
    return new CacheStore(cache.path, cache.ttl_seconds);
  }

  /**
   * Cached programs if the entry is present, valid and younger than the TTL;
   * otherwise an empty list.
   */
  load(now: Date = new Date()): ProgramItem[] {
    const entry = this.read();
    if (!entry) return [];

    const age = epochSeconds(now) - entry.storedAt;
    if (age >= this.ttlSeconds) {
      logger.info({ path: this.path, ageSeconds: Math.round(age) }, 'Cache expired');
      return [];
    }

    logger.info({ count: entry.items.length }, 'Using programs from cache');
    return entry.items;
  }

  save(items: ProgramItem[], now: Date = new Date()): boolean {
    const entry: CacheEntry = { storedAt: epochSeconds(now), items };
    try {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });
      fs.writeFileSync(this.path, JSON.stringify(entry), 'utf-8');
      logger.info({ count: items.length, path: this.path }, 'Saved programs to cache');
      return true;
    } catch (err) {
      logger.error(
        { path: this.path, error: err instanceof Error ? err.message : String(err) },
        'Error saving cache',
      );
      return false;
    }
  }

  inspect(now: Date = new Date()): CacheStatus {
    const entry = this.read();
    if (!entry) {
      return { path: this.path, exists: false, storedAt: null, ageSeconds: null, fresh: false, count: 0 };
    }
    const ageSeconds = epochSeconds(now) - entry.storedAt;
    return {
      path: this.path,
      exists: true,
      storedAt: entry.storedAt,
      ageSeconds,
      fresh: ageSeconds < this.ttlSeconds,
      count: entry.items.length,
    };
  }

  clear(): boolean {
    if (!fs.existsSync(this.path)) return false;
    fs.rmSync(this.path);
    logger.info({ path: this.path }, 'Cache cleared');
    return true;
  }

  private read(): CacheEntry | null {
    if (!fs.existsSync(this.path)) {
      logger.debug({ path: this.path }, 'No cache file');
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.path, 'utf-8'));
    } catch (err) {
      logger.error(
        { path: this.path, error: err instanceof Error ? err.message : String(err) },
        'Error loading cache',
      );
      return null;
    }

    const parsed = CacheEntrySchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(
        { path: this.path, errors: parsed.error.flatten().fieldErrors },
        'Ignoring malformed cache entry',
      );
      return null;
    }
    return parsed.data;
  }
}
