import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';

import { toRecord } from './record';
import type { CacheEntry, CacheMetadata, ExtractedRecord } from './types';
import { log } from './ui';

type CacheData = { records: Record<string, CacheEntry> };

export type RawText = {
  text: string;
  urls: string[];
  methods: string[];
};

export type CacheOptions = {
  /** Entries older than this are treated as misses. Unset means never stale. */
  maxAgeMs?: number;
  now?: () => Date;
};

export function sanitizeKey(name: string): string {
  return name.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '_') || '_';
}

/**
 * Durable store of extracted records keyed by sanitized provider name, with
 * the raw scraped text kept beside it for inspection. Nothing is evicted.
 */
export class RecordCache {
  private constructor(
    private readonly db: Low<CacheData>,
    readonly dir: string,
    private readonly options: CacheOptions
  ) {}

  static async open(dir: string, options: CacheOptions = {}): Promise<RecordCache> {
    await mkdir(dir, { recursive: true });
    const db = new Low<CacheData>(new JSONFile<CacheData>(path.join(dir, 'records.json')), {
      records: {},
    });
    await db.read();
    return new RecordCache(db, dir, options);
  }

  textPath(name: string): string {
    return path.join(this.dir, `${sanitizeKey(name)}_text.txt`);
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private isStale(entry: CacheEntry): boolean {
    const { maxAgeMs } = this.options;
    if (maxAgeMs === undefined) return false;
    const cachedAt = entry.cached_at ? Date.parse(entry.cached_at) : Number.NaN;
    if (Number.isNaN(cachedAt)) return true;
    return this.now().getTime() - cachedAt > maxAgeMs;
  }

  // Keys such as "constructor" or "tostring" must not resolve to prototype members.
  private own(key: string): CacheEntry | undefined {
    const { records } = this.db.data;
    return Object.hasOwn(records, key) ? records[key] : undefined;
  }

  async lookup(name: string): Promise<ExtractedRecord | undefined> {
    await this.db.read();
    const entry = this.own(sanitizeKey(name));
    if (!entry) return undefined;
    if (this.isStale(entry)) {
      log.debug(`[cache] stale entry for ${name}`);
      return undefined;
    }
    return toRecord(entry);
  }

  async entry(name: string): Promise<CacheEntry | undefined> {
    await this.db.read();
    return this.own(sanitizeKey(name));
  }

  async store(
    name: string,
    record: ExtractedRecord,
    metadata: CacheMetadata = {},
    raw?: RawText
  ): Promise<void> {
    const timestamp = this.now().toISOString();
    const key = sanitizeKey(name);

    await this.db.read();
    // Plain assignment to "__proto__" would replace the prototype.
    Object.defineProperty(this.db.data.records, key, {
      value: { ...toRecord(record), ...metadata, cached_at: timestamp },
      enumerable: true,
      writable: true,
      configurable: true,
    });
    await this.db.write();

    if (raw) {
      const header = [
        ...raw.urls.map((url) => `URL: ${url}`),
        `Method: ${raw.methods.join(', ') || 'unknown'}`,
        `Timestamp: ${timestamp}`,
        '='.repeat(80),
      ].join('\n');
      await writeFile(this.textPath(name), `${header}\n${raw.text}`, 'utf-8');
    }
  }

  async invalidate(name: string): Promise<boolean> {
    const key = sanitizeKey(name);
    await this.db.read();
    const existed = Object.hasOwn(this.db.data.records, key);
    if (existed) {
      delete this.db.data.records[key];
      await this.db.write();
    }
    await rm(this.textPath(name), { force: true });
    return existed;
  }

  async keys(): Promise<string[]> {
    await this.db.read();
    return Object.keys(this.db.data.records);
  }
}
