import { createHash } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, stat, utimes, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { createLogger, Logger } from '../utils/logger.js';
import {
  deserializeSnapshot,
  serializeSnapshot,
  Snapshot,
  snapshotSize
} from '../utils/snapshot.js';

/**
 * Content-addressed dependency cache shared across runs. Entries are
 * immutable: storing under an existing key leaves the entry as it is.
 */
export interface CacheStore {
  lookup(key: string): Promise<Snapshot | undefined>;
  store(key: string, blob: Snapshot): Promise<void>;
}

export type CacheKeyParts = {
  /** `<repository>@<branch>` */
  scope: string;
  os: string;
  /** hash of the declared input files */
  hash: string;
  prefix?: string;
};

export function deriveCacheKey({ scope, os, hash, prefix }: CacheKeyParts): string {
  return prefix ? `${scope}:${os}:${prefix}-${hash}` : `${scope}:${os}:${hash}`;
}

export function cacheScope(repository: string, branch: string): string {
  return `${repository}@${branch}`;
}

/** Hash of a set of files, independent of the order they are given in. */
export function hashFiles(files: ReadonlyMap<string, Buffer>): string {
  const hash = createHash('sha256');
  for (const rel of [...files.keys()].sort()) {
    hash.update(rel);
    hash.update('\0');
    const content = files.get(rel);
    if (content) hash.update(content);
    hash.update('\0');
  }
  return hash.digest('hex');
}

export const DEFAULT_CACHE_MAX_BYTES = 512 * 1024 * 1024;

type MemoryEntry = { blob: Snapshot; size: number };

export class MemoryCacheStore implements CacheStore {
  // Map iteration order doubles as recency order: oldest first.
  private readonly entries = new Map<string, MemoryEntry>();
  private total = 0;

  constructor(private readonly maxBytes = DEFAULT_CACHE_MAX_BYTES) {}

  async lookup(key: string): Promise<Snapshot | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.blob;
  }

  async store(key: string, blob: Snapshot): Promise<void> {
    if (this.entries.has(key)) return;
    const size = snapshotSize(blob);
    this.entries.set(key, { blob: new Map(blob), size });
    this.total += size;
    this.evict();
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get sizeBytes(): number {
    return this.total;
  }

  private evict() {
    for (const [key, entry] of this.entries) {
      if (this.total <= this.maxBytes || this.entries.size <= 1) break;
      this.entries.delete(key);
      this.total -= entry.size;
    }
  }
}

const SerializedSnapshotSchema = z.object({ files: z.record(z.string()) });

/**
 * Cache entries as JSON files under `dir`. Writes go to a temp file and are
 * renamed into place, so a half-written entry is never visible to lookups.
 * File mtime tracks recency for eviction.
 */
export class FsCacheStore implements CacheStore {
  private readonly log: Logger;

  constructor(private readonly dir: string, private readonly maxBytes = DEFAULT_CACHE_MAX_BYTES) {
    this.log = createLogger('cache');
  }

  private fileFor(key: string): string {
    const name = createHash('sha256').update(key).digest('hex');
    return path.join(this.dir, `${name}.json`);
  }

  async lookup(key: string): Promise<Snapshot | undefined> {
    const file = this.fileFor(key);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (e) {
      if (isNotFound(e)) return undefined;
      throw e;
    }
    const parsed = z.object({ key: z.string(), blob: SerializedSnapshotSchema }).parse(JSON.parse(raw));
    if (parsed.key !== key) return undefined;
    const now = new Date();
    await utimes(file, now, now);
    return deserializeSnapshot(parsed.blob);
  }

  async store(key: string, blob: Snapshot): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const file = this.fileFor(key);
    if (await exists(file)) return;
    const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
    await writeFile(tmp, JSON.stringify({ key, blob: serializeSnapshot(blob) }));
    await rename(tmp, file);
    this.log.debug('cache entry stored', { key, bytes: snapshotSize(blob) });
    await this.evict();
  }

  private async evict() {
    const names = (await readdir(this.dir)).filter(n => n.endsWith('.json'));
    const files = await Promise.all(
      names.map(async n => {
        const info = await stat(path.join(this.dir, n));
        return { file: path.join(this.dir, n), size: info.size, mtime: info.mtimeMs };
      })
    );
    files.sort((a, b) => a.mtime - b.mtime);
    let total = files.reduce((sum, f) => sum + f.size, 0);
    let remaining = files.length;
    for (const f of files) {
      if (total <= this.maxBytes || remaining <= 1) break;
      await rm(f.file, { force: true });
      total -= f.size;
      remaining--;
      this.log.info('cache entry evicted', { file: path.basename(f.file), bytes: f.size });
    }
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

async function exists(file: string): Promise<boolean> {
  try {
    await stat(file);
    return true;
  } catch (e) {
    if (isNotFound(e)) return false;
    throw e;
  }
}
