import { createHash } from 'node:crypto';
import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { matchesAny, normalizePath } from './glob.js';

/** Directory snapshot: relative POSIX path -> file bytes. */
export type Snapshot = ReadonlyMap<string, Buffer>;

export type CaptureOptions = {
  /** top-level directory names to leave out */
  exclude?: string[];
};

async function walk(root: string, rel: string, exclude: ReadonlySet<string>, out: Map<string, Buffer>) {
  const entries = await readdir(path.join(root, rel), { withFileTypes: true });
  for (const entry of entries) {
    const childRel = rel ? `${rel}/${entry.name}` : entry.name;
    if (!rel && exclude.has(entry.name)) continue;
    if (entry.isDirectory()) await walk(root, childRel, exclude, out);
    else if (entry.isFile()) out.set(childRel, await readFile(path.join(root, childRel)));
  }
}

/**
 * Captures `paths` (files or directories, relative to `root`) into one
 * snapshot keyed by path relative to `root`. Missing paths are ignored.
 */
export async function captureSnapshot(root: string, paths: string[] = ['.'], options: CaptureOptions = {}): Promise<Snapshot> {
  const out = new Map<string, Buffer>();
  const exclude = new Set(options.exclude ?? []);
  for (const p of paths) {
    const rel = normalizePath(p) === '.' ? '' : normalizePath(p).replace(/\/$/, '');
    const abs = path.join(root, rel);
    const info = await stat(abs).catch((e: NodeJS.ErrnoException) => {
      if (e.code === 'ENOENT') return undefined;
      throw e;
    });
    if (!info) continue;
    if (info.isDirectory()) await walk(root, rel, rel ? new Set() : exclude, out);
    else out.set(rel, await readFile(abs));
  }
  return sortSnapshot(out);
}

/** Files under `root` whose relative path matches one of `patterns`. */
export async function findFiles(root: string, patterns: string[], options: CaptureOptions = {}): Promise<string[]> {
  const all = await captureSnapshot(root, ['.'], options);
  return [...all.keys()].filter(f => matchesAny(patterns, f));
}

export async function restoreSnapshot(root: string, snapshot: Snapshot): Promise<void> {
  for (const [rel, content] of snapshot) {
    const abs = path.join(root, rel);
    await mkdir(path.dirname(abs), { recursive: true });
    await writeFile(abs, content);
  }
}

export function sortSnapshot(files: ReadonlyMap<string, Buffer>): Snapshot {
  return new Map([...files.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function hashSnapshot(snapshot: Snapshot): string {
  const hash = createHash('sha256');
  for (const [rel, content] of sortSnapshot(snapshot)) {
    hash.update(rel);
    hash.update('\0');
    hash.update(String(content.length));
    hash.update('\0');
    hash.update(content);
  }
  return hash.digest('hex');
}

export function snapshotSize(snapshot: Snapshot): number {
  let size = 0;
  for (const content of snapshot.values()) size += content.length;
  return size;
}

export function snapshotFromRecord(files: Record<string, string | Buffer>): Snapshot {
  const out = new Map<string, Buffer>();
  for (const [rel, content] of Object.entries(files)) {
    out.set(normalizePath(rel), typeof content === 'string' ? Buffer.from(content) : content);
  }
  return sortSnapshot(out);
}

// Serialized form used by the filesystem stores.
export type SerializedSnapshot = { files: Record<string, string> };

export function serializeSnapshot(snapshot: Snapshot): SerializedSnapshot {
  const files: Record<string, string> = {};
  for (const [rel, content] of snapshot) files[rel] = content.toString('base64');
  return { files };
}

export function deserializeSnapshot(data: SerializedSnapshot): Snapshot {
  const out = new Map<string, Buffer>();
  for (const [rel, b64] of Object.entries(data.files)) out.set(rel, Buffer.from(b64, 'base64'));
  return sortSnapshot(out);
}
