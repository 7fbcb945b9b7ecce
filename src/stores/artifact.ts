import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { deserializeSnapshot, serializeSnapshot, Snapshot } from '../utils/snapshot.js';

export type PutOptions = {
  /** keep the artifact after the run completes */
  retain?: boolean;
};

/** Run-scoped artifact storage. Nothing put under one run is visible to another. */
export interface ArtifactStore {
  put(runId: string, name: string, blob: Snapshot, options?: PutOptions): Promise<void>;
  /** @throws ConfigurationError when no artifact `name` was put in this run */
  get(runId: string, name: string): Promise<Snapshot>;
  list(runId: string): Promise<string[]>;
  /** Drops the run's artifacts that were not put with `retain`. */
  release(runId: string): Promise<void>;
}

function notFound(runId: string, name: string): ConfigurationError {
  return new ConfigurationError(`artifact "${name}" consumed before it was produced in run ${runId}`);
}

export class MemoryArtifactStore implements ArtifactStore {
  private readonly runs = new Map<string, Map<string, { blob: Snapshot; retain: boolean }>>();

  async put(runId: string, name: string, blob: Snapshot, options: PutOptions = {}): Promise<void> {
    let run = this.runs.get(runId);
    if (!run) {
      run = new Map();
      this.runs.set(runId, run);
    }
    run.set(name, { blob: new Map(blob), retain: options.retain ?? false });
  }

  async get(runId: string, name: string): Promise<Snapshot> {
    const entry = this.runs.get(runId)?.get(name);
    if (!entry) throw notFound(runId, name);
    return entry.blob;
  }

  async list(runId: string): Promise<string[]> {
    return [...(this.runs.get(runId)?.keys() ?? [])].sort();
  }

  async release(runId: string): Promise<void> {
    const run = this.runs.get(runId);
    if (!run) return;
    for (const [name, entry] of run) {
      if (!entry.retain) run.delete(name);
    }
    if (!run.size) this.runs.delete(runId);
  }
}

const StoredArtifactSchema = z.object({
  name: z.string(),
  retain: z.boolean(),
  blob: z.object({ files: z.record(z.string()) })
});

/** Artifacts as JSON files under `<dir>/<runId>/`. */
export class FsArtifactStore implements ArtifactStore {
  constructor(private readonly dir: string) {}

  private runDir(runId: string): string {
    return path.join(this.dir, encodeURIComponent(runId));
  }

  private fileFor(runId: string, name: string): string {
    return path.join(this.runDir(runId), `${encodeURIComponent(name)}.json`);
  }

  async put(runId: string, name: string, blob: Snapshot, options: PutOptions = {}): Promise<void> {
    await mkdir(this.runDir(runId), { recursive: true });
    const file = this.fileFor(runId, name);
    const tmp = `${file}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify({ name, retain: options.retain ?? false, blob: serializeSnapshot(blob) }));
    await rename(tmp, file);
  }

  async get(runId: string, name: string): Promise<Snapshot> {
    const stored = await this.read(this.fileFor(runId, name));
    if (!stored) throw notFound(runId, name);
    return deserializeSnapshot(stored.blob);
  }

  async list(runId: string): Promise<string[]> {
    const names = await readdir(this.runDir(runId)).catch((e: NodeJS.ErrnoException) => {
      if (e.code === 'ENOENT') return [];
      throw e;
    });
    return names
      .filter(n => n.endsWith('.json'))
      .map(n => decodeURIComponent(n.slice(0, -'.json'.length)))
      .sort();
  }

  async release(runId: string): Promise<void> {
    let kept = 0;
    for (const name of await this.list(runId)) {
      const file = this.fileFor(runId, name);
      const stored = await this.read(file);
      if (stored?.retain) kept++;
      else await rm(file, { force: true });
    }
    if (!kept) await rm(this.runDir(runId), { recursive: true, force: true });
  }

  private async read(file: string) {
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined;
      throw e;
    }
    return StoredArtifactSchema.parse(JSON.parse(raw));
  }
}
