import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { AuthorizationError } from '../errors.js';
import { createLogger, Logger } from '../utils/logger.js';
import { hashSnapshot, restoreSnapshot, Snapshot } from '../utils/snapshot.js';

/** Write access to one deployment environment, handed to a single job of a run. */
export type DeployGrant = {
  runId: string;
  environment: string;
};

export type DeploymentRecord = {
  id: string;
  runId: string;
  environment: string;
  contentHash: string;
  url: string;
  /** false when identical content was already live */
  changed: boolean;
  createdAt: string;
};

export type LiveDeployment = { contentHash: string; url: string };

export interface HostingTarget {
  current(environment: string): Promise<LiveDeployment | undefined>;
  upload(environment: string, site: Snapshot, contentHash: string): Promise<{ url: string }>;
}

const LiveSchema = z.object({ contentHash: z.string(), url: z.string() });

/** Static hosting on the local filesystem: `<dir>/<environment>/`. */
export class DirectoryHostingTarget implements HostingTarget {
  constructor(private readonly dir: string, private readonly baseUrl?: string) {}

  private siteDir(environment: string): string {
    return path.join(this.dir, encodeURIComponent(environment));
  }

  private metaFile(environment: string): string {
    return `${this.siteDir(environment)}.deployment.json`;
  }

  async current(environment: string): Promise<LiveDeployment | undefined> {
    try {
      return LiveSchema.parse(JSON.parse(await readFile(this.metaFile(environment), 'utf8')));
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined;
      throw e;
    }
  }

  async upload(environment: string, site: Snapshot, contentHash: string): Promise<{ url: string }> {
    const target = this.siteDir(environment);
    const staging = `${target}.staging-${process.pid}`;
    await rm(staging, { recursive: true, force: true });
    await mkdir(staging, { recursive: true });
    await restoreSnapshot(staging, site);
    await rm(target, { recursive: true, force: true });
    await rename(staging, target);
    const url = this.baseUrl
      ? `${this.baseUrl.replace(/\/$/, '')}/${encodeURIComponent(environment)}/`
      : `${pathToFileURL(target).href}/`;
    await writeFile(this.metaFile(environment), JSON.stringify({ contentHash, url }));
    return { url };
  }
}

export class MemoryHostingTarget implements HostingTarget {
  readonly uploads: Array<{ environment: string; contentHash: string }> = [];
  private readonly live = new Map<string, LiveDeployment>();

  constructor(private readonly baseUrl = 'https://pages.test') {}

  async current(environment: string): Promise<LiveDeployment | undefined> {
    return this.live.get(environment);
  }

  async upload(environment: string, _site: Snapshot, contentHash: string): Promise<{ url: string }> {
    const url = `${this.baseUrl}/${environment}/`;
    this.uploads.push({ environment, contentHash });
    this.live.set(environment, { contentHash, url });
    return { url };
  }
}

/**
 * Publishes artifacts to a hosting target. Publishing content that is
 * already live is a no-op that still yields a success record. Publishes to
 * the same environment are serialized.
 */
export class DeploymentPublisher {
  private readonly log: Logger;
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly records: DeploymentRecord[] = [];

  constructor(private readonly target: HostingTarget) {
    this.log = createLogger('publisher');
  }

  async publish(environment: string, artifact: Snapshot, grant: DeployGrant | undefined): Promise<DeploymentRecord> {
    if (!grant) {
      throw new AuthorizationError(environment, `run holds no deployment grant; cannot publish to "${environment}"`);
    }
    if (grant.environment !== environment) {
      throw new AuthorizationError(
        environment,
        `run ${grant.runId} may deploy to "${grant.environment}" only, not "${environment}"`
      );
    }
    const previous = this.queues.get(environment) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(() => this.publishNow(environment, artifact, grant));
    this.queues.set(environment, next);
    return next;
  }

  history(environment?: string): DeploymentRecord[] {
    return this.records.filter(r => environment === undefined || r.environment === environment);
  }

  private async publishNow(environment: string, artifact: Snapshot, grant: DeployGrant): Promise<DeploymentRecord> {
    const contentHash = hashSnapshot(artifact);
    const live = await this.target.current(environment);
    let url: string;
    let changed: boolean;
    if (live?.contentHash === contentHash) {
      url = live.url;
      changed = false;
      this.log.info('content already live', { environment, contentHash });
    } else {
      url = (await this.target.upload(environment, artifact, contentHash)).url;
      changed = true;
      this.log.info('published', { environment, contentHash, url });
    }
    const record: DeploymentRecord = {
      id: randomUUID(),
      runId: grant.runId,
      environment,
      contentHash,
      url,
      changed,
      createdAt: new Date().toISOString()
    };
    this.records.push(record);
    return record;
  }
}
