import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AuthorizationError } from '../errors.js';
import { snapshotFromRecord } from '../utils/snapshot.js';
import { DeploymentPublisher, DirectoryHostingTarget, MemoryHostingTarget } from './publisher.js';

const site = snapshotFromRecord({ 'index.html': '<h1>v1</h1>' });
const grant = { runId: 'run-1', environment: 'pages' };

describe('DeploymentPublisher', () => {
  it('uploads identical content only once', async () => {
    const target = new MemoryHostingTarget();
    const publisher = new DeploymentPublisher(target);
    const first = await publisher.publish('pages', site, grant);
    const second = await publisher.publish('pages', snapshotFromRecord({ 'index.html': '<h1>v1</h1>' }), grant);

    expect(first.changed).toBe(true);
    expect(second.changed).toBe(false);
    expect(second.url).toBe('https://pages.test/pages/');
    expect(second.contentHash).toBe(first.contentHash);
    expect(target.uploads).toHaveLength(1);
    expect(publisher.history('pages')).toHaveLength(2);
  });

  it('serializes concurrent publishes of the same content', async () => {
    const target = new MemoryHostingTarget();
    const publisher = new DeploymentPublisher(target);
    const records = await Promise.all([publisher.publish('pages', site, grant), publisher.publish('pages', site, grant)]);
    expect(records.map(r => r.changed)).toEqual([true, false]);
    expect(target.uploads).toHaveLength(1);
  });

  it('uploads again when the content changes', async () => {
    const target = new MemoryHostingTarget();
    const publisher = new DeploymentPublisher(target);
    await publisher.publish('pages', site, grant);
    const next = await publisher.publish('pages', snapshotFromRecord({ 'index.html': '<h1>v2</h1>' }), grant);
    expect(next.changed).toBe(true);
    expect(target.uploads).toHaveLength(2);
  });

  it('refuses to publish without a matching grant', async () => {
    const target = new MemoryHostingTarget();
    const publisher = new DeploymentPublisher(target);
    await expect(publisher.publish('pages', site, undefined)).rejects.toBeInstanceOf(AuthorizationError);
    await expect(publisher.publish('production', site, grant)).rejects.toThrow(
      'run run-1 may deploy to "pages" only, not "production"'
    );
    expect(target.uploads).toEqual([]);
  });
});

describe('DirectoryHostingTarget', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pipewright-sites-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the site and remembers what is live', async () => {
    const target = new DirectoryHostingTarget(dir, 'https://acme.test/');
    const { url } = await target.upload('pages', site, 'hash-1');
    expect(url).toBe('https://acme.test/pages/');
    expect(await readFile(path.join(dir, 'pages', 'index.html'), 'utf8')).toBe('<h1>v1</h1>');
    expect(await target.current('pages')).toEqual({ contentHash: 'hash-1', url: 'https://acme.test/pages/' });
    expect(await target.current('other')).toBeUndefined();
  });

  it('replaces the previous site', async () => {
    const target = new DirectoryHostingTarget(dir);
    await target.upload('pages', snapshotFromRecord({ 'old.html': 'old' }), 'hash-1');
    await target.upload('pages', site, 'hash-2');
    await expect(readFile(path.join(dir, 'pages', 'old.html'), 'utf8')).rejects.toThrow();
  });
});
