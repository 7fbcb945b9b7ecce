import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { snapshotFromRecord } from '../utils/snapshot.js';
import { cacheScope, deriveCacheKey, FsCacheStore, hashFiles, MemoryCacheStore } from './cache.js';

const blob = snapshotFromRecord({ 'node_modules/a/index.js': 'module.exports = 1;\n' });

describe('deriveCacheKey', () => {
  it('joins scope, os and hash', () => {
    expect(deriveCacheKey({ scope: cacheScope('acme/site', 'main'), os: 'ubuntu-latest', hash: 'abc' }))
      .toBe('acme/site@main:ubuntu-latest:abc');
  });

  it('puts the prefix in front of the hash', () => {
    expect(deriveCacheKey({ scope: 's', os: 'linux', hash: 'abc', prefix: 'npm' })).toBe('s:linux:npm-abc');
  });
});

describe('hashFiles', () => {
  it('ignores insertion order and changes with content', () => {
    const a = new Map([['a.json', Buffer.from('1')], ['b.json', Buffer.from('2')]]);
    const b = new Map([['b.json', Buffer.from('2')], ['a.json', Buffer.from('1')]]);
    const c = new Map([['a.json', Buffer.from('1')], ['b.json', Buffer.from('3')]]);
    expect(hashFiles(a)).toBe(hashFiles(b));
    expect(hashFiles(a)).not.toBe(hashFiles(c));
  });
});

describe('MemoryCacheStore', () => {
  it('returns the stored blob for the exact key only', async () => {
    const store = new MemoryCacheStore();
    await store.store('scope:linux:abc123', blob);
    const hit = await store.lookup('scope:linux:abc123');
    expect(hit?.get('node_modules/a/index.js')?.toString()).toBe('module.exports = 1;\n');
    expect(await store.lookup('scope:linux:abc124')).toBeUndefined();
    expect(await store.lookup('scope:linux:abc12')).toBeUndefined();
  });

  it('never overwrites an existing key', async () => {
    const store = new MemoryCacheStore();
    await store.store('k', blob);
    await store.store('k', snapshotFromRecord({ other: 'x' }));
    const hit = await store.lookup('k');
    expect([...(hit?.keys() ?? [])]).toEqual(['node_modules/a/index.js']);
  });

  it('evicts the least recently used entry beyond its budget', async () => {
    const store = new MemoryCacheStore(10);
    await store.store('a', snapshotFromRecord({ f: '1234' }));
    await store.store('b', snapshotFromRecord({ f: '1234' }));
    await store.lookup('a');
    await store.store('c', snapshotFromRecord({ f: '1234' }));
    expect(store.keys()).toEqual(['a', 'c']);
    expect(store.sizeBytes).toBe(8);
  });
});

describe('FsCacheStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pipewright-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('round-trips a blob through disk', async () => {
    const store = new FsCacheStore(dir);
    await store.store('acme/site@main:linux:abc', blob);
    const hit = await new FsCacheStore(dir).lookup('acme/site@main:linux:abc');
    expect(hit?.get('node_modules/a/index.js')?.toString()).toBe('module.exports = 1;\n');
    expect(await store.lookup('acme/site@main:linux:abd')).toBeUndefined();
  });

  it('leaves no temp files behind', async () => {
    const store = new FsCacheStore(dir);
    await store.store('k', blob);
    const files = await readdir(dir);
    expect(files).toHaveLength(1);
    expect(files[0].endsWith('.json')).toBe(true);
  });
});
