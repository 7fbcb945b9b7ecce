import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { cacheScope, deriveCacheKey, hashFiles } from '../stores/cache.js';
import { branchOf } from '../trigger.js';
import { captureSnapshot, findFiles, restoreSnapshot, snapshotSize } from '../utils/snapshot.js';
import { Action, inputList, inputString } from './action.js';

/**
 * Restores `path` from the cache on an exact key hit. On a miss it reports
 * `cache-hit: 'false'` so an install step can run, and saves `path` under
 * the key once every step of the job has succeeded.
 */
export const cacheAction: Action = {
  name: 'cache',
  description: 'Restore and save a dependency cache keyed by a hash of lockfiles',
  inputs: {
    path: { required: true, description: 'paths to cache, relative to the workspace' },
    'key-files': { required: true, description: 'globs of the files whose content keys the cache' },
    key: { description: 'prefix placed before the file hash' }
  },
  async execute(inputs, step) {
    const { services, environment, runId } = step.job;
    const workspace = environment.workspace;
    const paths = inputList(inputs, 'path');
    const files = await findFiles(workspace, inputList(inputs, 'key-files'), { exclude: ['.git', 'node_modules'] });
    if (!files.length) step.log('no key files matched; hashing an empty set');

    const contents = new Map<string, Buffer>();
    for (const f of files) contents.set(f, await readFile(path.join(workspace, f)));
    const hash = hashFiles(contents);
    const prefix = inputString(inputs, 'key') || undefined;

    const repository = step.ctx.event.repository;
    const branch = branchOf(step.ctx.event.ref);
    const lineage = [...new Set([branch, services.defaultBranch])];
    const keys = lineage.map(b => deriveCacheKey({ scope: cacheScope(repository, b), os: environment.os, hash, prefix }));

    for (const key of keys) {
      const blob = await services.cache.lookup(key);
      if (!blob) continue;
      await restoreSnapshot(workspace, blob);
      step.log(`cache hit on ${key} (${blob.size} file(s))`);
      return { success: true, outputs: { 'cache-hit': 'true', key: keys[0], 'matched-key': key } };
    }

    const key = keys[0];
    step.log(`cache miss on ${key}`);
    step.job.postHooks.push(async () => {
      const blob = await captureSnapshot(workspace, paths);
      if (!blob.size) {
        step.job.logger.warn('nothing to cache', { key, paths });
        return;
      }
      await services.cache.store(key, blob);
      step.job.cacheEntries.push(key);
      step.job.logger.info('cache saved', { runId, key, bytes: snapshotSize(blob) });
    });
    return { success: true, outputs: { 'cache-hit': 'false', key, 'matched-key': '' } };
  }
};
