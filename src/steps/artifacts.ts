import { stat } from 'node:fs/promises';
import path from 'node:path';
import { captureSnapshot, restoreSnapshot, Snapshot } from '../utils/snapshot.js';
import { Action, inputBoolean, inputList, inputString } from './action.js';

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return false;
    throw e;
  }
}

/** A single directory is captured relative to itself; anything else relative to the workspace. */
async function capture(workspace: string, paths: string[]): Promise<Snapshot> {
  if (paths.length === 1 && (await isDirectory(path.join(workspace, paths[0])))) {
    return captureSnapshot(path.join(workspace, paths[0]));
  }
  return captureSnapshot(workspace, paths);
}

export const uploadArtifactAction: Action = {
  name: 'upload-artifact',
  description: 'Store build output for later jobs of this run',
  inputs: {
    name: { required: true },
    path: { required: true },
    retain: { default: false, description: 'keep the artifact after the run completes' }
  },
  async execute(inputs, step) {
    const { services, environment, runId } = step.job;
    const name = inputString(inputs, 'name');
    const blob = await capture(environment.workspace, inputList(inputs, 'path'));
    if (!blob.size) return { success: false, error: `no files found for artifact "${name}"` };
    await services.artifacts.put(runId, name, blob, { retain: inputBoolean(inputs, 'retain') });
    step.job.artifacts.push(name);
    step.log(`uploaded artifact ${name} (${blob.size} file(s))`);
    return { success: true, outputs: { name, files: blob.size } };
  }
};

export const downloadArtifactAction: Action = {
  name: 'download-artifact',
  description: 'Fetch an artifact uploaded by a job this job needs',
  inputs: {
    name: { required: true },
    path: { default: '.' }
  },
  async execute(inputs, step) {
    const { services, environment, runId } = step.job;
    const name = inputString(inputs, 'name');
    const blob = await services.artifacts.get(runId, name);
    await restoreSnapshot(path.join(environment.workspace, inputString(inputs, 'path')), blob);
    step.log(`downloaded artifact ${name} (${blob.size} file(s))`);
    return { success: true, outputs: { files: blob.size } };
  }
};
