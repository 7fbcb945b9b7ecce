import path from 'node:path';
import { captureSnapshot, restoreSnapshot } from '../utils/snapshot.js';
import { Action, inputString } from './action.js';

/** Copies the source tree into the job workspace. */
export const checkoutAction: Action = {
  name: 'checkout',
  description: 'Copy the repository sources into the workspace',
  inputs: {
    path: { default: '.', description: 'destination relative to the workspace' }
  },
  async execute(inputs, step) {
    const { services, environment } = step.job;
    if (!services.sourceDir) {
      return { success: false, error: 'no source directory configured for checkout' };
    }
    const tree = await captureSnapshot(services.sourceDir, ['.'], { exclude: services.checkoutExclude });
    await restoreSnapshot(path.join(environment.workspace, inputString(inputs, 'path')), tree);
    step.log(`checked out ${tree.size} file(s) from ${services.sourceDir}`);
    return { success: true, outputs: { files: tree.size, ref: step.ctx.event.ref, sha: step.ctx.event.sha ?? '' } };
  }
};
