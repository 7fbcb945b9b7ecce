import { ConfigurationError } from '../errors.js';
import { WorkflowDefinition } from '../types.js';
import { Action } from './action.js';
import { downloadArtifactAction, uploadArtifactAction } from './artifacts.js';
import { cacheAction } from './cache.js';
import { checkoutAction } from './checkout.js';
import { CompositeAction } from './composite.js';
import { deployAction } from './deploy.js';
import { httpAction } from './http.js';
import { qualityGateAction } from './quality-gate.js';
import { shellAction } from './shell.js';

export const builtinActions: readonly Action[] = [
  shellAction,
  httpAction,
  checkoutAction,
  cacheAction,
  uploadArtifactAction,
  downloadArtifactAction,
  deployAction,
  qualityGateAction
];

/** Built-in actions plus the workflow's composite actions, by name. */
export function buildActionRegistry(doc: Pick<WorkflowDefinition, 'actions'>, builtins: readonly Action[] = builtinActions): Map<string, Action> {
  const registry = new Map<string, Action>(builtins.map(a => [a.name, a]));
  for (const [name, def] of Object.entries(doc.actions)) {
    if (registry.has(name)) {
      throw new ConfigurationError(`composite action "${name}" shadows a built-in action`, `actions.${name}`);
    }
    registry.set(name, new CompositeAction({ ...def, name }));
  }
  return registry;
}
