import { RepoEvent, TriggerDecision, TriggerSpec } from './types.js';
import { matchesAny } from './utils/glob.js';

export function branchOf(ref: string): string {
  if (ref.startsWith('refs/heads/')) return ref.slice('refs/heads/'.length);
  if (ref.startsWith('refs/tags/')) return ref.slice('refs/tags/'.length);
  return ref;
}

/**
 * Decides whether `event` starts a run. Pure and synchronous; the skip marker
 * is checked before anything else.
 */
export function evaluateTrigger(event: RepoEvent, spec: TriggerSpec): TriggerDecision {
  const marker = spec.skipMarker?.trim();
  if (marker && event.commitMessage.toLowerCase().includes(marker.toLowerCase())) {
    return { accepted: false, reason: `commit message contains "${marker}"` };
  }

  if (spec.events && spec.events.length && !spec.events.includes(event.kind)) {
    return { accepted: false, reason: `event ${event.kind} is not a trigger of this workflow` };
  }

  if (event.kind === 'workflow_dispatch') {
    if (spec.manualDispatch === 'disabled') {
      return { accepted: false, reason: 'manual dispatch is disabled' };
    }
    return { accepted: true };
  }

  if (event.kind === 'push' && spec.branches && spec.branches.length) {
    const branch = branchOf(event.ref);
    if (!matchesAny(spec.branches, branch)) {
      return { accepted: false, reason: `branch ${branch} does not match ${spec.branches.join(', ')}` };
    }
  }

  const ignored = spec.pathsIgnore ?? [];
  if (ignored.length && event.changedPaths.length) {
    const relevant = event.changedPaths.filter(p => !matchesAny(ignored, p));
    if (!relevant.length) {
      return { accepted: false, reason: 'every changed path is ignored' };
    }
  }

  return { accepted: true };
}
