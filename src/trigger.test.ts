import { describe, it, expect } from 'vitest';
import { branchOf, evaluateTrigger } from './trigger.js';
import { RepoEvent, TriggerSpec } from './types.js';

function push(ref: string, changedPaths: string[], commitMessage = 'update'): RepoEvent {
  return { kind: 'push', ref, changedPaths, commitMessage, repository: 'acme/site' };
}

const spec: TriggerSpec = { branches: ['main', 'feature/*'], pathsIgnore: ['README.md'] };

describe('evaluateTrigger', () => {
  it('rejects a push whose only changed path is ignored', () => {
    expect(evaluateTrigger(push('feature/x', ['README.md']), spec)).toEqual({
      accepted: false,
      reason: 'every changed path is ignored'
    });
  });

  it('accepts a push to a listed branch with a relevant change', () => {
    expect(evaluateTrigger(push('main', ['src/app.js']), spec)).toEqual({ accepted: true });
  });

  it('accepts when at least one changed path is not ignored', () => {
    expect(evaluateTrigger(push('main', ['README.md', 'src/app.js']), spec).accepted).toBe(true);
  });

  it('rejects a push to a branch outside the allow-list', () => {
    const decision = evaluateTrigger(push('hotfix/y', ['src/app.js']), spec);
    expect(decision).toEqual({ accepted: false, reason: 'branch hotfix/y does not match main, feature/*' });
  });

  it('does not let a single-segment glob cross slashes', () => {
    expect(evaluateTrigger(push('feature/a/b', ['src/app.js']), spec).accepted).toBe(false);
    expect(evaluateTrigger(push('feature/a/b', ['src/app.js']), { branches: ['feature/**'] }).accepted).toBe(true);
  });

  it('normalizes full refs before matching', () => {
    expect(evaluateTrigger(push('refs/heads/main', ['src/app.js']), spec).accepted).toBe(true);
  });

  it('checks the skip marker first, case-insensitively', () => {
    const withMarker = { ...spec, skipMarker: '[skip ci]' };
    expect(evaluateTrigger(push('main', ['src/app.js'], 'fix typo [skip ci]'), withMarker)).toEqual({
      accepted: false,
      reason: 'commit message contains "[skip ci]"'
    });
    expect(evaluateTrigger(push('main', ['src/app.js'], 'fix typo [SKIP CI]'), withMarker).accepted).toBe(false);
  });

  it('lets manual dispatch bypass branch and path filters', () => {
    const dispatch: RepoEvent = { ...push('any/branch', ['README.md']), kind: 'workflow_dispatch' };
    expect(evaluateTrigger(dispatch, spec)).toEqual({ accepted: true });
    expect(evaluateTrigger(dispatch, { ...spec, manualDispatch: 'disabled' })).toEqual({
      accepted: false,
      reason: 'manual dispatch is disabled'
    });
  });

  it('applies the branch filter to pushes only', () => {
    const pr: RepoEvent = { ...push('feature-z', ['src/app.js']), kind: 'pull_request.opened', pullRequest: 7 };
    expect(evaluateTrigger(pr, spec).accepted).toBe(true);
  });

  it('rejects event kinds the workflow does not listen to', () => {
    const pr: RepoEvent = { ...push('main', ['src/app.js']), kind: 'pull_request.synchronize' };
    expect(evaluateTrigger(pr, { events: ['push'] })).toEqual({
      accepted: false,
      reason: 'event pull_request.synchronize is not a trigger of this workflow'
    });
  });

  it('accepts an event without changed paths', () => {
    expect(evaluateTrigger(push('main', []), spec).accepted).toBe(true);
  });
});

describe('branchOf', () => {
  it('strips ref prefixes', () => {
    expect(branchOf('refs/heads/feature/x')).toBe('feature/x');
    expect(branchOf('main')).toBe('main');
  });
});
