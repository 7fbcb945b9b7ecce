import { describe, expect, it } from 'vitest';
import { buildActionRegistry } from './steps/index.js';
import { validateWorkflow } from './validate.js';
import { parseWorkflow } from './workflow.js';

function validate(yaml: string): string[] {
  const doc = parseWorkflow(yaml);
  return validateWorkflow(doc, buildActionRegistry(doc));
}

describe('validateWorkflow', () => {
  it('returns jobs in dependency order', () => {
    const order = validate(`
jobs:
  deploy:
    needs: test
    steps:
      - uses: download-artifact
        with: { name: site }
  test: { needs: build, steps: [{ run: npm test }] }
  build:
    steps:
      - uses: upload-artifact
        with: { name: site, path: dist }
`);
    expect(order).toEqual(['build', 'test', 'deploy']);
  });

  it('rejects unknown actions', () => {
    expect(() => validate('jobs:\n  a:\n    steps: [{ uses: nope }]\n')).toThrow(
      'jobs.a.steps[0].uses: unknown action "nope"'
    );
  });

  it('rejects undeclared inputs', () => {
    expect(() =>
      validate(`
jobs:
  a:
    steps:
      - uses: cache
        with: { path: node_modules, key-files: package-lock.json, bogus: 1 }
`)
    ).toThrow('jobs.a.steps[0].with.bogus: unknown input "bogus" for action "cache"');
  });

  it('checks condition syntax up front', () => {
    expect(() => validate(`jobs:\n  a:\n    steps:\n      - run: make\n        if: "env.X =="\n`)).toThrow(
      'jobs.a.steps[0].if: unexpected end in expression: env.X =='
    );
  });

  it('rejects composite actions that use each other', () => {
    expect(() =>
      validate(`
actions:
  x: { steps: [{ uses: y }] }
  y: { steps: [{ uses: x }] }
jobs:
  a: { steps: [{ run: make }] }
`)
    ).toThrow('actions.x: composite actions use each other: x -> y -> x');
  });

  it('rejects a composite action named like a built-in', () => {
    expect(() =>
      validate(`
actions:
  shell: { steps: [{ run: make }] }
jobs:
  a: { steps: [{ run: make }] }
`)
    ).toThrow('actions.shell: composite action "shell" shadows a built-in action');
  });

  it('rejects a download that comes before the upload in the same job', () => {
    expect(() =>
      validate(`
jobs:
  a:
    steps:
      - uses: download-artifact
        with: { name: site }
      - uses: upload-artifact
        with: { name: site, path: dist }
`)
    ).toThrow('jobs.a: artifact "site" is consumed before it is produced: no earlier step or job in the needs chain uploads it');
  });

  it('accepts a download after an upload in the same job', () => {
    expect(
      validate(`
jobs:
  a:
    steps:
      - uses: upload-artifact
        with: { name: site, path: dist }
      - uses: download-artifact
        with: { name: site, path: copy }
`)
    ).toEqual(['a']);
  });

  it('leaves templated artifact names to run time', () => {
    expect(
      validate(`
jobs:
  a:
    steps:
      - uses: download-artifact
        with: { name: '\${{ inputs.which }}' }
`)
    ).toEqual(['a']);
  });
});
