import { describe, expect, it } from 'vitest';
import { ConfigurationError } from './errors.js';
import { parseWorkflow } from './workflow.js';

describe('parseWorkflow', () => {
  it('normalizes a full workflow file', () => {
    const doc = parseWorkflow(
      `
on:
  branches: [main, 'release/**']
  paths-ignore: ['docs/**']
env:
  RETRIES: 3
permissions:
  deployments: write
jobs:
  build:
    steps:
      - run: |
          npm ci
          npm run build
  deploy:
    needs: build
    runs-on: macos-14
    environment: production
    timeout-minutes: 10
    steps:
      - name: Publish
        uses: deploy
        with: { artifact: site, environment: production }
        continue-on-error: true
`,
      'pages'
    );

    expect(doc.name).toBe('pages');
    expect(doc.on).toEqual({
      events: undefined,
      branches: ['main', 'release/**'],
      pathsIgnore: ['docs/**'],
      manualDispatch: 'enabled',
      skipMarker: '[skip ci]'
    });
    expect(doc.env).toEqual({ RETRIES: '3' });
    expect(doc.jobs.build).toMatchObject({ id: 'build', needs: [], runsOn: 'ubuntu-latest' });
    expect(doc.jobs.build.steps[0]).toMatchObject({
      name: 'npm ci',
      uses: 'shell',
      with: { cmd: 'npm ci\nnpm run build\n' },
      continueOnError: false
    });
    expect(doc.jobs.deploy).toMatchObject({
      needs: ['build'],
      runsOn: 'macos-14',
      environment: 'production',
      timeoutMinutes: 10
    });
    expect(doc.jobs.deploy.steps[0]).toMatchObject({ name: 'Publish', uses: 'deploy', continueOnError: true });
  });

  it('points at the offending declaration', () => {
    const bad = `
jobs:
  build:
    steps:
      - run: make
        uses: shell
`;
    expect(() => parseWorkflow(bad)).toThrow(ConfigurationError);
    expect(() => parseWorkflow(bad)).toThrow('jobs.build.steps.0: a step needs exactly one of "uses" or "run"');
  });

  it('rejects unknown keys', () => {
    expect(() => parseWorkflow('jobs:\n  a:\n    steps: [{ run: make }]\n    stepz: []\n')).toThrow(
      "jobs.a: Unrecognized key(s) in object: 'stepz'"
    );
  });

  it('rejects a workflow without jobs', () => {
    expect(() => parseWorkflow('jobs: {}\n')).toThrow('jobs: a workflow needs at least one job');
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseWorkflow('jobs: [\n')).toThrow(/^invalid YAML: /);
  });
});
