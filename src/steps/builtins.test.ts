import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { runWorkflow } from '../runner.js';
import { pushEvent, testServices } from '../testing/fakes.js';
import { parseWorkflow } from '../workflow.js';

describe('checkout', () => {
  let source: string | undefined;

  afterEach(async () => {
    if (source) await rm(source, { recursive: true, force: true });
    source = undefined;
  });

  it('copies the source tree without excluded directories', async () => {
    source = await mkdtemp(path.join(tmpdir(), 'pipewright-source-'));
    await mkdir(path.join(source, 'src'), { recursive: true });
    await mkdir(path.join(source, 'node_modules'), { recursive: true });
    await writeFile(path.join(source, 'src/index.ts'), 'export const x = 1;\n');
    await writeFile(path.join(source, 'node_modules/dep.js'), 'module.exports = 2;\n');
    const doc = parseWorkflow(`
jobs:
  a:
    steps:
      - id: co
        uses: checkout
      - run: verify
`);
    const services = testServices(
      async (cmd, env) => (cmd === 'verify' ? { stdout: await readFile(path.join(env.workspace, 'src/index.ts'), 'utf8') } : {}),
      { sourceDir: source }
    );

    const run = await runWorkflow(doc, pushEvent(), services);

    expect(run.status).toBe('success');
    expect(run.jobs.a.steps[0].outputs).toEqual({ files: 1, ref: 'main', sha: 'c0ffee' });
    expect(run.jobs.a.steps[1].log).toEqual(['export const x = 1;']);
  });

  it('fails without a source directory', async () => {
    const run = await runWorkflow(parseWorkflow('jobs:\n  a:\n    steps: [{ uses: checkout }]\n'), pushEvent(), testServices());
    expect(run.jobs.a).toMatchObject({
      status: 'failed',
      error: 'step "checkout" failed: no source directory configured for checkout'
    });
  });
});

describe('http', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const doc = parseWorkflow(`
jobs:
  notify:
    steps:
      - id: hook
        uses: http
        with:
          url: https://hooks.test/deploy
          method: post
          body: { ref: '\${{ event.ref }}' }
`);

  it('sends the rendered body and exposes the response', async () => {
    const fetchMock = vi.fn(async () => new Response('{"queued":true}', { status: 201 }));
    vi.stubGlobal('fetch', fetchMock);

    const run = await runWorkflow(doc, pushEvent(), testServices());

    expect(run.status).toBe('success');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://hooks.test/deploy',
      expect.objectContaining({ method: 'POST', body: '{"ref":"main"}' })
    );
    expect(run.jobs.notify.steps[0].outputs).toEqual({ status: 201, text: '{"queued":true}', json: { queued: true } });
  });

  it('fails on an error status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 500 })));

    const run = await runWorkflow(doc, pushEvent(), testServices());

    expect(run.jobs.notify).toMatchObject({
      status: 'failed',
      error: 'step "hook" failed: POST https://hooks.test/deploy answered 500'
    });
  });
});

describe('upload-artifact', () => {
  it('fails when the path holds no files', async () => {
    const doc = parseWorkflow(`
jobs:
  a:
    steps:
      - id: up
        uses: upload-artifact
        with: { name: site, path: dist }
`);
    const run = await runWorkflow(doc, pushEvent(), testServices());
    expect(run.jobs.a).toMatchObject({ status: 'failed', error: 'step "up" failed: no files found for artifact "site"' });
  });
});

describe('quality-gate', () => {
  it('passes when every finding is in the baseline', async () => {
    const doc = parseWorkflow(`
jobs:
  a:
    steps:
      - run: prepare
      - id: gate
        uses: quality-gate
        with: { project-key: site, baseline: baseline.json, fail-on-error: true }
`);
    const baseline = [{ rule: 'no-debugger', severity: 'error', file: 'src/app.js', line: 5, message: 'debugger statement left in source' }];
    const services = testServices(async (cmd, env) => {
      if (cmd === 'prepare') {
        await env.write('src/app.js', 'function f() {\n  debugger;\n}\n');
        await env.write('baseline.json', JSON.stringify(baseline));
      }
      return {};
    });

    const run = await runWorkflow(doc, pushEvent(), services);

    expect(run.status).toBe('success');
    expect(run.jobs.a.steps[1].outputs).toEqual({ verdict: 'passed', passed: true, findings: 1, 'new-findings': 0 });
    expect(services.changeRequests.statuses).toHaveLength(0);
  });
});
