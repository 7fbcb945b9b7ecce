import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { DeploymentPublisher, MemoryHostingTarget } from '../deploy/publisher.js';
import { EnvironmentProvisioner, ExecOptions, ExecResult, ExecutionEnvironment } from '../environment.js';
import { LocalRuleAnalyzer } from '../quality/analyzers.js';
import { QualityGateReporter } from '../quality/reporter.js';
import { ChangeRequestClient, ChangeRequestRef, Finding, Report } from '../quality/types.js';
import { MemorySecretStore } from '../secrets.js';
import type { RunServices } from '../services.js';
import { MemoryArtifactStore } from '../stores/artifact.js';
import { MemoryCacheStore } from '../stores/cache.js';
import { RepoEvent } from '../types.js';

/** Scripted stand-in for a shell: decides the result of each command. */
export type ExecScript = (
  cmd: string,
  env: FakeEnvironment,
  options: ExecOptions
) => Partial<ExecResult> | Promise<Partial<ExecResult>>;

export class FakeEnvironment implements ExecutionEnvironment {
  readonly commands: string[] = [];
  readonly envs: Array<Record<string, string>> = [];
  disposed = false;

  constructor(readonly os: string, readonly workspace: string, private readonly script: ExecScript) {}

  async exec(cmd: string, options: ExecOptions = {}): Promise<ExecResult> {
    this.commands.push(cmd);
    this.envs.push(options.env ?? {});
    const res = await this.script(cmd, this, options);
    const result = { exitCode: res.exitCode ?? 0, stdout: res.stdout ?? '', stderr: res.stderr ?? '' };
    for (const line of result.stdout.split('\n').filter(Boolean)) options.onLine?.(line, 'stdout');
    for (const line of result.stderr.split('\n').filter(Boolean)) options.onLine?.(line, 'stderr');
    return result;
  }

  async write(rel: string, content: string): Promise<void> {
    const file = path.join(this.workspace, rel);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content);
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    await rm(this.workspace, { recursive: true, force: true });
  }
}

export class FakeProvisioner implements EnvironmentProvisioner {
  readonly environments: FakeEnvironment[] = [];

  constructor(private readonly script: ExecScript = () => ({})) {}

  async provision(os: string, label: string): Promise<ExecutionEnvironment> {
    const workspace = await mkdtemp(path.join(tmpdir(), `pipewright-test-${label.slice(-12)}-`));
    const env = new FakeEnvironment(os, workspace, this.script);
    this.environments.push(env);
    return env;
  }
}

/** Resolves like a killed process once the signal aborts. */
export function untilAborted(signal?: AbortSignal): Promise<Partial<ExecResult>> {
  return new Promise(resolve => {
    if (signal?.aborted) return resolve({ exitCode: 143 });
    signal?.addEventListener('abort', () => resolve({ exitCode: 143 }), { once: true });
  });
}

export class RecordingChangeRequestClient implements ChangeRequestClient {
  readonly statuses: Array<{ target: ChangeRequestRef; report: Report }> = [];
  readonly annotations: Finding[] = [];

  async postStatus(target: ChangeRequestRef, report: Report): Promise<void> {
    this.statuses.push({ target, report });
  }

  async annotate(_target: ChangeRequestRef, findings: Finding[]): Promise<void> {
    this.annotations.push(...findings);
  }
}

export type TestServices = RunServices & {
  cache: MemoryCacheStore;
  artifacts: MemoryArtifactStore;
  provisioner: FakeProvisioner;
  hosting: MemoryHostingTarget;
  changeRequests: RecordingChangeRequestClient;
};

export function testServices(
  script?: ExecScript,
  overrides: Partial<Omit<RunServices, 'cache' | 'artifacts' | 'provisioner'>> = {}
): TestServices {
  const hosting = new MemoryHostingTarget();
  const changeRequests = new RecordingChangeRequestClient();
  return {
    cache: new MemoryCacheStore(),
    artifacts: new MemoryArtifactStore(),
    provisioner: new FakeProvisioner(script),
    secrets: new MemorySecretStore({}),
    publisher: new DeploymentPublisher(hosting),
    qualityGate: new QualityGateReporter(new LocalRuleAnalyzer(), changeRequests),
    checkoutExclude: ['.git', 'node_modules'],
    defaultBranch: 'main',
    ...overrides,
    hosting,
    changeRequests
  };
}

export function pushEvent(overrides: Partial<RepoEvent> = {}): RepoEvent {
  return {
    kind: 'push',
    ref: 'main',
    changedPaths: ['src/index.ts'],
    commitMessage: 'update index',
    repository: 'acme/site',
    sha: 'c0ffee',
    ...overrides
  };
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}
