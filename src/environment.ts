import spawn from 'cross-spawn';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  env?: Record<string, string>;
  /** relative to the workspace */
  cwd?: string;
  signal?: AbortSignal;
  onLine?: (line: string, stream: 'stdout' | 'stderr') => void;
};

/** Disposable compute for one job: a workspace directory plus a shell. */
export interface ExecutionEnvironment {
  readonly os: string;
  readonly workspace: string;
  exec(cmd: string, options?: ExecOptions): Promise<ExecResult>;
  dispose(): Promise<void>;
}

export interface EnvironmentProvisioner {
  provision(os: string, label: string): Promise<ExecutionEnvironment>;
}

function lineSplitter(emit: (line: string) => void) {
  let pending = '';
  return {
    push(chunk: string) {
      pending += chunk;
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? '';
      for (const line of lines) emit(line);
    },
    flush() {
      if (pending) emit(pending);
      pending = '';
    }
  };
}

function isNoSuchProcess(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ESRCH';
}

class LocalEnvironment implements ExecutionEnvironment {
  constructor(readonly os: string, readonly workspace: string) {}

  async exec(cmd: string, options: ExecOptions = {}): Promise<ExecResult> {
    const shell = process.platform === 'win32' ? 'powershell.exe' : '/bin/bash';
    const shellFlag = process.platform === 'win32' ? ['-Command', cmd] : ['-lc', cmd];
    if (options.signal?.aborted) return { exitCode: 130, stdout: '', stderr: 'aborted before start' };

    const child = spawn(shell, shellFlag, {
      stdio: 'pipe',
      // own process group, so an abort reaches everything the script started
      detached: process.platform !== 'win32',
      cwd: path.resolve(this.workspace, options.cwd ?? '.'),
      env: { ...process.env, ...options.env }
    });
    let stdout = '';
    let stderr = '';
    const out = lineSplitter(line => options.onLine?.(line, 'stdout'));
    const err = lineSplitter(line => options.onLine?.(line, 'stderr'));
    child.stdout?.on('data', d => { stdout += String(d); out.push(String(d)); });
    child.stderr?.on('data', d => { stderr += String(d); err.push(String(d)); });

    const onAbort = () => {
      if (child.pid === undefined || process.platform === 'win32') {
        child.kill('SIGTERM');
        return;
      }
      try {
        process.kill(-child.pid, 'SIGTERM');
      } catch (e) {
        if (!isNoSuchProcess(e)) child.kill('SIGTERM');
      }
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const exitCode: number = await new Promise((resolve, reject) => {
        child.on('error', reject);
        child.on('close', (code, signal) => resolve(code ?? (signal ? 128 : 0)));
      });
      out.flush();
      err.flush();
      return { exitCode, stdout, stderr };
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  async dispose(): Promise<void> {
    await rm(this.workspace, { recursive: true, force: true });
  }
}

/**
 * Runs jobs on this machine, each in a fresh temp directory. The OS label a
 * job asks for is recorded but not enforced.
 */
export class LocalProvisioner implements EnvironmentProvisioner {
  constructor(private readonly baseDir = tmpdir()) {}

  async provision(os: string, label: string): Promise<ExecutionEnvironment> {
    const safe = label.replace(/[^A-Za-z0-9_.-]/g, '_');
    const workspace = await mkdtemp(path.join(this.baseDir, `pipewright-${safe}-`));
    return new LocalEnvironment(os, workspace);
  }
}
