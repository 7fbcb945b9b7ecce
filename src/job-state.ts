import { JobResult, JobStatus, StepRuntimeResult } from './types.js';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'skipped', 'cancelled'],
  running: ['succeeded', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  skipped: [],
  cancelled: []
};

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

function assertTransition(from: JobResult, to: JobStatus) {
  if (!TRANSITIONS[from.status].includes(to)) {
    throw new Error(`job ${from.id}: illegal transition ${from.status} -> ${to}`);
  }
}

function base(job: JobResult) {
  const { id, steps, outputs, artifacts, cacheEntries } = job;
  return { id, steps, outputs, artifacts, cacheEntries };
}

export function pendingJob(id: string): JobResult {
  return { id, status: 'pending', steps: [], outputs: {}, artifacts: [], cacheEntries: [] };
}

export function startJob(job: JobResult, now = Date.now()): JobResult {
  assertTransition(job, 'running');
  return { ...base(job), status: 'running', startedAt: now };
}

export function succeedJob(job: JobResult, outputs: Record<string, unknown>, now = Date.now()): JobResult {
  assertTransition(job, 'succeeded');
  const startedAt = job.status === 'running' ? job.startedAt : now;
  return { ...base(job), outputs, status: 'succeeded', startedAt, finishedAt: now };
}

export function failJob(job: JobResult, error: string, failedStep?: string, now = Date.now()): JobResult {
  assertTransition(job, 'failed');
  const startedAt = job.status === 'running' ? job.startedAt : now;
  return { ...base(job), status: 'failed', startedAt, finishedAt: now, error, failedStep };
}

export function skipJob(job: JobResult, reason: string): JobResult {
  assertTransition(job, 'skipped');
  return { ...base(job), status: 'skipped', reason };
}

export function cancelJob(job: JobResult, reason: string, now = Date.now()): JobResult {
  assertTransition(job, 'cancelled');
  const startedAt = job.status === 'running' ? job.startedAt : undefined;
  return { ...base(job), status: 'cancelled', reason, startedAt, finishedAt: now };
}

export function withSteps(
  job: JobResult,
  steps: StepRuntimeResult[],
  artifacts: string[],
  cacheEntries: string[]
): JobResult {
  return { ...job, steps, artifacts, cacheEntries };
}
