import { randomUUID } from 'node:crypto';
import { DeployGrant } from './deploy/publisher.js';
import { CancelledError, ConfigurationError, errorMessage, StepFailure, TimeoutError } from './errors.js';
import { ExecutionEnvironment } from './environment.js';
import { cancelJob, failJob, pendingJob, skipJob, startJob, succeedJob, withSteps } from './job-state.js';
import { resolveSecrets } from './secrets.js';
import type { RunServices } from './services.js';
import { runSteps } from './step-runner.js';
import { Action, JobScope } from './steps/action.js';
import { buildActionRegistry, builtinActions } from './steps/index.js';
import { evaluateTrigger } from './trigger.js';
import {
  Job,
  JobResult,
  RepoEvent,
  RunContext,
  RunObserver,
  RunResult,
  RunStatus,
  TriggerDecision,
  WorkflowDefinition
} from './types.js';
import { evalCondition, evaluateValue, renderString } from './utils/expression.js';
import { createLogger, Logger } from './utils/logger.js';
import { Semaphore } from './utils/semaphore.js';
import { validateWorkflow } from './validate.js';

export type RunOptions = {
  /** manual-dispatch inputs */
  inputs?: Record<string, unknown>;
  runId?: string;
  observer?: RunObserver;
  /** replaces the built-in action set */
  actions?: readonly Action[];
};

export type RunHandle = {
  id: string;
  result: Promise<RunResult>;
  cancel: (reason?: string) => void;
};

export type DispatchResult = {
  decision: TriggerDecision;
  run?: RunResult;
};

type RunState = {
  id: string;
  doc: WorkflowDefinition;
  event: RepoEvent;
  inputs: Record<string, unknown>;
  services: RunServices;
  actions: ReadonlyMap<string, Action>;
  order: string[];
  signal: AbortSignal;
  observer?: RunObserver;
  log: Logger;
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

export function resolveWorkflowInputs(doc: WorkflowDefinition, given: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...given };
  for (const [name, spec] of Object.entries(doc.inputs)) {
    if (out[name] !== undefined && out[name] !== '') continue;
    if (spec.default !== undefined) out[name] = spec.default;
    else if (spec.required) throw new ConfigurationError(`missing required workflow input "${name}"`, `inputs.${name}`);
  }
  return out;
}

/**
 * Validates the workflow and starts executing it. Configuration errors
 * (cycles, undefined needs, unknown actions, missing inputs) are thrown
 * here, before any job runs.
 */
export function startRun(
  doc: WorkflowDefinition,
  event: RepoEvent,
  services: RunServices,
  options: RunOptions = {}
): RunHandle {
  const definition = deepFreeze(structuredClone(doc));
  const actions = buildActionRegistry(definition, options.actions ?? builtinActions);
  const order = validateWorkflow(definition, actions);
  const inputs = resolveWorkflowInputs(definition, options.inputs ?? {});
  const id = options.runId ?? randomUUID();
  const controller = new AbortController();

  const state: RunState = {
    id,
    doc: definition,
    event,
    inputs,
    services,
    actions,
    order,
    signal: controller.signal,
    observer: options.observer,
    log: createLogger('runner').child({ runId: id, workflow: definition.name })
  };
  return {
    id,
    result: executeRun(state),
    cancel: (reason = 'run cancelled') => {
      if (!controller.signal.aborted) controller.abort(new CancelledError(reason));
    }
  };
}

export async function runWorkflow(
  doc: WorkflowDefinition,
  event: RepoEvent,
  services: RunServices,
  options: RunOptions = {}
): Promise<RunResult> {
  return startRun(doc, event, services, options).result;
}

/** Evaluates the trigger and, when accepted, runs the workflow. A rejection creates no run. */
export async function dispatch(
  doc: WorkflowDefinition,
  event: RepoEvent,
  services: RunServices,
  options: RunOptions = {}
): Promise<DispatchResult> {
  const decision = evaluateTrigger(event, doc.on);
  if (!decision.accepted) return { decision };
  return { decision, run: await runWorkflow(doc, event, services, options) };
}

export function runStatusOf(jobs: Record<string, JobResult>): RunStatus {
  const all = Object.values(jobs);
  if (all.some(j => j.status === 'failed')) return 'failure';
  if (all.some(j => j.status === 'cancelled')) return 'cancelled';
  if (all.length && all.every(j => j.status === 'skipped')) return 'skipped';
  return 'success';
}

async function executeRun(state: RunState): Promise<RunResult> {
  const { id, doc, services, log } = state;
  const startedAt = Date.now();
  const jobs: Record<string, JobResult> = {};
  for (const jobId of state.order) jobs[jobId] = pendingJob(jobId);
  const set = (next: JobResult) => {
    jobs[next.id] = next;
    state.observer?.({ type: 'job', runId: id, jobId: next.id, status: next.status });
  };

  state.observer?.({ type: 'run', runId: id, status: 'started' });
  log.info('run started', { event: state.event.kind, ref: state.event.ref, jobs: state.order.length });

  try {
    const secrets = await resolveSecrets(services.secrets, doc.secrets, log);
    const semaphore = new Semaphore(services.maxParallelJobs);
    const done = new Map<string, Promise<JobResult>>();

    for (const jobId of state.order) {
      const job = doc.jobs[jobId];
      const deps = job.needs.map(n => done.get(n) ?? Promise.reject(new Error(`job ${n} not scheduled`)));
      done.set(
        jobId,
        Promise.all(deps).then(() => scheduleJob(state, job, jobs, set, secrets, semaphore))
      );
    }
    await Promise.all(done.values());
  } finally {
    await services.artifacts.release(id);
  }

  const status = runStatusOf(jobs);
  state.observer?.({ type: 'run', runId: id, status });
  log.info('run finished', { status });
  return { id, workflow: doc.name, event: state.event, status, jobs, startedAt, finishedAt: Date.now() };
}

function contextFor(state: RunState, job: Job, jobs: Record<string, JobResult>, secrets: Record<string, string>): RunContext {
  const view = (r: JobResult) => ({ status: r.status, outputs: r.outputs });
  const all: RunContext['jobs'] = {};
  for (const [jobId, r] of Object.entries(jobs)) all[jobId] = view(r);
  const needs: RunContext['needs'] = {};
  for (const dep of job.needs) needs[dep] = view(jobs[dep]);
  return {
    env: { ...state.doc.env },
    inputs: state.inputs,
    secrets,
    event: state.event,
    runner: { os: job.runsOn, workspace: '' },
    jobs: all,
    needs,
    steps: {}
  };
}

async function scheduleJob(
  state: RunState,
  job: Job,
  jobs: Record<string, JobResult>,
  set: (next: JobResult) => void,
  secrets: Record<string, string>,
  semaphore: Semaphore
): Promise<JobResult> {
  const current = jobs[job.id];
  if (state.signal.aborted) {
    set(cancelJob(current, errorMessage(state.signal.reason)));
    return jobs[job.id];
  }
  const blocker = job.needs.find(dep => jobs[dep].status !== 'succeeded');
  if (blocker) {
    set(skipJob(current, `needs ${blocker} which ended ${jobs[blocker].status}`));
    return jobs[job.id];
  }

  const ctx = contextFor(state, job, jobs, secrets);
  if (job.if) {
    let run: boolean;
    try {
      run = evalCondition(job.if, ctx);
    } catch (e) {
      set(startJob(current));
      set(failJob(jobs[job.id], errorMessage(e)));
      return jobs[job.id];
    }
    if (!run) {
      set(skipJob(current, `condition "${job.if}" is false`));
      return jobs[job.id];
    }
  }

  return semaphore.use(async () => {
    if (state.signal.aborted) {
      set(cancelJob(jobs[job.id], errorMessage(state.signal.reason)));
      return jobs[job.id];
    }
    set(startJob(jobs[job.id]));
    set(await executeJob(state, job, jobs[job.id], ctx, secrets));
    return jobs[job.id];
  });
}

function grantFor(state: RunState, job: Job): DeployGrant | undefined {
  if (!job.environment) return undefined;
  if (state.doc.permissions.deployments !== 'write') return undefined;
  return { runId: state.id, environment: job.environment };
}

async function executeJob(
  state: RunState,
  job: Job,
  running: JobResult,
  ctx: RunContext,
  secrets: Record<string, string>
): Promise<JobResult> {
  const log = state.log.child({ job: job.id });
  const controller = new AbortController();
  const onRunAbort = () => controller.abort(state.signal.reason);
  state.signal.addEventListener('abort', onRunAbort, { once: true });
  const budgetMs = job.timeoutMinutes ? Math.round(job.timeoutMinutes * 60_000) : undefined;
  const timer = budgetMs ? setTimeout(() => controller.abort(new TimeoutError(budgetMs)), budgetMs) : undefined;

  let environment: ExecutionEnvironment | undefined;
  let current = running;
  try {
    environment = await state.services.provisioner.provision(job.runsOn, `${state.id}-${job.id}`);
    ctx.runner = { os: environment.os, workspace: environment.workspace };

    const vars: Record<string, string> = {
      CI: 'true',
      PIPEWRIGHT_RUN_ID: state.id,
      PIPEWRIGHT_JOB: job.id,
      PIPEWRIGHT_REF: state.event.ref,
      PIPEWRIGHT_WORKSPACE: environment.workspace,
      ...state.doc.env
    };
    for (const [k, v] of Object.entries(job.env ?? {})) vars[k] = renderString(v, ctx);
    ctx.env = vars;

    const scope: JobScope = {
      runId: state.id,
      jobId: job.id,
      environment,
      services: state.services,
      actions: state.actions,
      vars,
      secretValues: Object.values(secrets),
      signal: controller.signal,
      grant: grantFor(state, job),
      logger: log,
      observer: state.observer,
      postHooks: [],
      artifacts: [],
      cacheEntries: []
    };

    const { results, failed } = await runSteps(job.steps, ctx, scope, `jobs.${job.id}`);
    const collect = () => withSteps(current, results, scope.artifacts, scope.cacheEntries);
    current = collect();

    if (controller.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      const last = results.at(-1);
      if (reason instanceof TimeoutError) return failJob(current, reason.message, last?.id);
      return cancelJob(current, errorMessage(reason));
    }
    if (failed) {
      return failJob(current, new StepFailure(failed.name, failed.error ?? 'non-zero outcome').message, failed.id);
    }

    for (const hook of scope.postHooks) await hook();
    current = collect();

    const outputs: Record<string, unknown> = {};
    for (const [name, expr] of Object.entries(job.outputs ?? {})) outputs[name] = evaluateValue(expr, ctx);
    log.info('job succeeded', { steps: results.length });
    return succeedJob(current, outputs);
  } catch (e) {
    log.error('job failed', { error: errorMessage(e) });
    return failJob(current, errorMessage(e));
  } finally {
    if (timer) clearTimeout(timer);
    state.signal.removeEventListener('abort', onRunAbort);
    if (environment) {
      await environment.dispose().catch((e: unknown) => {
        log.warn('could not dispose environment', { error: errorMessage(e) });
      });
    }
  }
}
