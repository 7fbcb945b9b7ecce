export type EventKind =
  | 'push'
  | 'pull_request.opened'
  | 'pull_request.synchronize'
  | 'workflow_dispatch';

export type RepoEvent = {
  kind: EventKind;
  /** branch name or full ref (`refs/heads/main`) */
  ref: string;
  changedPaths: string[];
  commitMessage: string;
  repository: string;
  sha?: string;
  pullRequest?: number;
};

export type TriggerSpec = {
  events?: EventKind[];
  branches?: string[];
  pathsIgnore?: string[];
  manualDispatch?: 'enabled' | 'disabled';
  skipMarker?: string;
};

export type TriggerDecision = { accepted: true } | { accepted: false; reason: string };

export type Permission = 'read' | 'write' | 'none';

export type InputSpec = {
  description?: string;
  required?: boolean;
  default?: unknown;
};

export type Step = {
  id?: string;
  name: string;
  if?: string; // expression
  uses: string;
  with?: Record<string, unknown>;
  env?: Record<string, string>;
  continueOnError?: boolean;
};

export type CompositeActionDefinition = {
  name: string;
  description?: string;
  inputs: Record<string, InputSpec>;
  outputs?: Record<string, string>;
  steps: Step[];
};

export type Job = {
  id: string;
  name?: string;
  needs: string[];
  runsOn: string;
  if?: string;
  env?: Record<string, string>;
  environment?: string;
  timeoutMinutes?: number;
  outputs?: Record<string, string>;
  steps: Step[];
};

export type WorkflowDefinition = {
  name: string;
  on: TriggerSpec;
  env: Record<string, string>;
  permissions: Record<string, Permission>;
  secrets: string[];
  inputs: Record<string, InputSpec>;
  actions: Record<string, CompositeActionDefinition>;
  jobs: Record<string, Job>;
};

export type StepStatus = 'success' | 'failure' | 'skipped';

export type StepRuntimeResult = {
  id: string;
  name: string;
  /** result before continue-on-error is applied */
  outcome: StepStatus;
  conclusion: StepStatus;
  outputs: Record<string, unknown>;
  log: string[];
  error?: string;
  durationMs: number;
};

type JobBase = {
  id: string;
  steps: StepRuntimeResult[];
  outputs: Record<string, unknown>;
  artifacts: string[];
  cacheEntries: string[];
};

export type JobResult =
  | (JobBase & { status: 'pending' })
  | (JobBase & { status: 'running'; startedAt: number })
  | (JobBase & { status: 'succeeded'; startedAt: number; finishedAt: number })
  | (JobBase & { status: 'failed'; startedAt: number; finishedAt: number; error: string; failedStep?: string })
  | (JobBase & { status: 'skipped'; reason: string })
  | (JobBase & { status: 'cancelled'; reason: string; startedAt?: number; finishedAt: number });

export type JobStatus = JobResult['status'];

export type RunStatus = 'success' | 'failure' | 'cancelled' | 'skipped';

export type RunResult = {
  id: string;
  workflow: string;
  event: RepoEvent;
  status: RunStatus;
  jobs: Record<string, JobResult>;
  startedAt: number;
  finishedAt: number;
};

/** Context that `${{ }}` expressions and `if:` conditions are evaluated against. */
export type RunContext = {
  env: Record<string, string>;
  inputs: Record<string, unknown>;
  secrets: Record<string, string>;
  event: RepoEvent;
  runner: { os: string; workspace: string };
  jobs: Record<string, { status: JobStatus; outputs: Record<string, unknown> }>;
  needs: Record<string, { status: JobStatus; outputs: Record<string, unknown> }>;
  steps: Record<string, StepRuntimeResult>;
};

export type RunObserverEvent =
  | { type: 'run'; runId: string; status: 'started' | RunStatus }
  | { type: 'job'; runId: string; jobId: string; status: JobStatus }
  | { type: 'step'; runId: string; jobId: string; stepId: string; status: 'started' | StepStatus };

export type RunObserver = (event: RunObserverEvent) => void;
