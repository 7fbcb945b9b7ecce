import { DeployGrant } from '../deploy/publisher.js';
import { ConfigurationError } from '../errors.js';
import { ExecutionEnvironment } from '../environment.js';
import type { RunServices } from '../services.js';
import { InputSpec, RunContext, RunObserver } from '../types.js';
import { Logger } from '../utils/logger.js';

export type ActionOutcome = {
  success: boolean;
  outputs?: Record<string, unknown>;
  error?: string;
};

/** State shared by every step of one job. */
export type JobScope = {
  runId: string;
  jobId: string;
  environment: ExecutionEnvironment;
  services: RunServices;
  actions: ReadonlyMap<string, Action>;
  /** environment variables of the job (workflow env + job env) */
  vars: Record<string, string>;
  secretValues: string[];
  signal: AbortSignal;
  grant?: DeployGrant;
  logger: Logger;
  observer?: RunObserver;
  postHooks: Array<() => Promise<void>>;
  artifacts: string[];
  cacheEntries: string[];
};

export type StepContext = {
  job: JobScope;
  ctx: RunContext;
  stepId: string;
  /** job vars plus the step's own env */
  vars: Record<string, string>;
  /** appends a line to the step log */
  log: (line: string) => void;
};

/**
 * One capability every step runs through: built-in actions, shell commands
 * and composite actions alike.
 */
export interface Action {
  readonly name: string;
  readonly description?: string;
  readonly inputs: Record<string, InputSpec>;
  execute(inputs: Record<string, unknown>, step: StepContext): Promise<ActionOutcome>;
}

/** Applies defaults, checks required inputs and rejects undeclared ones. */
export function resolveInputs(action: Action, given: Record<string, unknown>, pointer: string): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, spec] of Object.entries(action.inputs)) {
    const value = given[name];
    if (value !== undefined && value !== null && value !== '') {
      out[name] = value;
    } else if (spec.default !== undefined) {
      out[name] = spec.default;
    } else if (spec.required) {
      throw new ConfigurationError(`missing required input "${name}" of action "${action.name}"`, pointer);
    }
  }
  for (const name of Object.keys(given)) {
    if (!Object.hasOwn(action.inputs, name)) {
      throw new ConfigurationError(`unknown input "${name}" for action "${action.name}"`, pointer);
    }
  }
  return out;
}

export function inputString(inputs: Record<string, unknown>, name: string): string {
  const v = inputs[name];
  return v == null ? '' : String(v);
}

export function inputBoolean(inputs: Record<string, unknown>, name: string): boolean {
  const v = inputs[name];
  if (typeof v === 'boolean') return v;
  return ['true', '1', 'yes', 'on'].includes(inputString(inputs, name).trim().toLowerCase());
}

/** Splits a newline or comma separated input into trimmed, non-empty items. */
export function inputList(inputs: Record<string, unknown>, name: string): string[] {
  const v = inputs[name];
  const items = Array.isArray(v) ? v.map(String) : inputString(inputs, name).split(/[\n,]/);
  return items.map(s => s.trim()).filter(Boolean);
}
