import { AuthorizationError, ConfigurationError, errorMessage, PipelineError } from './errors.js';
import { maskSecrets } from './secrets.js';
import { JobScope, resolveInputs } from './steps/action.js';
import { RunContext, Step, StepRuntimeResult, StepStatus } from './types.js';
import { evalCondition, renderString, renderTemplate } from './utils/expression.js';

export type StepsOutcome = {
  results: StepRuntimeResult[];
  /** first step whose conclusion is failure; later steps did not run */
  failed?: StepRuntimeResult;
  /** error that fails the job even under continue-on-error */
  fatal?: PipelineError;
};

export type RunStepsOptions = {
  /** variables the steps start from; defaults to the job's */
  vars?: Record<string, string>;
  /** receives every log line, e.g. the log of an enclosing composite step */
  forward?: (line: string) => void;
};

/** Broken declarations and denied permissions are never best-effort. */
function isFatal(e: unknown): e is PipelineError {
  return e instanceof ConfigurationError || e instanceof AuthorizationError;
}

export function stepKey(step: Step, index: number): string {
  return step.id ?? (step.name || `step-${index + 1}`);
}

function renderRecord(input: Record<string, unknown>, ctx: RunContext): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(input)) out[k] = renderTemplate(v, ctx);
  return out;
}

function renderVars(input: Record<string, string> | undefined, ctx: RunContext): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(input ?? {})) out[k] = renderString(String(v), ctx);
  return out;
}

/**
 * Runs steps in order in the job's environment. `ctx.steps` is filled as
 * steps finish so later conditions and templates can see earlier results.
 * The first failing step (after continue-on-error) stops the sequence.
 * Configuration and authorization errors fail the step whatever its
 * continue-on-error says.
 */
export async function runSteps(
  steps: Step[],
  ctx: RunContext,
  job: JobScope,
  pointer: string,
  options: RunStepsOptions = {}
): Promise<StepsOutcome> {
  const results: StepRuntimeResult[] = [];
  const baseVars = options.vars ?? job.vars;

  for (const [index, step] of steps.entries()) {
    if (job.signal.aborted) break;
    const stepId = stepKey(step, index);
    const stepPointer = `${pointer}.steps[${index}]`;
    const log: string[] = [];
    const logger = job.logger.child({ step: stepId });
    const appendLine = (line: string) => {
      const masked = maskSecrets(line, job.secretValues);
      log.push(masked);
      options.forward?.(`[${stepId}] ${masked}`);
    };
    const started = Date.now();

    let outcome: StepStatus = 'success';
    let outputs: Record<string, unknown> = {};
    let error: string | undefined;
    let ran = false;
    let fatal: PipelineError | undefined;

    try {
      if (step.if && !evalCondition(step.if, ctx)) {
        outcome = 'skipped';
      } else {
        ran = true;
        job.observer?.({ type: 'step', runId: job.runId, jobId: job.jobId, stepId, status: 'started' });
        logger.info('step started', { uses: step.uses });
        const action = job.actions.get(step.uses);
        if (!action) throw new ConfigurationError(`unknown action "${step.uses}"`, stepPointer);
        const inputs = resolveInputs(action, renderRecord(step.with ?? {}, ctx), stepPointer);
        const vars = { ...baseVars, ...renderVars(step.env, ctx) };
        const res = await action.execute(inputs, { job, ctx, stepId, vars, log: appendLine });
        outcome = res.success ? 'success' : 'failure';
        outputs = res.outputs ?? {};
        error = res.error;
      }
    } catch (e) {
      outcome = 'failure';
      error = errorMessage(e);
      if (isFatal(e)) fatal = e;
    }
    if (outcome === 'failure') {
      error = maskSecrets(error ?? 'step reported failure', job.secretValues);
      appendLine(`error: ${error}`);
    }

    const conclusion: StepStatus = outcome === 'failure' && step.continueOnError && !fatal ? 'success' : outcome;
    const result: StepRuntimeResult = {
      id: stepId,
      name: step.name,
      outcome,
      conclusion,
      outputs,
      log,
      error,
      durationMs: Date.now() - started
    };
    ctx.steps[stepId] = result;
    results.push(result);
    job.observer?.({ type: 'step', runId: job.runId, jobId: job.jobId, stepId, status: conclusion });
    if (ran) {
      logger.info('step finished', { outcome, conclusion, durationMs: result.durationMs });
    }
    if (conclusion === 'failure') return { results, failed: result, fatal };
  }
  return { results };
}
