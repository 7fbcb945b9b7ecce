import { readFile } from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { Job, Step, WorkflowDefinition } from './types.js';

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);
const envRecord = z.record(scalar);

const InputSpecSchema = z
  .object({
    description: z.string().optional(),
    required: z.boolean().optional(),
    default: z.unknown().optional()
  })
  .strict();

const StepSchema = z
  .object({
    id: z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, 'step ids are letters, digits, _ and -').optional(),
    name: z.string().optional(),
    uses: z.string().optional(),
    run: z.string().optional(),
    with: z.record(z.unknown()).optional(),
    if: z.union([z.string(), z.boolean()]).transform(String).optional(),
    env: envRecord.optional(),
    'continue-on-error': z.boolean().optional()
  })
  .strict()
  .refine(s => (s.uses === undefined) !== (s.run === undefined), 'a step needs exactly one of "uses" or "run"')
  .transform((s): Step => {
    const uses = s.run !== undefined ? 'shell' : s.uses ?? '';
    const withArgs = s.run !== undefined ? { ...s.with, cmd: s.run } : s.with;
    const name = s.name ?? s.id ?? (s.run !== undefined ? s.run.split('\n')[0].trim() : uses);
    return {
      id: s.id,
      name,
      uses,
      if: s.if,
      with: withArgs,
      env: s.env,
      continueOnError: s['continue-on-error'] ?? false
    };
  });

const needsSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(v => (v === undefined ? [] : Array.isArray(v) ? v : [v]));

const JobSchema = z
  .object({
    name: z.string().optional(),
    needs: needsSchema,
    'runs-on': z.string().default('ubuntu-latest'),
    if: z.union([z.string(), z.boolean()]).transform(String).optional(),
    env: envRecord.optional(),
    environment: z.string().optional(),
    'timeout-minutes': z.number().positive().optional(),
    outputs: z.record(z.string()).optional(),
    steps: z.array(StepSchema).min(1, 'a job needs at least one step')
  })
  .strict();

const CompositeSchema = z
  .object({
    description: z.string().optional(),
    inputs: z.record(InputSpecSchema).default({}),
    outputs: z.record(z.string()).optional(),
    steps: z.array(StepSchema).min(1)
  })
  .strict();

const EventKindSchema = z.enum(['push', 'pull_request.opened', 'pull_request.synchronize', 'workflow_dispatch']);

const TriggerSchema = z
  .object({
    events: z.array(EventKindSchema).optional(),
    branches: z.array(z.string()).optional(),
    'paths-ignore': z.array(z.string()).optional(),
    'manual-dispatch': z.enum(['enabled', 'disabled']).default('enabled'),
    'skip-marker': z.string().default('[skip ci]')
  })
  .strict();

const WorkflowSchema = z
  .object({
    name: z.string().optional(),
    on: TriggerSchema.default({}),
    env: envRecord.default({}),
    permissions: z.record(z.enum(['read', 'write', 'none'])).default({}),
    secrets: z.array(z.string()).default([]),
    inputs: z.record(InputSpecSchema).default({}),
    actions: z.record(CompositeSchema).default({}),
    jobs: z.record(JobSchema).refine(j => Object.keys(j).length > 0, 'a workflow needs at least one job')
  })
  .strict();

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const issue = error.issues[0];
  const pointer = issue.path.length ? issue.path.join('.') : 'workflow';
  return new ConfigurationError(issue.message, pointer);
}

/** Validates a parsed workflow document and converts it to a WorkflowDefinition. */
export function toWorkflowDefinition(doc: unknown, fallbackName = 'workflow'): WorkflowDefinition {
  const parsed = WorkflowSchema.safeParse(doc);
  if (!parsed.success) throw toConfigurationError(parsed.error);
  const w = parsed.data;

  const jobs: Record<string, Job> = {};
  for (const [id, j] of Object.entries(w.jobs)) {
    jobs[id] = {
      id,
      name: j.name,
      needs: j.needs,
      runsOn: j['runs-on'],
      if: j.if,
      env: j.env,
      environment: j.environment,
      timeoutMinutes: j['timeout-minutes'],
      outputs: j.outputs,
      steps: j.steps
    };
  }

  const actions: WorkflowDefinition['actions'] = {};
  for (const [name, a] of Object.entries(w.actions)) {
    actions[name] = { name, description: a.description, inputs: a.inputs, outputs: a.outputs, steps: a.steps };
  }

  return {
    name: w.name ?? fallbackName,
    on: {
      events: w.on.events,
      branches: w.on.branches,
      pathsIgnore: w.on['paths-ignore'],
      manualDispatch: w.on['manual-dispatch'],
      skipMarker: w.on['skip-marker']
    },
    env: w.env,
    permissions: w.permissions,
    secrets: w.secrets,
    inputs: w.inputs,
    actions,
    jobs
  };
}

export function parseWorkflow(text: string, fallbackName?: string): WorkflowDefinition {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (e) {
    throw new ConfigurationError(`invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }
  return toWorkflowDefinition(doc, fallbackName);
}

export async function loadWorkflow(file: string): Promise<WorkflowDefinition> {
  const raw = await readFile(file, 'utf8');
  return parseWorkflow(raw, path.basename(file).replace(/\.ya?ml$/, ''));
}
