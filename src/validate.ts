import { ConfigurationError } from './errors.js';
import { ancestorsOf, topoSortJobs } from './graph.js';
import { Action } from './steps/action.js';
import { Step, WorkflowDefinition } from './types.js';
import { evalCondition } from './utils/expression.js';

const ARTIFACT_PRODUCERS: Record<string, string> = { 'upload-artifact': 'name' };
const ARTIFACT_CONSUMERS: Record<string, string> = { 'download-artifact': 'name', deploy: 'artifact' };

function staticString(value: unknown): string | undefined {
  return typeof value === 'string' && !value.includes('${{') ? value : undefined;
}

function checkExpression(expr: string, pointer: string) {
  try {
    // an empty scope only resolves paths to undefined; this is a syntax check
    evalCondition(expr, {});
  } catch (e) {
    if (e instanceof ConfigurationError) throw new ConfigurationError(e.message, pointer);
    throw e;
  }
}

function checkStep(step: Step, pointer: string, actions: ReadonlyMap<string, Action>) {
  const action = actions.get(step.uses);
  if (!action) throw new ConfigurationError(`unknown action "${step.uses}"`, `${pointer}.uses`);
  if (step.if) checkExpression(step.if, `${pointer}.if`);
  const given = step.with ?? {};
  for (const [name, spec] of Object.entries(action.inputs)) {
    if (spec.required && spec.default === undefined && given[name] === undefined) {
      throw new ConfigurationError(`missing required input "${name}" of action "${action.name}"`, `${pointer}.with`);
    }
  }
  for (const name of Object.keys(given)) {
    if (!Object.hasOwn(action.inputs, name)) {
      throw new ConfigurationError(`unknown input "${name}" for action "${action.name}"`, `${pointer}.with.${name}`);
    }
  }
}

function checkCompositeCycles(doc: WorkflowDefinition) {
  const state = new Map<string, 'visiting' | 'done'>();
  const visit = (name: string, trail: string[]) => {
    if (state.get(name) === 'done') return;
    if (state.get(name) === 'visiting') {
      throw new ConfigurationError(`composite actions use each other: ${[...trail, name].join(' -> ')}`, `actions.${name}`);
    }
    state.set(name, 'visiting');
    for (const step of doc.actions[name].steps) {
      if (Object.hasOwn(doc.actions, step.uses)) visit(step.uses, [...trail, name]);
    }
    state.set(name, 'done');
  };
  for (const name of Object.keys(doc.actions)) visit(name, []);
}

/** Steps of a job with composite actions expanded, for static artifact tracking. */
function expandedSteps(steps: Step[], doc: WorkflowDefinition): Step[] {
  return steps.flatMap(s => (Object.hasOwn(doc.actions, s.uses) ? expandedSteps(doc.actions[s.uses].steps, doc) : [s]));
}

function artifactNames(steps: Step[], table: Record<string, string>): string[] {
  const names: string[] = [];
  for (const step of steps) {
    const input = table[step.uses];
    const name = input ? staticString(step.with?.[input]) : undefined;
    if (name) names.push(name);
  }
  return names;
}

/**
 * Static checks run before any job starts: the needs graph, action
 * references and inputs, expression syntax, composite recursion, and
 * artifacts consumed before an earlier step of the job, or a job it
 * (transitively) needs, uploads them.
 */
export function validateWorkflow(doc: WorkflowDefinition, actions: ReadonlyMap<string, Action>): string[] {
  const order = topoSortJobs(doc.jobs);
  checkCompositeCycles(doc);

  for (const [name, def] of Object.entries(doc.actions)) {
    def.steps.forEach((step, i) => checkStep(step, `actions.${name}.steps[${i}]`, actions));
  }

  const produced = new Map<string, string[]>();
  for (const [id, job] of Object.entries(doc.jobs)) {
    if (job.if) checkExpression(job.if, `jobs.${id}.if`);
    job.steps.forEach((step, i) => checkStep(step, `jobs.${id}.steps[${i}]`, actions));
    produced.set(id, artifactNames(expandedSteps(job.steps, doc), ARTIFACT_PRODUCERS));
  }

  for (const [id, job] of Object.entries(doc.jobs)) {
    const visible = new Set<string>();
    for (const dep of ancestorsOf(doc.jobs, id)) {
      for (const name of produced.get(dep) ?? []) visible.add(name);
    }
    // within the job, only uploads of earlier steps count
    for (const step of expandedSteps(job.steps, doc)) {
      for (const name of artifactNames([step], ARTIFACT_CONSUMERS)) {
        if (!visible.has(name)) {
          throw new ConfigurationError(
            `artifact "${name}" is consumed before it is produced: no earlier step or job in the needs chain uploads it`,
            `jobs.${id}`
          );
        }
      }
      for (const name of artifactNames([step], ARTIFACT_PRODUCERS)) visible.add(name);
    }
  }
  return order;
}
