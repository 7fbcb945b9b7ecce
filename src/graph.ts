import { ConfigurationError } from './errors.js';
import { Job } from './types.js';

type Graph = Record<string, Pick<Job, 'needs'>>;

export function validateNeeds(jobs: Graph): void {
  for (const [id, job] of Object.entries(jobs)) {
    for (const dep of job.needs) {
      if (!Object.hasOwn(jobs, dep)) throw new ConfigurationError(`needs undefined job "${dep}"`, `jobs.${id}.needs`);
      if (dep === id) throw new ConfigurationError('job needs itself', `jobs.${id}.needs`);
    }
  }
}

/** Dependencies first. Throws on undefined references and on cycles, naming the cycle. */
export function topoSortJobs(jobs: Graph): string[] {
  validateNeeds(jobs);
  const result: string[] = [];
  const temporary = new Set<string>();
  const permanent = new Set<string>();
  const stack: string[] = [];

  function visit(id: string) {
    if (permanent.has(id)) return;
    if (temporary.has(id)) {
      const cycle = [...stack.slice(stack.indexOf(id)), id];
      throw new ConfigurationError(`cyclic job dependency: ${cycle.join(' -> ')}`, `jobs.${id}.needs`);
    }
    temporary.add(id);
    stack.push(id);
    for (const n of jobs[id].needs) visit(n);
    stack.pop();
    permanent.add(id);
    temporary.delete(id);
    result.push(id);
  }

  for (const id of Object.keys(jobs)) visit(id);
  return result;
}

/**
 * Partitions jobs into levels: level 0 has no needs, level n needs only
 * jobs of lower levels. Order inside a level follows declaration order.
 */
export function planLevels(jobs: Graph): string[][] {
  const order = topoSortJobs(jobs);
  const depth = new Map<string, number>();
  for (const id of order) {
    const d = jobs[id].needs.reduce((max, dep) => Math.max(max, (depth.get(dep) ?? 0) + 1), 0);
    depth.set(id, d);
  }
  const levels: string[][] = [];
  for (const id of Object.keys(jobs)) {
    const d = depth.get(id) ?? 0;
    (levels[d] ??= []).push(id);
  }
  return levels;
}

export function ancestorsOf(jobs: Graph, id: string): Set<string> {
  const seen = new Set<string>();
  const queue = [...jobs[id].needs];
  while (queue.length) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    queue.push(...(jobs[next]?.needs ?? []));
  }
  return seen;
}
