import path from 'node:path';
import { ConfigurationError } from './errors.js';
import { EventKind, RepoEvent } from './types.js';

const EVENT_KINDS: readonly EventKind[] = ['push', 'pull_request.opened', 'pull_request.synchronize', 'workflow_dispatch'];
const VALUE_FLAGS = new Set(['event', 'ref', 'paths', 'message', 'pr', 'repo', 'source']);
const USAGE = 'Usage: pipewright <workflow.yml> [--event kind] [--ref branch] [--paths a,b] [--message text] [--pr n] [--repo name] [--source dir] [--plan] [key=value ...]';

export type CliArgs = {
  file: string;
  flags: Record<string, string>;
  plan: boolean;
  inputs: Record<string, string>;
};

export function parseArgs(argv: string[]): CliArgs {
  const flags: Record<string, string> = {};
  const inputs: Record<string, string> = {};
  const positional: string[] = [];
  let plan = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--plan') {
      plan = true;
    } else if (arg.startsWith('--')) {
      const [name, inline] = arg.slice(2).split(/=(.*)/s, 2);
      if (!VALUE_FLAGS.has(name)) throw new ConfigurationError(`unknown option --${name}`);
      const value = inline ?? argv[++i];
      if (value === undefined) throw new ConfigurationError(`option --${name} needs a value`);
      flags[name] = value;
    } else if (arg.includes('=')) {
      const [k, ...v] = arg.split('=');
      inputs[k] = v.join('=');
    } else {
      positional.push(arg);
    }
  }
  if (positional.length !== 1) throw new ConfigurationError(USAGE);
  return { file: positional[0], flags, plan, inputs };
}

function isEventKind(value: string): value is EventKind {
  return EVENT_KINDS.some(k => k === value);
}

export function eventFromArgs(args: CliArgs, defaultBranch: string): RepoEvent {
  const kind = args.flags.event ?? 'push';
  if (!isEventKind(kind)) throw new ConfigurationError(`unknown event "${kind}", expected one of ${EVENT_KINDS.join(', ')}`);
  const pr = args.flags.pr === undefined ? undefined : Number(args.flags.pr);
  if (pr !== undefined && !Number.isInteger(pr)) throw new ConfigurationError(`--pr must be a number, got "${args.flags.pr}"`);
  return {
    kind,
    ref: args.flags.ref ?? defaultBranch,
    changedPaths: (args.flags.paths ?? '').split(',').map(s => s.trim()).filter(Boolean),
    commitMessage: args.flags.message ?? '',
    repository: args.flags.repo ?? path.basename(process.cwd()),
    pullRequest: pr
  };
}
