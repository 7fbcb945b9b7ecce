#!/usr/bin/env node
import path from 'node:path';
import dotenv from 'dotenv';
import { eventFromArgs, parseArgs } from './args.js';
import { loadConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { planLevels } from './graph.js';
import { startRun } from './runner.js';
import { createServices } from './services.js';
import { evaluateTrigger } from './trigger.js';
import { JobResult } from './types.js';
import { setLogLevel } from './utils/logger.js';
import { loadWorkflow } from './workflow.js';

dotenv.config();

function printJob(id: string, job: JobResult) {
  const detail = job.status === 'skipped' || job.status === 'cancelled' ? ` (${job.reason})` : '';
  console.log(`job ${id}: ${job.status}${detail}`);
  for (const step of job.steps) console.log(`  - ${step.id}: ${step.conclusion}`);
  if (job.status === 'failed') {
    const step = job.steps.find(s => s.id === job.failedStep);
    console.log(`  error: ${job.error}`);
    for (const line of step?.log.slice(-20) ?? []) console.log(`    | ${line}`);
  }
  if (Object.keys(job.outputs).length) console.log('  outputs:', job.outputs);
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const doc = await loadWorkflow(path.resolve(process.cwd(), args.file));

  if (args.plan) {
    planLevels(doc.jobs).forEach((level, i) => console.log(`level ${i}: ${level.join(', ')}`));
    return 0;
  }

  const event = eventFromArgs(args, config.defaultBranch);
  const decision = evaluateTrigger(event, doc.on);
  if (!decision.accepted) {
    console.log(`not triggered: ${decision.reason}`);
    return 0;
  }

  const services = createServices(config, path.resolve(process.cwd(), args.flags.source ?? '.'));
  const handle = startRun(doc, event, services, { inputs: args.inputs });
  const onSigint = () => handle.cancel('interrupted');
  process.once('SIGINT', onSigint);
  const run = await handle.result;
  process.off('SIGINT', onSigint);

  console.log(`\n=== ${run.workflow} (${run.id}) ===`);
  for (const [id, job] of Object.entries(run.jobs)) printJob(id, job);
  console.log(`run ${run.status}`);
  return run.status === 'success' || run.status === 'skipped' ? 0 : 1;
}

main().then(
  code => { process.exitCode = code; },
  (e: unknown) => {
    console.error(e instanceof ConfigurationError ? `error: ${e.message}` : errorMessage(e));
    process.exitCode = 1;
  }
);
