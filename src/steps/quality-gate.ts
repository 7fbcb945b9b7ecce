import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { resolveProject } from '../quality/properties.js';
import { Finding } from '../quality/types.js';
import { captureSnapshot } from '../utils/snapshot.js';
import { Action, inputBoolean, inputString } from './action.js';

const BaselineSchema = z.array(
  z.object({
    rule: z.string(),
    severity: z.enum(['info', 'warning', 'error']),
    file: z.string(),
    line: z.number().int(),
    message: z.string()
  })
);

async function loadBaseline(file: string): Promise<Finding[]> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      throw new ConfigurationError(`baseline file not found: ${file}`);
    }
    throw e;
  }
  return BaselineSchema.parse(JSON.parse(raw));
}

/**
 * Static analysis of the workspace, reported to the triggering pull request.
 * A failed verdict fails the step only with `fail-on-error: true`.
 */
export const qualityGateAction: Action = {
  name: 'quality-gate',
  description: 'Analyze the code tree and report the verdict to the change request',
  inputs: {
    path: { default: '.' },
    'project-key': {},
    organization: {},
    baseline: { description: 'JSON file of known findings, relative to the workspace' },
    'fail-on-error': { default: false }
  },
  async execute(inputs, step) {
    const { services, environment } = step.job;
    const root = path.join(environment.workspace, inputString(inputs, 'path'));
    const tree = await captureSnapshot(root, ['.'], { exclude: ['.git', 'node_modules', 'dist', 'build', 'coverage'] });
    const project = resolveProject(
      { projectKey: inputString(inputs, 'project-key'), organization: inputString(inputs, 'organization') },
      tree
    );
    const baselineFile = inputString(inputs, 'baseline');
    const baseline = baselineFile ? await loadBaseline(path.join(environment.workspace, baselineFile)) : [];

    const report = await services.qualityGate.run(tree, baseline, project, step.ctx.event);
    step.log(`quality gate ${report.verdict}: ${report.summary}`);
    for (const f of report.newFindings) step.log(`${f.severity} ${f.file}:${f.line} ${f.rule} ${f.message}`);

    const blocking = report.verdict === 'failed' && inputBoolean(inputs, 'fail-on-error');
    return {
      success: !blocking,
      outputs: { verdict: report.verdict, passed: report.passed, findings: report.findings.length, 'new-findings': report.newFindings.length },
      error: blocking ? `quality gate failed: ${report.summary}` : undefined
    };
  }
};
