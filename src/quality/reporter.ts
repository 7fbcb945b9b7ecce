import { AnalysisServiceUnavailable } from '../errors.js';
import { RepoEvent } from '../types.js';
import { createLogger, Logger } from '../utils/logger.js';
import { Snapshot } from '../utils/snapshot.js';
import {
  AnalysisService,
  ChangeRequestClient,
  ChangeRequestRef,
  Finding,
  ProjectRef,
  Report
} from './types.js';

function fingerprint(f: Finding): string {
  // line numbers drift between revisions
  return `${f.rule}|${f.file}|${f.message}`;
}

export function compareWithBaseline(findings: Finding[], baseline: Finding[]): Finding[] {
  const known = new Map<string, number>();
  for (const f of baseline) known.set(fingerprint(f), (known.get(fingerprint(f)) ?? 0) + 1);
  const fresh: Finding[] = [];
  for (const f of findings) {
    const left = known.get(fingerprint(f)) ?? 0;
    if (left > 0) known.set(fingerprint(f), left - 1);
    else fresh.push(f);
  }
  return fresh;
}

function summarize(findings: Finding[], fresh: Finding[]): string {
  const errors = fresh.filter(f => f.severity === 'error').length;
  return `${findings.length} finding(s), ${fresh.length} new, ${errors} new error(s)`;
}

export function changeRequestOf(event: RepoEvent): ChangeRequestRef | undefined {
  if (event.kind !== 'pull_request.opened' && event.kind !== 'pull_request.synchronize') return undefined;
  if (event.pullRequest === undefined) return undefined;
  return { repository: event.repository, number: event.pullRequest, sha: event.sha };
}

/** Posts gate results to the log; used when no code host client is configured. */
export class LogChangeRequestClient implements ChangeRequestClient {
  private readonly log = createLogger('change-request');

  async postStatus(target: ChangeRequestRef, report: Report): Promise<void> {
    this.log.info('quality gate status', { ...target, verdict: report.verdict, summary: report.summary });
  }

  async annotate(target: ChangeRequestRef, findings: Finding[]): Promise<void> {
    for (const f of findings) {
      this.log.info(`${f.file}:${f.line} ${f.rule} ${f.message}`, { ...target, severity: f.severity });
    }
  }
}

/**
 * Runs the analysis and reports it back to the pull request that triggered
 * the run. A failed report is only a verdict; merge policy lives elsewhere.
 */
export class QualityGateReporter {
  private readonly log: Logger;

  constructor(private readonly service: AnalysisService, private readonly client: ChangeRequestClient) {
    this.log = createLogger('quality-gate');
  }

  async analyze(tree: Snapshot, baseline: Finding[], project: ProjectRef): Promise<Report> {
    let findings: Finding[];
    try {
      findings = await this.service.analyze(tree, project);
    } catch (e) {
      if (!(e instanceof AnalysisServiceUnavailable)) throw e;
      this.log.warn('analysis service unavailable', { project: project.key, error: e.message });
      return { verdict: 'indeterminate', passed: false, findings: [], newFindings: [], summary: e.message };
    }
    const fresh = compareWithBaseline(findings, baseline);
    const passed = !fresh.some(f => f.severity === 'error');
    return {
      verdict: passed ? 'passed' : 'failed',
      passed,
      findings,
      newFindings: fresh,
      summary: summarize(findings, fresh)
    };
  }

  /** Analyzes and, for pull-request events, posts status and annotations. */
  async run(tree: Snapshot, baseline: Finding[], project: ProjectRef, event: RepoEvent): Promise<Report> {
    const report = await this.analyze(tree, baseline, project);
    const target = changeRequestOf(event);
    if (target) {
      await this.client.postStatus(target, report);
      if (report.newFindings.length) await this.client.annotate(target, report.newFindings);
    }
    this.log.info('quality gate evaluated', { project: project.key, verdict: report.verdict });
    return report;
  }
}
