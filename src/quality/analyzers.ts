import { z } from 'zod';
import { AnalysisServiceUnavailable, errorMessage } from '../errors.js';
import { Snapshot } from '../utils/snapshot.js';
import { AnalysisService, Finding, ProjectRef, Severity } from './types.js';

const SOURCE_RE = /\.(?:[cm]?js|jsx|tsx?)$/;

type LineRule = {
  rule: string;
  severity: Severity;
  test: (line: string) => boolean;
  message: string;
};

const MAX_LINE_LENGTH = 200;

const LINE_RULES: LineRule[] = [
  {
    rule: 'no-debugger',
    severity: 'error',
    test: line => /^\s*debugger\s*;?\s*$/.test(line),
    message: 'debugger statement left in source'
  },
  {
    rule: 'no-console-log',
    severity: 'warning',
    test: line => /\bconsole\.log\(/.test(line),
    message: 'console.log call'
  },
  {
    rule: 'todo-marker',
    severity: 'info',
    test: line => /\b(?:TODO|FIXME)\b/.test(line),
    message: 'unresolved TODO/FIXME marker'
  },
  {
    rule: 'max-line-length',
    severity: 'warning',
    test: line => line.length > MAX_LINE_LENGTH,
    message: `line longer than ${MAX_LINE_LENGTH} characters`
  }
];

/** Line-based rules over the JavaScript/TypeScript sources of the tree. */
export class LocalRuleAnalyzer implements AnalysisService {
  async analyze(tree: Snapshot): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const [file, content] of tree) {
      if (!SOURCE_RE.test(file)) continue;
      const lines = content.toString('utf8').split(/\r?\n/);
      lines.forEach((text, i) => {
        for (const r of LINE_RULES) {
          if (r.test(text)) findings.push({ rule: r.rule, severity: r.severity, file, line: i + 1, message: r.message });
        }
      });
    }
    return findings;
  }
}

const FindingSchema = z.object({
  rule: z.string(),
  severity: z.enum(['info', 'warning', 'error']),
  file: z.string(),
  line: z.number().int(),
  message: z.string()
});

const ResponseSchema = z.object({ findings: z.array(FindingSchema) });

/**
 * Sends the tree to a remote analysis endpoint as JSON. Unreachable hosts
 * and 5xx answers raise AnalysisServiceUnavailable.
 */
export class HttpAnalysisService implements AnalysisService {
  constructor(private readonly url: string, private readonly token?: string) {}

  async analyze(tree: Snapshot, project: ProjectRef): Promise<Finding[]> {
    const files = [...tree].map(([file, content]) => ({ path: file, content: content.toString('utf8') }));
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.token) headers.authorization = `Bearer ${this.token}`;

    let resp: Response;
    try {
      resp = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ project, files })
      });
    } catch (e) {
      throw new AnalysisServiceUnavailable(`analysis service unreachable: ${errorMessage(e)}`, { cause: e });
    }
    if (resp.status >= 500) {
      throw new AnalysisServiceUnavailable(`analysis service answered ${resp.status}`);
    }
    if (!resp.ok) {
      throw new Error(`analysis service rejected the request: ${resp.status} ${await resp.text()}`);
    }
    return ResponseSchema.parse(await resp.json()).findings;
  }
}
