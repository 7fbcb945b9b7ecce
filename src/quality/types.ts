import { Snapshot } from '../utils/snapshot.js';

export type Severity = 'info' | 'warning' | 'error';

export type Finding = {
  rule: string;
  severity: Severity;
  file: string;
  line: number;
  message: string;
};

export type Verdict = 'passed' | 'failed' | 'indeterminate';

export type Report = {
  verdict: Verdict;
  passed: boolean;
  findings: Finding[];
  /** findings absent from the baseline; only these decide the verdict */
  newFindings: Finding[];
  summary: string;
};

export type ProjectRef = {
  key: string;
  organization?: string;
};

export interface AnalysisService {
  analyze(tree: Snapshot, project: ProjectRef): Promise<Finding[]>;
}

export type ChangeRequestRef = {
  repository: string;
  number: number;
  sha?: string;
};

/** Where gate results are posted back to (the pull request of the event). */
export interface ChangeRequestClient {
  postStatus(target: ChangeRequestRef, report: Report): Promise<void>;
  annotate(target: ChangeRequestRef, findings: Finding[]): Promise<void>;
}
