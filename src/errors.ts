export type ErrorCode =
  | 'CONFIGURATION'
  | 'STEP_FAILURE'
  | 'AUTHORIZATION'
  | 'ANALYSIS_UNAVAILABLE'
  | 'CANCELLED'
  | 'TIMEOUT';

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid workflow declaration. `pointer` names the declaration at fault,
 * e.g. `jobs.deploy.needs` or `jobs.build.steps[2]`.
 */
export class ConfigurationError extends PipelineError {
  readonly pointer?: string;

  constructor(message: string, pointer?: string) {
    super('CONFIGURATION', pointer ? `${pointer}: ${message}` : message);
    this.pointer = pointer;
  }
}

export class StepFailure extends PipelineError {
  constructor(readonly step: string, message: string) {
    super('STEP_FAILURE', `step "${step}" failed: ${message}`);
  }
}

export class AuthorizationError extends PipelineError {
  constructor(readonly environment: string, message: string) {
    super('AUTHORIZATION', message);
  }
}

export class AnalysisServiceUnavailable extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ANALYSIS_UNAVAILABLE', message, options);
  }
}

export class CancelledError extends PipelineError {
  constructor(message = 'run cancelled') {
    super('CANCELLED', message);
  }
}

export class TimeoutError extends PipelineError {
  constructor(readonly budgetMs: number) {
    super('TIMEOUT', `timed out after ${budgetMs}ms`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
