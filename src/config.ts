import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_CACHE_MAX_BYTES } from './stores/cache.js';

const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  PIPEWRIGHT_HOME: z.string().default('.pipewright'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  PIPEWRIGHT_CACHE_MAX_BYTES: z.coerce.number().int().positive().default(DEFAULT_CACHE_MAX_BYTES),
  PIPEWRIGHT_MAX_PARALLEL_JOBS: z.coerce.number().int().positive().optional(),
  PIPEWRIGHT_DEFAULT_BRANCH: z.string().min(1).default('main'),
  PIPEWRIGHT_PAGES_BASE_URL: optionalString.pipe(z.string().url().optional()),
  PIPEWRIGHT_ANALYSIS_URL: optionalString.pipe(z.string().url().optional()),
  PIPEWRIGHT_ANALYSIS_TOKEN: optionalString,
  PIPEWRIGHT_SECRET_PREFIX: z.string().default('')
});

export type PipewrightConfig = {
  home: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  cacheMaxBytes: number;
  maxParallelJobs?: number;
  defaultBranch: string;
  pagesBaseUrl?: string;
  analysisUrl?: string;
  analysisToken?: string;
  secretPrefix: string;
};

/** Reads configuration from environment variables (after dotenv has run). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): PipewrightConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue.message, String(issue.path[0] ?? 'environment'));
  }
  const e = parsed.data;
  return {
    home: path.resolve(cwd, e.PIPEWRIGHT_HOME),
    logLevel: e.LOG_LEVEL,
    cacheMaxBytes: e.PIPEWRIGHT_CACHE_MAX_BYTES,
    maxParallelJobs: e.PIPEWRIGHT_MAX_PARALLEL_JOBS,
    defaultBranch: e.PIPEWRIGHT_DEFAULT_BRANCH,
    pagesBaseUrl: e.PIPEWRIGHT_PAGES_BASE_URL,
    analysisUrl: e.PIPEWRIGHT_ANALYSIS_URL,
    analysisToken: e.PIPEWRIGHT_ANALYSIS_TOKEN,
    secretPrefix: e.PIPEWRIGHT_SECRET_PREFIX
  };
}
