import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({}, '/work');
    expect(config).toEqual({
      home: path.resolve('/work', '.pipewright'),
      logLevel: 'info',
      cacheMaxBytes: 536870912,
      maxParallelJobs: undefined,
      defaultBranch: 'main',
      pagesBaseUrl: undefined,
      analysisUrl: undefined,
      analysisToken: undefined,
      secretPrefix: ''
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ PIPEWRIGHT_MAX_PARALLEL_JOBS: '2', PIPEWRIGHT_CACHE_MAX_BYTES: '1024' }, '/work');
    expect(config.maxParallelJobs).toBe(2);
    expect(config.cacheMaxBytes).toBe(1024);
  });

  it('treats blank urls as unset', () => {
    expect(loadConfig({ PIPEWRIGHT_ANALYSIS_URL: '  ' }, '/work').analysisUrl).toBeUndefined();
  });

  it('names the variable at fault', () => {
    try {
      loadConfig({ PIPEWRIGHT_MAX_PARALLEL_JOBS: 'lots' }, '/work');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      expect(e instanceof ConfigurationError && e.pointer).toBe('PIPEWRIGHT_MAX_PARALLEL_JOBS');
    }
  });
});
