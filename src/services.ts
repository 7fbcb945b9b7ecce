import path from 'node:path';
import { PipewrightConfig } from './config.js';
import { DeploymentPublisher, DirectoryHostingTarget } from './deploy/publisher.js';
import { EnvironmentProvisioner, LocalProvisioner } from './environment.js';
import { HttpAnalysisService, LocalRuleAnalyzer } from './quality/analyzers.js';
import { LogChangeRequestClient, QualityGateReporter } from './quality/reporter.js';
import { EnvSecretStore, SecretStore } from './secrets.js';
import { ArtifactStore, FsArtifactStore } from './stores/artifact.js';
import { CacheStore, FsCacheStore } from './stores/cache.js';

/** External collaborators of a run, resolved once and passed in. */
export type RunServices = {
  cache: CacheStore;
  artifacts: ArtifactStore;
  provisioner: EnvironmentProvisioner;
  secrets: SecretStore;
  publisher: DeploymentPublisher;
  qualityGate: QualityGateReporter;
  /** tree the checkout action copies from */
  sourceDir?: string;
  /** directory names checkout leaves out */
  checkoutExclude: string[];
  defaultBranch: string;
  maxParallelJobs?: number;
};

export function createServices(config: PipewrightConfig, sourceDir: string): RunServices {
  const analysis = config.analysisUrl
    ? new HttpAnalysisService(config.analysisUrl, config.analysisToken)
    : new LocalRuleAnalyzer();
  return {
    cache: new FsCacheStore(path.join(config.home, 'cache'), config.cacheMaxBytes),
    artifacts: new FsArtifactStore(path.join(config.home, 'artifacts')),
    provisioner: new LocalProvisioner(),
    secrets: new EnvSecretStore(process.env, config.secretPrefix),
    publisher: new DeploymentPublisher(new DirectoryHostingTarget(path.join(config.home, 'sites'), config.pagesBaseUrl)),
    qualityGate: new QualityGateReporter(analysis, new LogChangeRequestClient()),
    sourceDir,
    checkoutExclude: ['.git', 'node_modules', path.basename(config.home)],
    defaultBranch: config.defaultBranch,
    maxParallelJobs: config.maxParallelJobs
  };
}
