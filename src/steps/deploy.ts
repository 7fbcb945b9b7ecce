import { Action, inputString } from './action.js';

export const deployAction: Action = {
  name: 'deploy',
  description: 'Publish an artifact of this run to a hosting environment',
  inputs: {
    artifact: { required: true },
    environment: { required: true }
  },
  async execute(inputs, step) {
    const { services, runId, grant } = step.job;
    const environment = inputString(inputs, 'environment');
    const site = await services.artifacts.get(runId, inputString(inputs, 'artifact'));
    const record = await services.publisher.publish(environment, site, grant);
    step.log(record.changed ? `deployed to ${record.url}` : `already live at ${record.url}`);
    return {
      success: true,
      outputs: { url: record.url, 'deployment-id': record.id, changed: record.changed, 'content-hash': record.contentHash }
    };
  }
};
