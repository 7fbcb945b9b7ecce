import { Action, ActionOutcome, inputString, StepContext } from './action.js';

const SET_OUTPUT_RE = /^::set-output name=([A-Za-z0-9_-]+)::(.*)$/;

/**
 * Runs `cmd` through the job environment's shell. Lines of the form
 * `::set-output name=<name>::<value>` on stdout become step outputs.
 */
export const shellAction: Action = {
  name: 'shell',
  description: 'Run a shell command in the job workspace',
  inputs: {
    cmd: { required: true, description: 'command line' },
    'working-directory': { default: '.' }
  },
  async execute(inputs, step: StepContext): Promise<ActionOutcome> {
    const cmd = inputString(inputs, 'cmd');
    const outputs: Record<string, unknown> = {};
    const { exitCode, stdout, stderr } = await step.job.environment.exec(cmd, {
      cwd: inputString(inputs, 'working-directory'),
      env: step.vars,
      signal: step.job.signal,
      onLine: (line, stream) => {
        const m = stream === 'stdout' ? line.match(SET_OUTPUT_RE) : null;
        if (m) outputs[m[1]] = m[2];
        else step.log(line);
      }
    });
    outputs['exit-code'] = exitCode;
    outputs.stdout = stdout.trim();
    outputs.stderr = stderr.trim();
    return {
      success: exitCode === 0,
      outputs,
      error: exitCode === 0 ? undefined : `command exited with code ${exitCode}`
    };
  }
};
