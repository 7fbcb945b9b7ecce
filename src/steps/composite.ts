import { StepFailure } from '../errors.js';
import { runSteps } from '../step-runner.js';
import { CompositeActionDefinition, InputSpec, RunContext } from '../types.js';
import { evaluateValue } from '../utils/expression.js';
import { Action, ActionOutcome, StepContext } from './action.js';

/**
 * A workflow-declared step sequence used like any built-in action. Its
 * steps expand inline: same environment, own `inputs` and `steps` scope.
 */
export class CompositeAction implements Action {
  readonly name: string;
  readonly description?: string;
  readonly inputs: Record<string, InputSpec>;

  constructor(private readonly def: CompositeActionDefinition) {
    this.name = def.name;
    this.description = def.description;
    this.inputs = def.inputs;
  }

  async execute(inputs: Record<string, unknown>, step: StepContext): Promise<ActionOutcome> {
    const inner: RunContext = { ...step.ctx, inputs, steps: {} };
    const { failed, fatal } = await runSteps(this.def.steps, inner, step.job, `actions.${this.name}`, {
      vars: step.vars,
      forward: step.log
    });
    if (fatal) throw fatal;
    if (failed) {
      return { success: false, error: new StepFailure(failed.name, failed.error ?? 'non-zero outcome').message };
    }
    const outputs: Record<string, unknown> = {};
    for (const [name, expr] of Object.entries(this.def.outputs ?? {})) {
      outputs[name] = evaluateValue(expr, inner);
    }
    return { success: true, outputs };
  }
}
