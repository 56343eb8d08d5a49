export { CommandStep } from './command-step.js';
export type { Step, StepContext, StepOutcome, CommandResult } from './types.js';
