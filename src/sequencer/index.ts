export { runSequence, assertRunnable, type RunSequenceOptions } from './sequencer.js';
export type { Step, StepAction, StepResult, Outcome, SequenceEvent } from './types.js';
