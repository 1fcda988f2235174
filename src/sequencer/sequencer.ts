import { ProvisionError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import type { Outcome, SequenceEvent, Step, StepResult } from './types.js';

export interface RunSequenceOptions {
  /** Observer for progress; never affects the outcome */
  onEvent?: (event: SequenceEvent) => void;
}

/**
 * Reject sequences that cannot be run, before any step starts.
 */
export function assertRunnable(steps: readonly Step[]): void {
  if (steps.length === 0) {
    throw new ProvisionError(
      ErrorCode.SEQUENCE_EMPTY,
      'step sequence is empty',
      'Enable at least one step in the pipeline configuration',
    );
  }

  const seen = new Set<string>();
  for (const [index, step] of steps.entries()) {
    if (typeof step.action !== 'function') {
      throw new ProvisionError(
        ErrorCode.ACTION_UNRESOLVED,
        `step ${index + 1} ("${step.name}") has no action to run`,
      );
    }
    if (seen.has(step.name)) {
      throw new ProvisionError(
        ErrorCode.CONFIG_VALIDATION_ERROR,
        `duplicate step name: "${step.name}"`,
        'Step names must be unique so a failure identifies exactly one step',
      );
    }
    seen.add(step.name);
  }
}

async function invoke(step: Step): Promise<StepResult> {
  try {
    return await step.action();
  } catch (err) {
    // A throwing action is that step's failure, with its own message as detail
    return { status: 'failure', detail: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Execute steps one at a time in declaration order.
 * The first failure ends the run; no later step is invoked.
 */
export async function runSequence(
  steps: readonly Step[],
  options: RunSequenceOptions = {},
): Promise<Outcome> {
  assertRunnable(steps);

  const total = steps.length;
  const emit = (event: SequenceEvent): void => {
    try {
      options.onEvent?.(event);
    } catch (err) {
      // Observers only report; a broken one must not stop the run
      debug('sequencer', `observer failed on ${event.type} for ${event.step}:`, err);
    }
  };

  for (const [index, step] of steps.entries()) {
    const position = index + 1;
    emit({ type: 'step:start', step: step.name, position, total });
    debug('sequencer', `start ${position}/${total} ${step.name}`);

    const start = Date.now();
    const result = await invoke(step);
    const duration_ms = Date.now() - start;

    if (result.status === 'failure') {
      debug('sequencer', `failed ${step.name}: ${result.detail}`);
      emit({ type: 'step:failed', step: step.name, position, total, duration_ms, detail: result.detail });
      return { type: 'failed', step: step.name, position, detail: result.detail };
    }

    emit({ type: 'step:passed', step: step.name, position, total, duration_ms });
  }

  return { type: 'completed', steps_run: total };
}
