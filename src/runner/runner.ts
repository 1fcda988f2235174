import { resolve } from 'node:path';
import chalk from 'chalk';
import { loadPipeline, resolvePipeline, type ResolvedStep } from '../pipeline/index.js';
import { runSequence, type Outcome, type SequenceEvent, type Step } from '../sequencer/index.js';
import { commandAction } from '../actions/index.js';
import {
  createEventRecorder,
  defaultEventLogPath,
  type EventRecorder,
  type RunEventInput,
} from '../integration/run-log.js';
import { formatDuration } from '../lib/utils/format.js';
import { uniqueId } from '../lib/utils/unique-id.js';
import { debug } from '../lib/utils/debug.js';

export interface RunProvisionOptions {
  /** Pipeline file; defaults to ./provision.yaml, then the built-in pipeline */
  configFile?: string;
  cwd?: string;
  /** Suppress progress lines (failure details included) */
  quiet?: boolean;
  /** Where step commands' stdout goes; null discards it */
  stdout?: NodeJS.WritableStream | null;
  /** Where step commands' stderr goes; null discards it */
  stderr?: NodeJS.WritableStream | null;
  /** JSONL event log; null disables it */
  eventLogPath?: string | null;
}

export interface ProvisionResult {
  pipeline: string;
  run_id: string;
  config_file: string | null;
  /** Every configured step, disabled ones included */
  steps: ResolvedStep[];
  outcome: Outcome;
  duration_ms: number;
}

/** Build one sequencer step per enabled entry, each backed by its shell command */
export function buildSteps(
  resolved: readonly ResolvedStep[],
  io: Pick<RunProvisionOptions, 'stdout' | 'stderr'> = {},
): Step[] {
  return resolved
    .filter((entry) => entry.enabled)
    .map((entry) => ({
      name: entry.name,
      required: true as const,
      action: commandAction({
        cmd: entry.run,
        cwd: entry.cwd,
        env: entry.env,
        stdout: io.stdout,
        stderr: io.stderr,
      }),
    }));
}

/**
 * Load the pipeline and run its enabled steps in order, stopping at the first failure.
 * Configuration errors throw before any step runs; step failures come back in the outcome.
 */
export async function runProvision(options: RunProvisionOptions = {}): Promise<ProvisionResult> {
  const cwd = resolve(options.cwd ?? process.cwd());

  // 1. Load and resolve the pipeline
  const { pipeline, configFile, baseDir } = loadPipeline({ cwd, configFile: options.configFile });
  const resolved = resolvePipeline(pipeline, { baseDir });
  const steps = buildSteps(resolved, options);

  const skipped = resolved.filter((entry) => !entry.enabled).map((entry) => entry.name);
  if (skipped.length > 0) {
    debug('runner', `disabled steps: ${skipped.join(', ')}`);
  }

  const runId = uniqueId();
  const logPath =
    options.eventLogPath === undefined
      ? defaultEventLogPath(cwd, pipeline.name)
      : options.eventLogPath;
  const recorder: EventRecorder | null = logPath ? createEventRecorder({ jsonLogPath: logPath }) : null;
  let logBroken = false;
  const record = (event: RunEventInput): void => {
    if (!recorder || logBroken) return;
    try {
      recorder(event);
    } catch (err) {
      logBroken = true;
      console.error(
        chalk.yellow(`  ⚠ Event log disabled for this run: ${err instanceof Error ? err.message : String(err)}`),
      );
    }
  };

  const log = (message: string): void => {
    if (!options.quiet) console.log(message);
  };

  if (steps.length > 0) {
    record({
      type: 'run:start',
      pipeline: pipeline.name,
      run_id: runId,
      step_count: steps.length,
      config_file: configFile,
    });
    log(`Pipeline: ${chalk.bold(pipeline.name)} (${steps.length} steps)`);
  }

  const startMs = Date.now();
  let passed = 0;

  // 2. Run the sequence
  const onEvent = (event: SequenceEvent): void => {
    switch (event.type) {
      case 'step:start':
        log(`\n▶ [${event.position}/${event.total}] ${event.step}`);
        break;
      case 'step:passed':
        passed++;
        log(chalk.green(`  ✓ ${event.step} (${formatDuration(event.duration_ms)})`));
        record({
          type: 'step:passed',
          pipeline: pipeline.name,
          run_id: runId,
          step: event.step,
          position: event.position,
          duration_ms: event.duration_ms,
        });
        break;
      case 'step:failed':
        if (!options.quiet) {
          console.error(chalk.red(`  ✗ Step "${event.step}" failed: ${event.detail}`));
        }
        record({
          type: 'step:failed',
          pipeline: pipeline.name,
          run_id: runId,
          step: event.step,
          position: event.position,
          duration_ms: event.duration_ms,
          detail: event.detail,
        });
        break;
    }
  };

  const outcome = await runSequence(steps, { onEvent });
  const totalMs = Date.now() - startMs;

  // 3. Run-level final event
  if (outcome.type === 'completed') {
    log(chalk.green(`\n✓ Pipeline "${pipeline.name}" completed (${formatDuration(totalMs)})`));
    record({
      type: 'run:completed',
      pipeline: pipeline.name,
      run_id: runId,
      duration_ms: totalMs,
      steps_passed: passed,
    });
  } else {
    record({
      type: 'run:failed',
      pipeline: pipeline.name,
      run_id: runId,
      step: outcome.step,
      position: outcome.position,
      duration_ms: totalMs,
      steps_passed: passed,
    });
  }

  return {
    pipeline: pipeline.name,
    run_id: runId,
    config_file: configFile,
    steps: resolved,
    outcome,
    duration_ms: totalMs,
  };
}
