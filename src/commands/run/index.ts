import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { runProvision, type ProvisionResult } from '../../runner/index.js';

export interface RunReport {
  /** 0 completed, 1 a step failed */
  exitCode: 0 | 1;
  /** The single stdout document in --json mode */
  json: string | null;
  /** Failure line for stderr; null when the run completed */
  failure: string | null;
}

/** Map a finished run to its exit code and the output the CLI prints */
export function reportRun(result: ProvisionResult, options: { json?: boolean } = {}): RunReport {
  const { outcome } = result;
  const json = options.json
    ? JSON.stringify({
        pipeline: result.pipeline,
        run_id: result.run_id,
        outcome,
        duration_ms: result.duration_ms,
      })
    : null;

  if (outcome.type === 'completed') {
    return { exitCode: 0, json, failure: null };
  }

  const total = result.steps.filter((s) => s.enabled).length;
  return {
    exitCode: 1,
    json,
    failure: `✗ Pipeline "${result.pipeline}" stopped at step ${outcome.position}/${total} ("${outcome.step}"): ${outcome.detail}`,
  };
}

export const runCommand = new Command('run')
  .description('Install dependencies, collect static assets and apply migrations, stopping at the first failure')
  .option('-c, --config <file>', 'Path to pipeline YAML (default: ./provision.yaml, else built-in)')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (options: { config?: string; json?: boolean }) => {
      const result = await runProvision({
        configFile: options.config,
        quiet: options.json,
        // Keep stdout clean for the JSON document
        stdout: options.json ? process.stderr : process.stdout,
        stderr: process.stderr,
      });

      const report = reportRun(result, { json: options.json });
      if (report.json !== null) {
        console.log(report.json);
      }
      if (report.failure !== null) {
        console.error(chalk.red(`\n${report.failure}`));
        process.exit(report.exitCode);
      }
    }),
  );
