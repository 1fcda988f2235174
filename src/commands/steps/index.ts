import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { loadPipeline, resolvePipeline, type ResolvedStep } from '../../pipeline/index.js';

export interface StepListing {
  /** 1-based place in the active sequence; null when disabled */
  position: number | null;
  name: string;
  enabled: boolean;
  run: string;
  description: string | null;
}

/** Number the enabled steps in run order; disabled ones keep their place unnumbered */
export function listSteps(steps: readonly ResolvedStep[]): StepListing[] {
  let position = 0;
  return steps.map((step) => ({
    position: step.enabled ? ++position : null,
    name: step.name,
    enabled: step.enabled,
    run: step.run,
    description: step.description,
  }));
}

export const stepsCommand = new Command('steps')
  .description('List the pipeline steps in run order without running them')
  .option('-c, --config <file>', 'Path to pipeline YAML (default: ./provision.yaml, else built-in)')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (options: { config?: string; json?: boolean }) => {
      const { pipeline, configFile, baseDir } = loadPipeline({ configFile: options.config });
      const listing = listSteps(resolvePipeline(pipeline, { baseDir }));

      if (options.json) {
        console.log(JSON.stringify({ pipeline: pipeline.name, config_file: configFile, steps: listing }));
        return;
      }

      console.log(`Pipeline: ${chalk.bold(pipeline.name)} ${chalk.dim(`(${configFile ?? 'built-in'})`)}`);
      if (pipeline.description) {
        console.log(chalk.dim(`  ${pipeline.description}`));
      }
      console.log('');

      const nameWidth = Math.max(4, ...listing.map((s) => s.name.length));
      for (const step of listing) {
        const marker = step.position === null ? ' -' : String(step.position).padStart(2);
        const line = `  ${marker}. ${step.name.padEnd(nameWidth)}  ${step.run}`;
        console.log(step.enabled ? line : chalk.dim(`${line}  (disabled)`));
      }
    }),
  );
