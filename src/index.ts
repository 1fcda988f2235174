import { Command } from 'commander';
import { runCommand } from './commands/run/index.js';
import { stepsCommand } from './commands/steps/index.js';

const program = new Command();

program
  .name('provision')
  .description('Fail-fast deployment provisioning: dependencies, static assets, migrations')
  .version('0.1.0');

program.addCommand(runCommand, { isDefault: true });
program.addCommand(stepsCommand);

await program.parseAsync();
