import { Command } from 'commander';
import pkg from '../package.json';
import { registerBuildCommand } from './commands/build';
import { registerTestCommand } from './commands/test';
import { registerCheckCommand } from './commands/check';
import { registerDistCommand } from './commands/dist';
import { registerCleanCommand } from './commands/clean';
import { registerDoctorCommand } from './commands/doctor';
import { registerLogsCommand } from './commands/logs';
import { registerMenuCommand } from './commands/menu';
import type { Prompter } from './ui/prompter';

export const name = '@kiln/cli';

export interface ProgramOptions {
  /** Replaces the inquirer prompts of `menu` */
  prompter?: Prompter;
}

/**
 * Builds the `kiln` command tree. Parse failures throw a CommanderError
 * instead of exiting the process.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('kiln')
    .description('Build, test, check and package the bootloader')
    .version(pkg.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--cwd <dir>', 'Directory to start the project search from')
    .option('--verbose', 'Echo debug logging')
    .exitOverride();

  registerBuildCommand(program);
  registerTestCommand(program);
  registerCheckCommand(program);
  registerDistCommand(program);
  registerCleanCommand(program);
  registerDoctorCommand(program);
  registerLogsCommand(program);
  registerMenuCommand(program, options.prompter);

  return program;
}

export { OutputRenderer } from './output/renderer';
export { renderDoctorReport } from './output/doctor';
