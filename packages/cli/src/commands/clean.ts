import { Command } from 'commander';
import { runAction } from './session';

export function registerCleanCommand(program: Command) {
  program
    .command('clean')
    .description('Remove build outputs')
    .option('--full', 'Also remove the distribution directory and the result cache')
    .option('--reset-metrics', 'Reset historical metrics')
    .action(async (options: Record<string, unknown>) => {
      await runAction(program, {
        action: 'clean',
        scope: options.full === true ? 'full' : 'standard',
        resetMetrics: options.resetMetrics === true,
      });
    });
}
