import { Command } from 'commander';
import { TEST_KINDS } from '@kiln/shared';
import { parseChoice, runAction } from './session';

export function registerTestCommand(program: Command) {
  program
    .command('test')
    .description('Run the test suite')
    .option('-k, --kind <kind>', `Test kind: ${TEST_KINDS.join(', ')}`, 'all')
    .option('--serial', 'Run tests on a single thread')
    .action(async (options: Record<string, unknown>) => {
      await runAction(program, {
        action: 'test',
        kind: parseChoice(options.kind, TEST_KINDS, 'test kind'),
        parallel: options.serial !== true,
      });
    });
}
