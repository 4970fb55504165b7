import { Command } from 'commander';
import { CHECK_KINDS } from '@kiln/shared';
import { parseChoice, runAction } from './session';

export function registerCheckCommand(program: Command) {
  program
    .command('check')
    .argument('[kind]', `Check kind: ${CHECK_KINDS.join(', ')}`, 'all')
    .description('Run static analysis, formatting and lint checks')
    .action(async (kind: unknown) => {
      await runAction(program, {
        action: 'check',
        kind: parseChoice(kind, CHECK_KINDS, 'check kind'),
      });
    });
}
