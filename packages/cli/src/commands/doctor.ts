import { Command } from 'commander';
import { runAction } from './session';

export const registerDoctorCommand = (program: Command) => {
  program
    .command('doctor')
    .description('Diagnose the toolchain, project and session health')
    .action(async () => {
      await runAction(program, { action: 'diagnose' });
    });
};
