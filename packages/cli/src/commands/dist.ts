import { Command } from 'commander';
import { BUILD_PROFILES } from '@kiln/shared';
import { parseChoice, runAction } from './session';

export function registerDistCommand(program: Command) {
  program
    .command('dist')
    .description('Stage a distribution with its manifest')
    .option('-p, --profile <profile>', `Build profile: ${BUILD_PROFILES.join(', ')}`, 'release')
    .option('--rebuild', 'Build again even if this session already built the profile')
    .action(async (options: Record<string, unknown>) => {
      await runAction(program, {
        action: 'distribute',
        profile: parseChoice(options.profile, BUILD_PROFILES, 'profile'),
        rebuild: options.rebuild === true,
      });
    });
}
