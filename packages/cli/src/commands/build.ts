import { Command } from 'commander';
import { BUILD_PROFILES } from '@kiln/shared';
import { parseChoice, parseList, runAction } from './session';

export function registerBuildCommand(program: Command) {
  program
    .command('build')
    .description('Build the bootloader for a profile')
    .option('-p, --profile <profile>', `Build profile: ${BUILD_PROFILES.join(', ')}`, 'debug')
    .option('-F, --features <list>', 'Comma-separated feature flags')
    .action(async (options: Record<string, unknown>) => {
      const profile = parseChoice(options.profile, BUILD_PROFILES, 'profile');
      await runAction(program, {
        action: 'build',
        profile,
        features: parseList(options.features),
      });
    });
}
