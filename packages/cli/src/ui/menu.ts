import {
  BUILD_PROFILES,
  CHECK_KINDS,
  TEST_KINDS,
  type BuildProfile,
  type CheckKind,
  type TestKind,
} from '@kiln/shared';
import type { ActionRequest } from '@kiln/core';
import type { Choice, Prompter } from './prompter';

type MenuEntry =
  | 'build'
  | 'test'
  | 'check'
  | 'distribute'
  | 'clean'
  | 'diagnose'
  | 'logs'
  | 'exit';

/** An orchestrator action, or `'logs'` to show the session logs. */
export type MenuRequest = ActionRequest | 'logs';

const MENU: Array<Choice<MenuEntry>> = [
  { name: 'Build', value: 'build' },
  { name: 'Run tests', value: 'test' },
  { name: 'Run checks', value: 'check' },
  { name: 'Create distribution', value: 'distribute' },
  { name: 'Clean', value: 'clean' },
  { name: 'Diagnose environment', value: 'diagnose' },
  { name: 'View session logs', value: 'logs' },
  { name: 'Exit', value: 'exit' },
];

const choicesOf = <T extends string>(values: readonly T[]): Array<Choice<T>> =>
  values.map((value) => ({ name: value, value }));

/**
 * Asks for the next action. Resolves `undefined` when the user exits.
 */
export async function promptRequest(prompter: Prompter): Promise<MenuRequest | undefined> {
  const entry = await prompter.select('What would you like to do?', MENU);
  switch (entry) {
    case 'build': {
      const profile = await prompter.select<BuildProfile>('Profile', choicesOf(BUILD_PROFILES));
      return { action: 'build', profile };
    }
    case 'test': {
      const kind = await prompter.select<TestKind>('Test kind', choicesOf(TEST_KINDS));
      return { action: 'test', kind, parallel: true };
    }
    case 'check': {
      const kind = await prompter.select<CheckKind>('Check kind', choicesOf(CHECK_KINDS));
      return { action: 'check', kind };
    }
    case 'distribute': {
      const profile = await prompter.select<BuildProfile>('Profile', choicesOf(BUILD_PROFILES));
      return { action: 'distribute', profile };
    }
    case 'clean': {
      const full = await prompter.confirm('Also remove the distribution and the result cache?');
      return { action: 'clean', scope: full ? 'full' : 'standard' };
    }
    case 'diagnose':
      return { action: 'diagnose' };
    case 'logs':
      return 'logs';
    case 'exit':
      return undefined;
  }
}
