import path from 'path';
import { parseCommand } from '@kiln/exec';
import type {
  BuildProfile,
  CheckItem,
  CheckItemKind,
  CheckKind,
  TestKind,
  ToolchainConfig,
} from '@kiln/shared';

export function buildArgs(
  toolchain: ToolchainConfig,
  profile: BuildProfile,
  features: string[] = [],
): string[] {
  const args = [...toolchain.profileArgs[profile]];
  const selected = features.map((f) => f.trim()).filter(Boolean);
  if (selected.length > 0) {
    args.push(toolchain.featuresFlag, selected.join(','));
  }
  return args;
}

export function testArgs(toolchain: ToolchainConfig, kind: TestKind, parallel = true): string[] {
  const args = [...toolchain.testArgs[kind]];
  if (!parallel) {
    args.push(...toolchain.serialTestArgs);
  }
  return args;
}

/**
 * Cargo writes verbose builds to the debug directory.
 */
export function profileDir(profile: BuildProfile): 'debug' | 'release' {
  return profile === 'release' ? 'release' : 'debug';
}

export function artifactPath(
  targetDir: string,
  toolchain: ToolchainConfig,
  profile: BuildProfile,
): string {
  return path.join(targetDir, toolchain.triple, profileDir(profile), toolchain.binary);
}

const CORE_CHECKS: readonly CheckItemKind[] = ['static', 'format', 'lint'];
const EXTENDED_CHECKS: readonly CheckItemKind[] = ['audit', 'outdated'];

/**
 * Picks the configured items for `kind`, keeping their configured order.
 */
export function selectChecks(items: CheckItem[], kind: CheckKind, extended: boolean): CheckItem[] {
  if (kind !== 'all') {
    return items.filter((item) => item.kind === kind);
  }
  const kinds: readonly CheckItemKind[] = extended ? [...CORE_CHECKS, ...EXTENDED_CHECKS] : CORE_CHECKS;
  return items.filter((item) => kinds.includes(item.kind));
}

/** The executable that must be on PATH for `item` to apply. */
export function requiredTool(item: CheckItem): string {
  return item.requires ?? parseCommand(item.command).bin;
}
