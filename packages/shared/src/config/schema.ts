import { z } from 'zod';
import { MANIFEST_FILENAME } from '../artifacts/manifest';

export const BUILD_PROFILES = ['debug', 'release', 'verbose'] as const;
export type BuildProfile = (typeof BUILD_PROFILES)[number];

export const TEST_KINDS = ['all', 'unit', 'integration'] as const;
export type TestKind = (typeof TEST_KINDS)[number];

export const CHECK_ITEM_KINDS = ['static', 'format', 'lint', 'audit', 'outdated'] as const;
export type CheckItemKind = (typeof CHECK_ITEM_KINDS)[number];

export const CHECK_KINDS = ['static', 'format', 'lint', 'all'] as const;
export type CheckKind = (typeof CHECK_KINDS)[number];

export type CleanScope = 'standard' | 'full';

/** Safe marker file names: no separators, and never "." or "..". */
export const CACHE_KEY_PATTERN = /^(?!\.{1,2}$)[A-Za-z0-9._-]+$/;

/** A command line as written in kiln.yaml, e.g. `cargo build --package ignite` */
const CommandLineSchema = z.string().trim().min(1, 'command must not be empty');

export const ProjectConfigSchema = z.object({
  name: z.string().default('ignite'),
  version: z.string().default('0.4.0'),
  /** File whose presence marks a well-formed project */
  descriptor: z.string().default('Cargo.toml'),
  testsDir: z.string().default('tests'),
  testExtension: z.string().default('.rs'),
});

export const PathsConfigSchema = z.object({
  target: z.string().default('target'),
  dist: z.string().default('dist'),
  state: z.string().default('.kiln'),
  logs: z.string().default('.kiln/log'),
});

export const PrerequisiteSchema = z.object({
  name: z.string().default('UEFI target'),
  cacheKey: z
    .string()
    .regex(
      CACHE_KEY_PATTERN,
      'cacheKey may only contain letters, digits, ".", "_" and "-", and may not be "." or ".."',
    )
    .default('target-x86_64-unknown-uefi'),
  /** Probe command; the prerequisite holds when it exits 0 (and prints `expect`, if set) */
  check: CommandLineSchema.default('rustup target list --installed'),
  /** Text the probe output must contain; null accepts any successful probe */
  expect: z.string().min(1).nullable().default('x86_64-unknown-uefi'),
  /** Command that satisfies the prerequisite; null reports the failure instead */
  install: CommandLineSchema.nullable().default('rustup target add x86_64-unknown-uefi'),
});
export type Prerequisite = z.infer<typeof PrerequisiteSchema>;

export const CheckItemSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(CHECK_ITEM_KINDS),
  command: CommandLineSchema,
  /** Executable that must be on PATH for the item to apply; defaults to the command's program */
  requires: z.string().optional(),
});
export type CheckItem = z.infer<typeof CheckItemSchema>;

export const ToolProbeSchema = z.object({
  label: z.string(),
  command: CommandLineSchema,
});
export type ToolProbeConfig = z.infer<typeof ToolProbeSchema>;

export const VocabularySchema = z.object({
  error: z.array(z.string().min(1)).min(1),
  warning: z.array(z.string().min(1)).min(1),
});
export type Vocabulary = z.infer<typeof VocabularySchema>;

export const ToolchainConfigSchema = z.object({
  triple: z.string().default('x86_64-unknown-uefi'),
  binary: z.string().default('ignite.efi'),
  build: CommandLineSchema.default('cargo build --package ignite --target x86_64-unknown-uefi'),
  profileArgs: z
    .object({
      debug: z.array(z.string()).default([]),
      release: z.array(z.string()).default(['--release']),
      verbose: z.array(z.string()).default(['--verbose']),
    })
    .default({}),
  featuresFlag: z.string().default('--features'),
  test: CommandLineSchema.default('cargo test --package ignite'),
  testArgs: z
    .object({
      all: z.array(z.string()).default([]),
      unit: z.array(z.string()).default(['--lib']),
      integration: z.array(z.string()).default(['--test', '*']),
    })
    .default({}),
  /** Appended when tests must not run in parallel */
  serialTestArgs: z.array(z.string()).default(['--', '--test-threads=1']),
  clean: CommandLineSchema.default('cargo clean'),
  prerequisite: PrerequisiteSchema.nullable().default(PrerequisiteSchema.parse({})),
  checks: z.array(CheckItemSchema).default([
    { name: 'Cargo Check', kind: 'static', command: 'cargo check --package ignite' },
    {
      name: 'Rustfmt',
      kind: 'format',
      command: 'cargo fmt --package ignite -- --check',
      requires: 'rustfmt',
    },
    {
      name: 'Clippy',
      kind: 'lint',
      command: 'cargo clippy --package ignite',
      requires: 'cargo-clippy',
    },
    { name: 'Audit', kind: 'audit', command: 'cargo audit', requires: 'cargo-audit' },
    {
      name: 'Outdated',
      kind: 'outdated',
      command: 'cargo outdated --root-deps-only',
      requires: 'cargo-outdated',
    },
  ]),
  tools: z.array(ToolProbeSchema).default([
    { label: 'Rust Compiler', command: 'rustc --version' },
    { label: 'Cargo', command: 'cargo --version' },
    { label: 'Rustup', command: 'rustup --version' },
  ]),
  /** Per-program output vocabularies, keyed by executable name */
  classifiers: z.record(z.string(), VocabularySchema).default({}),
});
export type ToolchainConfig = z.infer<typeof ToolchainConfigSchema>;

export const DistributionConfigSchema = z.object({
  /** Where the artifact is staged, relative to the dist directory */
  artifact: z.string().default('EFI/BOOT/BOOTX64.EFI'),
  directories: z.array(z.string()).default(['EFI/BOOT', 'boot']),
  files: z
    .array(
      z.object({
        source: z.string(),
        target: z.string(),
        optional: z.boolean().default(false),
      }),
    )
    .default([{ source: 'ignite.conf', target: 'boot/ignite.conf', optional: true }]),
  manifest: z.string().default(MANIFEST_FILENAME),
});

export const OrchestratorConfigSchema = z.object({
  /**
   * `advanced` caches prerequisite checks and adds audit/outdated items to `check all`;
   * `basic` runs every prerequisite probe and only the core checks.
   */
  variant: z.enum(['basic', 'advanced']).default('advanced'),
  /** Echo command output lines to the console while they stream */
  echoOutput: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  project: ProjectConfigSchema.default(ProjectConfigSchema.parse({})),
  paths: PathsConfigSchema.default(PathsConfigSchema.parse({})),
  toolchain: ToolchainConfigSchema.default(ToolchainConfigSchema.parse({})),
  distribution: DistributionConfigSchema.default(DistributionConfigSchema.parse({})),
  orchestrator: OrchestratorConfigSchema.default(OrchestratorConfigSchema.parse({})),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
