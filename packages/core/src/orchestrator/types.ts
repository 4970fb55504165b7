import type {
  ActionName,
  BuildProfile,
  CheckItemKind,
  CheckKind,
  CleanScope,
  Config,
  DistributionManifest,
  Logger,
  SessionStats,
  TestKind,
} from '@kiln/shared';
import type { CommandRunner } from '@kiln/exec';
import type { ResultCache } from '../cache/result-cache';
import type { ResolvedPaths } from '../config/loader';
import type { HealthReport, HealthScorer, HealthTier } from '../health/scorer';
import type { MetricsStore } from '../metrics/store';
import type { ToolProbe } from '../probe/tool-probe';

export type FailureStep = 'prerequisite' | 'build' | 'artifact' | 'test' | 'check' | 'staging' | 'clean';

export interface ActionFailure {
  step: FailureStep;
  message: string;
  exitCode?: number;
  errorCount: number;
  warningCount: number;
}

interface OutcomeBase<A extends ActionName> {
  action: A;
  success: boolean;
  /** One-line human-readable result */
  summary: string;
  durationMs: number;
  failure?: ActionFailure;
}

export interface ArtifactDescriptor {
  path: string;
  sizeBytes: number;
  sha256: string;
  durationMs: number;
}

/**
 * How the build prerequisite was satisfied:
 * `cached` by a live marker, `satisfied` by the probe, `installed` by the install command.
 */
export type PrerequisiteStatus = 'cached' | 'satisfied' | 'installed' | 'skipped' | 'failed';

export interface BuildOutcome extends OutcomeBase<'build'> {
  profile: BuildProfile;
  features: string[];
  prerequisite: PrerequisiteStatus;
  errorCount: number;
  warningCount: number;
  artifact?: ArtifactDescriptor;
}

export interface TestOutcome extends OutcomeBase<'test'> {
  kind: TestKind;
  parallel: boolean;
  /** Sum of `N passed` across `test result:` lines */
  passed?: number;
  failed?: number;
  errorCount: number;
  warningCount: number;
}

export type CheckItemStatus = 'passed' | 'failed' | 'not_applicable';

export interface CheckItemOutcome {
  name: string;
  kind: CheckItemKind;
  status: CheckItemStatus;
  durationMs: number;
  exitCode?: number;
  /** Why the item did not apply */
  reason?: string;
}

export interface CheckOutcome extends OutcomeBase<'check'> {
  kind: CheckKind;
  items: CheckItemOutcome[];
  passed: number;
  applicable: number;
  total: number;
}

export interface DistributeOutcome extends OutcomeBase<'distribute'> {
  profile: BuildProfile;
  /** Build run on behalf of this distribution, if any */
  build?: BuildOutcome;
  stagedArtifact?: string;
  manifest?: DistributionManifest;
  manifestPath?: string;
}

export interface CleanOutcome extends OutcomeBase<'clean'> {
  scope: CleanScope;
  removed: string[];
  metricsReset: boolean;
}

export interface ToolStatus {
  label: string;
  program: string;
  path?: string;
  version?: string;
}

export interface DiagnosticReport {
  platform: string;
  tools: ToolStatus[];
  prerequisite?: {
    name: string;
    satisfied: boolean;
    detail: string;
  };
  project: {
    root: string;
    descriptor: string;
    descriptorPresent: boolean;
    testFiles: number;
    logFiles: number;
  };
  session: {
    builds: number;
    tests: number;
    checks: number;
    errors: number;
    warnings: number;
    commandsRun: number;
    cacheHits: number;
    diagnosticsRun: number;
    durationMs: number;
  };
  history: {
    totalBuilds: number;
    totalTests: number;
    totalErrors: number;
    averageBuildSeconds?: number;
    averageTestSeconds?: number;
    lastSuccess?: string;
  };
  health: HealthReport & { tier: HealthTier };
}

export interface DiagnoseOutcome extends OutcomeBase<'diagnose'> {
  report: DiagnosticReport;
}

export type ActionOutcome =
  | BuildOutcome
  | TestOutcome
  | CheckOutcome
  | DistributeOutcome
  | CleanOutcome
  | DiagnoseOutcome;

export type ActionRequest =
  | { action: 'build'; profile: BuildProfile; features?: string[] }
  | { action: 'test'; kind: TestKind; parallel?: boolean }
  | { action: 'check'; kind: CheckKind }
  | { action: 'distribute'; profile: BuildProfile; rebuild?: boolean }
  | { action: 'clean'; scope: CleanScope; resetMetrics?: boolean }
  | { action: 'diagnose' };

export interface ActionOptions {
  signal?: AbortSignal;
}

export interface OrchestratorDeps {
  config: Config;
  paths: ResolvedPaths;
  runner: CommandRunner;
  cache: ResultCache;
  metrics: MetricsStore;
  session: SessionStats;
  logger: Logger;
  probe: ToolProbe;
  health?: HealthScorer;
  /** Receives each command output line for on-screen echo */
  onOutputLine?: (text: string) => void;
  clock?: () => Date;
}
