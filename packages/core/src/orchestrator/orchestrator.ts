import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { copy, ensureDir, pathExists, remove } from 'fs-extra';
import {
  ExecutionError,
  FilesystemError,
  InterruptedError,
  NonZeroExitError,
  ToolUnavailableError,
  describePlatform,
  resolveFrom,
  fingerprintFile,
  listSessionLogs,
  sessionDurationMs,
  systemErrorCode,
  writeManifest,
  type ActionFinished,
  type ActionName,
  type BuildProfile,
  type CheckKind,
  type CleanScope,
  type DistributionManifest,
  type FileFingerprint,
  type Prerequisite,
  type TestKind,
} from '@kiln/shared';
import { parseCommand, type CommandResult } from '@kiln/exec';
import { HealthScorer, healthTier } from '../health/scorer';
import { artifactPath, buildArgs, requiredTool, selectChecks, testArgs } from './commands';
import { parseTestResults, type TestTally } from './test-results';
import type {
  ActionFailure,
  ActionOptions,
  ActionOutcome,
  ActionRequest,
  ArtifactDescriptor,
  BuildOutcome,
  CheckItemOutcome,
  CheckOutcome,
  CleanOutcome,
  DiagnoseOutcome,
  DiagnosticReport,
  DistributeOutcome,
  FailureStep,
  OrchestratorDeps,
  PrerequisiteStatus,
  TestOutcome,
  ToolStatus,
} from './types';

/** Samples averaged in diagnostics */
const ROLLING_WINDOW = 5;

type StepRun =
  | { kind: 'exited'; result: CommandResult }
  | { kind: 'spawn-failed'; error: ExecutionError };

type SettledStep = { ok: true; result: CommandResult } | { ok: false; failure: ActionFailure };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}

/**
 * Composes the command runner, cache and metrics into named actions.
 * Each action returns a structured outcome; only interruptions and state
 * access failures are thrown.
 */
export class Orchestrator {
  /** Successful builds of this session, by profile */
  private readonly builds = new Map<BuildProfile, ArtifactDescriptor>();
  private readonly health: HealthScorer;
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.health = deps.health ?? new HealthScorer();
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Prerequisite caching and the audit/outdated checks */
  get extended(): boolean {
    return this.deps.config.orchestrator.variant === 'advanced';
  }

  lastBuild(profile: BuildProfile): ArtifactDescriptor | undefined {
    return this.builds.get(profile);
  }

  dispatch(request: ActionRequest, options: ActionOptions = {}): Promise<ActionOutcome> {
    switch (request.action) {
      case 'build':
        return this.build(request.profile, request.features, options);
      case 'test':
        return this.test(request.kind, request.parallel, options);
      case 'check':
        return this.check(request.kind, options);
      case 'distribute':
        return this.distribute(request.profile, { ...options, rebuild: request.rebuild });
      case 'clean':
        return this.clean(request.scope, { ...options, resetMetrics: request.resetMetrics });
      case 'diagnose':
        return this.diagnose();
    }
  }

  build(
    profile: BuildProfile,
    features: string[] = [],
    options: ActionOptions = {},
  ): Promise<BuildOutcome> {
    return this.track<BuildOutcome>('build', { profile, features }, async (elapsed) => {
      const { config, paths, metrics, session } = this.deps;
      const { toolchain } = config;
      session.builds++;

      const base = { action: 'build' as const, profile, features };

      const prerequisite = await this.ensurePrerequisite(options.signal);
      if (prerequisite.failure) {
        return {
          ...base,
          success: false,
          summary: prerequisite.failure.message,
          durationMs: elapsed(),
          prerequisite: prerequisite.status,
          errorCount: prerequisite.failure.errorCount,
          warningCount: prerequisite.failure.warningCount,
          failure: prerequisite.failure,
        };
      }

      const args = buildArgs(toolchain, profile, features);
      const run = await this.runStep(toolchain.build, args, options);
      const step = await this.settle('build', run, `Build (${profile}) failed`);
      if (!step.ok) {
        const { failure } = step;
        return {
          ...base,
          success: false,
          summary: failure.message,
          durationMs: elapsed(),
          prerequisite: prerequisite.status,
          errorCount: failure.errorCount,
          warningCount: failure.warningCount,
          failure,
        };
      }
      const { result } = step;

      const binary = artifactPath(paths.target, toolchain, profile);
      let fingerprint: FileFingerprint;
      try {
        fingerprint = await fingerprintFile(binary);
      } catch (error) {
        const reason =
          systemErrorCode(error) === 'ENOENT'
            ? `Build succeeded but artifact ${binary} is missing`
            : `Could not read artifact ${binary}: ${errorMessage(error)}`;
        const artifactFailure = await this.recordFailure('artifact', reason, {
          errorCount: result.errorCount,
          warningCount: result.warningCount,
        });
        return {
          ...base,
          success: false,
          summary: reason,
          durationMs: elapsed(),
          prerequisite: prerequisite.status,
          errorCount: result.errorCount,
          warningCount: result.warningCount,
          failure: artifactFailure,
        };
      }

      metrics.recordBuild(result.durationMs / 1000);
      await metrics.save();

      const artifact: ArtifactDescriptor = {
        path: binary,
        sizeBytes: fingerprint.sizeBytes,
        sha256: fingerprint.sha256,
        durationMs: result.durationMs,
      };
      this.builds.set(profile, artifact);

      return {
        ...base,
        success: true,
        summary: `Built ${profile} in ${seconds(result.durationMs)}s (${artifact.sizeBytes} bytes)`,
        durationMs: elapsed(),
        prerequisite: prerequisite.status,
        errorCount: result.errorCount,
        warningCount: result.warningCount,
        artifact,
      };
    });
  }

  test(kind: TestKind, parallel = true, options: ActionOptions = {}): Promise<TestOutcome> {
    return this.track<TestOutcome>('test', { kind, parallel }, async (elapsed) => {
      const { config, metrics, session } = this.deps;
      session.tests++;

      const base = { action: 'test' as const, kind, parallel };
      const run = await this.runStep(
        config.toolchain.test,
        testArgs(config.toolchain, kind, parallel),
        options,
      );
      const tally: TestTally = run.kind === 'exited' ? parseTestResults(run.result.output) : {};
      const step = await this.settle('test', run, `Tests (${kind}) failed`);
      if (!step.ok) {
        const { failure } = step;
        return {
          ...base,
          ...tally,
          success: false,
          summary:
            tally.failed !== undefined
              ? `${failure.message}: ${tally.failed} failed`
              : failure.message,
          durationMs: elapsed(),
          errorCount: failure.errorCount,
          warningCount: failure.warningCount,
          failure,
        };
      }
      const { result } = step;

      metrics.recordTest(result.durationMs / 1000);
      await metrics.save();

      return {
        ...base,
        ...tally,
        success: true,
        summary:
          tally.passed !== undefined
            ? `${tally.passed} tests passed in ${seconds(result.durationMs)}s`
            : `Tests passed in ${seconds(result.durationMs)}s`,
        durationMs: elapsed(),
        errorCount: result.errorCount,
        warningCount: result.warningCount,
      };
    });
  }

  check(kind: CheckKind, options: ActionOptions = {}): Promise<CheckOutcome> {
    return this.track<CheckOutcome>('check', { kind }, async (elapsed) => {
      const { config, metrics, session, probe, logger } = this.deps;
      session.checks++;

      const selected = selectChecks(config.toolchain.checks, kind, this.extended);
      const items: CheckItemOutcome[] = [];
      let errorCount = 0;
      let warningCount = 0;
      let failedExitCode: number | undefined;

      for (const item of selected) {
        const tool = requiredTool(item);
        const base = { name: item.name, kind: item.kind };

        if (!(await probe.locate(tool))) {
          const unavailable = new ToolUnavailableError(tool);
          logger.warn(`${item.name}: ${unavailable.message}, skipping`);
          items.push({
            ...base,
            status: 'not_applicable',
            durationMs: 0,
            reason: unavailable.message,
          });
          continue;
        }

        const run = await this.runStep(item.command, [], options);
        if (run.kind === 'spawn-failed') {
          if (run.error.osCode === 'ENOENT') {
            const unavailable = new ToolUnavailableError(parseCommand(item.command).bin, {
              cause: run.error,
            });
            logger.warn(`${item.name}: ${unavailable.message}, skipping`);
            items.push({
              ...base,
              status: 'not_applicable',
              durationMs: run.error.durationMs,
              reason: unavailable.message,
            });
            continue;
          }
          this.countFailure();
          logger.error(run.error, item.name);
          items.push({ ...base, status: 'failed', durationMs: run.error.durationMs });
          continue;
        }

        const { result } = run;
        errorCount += result.errorCount;
        warningCount += result.warningCount;
        if (result.success) {
          items.push({ ...base, status: 'passed', durationMs: result.durationMs, exitCode: 0 });
        } else {
          this.countFailure();
          failedExitCode ??= result.exitCode;
          logger.error(
            new NonZeroExitError(`${item.name} exited with code ${result.exitCode}`, {
              exitCode: result.exitCode,
            }),
          );
          items.push({
            ...base,
            status: 'failed',
            durationMs: result.durationMs,
            exitCode: result.exitCode,
          });
        }
      }

      const failed = items.filter((i) => i.status === 'failed');
      const applicable = items.filter((i) => i.status !== 'not_applicable').length;
      const passed = items.filter((i) => i.status === 'passed').length;
      const outcome = {
        action: 'check' as const,
        kind,
        items,
        passed,
        applicable,
        total: items.length,
        durationMs: elapsed(),
      };

      if (failed.length === 0) {
        return {
          ...outcome,
          success: true,
          summary: `All checks passed (${passed}/${applicable})`,
        };
      }

      await metrics.save();
      const message = `${failed.map((i) => i.name).join(', ')} failed`;
      return {
        ...outcome,
        success: false,
        summary: `${passed}/${applicable} checks passed; ${message}`,
        failure: { step: 'check', message, exitCode: failedExitCode, errorCount, warningCount },
      };
    });
  }

  distribute(
    profile: BuildProfile,
    options: ActionOptions & { rebuild?: boolean } = {},
  ): Promise<DistributeOutcome> {
    const params = { profile, rebuild: options.rebuild ?? false };
    return this.track<DistributeOutcome>('distribute', params, async (elapsed) => {
      const { config, paths, logger } = this.deps;
      const base = { action: 'distribute' as const, profile };

      let artifact = options.rebuild ? undefined : this.builds.get(profile);
      let build: BuildOutcome | undefined;
      if (!artifact) {
        logger.info(`No ${profile} build in this session, building first`);
        build = await this.build(profile, [], { signal: options.signal });
        if (!build.success || !build.artifact) {
          return {
            ...base,
            build,
            success: false,
            summary: `Distribution aborted: ${build.summary}`,
            durationMs: elapsed(),
            failure: build.failure,
          };
        }
        artifact = build.artifact;
      }

      const staged = path.join(paths.dist, config.distribution.artifact);
      try {
        await this.stage(artifact.path, staged);
      } catch (staging) {
        if (!(staging instanceof FilesystemError)) throw staging;
        logger.error(staging);
        const failure = await this.recordFailure('staging', staging.message, {
          errorCount: 0,
          warningCount: 0,
        });
        return {
          ...base,
          build,
          success: false,
          summary: staging.message,
          durationMs: elapsed(),
          failure,
        };
      }

      const fingerprint = await fingerprintFile(staged);
      const manifest: DistributionManifest = {
        name: config.project.name,
        version: config.project.version,
        profile,
        build_date: this.clock().toISOString(),
        binary_hash: fingerprint.sha256,
        binary_size: fingerprint.sizeBytes,
      };
      const manifestPath = path.join(paths.dist, config.distribution.manifest);
      await writeManifest(manifestPath, manifest);

      return {
        ...base,
        build,
        success: true,
        summary: `Staged ${profile} artifact to ${paths.dist} (${fingerprint.sizeBytes} bytes)`,
        durationMs: elapsed(),
        stagedArtifact: staged,
        manifest,
        manifestPath,
      };
    });
  }

  clean(
    scope: CleanScope,
    options: ActionOptions & { resetMetrics?: boolean } = {},
  ): Promise<CleanOutcome> {
    const params = { scope, resetMetrics: options.resetMetrics ?? false };
    return this.track<CleanOutcome>('clean', params, async (elapsed) => {
      const { config, paths, cache, metrics } = this.deps;
      const base = { action: 'clean' as const, scope };
      const removed: string[] = [];

      const targetExisted = await pathExists(paths.target);
      const run = await this.runStep(config.toolchain.clean, [], options);
      const step = await this.settle('clean', run, 'Clean failed');
      if (!step.ok) {
        return {
          ...base,
          success: false,
          summary: step.failure.message,
          durationMs: elapsed(),
          removed,
          metricsReset: false,
          failure: step.failure,
        };
      }
      if (targetExisted && !(await pathExists(paths.target))) {
        removed.push(paths.target);
      }
      this.builds.clear();

      if (scope === 'full') {
        if (await cache.invalidateAll()) {
          removed.push(cache.dir);
        }
        if (await pathExists(paths.dist)) {
          await remove(paths.dist);
          removed.push(paths.dist);
        }
      }

      const metricsReset = options.resetMetrics ?? false;
      if (metricsReset) {
        metrics.reset();
        await metrics.save();
      }

      return {
        ...base,
        success: true,
        summary:
          removed.length > 0 ? `Removed ${removed.length} path(s)` : 'Nothing to remove',
        durationMs: elapsed(),
        removed,
        metricsReset,
      };
    });
  }

  /**
   * Read-only environment and project report. Runs probes directly, so only
   * `diagnosticsRun` changes in the session counters.
   */
  diagnose(): Promise<DiagnoseOutcome> {
    return this.track<DiagnoseOutcome>('diagnose', {}, async (elapsed) => {
      const { config, paths, metrics, session, probe } = this.deps;
      session.diagnosticsRun++;

      const tools: ToolStatus[] = [];
      for (const tool of config.toolchain.tools) {
        const program = parseCommand(tool.command).bin;
        const located = await probe.locate(program);
        const status: ToolStatus = { label: tool.label, program, path: located };
        if (located) {
          const captured = await probe.capture(tool.command, paths.root);
          if (captured.exitCode === 0) {
            status.version = captured.output.split(/\r?\n/)[0];
          }
        }
        tools.push(status);
      }

      const prerequisite = config.toolchain.prerequisite
        ? await this.probePrerequisite(config.toolchain.prerequisite)
        : undefined;

      const descriptorPresent = await pathExists(paths.descriptor);
      const history = metrics.snapshot();
      const score = this.health.compute(session.errors, history.total_errors, descriptorPresent);

      const report: DiagnosticReport = {
        platform: describePlatform(),
        tools,
        prerequisite,
        project: {
          root: paths.root,
          descriptor: paths.descriptor,
          descriptorPresent,
          testFiles: await countFiles(paths.tests, config.project.testExtension),
          logFiles: (await listSessionLogs(paths.logs)).length,
        },
        session: {
          builds: session.builds,
          tests: session.tests,
          checks: session.checks,
          errors: session.errors,
          warnings: session.warnings,
          commandsRun: session.commandsRun,
          cacheHits: session.cacheHits,
          diagnosticsRun: session.diagnosticsRun,
          durationMs: sessionDurationMs(session, this.clock()),
        },
        history: {
          totalBuilds: history.total_builds,
          totalTests: history.total_tests,
          totalErrors: history.total_errors,
          averageBuildSeconds: metrics.rollingAverage('build', ROLLING_WINDOW),
          averageTestSeconds: metrics.rollingAverage('test', ROLLING_WINDOW),
          lastSuccess: history.last_success,
        },
        health: { ...score, tier: healthTier(score.score) },
      };

      return {
        action: 'diagnose' as const,
        success: true,
        summary: `Health ${score.score}/100 (${report.health.tier})`,
        durationMs: elapsed(),
        report,
      };
    });
  }

  /**
   * Wraps an action with start/finish events. On interruption the metrics of
   * completed steps are saved before the error propagates.
   */
  private async track<T extends ActionOutcome>(
    action: ActionName,
    params: Record<string, unknown>,
    work: (elapsed: () => number) => Promise<T>,
  ): Promise<T> {
    const { logger, session, metrics } = this.deps;
    const started = Date.now();
    const elapsed = () => Date.now() - started;

    logger.log({
      type: 'ActionStarted',
      schemaVersion: 1,
      timestamp: this.clock().toISOString(),
      sessionId: session.sessionId,
      payload: { action, params },
    });

    let outcome: T;
    try {
      outcome = await work(elapsed);
    } catch (error) {
      if (error instanceof InterruptedError) {
        logger.warn(`${action} interrupted; saving metrics`);
        await metrics.save().catch((saveError: unknown) => {
          logger.error(
            saveError instanceof Error ? saveError : new Error(String(saveError)),
            'Could not save metrics after interruption',
          );
        });
      }
      throw error;
    }

    const finished: ActionFinished = {
      type: 'ActionFinished',
      schemaVersion: 1,
      timestamp: this.clock().toISOString(),
      sessionId: session.sessionId,
      payload: {
        action,
        success: outcome.success,
        durationMs: outcome.durationMs,
        failedStep: outcome.failure?.step,
      },
    };
    if (outcome.success) {
      logger.trace(finished, outcome.summary);
    } else {
      logger.log(finished);
      logger.warn(outcome.summary);
    }
    return outcome;
  }

  private async runStep(
    commandLine: string,
    extraArgs: string[],
    options: ActionOptions,
  ): Promise<StepRun> {
    const { runner, paths, onOutputLine } = this.deps;
    try {
      const result = await runner.executeLine(commandLine, extraArgs, paths.root, {
        signal: options.signal,
        onLine: onOutputLine ? (line) => onOutputLine(line.text) : undefined,
      });
      return { kind: 'exited', result };
    } catch (error) {
      if (error instanceof ExecutionError) {
        return { kind: 'spawn-failed', error };
      }
      throw error;
    }
  }

  /**
   * Turns a spawn failure or non-zero exit into a recorded failure.
   */
  private async settle(step: FailureStep, run: StepRun, label: string): Promise<SettledStep> {
    const { logger } = this.deps;
    if (run.kind === 'spawn-failed') {
      logger.error(run.error, label);
      const failure = await this.recordFailure(step, `${label}: ${run.error.message}`, {
        errorCount: 0,
        warningCount: 0,
      });
      return { ok: false, failure };
    }

    const { result } = run;
    if (result.success) {
      return { ok: true, result };
    }
    logger.error(
      new NonZeroExitError(`${label} with exit code ${result.exitCode}`, {
        exitCode: result.exitCode,
        details: { errorCount: result.errorCount, warningCount: result.warningCount },
      }),
    );
    const failure = await this.recordFailure(step, `${label} with exit code ${result.exitCode}`, {
      exitCode: result.exitCode,
      errorCount: result.errorCount,
      warningCount: result.warningCount,
    });
    return { ok: false, failure };
  }

  private countFailure(): void {
    this.deps.session.errors++;
    this.deps.metrics.recordError();
  }

  private async recordFailure(
    step: FailureStep,
    message: string,
    counts: { exitCode?: number; errorCount: number; warningCount: number },
  ): Promise<ActionFailure> {
    this.countFailure();
    await this.deps.metrics.save();
    return { step, message, ...counts };
  }

  private async ensurePrerequisite(
    signal: AbortSignal | undefined,
  ): Promise<{ status: PrerequisiteStatus; failure?: ActionFailure }> {
    const { config, cache, logger } = this.deps;
    const prerequisite = config.toolchain.prerequisite;
    if (!prerequisite) {
      return { status: 'skipped' };
    }

    if (this.extended && (await cache.check(prerequisite.cacheKey))) {
      logger.debug(`${prerequisite.name}: cached`);
      return { status: 'cached' };
    }

    const probeRun = await this.runStep(prerequisite.check, [], { signal });
    if (probeRun.kind === 'spawn-failed') {
      logger.error(probeRun.error, `${prerequisite.name}: probe could not start`);
      const failure = await this.recordFailure(
        'prerequisite',
        `${prerequisite.name}: ${probeRun.error.message}`,
        { errorCount: 0, warningCount: 0 },
      );
      return { status: 'failed', failure };
    }

    if (this.prerequisiteHolds(prerequisite, probeRun.result)) {
      await this.rememberPrerequisite(prerequisite);
      return { status: 'satisfied' };
    }

    if (!prerequisite.install) {
      const failure = await this.recordFailure(
        'prerequisite',
        `${prerequisite.name} is not available`,
        { errorCount: 0, warningCount: 0 },
      );
      return { status: 'failed', failure };
    }

    logger.info(`${prerequisite.name} missing, installing`);
    const installRun = await this.runStep(prerequisite.install, [], { signal });
    const label = `Installing ${prerequisite.name} failed`;
    const step = await this.settle('prerequisite', installRun, label);
    if (!step.ok) {
      return { status: 'failed', failure: step.failure };
    }
    await this.rememberPrerequisite(prerequisite);
    return { status: 'installed' };
  }

  private prerequisiteHolds(prerequisite: Prerequisite, result: CommandResult): boolean {
    const { expect } = prerequisite;
    return result.success && (expect === null || result.output.includes(expect));
  }

  private async rememberPrerequisite(prerequisite: Prerequisite): Promise<void> {
    if (this.extended) {
      await this.deps.cache.set(prerequisite.cacheKey);
    }
  }

  private async probePrerequisite(
    prerequisite: Prerequisite,
  ): Promise<DiagnosticReport['prerequisite']> {
    const captured = await this.deps.probe.capture(prerequisite.check, this.deps.paths.root);
    if (captured.error) {
      return { name: prerequisite.name, satisfied: false, detail: captured.error };
    }
    if (captured.exitCode !== 0) {
      return {
        name: prerequisite.name,
        satisfied: false,
        detail: `probe exited with code ${captured.exitCode}`,
      };
    }
    if (prerequisite.expect !== null && !captured.output.includes(prerequisite.expect)) {
      return {
        name: prerequisite.name,
        satisfied: false,
        detail: `"${prerequisite.expect}" not listed`,
      };
    }
    return { name: prerequisite.name, satisfied: true, detail: 'installed' };
  }

  /**
   * Lays out the distribution directory. The previous manifest goes first, so a
   * staging failure never leaves one describing a binary that was overwritten.
   */
  private async stage(source: string, staged: string): Promise<void> {
    const { config, paths, logger } = this.deps;
    try {
      await remove(path.join(paths.dist, config.distribution.manifest));
      for (const dir of config.distribution.directories) {
        await ensureDir(path.join(paths.dist, dir));
      }
      await ensureDir(path.dirname(staged));
      await copy(source, staged);

      for (const file of config.distribution.files) {
        const from = resolveFrom(paths.root, file.source);
        if (!(await pathExists(from))) {
          if (file.optional) {
            logger.debug(`Optional file ${file.source} not found, skipping`);
            continue;
          }
          throw new FilesystemError(`Required distribution file not found: ${from}`, {
            details: { source: from },
          });
        }
        await copy(from, path.join(paths.dist, file.target));
      }
    } catch (error) {
      if (error instanceof FilesystemError) throw error;
      throw new FilesystemError(
        `Staging failed: ${errorMessage(error)}`,
        { cause: error, details: { source, staged } },
      );
    }
  }
}

async function countFiles(dir: string, extension: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') return 0;
    throw error;
  }
  let total = 0;
  for (const entry of entries) {
    if (entry.isDirectory()) {
      total += await countFiles(path.join(dir, entry.name), extension);
    } else if (entry.isFile() && entry.name.endsWith(extension)) {
      total++;
    }
  }
  return total;
}
