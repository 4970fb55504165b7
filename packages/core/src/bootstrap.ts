import { randomUUID } from 'crypto';
import {
  SessionEventLog,
  SessionLogger,
  createSessionStats,
  sessionDurationMs,
  type Config,
  type Logger,
  type SessionStats,
} from '@kiln/shared';
import { ClassifierRegistry, CommandRunner } from '@kiln/exec';
import { ResultCache } from './cache/result-cache';
import { ConfigLoader, type ResolvedPaths } from './config/loader';
import { MetricsStore, type MetricsLoadResult } from './metrics/store';
import { Orchestrator } from './orchestrator/orchestrator';
import { SystemToolProbe, type ToolProbe } from './probe/tool-probe';

export interface KilnOptions {
  cwd?: string;
  configPath?: string;
  overrides?: Record<string, unknown>;
  /** Console logger for operator-facing messages */
  echo?: Logger;
  /** Echo debug messages too */
  verbose?: boolean;
  /** Receives command output lines when `orchestrator.echoOutput` is on */
  onOutputLine?: (text: string) => void;
  probe?: ToolProbe;
  now?: () => Date;
}

export interface Kiln {
  config: Config;
  configPath: string | undefined;
  paths: ResolvedPaths;
  session: SessionStats;
  sessionLog: SessionEventLog;
  logger: Logger;
  runner: CommandRunner;
  cache: ResultCache;
  metrics: MetricsStore;
  metricsLoad: MetricsLoadResult;
  orchestrator: Orchestrator;
  /** Flushes metrics and cache writes and closes the session log. Safe to call twice. */
  shutdown(): Promise<void>;
}

/**
 * Loads configuration and persisted state and wires one session's components.
 */
export async function createKiln(options: KilnOptions = {}): Promise<Kiln> {
  const now = options.now ?? (() => new Date());
  const { config, configPath, paths } = ConfigLoader.load({
    cwd: options.cwd,
    configPath: options.configPath,
    overrides: options.overrides,
  });

  const startedAt = now();
  const session = createSessionStats(randomUUID(), startedAt);
  const sessionLog = SessionEventLog.open(paths.logs, startedAt, { now });
  const logger = new SessionLogger(sessionLog, {
    echo: options.echo,
    verbose: options.verbose,
  });

  logger.info(`Session ${session.sessionId} started in ${paths.root}`);
  logger.debug(`Configuration: ${configPath ?? 'defaults'}`);

  const metrics = new MetricsStore({
    path: paths.metrics,
    logger: logger.child({ component: 'metrics' }),
    sessionId: session.sessionId,
    now,
  });

  let metricsLoad: MetricsLoadResult;
  try {
    metricsLoad = await metrics.load();
  } catch (error) {
    await sessionLog.close();
    throw error;
  }

  const cache = new ResultCache({
    dir: paths.cache,
    session,
    logger: logger.child({ component: 'cache' }),
    now: () => now().getTime(),
  });

  const runner = new CommandRunner({
    sink: sessionLog,
    session,
    classifiers: ClassifierRegistry.fromVocabularies(config.toolchain.classifiers),
    logger,
  });

  const orchestrator = new Orchestrator({
    config,
    paths,
    runner,
    cache,
    metrics,
    session,
    logger,
    probe: options.probe ?? new SystemToolProbe(),
    onOutputLine: config.orchestrator.echoOutput ? options.onOutputLine : undefined,
    clock: now,
  });

  let closed = false;
  const shutdown = async () => {
    if (closed) return;
    closed = true;
    try {
      await metrics.save();
      await cache.flush();
    } finally {
      logger.info(
        `Session finished: ${session.commandsRun} command(s), ${session.errors} error(s), ` +
          `${session.warnings} warning(s) in ${(sessionDurationMs(session, now()) / 1000).toFixed(1)}s`,
      );
      await sessionLog.close();
    }
  };

  return {
    config,
    configPath,
    paths,
    session,
    sessionLog,
    logger,
    runner,
    cache,
    metrics,
    metricsLoad,
    orchestrator,
    shutdown,
  };
}
