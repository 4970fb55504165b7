import type { Command } from 'commander';
import { ConsoleLogger, UsageError } from '@kiln/shared';
import { createKiln, type ActionRequest, type Kiln } from '@kiln/core';
import { OutputRenderer } from '../output/renderer';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  config?: string;
  cwd?: string;
}

export function readGlobalOptions(program: Command): GlobalOptions {
  const opts = program.opts();
  return {
    json: opts.json === true,
    verbose: opts.verbose === true,
    config: typeof opts.config === 'string' ? opts.config : undefined,
    cwd: typeof opts.cwd === 'string' ? opts.cwd : undefined,
  };
}

/**
 * Narrows a raw option value to one of `choices`.
 */
export function parseChoice<T extends string>(
  value: unknown,
  choices: readonly T[],
  label: string,
): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new UsageError(
      `Invalid ${label} '${String(value)}'. Expected one of: ${choices.join(', ')}`,
    );
  }
  return match;
}

export function parseList(value: unknown): string[] {
  if (typeof value !== 'string') return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export interface SessionContext {
  kiln: Kiln;
  renderer: OutputRenderer;
  signal: AbortSignal;
}

/**
 * Opens a session, runs `work`, and shuts the session down.
 * Ctrl-C aborts the signal handed to `work`.
 */
export async function withSession<T>(
  program: Command,
  work: (context: SessionContext) => Promise<T>,
): Promise<T> {
  const globalOpts = readGlobalOptions(program);
  const renderer = new OutputRenderer(globalOpts.json);
  const kiln = await createKiln({
    cwd: globalOpts.cwd,
    configPath: globalOpts.config,
    echo: globalOpts.json ? undefined : new ConsoleLogger(),
    verbose: globalOpts.verbose,
    onOutputLine: globalOpts.json ? undefined : (text) => console.log(text),
  });

  const controller = new AbortController();
  const onInterrupt = () => {
    renderer.log('Interrupting...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    return await work({ kiln, renderer, signal: controller.signal });
  } finally {
    process.off('SIGINT', onInterrupt);
    await kiln.shutdown();
  }
}

/**
 * Dispatches one request, renders its outcome, and sets a failing exit code when it failed.
 */
export async function runAction(program: Command, request: ActionRequest): Promise<void> {
  await withSession(program, async ({ kiln, renderer, signal }) => {
    const outcome = await kiln.orchestrator.dispatch(request, { signal });
    renderer.render(outcome);
    if (!outcome.success) {
      process.exitCode = 1;
    }
  });
}
