import chalk from 'chalk';
import type { DiagnosticReport, HealthTier } from '@kiln/core';
import { formatDuration } from './format';
import { formatTable } from './index';

const CHECKS = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

const TIER_COLORS: Record<HealthTier, (text: string) => string> = {
  excellent: chalk.green.bold,
  good: chalk.yellow.bold,
  attention: chalk.red.bold,
};

const RULE = '---------------------------------';

/**
 * Renders a diagnostic report as console lines.
 */
export function renderDoctorReport(report: DiagnosticReport): string[] {
  const lines: string[] = [chalk.bold('Kiln Environment Checkup'), RULE];

  lines.push(chalk.bold('System Environment'));
  lines.push(`${CHECKS.OK} Platform: ${report.platform}`);
  if (report.tools.length > 0) {
    lines.push(
      formatTable(
        report.tools.map((tool) => ({
          Tool: tool.label,
          Program: tool.program,
          Location: tool.path ?? 'not found',
          Version: tool.version ?? '-',
        })),
      ),
    );
  }
  for (const tool of report.tools) {
    if (!tool.path) {
      lines.push(`${CHECKS.FAIL} ${tool.program} not found in PATH.`);
    }
  }
  if (report.prerequisite) {
    const { name, satisfied, detail } = report.prerequisite;
    lines.push(`${satisfied ? CHECKS.OK : CHECKS.WARN} Prerequisite ${name}: ${detail}`);
  }

  lines.push('', chalk.bold('Project Status'));
  lines.push(`  Root: ${report.project.root}`);
  lines.push(
    report.project.descriptorPresent
      ? `${CHECKS.OK} ${report.project.descriptor} present`
      : `${CHECKS.FAIL} ${report.project.descriptor} missing`,
  );
  lines.push(`  Test files: ${report.project.testFiles}`);
  lines.push(`  Session logs: ${report.project.logFiles}`);

  const { session } = report;
  lines.push('', chalk.bold('This Session'));
  lines.push(
    `  Builds ${session.builds}, tests ${session.tests}, checks ${session.checks}, ` +
      `commands ${session.commandsRun}, cache hits ${session.cacheHits}`,
  );
  lines.push(`  Errors ${session.errors}, warnings ${session.warnings}`);
  lines.push(`  Running for ${formatDuration(session.durationMs)}`);

  const { history } = report;
  lines.push('', chalk.bold('History'));
  lines.push(
    `  Builds ${history.totalBuilds}, tests ${history.totalTests}, errors ${history.totalErrors}`,
  );
  if (history.averageBuildSeconds !== undefined) {
    lines.push(`  Average build: ${history.averageBuildSeconds.toFixed(1)}s`);
  }
  if (history.averageTestSeconds !== undefined) {
    lines.push(`  Average test run: ${history.averageTestSeconds.toFixed(1)}s`);
  }
  lines.push(`  Last success: ${history.lastSuccess ?? 'never'}`);

  lines.push(RULE);
  const { health } = report;
  lines.push(TIER_COLORS[health.tier](`Health ${health.score}/100 (${health.tier})`));
  for (const issue of health.issues) {
    lines.push(`${CHECKS.WARN} ${issue}`);
  }

  return lines;
}
