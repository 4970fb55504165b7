import pc from 'picocolors';
import type {
  ActionOutcome,
  BuildOutcome,
  CheckOutcome,
  CleanOutcome,
  DistributeOutcome,
  TestOutcome,
} from '@kiln/core';
import { renderDoctorReport } from './doctor';
import { formatBytes, formatDuration } from './format';
import { formatTable } from './index';

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(outcome: ActionOutcome): void {
    if (this.isJson) {
      console.log(JSON.stringify(outcome, null, 2));
    } else {
      this.renderHuman(outcome);
    }
  }

  private renderHuman(outcome: ActionOutcome): void {
    switch (outcome.action) {
      case 'build':
        this.renderBuild(outcome);
        break;
      case 'test':
        this.renderTest(outcome);
        break;
      case 'check':
        this.renderCheck(outcome);
        break;
      case 'distribute':
        this.renderDistribute(outcome);
        break;
      case 'clean':
        this.renderClean(outcome);
        break;
      case 'diagnose':
        renderDoctorReport(outcome.report).forEach((line) => console.log(line));
        break;
    }

    const icon = outcome.success ? pc.green('✔') : pc.red('✖');
    const elapsed = pc.gray(`[${formatDuration(outcome.durationMs)}]`);
    console.log(`\n${icon} ${outcome.summary} ${elapsed}`);

    if (outcome.failure) {
      const { failure } = outcome;
      console.log(`  ${pc.bold('Failed step:')} ${failure.step}`);
      if (failure.exitCode !== undefined) {
        console.log(`  ${pc.bold('Exit code:')} ${failure.exitCode}`);
      }
      console.log(`  ${pc.bold('Reason:')} ${failure.message}`);
      if (failure.errorCount > 0 || failure.warningCount > 0) {
        console.log(
          `  ${failure.errorCount} error line(s), ${failure.warningCount} warning line(s)`,
        );
      }
    }
  }

  private renderBuild(outcome: BuildOutcome): void {
    console.log(pc.bold(`\nBuild (${outcome.profile})`));
    if (outcome.features.length > 0) {
      console.log(`  Features: ${outcome.features.join(', ')}`);
    }
    console.log(`  Prerequisite: ${outcome.prerequisite}`);
    if (outcome.artifact) {
      console.log(`  Artifact: ${outcome.artifact.path}`);
      console.log(`  Size: ${formatBytes(outcome.artifact.sizeBytes)}`);
      console.log(`  SHA-256: ${outcome.artifact.sha256}`);
    }
    if (outcome.warningCount > 0) {
      console.log(pc.yellow(`  ${outcome.warningCount} warning(s)`));
    }
  }

  private renderTest(outcome: TestOutcome): void {
    console.log(pc.bold(`\nTests (${outcome.kind}, ${outcome.parallel ? 'parallel' : 'serial'})`));
    if (outcome.passed !== undefined) console.log(`  Passed: ${outcome.passed}`);
    if (outcome.failed !== undefined) console.log(`  Failed: ${outcome.failed}`);
  }

  private renderCheck(outcome: CheckOutcome): void {
    console.log(pc.bold(`\nChecks (${outcome.kind})`));
    if (outcome.items.length === 0) {
      console.log(pc.gray('  No checks configured.'));
      return;
    }
    const rows = outcome.items.map((item) => ({
      Check: item.name,
      Kind: item.kind,
      Status: item.status === 'not_applicable' ? `skipped (${item.reason ?? 'n/a'})` : item.status,
      Time: formatDuration(item.durationMs),
    }));
    console.log(formatTable(rows));
  }

  private renderDistribute(outcome: DistributeOutcome): void {
    console.log(pc.bold(`\nDistribution (${outcome.profile})`));
    if (outcome.build) {
      console.log(`  Built first: ${outcome.build.summary}`);
    }
    if (outcome.stagedArtifact) console.log(`  Staged: ${outcome.stagedArtifact}`);
    if (outcome.manifestPath) console.log(`  Manifest: ${outcome.manifestPath}`);
    if (outcome.manifest) {
      const { manifest } = outcome;
      console.log(`    ${manifest.name} ${manifest.version} (${manifest.profile})`);
      console.log(`    ${formatBytes(manifest.binary_size)}, sha256 ${manifest.binary_hash}`);
    }
  }

  private renderClean(outcome: CleanOutcome): void {
    console.log(pc.bold(`\nClean (${outcome.scope})`));
    outcome.removed.forEach((p) => console.log(`  - ${p}`));
    if (outcome.metricsReset) {
      console.log('  Historical metrics reset.');
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
