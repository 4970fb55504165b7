export interface TestTally {
  passed?: number;
  failed?: number;
}

const SUMMARY_MARKER = 'test result:';

/**
 * Sums the `N passed` / `N failed` figures of every `test result:` summary line.
 * Both stay undefined when the output has no summary line.
 */
export function parseTestResults(output: string): TestTally {
  let passed: number | undefined;
  let failed: number | undefined;

  for (const line of output.split(/\r?\n/)) {
    if (!line.includes(SUMMARY_MARKER)) continue;

    const passedMatch = /(\d+) passed/.exec(line);
    if (passedMatch) passed = (passed ?? 0) + Number(passedMatch[1]);

    const failedMatch = /(\d+) failed/.exec(line);
    if (failedMatch) failed = (failed ?? 0) + Number(failedMatch[1]);
  }

  return { passed, failed };
}
