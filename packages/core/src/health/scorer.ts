export interface HealthReport {
  /** 0-100 */
  score: number;
  /** Labels of the deductions applied, in evaluation order */
  issues: string[];
}

export type HealthTier = 'excellent' | 'good' | 'attention';

export const HEALTH_PENALTIES = {
  sessionErrors: 20,
  historicalErrors: 10,
  missingDescriptor: 30,
} as const;

/** Historical error totals above this count cost points. */
export const HISTORICAL_ERROR_THRESHOLD = 10;

export const HEALTH_ISSUES = {
  sessionErrors: 'session errors',
  historicalErrors: 'elevated historical error count',
  missingDescriptor: 'missing project descriptor',
} as const;

/**
 * Derives a project health score from session and historical error counts.
 */
export class HealthScorer {
  compute(
    sessionErrorCount: number,
    historicalErrorTotal: number,
    requiredMarkerPresent: boolean,
  ): HealthReport {
    let score = 100;
    const issues: string[] = [];

    if (sessionErrorCount > 0) {
      score -= HEALTH_PENALTIES.sessionErrors;
      issues.push(HEALTH_ISSUES.sessionErrors);
    }
    if (historicalErrorTotal > HISTORICAL_ERROR_THRESHOLD) {
      score -= HEALTH_PENALTIES.historicalErrors;
      issues.push(HEALTH_ISSUES.historicalErrors);
    }
    if (!requiredMarkerPresent) {
      score -= HEALTH_PENALTIES.missingDescriptor;
      issues.push(HEALTH_ISSUES.missingDescriptor);
    }

    return { score: Math.min(100, Math.max(0, score)), issues };
  }
}

export function healthTier(score: number): HealthTier {
  if (score >= 80) return 'excellent';
  if (score >= 60) return 'good';
  return 'attention';
}
