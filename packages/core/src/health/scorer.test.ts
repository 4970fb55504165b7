import { describe, it, expect } from 'vitest';
import { HealthScorer, healthTier } from './scorer';

describe('HealthScorer', () => {
  const scorer = new HealthScorer();

  it('scores a clean project at 100', () => {
    expect(scorer.compute(0, 0, true)).toEqual({ score: 100, issues: [] });
  });

  it('deducts exactly 20 for session errors', () => {
    const clean = scorer.compute(0, 3, true).score;
    const withErrors = scorer.compute(1, 3, true).score;

    expect(clean - withErrors).toBe(20);
  });

  it('only deducts for historical errors above ten', () => {
    expect(scorer.compute(0, 10, true).score).toBe(100);
    expect(scorer.compute(0, 11, true)).toEqual({
      score: 90,
      issues: ['elevated historical error count'],
    });
  });

  it('applies every deduction in order', () => {
    expect(scorer.compute(5, 50, false)).toEqual({
      score: 40,
      issues: ['session errors', 'elevated historical error count', 'missing project descriptor'],
    });
  });

  it('keeps scores within bounds', () => {
    for (const [session, history, present] of [
      [0, 0, true],
      [1, 0, false],
      [100, 1000, false],
    ] as const) {
      const { score } = scorer.compute(session, history, present);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(100);
    }
  });
});

describe('healthTier', () => {
  it('maps scores to tiers', () => {
    expect(healthTier(100)).toBe('excellent');
    expect(healthTier(80)).toBe('excellent');
    expect(healthTier(79)).toBe('good');
    expect(healthTier(60)).toBe('good');
    expect(healthTier(59)).toBe('attention');
    expect(healthTier(0)).toBe('attention');
  });
});
