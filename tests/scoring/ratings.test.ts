import { describe, it, expect } from 'vitest';
import {
  evaluateWordCount,
  isBestQuartile,
  rateMetric,
  summarizeRatings,
} from '../../src/scoring/ratings.js';
import type {
  Direction,
  MetricEvaluation,
  PercentileRating,
  ThresholdEntry,
} from '../../src/types/models.js';

const higher: ThresholdEntry = {
  excellent: 70,
  good: 50,
  acceptable: 30,
  poor: 10,
  direction: 'higher_better',
};

const lower: ThresholdEntry = {
  excellent: 10,
  good: 15,
  acceptable: 20,
  poor: 25,
  direction: 'lower_better',
};

function ev(rating: PercentileRating, direction: Direction): MetricEvaluation {
  return { value: 0, rating, direction, feedback: null };
}

describe('rateMetric', () => {
  it('should bucket higher_better values by descending thresholds', () => {
    expect(rateMetric(80, higher).rating).toBe('P75');
    expect(rateMetric(50, higher).rating).toBe('P50');
    expect(rateMetric(35, higher).rating).toBe('P25');
    expect(rateMetric(15, higher).rating).toBe('P10');
    expect(rateMetric(5, higher).rating).toBe('BELOW_P10');
  });

  it('should treat a value equal to a bound as reaching it', () => {
    expect(rateMetric(70, higher).rating).toBe('P75');
    expect(rateMetric(10, higher).rating).toBe('P10');
    expect(rateMetric(10, lower).rating).toBe('P25');
    expect(rateMetric(25, lower).rating).toBe('P90');
  });

  it('should bucket lower_better values by ascending thresholds', () => {
    expect(rateMetric(8, lower).rating).toBe('P25');
    expect(rateMetric(15, lower).rating).toBe('P50');
    expect(rateMetric(18, lower).rating).toBe('P75');
    expect(rateMetric(22, lower).rating).toBe('P90');
    expect(rateMetric(30, lower).rating).toBe('BEYOND_P90');
  });

  it('should carry value and direction', () => {
    expect(rateMetric(80, higher)).toEqual({
      value: 80,
      rating: 'P75',
      direction: 'higher_better',
      feedback: null,
    });
  });

  it('should give feedback toward the median for low higher_better values', () => {
    expect(rateMetric(15, higher).feedback).toBe(
      'Deviates from typical PLS patterns. Consider increasing from 15.0 to >50.0 (median)'
    );
    expect(rateMetric(5, higher).feedback).toBe(
      'Deviates from typical PLS patterns. Consider increasing from 5.0 to >50.0 (median)'
    );
  });

  it('should give feedback toward the median for high lower_better values', () => {
    expect(rateMetric(22, lower).feedback).toBe(
      'Deviates from typical PLS patterns. Consider reducing from 22.0 to <15.0 (median)'
    );
    expect(rateMetric(30.26, lower).feedback).toBe(
      'Deviates from typical PLS patterns. Consider reducing from 30.3 to <15.0 (median)'
    );
  });

  it('should give no feedback inside the median-or-better range', () => {
    expect(rateMetric(35, higher).feedback).toBeNull();
    expect(rateMetric(18, lower).feedback).toBeNull();
  });
});

describe('isBestQuartile', () => {
  it('should use P75 for higher_better and P25 for lower_better', () => {
    expect(isBestQuartile(ev('P75', 'higher_better'))).toBe(true);
    expect(isBestQuartile(ev('P25', 'higher_better'))).toBe(false);
    expect(isBestQuartile(ev('P25', 'lower_better'))).toBe(true);
    expect(isBestQuartile(ev('P75', 'lower_better'))).toBe(false);
  });
});

describe('evaluateWordCount', () => {
  it('should accept counts up to the limit', () => {
    expect(evaluateWordCount(850)).toEqual({
      wordCount: 850,
      limit: 850,
      status: 'within_limit',
      message: 'Word count: 850 ✓ WITHIN LIMIT (≤850 words)',
    });
  });

  it('should flag counts over the limit', () => {
    expect(evaluateWordCount(851)).toEqual({
      wordCount: 851,
      limit: 850,
      status: 'over_limit',
      message: 'Word count: 851 ✗ OVER LIMIT (≤850 words)',
    });
  });

  it('should honour a custom limit', () => {
    expect(evaluateWordCount(120, 100).status).toBe('over_limit');
  });
});

describe('summarizeRatings', () => {
  it('should report no evaluation for an empty list', () => {
    const summary = summarizeRatings([]);

    expect(summary.totalEvaluated).toBe(0);
    expect(summary.bestQuartileRate).toBe(0);
    expect(summary.overallAssessment).toBe('NO EVALUATION POSSIBLE');
    expect(summary.percentages.P25).toBe(0);
  });

  it('should rate 60% best quartile as highly conforming', () => {
    const summary = summarizeRatings([
      ev('P75', 'higher_better'),
      ev('P25', 'lower_better'),
      ev('P25', 'lower_better'),
      ev('P90', 'lower_better'),
      ev('BELOW_P10', 'higher_better'),
    ]);

    expect(summary.bestQuartileCount).toBe(3);
    expect(summary.bestQuartileRate).toBe(60);
    expect(summary.overallAssessment).toBe('HIGHLY CONFORMS TO TYPICAL PLS PATTERNS');
  });

  it('should not count a higher_better P25 as best quartile', () => {
    const summary = summarizeRatings([
      ev('P25', 'higher_better'),
      ev('P25', 'higher_better'),
      ev('P25', 'lower_better'),
    ]);

    expect(summary.counts.P25).toBe(3);
    expect(summary.bestQuartileCount).toBe(1);
    expect(summary.bestQuartileRate).toBeCloseTo(33.333, 2);
    expect(summary.overallAssessment).toBe('DEVIATES FROM TYPICAL PLS PATTERNS');
  });

  it('should rate 70% best-or-median as good conformity', () => {
    const summary = summarizeRatings([
      ...Array.from({ length: 5 }, () => ev('P75', 'higher_better')),
      ev('P50', 'higher_better'),
      ev('P50', 'lower_better'),
      ev('P10', 'higher_better'),
      ev('P90', 'lower_better'),
      ev('P75', 'lower_better'),
    ]);

    expect(summary.bestQuartileRate).toBe(50);
    expect(summary.medianCount).toBe(2);
    expect(summary.overallAssessment).toBe('GOOD CONFORMITY WITH PLS PATTERNS');
  });

  it('should rate 50% best-or-median as moderate conformity', () => {
    const summary = summarizeRatings([
      ev('P25', 'lower_better'),
      ev('P50', 'higher_better'),
      ev('P90', 'lower_better'),
      ev('P90', 'lower_better'),
    ]);

    expect(summary.overallAssessment).toBe('MODERATE CONFORMITY WITH PLS PATTERNS');
    expect(summary.counts).toEqual({
      P25: 1,
      P50: 1,
      P75: 0,
      P90: 2,
      P10: 0,
      BEYOND_P90: 0,
      BELOW_P10: 0,
    });
    expect(summary.percentages.P90).toBe(50);
    expect(summary.percentages.P50).toBe(25);
  });

  it('should rate anything lower as deviating', () => {
    const summary = summarizeRatings([
      ev('P50', 'higher_better'),
      ev('BEYOND_P90', 'lower_better'),
      ev('P90', 'lower_better'),
    ]);

    expect(summary.overallAssessment).toBe('DEVIATES FROM TYPICAL PLS PATTERNS');
  });
});
