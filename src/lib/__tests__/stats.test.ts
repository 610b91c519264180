import { describe, it, expect } from 'vitest';
import {
  mean,
  median,
  pearson,
  percentile,
  populationStdDev,
  safeDivide,
  sampleStdDev,
} from '../stats.js';

describe('stats', () => {
  describe('mean / median / percentile', () => {
    it('returns null for empty input', () => {
      expect(mean([])).toBeNull();
      expect(median([])).toBeNull();
      expect(percentile([], 90)).toBeNull();
    });

    it('computes the arithmetic mean', () => {
      expect(mean([1, 2, 3, 4])).toBe(2.5);
    });

    it('takes the middle value of unsorted input', () => {
      expect(median([3, 1, 2])).toBe(2);
    });

    it('interpolates between order statistics', () => {
      expect(percentile([4, 1, 3, 2], 50)).toBe(2.5);
      expect(percentile([10, 20, 30, 40, 50], 90)).toBeCloseTo(46, 10);
      expect(percentile([10, 20, 30, 40, 50], 0)).toBe(10);
      expect(percentile([10, 20, 30, 40, 50], 100)).toBe(50);
    });
  });

  describe('standard deviation', () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];

    it('uses n − 1 for the sample estimate', () => {
      expect(sampleStdDev(values)).toBeCloseTo(Math.sqrt(32 / 7), 12);
      expect(sampleStdDev([1])).toBeNull();
    });

    it('uses n for the population estimate', () => {
      expect(populationStdDev(values)).toBe(2);
      expect(populationStdDev([])).toBeNull();
    });
  });

  describe('pearson', () => {
    it('is 1 for a perfect positive relation and −1 for a perfect negative one', () => {
      expect(pearson([1, 2, 3], [2, 4, 6])).toBe(1);
      expect(pearson([1, 2, 3], [3, 2, 1])).toBe(-1);
    });

    it('is null when either side has zero variance', () => {
      expect(pearson([1, 1, 1], [1, 2, 3])).toBeNull();
      expect(pearson([1, 2, 3], [5, 5, 5])).toBeNull();
    });

    it('matches a hand-computed value', () => {
      expect(pearson([1, 2, 3, 4], [1, 3, 2, 4])).toBeCloseTo(0.8, 12);
    });
  });

  it('safeDivide returns 0 for a non-positive denominator', () => {
    expect(safeDivide(3, 4)).toBe(0.75);
    expect(safeDivide(1, 0)).toBe(0);
  });
});
