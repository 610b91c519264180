import { describe, it, expect } from 'vitest';
import { cosineSimilarity, findSimilarPatterns, scorePatternSimilarity } from '../similarity.js';
import { ConfigError } from '../../lib/errors.js';
import { makePatternRecord } from '../../__tests__/fixtures.js';

describe('cosineSimilarity', () => {
  it('is 1 for vectors that differ only in magnitude', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
  });

  it('is −1 for opposite vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [-1, -2])).toBeCloseTo(-1, 12);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is null when either vector has zero norm', () => {
    expect(cosineSimilarity([0, 0], [1, 2])).toBeNull();
  });
});

describe('scorePatternSimilarity', () => {
  // Centred population: z-scores are proportional across both features
  const records = [
    makePatternRecord('2024-01-10', { trend: 1, volatility: 10 }),
    makePatternRecord('2024-02-10', { trend: 2, volatility: 20 }),
    makePatternRecord('2024-03-10', { trend: -1, volatility: -10 }),
    makePatternRecord('2024-04-10', { trend: -2, volatility: -20 }),
  ];

  it('scores every record except the target', () => {
    const scores = scorePatternSimilarity(records, 0);
    expect(scores.map((s) => s.index)).toEqual([1, 2, 3]);
  });

  it('treats a uniformly scaled vector as identical after normalization', () => {
    const [scaled, opposite] = scorePatternSimilarity(records, 0);

    expect(scaled.value.status).toBe('defined');
    if (scaled.value.status === 'defined') {
      expect(scaled.value.similarity).toBeCloseTo(1, 12);
      expect(scaled.value.sharedDimensions).toBe(2);
    }
    expect(opposite.value.status === 'defined' && opposite.value.similarity).toBeCloseTo(-1, 12);
  });

  it('leaves pairs with too few shared dimensions undefined', () => {
    const population = [
      makePatternRecord('2024-01-10', { trend: 1, volatility: 10 }),
      makePatternRecord('2024-02-10', { trend: 2 }),
      makePatternRecord('2024-03-10', { trend: -3, volatility: -10 }),
    ];
    const [partial] = scorePatternSimilarity(population, 0);

    expect(partial.value).toEqual({ status: 'undefined', reason: 'too-few-shared-dimensions', sharedDimensions: 1 });
  });

  it('leaves a candidate at the population mean undefined', () => {
    const population = [
      makePatternRecord('2024-01-10', { trend: 1, volatility: 10 }),
      makePatternRecord('2024-02-10', { trend: -1, volatility: -10 }),
      makePatternRecord('2024-03-10', { trend: 0, volatility: 0 }),
    ];
    const scores = scorePatternSimilarity(population, 0);

    expect(scores[1].value).toEqual({ status: 'undefined', reason: 'zero-norm', sharedDimensions: 2 });
  });

  it('rejects a target outside the population', () => {
    expect(() => scorePatternSimilarity(records, 4)).toThrow(RangeError);
    expect(() => scorePatternSimilarity(records, -1)).toThrow(RangeError);
  });
});

describe('findSimilarPatterns', () => {
  const records = [
    makePatternRecord('2024-05-10', { trend: 1, volatility: 10 }, {}, 'AAA'),
    makePatternRecord('2024-03-01', { trend: 2, volatility: 20 }, {}, 'BBB'),
    makePatternRecord('2024-02-01', { trend: 2, volatility: 20 }, {}, 'CCC'),
    makePatternRecord('2024-01-15', { trend: -5, volatility: -50 }, {}, 'DDD'),
  ];

  it('returns neighbours above the floor, ties broken by earlier ex-date', () => {
    const matches = findSimilarPatterns(records, 0);

    expect(matches.map((m) => m.instrumentId)).toEqual(['CCC', 'BBB']);
    expect(matches[0]).toMatchObject({ index: 2, exDate: '2024-02-01', sharedDimensions: 2 });
    expect(matches[0].similarity).toBeCloseTo(1, 12);
    expect(matches[0].similarity).toBe(matches[1].similarity);
  });

  it('caps the result at topK', () => {
    expect(findSimilarPatterns(records, 0, { topK: 1 }).map((m) => m.index)).toEqual([2]);
  });

  it('includes dissimilar events once the floor allows them', () => {
    const matches = findSimilarPatterns(records, 0, { similarityFloor: -1 });
    expect(matches.map((m) => m.instrumentId)).toEqual(['CCC', 'BBB', 'DDD']);
  });

  it('never returns the target itself', () => {
    const matches = findSimilarPatterns(records, 1, { similarityFloor: -1, topK: 10 });
    expect(matches.some((m) => m.index === 1)).toBe(false);
    expect(matches).toHaveLength(3);
  });

  it('rejects a non-positive topK', () => {
    expect(() => findSimilarPatterns(records, 0, { topK: 0 })).toThrow(ConfigError);
  });
});
