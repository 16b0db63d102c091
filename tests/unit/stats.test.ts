import {
  coefficientOfVariation, distance, intervals, mean, normalizedEntropy, stddev, variance
} from '../../src/analysis/stats';
import { canonicalJson, formatSubjectId, round } from '../../src/utils';

describe('stats', () => {
  test('mean, variance and stddev are population statistics', () => {
    expect(mean([])).toBe(0);
    expect(mean([2, 4, 6])).toBe(4);
    expect(variance([2, 4, 4, 4, 5, 5, 7, 9])).toBe(4);
    expect(stddev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  test('coefficient of variation is zero for a zero mean', () => {
    expect(coefficientOfVariation([0, 0, 0])).toBe(0);
    expect(coefficientOfVariation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(0.4);
  });

  test('intervals and distance', () => {
    expect(intervals([1, 3, 6])).toEqual([2, 3]);
    expect(intervals([1])).toEqual([]);
    expect(distance({ x: 0, y: 0, z: 0 }, { x: 2, y: 3, z: 6 })).toBe(7);
  });

  test('normalized entropy', () => {
    expect(normalizedEntropy(new Map([['a', 5]]))).toBe(0);
    expect(normalizedEntropy(new Map([['a', 2], ['b', 2]]))).toBe(1);
    expect(normalizedEntropy(new Map([['a', 3], ['b', 1]]))).toBeCloseTo(0.8113);
  });
});

describe('utils', () => {
  test('formatSubjectId truncates long ids', () => {
    expect(formatSubjectId('player-123456789')).toBe('player-12345...');
    expect(formatSubjectId('p1')).toBe('p1');
    expect(formatSubjectId('')).toBe('(none)');
  });

  test('round and canonicalJson', () => {
    expect(round(0.123456)).toBe(0.123);
    expect(round(1.005, 1)).toBe(1);
    expect(canonicalJson({ b: 1, a: { d: 2, c: [3] } })).toBe('{"a":{"c":[3],"d":2},"b":1}');
  });
});
