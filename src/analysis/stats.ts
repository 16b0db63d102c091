import { Vector3 } from '../types';

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population variance. */
export function variance(values: number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) ** 2;
  return acc / values.length;
}

export function stddev(values: number[]): number {
  return Math.sqrt(variance(values));
}

/**
 * stddev / mean. Returns 0 when the mean is 0 (no spread to speak of).
 */
export function coefficientOfVariation(values: number[]): number {
  const m = mean(values);
  if (m === 0) return 0;
  return stddev(values) / m;
}

/** Differences between consecutive values. */
export function intervals(timestamps: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < timestamps.length; i++) {
    out.push(timestamps[i] - timestamps[i - 1]);
  }
  return out;
}

export function distance(a: Vector3, b: Vector3): number {
  return Math.sqrt((b.x - a.x) ** 2 + (b.y - a.y) ** 2 + (b.z - a.z) ** 2);
}

/**
 * Shannon entropy of a frequency table, normalized to [0,1] by log2 of the
 * number of distinct keys. A single key has entropy 0.
 */
export function normalizedEntropy(counts: Map<string, number>): number {
  if (counts.size <= 1) return 0;
  let total = 0;
  for (const c of counts.values()) total += c;
  let h = 0;
  for (const c of counts.values()) {
    const p = c / total;
    h -= p * Math.log2(p);
  }
  return h / Math.log2(counts.size);
}
