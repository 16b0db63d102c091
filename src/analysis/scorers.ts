import {
  ActionSample, ActivitySegment, InteractionSample, MovementSample, SpeedSample, TimingSample
} from '../types';
import { AnalysisConfig } from '../config/GuardConfig';
import { coefficientOfVariation, distance, intervals, normalizedEntropy, variance } from './stats';

/**
 * Feature scorers. Each reduces one buffer to a [0,1] sub-score plus the
 * pattern flags that contributed to it. Too few samples ⇒ score 0.
 */

export interface FeatureResult {
  score: number;
  flags: string[];
}

export interface ActionFrequencyResult extends FeatureResult {
  /** Actions per second across the buffer. */
  frequency: number;
}

export interface TimingResult extends FeatureResult {
  cv: number;
}

export interface MovementResult extends FeatureResult {
  peakSpeed: number;
}

function capped(score: number): number {
  return Math.min(1, score);
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function maxCount(counts: Map<string, number>): number {
  let max = 0;
  for (const c of counts.values()) max = Math.max(max, c);
  return max;
}

// ── Micro cadence ────────────────────────────────────────────────────

export function scoreActionFrequency(
  samples: ActionSample[],
  baselineFrequency: number,
  config: AnalysisConfig
): ActionFrequencyResult {
  if (samples.length < config.minSamples) return { score: 0, flags: [], frequency: 0 };

  const w = config.patternWeights;
  const timestamps = samples.map(s => s.timestamp);
  const span = timestamps[timestamps.length - 1] - timestamps[0];
  const frequency = (samples.length - 1) / Math.max(span, 1e-3);
  const flags: string[] = [];
  let score = 0;

  if (frequency > baselineFrequency * config.frequencyMultiplier) {
    flags.push('high_frequency');
    score += w.highFrequency;
  }

  if (variance(intervals(timestamps)) < config.timingVarianceEpsilon) {
    flags.push('regular_timing');
    score += w.regularTiming;
  }

  const n = config.ngramSize;
  const grams = new Map<string, number>();
  for (let i = 0; i + n <= samples.length; i++) {
    increment(grams, samples.slice(i, i + n).map(s => s.type).join('|'));
  }
  if (maxCount(grams) > config.ngramRepeatThreshold) {
    flags.push('repeated_sequence');
    score += w.repeatedSequence;
  }

  return { score: capped(score), flags, frequency };
}

export function scoreTimingConsistency(samples: TimingSample[], config: AnalysisConfig): TimingResult {
  if (samples.length < config.minSamples) return { score: 0, flags: [], cv: 0 };

  const cv = coefficientOfVariation(samples.map(s => s.interval));
  const flags: string[] = [];
  let score = 0;

  if (cv < config.lowCvThreshold) {
    flags.push('low_variation');
    score += config.patternWeights.lowVariation;
  } else if (cv > config.highCvThreshold) {
    flags.push('erratic_timing');
    score += config.patternWeights.erraticTiming;
  }

  return { score: capped(score), flags, cv };
}

function directionKey(dx: number, dy: number, dz: number, len: number): string {
  const r = (v: number) => Math.round((v / len) * 10) / 10;
  return `${r(dx)},${r(dy)},${r(dz)}`;
}

export function scoreMovement(samples: MovementSample[], config: AnalysisConfig): MovementResult {
  if (samples.length < config.minSamples) return { score: 0, flags: [], peakSpeed: 0 };

  const w = config.patternWeights;
  const flags: string[] = [];
  let score = 0;
  let peakSpeed = 0;
  let pairs = 0;
  let mismatched = 0;
  const directions: string[] = [];

  for (let i = 1; i < samples.length; i++) {
    const a = samples[i - 1];
    const b = samples[i];
    const dt = b.timestamp - a.timestamp;
    const len = distance(a.position, b.position);
    if (dt > 0) {
      const implied = len / dt;
      peakSpeed = Math.max(peakSpeed, implied);
      pairs++;
      // Reported velocity far below the distance actually covered.
      const reported = distance(b.velocity, { x: 0, y: 0, z: 0 });
      if (implied > reported * config.velocityMismatchRatio + config.velocityMismatchTolerance) mismatched++;
    }
    if (len > 1e-6) {
      directions.push(directionKey(
        b.position.x - a.position.x,
        b.position.y - a.position.y,
        b.position.z - a.position.z,
        len
      ));
    }
  }

  if (peakSpeed > config.maxSpeed) {
    flags.push('speed_exceeded');
    score += w.speedExceeded;
  }

  if (pairs > 0 && mismatched / pairs >= config.velocityMismatchShare) {
    flags.push('velocity_mismatch');
    score += w.velocityMismatch;
  }

  // Only windows that turn at least once count; a straight walk is not a pattern.
  const k = config.directionWindow;
  const windows = new Map<string, number>();
  for (let i = 0; i + k <= directions.length; i++) {
    const window = directions.slice(i, i + k);
    if (new Set(window).size < 2) continue;
    increment(windows, window.join(';'));
  }
  if (maxCount(windows) > config.directionRepeatThreshold) {
    flags.push('scripted_path');
    score += w.scriptedPath;
  }

  return { score: capped(score), flags, peakSpeed };
}

// ── Macro cadence ────────────────────────────────────────────────────

export function scoreSession(segments: ActivitySegment[], now: number, config: AnalysisConfig): FeatureResult {
  if (segments.length === 0) return { score: 0, flags: [] };

  const w = config.patternWeights;
  const flags: string[] = [];
  let score = 0;

  const last = segments[segments.length - 1];
  if (last.end - last.start > config.maxContinuousSessionSeconds) {
    flags.push('long_session');
    score += w.longSession;
  }

  const open = now - last.end <= config.sessionGapSeconds;
  const closed = (open ? segments.slice(0, -1) : segments)
    .map(s => s.end - s.start)
    .filter(d => d > 0);
  if (closed.length >= 3 && coefficientOfVariation(closed) < config.sessionUniformityCv) {
    flags.push('uniform_sessions');
    score += w.uniformSessions;
  }

  return { score: capped(score), flags };
}

export function scoreSequence(history: InteractionSample[], config: AnalysisConfig): FeatureResult {
  if (history.length < config.minSamples) return { score: 0, flags: [] };

  const transitions = new Map<string, number>();
  for (let i = 1; i < history.length; i++) {
    increment(transitions, `${history[i - 1].type}>${history[i].type}`);
  }

  const flags: string[] = [];
  let score = 0;

  if (normalizedEntropy(transitions) < config.lowEntropyThreshold) {
    flags.push('low_entropy');
    score += config.patternWeights.lowEntropy;
  }
  if (maxCount(transitions) / (history.length - 1) > config.dominantTransitionShare) {
    flags.push('dominant_transition');
    score += config.patternWeights.dominantTransition;
  }

  return { score: capped(score), flags };
}

export function scoreVelocity(history: SpeedSample[], config: AnalysisConfig): FeatureResult {
  if (history.length < config.minSamples) return { score: 0, flags: [] };

  const flags: string[] = [];
  let score = 0;

  const over = history.filter(s => s.speed > config.maxSpeed).length;
  if (over > 0) {
    flags.push('sustained_speed');
    score += Math.min(1, (over / history.length) * 2);
  }

  const moving = history.map(s => s.speed).filter(v => v > 0.1);
  if (moving.length >= config.minSamples && coefficientOfVariation(moving) < config.constantSpeedCv) {
    flags.push('constant_speed');
    score += config.patternWeights.constantSpeed;
  }

  return { score: capped(score), flags };
}
