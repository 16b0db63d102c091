import { BehaviorAnalysis, BehaviorProfile, FeatureScores, Vector3 } from '../types';
import { AnalysisConfig } from '../config/GuardConfig';
import { distance } from './stats';

export function emptyFeatureScores(): FeatureScores {
  return { action: 0, timing: 0, movement: 0, session: 0, sequence: 0, velocity: 0 };
}

export function createBehaviorProfile(subjectId: string, now: number, config: AnalysisConfig): BehaviorProfile {
  return {
    subjectId,
    createdAt: now,
    actionSamples: [],
    timingSamples: [],
    movementSamples: [],
    interactionHistory: [],
    speedHistory: [],
    activitySegments: [],
    baselineFrequency: config.initialBaselineFrequency,
    featureScores: emptyFeatureScores(),
    anomalyScore: 0,
    riskScore: 0,
    behaviorCategory: 'NORMAL',
    confidence: 1,
    sampleCount: 0,
    lastAnomalyEventAt: null
  };
}

/**
 * Analysis of a subject nobody has seen yet. Matches a freshly created profile.
 */
export function freshAnalysis(): BehaviorAnalysis {
  return {
    riskScore: 0,
    anomalyScore: 0,
    behaviorCategory: 'NORMAL',
    confidence: 1,
    sampleCount: 0
  };
}

export function analysisOf(profile: BehaviorProfile): BehaviorAnalysis {
  return {
    riskScore: profile.riskScore,
    anomalyScore: profile.anomalyScore,
    behaviorCategory: profile.behaviorCategory,
    confidence: profile.confidence,
    sampleCount: profile.sampleCount
  };
}

function touchActivity(profile: BehaviorProfile, now: number, gapSeconds: number): void {
  const last = profile.activitySegments[profile.activitySegments.length - 1];
  if (last && now - last.end <= gapSeconds) {
    last.end = Math.max(last.end, now);
  } else {
    profile.activitySegments.push({ start: now, end: now });
  }
}

export function recordActionSample(
  profile: BehaviorProfile,
  type: string,
  data: Record<string, unknown> | undefined,
  now: number,
  config: AnalysisConfig
): void {
  const previous = profile.actionSamples[profile.actionSamples.length - 1];
  if (previous) {
    profile.timingSamples.push({ interval: Math.max(0, now - previous.timestamp), timestamp: now });
  }
  profile.actionSamples.push(data ? { type, data, timestamp: now } : { type, timestamp: now });
  profile.interactionHistory.push({ type, timestamp: now });
  profile.sampleCount++;
  touchActivity(profile, now, config.sessionGapSeconds);
}

export function recordMovementSample(
  profile: BehaviorProfile,
  position: Vector3,
  velocity: Vector3,
  now: number,
  config: AnalysisConfig
): void {
  const previous = profile.movementSamples[profile.movementSamples.length - 1];
  if (previous) {
    const dt = now - previous.timestamp;
    if (dt > 0) {
      profile.speedHistory.push({ speed: distance(previous.position, position) / dt, timestamp: now });
    }
  }
  profile.movementSamples.push({
    position: { ...position },
    velocity: { ...velocity },
    timestamp: now
  });
  profile.sampleCount++;
  touchActivity(profile, now, config.sessionGapSeconds);
}

function dropOlderThan<T extends { timestamp: number }>(samples: T[], cutoff: number): void {
  let drop = 0;
  while (drop < samples.length && samples[drop].timestamp < cutoff) drop++;
  if (drop > 0) samples.splice(0, drop);
}

/**
 * Age out micro buffers (micro retention) and macro buffers (macro retention).
 */
export function pruneProfile(profile: BehaviorProfile, now: number, config: AnalysisConfig): void {
  const microCutoff = now - config.microRetentionSeconds;
  const macroCutoff = now - config.macroRetentionSeconds;
  dropOlderThan(profile.actionSamples, microCutoff);
  dropOlderThan(profile.timingSamples, microCutoff);
  dropOlderThan(profile.movementSamples, microCutoff);
  dropOlderThan(profile.interactionHistory, macroCutoff);
  dropOlderThan(profile.speedHistory, macroCutoff);

  let drop = 0;
  while (drop < profile.activitySegments.length && profile.activitySegments[drop].end < macroCutoff) drop++;
  if (drop > 0) profile.activitySegments.splice(0, drop);
}

/** Samples currently held in the micro buffers. */
export function bufferedSamples(profile: BehaviorProfile): number {
  return profile.actionSamples.length + profile.movementSamples.length;
}
