import { BehaviorCategory, BehaviorProfile } from '../types';
import { AnalysisConfig } from '../config/GuardConfig';
import { clamp } from '../utils';
import {
  scoreActionFrequency, scoreMovement, scoreSequence, scoreSession, scoreTimingConsistency, scoreVelocity
} from './scorers';

export interface Classification {
  category: BehaviorCategory;
  confidence: number;
}

export interface MicroResult {
  anomalyScore: number;
  flags: string[];
  /** Score crossed the hard threshold and no event fired within the debounce window. */
  shouldFire: boolean;
}

export interface MacroResult extends Classification {
  riskScore: number;
  flags: string[];
}

/**
 * Map (risk, anomaly) to a category. Pure: same inputs, same answer.
 */
export function classify(
  riskScore: number,
  anomalyScore: number,
  thresholds: AnalysisConfig['categoryThresholds']
): Classification {
  const combined = (riskScore + anomalyScore) / 2;
  if (combined < thresholds.suspicious) return { category: 'NORMAL', confidence: 1 - combined };
  if (combined < thresholds.botLike) return { category: 'SUSPICIOUS', confidence: combined };
  if (combined < thresholds.exploitAttempt) return { category: 'BOT_LIKE', confidence: combined };
  if (combined < thresholds.advancedExploit) return { category: 'EXPLOIT_ATTEMPT', confidence: combined };
  return { category: 'ADVANCED_EXPLOIT', confidence: combined };
}

function weighted(parts: Array<[number, number]>): number {
  let total = 0;
  let weights = 0;
  for (const [score, weight] of parts) {
    total += score * weight;
    weights += weight;
  }
  return weights > 0 ? total / weights : 0;
}

/**
 * Combines feature sub-scores into the fast anomaly score (micro cadence) and the
 * slower risk score + category (macro cadence). Results are written to the profile.
 */
export class AnomalyAggregator {
  private config: AnalysisConfig;

  constructor(config: AnalysisConfig) {
    this.config = config;
  }

  analyzeMicro(profile: BehaviorProfile, now: number): MicroResult {
    const cfg = this.config;
    const w = cfg.featureWeights;

    const action = scoreActionFrequency(profile.actionSamples, profile.baselineFrequency, cfg);
    const timing = scoreTimingConsistency(profile.timingSamples, cfg);
    const movement = scoreMovement(profile.movementSamples, cfg);

    profile.featureScores.action = action.score;
    profile.featureScores.timing = timing.score;
    profile.featureScores.movement = movement.score;
    profile.anomalyScore = weighted([
      [action.score, w.action],
      [timing.score, w.timing],
      [movement.score, w.movement]
    ]);

    // Learn the baseline only from ticks that looked normal.
    if (action.frequency > 0 && !action.flags.includes('high_frequency') && profile.anomalyScore < cfg.anomalyThreshold) {
      const learned = profile.baselineFrequency + (action.frequency - profile.baselineFrequency) * cfg.baselineLearningRate;
      profile.baselineFrequency = clamp(learned, cfg.initialBaselineFrequency, cfg.maxBaselineFrequency);
    }

    const debounced = profile.lastAnomalyEventAt !== null &&
      now - profile.lastAnomalyEventAt < cfg.anomalyEventCooldownSeconds;
    const shouldFire = profile.anomalyScore > cfg.anomalyThreshold && !debounced;
    if (shouldFire) {
      profile.lastAnomalyEventAt = now;
    }

    return {
      anomalyScore: profile.anomalyScore,
      flags: [...action.flags, ...timing.flags, ...movement.flags],
      shouldFire
    };
  }

  /**
   * recentViolations: throttle violations still inside the retention window.
   */
  analyzeMacro(profile: BehaviorProfile, recentViolations: number, now: number): MacroResult {
    const cfg = this.config;
    const w = cfg.featureWeights;

    const session = scoreSession(profile.activitySegments, now, cfg);
    const sequence = scoreSequence(profile.interactionHistory, cfg);
    const velocity = scoreVelocity(profile.speedHistory, cfg);

    profile.featureScores.session = session.score;
    profile.featureScores.sequence = sequence.score;
    profile.featureScores.velocity = velocity.score;

    const featureRisk = weighted([
      [session.score, w.session],
      [sequence.score, w.sequence],
      [velocity.score, w.velocity]
    ]);
    const pressure = cfg.violationPressureWeight * Math.min(1, recentViolations / cfg.violationSaturation);
    profile.riskScore = Math.min(1, featureRisk + pressure);

    const { category, confidence } = classify(profile.riskScore, profile.anomalyScore, cfg.categoryThresholds);
    profile.behaviorCategory = category;
    profile.confidence = confidence;

    const flags = [...session.flags, ...sequence.flags, ...velocity.flags];
    if (recentViolations > 0) flags.push('throttle_violations');

    return { riskScore: profile.riskScore, category, confidence, flags };
  }
}
