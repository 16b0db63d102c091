import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { EndpointTier, TierLimits, TierName } from '../types';
import { isObject, log, logWarn } from '../utils';
import {
  DEFAULT_TIERS, DEFAULT_ENDPOINTS, ESCALATION_THRESHOLD, ESCALATION_FACTOR,
  MAX_THROTTLE_MULTIPLIER, TRUST_DECAY_FACTOR, MIN_TRUST_SCORE, QUIET_PERIOD_SECONDS,
  RECOVERY_FACTOR, TRUST_RECOVERY_RATE, RESET_CUTOFF, MIN_SAMPLES, MICRO_RETENTION_SECONDS,
  MACRO_RETENTION_SECONDS, ANOMALY_THRESHOLD, ANOMALY_EVENT_COOLDOWN_SECONDS, FEATURE_WEIGHTS,
  CATEGORY_THRESHOLDS, MICRO_TICK_SECONDS, MACRO_TICK_SECONDS, EVICTION_SWEEP_SECONDS,
  IDLE_EVICTION_SECONDS, VIOLATION_RETENTION_SECONDS
} from './constants';

const TAG = 'config';

export interface ThrottleConfig {
  escalationThreshold: number;
  escalationFactor: number;
  maxMultiplier: number;
  trustDecayFactor: number;
  minTrust: number;
  quietPeriodSeconds: number;
  recoveryFactor: number;
  trustRecoveryRate: number;
  resetCutoff: number;
}

export interface PatternWeights {
  highFrequency: number;
  regularTiming: number;
  repeatedSequence: number;
  lowVariation: number;
  erraticTiming: number;
  speedExceeded: number;
  scriptedPath: number;
  velocityMismatch: number;
  longSession: number;
  uniformSessions: number;
  lowEntropy: number;
  dominantTransition: number;
  constantSpeed: number;
}

export interface AnalysisConfig {
  minSamples: number;
  microRetentionSeconds: number;
  macroRetentionSeconds: number;
  initialBaselineFrequency: number;
  maxBaselineFrequency: number;
  baselineLearningRate: number;
  frequencyMultiplier: number;
  timingVarianceEpsilon: number;
  ngramSize: number;
  ngramRepeatThreshold: number;
  lowCvThreshold: number;
  highCvThreshold: number;
  maxSpeed: number;
  velocityMismatchRatio: number;
  velocityMismatchTolerance: number;
  velocityMismatchShare: number;
  directionWindow: number;
  directionRepeatThreshold: number;
  sessionGapSeconds: number;
  maxContinuousSessionSeconds: number;
  sessionUniformityCv: number;
  lowEntropyThreshold: number;
  dominantTransitionShare: number;
  constantSpeedCv: number;
  violationPressureWeight: number;
  violationSaturation: number;
  anomalyThreshold: number;
  anomalyEventCooldownSeconds: number;
  patternWeights: PatternWeights;
  featureWeights: typeof FEATURE_WEIGHTS;
  categoryThresholds: typeof CATEGORY_THRESHOLDS;
}

export interface CadenceConfig {
  microSeconds: number;
  macroSeconds: number;
  evictionSeconds: number;
  idleEvictionSeconds: number;
}

export interface GuardConfig {
  tiers: Record<TierName, TierLimits>;
  endpoints: Record<string, EndpointTier>;
  throttle: ThrottleConfig;
  analysis: AnalysisConfig;
  cadence: CadenceConfig;
  violationRetentionSeconds: number;
  privilegedSubjects: string[];
}

export const DEFAULT_CONFIG: GuardConfig = {
  tiers: DEFAULT_TIERS,
  endpoints: DEFAULT_ENDPOINTS,
  throttle: {
    escalationThreshold: ESCALATION_THRESHOLD,
    escalationFactor: ESCALATION_FACTOR,
    maxMultiplier: MAX_THROTTLE_MULTIPLIER,
    trustDecayFactor: TRUST_DECAY_FACTOR,
    minTrust: MIN_TRUST_SCORE,
    quietPeriodSeconds: QUIET_PERIOD_SECONDS,
    recoveryFactor: RECOVERY_FACTOR,
    trustRecoveryRate: TRUST_RECOVERY_RATE,
    resetCutoff: RESET_CUTOFF
  },
  analysis: {
    minSamples: MIN_SAMPLES,
    microRetentionSeconds: MICRO_RETENTION_SECONDS,
    macroRetentionSeconds: MACRO_RETENTION_SECONDS,
    initialBaselineFrequency: 1.0,
    maxBaselineFrequency: 4.0,
    baselineLearningRate: 0.05,
    frequencyMultiplier: 5,
    timingVarianceEpsilon: 1e-4,
    ngramSize: 3,
    ngramRepeatThreshold: 5,
    lowCvThreshold: 0.1,
    highCvThreshold: 2.0,
    maxSpeed: 100,
    velocityMismatchRatio: 1.5,
    velocityMismatchTolerance: 25,
    velocityMismatchShare: 0.5,
    directionWindow: 3,
    directionRepeatThreshold: 3,
    sessionGapSeconds: 30,
    maxContinuousSessionSeconds: 1800,
    sessionUniformityCv: 0.1,
    lowEntropyThreshold: 0.3,
    dominantTransitionShare: 0.9,
    constantSpeedCv: 0.05,
    violationPressureWeight: 0.3,
    violationSaturation: 10,
    anomalyThreshold: ANOMALY_THRESHOLD,
    anomalyEventCooldownSeconds: ANOMALY_EVENT_COOLDOWN_SECONDS,
    patternWeights: {
      highFrequency: 0.4,
      regularTiming: 0.3,
      repeatedSequence: 0.3,
      lowVariation: 0.7,
      erraticTiming: 0.4,
      speedExceeded: 0.6,
      scriptedPath: 0.4,
      velocityMismatch: 0.5,
      longSession: 0.5,
      uniformSessions: 0.5,
      lowEntropy: 0.6,
      dominantTransition: 0.4,
      constantSpeed: 0.3
    },
    featureWeights: FEATURE_WEIGHTS,
    categoryThresholds: CATEGORY_THRESHOLDS
  },
  cadence: {
    microSeconds: MICRO_TICK_SECONDS,
    macroSeconds: MACRO_TICK_SECONDS,
    evictionSeconds: EVICTION_SWEEP_SECONDS,
    idleEvictionSeconds: IDLE_EVICTION_SECONDS
  },
  violationRetentionSeconds: VIOLATION_RETENTION_SECONDS,
  privilegedSubjects: []
};

function mergeDeep<T>(base: T, overrides: Record<string, unknown>): T {
  const out: Record<string, unknown> = { ...(base as Record<string, unknown>) };
  for (const [k, v] of Object.entries(overrides)) {
    const current = out[k];
    if (isObject(v) && isObject(current)) {
      out[k] = mergeDeep(current, v);
    } else {
      out[k] = v;
    }
  }
  return out as T;
}

/**
 * Fresh copy of the defaults with optional overrides merged in.
 */
export function createConfig(overrides: Record<string, unknown> = {}): GuardConfig {
  return mergeDeep(structuredClone(DEFAULT_CONFIG), overrides);
}

function isPositive(v: unknown): boolean {
  return typeof v === 'number' && Number.isFinite(v) && v > 0;
}

function isNonNegative(v: unknown): boolean {
  return typeof v === 'number' && Number.isFinite(v) && v >= 0;
}

const SECTIONS = ['tiers', 'endpoints', 'throttle', 'analysis', 'cadence'] as const;

/**
 * Returns a list of problems; empty means the config is usable.
 * A section that is not an object (e.g. `"throttle": null` in the file) is reported
 * and its fields are not checked.
 */
export function validateConfig(config: GuardConfig): string[] {
  const problems: string[] = [];
  const present = new Set<string>();
  for (const section of SECTIONS) {
    if (isObject(config[section])) present.add(section);
    else problems.push(`${section} must be an object`);
  }

  if (present.has('tiers')) {
    for (const [tier, limits] of Object.entries(config.tiers)) {
      if (!isObject(limits)) {
        problems.push(`tiers.${tier} must be an object`);
        continue;
      }
      if (!isPositive(limits.maxRequests) || !Number.isInteger(limits.maxRequests)) {
        problems.push(`tiers.${tier}.maxRequests must be a positive integer`);
      }
      if (!isPositive(limits.burstLimit) || !Number.isInteger(limits.burstLimit)) {
        problems.push(`tiers.${tier}.burstLimit must be a positive integer`);
      }
      if (!isPositive(limits.windowSeconds)) {
        problems.push(`tiers.${tier}.windowSeconds must be > 0`);
      }
      if (!isNonNegative(limits.cooldownSeconds)) {
        problems.push(`tiers.${tier}.cooldownSeconds must be >= 0`);
      }
    }
  }

  if (present.has('endpoints')) {
    const endpointTiers = new Set<string>(['CRITICAL', 'STANDARD', 'HIGH_FREQUENCY']);
    for (const [endpoint, tier] of Object.entries(config.endpoints)) {
      if (!endpointTiers.has(tier)) {
        problems.push(`endpoints.${endpoint} has unknown tier "${tier}"`);
      }
    }
  }

  if (present.has('throttle')) {
    const t = config.throttle;
    if (!isPositive(t.escalationThreshold)) problems.push('throttle.escalationThreshold must be > 0');
    if (!(t.escalationFactor > 1)) problems.push('throttle.escalationFactor must be > 1');
    if (!(t.maxMultiplier >= 1)) problems.push('throttle.maxMultiplier must be >= 1');
    if (!(t.trustDecayFactor > 0 && t.trustDecayFactor < 1)) problems.push('throttle.trustDecayFactor must be in (0,1)');
    if (!(t.minTrust > 0 && t.minTrust <= 1)) problems.push('throttle.minTrust must be in (0,1]');
    if (!isNonNegative(t.quietPeriodSeconds)) problems.push('throttle.quietPeriodSeconds must be >= 0');
    if (!(t.recoveryFactor > 0 && t.recoveryFactor < 1)) problems.push('throttle.recoveryFactor must be in (0,1)');
    if (!(t.trustRecoveryRate >= 0 && t.trustRecoveryRate <= 1)) problems.push('throttle.trustRecoveryRate must be in [0,1]');
    if (!(t.resetCutoff > 1)) problems.push('throttle.resetCutoff must be > 1');
  }

  if (present.has('analysis')) {
    const a = config.analysis;
    if (!isPositive(a.minSamples)) problems.push('analysis.minSamples must be > 0');
    if (!(a.anomalyThreshold > 0 && a.anomalyThreshold <= 1)) problems.push('analysis.anomalyThreshold must be in (0,1]');
    if (!isObject(a.patternWeights)) problems.push('analysis.patternWeights must be an object');
    if (isObject(a.featureWeights)) {
      const micro = a.featureWeights.action + a.featureWeights.timing + a.featureWeights.movement;
      const macro = a.featureWeights.session + a.featureWeights.sequence + a.featureWeights.velocity;
      if (!(micro > 0)) problems.push('analysis.featureWeights: micro weights must sum to > 0');
      if (!(macro > 0)) problems.push('analysis.featureWeights: macro weights must sum to > 0');
    } else {
      problems.push('analysis.featureWeights must be an object');
    }
    const c = a.categoryThresholds;
    if (!isObject(c)) {
      problems.push('analysis.categoryThresholds must be an object');
    } else if (!(c.suspicious < c.botLike && c.botLike < c.exploitAttempt && c.exploitAttempt < c.advancedExploit)) {
      problems.push('analysis.categoryThresholds must be strictly increasing');
    }
  }

  if (present.has('cadence')) {
    for (const [k, v] of Object.entries(config.cadence)) {
      if (!isPositive(v)) problems.push(`cadence.${k} must be > 0`);
    }
  }
  if (!isPositive(config.violationRetentionSeconds)) problems.push('violationRetentionSeconds must be > 0');
  if (!Array.isArray(config.privilegedSubjects) || !config.privilegedSubjects.every(s => typeof s === 'string')) {
    problems.push('privilegedSubjects must be an array of strings');
  }

  return problems;
}

export function saveConfig(path: string, config: GuardConfig): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, JSON.stringify(config, null, 2), 'utf8');
}

/**
 * Load config from a JSON file, deep-merged over the defaults.
 * A missing file is created with the defaults. Throws if the merged result is invalid.
 */
export function loadConfig(path: string): GuardConfig {
  let config: GuardConfig;
  if (!existsSync(path)) {
    config = createConfig();
    saveConfig(path, config);
    log(TAG, `No config at ${path}, wrote defaults`);
  } else {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to parse config ${path}: ${msg}`);
    }
    if (!isObject(parsed)) {
      throw new Error(`Config ${path} must contain a JSON object`);
    }
    config = createConfig(parsed);
  }

  const problems = validateConfig(config);
  if (problems.length > 0) {
    for (const p of problems) logWarn(TAG, p);
    throw new Error(`Invalid config ${path}: ${problems.join('; ')}`);
  }
  return config;
}
