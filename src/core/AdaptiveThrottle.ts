import { AdaptiveState, EndpointPolicy } from '../types';
import { ThrottleConfig } from '../config/GuardConfig';

export function createAdaptiveState(): AdaptiveState {
  return {
    violationCount: 0,
    throttleMultiplier: 1.0,
    trustScore: 1.0,
    lastViolationTime: null
  };
}

/**
 * Per-subject escalation. Tightens quickly once violations pile up and relaxes
 * slowly, only after a quiet period, so a subject can't flap between states.
 */
export class AdaptiveThrottle {
  private config: ThrottleConfig;

  constructor(config: ThrottleConfig) {
    this.config = config;
  }

  /**
   * Effective policy for a subject: counts divided by the multiplier
   * (floored, at least 1), durations multiplied by it.
   */
  scale(policy: EndpointPolicy, state: AdaptiveState): EndpointPolicy {
    const m = state.throttleMultiplier;
    if (m <= 1) return policy;
    return {
      tierName: policy.tierName,
      maxRequests: Math.max(1, Math.floor(policy.maxRequests / m)),
      burstLimit: Math.max(1, Math.floor(policy.burstLimit / m)),
      windowSeconds: policy.windowSeconds * m,
      cooldownSeconds: policy.cooldownSeconds * m
    };
  }

  /**
   * Returns true when this violation escalated the multiplier.
   */
  onViolation(state: AdaptiveState, now: number): boolean {
    state.violationCount++;
    state.lastViolationTime = now;

    if (state.violationCount < this.config.escalationThreshold) return false;

    state.throttleMultiplier = Math.min(
      this.config.maxMultiplier,
      state.throttleMultiplier * this.config.escalationFactor
    );
    state.trustScore = Math.max(this.config.minTrust, state.trustScore * this.config.trustDecayFactor);
    return true;
  }

  /**
   * Relax after a quiet period. Returns true when the state was fully reset.
   */
  decay(state: AdaptiveState, now: number): boolean {
    if (state.lastViolationTime === null) return false;
    if (now - state.lastViolationTime <= this.config.quietPeriodSeconds) return false;

    state.throttleMultiplier = Math.max(1.0, state.throttleMultiplier * this.config.recoveryFactor);
    state.trustScore = Math.min(1.0, state.trustScore + (1.0 - state.trustScore) * this.config.trustRecoveryRate);

    if (state.throttleMultiplier < this.config.resetCutoff) {
      state.violationCount = 0;
      state.throttleMultiplier = 1.0;
      state.trustScore = 1.0;
      state.lastViolationTime = null;
      return true;
    }
    return false;
  }

  isEscalated(state: AdaptiveState): boolean {
    return state.throttleMultiplier > 1.0;
  }
}
