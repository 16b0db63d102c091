/**
 * PlayGuard defaults.
 *
 * Hand-tuned starting points. Every value here can be overridden from the
 * config file (see GuardConfig.ts); nothing reads these directly at runtime
 * except through DEFAULT_CONFIG.
 */

import { EndpointTier, TierLimits, TierName } from '../types';

// ── Limit tiers ──────────────────────────────────────────────────────
export const DEFAULT_TIERS: Record<TierName, TierLimits> = {
  CRITICAL: { maxRequests: 5, windowSeconds: 60, burstLimit: 2, cooldownSeconds: 2 },
  STANDARD: { maxRequests: 30, windowSeconds: 60, burstLimit: 5, cooldownSeconds: 0.5 },
  HIGH_FREQUENCY: { maxRequests: 120, windowSeconds: 60, burstLimit: 20, cooldownSeconds: 0 },
  PRIVILEGED: { maxRequests: 1000, windowSeconds: 60, burstLimit: 100, cooldownSeconds: 0 }
};

export const DEFAULT_ENDPOINT_TIER: EndpointTier = 'STANDARD';

// Game actions. Anything spending currency or duplicating items is CRITICAL.
export const DEFAULT_ENDPOINTS: Record<string, EndpointTier> = {
  PurchaseItem: 'CRITICAL',
  BuyItem: 'CRITICAL',
  CloneItem: 'CRITICAL',
  AddToInventory: 'CRITICAL',
  ApplyItemEffect: 'CRITICAL',
  PlaceItem: 'STANDARD',
  MoveItem: 'STANDARD',
  RotateItem: 'STANDARD',
  ChangeColor: 'STANDARD',
  RemoveItem: 'STANDARD',
  PickupItem: 'STANDARD',
  InteractWithItem: 'HIGH_FREQUENCY',
  UpdateBalance: 'HIGH_FREQUENCY',
  GetInventory: 'HIGH_FREQUENCY'
};

// ── Adaptive throttle ────────────────────────────────────────────────
export const ESCALATION_THRESHOLD = 3;         // violations before the multiplier moves
export const ESCALATION_FACTOR = 1.5;
export const MAX_THROTTLE_MULTIPLIER = 5.0;
export const TRUST_DECAY_FACTOR = 0.8;
export const MIN_TRUST_SCORE = 0.1;
export const QUIET_PERIOD_SECONDS = 60;        // no violations for this long → start relaxing
export const RECOVERY_FACTOR = 0.9;
export const TRUST_RECOVERY_RATE = 0.1;
export const RESET_CUTOFF = 1.05;              // multiplier below this → full reset

// ── Behavior analysis ────────────────────────────────────────────────
export const MIN_SAMPLES = 10;
export const MICRO_RETENTION_SECONDS = 60;
export const MACRO_RETENTION_SECONDS = 600;
export const ANOMALY_THRESHOLD = 0.7;          // micro score that fires an immediate event
export const ANOMALY_EVENT_COOLDOWN_SECONDS = 10;

export const FEATURE_WEIGHTS = {
  action: 0.25,
  timing: 0.2,
  movement: 0.15,
  session: 0.05,
  sequence: 0.15,
  velocity: 0.1
};

export const CATEGORY_THRESHOLDS = {
  suspicious: 0.2,
  botLike: 0.4,
  exploitAttempt: 0.6,
  advancedExploit: 0.8
};

// ── Cadences (seconds) ───────────────────────────────────────────────
export const MICRO_TICK_SECONDS = 1;
export const MACRO_TICK_SECONDS = 30;
export const EVICTION_SWEEP_SECONDS = 120;
export const IDLE_EVICTION_SECONDS = 900;
export const VIOLATION_RETENTION_SECONDS = 300;
