export type TierName = 'CRITICAL' | 'STANDARD' | 'HIGH_FREQUENCY' | 'PRIVILEGED';

/** Tiers an endpoint can be mapped to; PRIVILEGED is applied per subject, never per endpoint. */
export type EndpointTier = Exclude<TierName, 'PRIVILEGED'>;

export interface EndpointPolicy {
  readonly tierName: TierName;
  readonly maxRequests: number;
  readonly windowSeconds: number;
  readonly burstLimit: number;
  readonly cooldownSeconds: number;
}

export type TierLimits = Omit<EndpointPolicy, 'tierName'>;

export type DenialCode = 'cooldown' | 'burst' | 'window' | 'invalid_input';

export interface GateDecision {
  allowed: boolean;
  reason: string;
  code?: DenialCode;
  /** Effective policy the request was judged against (absent for invalid input). */
  policy?: EndpointPolicy;
}

export interface AdaptiveState {
  violationCount: number;
  throttleMultiplier: number;
  trustScore: number;
  lastViolationTime: number | null;
}

export interface ViolationRecord {
  subjectId: string;
  endpoint: string;
  reason: string;
  code: DenialCode | 'anomaly';
  timestamp: number;
}

export type BehaviorCategory =
  | 'NORMAL'
  | 'SUSPICIOUS'
  | 'BOT_LIKE'
  | 'EXPLOIT_ATTEMPT'
  | 'ADVANCED_EXPLOIT';

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface ActionSample {
  type: string;
  data?: Record<string, unknown>;
  timestamp: number;
}

export interface TimingSample {
  /** Seconds since the previous action of the same subject. */
  interval: number;
  timestamp: number;
}

export interface MovementSample {
  position: Vector3;
  velocity: Vector3;
  timestamp: number;
}

export interface InteractionSample {
  type: string;
  timestamp: number;
}

export interface SpeedSample {
  speed: number;
  timestamp: number;
}

export interface ActivitySegment {
  start: number;
  end: number;
}

export interface FeatureScores {
  action: number;
  timing: number;
  movement: number;
  session: number;
  sequence: number;
  velocity: number;
}

export interface BehaviorProfile {
  subjectId: string;
  createdAt: number;
  actionSamples: ActionSample[];
  timingSamples: TimingSample[];
  movementSamples: MovementSample[];
  interactionHistory: InteractionSample[];
  speedHistory: SpeedSample[];
  activitySegments: ActivitySegment[];
  baselineFrequency: number;
  featureScores: FeatureScores;
  anomalyScore: number;
  riskScore: number;
  behaviorCategory: BehaviorCategory;
  confidence: number;
  sampleCount: number;
  lastAnomalyEventAt: number | null;
}

export interface BehaviorAnalysis {
  riskScore: number;
  anomalyScore: number;
  behaviorCategory: BehaviorCategory;
  confidence: number;
  sampleCount: number;
}

export interface AnomalyDetails {
  anomalyScore: number;
  featureScores: FeatureScores;
  flags: string[];
  timestamp: number;
}

export interface SubjectSnapshot {
  subjectId: string;
  adaptive: AdaptiveState;
  violations: ViolationRecord[];
  analysis: BehaviorAnalysis;
  featureScores: FeatureScores;
  createdAt: number;
  lastSeen: number;
}

export interface LimiterStats {
  allowed: number;
  denied: number;
  deniedByCode: Record<DenialCode, number>;
}

export interface Authorizer {
  isPrivileged(subjectId: string): boolean;
}

export type EvictionReason = 'disconnect' | 'idle';

export interface GuardListeners {
  onAnomalyDetected?: (subjectId: string, score: number, details: AnomalyDetails) => void;
  onViolation?: (record: ViolationRecord) => void;
  onSubjectEvicted?: (snapshot: SubjectSnapshot, reason: EvictionReason) => void;
  onListenerError?: (error: unknown) => void;
}

export interface ServeOptions {
  port?: number;
  host?: string;
  apiKey?: string;
  cors?: boolean;
  configPath?: string;
  auditPath?: string;
}
