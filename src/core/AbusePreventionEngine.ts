import {
  AnomalyDetails, Authorizer, BehaviorAnalysis, EvictionReason, GateDecision, GuardListeners,
  LimiterStats, SubjectSnapshot, Vector3, ViolationRecord
} from '../types';
import { GuardConfig, createConfig } from '../config/GuardConfig';
import { isObject, logError } from '../utils';
import { AnomalyAggregator, MicroResult } from '../analysis/AnomalyAggregator';
import {
  analysisOf, freshAnalysis, pruneProfile, recordActionSample, recordMovementSample
} from '../analysis/BehaviorProfile';
import { AdaptiveThrottle } from './AdaptiveThrottle';
import { StaticAuthorizer } from './Authorizer';
import { Clock, systemClock } from './Clock';
import { EndpointPolicyTable } from './EndpointPolicyTable';
import { RateLimiter } from './RateLimiter';
import { SlidingWindowLimiter } from './SlidingWindowLimiter';
import { SubjectState, SubjectStore } from './SubjectStore';

const TAG = 'engine';

export interface EngineOptions {
  config?: GuardConfig;
  clock?: Clock;
  authorizer?: Authorizer;
  listeners?: GuardListeners;
}

export interface EngineStats extends LimiterStats {
  subjects: number;
  escalatedSubjects: number;
  anomalyEvents: number;
  evictions: number;
}

function isPresent(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isVector(value: unknown): value is Vector3 {
  return isObject(value) && [value.x, value.y, value.z].every(c => typeof c === 'number' && Number.isFinite(c));
}

/**
 * Top-level facade: gating (RateLimiter) plus behavior analysis (AnomalyAggregator)
 * over one SubjectStore, with the cross-signals between them.
 *
 * Everything is synchronous. Each call mutates only the subject it names, so a
 * tick or request never observes a half-updated subject.
 */
export class AbusePreventionEngine {
  private config: GuardConfig;
  private clock: Clock;
  private authorizer: Authorizer;
  private listeners: GuardListeners;
  private store: SubjectStore;
  private table: EndpointPolicyTable;
  private throttle: AdaptiveThrottle;
  private limiter: SlidingWindowLimiter;
  private rateLimiter: RateLimiter;
  private aggregator: AnomalyAggregator;
  private lastRun = { micro: -Infinity, macro: -Infinity, sweep: -Infinity };
  private anomalyEvents = 0;
  private evictions = 0;

  constructor(options: EngineOptions = {}) {
    this.config = options.config ?? createConfig();
    this.clock = options.clock ?? systemClock;
    this.authorizer = options.authorizer ?? new StaticAuthorizer(this.config.privilegedSubjects);
    this.listeners = options.listeners ?? {};

    this.store = new SubjectStore(this.config.analysis);
    this.table = new EndpointPolicyTable(this.config.tiers, this.config.endpoints);
    this.throttle = new AdaptiveThrottle(this.config.throttle);
    this.limiter = new SlidingWindowLimiter();
    this.rateLimiter = new RateLimiter(
      this.store,
      this.table,
      this.throttle,
      this.limiter,
      record => this.emit(() => this.listeners.onViolation?.(record))
    );
    this.aggregator = new AnomalyAggregator(this.config.analysis);
  }

  // ── Gating ─────────────────────────────────────────────────────────

  /**
   * Gate one inbound action. When isPrivileged is omitted the authorizer decides.
   */
  checkAndRecord(subjectId: string, endpoint: string, isPrivileged?: boolean, now = this.clock.now()): GateDecision {
    const privileged = isPrivileged ?? (isPresent(subjectId) && this.lookupPrivilege(subjectId));
    return this.rateLimiter.checkAndRecord(subjectId, endpoint, privileged, now);
  }

  // ── Telemetry ──────────────────────────────────────────────────────

  recordAction(subjectId: string, actionType: string, actionData?: Record<string, unknown>, now = this.clock.now()): boolean {
    if (!isPresent(subjectId) || !isPresent(actionType)) return false;
    const subject = this.store.getOrCreate(subjectId, now);
    recordActionSample(subject.profile, actionType, actionData, now, this.config.analysis);
    return true;
  }

  recordMovement(subjectId: string, position: Vector3, velocity: Vector3, now = this.clock.now()): boolean {
    if (!isPresent(subjectId) || !isVector(position) || !isVector(velocity)) return false;
    const subject = this.store.getOrCreate(subjectId, now);
    recordMovementSample(subject.profile, position, velocity, now, this.config.analysis);
    return true;
  }

  // ── Reads ──────────────────────────────────────────────────────────

  getAnalysis(subjectId: string): BehaviorAnalysis {
    const subject = this.store.get(subjectId);
    return subject ? analysisOf(subject.profile) : freshAnalysis();
  }

  getSubjectState(subjectId: string): SubjectSnapshot | null {
    const subject = this.store.get(subjectId);
    return subject ? this.snapshot(subject) : null;
  }

  listSubjects(): string[] {
    return this.store.ids();
  }

  getStats(): EngineStats {
    const subjects = this.store.all();
    return {
      ...this.rateLimiter.getStats(),
      subjects: subjects.length,
      escalatedSubjects: subjects.filter(s => this.throttle.isEscalated(s.adaptive)).length,
      anomalyEvents: this.anomalyEvents,
      evictions: this.evictions
    };
  }

  getConfig(): GuardConfig {
    return this.config;
  }

  getPolicyTable(): EndpointPolicyTable {
    return this.table;
  }

  // ── Cadences ───────────────────────────────────────────────────────

  /**
   * Micro cadence: feature scoring. Returns the subjects that fired an anomaly event.
   */
  tickMicro(now = this.clock.now()): string[] {
    this.lastRun.micro = now;
    const fired: string[] = [];
    for (const subject of this.store.all()) {
      pruneProfile(subject.profile, now, this.config.analysis);
      const result = this.aggregator.analyzeMicro(subject.profile, now);
      if (result.shouldFire) {
        this.fireAnomaly(subject, result, now);
        fired.push(subject.subjectId);
      }
    }
    return fired;
  }

  /**
   * Macro cadence: risk score, classification, throttle decay.
   */
  tickMacro(now = this.clock.now()): void {
    this.lastRun.macro = now;
    const cutoff = now - this.config.violationRetentionSeconds;
    for (const subject of this.store.all()) {
      pruneProfile(subject.profile, now, this.config.analysis);
      const recent = subject.violations.filter(v => v.code !== 'anomaly' && v.timestamp >= cutoff).length;
      this.aggregator.analyzeMacro(subject.profile, recent, now);
      this.throttle.decay(subject.adaptive, now);
    }
  }

  /**
   * Eviction sweep: prune request history, violations and buffers, and drop idle subjects.
   * Returns the ids evicted for idleness.
   */
  sweep(now = this.clock.now()): string[] {
    this.lastRun.sweep = now;
    this.limiter.prune(now, this.table.maxWindowSeconds() * this.config.throttle.maxMultiplier);
    this.store.pruneViolations(now, this.config.violationRetentionSeconds);
    for (const subject of this.store.all()) {
      pruneProfile(subject.profile, now, this.config.analysis);
    }
    const idle = this.store.idleSince(now, this.config.cadence.idleEvictionSeconds);
    for (const id of idle) this.evict(id, 'idle');
    return idle;
  }

  /**
   * Run whichever cadences are due. Safe to call more often than the fastest cadence.
   */
  tick(now = this.clock.now()): void {
    const c = this.config.cadence;
    if (now - this.lastRun.micro >= c.microSeconds) this.tickMicro(now);
    if (now - this.lastRun.macro >= c.macroSeconds) this.tickMacro(now);
    if (now - this.lastRun.sweep >= c.evictionSeconds) this.sweep(now);
  }

  // ── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Subject left: hand the final snapshot to the archive hook, then drop all state.
   */
  disconnect(subjectId: string): boolean {
    return this.evict(subjectId, 'disconnect');
  }

  private evict(subjectId: string, reason: EvictionReason): boolean {
    const subject = this.store.get(subjectId);
    this.limiter.evictSubject(subjectId);
    if (!subject) return false;

    const snapshot = this.snapshot(subject);
    this.store.delete(subjectId);
    this.evictions++;
    this.emit(() => this.listeners.onSubjectEvicted?.(snapshot, reason));
    return true;
  }

  private fireAnomaly(subject: SubjectState, result: MicroResult, now: number): void {
    this.anomalyEvents++;
    this.throttle.onViolation(subject.adaptive, now);
    const record: ViolationRecord = {
      subjectId: subject.subjectId,
      endpoint: 'behavior',
      reason: `anomaly score ${result.anomalyScore.toFixed(2)} exceeded ${this.config.analysis.anomalyThreshold.toFixed(2)}`,
      code: 'anomaly',
      timestamp: now
    };
    subject.violations.push(record);

    const details: AnomalyDetails = {
      anomalyScore: result.anomalyScore,
      featureScores: { ...subject.profile.featureScores },
      flags: result.flags,
      timestamp: now
    };
    this.emit(() => this.listeners.onViolation?.(record));
    this.emit(() => this.listeners.onAnomalyDetected?.(subject.subjectId, result.anomalyScore, details));
  }

  private lookupPrivilege(subjectId: string): boolean {
    try {
      return this.authorizer.isPrivileged(subjectId);
    } catch (err) {
      this.reportListenerError(err);
      return false;
    }
  }

  private snapshot(subject: SubjectState): SubjectSnapshot {
    return {
      subjectId: subject.subjectId,
      adaptive: { ...subject.adaptive },
      violations: subject.violations.map(v => ({ ...v })),
      analysis: analysisOf(subject.profile),
      featureScores: { ...subject.profile.featureScores },
      createdAt: subject.createdAt,
      lastSeen: subject.lastSeen
    };
  }

  /**
   * Collaborator callbacks never break the gate path.
   */
  private emit(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.reportListenerError(err);
    }
  }

  private reportListenerError(err: unknown): void {
    if (this.listeners.onListenerError) {
      this.listeners.onListenerError(err);
      return;
    }
    logError(TAG, 'Collaborator callback failed:', err instanceof Error ? err.message : String(err));
  }
}
