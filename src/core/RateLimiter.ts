import { DenialCode, GateDecision, LimiterStats, ViolationRecord } from '../types';
import { AdaptiveThrottle } from './AdaptiveThrottle';
import { EndpointPolicyTable } from './EndpointPolicyTable';
import { SlidingWindowLimiter } from './SlidingWindowLimiter';
import { SubjectStore } from './SubjectStore';

export type ViolationListener = (record: ViolationRecord, escalated: boolean) => void;

function emptyStats(): LimiterStats {
  return {
    allowed: 0,
    denied: 0,
    deniedByCode: { cooldown: 0, burst: 0, window: 0, invalid_input: 0 }
  };
}

function isPresent(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Single gating decision per inbound action:
 * resolve the endpoint's tier, scale it by the subject's throttle, check the window.
 * Denials are results, not exceptions.
 */
export class RateLimiter {
  private store: SubjectStore;
  private table: EndpointPolicyTable;
  private throttle: AdaptiveThrottle;
  private limiter: SlidingWindowLimiter;
  private stats: LimiterStats = emptyStats();
  private onViolation?: ViolationListener;

  constructor(
    store: SubjectStore,
    table: EndpointPolicyTable,
    throttle: AdaptiveThrottle,
    limiter: SlidingWindowLimiter = new SlidingWindowLimiter(),
    onViolation?: ViolationListener
  ) {
    this.store = store;
    this.table = table;
    this.throttle = throttle;
    this.limiter = limiter;
    this.onViolation = onViolation;
  }

  checkAndRecord(subjectId: string, endpoint: string, isPrivileged: boolean, now: number): GateDecision {
    if (!isPresent(subjectId)) {
      return this.invalid('missing subject id');
    }
    if (!isPresent(endpoint)) {
      return this.invalid('missing endpoint name');
    }

    const subject = this.store.getOrCreate(subjectId, now);
    const base = this.table.resolve(endpoint, isPrivileged);
    const policy = this.throttle.scale(base, subject.adaptive);
    const result = this.limiter.check(subjectId, endpoint, policy, now);

    if (result.allowed) {
      this.limiter.record(subjectId, endpoint, now);
      this.stats.allowed++;
      return { allowed: true, reason: result.reason, policy };
    }

    const code = result.code ?? 'window';
    const escalated = this.throttle.onViolation(subject.adaptive, now);
    const record: ViolationRecord = {
      subjectId,
      endpoint,
      reason: result.reason,
      code,
      timestamp: now
    };
    subject.violations.push(record);
    this.stats.denied++;
    this.stats.deniedByCode[code]++;
    this.onViolation?.(record, escalated);

    return { allowed: false, reason: result.reason, code, policy };
  }

  getLimiter(): SlidingWindowLimiter {
    return this.limiter;
  }

  getStats(): LimiterStats {
    return {
      allowed: this.stats.allowed,
      denied: this.stats.denied,
      deniedByCode: { ...this.stats.deniedByCode }
    };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  private invalid(reason: string): GateDecision {
    const code: DenialCode = 'invalid_input';
    this.stats.denied++;
    this.stats.deniedByCode[code]++;
    return { allowed: false, reason, code };
  }
}
