import { DenialCode, EndpointPolicy } from '../types';

export interface LimitCheck {
  allowed: boolean;
  reason: string;
  code?: Exclude<DenialCode, 'invalid_input'>;
}

const BURST_WINDOW_SECONDS = 1;

function formatSeconds(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

/**
 * Sliding-window request limiter keyed by (subject, endpoint).
 * Sequences are ascending timestamps (seconds), appended on allow and pruned from the front.
 */
export class SlidingWindowLimiter {
  private windows: Map<string, Map<string, number[]>> = new Map(); // subject → endpoint → timestamps

  /**
   * Judge a request against a policy without recording it.
   */
  check(subjectId: string, endpoint: string, policy: EndpointPolicy, now: number): LimitCheck {
    const timestamps = this.sequence(subjectId, endpoint);
    this.pruneSequence(timestamps, now - policy.windowSeconds);

    if (policy.cooldownSeconds > 0 && timestamps.length > 0) {
      const elapsed = now - timestamps[timestamps.length - 1];
      if (elapsed < policy.cooldownSeconds) {
        const wait = policy.cooldownSeconds - elapsed;
        return {
          allowed: false,
          code: 'cooldown',
          reason: `cooldown active, retry in ${wait.toFixed(2)} seconds`
        };
      }
    }

    const burstCutoff = now - BURST_WINDOW_SECONDS;
    let inBurst = 0;
    for (let i = timestamps.length - 1; i >= 0 && timestamps[i] > burstCutoff; i--) {
      inBurst++;
    }
    if (inBurst >= policy.burstLimit) {
      return {
        allowed: false,
        code: 'burst',
        reason: `burst limit exceeded (${inBurst}/${policy.burstLimit} in ${BURST_WINDOW_SECONDS}s)`
      };
    }

    if (timestamps.length >= policy.maxRequests) {
      return {
        allowed: false,
        code: 'window',
        reason: `rate limit exceeded (${timestamps.length}/${policy.maxRequests} in ${formatSeconds(policy.windowSeconds)}s)`
      };
    }

    return { allowed: true, reason: 'ok' };
  }

  /**
   * Append an allowed request.
   */
  record(subjectId: string, endpoint: string, now: number): void {
    this.sequence(subjectId, endpoint).push(now);
  }

  /**
   * Remaining allowance in the current window (ignores burst and cooldown).
   */
  remaining(subjectId: string, endpoint: string, policy: EndpointPolicy, now: number): number {
    const timestamps = this.windows.get(subjectId)?.get(endpoint) || [];
    const cutoff = now - policy.windowSeconds;
    const live = timestamps.filter(t => t > cutoff).length;
    return Math.max(0, policy.maxRequests - live);
  }

  /**
   * Requests recorded for a pair, oldest first.
   */
  history(subjectId: string, endpoint: string): number[] {
    return [...(this.windows.get(subjectId)?.get(endpoint) || [])];
  }

  /**
   * Drop timestamps older than maxAgeSeconds and empty sequences.
   */
  prune(now: number, maxAgeSeconds: number): void {
    const cutoff = now - maxAgeSeconds;
    for (const [subjectId, endpoints] of this.windows) {
      for (const [endpoint, timestamps] of endpoints) {
        this.pruneSequence(timestamps, cutoff);
        if (timestamps.length === 0) endpoints.delete(endpoint);
      }
      if (endpoints.size === 0) this.windows.delete(subjectId);
    }
  }

  evictSubject(subjectId: string): boolean {
    return this.windows.delete(subjectId);
  }

  /** Number of subjects with live sequences. */
  size(): number {
    return this.windows.size;
  }

  private sequence(subjectId: string, endpoint: string): number[] {
    let endpoints = this.windows.get(subjectId);
    if (!endpoints) {
      endpoints = new Map();
      this.windows.set(subjectId, endpoints);
    }
    let timestamps = endpoints.get(endpoint);
    if (!timestamps) {
      timestamps = [];
      endpoints.set(endpoint, timestamps);
    }
    return timestamps;
  }

  private pruneSequence(timestamps: number[], cutoff: number): void {
    let drop = 0;
    while (drop < timestamps.length && timestamps[drop] <= cutoff) drop++;
    if (drop > 0) timestamps.splice(0, drop);
  }
}
