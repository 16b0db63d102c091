import { AdaptiveState, BehaviorProfile, ViolationRecord } from '../types';
import { AnalysisConfig } from '../config/GuardConfig';
import { createAdaptiveState } from './AdaptiveThrottle';
import { createBehaviorProfile } from '../analysis/BehaviorProfile';

export interface SubjectState {
  subjectId: string;
  adaptive: AdaptiveState;
  violations: ViolationRecord[];
  profile: BehaviorProfile;
  createdAt: number;
  lastSeen: number;
}

/**
 * Per-subject state, owned by the engine and handed to the components that need it.
 * A subject missing from the store is indistinguishable from one never seen.
 */
export class SubjectStore {
  private subjects: Map<string, SubjectState> = new Map();
  private analysisConfig: AnalysisConfig;

  constructor(analysisConfig: AnalysisConfig) {
    this.analysisConfig = analysisConfig;
  }

  get(subjectId: string): SubjectState | undefined {
    return this.subjects.get(subjectId);
  }

  has(subjectId: string): boolean {
    return this.subjects.has(subjectId);
  }

  /**
   * Fetch or lazily create a subject. Also bumps lastSeen.
   */
  getOrCreate(subjectId: string, now: number): SubjectState {
    let state = this.subjects.get(subjectId);
    if (!state) {
      state = {
        subjectId,
        adaptive: createAdaptiveState(),
        violations: [],
        profile: createBehaviorProfile(subjectId, now, this.analysisConfig),
        createdAt: now,
        lastSeen: now
      };
      this.subjects.set(subjectId, state);
    } else if (now > state.lastSeen) {
      state.lastSeen = now;
    }
    return state;
  }

  delete(subjectId: string): boolean {
    return this.subjects.delete(subjectId);
  }

  all(): SubjectState[] {
    return Array.from(this.subjects.values());
  }

  ids(): string[] {
    return Array.from(this.subjects.keys());
  }

  size(): number {
    return this.subjects.size;
  }

  /**
   * Drop violation records older than retentionSeconds.
   */
  pruneViolations(now: number, retentionSeconds: number): void {
    const cutoff = now - retentionSeconds;
    for (const state of this.subjects.values()) {
      let drop = 0;
      while (drop < state.violations.length && state.violations[drop].timestamp < cutoff) drop++;
      if (drop > 0) state.violations.splice(0, drop);
    }
  }

  /**
   * Subjects with no activity for longer than idleSeconds.
   */
  idleSince(now: number, idleSeconds: number): string[] {
    const out: string[] = [];
    for (const [id, state] of this.subjects) {
      if (now - state.lastSeen > idleSeconds) out.push(id);
    }
    return out;
  }
}
