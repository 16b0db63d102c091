import { existsSync, mkdirSync, readFileSync } from 'fs';
import { appendFile } from 'fs/promises';
import { dirname } from 'path';
import { canonicalJson, isObject, logWarn } from '../utils';

const TAG = 'audit';
const FLUSH_DEBOUNCE_MS = 1000;

export type AuditKind = 'anomaly' | 'violation' | 'eviction';

export interface AuditEvent {
  ts: string;
  kind: AuditKind;
  subjectId: string;
  details?: Record<string, unknown>;
}

function isAuditEvent(v: unknown): v is AuditEvent {
  return isObject(v) && typeof v.ts === 'string' && typeof v.kind === 'string' && typeof v.subjectId === 'string';
}

/**
 * Append-only JSONL audit trail for violations, anomalies and evictions.
 * Appends are buffered and flushed asynchronously so callers on the gating path never wait on disk.
 */
export class AuditLog {
  private path: string;
  private pending: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private flushing: Promise<void> | null = null;

  constructor(path: string) {
    this.path = path;
  }

  append(event: Omit<AuditEvent, 'ts'>): AuditEvent {
    const entry: AuditEvent = { ts: new Date().toISOString(), ...event };
    this.pending.push(canonicalJson(entry));
    this.scheduleFlush();
    return entry;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Write everything buffered so far. Each flush is chained behind the previous
   * write, so it resolves only once every line appended before the call is on disk.
   */
  flush(): Promise<void> {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    // A failed earlier write rejects its own caller; its lines stay pending for this one.
    const previous = this.flushing ? this.flushing.catch(() => undefined) : Promise.resolve();
    const run = previous.then(() => this.writePending());
    this.flushing = run;
    return run.finally(() => {
      if (this.flushing === run) this.flushing = null;
    });
  }

  private async writePending(): Promise<void> {
    if (this.pending.length === 0) return;

    const lines = this.pending;
    this.pending = [];
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    try {
      await appendFile(this.path, lines.map(l => `${l}\n`).join(''), 'utf8');
    } catch (err) {
      // Keep the lines for the next attempt.
      this.pending = lines.concat(this.pending);
      throw err;
    }
  }

  /**
   * Most recent events (flushed and pending), oldest first.
   */
  list(limit = 20, kind?: AuditKind): AuditEvent[] {
    const lines: string[] = [];
    if (existsSync(this.path)) {
      lines.push(...readFileSync(this.path, 'utf8').split('\n'));
    }
    lines.push(...this.pending);

    const rows = lines
      .map(line => line.trim())
      .filter(Boolean)
      .map(line => {
        try {
          const parsed: unknown = JSON.parse(line);
          return isAuditEvent(parsed) ? parsed : null;
        } catch {
          return null;
        }
      })
      .filter((v): v is AuditEvent => v !== null);

    const filtered = kind ? rows.filter(r => r.kind === kind) : rows;
    if (limit <= 0) return filtered;
    return filtered.slice(Math.max(0, filtered.length - limit));
  }

  private scheduleFlush(): void {
    if (this.flushTimer) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush().catch(err => {
        logWarn(TAG, `Failed to write ${this.path}:`, err instanceof Error ? err.message : String(err));
      });
    }, FLUSH_DEBOUNCE_MS);
    this.flushTimer.unref();
  }
}
