import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { AuditLog } from '../../src/audit/AuditLog';
import { createAuditListeners } from '../../src/audit/listeners';
import { SubjectSnapshot } from '../../src/types';

const TEST_DIR = join(__dirname, '..', 'tmp-audit-test');
const AUDIT_PATH = join(TEST_DIR, 'nested', 'audit.jsonl');

function cleanup(): void {
  if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
}

describe('AuditLog', () => {
  beforeEach(() => cleanup());
  afterEach(() => cleanup());

  test('buffers appends until flushed', async () => {
    const audit = new AuditLog(AUDIT_PATH);
    audit.append({ kind: 'violation', subjectId: 'p1', details: { endpoint: 'PurchaseItem' } });
    expect(audit.pendingCount()).toBe(1);
    expect(existsSync(AUDIT_PATH)).toBe(false);

    await audit.flush();
    expect(audit.pendingCount()).toBe(0);
    const lines = readFileSync(AUDIT_PATH, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ kind: 'violation', subjectId: 'p1', details: { endpoint: 'PurchaseItem' } });
  });

  test('overlapping flushes resolve only after every earlier append is written', async () => {
    const audit = new AuditLog(AUDIT_PATH);
    audit.append({ kind: 'violation', subjectId: 'p1' });
    const first = audit.flush();
    audit.append({ kind: 'violation', subjectId: 'p2' });
    const second = audit.flush();
    await audit.flush();

    expect(readFileSync(AUDIT_PATH, 'utf8').trim().split('\n')).toHaveLength(2);
    await Promise.all([first, second]);
  });

  test('a flush issued while a write is in flight waits for its own lines', async () => {
    const audit = new AuditLog(AUDIT_PATH);
    audit.append({ kind: 'violation', subjectId: 'p1' });
    const first = audit.flush();
    await Promise.resolve();
    audit.append({ kind: 'violation', subjectId: 'p2' });
    const second = audit.flush();
    audit.append({ kind: 'eviction', subjectId: 'p3' });
    await audit.flush();

    const ids = readFileSync(AUDIT_PATH, 'utf8').trim().split('\n').map(l => JSON.parse(l).subjectId);
    expect(ids).toEqual(['p1', 'p2', 'p3']);
    expect(audit.pendingCount()).toBe(0);
    await Promise.all([first, second]);
  });

  test('lines are written with sorted keys', async () => {
    const audit = new AuditLog(AUDIT_PATH);
    const entry = audit.append({ subjectId: 'p1', kind: 'eviction', details: { reason: 'idle', category: 'NORMAL' } });
    await audit.flush();
    expect(readFileSync(AUDIT_PATH, 'utf8')).toBe(
      `{"details":{"category":"NORMAL","reason":"idle"},"kind":"eviction","subjectId":"p1","ts":"${entry.ts}"}\n`
    );
  });

  test('list merges flushed and pending entries, newest last', async () => {
    const audit = new AuditLog(AUDIT_PATH);
    audit.append({ kind: 'violation', subjectId: 'p1' });
    audit.append({ kind: 'anomaly', subjectId: 'p2' });
    await audit.flush();
    audit.append({ kind: 'violation', subjectId: 'p3' });

    expect(audit.list(10).map(e => e.subjectId)).toEqual(['p1', 'p2', 'p3']);
    expect(audit.list(2).map(e => e.subjectId)).toEqual(['p2', 'p3']);
    expect(audit.list(10, 'violation').map(e => e.subjectId)).toEqual(['p1', 'p3']);
    await audit.flush();
  });

  test('list skips malformed lines', () => {
    mkdirSync(join(TEST_DIR, 'nested'), { recursive: true });
    writeFileSync(AUDIT_PATH, 'garbage\n{"ts":"t","kind":"anomaly","subjectId":"p1"}\n{"nope":1}\n', 'utf8');
    const audit = new AuditLog(AUDIT_PATH);
    expect(audit.list()).toEqual([{ ts: 't', kind: 'anomaly', subjectId: 'p1' }]);
  });
});

describe('createAuditListeners', () => {
  beforeEach(() => cleanup());
  afterEach(() => cleanup());

  test('records anomalies, violations and evictions', async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const audit = new AuditLog(AUDIT_PATH);
    const listeners = createAuditListeners(audit);

    listeners.onAnomalyDetected?.('bot-1', 0.81234, {
      anomalyScore: 0.81234,
      featureScores: { action: 1, timing: 0.7, movement: 0.6, session: 0, sequence: 0, velocity: 0 },
      flags: ['high_frequency'],
      timestamp: 12
    });
    listeners.onViolation?.({ subjectId: 'bot-1', endpoint: 'behavior', reason: 'anomaly', code: 'anomaly', timestamp: 12 });
    listeners.onViolation?.({ subjectId: 'p1', endpoint: 'PurchaseItem', reason: 'cooldown', code: 'cooldown', timestamp: 3 });

    const snapshot: SubjectSnapshot = {
      subjectId: 'p1',
      adaptive: { violationCount: 3, throttleMultiplier: 1.5, trustScore: 0.8, lastViolationTime: 3 },
      violations: [],
      analysis: { riskScore: 0.12345, anomalyScore: 0, behaviorCategory: 'NORMAL', confidence: 0.9, sampleCount: 4 },
      featureScores: { action: 0, timing: 0, movement: 0, session: 0, sequence: 0, velocity: 0 },
      createdAt: 0,
      lastSeen: 3
    };
    listeners.onSubjectEvicted?.(snapshot, 'disconnect');

    const events = audit.list(10);
    expect(events.map(e => e.kind)).toEqual(['anomaly', 'violation', 'eviction']);
    expect(events[0].details).toMatchObject({ score: 0.812, flags: ['high_frequency'], at: 12 });
    expect(events[1].details).toEqual({ endpoint: 'PurchaseItem', code: 'cooldown', reason: 'cooldown', at: 3 });
    expect(events[2].details).toEqual({
      reason: 'disconnect', category: 'NORMAL', riskScore: 0.123, anomalyScore: 0, violations: 0, throttleMultiplier: 1.5
    });
    await audit.flush();
    jest.restoreAllMocks();
  });
});
