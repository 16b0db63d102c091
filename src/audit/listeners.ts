import { GuardListeners } from '../types';
import { formatSubjectId, logError, logWarn, round } from '../utils';
import { AuditLog } from './AuditLog';

const TAG = 'guard';

/**
 * Default collaborator wiring for a running service: log and audit every
 * anomaly, violation and eviction the engine reports.
 */
export function createAuditListeners(audit: AuditLog): GuardListeners {
  return {
    onAnomalyDetected: (subjectId, score, details) => {
      logWarn(TAG, `Anomaly: ${formatSubjectId(subjectId)} score=${score.toFixed(2)} flags=${details.flags.join(',') || '-'}`);
      audit.append({
        kind: 'anomaly',
        subjectId,
        details: {
          score: round(score),
          flags: details.flags,
          featureScores: details.featureScores,
          at: details.timestamp
        }
      });
    },
    onViolation: record => {
      if (record.code === 'anomaly') return; // already audited as an anomaly
      audit.append({
        kind: 'violation',
        subjectId: record.subjectId,
        details: { endpoint: record.endpoint, code: record.code, reason: record.reason, at: record.timestamp }
      });
    },
    onSubjectEvicted: (snapshot, reason) => {
      audit.append({
        kind: 'eviction',
        subjectId: snapshot.subjectId,
        details: {
          reason,
          category: snapshot.analysis.behaviorCategory,
          riskScore: round(snapshot.analysis.riskScore),
          anomalyScore: round(snapshot.analysis.anomalyScore),
          violations: snapshot.violations.length,
          throttleMultiplier: round(snapshot.adaptive.throttleMultiplier)
        }
      });
    },
    onListenerError: err => {
      logError(TAG, 'Listener failed:', err instanceof Error ? err.message : String(err));
    }
  };
}
