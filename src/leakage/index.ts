/**
 * Advisory temporal leakage audit.
 */

export {
  auditTemporalLeakage,
  detectSessions,
  type LeakageReport,
  type LeakageAuditOptions,
  type SessionCluster,
  type TemporalCheckStatus,
} from "./auditor.js";
