/**
 * Security Audit Module
 *
 * Tamper-evident, append-only record of security events.
 */

export {
  type AuditEntry,
  type AuditQuery,
  type AuditQueryInput,
  type ChainVerificationResult,
  AuditQuerySchema
} from "./types.js";

export { AuditTrail, createAuditObserver, GENESIS_HASH } from "./auditTrail.js";
