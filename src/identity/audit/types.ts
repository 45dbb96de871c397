import { z } from "zod";
import { SecurityEventKindEnum, type SecurityEventKind, type Severity } from "../events.js";

/**
 * Security Audit Trail Types
 *
 * Append-only, tamper-evident record of security events. Each entry's content
 * hash covers the previous entry's hash, so editing or removing a row breaks
 * every link after it.
 */

// ============================================================================
// Audit Entry
// ============================================================================

export type AuditEntry = {
  id: string;
  /** Position in the chain, starting at 0 */
  sequence: number;
  /** ISO 8601, UTC */
  timestamp: string;
  kind: SecurityEventKind;
  severity: Severity;
  userId: string | null;
  email: string | null;
  details: Record<string, unknown> | null;
  previousHash: string;
  contentHash: string;
};

// ============================================================================
// Audit Query
// ============================================================================

export const AuditQuerySchema = z.object({
  userId: z.string().optional(),
  kinds: z.array(SecurityEventKindEnum).optional(),
  /** Only entries with a greater sequence (pagination) */
  afterSequence: z.number().int().optional(),
  limit: z.number().int().positive().max(1000).default(100),
  order: z.enum(["asc", "desc"]).default("desc")
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;
export type AuditQueryInput = z.input<typeof AuditQuerySchema>;

// ============================================================================
// Chain verification
// ============================================================================

export type ChainVerificationResult = {
  valid: boolean;
  startSequence: number;
  endSequence: number;
  entriesChecked: number;
  /** First broken link if invalid */
  brokenAt?: number;
  hashMismatch?: {
    expected: string;
    actual: string;
  };
};
