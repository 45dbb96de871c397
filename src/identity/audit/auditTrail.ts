import crypto from "node:crypto";
import type { SqlValue } from "sql.js";
import { z } from "zod";
import { IdentityError } from "../errors.js";
import { SecurityEventKindEnum, SeverityEnum, type SecurityEvent, type SecurityEventObserver } from "../events.js";
import { readNullableString, readNumber, readString, type Row, type SqliteDatabase } from "../store/database.js";
import { AuditQuerySchema, type AuditEntry, type AuditQueryInput, type ChainVerificationResult } from "./types.js";

const DetailsSchema = z.record(z.unknown()).nullable();

type HashedContent = {
  sequence: number;
  timestamp: string;
  kind: string;
  severity: string;
  userId: string | null;
  email: string | null;
  detailsJson: string | null;
  previousHash: string;
};

function hash(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

// Hashes the stored JSON text, not the parsed object, so verification sees exactly what was written
function contentHashOf(content: HashedContent): string {
  return hash(
    JSON.stringify({
      sequence: content.sequence,
      timestamp: content.timestamp,
      kind: content.kind,
      severity: content.severity,
      userId: content.userId,
      email: content.email,
      details: content.detailsJson,
      previousHash: content.previousHash
    })
  );
}

export const GENESIS_HASH = hash("GENESIS");

function toHashedContent(row: Row): HashedContent {
  return {
    sequence: readNumber(row, "sequence"),
    timestamp: readString(row, "timestamp"),
    kind: readString(row, "kind"),
    severity: readString(row, "severity"),
    userId: readNullableString(row, "user_id"),
    email: readNullableString(row, "email"),
    detailsJson: readNullableString(row, "details_json"),
    previousHash: readString(row, "previous_hash")
  };
}

function toAuditEntry(row: Row): AuditEntry {
  const detailsJson = readNullableString(row, "details_json");
  return {
    id: readString(row, "id"),
    sequence: readNumber(row, "sequence"),
    timestamp: readString(row, "timestamp"),
    kind: SecurityEventKindEnum.parse(readString(row, "kind")),
    severity: SeverityEnum.parse(readString(row, "severity")),
    userId: readNullableString(row, "user_id"),
    email: readNullableString(row, "email"),
    details: detailsJson === null ? null : DetailsSchema.parse(JSON.parse(detailsJson)),
    previousHash: readString(row, "previous_hash"),
    contentHash: readString(row, "content_hash")
  };
}

/**
 * Hash-chained audit log stored in the `audit_log` table.
 */
export class AuditTrail {
  private readonly db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.db = db;
  }

  async append(event: SecurityEvent): Promise<AuditEntry> {
    return this.db.transaction(() => {
      const latest = this.db.get(`SELECT sequence, content_hash FROM audit_log ORDER BY sequence DESC LIMIT 1`);
      const sequence = latest ? readNumber(latest, "sequence") + 1 : 0;
      const previousHash = latest ? readString(latest, "content_hash") : GENESIS_HASH;

      const content: HashedContent = {
        sequence,
        timestamp: event.timestamp.toISOString(),
        kind: event.kind,
        severity: event.severity,
        userId: event.userId,
        email: event.email,
        detailsJson: event.details === undefined ? null : JSON.stringify(event.details),
        previousHash
      };
      const id = crypto.randomUUID();
      const contentHash = contentHashOf(content);

      this.db.run(
        `INSERT INTO audit_log (sequence, id, timestamp, kind, severity, user_id, email, details_json, previous_hash, content_hash)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          sequence,
          id,
          content.timestamp,
          content.kind,
          content.severity,
          content.userId,
          content.email,
          content.detailsJson,
          previousHash,
          contentHash
        ]
      );

      return this.requireEntry(sequence);
    });
  }

  async query(input: AuditQueryInput = {}): Promise<AuditEntry[]> {
    const query = AuditQuerySchema.parse(input);
    const conditions: string[] = [];
    const params: SqlValue[] = [];

    if (query.userId !== undefined) {
      conditions.push("user_id = ?");
      params.push(query.userId);
    }
    if (query.kinds?.length) {
      conditions.push(`kind IN (${query.kinds.map(() => "?").join(", ")})`);
      params.push(...query.kinds);
    }
    if (query.afterSequence !== undefined) {
      conditions.push("sequence > ?");
      params.push(query.afterSequence);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const order = query.order === "asc" ? "ASC" : "DESC";
    params.push(query.limit);

    return this.db.all(`SELECT * FROM audit_log ${where} ORDER BY sequence ${order} LIMIT ?`, params).map(toAuditEntry);
  }

  async getLatest(): Promise<AuditEntry | null> {
    const row = this.db.get(`SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1`);
    return row ? toAuditEntry(row) : null;
  }

  /**
   * Re-computes every content hash in the range and checks each link to its
   * predecessor. Defaults to the whole chain; an empty log is valid.
   *
   * @throws IdentityError BAD_REQUEST for a range outside the log
   */
  async verifyChain(startSequence = 0, endSequence?: number): Promise<ChainVerificationResult> {
    const latest = this.db.get(`SELECT MAX(sequence) AS last FROM audit_log`);
    const last = latest && typeof latest.last === "number" ? latest.last : -1;

    if (last === -1 && endSequence === undefined && startSequence === 0) {
      return { valid: true, startSequence: 0, endSequence: -1, entriesChecked: 0 };
    }

    const end = endSequence ?? last;
    if (startSequence < 0 || end > last || startSequence > end) {
      throw new IdentityError("BAD_REQUEST", "Invalid sequence range", { startSequence, endSequence: end, last });
    }

    let previousHash =
      startSequence === 0 ? GENESIS_HASH : this.requireRow(startSequence - 1, "content_hash");

    const rows = this.db.all(`SELECT * FROM audit_log WHERE sequence BETWEEN ? AND ? ORDER BY sequence ASC`, [
      startSequence,
      end
    ]);

    let entriesChecked = 0;
    let expectedSequence = startSequence;
    for (const row of rows) {
      entriesChecked++;
      const content = toHashedContent(row);
      const contentHash = readString(row, "content_hash");

      if (content.sequence !== expectedSequence || content.previousHash !== previousHash) {
        return {
          valid: false,
          startSequence,
          endSequence: end,
          entriesChecked,
          brokenAt: expectedSequence,
          hashMismatch: { expected: previousHash, actual: content.previousHash }
        };
      }

      const expected = contentHashOf(content);
      if (expected !== contentHash) {
        return {
          valid: false,
          startSequence,
          endSequence: end,
          entriesChecked,
          brokenAt: content.sequence,
          hashMismatch: { expected, actual: contentHash }
        };
      }

      previousHash = contentHash;
      expectedSequence++;
    }

    if (expectedSequence !== end + 1) {
      // Rows missing from the tail of the range
      return { valid: false, startSequence, endSequence: end, entriesChecked, brokenAt: expectedSequence };
    }

    return { valid: true, startSequence, endSequence: end, entriesChecked };
  }

  private requireEntry(sequence: number): AuditEntry {
    const row = this.db.get(`SELECT * FROM audit_log WHERE sequence = ?`, [sequence]);
    if (!row) {
      throw new IdentityError("STORE_ERROR", `Audit entry ${sequence} not found`);
    }
    return toAuditEntry(row);
  }

  private requireRow(sequence: number, column: string): string {
    const row = this.db.get(`SELECT ${column} FROM audit_log WHERE sequence = ?`, [sequence]);
    if (!row) {
      throw new IdentityError("STORE_ERROR", `Audit entry ${sequence} not found`);
    }
    return readString(row, column);
  }
}

/** Persists every security event it sees */
export function createAuditObserver(trail: AuditTrail): SecurityEventObserver {
  return async (event) => {
    await trail.append(event);
  };
}
