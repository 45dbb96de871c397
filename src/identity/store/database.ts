import fs from "node:fs";
import path from "node:path";
import { createRequire } from "node:module";
import initSqlJs, { type BindParams, type Database, type SqlValue } from "sql.js";
import { IdentityError } from "../errors.js";

export type Row = Record<string, SqlValue>;

const MEMORY_PATH = ":memory:";

const require = createRequire(import.meta.url);

/**
 * Finds sql-wasm.wasm inside the installed sql.js package, falling back to
 * the directory sql.js loaded its JS from.
 */
function locateSqlWasm(filename: string, scriptDirectory: string): string {
  try {
    return require.resolve(`sql.js/dist/${filename}`);
  } catch {
    return path.join(scriptDirectory, filename);
  }
}

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    first_name TEXT NOT NULL,
    middle_name TEXT,
    last_name TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    hashed_password TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 0,
    is_verified INTEGER NOT NULL DEFAULT 0,
    failed_login_attempts INTEGER NOT NULL DEFAULT 0 CHECK (failed_login_attempts >= 0),
    locked_until TEXT,
    is_deleted INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS services (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    description TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    url TEXT,
    port INTEGER,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS roles (
    id TEXT PRIMARY KEY,
    service_id TEXT NOT NULL REFERENCES services(id),
    name TEXT NOT NULL,
    description TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    UNIQUE (service_id, name)
  )`,
  `CREATE TABLE IF NOT EXISTS permissions (
    id TEXT PRIMARY KEY,
    service_id TEXT NOT NULL REFERENCES services(id),
    name TEXT NOT NULL,
    resource TEXT NOT NULL,
    action TEXT NOT NULL,
    description TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (service_id, resource, action)
  )`,
  `CREATE TABLE IF NOT EXISTS user_roles (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    role_id TEXT NOT NULL REFERENCES roles(id) ON DELETE CASCADE,
    assigned_at TEXT NOT NULL,
    UNIQUE (user_id, role_id)
  )`,
  `CREATE TABLE IF NOT EXISTS role_permissions (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    role_id TEXT NOT NULL REFERENCES roles(id) ON DELETE CASCADE,
    permission_id TEXT NOT NULL REFERENCES permissions(id) ON DELETE CASCADE,
    assigned_at TEXT NOT NULL,
    UNIQUE (role_id, permission_id)
  )`,
  `CREATE TABLE IF NOT EXISTS user_permissions (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    permission_id TEXT NOT NULL REFERENCES permissions(id) ON DELETE CASCADE,
    assigned_at TEXT NOT NULL,
    -- epoch milliseconds, compared numerically against the clock
    expires_at INTEGER,
    UNIQUE (user_id, permission_id)
  )`,
  `CREATE TABLE IF NOT EXISTS user_services (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    service_id TEXT NOT NULL REFERENCES services(id) ON DELETE CASCADE,
    assigned_at TEXT NOT NULL,
    UNIQUE (user_id, service_id)
  )`,
  `CREATE TABLE IF NOT EXISTS audit_log (
    sequence INTEGER PRIMARY KEY,
    id TEXT NOT NULL UNIQUE,
    timestamp TEXT NOT NULL,
    kind TEXT NOT NULL,
    severity TEXT NOT NULL,
    user_id TEXT,
    email TEXT,
    details_json TEXT,
    previous_hash TEXT NOT NULL,
    content_hash TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_roles_service ON roles(service_id)`,
  `CREATE INDEX IF NOT EXISTS idx_permissions_service ON permissions(service_id)`,
  `CREATE INDEX IF NOT EXISTS idx_user_roles_user ON user_roles(user_id)`,
  `CREATE INDEX IF NOT EXISTS idx_role_permissions_role ON role_permissions(role_id)`,
  `CREATE INDEX IF NOT EXISTS idx_user_permissions_user ON user_permissions(user_id)`,
  `CREATE INDEX IF NOT EXISTS idx_user_services_user ON user_services(user_id)`,
  `CREATE INDEX IF NOT EXISTS idx_audit_user ON audit_log(user_id)`,
  `CREATE INDEX IF NOT EXISTS idx_audit_kind ON audit_log(kind)`
];

/**
 * sql.js connection shared by the credential store and the audit trail.
 *
 * sql.js runs SQLite in memory; when opened with a file path the whole
 * image is written back to that file after every committed write.
 */
export class SqliteDatabase {
  private readonly db: Database;
  private readonly dbPath: string;
  private depth = 0;

  private constructor(db: Database, dbPath: string) {
    this.db = db;
    this.dbPath = dbPath;
  }

  static async open(dbPath: string = MEMORY_PATH): Promise<SqliteDatabase> {
    const SQL = await initSqlJs({ locateFile: locateSqlWasm }).catch((err: unknown) => {
      throw new IdentityError("STORE_ERROR", "Failed to initialize sql.js (missing/invalid wasm?)", {
        err: err instanceof Error ? { name: err.name, message: err.message } : err
      });
    });

    let db: Database;
    if (dbPath !== MEMORY_PATH && fs.existsSync(dbPath)) {
      db = new SQL.Database(fs.readFileSync(dbPath));
    } else {
      if (dbPath !== MEMORY_PATH) {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      db = new SQL.Database();
    }

    const database = new SqliteDatabase(db, dbPath);
    database.migrate();
    return database;
  }

  get path(): string {
    return this.dbPath;
  }

  /** @returns number of rows changed */
  run(sql: string, params: BindParams = []): number {
    return this.guard(() => {
      this.db.run(sql, params);
      const changed = this.db.getRowsModified();
      if (this.depth === 0) this.flush();
      return changed;
    });
  }

  all(sql: string, params: BindParams = []): Row[] {
    return this.guard(() => {
      const stmt = this.db.prepare(sql);
      try {
        stmt.bind(params);
        const rows: Row[] = [];
        while (stmt.step()) {
          rows.push(stmt.getAsObject());
        }
        return rows;
      } finally {
        stmt.free();
      }
    });
  }

  get(sql: string, params: BindParams = []): Row | null {
    return this.all(sql, params)[0] ?? null;
  }

  /**
   * Runs `fn` inside BEGIN/COMMIT, rolling back if it throws. Nested calls
   * join the outer transaction.
   */
  transaction<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth++;
      try {
        return fn();
      } finally {
        this.depth--;
      }
    }

    this.db.run("BEGIN");
    this.depth = 1;
    try {
      const result = fn();
      this.db.run("COMMIT");
      this.depth = 0;
      this.flush();
      return result;
    } catch (err) {
      this.depth = 0;
      this.db.run("ROLLBACK");
      throw err;
    }
  }

  flush(): void {
    if (this.dbPath === MEMORY_PATH) return;
    fs.writeFileSync(this.dbPath, Buffer.from(this.db.export()));
    // export() reopens the database, which resets pragmas
    this.db.run("PRAGMA foreign_keys = ON");
  }

  close(): void {
    this.flush();
    this.db.close();
  }

  private migrate(): void {
    this.db.run("PRAGMA foreign_keys = ON");
    for (const statement of SCHEMA) {
      this.db.run(statement);
    }
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toStoreError(err);
    }
  }
}

export function toStoreError(err: unknown): IdentityError {
  if (err instanceof IdentityError) return err;
  const message = err instanceof Error ? err.message : String(err);
  if (message.includes("UNIQUE constraint failed")) {
    return new IdentityError("CONFLICT", "Record already exists", { cause: message });
  }
  return new IdentityError("STORE_ERROR", "Credential store operation failed", { cause: message });
}

export function toBit(value: boolean): number {
  return value ? 1 : 0;
}

export function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new IdentityError("STORE_ERROR", `Column ${column} is not text`);
  }
  return value;
}

export function readNullableString(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === "string" ? value : null;
}

export function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== "number") {
    throw new IdentityError("STORE_ERROR", `Column ${column} is not numeric`);
  }
  return value;
}

export function readBoolean(row: Row, column: string): boolean {
  return readNumber(row, column) !== 0;
}
