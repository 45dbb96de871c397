import crypto from "node:crypto";
import type { BindParams, SqlValue } from "sql.js";
import { IdentityError } from "../errors.js";
import { parseUtcTimestamp, systemClock, toUtcTimestamp, type Clock } from "../time.js";
import type {
  NewPermission,
  NewRole,
  NewService,
  NewUser,
  Permission,
  PermissionTarget,
  PermissionUpdate,
  Role,
  RolePermissionStatus,
  RoleUpdate,
  Service,
  User,
  UserPatch,
  UserPermission,
  UserServiceAssignment
} from "../types.js";
import type { CredentialStore } from "./types.js";
import {
  readBoolean,
  readNullableString,
  readNumber,
  readString,
  toBit,
  type Row,
  type SqliteDatabase
} from "./database.js";

const ROLE_COLUMNS = `r.id, r.service_id, s.name AS service_name, r.name, r.description, r.is_active`;
const PERMISSION_COLUMNS = `p.id, p.service_id, s.name AS service_name, p.name, p.resource, p.action, p.description`;

function toUser(row: Row): User {
  const lockedUntil = readNullableString(row, "locked_until");
  return {
    id: readString(row, "id"),
    firstName: readString(row, "first_name"),
    middleName: readNullableString(row, "middle_name"),
    lastName: readString(row, "last_name"),
    email: readString(row, "email"),
    hashedPassword: readString(row, "hashed_password"),
    isActive: readBoolean(row, "is_active"),
    isVerified: readBoolean(row, "is_verified"),
    failedLoginAttempts: readNumber(row, "failed_login_attempts"),
    lockedUntil: parseUtcTimestamp(lockedUntil),
    isDeleted: readBoolean(row, "is_deleted"),
    createdAt: parseUtcTimestamp(readString(row, "created_at")) ?? new Date(0),
    updatedAt: parseUtcTimestamp(readString(row, "updated_at")) ?? new Date(0)
  };
}

function toService(row: Row): Service {
  const port = row.port;
  return {
    id: readString(row, "id"),
    name: readString(row, "name"),
    description: readNullableString(row, "description"),
    isActive: readBoolean(row, "is_active"),
    url: readNullableString(row, "url"),
    port: typeof port === "number" ? port : null
  };
}

function toRole(row: Row): Role {
  return {
    id: readString(row, "id"),
    serviceId: readString(row, "service_id"),
    serviceName: readString(row, "service_name"),
    name: readString(row, "name"),
    description: readString(row, "description"),
    isActive: readBoolean(row, "is_active")
  };
}

function toPermission(row: Row): Permission {
  return {
    id: readString(row, "id"),
    serviceId: readString(row, "service_id"),
    serviceName: readString(row, "service_name"),
    name: readString(row, "name"),
    resource: readString(row, "resource"),
    action: readString(row, "action"),
    description: readNullableString(row, "description")
  };
}

function toUserPermission(row: Row, source: UserPermission["source"]): UserPermission {
  return {
    service: readString(row, "service_name"),
    resource: readString(row, "resource"),
    action: readString(row, "action"),
    name: readString(row, "name"),
    source
  };
}

function mapDefined<T, R>(value: T | undefined, map: (value: T) => R): R | undefined {
  return value === undefined ? undefined : map(value);
}

/** Builds `UPDATE ... SET` from the columns a patch actually carries */
class ColumnChanges {
  private readonly columns: string[] = [];
  private readonly values: SqlValue[] = [];

  set(column: string, value: SqlValue | undefined): void {
    if (value === undefined) return;
    this.columns.push(`${column} = ?`);
    this.values.push(value);
  }

  isEmpty(): boolean {
    return this.columns.length === 0;
  }

  /** @returns number of rows changed */
  update(table: string, id: string, db: SqliteDatabase): number {
    return db.run(`UPDATE ${table} SET ${this.columns.join(", ")} WHERE id = ?`, [...this.values, id]);
  }
}

/**
 * SQLite-backed credential store (sql.js).
 */
export class SqliteCredentialStore implements CredentialStore {
  private readonly db: SqliteDatabase;
  private readonly clock: Clock;

  constructor(db: SqliteDatabase, options?: { clock?: Clock }) {
    this.db = db;
    this.clock = options?.clock ?? systemClock;
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  async getUserByEmail(email: string): Promise<User | null> {
    const row = this.db.get(`SELECT * FROM users WHERE email = ? AND is_deleted = 0`, [email]);
    return row ? toUser(row) : null;
  }

  async getUserById(id: string): Promise<User | null> {
    const row = this.db.get(`SELECT * FROM users WHERE id = ? AND is_deleted = 0`, [id]);
    return row ? toUser(row) : null;
  }

  async createUser(user: NewUser): Promise<User> {
    const id = crypto.randomUUID();
    const now = toUtcTimestamp(this.clock());
    this.db.run(
      `INSERT INTO users (id, first_name, middle_name, last_name, email, hashed_password,
         is_active, is_verified, failed_login_attempts, locked_until, is_deleted, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, NULL, 0, ?, ?)`,
      [
        id,
        user.firstName,
        user.middleName ?? null,
        user.lastName,
        user.email,
        user.hashedPassword,
        toBit(user.isActive ?? false),
        toBit(user.isVerified ?? false),
        now,
        now
      ]
    );
    return this.requireUserRow(id);
  }

  async updateUser(id: string, patch: UserPatch): Promise<User> {
    const changes = new ColumnChanges();
    changes.set("first_name", patch.firstName);
    changes.set("middle_name", patch.middleName);
    changes.set("last_name", patch.lastName);
    changes.set("email", patch.email);
    changes.set("hashed_password", patch.hashedPassword);
    changes.set("is_active", mapDefined(patch.isActive, toBit));
    changes.set("is_verified", mapDefined(patch.isVerified, toBit));
    changes.set("failed_login_attempts", patch.failedLoginAttempts);
    changes.set("locked_until", mapDefined(patch.lockedUntil, d => (d ? toUtcTimestamp(d) : null)));
    changes.set("is_deleted", mapDefined(patch.isDeleted, toBit));
    changes.set("updated_at", toUtcTimestamp(this.clock()));

    if (changes.update("users", id, this.db) === 0) {
      throw new IdentityError("NOT_FOUND", `User ${id} not found`);
    }
    return this.requireUserRow(id);
  }

  async listUsers(): Promise<User[]> {
    return this.db.all(`SELECT * FROM users WHERE is_deleted = 0 ORDER BY created_at, email`).map(toUser);
  }

  // ==========================================================================
  // Services
  // ==========================================================================

  async createService(service: NewService): Promise<Service> {
    const id = crypto.randomUUID();
    this.db.run(
      `INSERT INTO services (id, name, description, is_active, url, port, created_at) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        id,
        service.name,
        service.description ?? null,
        toBit(service.isActive ?? true),
        service.url ?? null,
        service.port ?? null,
        toUtcTimestamp(this.clock())
      ]
    );
    return this.requireRow(`SELECT * FROM services WHERE id = ?`, [id], toService);
  }

  async getServiceById(id: string): Promise<Service | null> {
    const row = this.db.get(`SELECT * FROM services WHERE id = ?`, [id]);
    return row ? toService(row) : null;
  }

  async getServiceByName(name: string): Promise<Service | null> {
    const row = this.db.get(`SELECT * FROM services WHERE name = ?`, [name]);
    return row ? toService(row) : null;
  }

  async listServices(): Promise<Service[]> {
    return this.db.all(`SELECT * FROM services ORDER BY name`).map(toService);
  }

  async assignServiceToUser(userId: string, serviceId: string): Promise<UserServiceAssignment> {
    this.db.run(`INSERT INTO user_services (user_id, service_id, assigned_at) VALUES (?, ?, ?)`, [
      userId,
      serviceId,
      toUtcTimestamp(this.clock())
    ]);
    return this.requireRow(
      `SELECT us.user_id, us.service_id, s.name AS service_name, us.assigned_at
       FROM user_services us JOIN services s ON s.id = us.service_id
       WHERE us.user_id = ? AND us.service_id = ?`,
      [userId, serviceId],
      row => ({
        userId: readString(row, "user_id"),
        serviceId: readString(row, "service_id"),
        serviceName: readString(row, "service_name"),
        assignedAt: parseUtcTimestamp(readString(row, "assigned_at")) ?? new Date(0)
      })
    );
  }

  async unassignServiceFromUser(userId: string, serviceId: string): Promise<boolean> {
    return this.db.transaction(() => {
      this.db.run(
        `DELETE FROM user_roles
         WHERE user_id = ? AND role_id IN (SELECT id FROM roles WHERE service_id = ?)`,
        [userId, serviceId]
      );
      return this.db.run(`DELETE FROM user_services WHERE user_id = ? AND service_id = ?`, [userId, serviceId]) > 0;
    });
  }

  async listUserServices(userId: string): Promise<Service[]> {
    return this.db
      .all(
        `SELECT s.* FROM user_services us JOIN services s ON s.id = us.service_id
         WHERE us.user_id = ? ORDER BY us.seq`,
        [userId]
      )
      .map(toService);
  }

  async hasUserService(userId: string, serviceId: string): Promise<boolean> {
    const row = this.db.get(`SELECT 1 AS hit FROM user_services WHERE user_id = ? AND service_id = ?`, [
      userId,
      serviceId
    ]);
    return row !== null;
  }

  // ==========================================================================
  // Roles
  // ==========================================================================

  async createRole(role: NewRole): Promise<Role> {
    const id = crypto.randomUUID();
    this.db.run(
      `INSERT INTO roles (id, service_id, name, description, is_active, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
      [id, role.serviceId, role.name, role.description, toBit(role.isActive ?? true), toUtcTimestamp(this.clock())]
    );
    return this.requireRow(
      `SELECT ${ROLE_COLUMNS} FROM roles r JOIN services s ON s.id = r.service_id WHERE r.id = ?`,
      [id],
      toRole
    );
  }

  async getRoleById(id: string): Promise<Role | null> {
    const row = this.db.get(
      `SELECT ${ROLE_COLUMNS} FROM roles r JOIN services s ON s.id = r.service_id WHERE r.id = ?`,
      [id]
    );
    return row ? toRole(row) : null;
  }

  async getRoleByName(serviceId: string, name: string): Promise<Role | null> {
    const row = this.db.get(
      `SELECT ${ROLE_COLUMNS} FROM roles r JOIN services s ON s.id = r.service_id
       WHERE r.service_id = ? AND r.name = ?`,
      [serviceId, name]
    );
    return row ? toRole(row) : null;
  }

  async listRoles(serviceId: string): Promise<Role[]> {
    return this.db
      .all(
        `SELECT ${ROLE_COLUMNS} FROM roles r JOIN services s ON s.id = r.service_id
         WHERE r.service_id = ? ORDER BY r.name`,
        [serviceId]
      )
      .map(toRole);
  }

  async updateRole(id: string, patch: RoleUpdate): Promise<Role> {
    const changes = new ColumnChanges();
    changes.set("name", patch.name);
    changes.set("description", patch.description);
    changes.set("is_active", mapDefined(patch.isActive, toBit));

    if (!changes.isEmpty()) changes.update("roles", id, this.db);

    const role = await this.getRoleById(id);
    if (!role) {
      throw new IdentityError("NOT_FOUND", `Role ${id} not found`);
    }
    return role;
  }

  async deleteRole(id: string): Promise<boolean> {
    return this.db.transaction(() => {
      this.db.run(`DELETE FROM user_roles WHERE role_id = ?`, [id]);
      this.db.run(`DELETE FROM role_permissions WHERE role_id = ?`, [id]);
      return this.db.run(`DELETE FROM roles WHERE id = ?`, [id]) > 0;
    });
  }

  async getUserRoles(userId: string): Promise<Role[]> {
    return this.db
      .all(
        `SELECT ${ROLE_COLUMNS} FROM user_roles ur
         JOIN roles r ON r.id = ur.role_id
         JOIN services s ON s.id = r.service_id
         WHERE ur.user_id = ?
         ORDER BY ur.seq`,
        [userId]
      )
      .map(toRole);
  }

  async assignRole(userId: string, roleId: string): Promise<boolean> {
    const changed = this.db.run(
      `INSERT OR IGNORE INTO user_roles (user_id, role_id, assigned_at) VALUES (?, ?, ?)`,
      [userId, roleId, toUtcTimestamp(this.clock())]
    );
    return changed > 0;
  }

  async unassignRole(userId: string, roleId: string): Promise<boolean> {
    return this.db.run(`DELETE FROM user_roles WHERE user_id = ? AND role_id = ?`, [userId, roleId]) > 0;
  }

  // ==========================================================================
  // Permissions
  // ==========================================================================

  async createPermission(permission: NewPermission): Promise<Permission> {
    const id = crypto.randomUUID();
    this.db.run(
      `INSERT INTO permissions (id, service_id, name, resource, action, description, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        id,
        permission.serviceId,
        permission.name,
        permission.resource,
        permission.action,
        permission.description ?? null,
        toUtcTimestamp(this.clock())
      ]
    );
    return this.requireRow(
      `SELECT ${PERMISSION_COLUMNS} FROM permissions p JOIN services s ON s.id = p.service_id WHERE p.id = ?`,
      [id],
      toPermission
    );
  }

  async getPermissionById(id: string): Promise<Permission | null> {
    const row = this.db.get(
      `SELECT ${PERMISSION_COLUMNS} FROM permissions p JOIN services s ON s.id = p.service_id WHERE p.id = ?`,
      [id]
    );
    return row ? toPermission(row) : null;
  }

  async listPermissions(serviceId: string): Promise<Permission[]> {
    return this.db
      .all(
        `SELECT ${PERMISSION_COLUMNS} FROM permissions p JOIN services s ON s.id = p.service_id
         WHERE p.service_id = ? ORDER BY p.resource, p.action`,
        [serviceId]
      )
      .map(toPermission);
  }

  async updatePermission(id: string, patch: PermissionUpdate): Promise<Permission> {
    const changes = new ColumnChanges();
    changes.set("name", patch.name);
    changes.set("resource", patch.resource);
    changes.set("action", patch.action);
    changes.set("description", patch.description);

    if (!changes.isEmpty()) changes.update("permissions", id, this.db);

    const permission = await this.getPermissionById(id);
    if (!permission) {
      throw new IdentityError("NOT_FOUND", `Permission ${id} not found`);
    }
    return permission;
  }

  async listPermissionsForRole(roleId: string, serviceId: string): Promise<RolePermissionStatus[]> {
    return this.db
      .all(
        `SELECT ${PERMISSION_COLUMNS}, rp.role_id IS NOT NULL AS assigned
         FROM permissions p
         JOIN services s ON s.id = p.service_id
         LEFT JOIN role_permissions rp ON rp.permission_id = p.id AND rp.role_id = ?
         WHERE p.service_id = ?
         ORDER BY p.resource, p.action`,
        [roleId, serviceId]
      )
      .map(row => ({ permission: toPermission(row), assigned: readBoolean(row, "assigned") }));
  }

  async countPermissionAssignments(permissionId: string): Promise<number> {
    const row = this.db.get(`SELECT COUNT(*) AS n FROM role_permissions WHERE permission_id = ?`, [permissionId]);
    return row ? readNumber(row, "n") : 0;
  }

  async deletePermission(id: string): Promise<boolean> {
    return this.db.transaction(() => {
      this.db.run(`DELETE FROM user_permissions WHERE permission_id = ?`, [id]);
      return this.db.run(`DELETE FROM permissions WHERE id = ?`, [id]) > 0;
    });
  }

  async assignPermissionToRole(roleId: string, permissionId: string): Promise<boolean> {
    const changed = this.db.run(
      `INSERT OR IGNORE INTO role_permissions (role_id, permission_id, assigned_at) VALUES (?, ?, ?)`,
      [roleId, permissionId, toUtcTimestamp(this.clock())]
    );
    return changed > 0;
  }

  async unassignPermissionFromRole(roleId: string, permissionId: string): Promise<boolean> {
    return (
      this.db.run(`DELETE FROM role_permissions WHERE role_id = ? AND permission_id = ?`, [roleId, permissionId]) > 0
    );
  }

  async grantPermission(userId: string, permissionId: string, expiresAt: Date | null): Promise<boolean> {
    const changed = this.db.run(
      `INSERT INTO user_permissions (user_id, permission_id, assigned_at, expires_at) VALUES (?, ?, ?, ?)
       ON CONFLICT (user_id, permission_id) DO UPDATE SET expires_at = excluded.expires_at`,
      [userId, permissionId, toUtcTimestamp(this.clock()), expiresAt ? expiresAt.getTime() : null]
    );
    return changed > 0;
  }

  async revokePermission(userId: string, permissionId: string): Promise<boolean> {
    return (
      this.db.run(`DELETE FROM user_permissions WHERE user_id = ? AND permission_id = ?`, [userId, permissionId]) > 0
    );
  }

  // ==========================================================================
  // Permission queries
  // ==========================================================================

  async hasRolePermission(userId: string, target: PermissionTarget): Promise<boolean> {
    const row = this.db.get(
      `SELECT 1 AS hit FROM user_roles ur
       JOIN role_permissions rp ON rp.role_id = ur.role_id
       JOIN permissions p ON p.id = rp.permission_id
       JOIN services s ON s.id = p.service_id
       WHERE ur.user_id = ? AND s.name = ? AND p.resource = ? AND p.action = ?
       LIMIT 1`,
      [userId, target.service, target.resource, target.action]
    );
    return row !== null;
  }

  async hasDirectPermission(userId: string, target: PermissionTarget, now: Date): Promise<boolean> {
    const row = this.db.get(
      `SELECT 1 AS hit FROM user_permissions up
       JOIN permissions p ON p.id = up.permission_id
       JOIN services s ON s.id = p.service_id
       WHERE up.user_id = ? AND s.name = ? AND p.resource = ? AND p.action = ?
         AND (up.expires_at IS NULL OR up.expires_at > ?)
       LIMIT 1`,
      [userId, target.service, target.resource, target.action, now.getTime()]
    );
    return row !== null;
  }

  async listRolePermissions(userId: string, service?: string): Promise<UserPermission[]> {
    const params: SqlValue[] = [userId];
    let filter = "";
    if (service !== undefined) {
      filter = "AND s.name = ?";
      params.push(service);
    }
    return this.db
      .all(
        `SELECT DISTINCT p.id, s.name AS service_name, p.resource, p.action, p.name
         FROM user_roles ur
         JOIN role_permissions rp ON rp.role_id = ur.role_id
         JOIN permissions p ON p.id = rp.permission_id
         JOIN services s ON s.id = p.service_id
         WHERE ur.user_id = ? ${filter}
         ORDER BY s.name, p.resource, p.action`,
        params
      )
      .map(row => toUserPermission(row, "role"));
  }

  async listDirectPermissions(userId: string, now: Date, service?: string): Promise<UserPermission[]> {
    const params: SqlValue[] = [userId, now.getTime()];
    let filter = "";
    if (service !== undefined) {
      filter = "AND s.name = ?";
      params.push(service);
    }
    return this.db
      .all(
        `SELECT s.name AS service_name, p.resource, p.action, p.name
         FROM user_permissions up
         JOIN permissions p ON p.id = up.permission_id
         JOIN services s ON s.id = p.service_id
         WHERE up.user_id = ? AND (up.expires_at IS NULL OR up.expires_at > ?) ${filter}
         ORDER BY up.seq`,
        params
      )
      .map(row => toUserPermission(row, "direct"));
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  // Reads the row regardless of the soft-delete flag, so a just-deleted user can be returned
  private requireUserRow(id: string): User {
    return this.requireRow(`SELECT * FROM users WHERE id = ?`, [id], toUser);
  }

  private requireRow<T>(sql: string, params: BindParams, map: (row: Row) => T): T {
    const row = this.db.get(sql, params);
    if (!row) {
      throw new IdentityError("STORE_ERROR", "Row vanished after write");
    }
    return map(row);
  }
}
