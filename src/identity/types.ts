/**
 * Identity Domain Types
 *
 * Users, tenant services and the service-scoped RBAC graph.
 */

// ============================================================================
// Users
// ============================================================================

export type User = {
  id: string;
  firstName: string;
  middleName: string | null;
  lastName: string;
  /** Unique, stored as given */
  email: string;
  hashedPassword: string;
  isActive: boolean;
  isVerified: boolean;
  /** Consecutive failed password attempts, never negative */
  failedLoginAttempts: number;
  /** Lock expiry in UTC; null when not locked */
  lockedUntil: Date | null;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = {
  firstName: string;
  middleName?: string | null;
  lastName: string;
  email: string;
  hashedPassword: string;
  isActive?: boolean;
  isVerified?: boolean;
};

/**
 * Columns `updateUser` may change. Only the keys present are written, so a
 * patch never carries stale values for fields it does not own.
 */
export type UserPatch = Partial<
  Pick<
    User,
    | "firstName"
    | "middleName"
    | "lastName"
    | "email"
    | "hashedPassword"
    | "isActive"
    | "isVerified"
    | "failedLoginAttempts"
    | "lockedUntil"
    | "isDeleted"
  >
>;

export type PublicUser = Omit<User, "hashedPassword">;

export function toPublicUser(user: User): PublicUser {
  const { hashedPassword: _hashedPassword, ...rest } = user;
  return rest;
}

// ============================================================================
// Services (tenants)
// ============================================================================

export type Service = {
  id: string;
  name: string;
  description: string | null;
  isActive: boolean;
  url: string | null;
  port: number | null;
};

export type NewService = {
  name: string;
  description?: string | null;
  isActive?: boolean;
  url?: string | null;
  port?: number | null;
};

/** Membership of a user in a service */
export type UserServiceAssignment = {
  userId: string;
  serviceId: string;
  serviceName: string;
  assignedAt: Date;
};

// ============================================================================
// Roles & Permissions
// ============================================================================

export type Role = {
  id: string;
  serviceId: string;
  /** Owning service name, denormalized for claims and display */
  serviceName: string;
  name: string;
  description: string;
  isActive: boolean;
};

export type RoleUpdate = Partial<Pick<Role, "name" | "description" | "isActive">>;

export type NewRole = {
  serviceId: string;
  name: string;
  description: string;
  isActive?: boolean;
};

export type Permission = {
  id: string;
  serviceId: string;
  serviceName: string;
  name: string;
  resource: string;
  action: string;
  description: string | null;
};

export type NewPermission = {
  serviceId: string;
  name: string;
  resource: string;
  action: string;
  description?: string | null;
};

export type PermissionUpdate = Partial<Pick<Permission, "name" | "resource" | "action" | "description">>;

/** A service permission and whether a given role links to it */
export type RolePermissionStatus = {
  permission: Permission;
  assigned: boolean;
};

export type PermissionSource = "role" | "direct";

/**
 * A permission the user holds, tagged with how it was obtained.
 * A permission reachable through a role and a direct grant yields two entries.
 */
export type UserPermission = {
  service: string;
  resource: string;
  action: string;
  name: string;
  source: PermissionSource;
};

export type PermissionTarget = {
  service: string;
  resource: string;
  action: string;
};

/** Role names grouped by owning service name */
export type RolesByService = Record<string, string[]>;

export type UserWithRoles = {
  user: User;
  roles: Role[];
};
