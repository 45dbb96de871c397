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

/**
 * Credential Store
 *
 * Persistence boundary for users and the RBAC graph. Implementations wrap
 * their own driver errors into IdentityError (CONFLICT for uniqueness
 * violations, STORE_ERROR otherwise) so nothing raw leaks upward.
 *
 * Soft-deleted users are invisible to every lookup.
 */
export type CredentialStore = UserStore & RbacStore;

export type UserStore = {
  getUserByEmail(email: string): Promise<User | null>;
  getUserById(id: string): Promise<User | null>;
  createUser(user: NewUser): Promise<User>;
  /**
   * Writes only the columns present in `patch`. Reaches soft-deleted rows too.
   *
   * @throws IdentityError NOT_FOUND when no row has the id
   */
  updateUser(id: string, patch: UserPatch): Promise<User>;
  listUsers(): Promise<User[]>;
};

export type RbacStore = {
  createService(service: NewService): Promise<Service>;
  getServiceById(id: string): Promise<Service | null>;
  getServiceByName(name: string): Promise<Service | null>;
  listServices(): Promise<Service[]>;
  /** @throws IdentityError CONFLICT when the user is already a member */
  assignServiceToUser(userId: string, serviceId: string): Promise<UserServiceAssignment>;
  /** Drops the membership together with the user's roles in that service */
  unassignServiceFromUser(userId: string, serviceId: string): Promise<boolean>;
  listUserServices(userId: string): Promise<Service[]>;
  hasUserService(userId: string, serviceId: string): Promise<boolean>;

  createRole(role: NewRole): Promise<Role>;
  getRoleById(id: string): Promise<Role | null>;
  getRoleByName(serviceId: string, name: string): Promise<Role | null>;
  listRoles(serviceId: string): Promise<Role[]>;
  updateRole(id: string, patch: RoleUpdate): Promise<Role>;
  /** Removes the role with its user and permission links */
  deleteRole(id: string): Promise<boolean>;
  /** Roles across every service, in assignment order */
  getUserRoles(userId: string): Promise<Role[]>;
  /** @returns false when the assignment already existed */
  assignRole(userId: string, roleId: string): Promise<boolean>;
  /** @returns false when there was nothing to remove */
  unassignRole(userId: string, roleId: string): Promise<boolean>;

  createPermission(permission: NewPermission): Promise<Permission>;
  getPermissionById(id: string): Promise<Permission | null>;
  listPermissions(serviceId: string): Promise<Permission[]>;
  updatePermission(id: string, patch: PermissionUpdate): Promise<Permission>;
  /** Every permission of the service, flagged when the role links to it */
  listPermissionsForRole(roleId: string, serviceId: string): Promise<RolePermissionStatus[]>;
  /** Count of roles still linked to the permission */
  countPermissionAssignments(permissionId: string): Promise<number>;
  deletePermission(id: string): Promise<boolean>;
  assignPermissionToRole(roleId: string, permissionId: string): Promise<boolean>;
  unassignPermissionFromRole(roleId: string, permissionId: string): Promise<boolean>;
  grantPermission(userId: string, permissionId: string, expiresAt: Date | null): Promise<boolean>;
  revokePermission(userId: string, permissionId: string): Promise<boolean>;

  /** Does any role held by the user link to a permission matching the target? */
  hasRolePermission(userId: string, target: PermissionTarget): Promise<boolean>;
  /** Does the user hold a direct grant matching the target, unexpired at `now`? */
  hasDirectPermission(userId: string, target: PermissionTarget, now: Date): Promise<boolean>;
  /** Role-derived permissions, one entry per distinct permission */
  listRolePermissions(userId: string, service?: string): Promise<UserPermission[]>;
  /** Direct grants unexpired at `now` */
  listDirectPermissions(userId: string, now: Date, service?: string): Promise<UserPermission[]>;
};
