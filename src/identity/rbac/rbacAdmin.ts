import { IdentityError, PermissionStillAssignedError } from "../errors.js";
import type { CredentialStore } from "../store/types.js";
import type {
  NewService,
  Permission,
  PermissionUpdate,
  Role,
  RolePermissionStatus,
  RoleUpdate,
  Service,
  User,
  UserServiceAssignment
} from "../types.js";

export type RoleDefinition = {
  service: string;
  name: string;
  description: string;
  isActive?: boolean;
};

export type PermissionDefinition = {
  service: string;
  name: string;
  resource: string;
  action: string;
  description?: string | null;
};

/**
 * RBAC Administration
 *
 * Provisioning of services, their roles and permissions, and the edges between
 * users, roles and permissions. Services are addressed by name; roles,
 * permissions and users by id.
 */
export class RbacAdmin {
  private readonly store: CredentialStore;

  constructor(store: CredentialStore) {
    this.store = store;
  }

  // ==========================================================================
  // Services
  // ==========================================================================

  async createService(service: NewService): Promise<Service> {
    if (await this.store.getServiceByName(service.name)) {
      throw new IdentityError("CONFLICT", `Service '${service.name}' already exists`);
    }
    return this.store.createService(service);
  }

  async getServiceByName(name: string): Promise<Service | null> {
    return this.store.getServiceByName(name);
  }

  async listServices(): Promise<Service[]> {
    return this.store.listServices();
  }

  // ==========================================================================
  // Service membership
  // ==========================================================================

  /**
   * @throws IdentityError CONFLICT when the user already belongs to the service
   */
  async assignServiceToUser(userId: string, service: string): Promise<UserServiceAssignment> {
    await this.requireUser(userId);
    const target = await this.requireService(service);
    if (await this.store.hasUserService(userId, target.id)) {
      throw new IdentityError("CONFLICT", `User ${userId} already belongs to service '${target.name}'`);
    }
    return this.store.assignServiceToUser(userId, target.id);
  }

  /**
   * Removes the membership and every role the user holds in that service.
   *
   * @returns false when the user was not a member
   */
  async unassignServiceFromUser(userId: string, service: string): Promise<boolean> {
    const target = await this.requireService(service);
    return this.store.unassignServiceFromUser(userId, target.id);
  }

  async listUserServices(userId: string): Promise<Service[]> {
    await this.requireUser(userId);
    return this.store.listUserServices(userId);
  }

  async hasUserService(userId: string, service: string): Promise<boolean> {
    const target = await this.store.getServiceByName(service);
    return target !== null && this.store.hasUserService(userId, target.id);
  }

  // ==========================================================================
  // Roles
  // ==========================================================================

  async createRole(definition: RoleDefinition): Promise<Role> {
    const service = await this.requireService(definition.service);
    if (await this.store.getRoleByName(service.id, definition.name)) {
      throw new IdentityError("CONFLICT", `Role '${definition.name}' already exists in service '${service.name}'`);
    }
    return this.store.createRole({
      serviceId: service.id,
      name: definition.name,
      description: definition.description,
      isActive: definition.isActive
    });
  }

  async listRoles(service: string): Promise<Role[]> {
    return this.store.listRoles((await this.requireService(service)).id);
  }

  async getRoleByName(service: string, name: string): Promise<Role | null> {
    return this.store.getRoleByName((await this.requireService(service)).id, name);
  }

  /**
   * @throws IdentityError CONFLICT when the new name is taken within the service
   */
  async updateRole(roleId: string, changes: RoleUpdate): Promise<Role> {
    const role = await this.requireRole(roleId);
    if (changes.name !== undefined && changes.name !== role.name) {
      if (await this.store.getRoleByName(role.serviceId, changes.name)) {
        throw new IdentityError("CONFLICT", `Role '${changes.name}' already exists in service '${role.serviceName}'`);
      }
    }
    return this.store.updateRole(roleId, changes);
  }

  /** Users holding the role lose it; its permission links go with it */
  async deleteRole(roleId: string): Promise<void> {
    await this.requireRole(roleId);
    await this.store.deleteRole(roleId);
  }

  /** @returns false when the user already held the role */
  async assignRole(userId: string, roleId: string): Promise<boolean> {
    await this.requireUser(userId);
    await this.requireRole(roleId);
    return this.store.assignRole(userId, roleId);
  }

  async unassignRole(userId: string, roleId: string): Promise<boolean> {
    return this.store.unassignRole(userId, roleId);
  }

  // ==========================================================================
  // Permissions
  // ==========================================================================

  async createPermission(definition: PermissionDefinition): Promise<Permission> {
    const service = await this.requireService(definition.service);
    return this.store.createPermission({
      serviceId: service.id,
      name: definition.name,
      resource: definition.resource,
      action: definition.action,
      description: definition.description
    });
  }

  async listPermissions(service: string): Promise<Permission[]> {
    return this.store.listPermissions((await this.requireService(service)).id);
  }

  /**
   * The permission keeps its service; a (resource, action) pair already used
   * there is a CONFLICT.
   */
  async updatePermission(permissionId: string, changes: PermissionUpdate): Promise<Permission> {
    await this.requirePermission(permissionId);
    return this.store.updatePermission(permissionId, changes);
  }

  /** Every permission of the role's service, flagged when the role holds it */
  async getPermissionsForRole(roleId: string): Promise<RolePermissionStatus[]> {
    const role = await this.requireRole(roleId);
    return this.store.listPermissionsForRole(role.id, role.serviceId);
  }

  /**
   * Removes the permission and any direct grants of it.
   *
   * @throws PermissionStillAssignedError while a role still links to it
   */
  async deletePermission(permissionId: string): Promise<void> {
    await this.requirePermission(permissionId);
    if ((await this.store.countPermissionAssignments(permissionId)) > 0) {
      throw new PermissionStillAssignedError(permissionId);
    }
    await this.store.deletePermission(permissionId);
  }

  /**
   * @throws IdentityError BAD_REQUEST when role and permission belong to different services
   */
  async assignPermissionToRole(roleId: string, permissionId: string): Promise<boolean> {
    const role = await this.requireRole(roleId);
    const permission = await this.requirePermission(permissionId);
    if (role.serviceId !== permission.serviceId) {
      throw new IdentityError("BAD_REQUEST", "Role and permission belong to different services", {
        roleService: role.serviceName,
        permissionService: permission.serviceName
      });
    }
    return this.store.assignPermissionToRole(roleId, permissionId);
  }

  async unassignPermissionFromRole(roleId: string, permissionId: string): Promise<boolean> {
    return this.store.unassignPermissionFromRole(roleId, permissionId);
  }

  /**
   * Direct grant, optionally expiring. Granting again replaces the expiry.
   */
  async grantPermission(userId: string, permissionId: string, expiresAt: Date | null = null): Promise<boolean> {
    if (expiresAt !== null && Number.isNaN(expiresAt.getTime())) {
      throw new IdentityError("BAD_REQUEST", "Invalid grant expiry");
    }
    await this.requireUser(userId);
    await this.requirePermission(permissionId);
    return this.store.grantPermission(userId, permissionId, expiresAt);
  }

  async revokePermission(userId: string, permissionId: string): Promise<boolean> {
    return this.store.revokePermission(userId, permissionId);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async requireService(name: string): Promise<Service> {
    const service = await this.store.getServiceByName(name);
    if (!service) {
      throw new IdentityError("NOT_FOUND", `Service '${name}' not found`);
    }
    return service;
  }

  private async requireRole(roleId: string): Promise<Role> {
    const role = await this.store.getRoleById(roleId);
    if (!role) {
      throw new IdentityError("NOT_FOUND", `Role ${roleId} not found`);
    }
    return role;
  }

  private async requirePermission(permissionId: string): Promise<Permission> {
    const permission = await this.store.getPermissionById(permissionId);
    if (!permission) {
      throw new IdentityError("NOT_FOUND", `Permission ${permissionId} not found`);
    }
    return permission;
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.store.getUserById(userId);
    if (!user) {
      throw new IdentityError("NOT_FOUND", `User ${userId} not found`);
    }
    return user;
  }
}
