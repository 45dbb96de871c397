import type { RbacStore } from "../store/types.js";
import { systemClock, type Clock } from "../time.js";
import type { Role, RolesByService, UserPermission } from "../types.js";

/**
 * Permission Resolver
 *
 * Answers "may this user do `action` on `resource` within `service`?" from
 * the persisted RBAC graph. A permission is held when any role the user has
 * in the service links to it, or when the user holds an unexpired direct
 * grant for it. Nothing is cached: every call reads current state.
 */
export class PermissionResolver {
  private readonly store: RbacStore;
  private readonly clock: Clock;

  constructor(store: RbacStore, options?: { clock?: Clock }) {
    this.store = store;
    this.clock = options?.clock ?? systemClock;
  }

  async hasPermission(userId: string, service: string, resource: string, action: string): Promise<boolean> {
    const target = { service, resource, action };

    // Most grants come through roles, so that path is asked first
    if (await this.store.hasRolePermission(userId, target)) {
      return true;
    }
    return this.store.hasDirectPermission(userId, target, this.clock());
  }

  /**
   * Role-derived and direct permissions, role entries first. A permission
   * reachable both ways is listed once per source so provenance survives.
   */
  async listUserPermissions(userId: string, service?: string): Promise<UserPermission[]> {
    const [viaRoles, direct] = await Promise.all([
      this.store.listRolePermissions(userId, service),
      this.store.listDirectPermissions(userId, this.clock(), service)
    ]);
    return [...viaRoles, ...direct];
  }

  /** Roles in every service the user is assigned to */
  async listUserRoles(userId: string): Promise<Role[]> {
    return this.store.getUserRoles(userId);
  }

  async rolesByService(userId: string): Promise<RolesByService> {
    return groupRolesByService(await this.listUserRoles(userId));
  }
}

export function groupRolesByService(roles: Role[]): RolesByService {
  const grouped: RolesByService = {};
  for (const role of roles) {
    const names = grouped[role.serviceName] ?? [];
    names.push(role.name);
    grouped[role.serviceName] = names;
  }
  return grouped;
}

/** One-line rendering of a permission and where it came from */
export function describePermission(permission: UserPermission): string {
  const key = `${permission.service}/${permission.resource}:${permission.action}`;
  switch (permission.source) {
    case "role":
      return `${key} (via role)`;
    case "direct":
      return `${key} (direct grant)`;
  }
}
