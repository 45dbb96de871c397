import type { IdentityConfig } from "../config.js";
import type { Permission, Role, Service } from "../types.js";
import type { RbacAdmin } from "./rbacAdmin.js";

export const ADMIN_ROLE = "admin";

type CatalogPermission = {
  name: string;
  resource: string;
  action: string;
  description: string;
  /** Held by the default user role as well as admin */
  forUsers?: boolean;
};

// Permissions the HTTP surface checks
export const CORE_PERMISSIONS: readonly CatalogPermission[] = [
  { name: "create_user", resource: "user", action: "create", description: "Register new users" },
  { name: "read_user", resource: "user", action: "read", description: "Read any user's profile" },
  { name: "update_user", resource: "user", action: "update", description: "Update users and unlock accounts" },
  { name: "delete_user", resource: "user", action: "delete", description: "Soft-delete users" },
  { name: "manage_roles", resource: "role", action: "manage", description: "Create roles and assign them" },
  { name: "manage_services", resource: "service", action: "manage", description: "Create services and manage memberships" },
  { name: "manage_permissions", resource: "permission", action: "manage", description: "Create and grant permissions" },
  { name: "read_audit", resource: "audit", action: "read", description: "Read the security audit trail" },
  { name: "read_own_profile", resource: "profile", action: "read", description: "Read own profile", forUsers: true }
];

export type BootstrapResult = {
  service: Service;
  adminRole: Role;
  defaultRole: Role;
  permissions: Permission[];
  /** Number of services, roles and permissions created by this run */
  created: number;
};

/**
 * Provisions this deployment's service with its admin and default roles and
 * the core permission catalog. Safe to run repeatedly: existing records are
 * reused and edges that already exist are left alone.
 */
export async function bootstrapIdentityService(
  rbac: RbacAdmin,
  config: Pick<IdentityConfig, "serviceName" | "defaultUserRole">
): Promise<BootstrapResult> {
  let created = 0;

  let service = await rbac.getServiceByName(config.serviceName);
  if (!service) {
    service = await rbac.createService({ name: config.serviceName, description: "Identity and access service" });
    created++;
  }

  const ensureRole = async (name: string, description: string): Promise<Role> => {
    const existing = await rbac.getRoleByName(config.serviceName, name);
    if (existing) return existing;
    created++;
    return rbac.createRole({ service: config.serviceName, name, description });
  };

  const adminRole = await ensureRole(ADMIN_ROLE, "Administrator with full access to this service");
  const defaultRole =
    config.defaultUserRole === ADMIN_ROLE
      ? adminRole
      : await ensureRole(config.defaultUserRole, "Standard user with limited access");

  const existing = await rbac.listPermissions(config.serviceName);
  const permissions: Permission[] = [];

  for (const entry of CORE_PERMISSIONS) {
    let permission = existing.find(p => p.resource === entry.resource && p.action === entry.action);
    if (!permission) {
      permission = await rbac.createPermission({
        service: config.serviceName,
        name: entry.name,
        resource: entry.resource,
        action: entry.action,
        description: entry.description
      });
      created++;
    }
    permissions.push(permission);

    await rbac.assignPermissionToRole(adminRole.id, permission.id);
    if (entry.forUsers) {
      await rbac.assignPermissionToRole(defaultRole.id, permission.id);
    }
  }

  return { service, adminRole, defaultRole, permissions, created };
}
