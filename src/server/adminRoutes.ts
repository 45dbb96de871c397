import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import type { AuthorizationGate } from "../identity/authz/gate.js";
import type { IdentityServices } from "../identity/container.js";
import { IdentityError } from "../identity/errors.js";
import { ADMIN_ROLE } from "../identity/rbac/bootstrap.js";
import { readJson } from "./middleware.js";

const ServiceSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().nullish(),
  isActive: z.boolean().optional(),
  url: z.string().url().nullish(),
  port: z.number().int().min(1).max(65535).nullish()
});

const RoleSchema = z.object({
  name: z.string().min(1).max(50),
  description: z.string(),
  isActive: z.boolean().optional()
});

const RoleUpdateSchema = RoleSchema.partial().strict();

const PermissionSchema = z.object({
  name: z.string().min(1).max(100),
  resource: z.string().min(1).max(50),
  action: z.string().min(1).max(50),
  description: z.string().nullish()
});

const PermissionUpdateSchema = PermissionSchema.partial().strict();

const GrantSchema = z.object({
  expiresAt: z.string().datetime({ offset: true }).nullish()
});

/**
 * Admin routes for services, roles, permissions, grants and memberships.
 * Every route needs the admin role plus the permission for its resource.
 */
export function createAdminRoutes(services: IdentityServices, requireToken: MiddlewareHandler): Hono {
  const { gate, rbac } = services;
  const admin = new Hono();

  admin.use("*", requireToken);

  const manageServices = requireAdmin(gate, "service", "manage");
  const manageRoles = requireAdmin(gate, "role", "manage");
  const managePermissions = requireAdmin(gate, "permission", "manage");
  const readUsers = requireAdmin(gate, "user", "read");
  const updateUsers = requireAdmin(gate, "user", "update");

  // --- Services ---

  admin.get("/services", manageServices, async (c) => c.json({ services: await rbac.listServices() }));

  admin.post("/services", manageServices, async (c) => {
    const input = ServiceSchema.parse(await readJson(c));
    return c.json(await rbac.createService(input), 201);
  });

  admin.get("/services/:service", manageServices, async (c) => {
    const name = c.req.param("service");
    const service = await rbac.getServiceByName(name);
    if (!service) {
      throw new IdentityError("NOT_FOUND", `Service '${name}' not found`);
    }
    return c.json(service);
  });

  // --- Roles ---

  admin.get("/services/:service/roles", manageRoles, async (c) =>
    c.json({ roles: await rbac.listRoles(c.req.param("service")) })
  );

  admin.post("/services/:service/roles", manageRoles, async (c) => {
    const input = RoleSchema.parse(await readJson(c));
    return c.json(await rbac.createRole({ service: c.req.param("service"), ...input }), 201);
  });

  admin.put("/roles/:roleId", manageRoles, async (c) => {
    const changes = RoleUpdateSchema.parse(await readJson(c));
    return c.json(await rbac.updateRole(c.req.param("roleId"), changes));
  });

  admin.delete("/roles/:roleId", manageRoles, async (c) => {
    await rbac.deleteRole(c.req.param("roleId"));
    return c.body(null, 204);
  });

  admin.post("/roles/:roleId/users/:userId", manageRoles, async (c) => {
    const assigned = await rbac.assignRole(c.req.param("userId"), c.req.param("roleId"));
    return c.json({ assigned });
  });

  admin.delete("/roles/:roleId/users/:userId", manageRoles, async (c) => {
    const { roleId, userId } = c.req.param();
    if (!(await rbac.unassignRole(userId, roleId))) {
      throw new IdentityError("NOT_FOUND", `User ${userId} does not hold role ${roleId}`);
    }
    return c.body(null, 204);
  });

  // --- Permissions ---

  admin.get("/services/:service/permissions", managePermissions, async (c) =>
    c.json({ permissions: await rbac.listPermissions(c.req.param("service")) })
  );

  admin.post("/services/:service/permissions", managePermissions, async (c) => {
    const input = PermissionSchema.parse(await readJson(c));
    return c.json(await rbac.createPermission({ service: c.req.param("service"), ...input }), 201);
  });

  admin.put("/permissions/:permissionId", managePermissions, async (c) => {
    const changes = PermissionUpdateSchema.parse(await readJson(c));
    return c.json(await rbac.updatePermission(c.req.param("permissionId"), changes));
  });

  admin.delete("/permissions/:permissionId", managePermissions, async (c) => {
    await rbac.deletePermission(c.req.param("permissionId"));
    return c.body(null, 204);
  });

  admin.get("/roles/:roleId/permissions", managePermissions, async (c) =>
    c.json({ permissions: await rbac.getPermissionsForRole(c.req.param("roleId")) })
  );

  admin.post("/roles/:roleId/permissions/:permissionId", managePermissions, async (c) => {
    const assigned = await rbac.assignPermissionToRole(c.req.param("roleId"), c.req.param("permissionId"));
    return c.json({ assigned });
  });

  admin.delete("/roles/:roleId/permissions/:permissionId", managePermissions, async (c) => {
    const { roleId, permissionId } = c.req.param();
    if (!(await rbac.unassignPermissionFromRole(roleId, permissionId))) {
      throw new IdentityError("NOT_FOUND", `Role ${roleId} does not hold permission ${permissionId}`);
    }
    return c.body(null, 204);
  });

  admin.post("/users/:userId/permissions/:permissionId", managePermissions, async (c) => {
    const { expiresAt } = GrantSchema.parse(await readJson(c));
    const granted = await rbac.grantPermission(
      c.req.param("userId"),
      c.req.param("permissionId"),
      expiresAt ? new Date(expiresAt) : null
    );
    return c.json({ granted });
  });

  admin.delete("/users/:userId/permissions/:permissionId", managePermissions, async (c) => {
    const { userId, permissionId } = c.req.param();
    if (!(await rbac.revokePermission(userId, permissionId))) {
      throw new IdentityError("NOT_FOUND", `User ${userId} has no direct grant of ${permissionId}`);
    }
    return c.body(null, 204);
  });

  // --- Memberships ---

  admin.get("/users/:userId/services", readUsers, async (c) =>
    c.json({ services: await rbac.listUserServices(c.req.param("userId")) })
  );

  admin.post("/users/:userId/services/:service", updateUsers, async (c) =>
    c.json(await rbac.assignServiceToUser(c.req.param("userId"), c.req.param("service")), 201)
  );

  admin.delete("/users/:userId/services/:service", updateUsers, async (c) => {
    const { userId, service } = c.req.param();
    if (!(await rbac.unassignServiceFromUser(userId, service))) {
      throw new IdentityError("NOT_FOUND", `User ${userId} is not a member of service '${service}'`);
    }
    return c.body(null, 204);
  });

  return admin;
}

function requireAdmin(gate: AuthorizationGate, resource: string, action: string): MiddlewareHandler {
  return async (c, next) => {
    const principal = c.get("principal");
    await gate.requireRole(principal, ADMIN_ROLE);
    await gate.requirePermission(principal, resource, action);
    await next();
  };
}
