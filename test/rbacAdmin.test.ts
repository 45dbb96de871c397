import { describe, it, expect, beforeEach } from "vitest";
import { PermissionStillAssignedError } from "../src/identity/errors.js";
import { bootstrapIdentityService, CORE_PERMISSIONS } from "../src/identity/rbac/bootstrap.js";
import { createHarness, createPlainServices, type Harness } from "./helpers.js";

describe("RbacAdmin", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    await h.rbac.createService({ name: "billing", url: "http://billing.internal", port: 8100 });
  });

  it("creates and looks up services by name", async () => {
    const billing = await h.rbac.getServiceByName("billing");

    expect(billing).toMatchObject({ name: "billing", isActive: true, url: "http://billing.internal", port: 8100 });
    expect((await h.rbac.listServices()).map(s => s.name)).toEqual(["billing", "identity-service"]);
    await expect(h.rbac.createService({ name: "billing" })).rejects.toMatchObject({ code: "CONFLICT" });
  });

  it("requires an existing service for roles and permissions", async () => {
    await expect(h.rbac.createRole({ service: "nope", name: "x", description: "x" })).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: "Service 'nope' not found"
    });
    await expect(
      h.rbac.createPermission({ service: "nope", name: "x", resource: "r", action: "a" })
    ).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("rejects duplicate roles and permissions", async () => {
    await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });
    await h.rbac.createPermission({ service: "billing", name: "read_invoice", resource: "invoice", action: "read" });

    await expect(h.rbac.createRole({ service: "billing", name: "clerk", description: "Again" })).rejects.toMatchObject({
      code: "CONFLICT"
    });
    await expect(
      h.rbac.createPermission({ service: "billing", name: "other_name", resource: "invoice", action: "read" })
    ).rejects.toMatchObject({ code: "CONFLICT" });
  });

  it("lists roles and permissions of one service", async () => {
    await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });
    await h.rbac.createPermission({ service: "billing", name: "read_invoice", resource: "invoice", action: "read" });

    expect((await h.rbac.listRoles("billing")).map(r => r.name)).toEqual(["clerk"]);
    expect((await h.rbac.listPermissions("billing")).map(p => `${p.resource}:${p.action}`)).toEqual(["invoice:read"]);
    expect((await h.rbac.getRoleByName("billing", "clerk"))?.serviceName).toBe("billing");
    expect(await h.rbac.getRoleByName("billing", "admin")).toBeNull();
  });

  it("blocks deleting a permission while a role holds it", async () => {
    const clerk = await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });
    const read = await h.rbac.createPermission({
      service: "billing",
      name: "read_invoice",
      resource: "invoice",
      action: "read"
    });
    await h.rbac.assignPermissionToRole(clerk.id, read.id);

    await expect(h.rbac.deletePermission(read.id)).rejects.toBeInstanceOf(PermissionStillAssignedError);

    expect(await h.rbac.unassignPermissionFromRole(clerk.id, read.id)).toBe(true);
    await h.rbac.deletePermission(read.id);
    expect(await h.rbac.listPermissions("billing")).toEqual([]);
  });

  it("refuses to delete an unknown permission", async () => {
    await expect(h.rbac.deletePermission("missing")).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("keeps role-permission edges inside one service", async () => {
    const clerk = await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });
    const profileRead = h.boot.permissions.find(p => p.resource === "profile");
    expect(profileRead).toBeDefined();
    if (!profileRead) return;

    await expect(h.rbac.assignPermissionToRole(clerk.id, profileRead.id)).rejects.toMatchObject({
      code: "BAD_REQUEST",
      message: "Role and permission belong to different services"
    });
  });

  it("validates users and roles on assignment", async () => {
    const user = await h.register("ada@example.com");
    const clerk = await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });

    expect(await h.rbac.assignRole(user.id, clerk.id)).toBe(true);
    expect(await h.rbac.assignRole(user.id, clerk.id)).toBe(false);
    await expect(h.rbac.assignRole("missing", clerk.id)).rejects.toMatchObject({ code: "NOT_FOUND" });
    await expect(h.rbac.assignRole(user.id, "missing")).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("validates users and permissions on direct grants", async () => {
    const user = await h.register("ada@example.com");
    const read = await h.rbac.createPermission({
      service: "billing",
      name: "read_invoice",
      resource: "invoice",
      action: "read"
    });

    expect(await h.rbac.grantPermission(user.id, read.id)).toBe(true);
    await expect(h.rbac.grantPermission("missing", read.id)).rejects.toMatchObject({ code: "NOT_FOUND" });
    await expect(h.rbac.grantPermission(user.id, "missing")).rejects.toMatchObject({ code: "NOT_FOUND" });
    expect(await h.rbac.revokePermission(user.id, read.id)).toBe(true);
    expect(await h.rbac.revokePermission(user.id, read.id)).toBe(false);
  });
});

describe("RbacAdmin updates and memberships", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    await h.rbac.createService({ name: "billing" });
  });

  it("renames a role unless the name is taken in its service", async () => {
    const clerk = await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });
    await h.rbac.createRole({ service: "billing", name: "auditor", description: "Auditor" });

    const renamed = await h.rbac.updateRole(clerk.id, { name: "teller", description: "Front desk" });

    expect(renamed).toMatchObject({ id: clerk.id, name: "teller", description: "Front desk", serviceName: "billing" });
    await expect(h.rbac.updateRole(clerk.id, { name: "auditor" })).rejects.toMatchObject({
      code: "CONFLICT",
      message: "Role 'auditor' already exists in service 'billing'"
    });
    // Keeping its own name is not a conflict
    await expect(h.rbac.updateRole(clerk.id, { name: "teller" })).resolves.toMatchObject({ name: "teller" });
  });

  it("deletes a role and strips it from its holders", async () => {
    const user = await h.register("ada@example.com");
    const clerk = await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });
    await h.rbac.assignRole(user.id, clerk.id);

    await h.rbac.deleteRole(clerk.id);

    expect(await h.resolver.rolesByService(user.id)).toEqual({ "identity-service": ["user"] });
    await expect(h.rbac.deleteRole(clerk.id)).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("updates a permission and reports the role's view of its service", async () => {
    const clerk = await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });
    const read = await h.rbac.createPermission({ service: "billing", name: "read_invoice", resource: "invoice", action: "read" });
    const pay = await h.rbac.createPermission({ service: "billing", name: "pay_invoice", resource: "invoice", action: "pay" });
    await h.rbac.assignPermissionToRole(clerk.id, pay.id);

    const updated = await h.rbac.updatePermission(read.id, { description: "Read any invoice" });
    const view = await h.rbac.getPermissionsForRole(clerk.id);

    expect(updated.description).toBe("Read any invoice");
    expect(view.map(v => [v.permission.id, v.assigned])).toEqual([
      [pay.id, true],
      [read.id, false]
    ]);
    await expect(h.rbac.updatePermission("missing", { name: "x" })).rejects.toMatchObject({ code: "NOT_FOUND" });
    await expect(h.rbac.getPermissionsForRole("missing")).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("assigns, lists and removes service memberships", async () => {
    const user = await h.register("ada@example.com");
    const clerk = await h.rbac.createRole({ service: "billing", name: "clerk", description: "Clerk" });

    const membership = await h.rbac.assignServiceToUser(user.id, "billing");
    await h.rbac.assignRole(user.id, clerk.id);

    expect(membership).toMatchObject({ userId: user.id, serviceName: "billing" });
    expect((await h.rbac.listUserServices(user.id)).map(s => s.name)).toEqual(["identity-service", "billing"]);
    expect(await h.rbac.hasUserService(user.id, "billing")).toBe(true);
    expect(await h.rbac.hasUserService(user.id, "unknown")).toBe(false);
    await expect(h.rbac.assignServiceToUser(user.id, "billing")).rejects.toMatchObject({ code: "CONFLICT" });

    expect(await h.rbac.unassignServiceFromUser(user.id, "billing")).toBe(true);
    expect(await h.rbac.hasUserService(user.id, "billing")).toBe(false);
    expect(await h.resolver.rolesByService(user.id)).toEqual({ "identity-service": ["user"] });
    expect(await h.rbac.unassignServiceFromUser(user.id, "billing")).toBe(false);
  });

  it("checks users and services on membership changes", async () => {
    const user = await h.register("ada@example.com");

    await expect(h.rbac.assignServiceToUser("missing", "billing")).rejects.toMatchObject({ code: "NOT_FOUND" });
    await expect(h.rbac.assignServiceToUser(user.id, "nope")).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: "Service 'nope' not found"
    });
    await expect(h.rbac.listUserServices("missing")).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("rejects a grant expiry that is not a date", async () => {
    const user = await h.register("ada@example.com");
    const read = await h.rbac.createPermission({ service: "billing", name: "read_invoice", resource: "invoice", action: "read" });

    await expect(h.rbac.grantPermission(user.id, read.id, new Date("not a date"))).rejects.toMatchObject({
      code: "BAD_REQUEST",
      message: "Invalid grant expiry"
    });
    expect(await h.rbac.grantPermission(user.id, read.id, new Date("+010000-01-01T00:00:00.000Z"))).toBe(true);
    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "read")).toBe(true);
  });
});

describe("bootstrapIdentityService", () => {
  it("provisions the service, both roles and the permission catalog", async () => {
    const services = await createPlainServices();

    const result = await bootstrapIdentityService(services.rbac, services.config);

    expect(result.service.name).toBe("identity-service");
    expect(result.adminRole.name).toBe("admin");
    expect(result.defaultRole.name).toBe("user");
    expect(result.permissions).toHaveLength(CORE_PERMISSIONS.length);
    expect(result.created).toBe(3 + CORE_PERMISSIONS.length);
  });

  it("gives admin every permission and the default role only its own profile", async () => {
    const h = await createHarness();
    const admin = await h.registerAdmin("root@example.com");
    const user = await h.register("ada@example.com");

    const adminKeys = (await h.resolver.listUserPermissions(admin.id)).map(p => `${p.resource}:${p.action}`);
    expect(adminKeys).toEqual([
      "audit:read",
      "permission:manage",
      "profile:read",
      "role:manage",
      "service:manage",
      "user:create",
      "user:delete",
      "user:read",
      "user:update"
    ]);
    expect((await h.resolver.listUserPermissions(user.id)).map(p => `${p.resource}:${p.action}`)).toEqual([
      "profile:read"
    ]);
  });

  it("is idempotent", async () => {
    const services = await createPlainServices();

    const first = await bootstrapIdentityService(services.rbac, services.config);
    const second = await bootstrapIdentityService(services.rbac, services.config);

    expect(second.created).toBe(0);
    expect(second.service.id).toBe(first.service.id);
    expect(second.adminRole.id).toBe(first.adminRole.id);
    expect(second.permissions.map(p => p.id)).toEqual(first.permissions.map(p => p.id));
  });

  it("uses the configured default role name", async () => {
    const services = await createPlainServices({ defaultUserRole: "member" });

    const result = await bootstrapIdentityService(services.rbac, services.config);

    expect(result.defaultRole.name).toBe("member");
    const user = await services.accounts.register({
      firstName: "Ada",
      lastName: "Lovelace",
      email: "ada@example.com",
      password: "Str0ng!Pass"
    });
    expect(await services.resolver.rolesByService(user.id)).toEqual({ "identity-service": ["member"] });
  });
});
