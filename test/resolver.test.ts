import { describe, it, expect, beforeEach } from "vitest";
import { describePermission, groupRolesByService } from "../src/identity/authz/resolver.js";
import type { Permission, Role, User } from "../src/identity/types.js";
import { createHarness, type Harness } from "./helpers.js";

describe("PermissionResolver", () => {
  let h: Harness;
  let user: User;
  let clerk: Role;
  let readInvoice: Permission;
  let payInvoice: Permission;

  beforeEach(async () => {
    h = await createHarness();
    user = await h.register("ada@example.com");

    await h.rbac.createService({ name: "billing" });
    clerk = await h.rbac.createRole({ service: "billing", name: "clerk", description: "Billing clerk" });
    readInvoice = await h.rbac.createPermission({
      service: "billing",
      name: "read_invoice",
      resource: "invoice",
      action: "read"
    });
    payInvoice = await h.rbac.createPermission({
      service: "billing",
      name: "pay_invoice",
      resource: "invoice",
      action: "pay"
    });
    await h.rbac.assignPermissionToRole(clerk.id, readInvoice.id);
  });

  it("grants through a role in the same service only", async () => {
    await h.rbac.assignRole(user.id, clerk.id);
    await h.rbac.createService({ name: "shipping" });

    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "read")).toBe(true);
    expect(await h.resolver.hasPermission(user.id, "shipping", "invoice", "read")).toBe(false);
    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "pay")).toBe(false);
  });

  it("grants through a direct grant without any role", async () => {
    await h.rbac.grantPermission(user.id, payInvoice.id);

    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "pay")).toBe(true);
    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "read")).toBe(false);
  });

  it("stops honoring a direct grant once it expires", async () => {
    await h.rbac.grantPermission(user.id, payInvoice.id, new Date("2026-10-19T12:10:00.000Z"));

    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "pay")).toBe(true);

    h.clock.advanceMinutes(10);
    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "pay")).toBe(false);
    expect(await h.resolver.listUserPermissions(user.id, "billing")).toEqual([]);
  });

  it("reflects revocations immediately", async () => {
    await h.rbac.assignRole(user.id, clerk.id);
    await h.rbac.grantPermission(user.id, payInvoice.id);

    await h.rbac.unassignRole(user.id, clerk.id);
    await h.rbac.revokePermission(user.id, payInvoice.id);

    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "read")).toBe(false);
    expect(await h.resolver.hasPermission(user.id, "billing", "invoice", "pay")).toBe(false);
  });

  it("lists role entries before direct grants and keeps both sources", async () => {
    await h.rbac.assignRole(user.id, clerk.id);
    await h.rbac.grantPermission(user.id, payInvoice.id);
    await h.rbac.grantPermission(user.id, readInvoice.id);

    expect(await h.resolver.listUserPermissions(user.id, "billing")).toEqual([
      { service: "billing", resource: "invoice", action: "read", name: "read_invoice", source: "role" },
      { service: "billing", resource: "invoice", action: "pay", name: "pay_invoice", source: "direct" },
      { service: "billing", resource: "invoice", action: "read", name: "read_invoice", source: "direct" }
    ]);
  });

  it("lists permissions across every service without a filter", async () => {
    await h.rbac.assignRole(user.id, clerk.id);

    expect(await h.resolver.listUserPermissions(user.id)).toEqual([
      { service: "billing", resource: "invoice", action: "read", name: "read_invoice", source: "role" },
      { service: "identity-service", resource: "profile", action: "read", name: "read_own_profile", source: "role" }
    ]);
  });

  it("groups roles by service", async () => {
    expect(await h.resolver.rolesByService(user.id)).toEqual({ "identity-service": ["user"] });

    await h.rbac.assignRole(user.id, clerk.id);

    expect(await h.resolver.rolesByService(user.id)).toEqual({
      "identity-service": ["user"],
      billing: ["clerk"]
    });
    expect((await h.resolver.listUserRoles(user.id)).map(r => `${r.serviceName}/${r.name}`)).toEqual([
      "identity-service/user",
      "billing/clerk"
    ]);
  });
});

describe("groupRolesByService", () => {
  const role = (serviceName: string, name: string): Role => ({
    id: `${serviceName}-${name}`,
    serviceId: serviceName,
    serviceName,
    name,
    description: name,
    isActive: true
  });

  it("preserves input order within each service", () => {
    expect(groupRolesByService([role("a", "x"), role("b", "y"), role("a", "z")])).toEqual({
      a: ["x", "z"],
      b: ["y"]
    });
  });

  it("returns an empty mapping for no roles", () => {
    expect(groupRolesByService([])).toEqual({});
  });
});

describe("describePermission", () => {
  it("renders the source", () => {
    expect(
      describePermission({ service: "billing", resource: "invoice", action: "read", name: "read_invoice", source: "role" })
    ).toBe("billing/invoice:read (via role)");
    expect(
      describePermission({ service: "billing", resource: "invoice", action: "pay", name: "pay_invoice", source: "direct" })
    ).toBe("billing/invoice:pay (direct grant)");
  });
});
