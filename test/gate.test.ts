import { describe, it, expect, beforeEach } from "vitest";
import { MissingPermissionError, MissingRoleError } from "../src/identity/errors.js";
import type { ResolvedPrincipal } from "../src/identity/token/tokenService.js";
import type { User } from "../src/identity/types.js";
import { createHarness, eventsOfKind, type Harness } from "./helpers.js";

describe("AuthorizationGate", () => {
  let h: Harness;
  let user: User;

  async function principalFor(target: User): Promise<ResolvedPrincipal> {
    return h.tokens.resolve(await h.tokens.issue(target));
  }

  beforeEach(async () => {
    h = await createHarness();
    user = await h.register("ada@example.com");
  });

  describe("requireRole", () => {
    it("passes for a role held in this service", async () => {
      await expect(h.gate.requireRole(await principalFor(user), "user")).resolves.toBeUndefined();
    });

    it("fails for a role not held", async () => {
      const principal = await principalFor(user);

      await expect(h.gate.requireRole(principal, "admin")).rejects.toThrow(
        "Missing role 'admin' in service 'identity-service'"
      );
      expect(eventsOfKind(h.events, "access.role_denied").map(e => e.details)).toEqual([
        { role: "admin", service: "identity-service" }
      ]);
    });

    it("does not accept a same-named role from another service", async () => {
      await h.rbac.createService({ name: "billing" });
      const billingAdmin = await h.rbac.createRole({ service: "billing", name: "admin", description: "Billing admin" });
      await h.rbac.assignRole(user.id, billingAdmin.id);
      const principal = await principalFor(user);

      await expect(h.gate.requireRole(principal, "admin")).rejects.toBeInstanceOf(MissingRoleError);
      await expect(h.gate.requireRole(principal, "admin", "billing")).resolves.toBeUndefined();
    });
  });

  describe("requirePermission", () => {
    it("passes through the default role", async () => {
      await expect(h.gate.requirePermission(await principalFor(user), "profile", "read")).resolves.toBeUndefined();
    });

    it("fails for a permission not held", async () => {
      const principal = await principalFor(user);

      await expect(h.gate.requirePermission(principal, "user", "create")).rejects.toThrow(
        "Missing permission 'user:create'"
      );
      expect(eventsOfKind(h.events, "access.permission_denied").map(e => e.details)).toEqual([
        { service: "identity-service", resource: "user", action: "create" }
      ]);
    });

    it("sees grants made after the principal was resolved", async () => {
      const principal = await principalFor(user);
      const create = h.boot.permissions.find(p => p.resource === "user" && p.action === "create");
      expect(create).toBeDefined();
      if (!create) return;

      await h.rbac.grantPermission(user.id, create.id);
      await expect(h.gate.requirePermission(principal, "user", "create")).resolves.toBeUndefined();

      await h.rbac.revokePermission(user.id, create.id);
      await expect(h.gate.requirePermission(principal, "user", "create")).rejects.toBeInstanceOf(
        MissingPermissionError
      );
    });

    it("checks another service on request", async () => {
      await h.rbac.createService({ name: "billing" });
      const read = await h.rbac.createPermission({
        service: "billing",
        name: "read_invoice",
        resource: "invoice",
        action: "read"
      });
      await h.rbac.grantPermission(user.id, read.id);
      const principal = await principalFor(user);

      await expect(h.gate.requirePermissionFor(principal, "billing", "invoice", "read")).resolves.toBeUndefined();
      await expect(h.gate.requirePermission(principal, "invoice", "read")).rejects.toBeInstanceOf(
        MissingPermissionError
      );
    });
  });
});
