import { describe, it, expect, beforeEach } from "vitest";
import { IdentityError, InvalidTokenError } from "../src/identity/errors.js";
import { TokenService } from "../src/identity/token/tokenService.js";
import type { User } from "../src/identity/types.js";
import { createHarness, type Harness } from "./helpers.js";

const T0_SECONDS = Math.floor(Date.parse("2026-10-19T12:00:00.000Z") / 1000);

function reencodePayload(token: string, edit: (payload: Record<string, unknown>) => void): string {
  const [header, payload, signature] = token.split(".");
  const decoded: Record<string, unknown> = JSON.parse(Buffer.from(payload ?? "", "base64url").toString("utf8"));
  edit(decoded);
  return [header, Buffer.from(JSON.stringify(decoded)).toString("base64url"), signature].join(".");
}

describe("TokenService", () => {
  let h: Harness;
  let user: User;

  beforeEach(async () => {
    h = await createHarness();
    user = await h.register("ada@example.com");
  });

  it("issues a token whose claims round-trip", async () => {
    const token = await h.tokens.issue(user);

    expect(token.split(".")).toHaveLength(3);
    expect(await h.tokens.decode(token)).toEqual({
      sub: user.id,
      email: "ada@example.com",
      roles: { "identity-service": ["user"] },
      iat: T0_SECONDS,
      exp: T0_SECONDS + 30 * 60
    });
  });

  it("refuses to issue for a user without an id", async () => {
    await expect(h.tokens.issue({ id: null, email: "new@example.com" })).rejects.toMatchObject({
      code: "INVALID_STATE",
      message: "Id cannot be null when creating a token"
    });
  });

  it("expires after the requested lifetime", async () => {
    const token = await h.tokens.issue(user, 60);

    h.clock.advanceSeconds(30);
    expect((await h.tokens.decode(token)).sub).toBe(user.id);

    h.clock.advanceSeconds(31);
    await expect(h.tokens.decode(token)).rejects.toBeInstanceOf(InvalidTokenError);
  });

  it("rejects a token with an edited payload", async () => {
    const token = await h.tokens.issue(user);
    const forged = reencodePayload(token, (payload) => {
      payload.roles = { "identity-service": ["admin"] };
    });

    await expect(h.tokens.decode(forged)).rejects.toBeInstanceOf(InvalidTokenError);
  });

  it("rejects a token signed with another secret", async () => {
    const other = new TokenService(
      h.store,
      h.resolver,
      { ...h.config, secretKey: "another-test-secret-0123456789abcdef" },
      { clock: h.clock.now }
    );

    await expect(h.tokens.decode(await other.issue(user))).rejects.toBeInstanceOf(InvalidTokenError);
  });

  it("accepts only the configured algorithm", async () => {
    const hs512 = new TokenService(h.store, h.resolver, { ...h.config, algorithm: "HS512" }, { clock: h.clock.now });
    const token = await hs512.issue(user);

    expect((await hs512.decode(token)).sub).toBe(user.id);
    await expect(h.tokens.decode(token)).rejects.toBeInstanceOf(InvalidTokenError);
  });

  it("rejects unsigned and malformed tokens with the same message", async () => {
    const header = Buffer.from(JSON.stringify({ alg: "none", typ: "JWT" })).toString("base64url");
    const payload = Buffer.from(
      JSON.stringify({ sub: user.id, email: user.email, roles: {}, iat: T0_SECONDS, exp: T0_SECONDS + 60 })
    ).toString("base64url");

    for (const token of [`${header}.${payload}.`, "not-a-token", ""]) {
      await expect(h.tokens.decode(token)).rejects.toThrow("Invalid or expired token");
    }
  });

  describe("resolve", () => {
    it("re-reads roles instead of trusting the claims", async () => {
      const token = await h.tokens.issue(user);
      await h.rbac.assignRole(user.id, h.boot.adminRole.id);

      const principal = await h.tokens.resolve(token);

      expect(principal.user.id).toBe(user.id);
      expect(principal.roles.map(r => r.name)).toEqual(["user", "admin"]);
      expect(principal.claims.roles).toEqual({ "identity-service": ["user"] });
    });

    it("fails for a user deleted after issuance", async () => {
      const token = await h.tokens.issue(user);
      await h.accounts.softDelete(user.id);

      await expect(h.tokens.resolve(token)).rejects.toMatchObject({
        code: "INVALID_STATE",
        message: "Cannot read the user data"
      });
    });

    it("fails for a user left without roles", async () => {
      const token = await h.tokens.issue(user);
      await h.rbac.unassignRole(user.id, h.boot.defaultRole.id);

      const err = await h.tokens.resolve(token).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(IdentityError);
      expect(err).toMatchObject({ code: "INVALID_STATE", message: "Cannot read the user roles" });
    });

    it("propagates invalid tokens", async () => {
      await expect(h.tokens.resolve("garbage")).rejects.toBeInstanceOf(InvalidTokenError);
    });
  });
});
