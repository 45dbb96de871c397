import { SignJWT, jwtVerify } from "jose";
import { z } from "zod";
import type { IdentityConfig } from "../config.js";
import { IdentityError, InvalidTokenError } from "../errors.js";
import type { PermissionResolver } from "../authz/resolver.js";
import type { UserStore } from "../store/types.js";
import { systemClock, toEpochSeconds, type Clock } from "../time.js";
import type { UserWithRoles } from "../types.js";

/**
 * Access Tokens
 *
 * Compact HMAC-signed JWS carrying the subject, email and a snapshot of the
 * user's roles grouped by service name. The embedded roles are a display
 * convenience: they go stale when an admin changes assignments mid-session,
 * which is why `resolve` re-reads the user and roles and why permission
 * checks never trust the token alone.
 */

export const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  roles: z.record(z.array(z.string())),
  iat: z.number().int(),
  exp: z.number().int()
});

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

/** Anything with an identity; `id` is null for a user not yet persisted */
export type TokenSubject = {
  id: string | null;
  email: string;
};

export type ResolvedPrincipal = UserWithRoles & {
  claims: TokenClaims;
};

export type TokenSettings = Pick<IdentityConfig, "secretKey" | "algorithm" | "tokenTtlMinutes">;

export class TokenService {
  private readonly users: UserStore;
  private readonly resolver: PermissionResolver;
  private readonly settings: TokenSettings;
  private readonly key: Uint8Array;
  private readonly clock: Clock;

  constructor(users: UserStore, resolver: PermissionResolver, settings: TokenSettings, options?: { clock?: Clock }) {
    this.users = users;
    this.resolver = resolver;
    this.settings = settings;
    this.key = new TextEncoder().encode(settings.secretKey);
    this.clock = options?.clock ?? systemClock;
  }

  /**
   * @param ttlSeconds lifetime; defaults to the configured token TTL
   * @throws IdentityError INVALID_STATE when the subject has no id yet
   */
  async issue(subject: TokenSubject, ttlSeconds: number = this.settings.tokenTtlMinutes * 60): Promise<string> {
    if (subject.id === null || subject.id === "") {
      throw new IdentityError("INVALID_STATE", "Id cannot be null when creating a token");
    }
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new IdentityError("INVALID_STATE", "Token lifetime must be positive", { ttlSeconds });
    }

    const roles = await this.resolver.rolesByService(subject.id);
    const issuedAt = toEpochSeconds(this.clock());

    return new SignJWT({ email: subject.email, roles })
      .setProtectedHeader({ alg: this.settings.algorithm, typ: "JWT" })
      .setSubject(subject.id)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + Math.floor(ttlSeconds))
      .sign(this.key);
  }

  /**
   * Verifies signature, algorithm and expiry and returns the claims.
   *
   * @throws InvalidTokenError for every kind of failure, without saying which
   */
  async decode(token: string): Promise<TokenClaims> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, this.key, {
        algorithms: [this.settings.algorithm],
        currentDate: this.clock(),
        requiredClaims: ["sub", "iat", "exp"]
      }));
    } catch {
      throw new InvalidTokenError();
    }

    const parsed = TokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidTokenError();
    }
    return parsed.data;
  }

  /**
   * Decodes the token, then re-reads the user and their roles from the store.
   *
   * @throws InvalidTokenError when the token does not verify
   * @throws IdentityError INVALID_STATE when the user or their roles are gone
   */
  async resolve(token: string): Promise<ResolvedPrincipal> {
    const claims = await this.decode(token);

    const user = await this.users.getUserById(claims.sub);
    if (!user) {
      throw new IdentityError("INVALID_STATE", "Cannot read the user data");
    }

    // Every registered user holds at least the default role
    const roles = await this.resolver.listUserRoles(user.id);
    if (roles.length === 0) {
      throw new IdentityError("INVALID_STATE", "Cannot read the user roles");
    }

    return { user, roles, claims };
  }
}
