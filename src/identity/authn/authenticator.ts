import crypto from "node:crypto";
import { AccountLockedError } from "../errors.js";
import { noopObserver, type SecurityEventObserver } from "../events.js";
import type { LockoutEngine } from "../lockout/lockout.js";
import type { PasswordHasher } from "../password/hasher.js";
import type { UserStore } from "../store/types.js";
import { systemClock, type Clock } from "../time.js";
import type { User } from "../types.js";

export type AuthenticatorOptions = {
  observer?: SecurityEventObserver;
  clock?: Clock;
};

/**
 * Verifies email/password credentials.
 *
 * Wrong credentials resolve to null; a rejection always means either a locked
 * account (AccountLockedError) or an infrastructure failure.
 */
export class Authenticator {
  private readonly store: UserStore;
  private readonly hasher: PasswordHasher;
  private readonly lockout: LockoutEngine;
  private readonly observer: SecurityEventObserver;
  private readonly clock: Clock;
  private dummyHash?: Promise<string>;

  constructor(store: UserStore, hasher: PasswordHasher, lockout: LockoutEngine, options?: AuthenticatorOptions) {
    this.store = store;
    this.hasher = hasher;
    this.lockout = lockout;
    this.observer = options?.observer ?? noopObserver;
    this.clock = options?.clock ?? systemClock;
  }

  async authenticate(email: string, password: string): Promise<User | null> {
    const now = this.clock();
    const user = await this.store.getUserByEmail(email);

    if (!user) {
      // Unknown emails pay for one hash verification too
      await this.hasher.verify(password, await this.getDummyHash());
      await this.observer({
        kind: "auth.login_failed",
        severity: "medium",
        timestamp: now,
        userId: null,
        email,
        details: { reason: "unknown_user" }
      });
      return null;
    }

    try {
      this.lockout.assertNotLocked(user, now);
    } catch (err) {
      if (err instanceof AccountLockedError) {
        await this.observer({
          kind: "auth.login_rejected_locked",
          severity: "medium",
          timestamp: now,
          userId: user.id,
          email: user.email,
          details: { unlockTime: err.unlockTime }
        });
      }
      throw err;
    }

    const matches = await this.hasher.verify(password, user.hashedPassword);

    if (!matches) {
      const outcome = await this.lockout.recordFailure(user, now);
      await this.observer({
        kind: "auth.login_failed",
        severity: "medium",
        timestamp: now,
        userId: user.id,
        email: user.email,
        details: { reason: "bad_password", failedAttempts: outcome.user.failedLoginAttempts, locked: outcome.locked }
      });
      return null;
    }

    const authenticated = await this.lockout.recordSuccess(user);
    await this.observer({
      kind: "auth.login_succeeded",
      severity: "low",
      timestamp: now,
      userId: user.id,
      email: user.email
    });
    return authenticated;
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.hasher.hash(crypto.randomUUID());
    }
    return this.dummyHash;
  }
}
