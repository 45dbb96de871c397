import type { IdentityConfig } from "../config.js";
import { AccountLockedError, IdentityError } from "../errors.js";
import { noopObserver, type SecurityEventObserver } from "../events.js";
import type { UserStore } from "../store/types.js";
import { addMinutes, systemClock, type Clock } from "../time.js";
import type { User } from "../types.js";

/**
 * Account Lockout
 *
 * Per-account state machine driven by password verification outcomes:
 *
 *   unlocked --fail--> warned --fail (n >= max)--> locked --time--> elapsed
 *      ^                  |                                           |
 *      +-----success------+-----------------success-------------------+
 *
 * An elapsed lock behaves exactly like an unlocked account: the next outcome
 * starts from a clean counter.
 */

export type LockState =
  | { kind: "unlocked" }
  | { kind: "warned"; failedAttempts: number; remainingAttempts: number }
  | { kind: "locked"; until: Date }
  | { kind: "elapsed"; expiredAt: Date };

export type LockoutPolicy = Pick<IdentityConfig, "maxFailedAttempts" | "lockoutDurationMinutes">;

export type FailureOutcome = {
  user: User;
  /** True when this failure crossed the threshold */
  locked: boolean;
};

export class LockoutEngine {
  private readonly store: UserStore;
  private readonly policy: LockoutPolicy;
  private readonly observer: SecurityEventObserver;
  private readonly clock: Clock;

  constructor(
    store: UserStore,
    policy: LockoutPolicy,
    options?: { observer?: SecurityEventObserver; clock?: Clock }
  ) {
    this.store = store;
    this.policy = policy;
    this.observer = options?.observer ?? noopObserver;
    this.clock = options?.clock ?? systemClock;
  }

  evaluate(user: User, now: Date = this.clock()): LockState {
    if (user.lockedUntil !== null) {
      return user.lockedUntil.getTime() > now.getTime()
        ? { kind: "locked", until: user.lockedUntil }
        : { kind: "elapsed", expiredAt: user.lockedUntil };
    }
    if (user.failedLoginAttempts === 0) {
      return { kind: "unlocked" };
    }
    return {
      kind: "warned",
      failedAttempts: user.failedLoginAttempts,
      remainingAttempts: Math.max(0, this.policy.maxFailedAttempts - user.failedLoginAttempts)
    };
  }

  /**
   * @throws AccountLockedError while the lock is in force
   */
  assertNotLocked(user: User, now: Date = this.clock()): void {
    const state = this.evaluate(user, now);
    if (state.kind === "locked") {
      throw new AccountLockedError(state.until);
    }
  }

  /**
   * Clears the counter and any lock. Writes only when there is something to clear.
   */
  async recordSuccess(user: User): Promise<User> {
    if (user.failedLoginAttempts === 0 && user.lockedUntil === null) {
      return user;
    }
    return this.store.updateUser(user.id, { failedLoginAttempts: 0, lockedUntil: null });
  }

  /**
   * Counts one failure against `user`, the snapshot read before verification.
   * Only the lock columns are written; anything else changed meanwhile survives.
   */
  async recordFailure(user: User, now: Date = this.clock()): Promise<FailureOutcome> {
    const state = this.evaluate(user, now);
    if (state.kind === "locked") {
      // Callers check the lock before verifying; a failure here must not extend it
      throw new AccountLockedError(state.until);
    }

    const previous = state.kind === "elapsed" ? 0 : user.failedLoginAttempts;
    const failedLoginAttempts = previous + 1;
    const locked = failedLoginAttempts >= this.policy.maxFailedAttempts;
    const lockedUntil = locked ? addMinutes(now, this.policy.lockoutDurationMinutes) : null;

    const updated = await this.store.updateUser(user.id, { failedLoginAttempts, lockedUntil });

    if (locked && lockedUntil) {
      await this.observer({
        kind: "account.locked",
        severity: "high",
        timestamp: now,
        userId: user.id,
        email: user.email,
        details: { failedAttempts: failedLoginAttempts, lockedUntil: lockedUntil.toISOString() }
      });
    }

    return { user: updated, locked };
  }

  /**
   * Administrative unlock. Unconditional and idempotent.
   *
   * @throws IdentityError NOT_FOUND for an unknown user
   */
  async unlock(userId: string): Promise<User> {
    const user = await this.store.getUserById(userId);
    if (!user) {
      throw new IdentityError("NOT_FOUND", `User ${userId} not found`);
    }

    const updated = await this.store.updateUser(user.id, { failedLoginAttempts: 0, lockedUntil: null });

    await this.observer({
      kind: "account.unlocked",
      severity: "low",
      timestamp: this.clock(),
      userId: user.id,
      email: user.email,
      details: { previousFailedAttempts: user.failedLoginAttempts }
    });

    return updated;
  }
}
