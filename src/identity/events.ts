import { z } from "zod";

/**
 * Security Events
 *
 * Core components never log. They report security-relevant transitions to an
 * injected observer; the outer layers decide where events go (logger, audit
 * trail, both).
 */

export const SecurityEventKindEnum = z.enum([
  "auth.login_succeeded",
  "auth.login_failed",
  "auth.login_rejected_locked",
  "account.locked",
  "account.unlocked",
  "password.changed",
  "access.role_denied",
  "access.permission_denied"
]);

export type SecurityEventKind = z.infer<typeof SecurityEventKindEnum>;

export const SeverityEnum = z.enum(["low", "medium", "high"]);

export type Severity = z.infer<typeof SeverityEnum>;

export type SecurityEvent = {
  kind: SecurityEventKind;
  severity: Severity;
  timestamp: Date;
  userId: string | null;
  email: string | null;
  details?: Record<string, unknown>;
};

export type SecurityEventObserver = (event: SecurityEvent) => void | Promise<void>;

export const noopObserver: SecurityEventObserver = () => {};

/**
 * Fan an event out to several observers, in order. An observer that throws
 * stops the chain and the error reaches the caller.
 */
export function composeObservers(...observers: SecurityEventObserver[]): SecurityEventObserver {
  return async (event) => {
    for (const observer of observers) {
      await observer(event);
    }
  };
}
