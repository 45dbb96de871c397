import pino, { type Logger } from "pino";
import type { IdentityConfig } from "./config.js";
import type { SecurityEventObserver } from "./events.js";

export type { Logger } from "pino";

/**
 * Root logger. Writes JSON lines to stderr so stdout stays free for CLI output.
 */
export function createLogger(config: Pick<IdentityConfig, "logLevel" | "serviceName">): Logger {
  return pino(
    {
      level: config.logLevel,
      base: { service: config.serviceName },
      redact: {
        paths: ["password", "currentPassword", "newPassword", "hashedPassword", "token", "*.password", "*.hashedPassword"],
        censor: "[REDACTED]"
      }
    },
    pino.destination(2)
  );
}

const SEVERITY_LEVEL = {
  low: "info",
  medium: "warn",
  high: "error"
} as const;

export function createLoggingObserver(logger: Logger): SecurityEventObserver {
  const log = logger.child({ component: "security" });
  return (event) => {
    log[SEVERITY_LEVEL[event.severity]](
      {
        event: event.kind,
        userId: event.userId,
        email: event.email,
        at: event.timestamp.toISOString(),
        ...event.details
      },
      `security event ${event.kind}`
    );
  };
}
