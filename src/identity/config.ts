import { z } from "zod";
import { IdentityError } from "./errors.js";

/**
 * Identity Service Configuration
 *
 * Loaded once at startup and passed explicitly into every component.
 * Nothing reads the environment after `loadConfigFromEnv` returns.
 */

export const TokenAlgorithmEnum = z.enum(["HS256", "HS384", "HS512"]);

export type TokenAlgorithm = z.infer<typeof TokenAlgorithmEnum>;

export const IdentityConfigSchema = z.object({
  /** HMAC secret used to sign access tokens */
  secretKey: z.string().min(32, "secretKey must be at least 32 characters"),
  /** JWS algorithm for access tokens */
  algorithm: TokenAlgorithmEnum.default("HS256"),
  /** Access token lifetime in minutes */
  tokenTtlMinutes: z.number().int().positive(),
  /** Failed password attempts before the account locks */
  maxFailedAttempts: z.number().int().positive().default(3),
  /** How long a lock lasts once triggered */
  lockoutDurationMinutes: z.number().int().positive().default(60),
  /** Name of the service this deployment represents, used for RBAC scoping */
  serviceName: z.string().min(1).default("identity-service"),
  /** Role assigned to newly registered users within `serviceName` */
  defaultUserRole: z.string().min(1).default("user"),
  /** sql.js database file, or ":memory:" for a throwaway database */
  databasePath: z.string().min(1).default(":memory:"),
  /** bcrypt cost factor */
  bcryptRounds: z.number().int().min(4).max(15).default(12),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  port: z.number().int().min(0).max(65535).default(8000)
});

export type IdentityConfig = z.infer<typeof IdentityConfigSchema>;
export type IdentityConfigInput = z.input<typeof IdentityConfigSchema>;

const ENV_KEYS = {
  secretKey: "SECRET_TOKEN_KEY",
  algorithm: "AUTH_ALGORITHM",
  tokenTtlMinutes: "TOKEN_TIME_DELTA_IN_MINUTES",
  maxFailedAttempts: "MAX_FAILED_PASSWORD_ATTEMPTS",
  lockoutDurationMinutes: "LOCKOUT_DURATION_IN_MINUTES",
  serviceName: "SERVICE_NAME",
  defaultUserRole: "DEFAULT_USER_ROLE",
  databasePath: "IDENTITY_DATABASE_PATH",
  bcryptRounds: "BCRYPT_ROUNDS",
  logLevel: "LOG_LEVEL",
  port: "PORT"
} as const satisfies Record<keyof IdentityConfig, string>;

const NUMERIC_KEYS = new Set<string>([
  "tokenTtlMinutes",
  "maxFailedAttempts",
  "lockoutDurationMinutes",
  "bcryptRounds",
  "port"
]);

// Level names some deployments still carry over from older tooling
const LEGACY_LOG_LEVELS: Record<string, string> = {
  warning: "warn",
  critical: "fatal"
};

/**
 * Validate a configuration object, failing fast with every issue listed.
 *
 * @throws IdentityError with code BAD_REQUEST
 */
export function parseConfig(input: unknown): IdentityConfig {
  const result = IdentityConfigSchema.safeParse(input);
  if (!result.success) {
    throw new IdentityError(
      "BAD_REQUEST",
      "Invalid identity configuration",
      { issues: result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`) }
    );
  }
  return result.data;
}

export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<IdentityConfigInput> = {}
): IdentityConfig {
  const raw: Record<string, unknown> = {};

  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey] ?? env[envKey.toLowerCase()];
    if (value === undefined || value === "") continue;
    raw[field] = NUMERIC_KEYS.has(field) ? Number(value) : value;
  }

  if (typeof raw.logLevel === "string") {
    const level = raw.logLevel.toLowerCase();
    raw.logLevel = LEGACY_LOG_LEVELS[level] ?? level;
  }

  return parseConfig({ ...raw, ...overrides });
}
