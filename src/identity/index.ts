/**
 * Identity & Access Module
 *
 * Authentication with account lockout, service-scoped RBAC and signed
 * access tokens over a sql.js credential store.
 */

// Configuration & errors
export {
  IdentityConfigSchema,
  TokenAlgorithmEnum,
  parseConfig,
  loadConfigFromEnv,
  type IdentityConfig,
  type IdentityConfigInput,
  type TokenAlgorithm
} from "./config.js";
export {
  IdentityError,
  PasswordValidationError,
  AccountLockedError,
  MissingRoleError,
  MissingPermissionError,
  PasswordChangeError,
  InvalidTokenError,
  PermissionStillAssignedError,
  UserCreationError,
  toIdentityError,
  type IdentityErrorCode
} from "./errors.js";

// Domain
export * from "./types.js";
export {
  SecurityEventKindEnum,
  SeverityEnum,
  composeObservers,
  noopObserver,
  type SecurityEvent,
  type SecurityEventKind,
  type SecurityEventObserver,
  type Severity
} from "./events.js";
export { systemClock, parseUtcTimestamp, type Clock } from "./time.js";
export { createLogger, createLoggingObserver, type Logger } from "./logger.js";

// Persistence
export { SqliteDatabase } from "./store/database.js";
export { SqliteCredentialStore } from "./store/sqliteStore.js";
export type { CredentialStore, UserStore, RbacStore } from "./store/types.js";

// Core
export * from "./password/index.js";
export { LockoutEngine, type LockState, type LockoutPolicy, type FailureOutcome } from "./lockout/lockout.js";
export { Authenticator, type AuthenticatorOptions } from "./authn/authenticator.js";
export { PermissionResolver, groupRolesByService, describePermission } from "./authz/resolver.js";
export { AuthorizationGate } from "./authz/gate.js";
export {
  TokenService,
  TokenClaimsSchema,
  type TokenClaims,
  type TokenSubject,
  type ResolvedPrincipal,
  type TokenSettings
} from "./token/tokenService.js";

// Administration
export {
  AccountService,
  RegistrationSchema,
  ProfileUpdateSchema,
  type Registration,
  type ProfileUpdate,
  type AccountSettings
} from "./accounts/accountService.js";
export { RbacAdmin, type RoleDefinition, type PermissionDefinition } from "./rbac/rbacAdmin.js";
export { bootstrapIdentityService, ADMIN_ROLE, CORE_PERMISSIONS, type BootstrapResult } from "./rbac/bootstrap.js";
export * from "./audit/index.js";

export { createIdentityServices, type IdentityServices, type IdentityServicesOptions } from "./container.js";
