import { AccountService } from "./accounts/accountService.js";
import { AuditTrail, createAuditObserver } from "./audit/auditTrail.js";
import { Authenticator } from "./authn/authenticator.js";
import { AuthorizationGate } from "./authz/gate.js";
import { PermissionResolver } from "./authz/resolver.js";
import type { IdentityConfig } from "./config.js";
import { composeObservers, type SecurityEventObserver } from "./events.js";
import { LockoutEngine } from "./lockout/lockout.js";
import { createLoggingObserver, type Logger } from "./logger.js";
import { BcryptPasswordHasher, type PasswordHasher } from "./password/hasher.js";
import { RbacAdmin } from "./rbac/rbacAdmin.js";
import type { SqliteDatabase } from "./store/database.js";
import { SqliteCredentialStore } from "./store/sqliteStore.js";
import { systemClock, type Clock } from "./time.js";
import { TokenService } from "./token/tokenService.js";

export type IdentityServices = {
  config: IdentityConfig;
  db: SqliteDatabase;
  logger: Logger;
  store: SqliteCredentialStore;
  hasher: PasswordHasher;
  lockout: LockoutEngine;
  authenticator: Authenticator;
  resolver: PermissionResolver;
  tokens: TokenService;
  gate: AuthorizationGate;
  accounts: AccountService;
  rbac: RbacAdmin;
  audit: AuditTrail;
};

export type IdentityServicesOptions = {
  config: IdentityConfig;
  db: SqliteDatabase;
  logger: Logger;
  clock?: Clock;
  hasher?: PasswordHasher;
  /** Receives security events after the logger and the audit trail */
  observer?: SecurityEventObserver;
};

/**
 * Wires the identity components over one database. Security events go to
 * the logger and the audit trail, in that order.
 */
export function createIdentityServices(options: IdentityServicesOptions): IdentityServices {
  const { config, db, logger } = options;
  const clock = options.clock ?? systemClock;

  const store = new SqliteCredentialStore(db, { clock });
  const audit = new AuditTrail(db);
  const observers = [createLoggingObserver(logger), createAuditObserver(audit)];
  if (options.observer) observers.push(options.observer);
  const observer = composeObservers(...observers);

  const hasher = options.hasher ?? new BcryptPasswordHasher(config.bcryptRounds);
  const lockout = new LockoutEngine(store, config, { observer, clock });
  const resolver = new PermissionResolver(store, { clock });

  return {
    config,
    db,
    logger,
    store,
    hasher,
    lockout,
    authenticator: new Authenticator(store, hasher, lockout, { observer, clock }),
    resolver,
    tokens: new TokenService(store, resolver, config, { clock }),
    gate: new AuthorizationGate(resolver, config, { observer, clock }),
    accounts: new AccountService(store, hasher, config, { observer, clock }),
    rbac: new RbacAdmin(store),
    audit
  };
}
