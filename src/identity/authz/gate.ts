import type { IdentityConfig } from "../config.js";
import { MissingPermissionError, MissingRoleError } from "../errors.js";
import { noopObserver, type SecurityEventObserver } from "../events.js";
import { systemClock, type Clock } from "../time.js";
import type { UserWithRoles } from "../types.js";
import type { PermissionResolver } from "./resolver.js";

/**
 * Authorization Gate
 *
 * Role checks read the roles already resolved onto the principal; permission
 * checks always go back to the resolver so revoked grants take effect at once.
 */
export class AuthorizationGate {
  private readonly resolver: PermissionResolver;
  private readonly serviceName: string;
  private readonly observer: SecurityEventObserver;
  private readonly clock: Clock;

  constructor(
    resolver: PermissionResolver,
    config: Pick<IdentityConfig, "serviceName">,
    options?: { observer?: SecurityEventObserver; clock?: Clock }
  ) {
    this.resolver = resolver;
    this.serviceName = config.serviceName;
    this.observer = options?.observer ?? noopObserver;
    this.clock = options?.clock ?? systemClock;
  }

  /**
   * @param service defaults to this deployment's service
   * @throws MissingRoleError
   */
  async requireRole(principal: UserWithRoles, roleName: string, service: string = this.serviceName): Promise<void> {
    const held = principal.roles.some(role => role.serviceName === service && role.name === roleName);
    if (held) return;

    await this.observer({
      kind: "access.role_denied",
      severity: "medium",
      timestamp: this.clock(),
      userId: principal.user.id,
      email: principal.user.email,
      details: { role: roleName, service }
    });
    throw new MissingRoleError(roleName, service);
  }

  /** @throws MissingPermissionError */
  async requirePermission(principal: UserWithRoles, resource: string, action: string): Promise<void> {
    return this.requirePermissionFor(principal, this.serviceName, resource, action);
  }

  /** Same as `requirePermission`, scoped to another service */
  async requirePermissionFor(
    principal: UserWithRoles,
    service: string,
    resource: string,
    action: string
  ): Promise<void> {
    if (await this.resolver.hasPermission(principal.user.id, service, resource, action)) {
      return;
    }

    await this.observer({
      kind: "access.permission_denied",
      severity: "medium",
      timestamp: this.clock(),
      userId: principal.user.id,
      email: principal.user.email,
      details: { service, resource, action }
    });
    throw new MissingPermissionError(resource, action);
  }
}
