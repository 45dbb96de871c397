import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import { SecurityEventKindEnum } from "../identity/events.js";
import { toIdentityError } from "../identity/errors.js";
import { ProfileUpdateSchema } from "../identity/accounts/accountService.js";
import { groupRolesByService } from "../identity/authz/resolver.js";
import type { IdentityServices } from "../identity/container.js";
import { ADMIN_ROLE } from "../identity/rbac/bootstrap.js";
import { toPublicUser } from "../identity/types.js";
import { createAdminRoutes } from "./adminRoutes.js";
import { createBearerAuth, createRequestLogger, readJson, statusForError } from "./middleware.js";

const TokenRequestSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1)
});

const ChangePasswordSchema = z.object({
  currentPassword: z.string(),
  newPassword: z.string()
});

const CreateUserSchema = z.object({
  firstName: z.string(),
  middleName: z.string().nullish(),
  lastName: z.string(),
  email: z.string(),
  password: z.string()
});

const AuditQueryParamsSchema = z.object({
  userId: z.string().optional(),
  kind: z.array(SecurityEventKindEnum).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
  order: z.enum(["asc", "desc"]).optional()
});

export const API_PREFIX = "/api/v1";

/**
 * Builds the HTTP API over the identity services. Routing only: every rule
 * lives in the components it calls.
 */
export function createIdentityApp(services: IdentityServices): Hono {
  const { accounts, audit, authenticator, gate, lockout, logger, resolver, tokens } = services;
  const app = new Hono();
  const api = new Hono();
  const log = logger.child({ component: "http" });

  app.use("*", createRequestLogger(logger));

  app.onError((err, c) => {
    const identityErr = toIdentityError(err);
    const status = statusForError(identityErr);
    if (status === 500) {
      log.error({ err, requestId: c.get("requestId") }, "request failed");
    }
    return c.json(identityErr.toJSON(), status);
  });

  app.notFound((c) => c.json({ code: "NOT_FOUND", message: `No route for ${c.req.method} ${c.req.path}` }, 404));

  api.get("/health", (c) => c.json({ ok: true, service: services.config.serviceName }));

  api.post("/auth/token", async (c) => {
    const input = TokenRequestSchema.parse(await readCredentials(c));

    const user = await authenticator.authenticate(input.username, input.password);
    if (!user) {
      return c.json({ code: "INVALID_CREDENTIALS", message: "Invalid credentials" }, 401);
    }

    const accessToken = await tokens.issue(user);
    return c.json({ access_token: accessToken, token_type: "bearer" });
  });

  // Everything below needs a valid bearer token
  const requireToken = createBearerAuth(tokens);

  api.get("/auth/me", requireToken, (c) => {
    const principal = c.get("principal");
    return c.json({
      user: toPublicUser(principal.user),
      roles: groupRolesByService(principal.roles)
    });
  });

  api.patch("/auth/me", requireToken, async (c) => {
    const changes = ProfileUpdateSchema.parse(await readJson(c));
    const user = await accounts.updateProfile(c.get("principal").user.id, changes);
    return c.json({ user: toPublicUser(user) });
  });

  api.post("/auth/change-password", requireToken, async (c) => {
    const input = ChangePasswordSchema.parse(await readJson(c));
    await accounts.changePassword(c.get("principal").user.id, input.currentPassword, input.newPassword);
    return c.json({ changed: true });
  });

  api.post("/auth/users", requireToken, async (c) => {
    const principal = c.get("principal");
    await gate.requireRole(principal, ADMIN_ROLE);
    await gate.requirePermission(principal, "user", "create");

    const input = CreateUserSchema.parse(await readJson(c));
    const user = await accounts.register(input);
    return c.json(toPublicUser(user), 201);
  });

  api.post("/auth/users/:id/unlock", requireToken, async (c) => {
    const principal = c.get("principal");
    await gate.requireRole(principal, ADMIN_ROLE);
    await gate.requirePermission(principal, "user", "update");

    const user = await lockout.unlock(c.req.param("id"));
    return c.json(toPublicUser(user));
  });

  api.get("/auth/permissions", requireToken, async (c) => {
    const permissions = await resolver.listUserPermissions(c.get("principal").user.id, c.req.query("service"));
    return c.json({ permissions });
  });

  api.get("/auth/audit", requireToken, async (c) => {
    const principal = c.get("principal");
    await gate.requireRole(principal, ADMIN_ROLE);
    await gate.requirePermission(principal, "audit", "read");

    const kinds = c.req.queries("kind");
    const params = AuditQueryParamsSchema.parse({
      userId: c.req.query("userId"),
      kind: kinds,
      limit: c.req.query("limit"),
      order: c.req.query("order")
    });

    const entries = await audit.query({
      userId: params.userId,
      kinds: params.kind,
      limit: params.limit,
      order: params.order
    });
    return c.json({ entries });
  });

  api.route("/admin", createAdminRoutes(services, requireToken));

  app.route(API_PREFIX, api);
  return app;
}

export type HttpServerOptions = {
  services: IdentityServices;
  port: number;
};

export function startHttpServer(options: HttpServerOptions): ReturnType<typeof serve> {
  const app = createIdentityApp(options.services);
  const server = serve({ fetch: app.fetch, port: options.port });
  options.services.logger.info({ port: options.port }, `HTTP server listening on http://localhost:${options.port}`);
  return server;
}

// ============================================================================
// Helper Functions
// ============================================================================

/** OAuth2-style password requests arrive as forms; JSON is accepted too */
async function readCredentials(c: Context): Promise<unknown> {
  const contentType = c.req.header("Content-Type") ?? "";
  if (contentType.includes("application/x-www-form-urlencoded") || contentType.includes("multipart/form-data")) {
    return c.req.parseBody();
  }
  return readJson(c);
}
