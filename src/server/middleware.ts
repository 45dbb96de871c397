import crypto from "node:crypto";
import type { Context, MiddlewareHandler, Next } from "hono";
import { IdentityError, InvalidTokenError, type IdentityErrorCode } from "../identity/errors.js";
import type { Logger } from "../identity/logger.js";
import type { ResolvedPrincipal, TokenService } from "../identity/token/tokenService.js";

// Extend Hono context with the resolved caller
declare module "hono" {
  interface ContextVariableMap {
    principal: ResolvedPrincipal;
    requestId: string;
  }
}

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 423 | 500;

const ERROR_STATUS: Record<IdentityErrorCode, ErrorStatus> = {
  BAD_REQUEST: 400,
  VALIDATION_FAILED: 400,
  PASSWORD_CHANGE_FAILED: 400,
  INVALID_TOKEN: 401,
  MISSING_ROLE: 403,
  MISSING_PERMISSION: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  PERMISSION_STILL_ASSIGNED: 409,
  ACCOUNT_LOCKED: 423,
  INVALID_STATE: 500,
  STORE_ERROR: 500,
  INTERNAL: 500
};

export function statusForError(err: IdentityError): ErrorStatus {
  return ERROR_STATUS[err.code];
}

/**
 * Resolves the bearer token into a principal and stores it on the context.
 * A token whose user or roles no longer exist is treated like any other bad
 * token. Store and internal failures keep their 500.
 */
export function createBearerAuth(tokens: TokenService): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const token = extractBearerToken(c);

    let principal: ResolvedPrincipal;
    try {
      principal = await tokens.resolve(token);
    } catch (err) {
      if (err instanceof IdentityError && err.code === "INVALID_STATE") {
        throw new InvalidTokenError();
      }
      throw err;
    }

    c.set("principal", principal);
    return next();
  };
}

/**
 * One log line per request, tagged with a request id echoed in X-Request-ID.
 */
export function createRequestLogger(logger: Logger): MiddlewareHandler {
  const log = logger.child({ component: "http" });

  return async (c: Context, next: Next) => {
    const requestId = c.req.header("X-Request-ID") ?? crypto.randomUUID();
    const started = performance.now();
    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();

    log.info(
      {
        requestId,
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - started)
      },
      "request completed"
    );
  };
}

export async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new IdentityError("BAD_REQUEST", "Invalid JSON body");
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function extractBearerToken(c: Context): string {
  const authHeader = c.req.header("Authorization");
  if (!authHeader) {
    throw new InvalidTokenError();
  }

  const parts = authHeader.split(" ");
  if (parts.length !== 2 || parts[0]?.toLowerCase() !== "bearer" || !parts[1]) {
    throw new InvalidTokenError();
  }

  return parts[1];
}
