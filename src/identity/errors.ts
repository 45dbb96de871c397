export type IdentityErrorCode =
  | "VALIDATION_FAILED"
  | "ACCOUNT_LOCKED"
  | "MISSING_ROLE"
  | "MISSING_PERMISSION"
  | "PASSWORD_CHANGE_FAILED"
  | "INVALID_TOKEN"
  | "INVALID_STATE"
  | "PERMISSION_STILL_ASSIGNED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "STORE_ERROR"
  | "BAD_REQUEST"
  | "INTERNAL";

export class IdentityError extends Error {
  readonly code: IdentityErrorCode;
  readonly details?: unknown;

  constructor(code: IdentityErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "IdentityError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: IdentityErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

/**
 * Password policy violations. Every violated rule is reported, not just the first.
 */
export class PasswordValidationError extends IdentityError {
  readonly reasons: string[];

  constructor(reasons: string[]) {
    super("VALIDATION_FAILED", reasons.join("; "), { reasons });
    this.name = "PasswordValidationError";
    this.reasons = reasons;
  }
}

export class AccountLockedError extends IdentityError {
  readonly unlockAt: Date;
  /** Human-readable unlock time, e.g. "2026-10-19 17:30:00 UTC" */
  readonly unlockTime: string;

  constructor(unlockAt: Date) {
    const unlockTime = formatUnlockTime(unlockAt);
    super("ACCOUNT_LOCKED", `Account is locked until ${unlockTime}`, { unlockTime });
    this.name = "AccountLockedError";
    this.unlockAt = unlockAt;
    this.unlockTime = unlockTime;
  }
}

export class MissingRoleError extends IdentityError {
  readonly roleName: string;

  constructor(roleName: string, service?: string) {
    super(
      "MISSING_ROLE",
      service ? `Missing role '${roleName}' in service '${service}'` : `Missing role '${roleName}'`,
      { role: roleName, ...(service !== undefined && { service }) }
    );
    this.name = "MissingRoleError";
    this.roleName = roleName;
  }
}

export class MissingPermissionError extends IdentityError {
  readonly resource: string;
  readonly action: string;

  constructor(resource: string, action: string) {
    super("MISSING_PERMISSION", `Missing permission '${resource}:${action}'`, { resource, action });
    this.name = "MissingPermissionError";
    this.resource = resource;
    this.action = action;
  }
}

export class PasswordChangeError extends IdentityError {
  constructor(message: string) {
    super("PASSWORD_CHANGE_FAILED", message);
    this.name = "PasswordChangeError";
  }
}

// Deliberately opaque: malformed, forged and expired tokens all look the same.
export class InvalidTokenError extends IdentityError {
  constructor() {
    super("INVALID_TOKEN", "Invalid or expired token");
    this.name = "InvalidTokenError";
  }
}

export class PermissionStillAssignedError extends IdentityError {
  constructor(permissionId: string) {
    super(
      "PERMISSION_STILL_ASSIGNED",
      `Cannot delete permission ${permissionId} because it is still assigned to one or more roles`,
      { permissionId }
    );
    this.name = "PermissionStillAssignedError";
  }
}

export class UserCreationError extends IdentityError {
  constructor(message: string, details?: unknown) {
    super("INVALID_STATE", message, details);
    this.name = "UserCreationError";
  }
}

export function toIdentityError(err: unknown): IdentityError {
  if (err instanceof IdentityError) return err;
  if (err instanceof Error) {
    if (err.name === "ZodError") {
      return new IdentityError("BAD_REQUEST", "Validation error", { issues: "issues" in err ? err.issues : undefined });
    }
    return new IdentityError("INTERNAL", err.message, { name: err.name });
  }
  return new IdentityError("INTERNAL", "Unknown error", { err });
}

function formatUnlockTime(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}
