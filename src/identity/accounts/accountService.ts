import { z } from "zod";
import type { IdentityConfig } from "../config.js";
import { IdentityError, PasswordChangeError, UserCreationError } from "../errors.js";
import { noopObserver, type SecurityEventObserver } from "../events.js";
import type { PasswordHasher } from "../password/hasher.js";
import { validatePassword } from "../password/policy.js";
import type { CredentialStore } from "../store/types.js";
import { systemClock, type Clock } from "../time.js";
import { toPublicUser, type PublicUser, type User } from "../types.js";

export const RegistrationSchema = z.object({
  firstName: z.string().min(1).max(50),
  middleName: z.string().max(50).nullish(),
  lastName: z.string().min(1).max(50),
  email: z.string().email().max(100),
  password: z.string()
});

export type Registration = z.infer<typeof RegistrationSchema>;

export const ProfileUpdateSchema = z
  .object({
    firstName: z.string().min(1).max(50),
    middleName: z.string().max(50).nullable(),
    lastName: z.string().min(1).max(50)
  })
  .partial()
  .strict();

export type ProfileUpdate = z.infer<typeof ProfileUpdateSchema>;

export type AccountSettings = Pick<IdentityConfig, "serviceName" | "defaultUserRole">;

/**
 * Account lifecycle: registration, password change, activation and soft delete.
 */
export class AccountService {
  private readonly store: CredentialStore;
  private readonly hasher: PasswordHasher;
  private readonly settings: AccountSettings;
  private readonly observer: SecurityEventObserver;
  private readonly clock: Clock;

  constructor(
    store: CredentialStore,
    hasher: PasswordHasher,
    settings: AccountSettings,
    options?: { observer?: SecurityEventObserver; clock?: Clock }
  ) {
    this.store = store;
    this.hasher = hasher;
    this.settings = settings;
    this.observer = options?.observer ?? noopObserver;
    this.clock = options?.clock ?? systemClock;
  }

  /**
   * Creates an active, unverified user holding this service's default role
   * and a membership in this service.
   *
   * @throws IdentityError BAD_REQUEST for malformed input
   * @throws PasswordValidationError when the password breaks the policy
   * @throws IdentityError CONFLICT when the email is taken
   * @throws UserCreationError when the default role cannot be assigned
   */
  async register(input: Registration): Promise<User> {
    const parsed = RegistrationSchema.safeParse(input);
    if (!parsed.success) {
      throw new IdentityError("BAD_REQUEST", "Invalid registration", {
        issues: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`)
      });
    }
    const registration = parsed.data;

    validatePassword(registration.password);

    if (await this.store.getUserByEmail(registration.email)) {
      throw new IdentityError("CONFLICT", `User with email ${registration.email} already exists`);
    }

    // Resolve the role before writing anything so a misconfigured service leaves no orphan user
    const service = await this.store.getServiceByName(this.settings.serviceName);
    if (!service) {
      throw new UserCreationError(`Service '${this.settings.serviceName}' is not provisioned`);
    }
    const defaultRole = await this.store.getRoleByName(service.id, this.settings.defaultUserRole);
    if (!defaultRole) {
      throw new UserCreationError(
        `Default role '${this.settings.defaultUserRole}' not found in service '${service.name}'`
      );
    }

    const user = await this.store.createUser({
      firstName: registration.firstName,
      middleName: registration.middleName ?? null,
      lastName: registration.lastName,
      email: registration.email,
      hashedPassword: await this.hasher.hash(registration.password),
      isActive: true,
      isVerified: false
    });

    if (!(await this.store.assignRole(user.id, defaultRole.id))) {
      throw new UserCreationError("Failed to assign default role to user", { userId: user.id });
    }
    await this.store.assignServiceToUser(user.id, service.id);

    return user;
  }

  /**
   * @throws PasswordChangeError when the user is unknown or the current password is wrong
   * @throws PasswordValidationError when the new password breaks the policy
   */
  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.store.getUserById(userId);
    if (!user) {
      throw new PasswordChangeError("User not found");
    }

    if (!(await this.hasher.verify(currentPassword, user.hashedPassword))) {
      throw new PasswordChangeError("Current password is incorrect");
    }

    validatePassword(newPassword);

    await this.store.updateUser(user.id, { hashedPassword: await this.hasher.hash(newPassword) });

    await this.observer({
      kind: "password.changed",
      severity: "low",
      timestamp: this.clock(),
      userId: user.id,
      email: user.email
    });
  }

  /**
   * Changes name fields only; email, password and flags have their own operations.
   *
   * @throws IdentityError BAD_REQUEST for malformed input or unknown fields
   */
  async updateProfile(userId: string, input: ProfileUpdate): Promise<User> {
    const parsed = ProfileUpdateSchema.safeParse(input);
    if (!parsed.success) {
      throw new IdentityError("BAD_REQUEST", "Invalid profile update", {
        issues: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`)
      });
    }
    await this.requireUser(userId);
    return this.store.updateUser(userId, parsed.data);
  }

  async activate(userId: string): Promise<User> {
    await this.requireUser(userId);
    return this.store.updateUser(userId, { isActive: true });
  }

  async deactivate(userId: string): Promise<User> {
    await this.requireUser(userId);
    return this.store.updateUser(userId, { isActive: false });
  }

  /** The user disappears from every lookup; the row is kept */
  async softDelete(userId: string): Promise<void> {
    await this.requireUser(userId);
    await this.store.updateUser(userId, { isDeleted: true });
  }

  async getProfile(userId: string): Promise<PublicUser | null> {
    const user = await this.store.getUserById(userId);
    return user ? toPublicUser(user) : null;
  }

  async list(): Promise<PublicUser[]> {
    return (await this.store.listUsers()).map(toPublicUser);
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.store.getUserById(userId);
    if (!user) {
      throw new IdentityError("NOT_FOUND", `User ${userId} not found`);
    }
    return user;
  }
}
