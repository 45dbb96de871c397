import { parseConfig, type IdentityConfig, type IdentityConfigInput } from "../src/identity/config.js";
import { createIdentityServices, type IdentityServices } from "../src/identity/container.js";
import type { SecurityEvent } from "../src/identity/events.js";
import { createLogger } from "../src/identity/logger.js";
import { BcryptPasswordHasher, type PasswordHasher } from "../src/identity/password/hasher.js";
import { bootstrapIdentityService, type BootstrapResult } from "../src/identity/rbac/bootstrap.js";
import { SqliteDatabase } from "../src/identity/store/database.js";
import type { Clock } from "../src/identity/time.js";
import type { User } from "../src/identity/types.js";

export const TEST_SECRET = "test-secret-key-0123456789abcdefghij";
export const STRONG_PASSWORD = "Str0ng!Pass";
export const T0 = "2026-10-19T12:00:00.000Z";

export function testConfig(overrides: Partial<IdentityConfigInput> = {}): IdentityConfig {
  return parseConfig({
    secretKey: TEST_SECRET,
    tokenTtlMinutes: 30,
    bcryptRounds: 4,
    logLevel: "silent",
    ...overrides
  });
}

/** Clock the test moves by hand */
export class ManualClock {
  private current: Date;

  constructor(start: string = T0) {
    this.current = new Date(start);
  }

  readonly now: Clock = () => new Date(this.current.getTime());

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }

  advanceMinutes(minutes: number): void {
    this.advanceSeconds(minutes * 60);
  }
}

export type Harness = IdentityServices & {
  clock: ManualClock;
  events: SecurityEvent[];
  boot: BootstrapResult;
  register(email: string, password?: string): Promise<User>;
  registerAdmin(email: string, password?: string): Promise<User>;
};

/**
 * In-memory database with this service provisioned and every security event recorded.
 */
export async function createHarness(
  overrides: Partial<IdentityConfigInput> = {},
  options: { hasher?: PasswordHasher } = {}
): Promise<Harness> {
  const config = testConfig(overrides);
  const clock = new ManualClock();
  const events: SecurityEvent[] = [];
  const db = await SqliteDatabase.open();

  const services = createIdentityServices({
    config,
    db,
    logger: createLogger(config),
    clock: clock.now,
    hasher: options.hasher,
    observer: (event) => {
      events.push(event);
    }
  });
  const boot = await bootstrapIdentityService(services.rbac, config);

  const register = (email: string, password: string = STRONG_PASSWORD) =>
    services.accounts.register({ firstName: "Test", lastName: "User", email, password });

  return {
    ...services,
    clock,
    events,
    boot,
    register,
    async registerAdmin(email, password = STRONG_PASSWORD) {
      const user = await register(email, password);
      await services.rbac.assignRole(user.id, boot.adminRole.id);
      return user;
    }
  };
}

/**
 * Bcrypt hasher that can pause its next `verify` after hashing, so a test can
 * change the account while a login is in flight.
 */
export class HeldHasher implements PasswordHasher {
  private readonly inner = new BcryptPasswordHasher(4);
  private pending: { gate: Promise<void>; entered: () => void } | null = null;
  private release: () => void = () => {};

  /** Pauses the next `verify`; the returned promise settles once that call has started */
  hold(): Promise<void> {
    let entered: () => void = () => {};
    const started = new Promise<void>(resolve => {
      entered = resolve;
    });
    const gate = new Promise<void>(resolve => {
      this.release = resolve;
    });
    this.pending = { gate, entered };
    return started;
  }

  resume(): void {
    this.release();
  }

  hash(password: string): Promise<string> {
    return this.inner.hash(password);
  }

  async verify(password: string, hashed: string): Promise<boolean> {
    const held = this.pending;
    this.pending = null;
    held?.entered();
    const matches = await this.inner.verify(password, hashed);
    if (held) await held.gate;
    return matches;
  }
}

/** Services over an empty database; nothing provisioned */
export async function createPlainServices(overrides: Partial<IdentityConfigInput> = {}): Promise<IdentityServices> {
  const config = testConfig(overrides);
  return createIdentityServices({ config, db: await SqliteDatabase.open(), logger: createLogger(config) });
}

export function eventsOfKind(events: SecurityEvent[], kind: SecurityEvent["kind"]): SecurityEvent[] {
  return events.filter(e => e.kind === kind);
}
