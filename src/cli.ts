#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { loadConfigFromEnv, type IdentityConfigInput } from "./identity/config.js";
import { toIdentityError } from "./identity/errors.js";
import { createLogger } from "./identity/logger.js";
import { SqliteDatabase } from "./identity/store/database.js";
import { createIdentityServices, type IdentityServices } from "./identity/container.js";
import { bootstrapIdentityService } from "./identity/rbac/bootstrap.js";
import { checkPassword } from "./identity/password/policy.js";
import { describePermission } from "./identity/authz/resolver.js";
import { startHttpServer } from "./server/http.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,
  ERROR: 1,          // Command failed
  INVALID: 2,        // Input rejected (weak password, broken audit chain)
} as const;

type DatabaseOptions = { db?: string };

const program = new Command();

program.name("identity").description("Identity and access service").version("0.1.0");

program
  .command("serve")
  .description("Run the HTTP API")
  .option("--db <path>", "Database file (overrides IDENTITY_DATABASE_PATH)")
  .option("--port <port>", "Port (overrides PORT)")
  .action(async (opts: DatabaseOptions & { port?: string }) => {
    const overrides: Partial<IdentityConfigInput> = {};
    if (opts.port !== undefined) overrides.port = Number(opts.port);
    const services = await openServices(opts, overrides);

    await bootstrapIdentityService(services.rbac, services.config);
    const server = startHttpServer({ services, port: services.config.port });

    const shutdown = (signal: string) => {
      services.logger.info({ signal }, "shutting down");
      server.close(() => {
        services.db.close();
        process.exit(EXIT_CODES.OK);
      });
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  });

program
  .command("init")
  .description("Create the database and provision this service's roles and permissions")
  .option("--db <path>", "Database file (overrides IDENTITY_DATABASE_PATH)")
  .action(async (opts: DatabaseOptions) => {
    await withServices(opts, async (services) => {
      const result = await bootstrapIdentityService(services.rbac, services.config);
      process.stdout.write(chalk.green(`Initialized service '${result.service.name}' at ${services.db.path}\n`));
      process.stdout.write(chalk.dim(`  Roles: ${result.adminRole.name}, ${result.defaultRole.name}\n`));
      process.stdout.write(chalk.dim(`  Permissions: ${result.permissions.length} (${result.created} records created)\n`));
    });
  });

program
  .command("create-admin")
  .description("Register a user holding the admin role")
  .requiredOption("--email <email>", "Email address (used as login)")
  .requiredOption("--password <password>", "Initial password; must satisfy the password policy")
  .option("--first-name <name>", "First name", "Admin")
  .option("--last-name <name>", "Last name", "User")
  .option("--db <path>", "Database file (overrides IDENTITY_DATABASE_PATH)")
  .action(async (opts: DatabaseOptions & { email: string; password: string; firstName: string; lastName: string }) => {
    await withServices(opts, async (services) => {
      const { adminRole } = await bootstrapIdentityService(services.rbac, services.config);
      const user = await services.accounts.register({
        firstName: opts.firstName,
        lastName: opts.lastName,
        email: opts.email,
        password: opts.password
      });
      await services.rbac.assignRole(user.id, adminRole.id);
      process.stdout.write(chalk.green(`Created admin ${user.email} (${user.id})\n`));
    });
  });

program
  .command("unlock")
  .description("Clear the failed-attempt counter and lock of an account")
  .argument("<email>", "Account email")
  .option("--db <path>", "Database file (overrides IDENTITY_DATABASE_PATH)")
  .action(async (email: string, opts: DatabaseOptions) => {
    await withServices(opts, async (services) => {
      const user = await services.store.getUserByEmail(email);
      if (!user) {
        process.stderr.write(chalk.red(`No account for ${email}\n`));
        process.exitCode = EXIT_CODES.ERROR;
        return;
      }
      await services.lockout.unlock(user.id);
      process.stdout.write(chalk.green(`Unlocked ${email}\n`));
    });
  });

program
  .command("permissions")
  .description("List the permissions an account holds and where each comes from")
  .argument("<email>", "Account email")
  .option("--service <name>", "Only this service")
  .option("--db <path>", "Database file (overrides IDENTITY_DATABASE_PATH)")
  .action(async (email: string, opts: DatabaseOptions & { service?: string }) => {
    await withServices(opts, async (services) => {
      const user = await services.store.getUserByEmail(email);
      if (!user) {
        process.stderr.write(chalk.red(`No account for ${email}\n`));
        process.exitCode = EXIT_CODES.ERROR;
        return;
      }
      const permissions = await services.resolver.listUserPermissions(user.id, opts.service);
      if (permissions.length === 0) {
        process.stdout.write(chalk.yellow("No permissions\n"));
        return;
      }
      for (const permission of permissions) {
        process.stdout.write(`${describePermission(permission)}\n`);
      }
    });
  });

program
  .command("check-password")
  .description("Check a password against the password policy")
  .argument("<password>", "Password to check")
  .action((password: string) => {
    const reasons = checkPassword(password);
    if (reasons.length === 0) {
      process.stdout.write(chalk.green("✓ Password satisfies the policy\n"));
      return;
    }
    for (const reason of reasons) {
      process.stdout.write(chalk.red(`✗ ${reason}\n`));
    }
    process.exitCode = EXIT_CODES.INVALID;
  });

program
  .command("verify-audit")
  .description("Verify the integrity of the security audit chain")
  .option("--db <path>", "Database file (overrides IDENTITY_DATABASE_PATH)")
  .action(async (opts: DatabaseOptions) => {
    await withServices(opts, async (services) => {
      const result = await services.audit.verifyChain();
      if (result.valid) {
        process.stdout.write(chalk.green(`✓ Audit chain intact (${result.entriesChecked} entries)\n`));
        return;
      }
      process.stdout.write(chalk.red(`✗ Audit chain broken at sequence ${result.brokenAt}\n`));
      if (result.hashMismatch) {
        process.stdout.write(chalk.dim(`  expected ${result.hashMismatch.expected}\n`));
        process.stdout.write(chalk.dim(`  actual   ${result.hashMismatch.actual}\n`));
      }
      process.exitCode = EXIT_CODES.INVALID;
    });
  });

// ============================================================================
// Helpers
// ============================================================================

async function openServices(
  opts: DatabaseOptions,
  overrides: Partial<IdentityConfigInput> = {}
): Promise<IdentityServices> {
  const config = loadConfigFromEnv(process.env, {
    ...overrides,
    ...(opts.db !== undefined && { databasePath: opts.db })
  });
  const logger = createLogger(config);
  const db = await SqliteDatabase.open(config.databasePath);
  return createIdentityServices({ config, db, logger });
}

async function withServices(opts: DatabaseOptions, fn: (services: IdentityServices) => Promise<void>): Promise<void> {
  const services = await openServices(opts);
  try {
    await fn(services);
  } finally {
    services.db.close();
  }
}

program.parseAsync(process.argv).catch((err: unknown) => {
  const identityErr = toIdentityError(err);
  process.stderr.write(chalk.red(`Error: ${identityErr.message}\n`));
  if (identityErr.details !== undefined) {
    process.stderr.write(chalk.dim(`${JSON.stringify(identityErr.details, null, 2)}\n`));
  }
  process.exit(EXIT_CODES.ERROR);
});
