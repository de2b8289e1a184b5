#!/usr/bin/env node

import { Command } from "commander";
import * as fs from "fs";
import * as yaml from "js-yaml";
import { randomBytes } from "crypto";
import pkg from "../package.json";
import * as config from "../lib/config";
import { buildClient, describeClientPlan } from "../lib/client";
import { resolveConnectionConfig, settingsFromEnv, type ConnectionConfig, type ConnectionSettings } from "../lib/connection";
import { loadRoleDefinition, toRoleDefinitionFile } from "../lib/definition";
import { ConfigurationError, RoleNotFoundError, UpdateIncompleteError } from "../lib/errors";
import { encodeRoleId, parseRoleId } from "../lib/identity";
import {
  createRoleResource,
  deleteRoleResource,
  readRoleResource,
  toRoleDefinition,
  updateRoleResource,
  type CreatedRoleState,
  type ReconcileContext,
} from "../lib/reconcile";
import { buildCreateRoleCommand, buildCreateUserCommand, createUser, redactCommand, type RoleRef } from "../lib/roles";
import { errorMessage } from "../lib/util";

type GlobalOpts = {
  host?: string;
  port?: string;
  username?: string;
  password?: string;
  authDatabase?: string;
  tls?: boolean;
  tlsInsecure?: boolean;
  replicaSet?: string;
  retryWrites?: string;
  caFile?: string;
  certFile?: string;
  keyFile?: string;
  certPath?: string;
  timeoutMs?: string;
  verbose?: boolean;
  output?: string;
};

function readPemFile(field: string, file: string | undefined): string | undefined {
  if (!file) return undefined;
  try {
    return fs.readFileSync(file, "utf8");
  } catch (e) {
    throw new ConfigurationError(field, `Cannot read ${field} file ${file}: ${errorMessage(e)}`);
  }
}

function flagSettings(opts: GlobalOpts): ConnectionSettings {
  const out: ConnectionSettings = {
    host: opts.host,
    port: opts.port,
    username: opts.username,
    password: opts.password,
    authDatabase: opts.authDatabase,
    replicaSet: opts.replicaSet,
    retryWrites: opts.retryWrites,
    certPath: opts.certPath,
    caMaterial: readPemFile("caMaterial", opts.caFile),
    certMaterial: readPemFile("certMaterial", opts.certFile),
    keyMaterial: readPemFile("keyMaterial", opts.keyFile),
  };
  // Boolean flags only count when given; otherwise env/config decide.
  if (opts.tls) out.tls = true;
  if (opts.tlsInsecure) out.tlsInsecure = true;
  return out;
}

function resolveConnection(opts: GlobalOpts): ConnectionConfig {
  return resolveConnectionConfig([
    flagSettings(opts),
    settingsFromEnv(process.env),
    config.configToSettings(config.readConfig()),
  ]);
}

function timeoutSignal(opts: GlobalOpts): AbortSignal | undefined {
  if (!opts.timeoutMs) return undefined;
  const ms = Number(opts.timeoutMs);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new ConfigurationError("timeoutMs", `Invalid --timeout-ms value: ${opts.timeoutMs}`);
  }
  return AbortSignal.timeout(ms);
}

function logger(opts: GlobalOpts): ((line: string) => void) | undefined {
  return opts.verbose ? (line) => console.error(`> ${line}`) : undefined;
}

async function withClient<T>(opts: GlobalOpts, run: (ctx: ReconcileContext) => Promise<T>): Promise<T> {
  const conn = resolveConnection(opts);
  const log = logger(opts);
  const { client, source, connectionString } = await buildClient(conn);
  log?.(`connecting to ${connectionString} (credentials: ${source})`);
  try {
    return await run({ client, signal: timeoutSignal(opts), log });
  } finally {
    try {
      await client.close();
    } catch (e) {
      log?.(`error while closing connection: ${errorMessage(e)}`);
    }
  }
}

function printValue(opts: GlobalOpts, value: unknown): void {
  if (opts.output === "json") {
    console.log(JSON.stringify(value, null, 2));
  } else {
    process.stdout.write(yaml.dump(value, { noRefs: true }));
  }
}

function printRole(opts: GlobalOpts, state: CreatedRoleState): void {
  printValue(opts, { id: state.id, ...toRoleDefinitionFile(state) });
}

function reportError(command: string, error: unknown): void {
  console.error(`Error: ${command}: ${errorMessage(error)}`);

  if (error instanceof ConfigurationError) {
    console.error(`  Field: ${error.field}`);
  }
  if (error instanceof RoleNotFoundError) {
    console.error("  Hint: the role was removed on the server; create it again with `role create`");
  }
  if (error instanceof UpdateIncompleteError) {
    console.error("  Hint: the old role has been dropped; rerun the same update to recreate it");
  }

  const errAny: unknown = error;
  if (errAny && typeof errAny === "object") {
    const code = "code" in errAny ? errAny.code : undefined;
    const codeName = "codeName" in errAny ? errAny.codeName : undefined;
    if ((typeof code === "number" || typeof code === "string") && code !== "") {
      console.error(`  Code: ${String(code)}${typeof codeName === "string" ? ` (${codeName})` : ""}`);
    }
    if (code === 18) {
      console.error("  Hint: authentication failed; check --username/--password and --auth-database");
    }
    if (code === 51002) {
      console.error("  Hint: a role with this name already exists; import its identity with `id encode` instead");
    }
    if (code === 13) {
      console.error("  Hint: the connecting user lacks privileges; it needs createRole/dropRole/viewRole (e.g. userAdminAnyDatabase)");
    }
    if ("name" in errAny && errAny.name === "MongoServerSelectionError") {
      console.error("  Hint: no server reachable; check --host/--port, --tls and network/firewall rules");
    }
    if ("name" in errAny && (errAny.name === "TimeoutError" || errAny.name === "AbortError")) {
      console.error("  Hint: the operation was cancelled; partially applied changes are not rolled back");
    }
  }
  process.exitCode = 1;
}

/** Wrap an action so every failure goes through reportError. */
function action<A extends unknown[]>(name: string, fn: (...args: A) => Promise<void> | void) {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (e) {
      reportError(name, e);
    }
  };
}

function generatePassword(): string {
  // URL-safe and easy to copy/paste; 24 bytes => 32 base64url chars (no padding).
  return randomBytes(24).toString("base64url");
}

function parseRoleRef(value: string, previous: RoleRef[] = []): RoleRef[] {
  const dot = value.indexOf(".");
  if (dot <= 0 || dot === value.length - 1) {
    throw new ConfigurationError("role", `Invalid --role value: ${value} (expected <db>.<role>)`);
  }
  return [...previous, { db: value.slice(0, dot), role: value.slice(dot + 1) }];
}

const program = new Command();

program
  .name("mongo-rolesync")
  .description("Provision MongoDB roles and users from declared definitions")
  .version(pkg.version)
  .option("--host <host>", "MongoDB host (overrides MONGO_ROLESYNC_HOST)")
  .option("-p, --port <port>", "MongoDB port (default 27017)")
  .option("-u, --username <username>", "user to authenticate as")
  .option("--password <password>", "password (otherwise MONGO_ROLESYNC_PASSWORD)")
  .option("--auth-database <db>", "database the credentials belong to (default admin)")
  .option("--tls", "connect with TLS (adds ssl=true)")
  .option("--tls-insecure", "skip server certificate verification")
  .option("--replica-set <name>", "replica set name")
  .option("--retry-writes <bool>", "set retryWrites explicitly (true|false)")
  .option("--ca-file <file>", "PEM file with CA certificate(s)")
  .option("--cert-file <file>", "PEM client certificate (requires --key-file)")
  .option("--key-file <file>", "PEM client key (requires --cert-file)")
  .option("--cert-path <dir>", "directory with ca.pem, cert.pem and key.pem (exclusive with --cert-file/--key-file)")
  .option("--timeout-ms <ms>", "abort the operation after this many milliseconds")
  .option("-o, --output <format>", "output format: yaml or json", "yaml")
  .option("--verbose", "print each command sent to the server", false);

const role = program.command("role").description("manage a role declared in a YAML/JSON file");

role
  .command("create <file>")
  .description("create the role and print its identity")
  .action(
    action("role create", async (file: string, _opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOpts>();
      const state = loadRoleDefinition(file);
      const created = await withClient(opts, (ctx) => createRoleResource(ctx, state));
      printRole(opts, created);
    })
  );

role
  .command("read <id>")
  .description("read the role behind an identity")
  .action(
    action("role read", async (id: string, _opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOpts>();
      parseRoleId(id);
      const state = await withClient(opts, (ctx) => readRoleResource(ctx, id));
      printRole(opts, state);
    })
  );

role
  .command("update <id> <file>")
  .description("replace the role (drop, then create) with the definition in <file>")
  .addHelpText(
    "after",
    [
      "",
      "MongoDB has no partial update for roles. The existing role is dropped and",
      "recreated; between the two commands the role does not exist. If the create",
      "fails, rerun the same update.",
    ].join("\n")
  )
  .action(
    action("role update", async (id: string, file: string, _opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOpts>();
      parseRoleId(id);
      const state = loadRoleDefinition(file);
      const updated = await withClient(opts, (ctx) => updateRoleResource(ctx, id, state));
      if (updated.id !== id) {
        console.error(`Note: identity changed from ${id} to ${updated.id}`);
      }
      printRole(opts, updated);
    })
  );

role
  .command("delete <id>")
  .description("delete the role behind an identity")
  .action(
    action("role delete", async (id: string, _opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOpts>();
      const { roleName, database } = parseRoleId(id);
      const res = await withClient(opts, (ctx) => deleteRoleResource(ctx, id));
      console.log(res.deleted ? `✓ deleted role ${database}.${roleName}` : `✓ role ${database}.${roleName} was already absent`);
    })
  );

role
  .command("plan <file>")
  .description("print the createRole command for <file> without connecting")
  .action(
    action("role plan", async (file: string, _opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOpts>();
      const definition = toRoleDefinition(loadRoleDefinition(file));
      printValue(opts, {
        id: encodeRoleId(definition.database, definition.name),
        database: definition.database,
        command: buildCreateRoleCommand(definition.name, definition.roles, definition.privileges),
      });
    })
  );

const user = program.command("user").description("manage database users");

user
  .command("create <name>")
  .description("create a user with the given roles")
  .option("-d, --database <db>", "database to create the user in", "admin")
  .option("--role <db.role>", "role to grant (repeatable)", parseRoleRef, [])
  .option("--user-password <password>", "password for the new user (otherwise MONGO_ROLESYNC_USER_PASSWORD, else generated)")
  .option("--print-password", "print a generated password even when stdout is not a TTY", false)
  .option("--print-command", "print the createUser command (password redacted) and exit", false)
  .action(
    action(
      "user create",
      async (
        name: string,
        cmdOpts: { database: string; role: RoleRef[]; userPassword?: string; printPassword?: boolean; printCommand?: boolean },
        cmd: Command
      ) => {
        const opts = cmd.optsWithGlobals<GlobalOpts>();
        const fromFlag = (cmdOpts.userPassword || process.env.MONGO_ROLESYNC_USER_PASSWORD || "").trim();
        const password = fromFlag || generatePassword();
        const generated = !fromFlag;

        if (cmdOpts.printCommand) {
          printValue(opts, { database: cmdOpts.database, command: redactCommand(buildCreateUserCommand({ name, password }, cmdOpts.role)) });
          return;
        }
        if (generated && !process.stdout.isTTY && !cmdOpts.printPassword) {
          throw new ConfigurationError(
            "userPassword",
            [
              "A password would be generated but cannot be shown in non-interactive mode.",
              "Provide it explicitly with --user-password or MONGO_ROLESYNC_USER_PASSWORD,",
              "or (NOT recommended) print the generated password with --print-password.",
            ].join("\n")
          );
        }

        await withClient(opts, (ctx) =>
          createUser(ctx.client, { name, password }, cmdOpts.role, cmdOpts.database, { signal: ctx.signal, log: ctx.log })
        );
        console.log(`✓ created user ${name} in ${cmdOpts.database}`);
        if (generated) {
          // Secrets go to stderr so they stay out of piped stdout.
          const shellSafe = password.replace(/'/g, "'\\''");
          console.error(`Generated password for ${name} (copy/paste):`);
          console.error(`MONGO_ROLESYNC_USER_PASSWORD='${shellSafe}'`);
        }
      }
    )
  );

const id = program.command("id").description("encode or decode role identities");

id
  .command("encode <database> <role>")
  .description("print the identity for <database>.<role>")
  .action(
    action("id encode", (database: string, roleName: string) => {
      console.log(encodeRoleId(database, roleName));
    })
  );

id
  .command("decode <id>")
  .description("print the database and role name behind an identity")
  .action(
    action("id decode", (value: string, _opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOpts>();
      printValue(opts, parseRoleId(value));
    })
  );

program
  .command("connection")
  .description("show how the connection would be made (no network access)")
  .action(
    action("connection", async (_opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOpts>();
      printValue(opts, await describeClientPlan(resolveConnection(opts)));
    })
  );

const cfg = program.command("config").description("user-level connection defaults");

cfg
  .command("show")
  .description("print the stored defaults")
  .action(
    action("config show", (_opts: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOpts>();
      printValue(opts, { path: config.getConfigPath(), ...config.readConfig() });
    })
  );

cfg
  .command("set <key> <value>")
  .description(`store a default (${config.CONFIG_KEYS.join(", ")})`)
  .action(
    action("config set", (key: string, value: string) => {
      if (!config.isConfigKey(key)) {
        throw new ConfigurationError(key, `Unknown config key: ${key} (expected one of ${config.CONFIG_KEYS.join(", ")})`);
      }
      const update: Partial<Record<config.ConfigKey, string | number | boolean>> = {};
      update[key] = config.parseConfigValue(key, value);
      config.writeConfig(update);
      console.log(`✓ ${key} saved to ${config.getConfigPath()}`);
    })
  );

cfg
  .command("unset <key>")
  .description("remove a stored default")
  .action(
    action("config unset", (key: string) => {
      if (!config.isConfigKey(key)) {
        throw new ConfigurationError(key, `Unknown config key: ${key}`);
      }
      config.deleteConfigKeys([key]);
      console.log(`✓ ${key} removed`);
    })
  );

program.parseAsync(process.argv).catch((e: unknown) => {
  reportError(program.name(), e);
});
