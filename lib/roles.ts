import type { Document } from "mongodb";
import { wrapServerError } from "./errors";

export type RoleRef = {
  role: string;
  db: string;
};

export type Resource = {
  db: string;
  collection: string;
};

export type Privilege = {
  resource: Resource;
  actions: string[];
};

export type DbUser = {
  name: string;
  password: string;
};

export type RoleDefinition = {
  name: string;
  database: string;
  privileges: Privilege[];
  roles: RoleRef[];
};

/** A role as reported by rolesInfo with showPrivileges. */
export type ServerRole = {
  role: string;
  db: string;
  privileges: Privilege[];
  /** Roles this role inherits from directly. */
  roles: RoleRef[];
};

/** Where the server keeps role documents. */
export const ROLE_STORE_DB = "admin";
export const ROLE_STORE_COLLECTION = "system.roles";

/**
 * The slice of a MongoClient the role commands use. A real MongoClient
 * satisfies it; tests pass an in-process fake. The signal is handed to the
 * driver, which aborts the in-flight command.
 */
export interface RoleAdminClient {
  db(name: string): {
    command(command: Document, options?: { signal?: AbortSignal }): Promise<Document>;
  };
}

export type CommandOptions = {
  signal?: AbortSignal;
  log?: (line: string) => void;
};

export type CreateUserCommand = {
  createUser: string;
  pwd: string;
  roles: RoleRef[];
};

export type CreateRoleCommand = {
  createRole: string;
  privileges: Privilege[];
  roles: RoleRef[];
};

// The server treats a missing roles/privileges field differently from an
// empty one, so both are always sent as arrays.
export function buildCreateUserCommand(user: DbUser, roles: RoleRef[] | undefined): CreateUserCommand {
  if (roles && roles.length > 0) {
    return { createUser: user.name, pwd: user.password, roles: roles.map(copyRoleRef) };
  }
  return { createUser: user.name, pwd: user.password, roles: [] };
}

export function buildCreateRoleCommand(
  role: string,
  inheritedRoles: RoleRef[] | undefined,
  privileges: Privilege[] | undefined
): CreateRoleCommand {
  const roles = inheritedRoles ?? [];
  const privs = privileges ?? [];

  if (roles.length !== 0 && privs.length !== 0) {
    return { createRole: role, privileges: privs.map(copyPrivilege), roles: roles.map(copyRoleRef) };
  } else if (roles.length === 0 && privs.length !== 0) {
    return { createRole: role, privileges: privs.map(copyPrivilege), roles: [] };
  } else if (roles.length !== 0 && privs.length === 0) {
    return { createRole: role, privileges: [], roles: roles.map(copyRoleRef) };
  }
  return { createRole: role, privileges: [], roles: [] };
}

function copyRoleRef(r: RoleRef): RoleRef {
  return { role: r.role, db: r.db };
}

function copyPrivilege(p: Privilege): Privilege {
  return { resource: { db: p.resource.db, collection: p.resource.collection }, actions: [...p.actions] };
}

/** Command document with the password replaced, for logs and --print output. */
export function redactCommand(command: Document): Document {
  if (typeof command.pwd === "string") {
    return { ...command, pwd: "<redacted>" };
  }
  return command;
}

async function runCommand(
  client: RoleAdminClient,
  database: string,
  command: Document,
  prefix: string,
  opts: CommandOptions
): Promise<Document> {
  const { signal } = opts;
  signal?.throwIfAborted();
  opts.log?.(`${database}> ${JSON.stringify(redactCommand(command))}`);
  try {
    return await client.db(database).command(command, { signal });
  } catch (e) {
    // The caller's own abort reason is not a server failure.
    if (signal?.aborted && e === signal.reason) throw e;
    throw wrapServerError(prefix, e);
  }
}

export async function createUser(
  client: RoleAdminClient,
  user: DbUser,
  roles: RoleRef[] | undefined,
  database: string,
  opts: CommandOptions = {}
): Promise<void> {
  await runCommand(client, database, buildCreateUserCommand(user, roles), "Could not create the user", opts);
}

export async function createRole(
  client: RoleAdminClient,
  role: string,
  inheritedRoles: RoleRef[] | undefined,
  privileges: Privilege[] | undefined,
  database: string,
  opts: CommandOptions = {}
): Promise<void> {
  await runCommand(
    client,
    database,
    buildCreateRoleCommand(role, inheritedRoles, privileges),
    "Could not create the role",
    opts
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toRoleRef(value: unknown): RoleRef | undefined {
  if (!isRecord(value)) return undefined;
  return { role: asString(value.role), db: asString(value.db) };
}

function toPrivilege(value: unknown): Privilege | undefined {
  if (!isRecord(value) || !isRecord(value.resource)) return undefined;
  const actions = Array.isArray(value.actions) ? value.actions.filter((a): a is string => typeof a === "string") : [];
  return {
    resource: { db: asString(value.resource.db), collection: asString(value.resource.collection) },
    actions,
  };
}

function compact<T>(items: (T | undefined)[]): T[] {
  return items.filter((x): x is T => x !== undefined);
}

/** Normalize one entry of a rolesInfo reply. */
export function toServerRole(value: unknown): ServerRole | undefined {
  if (!isRecord(value)) return undefined;
  return {
    role: asString(value.role),
    db: asString(value.db),
    privileges: Array.isArray(value.privileges) ? compact(value.privileges.map(toPrivilege)) : [],
    roles: Array.isArray(value.roles) ? compact(value.roles.map(toRoleRef)) : [],
  };
}

/**
 * Look a role up with rolesInfo. An empty list means the server does not
 * know the role; deciding what that means is up to the caller.
 */
export async function getRole(
  client: RoleAdminClient,
  roleName: string,
  database: string,
  opts: CommandOptions = {}
): Promise<ServerRole[]> {
  const reply = await runCommand(
    client,
    database,
    { rolesInfo: { role: roleName, db: database }, showPrivileges: true },
    "Could not read the role",
    opts
  );
  const roles: unknown = reply.roles;
  return Array.isArray(roles) ? compact(roles.map(toServerRole)) : [];
}

/**
 * Remove a role document by its server-side _id ("<db>.<role>").
 * There is no partial update for roles; this is the first half of a replace.
 * Sent as a delete command so the signal reaches the driver.
 */
export async function deleteRoleDocument(
  client: RoleAdminClient,
  identity: string,
  opts: CommandOptions = {}
): Promise<number> {
  const reply = await runCommand(
    client,
    ROLE_STORE_DB,
    { delete: ROLE_STORE_COLLECTION, deletes: [{ q: { _id: identity }, limit: 1 }] },
    "Could not delete the role",
    opts
  );
  return typeof reply.n === "number" ? reply.n : 0;
}
