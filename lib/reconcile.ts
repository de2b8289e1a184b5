import { RoleNotFoundError, UpdateIncompleteError } from "./errors";
import { encodeRoleId, parseRoleId, roleDocumentId } from "./identity";
import {
  createRole,
  deleteRoleDocument,
  getRole,
  type CommandOptions,
  type RoleAdminClient,
  type RoleDefinition,
  type ServerRole,
} from "./roles";

export const DEFAULT_ROLE_DATABASE = "admin";

export type DeclaredPrivilege = {
  db: string;
  collection: string;
  actions: string[];
};

export type DeclaredInheritedRole = {
  db: string;
  role: string;
};

/** A role as the caller declares it, and as read back from the server. */
export type RoleResourceState = {
  /** Durable identity; absent until the role has been created. */
  id?: string;
  database: string;
  name: string;
  privileges: DeclaredPrivilege[];
  inheritedRoles: DeclaredInheritedRole[];
};

export type CreatedRoleState = RoleResourceState & { id: string };

export type ReconcileContext = {
  client: RoleAdminClient;
  signal?: AbortSignal;
  /** Receives one line per command issued. */
  log?: (line: string) => void;
};

function commandOptions(ctx: ReconcileContext): CommandOptions {
  return { signal: ctx.signal, log: ctx.log };
}

export function toRoleDefinition(state: RoleResourceState): RoleDefinition {
  const database = state.database || DEFAULT_ROLE_DATABASE;
  return {
    name: state.name,
    database,
    privileges: state.privileges.map((p) => ({
      resource: { db: p.db, collection: p.collection },
      actions: [...p.actions],
    })),
    // An inherited role without a db refers to a role in the same database.
    roles: state.inheritedRoles.map((r) => ({ role: r.role, db: r.db || database })),
  };
}

export function fromServerRole(id: string, server: ServerRole, roleName: string, database: string): CreatedRoleState {
  return {
    id,
    database,
    name: roleName,
    privileges: server.privileges.map((p) => ({
      db: p.resource.db,
      collection: p.resource.collection,
      actions: [...p.actions],
    })),
    inheritedRoles: server.roles.map((r) => ({ db: r.db, role: r.role })),
  };
}

/**
 * Read the role behind an identity. A role the server no longer knows is an
 * error here; it is never recreated on read.
 */
export async function readRoleResource(ctx: ReconcileContext, id: string): Promise<CreatedRoleState> {
  const { roleName, database } = parseRoleId(id);
  const [found] = await getRole(ctx.client, roleName, database, commandOptions(ctx));
  if (!found) {
    throw new RoleNotFoundError(roleName, database);
  }
  return fromServerRole(id, found, roleName, database);
}

async function createAndIdentify(ctx: ReconcileContext, definition: RoleDefinition): Promise<string> {
  await createRole(
    ctx.client,
    definition.name,
    definition.roles,
    definition.privileges,
    definition.database,
    commandOptions(ctx)
  );
  return encodeRoleId(definition.database, definition.name);
}

/** createRole, then read back so the returned state reflects what the server stored. */
export async function createRoleResource(ctx: ReconcileContext, state: RoleResourceState): Promise<CreatedRoleState> {
  const definition = toRoleDefinition(state);
  // Reject names the identity cannot represent before touching the server.
  encodeRoleId(definition.database, definition.name);
  const id = await createAndIdentify(ctx, definition);
  return readRoleResource(ctx, id);
}

export type DropResult = {
  id: string;
  roleName: string;
  database: string;
  deletedCount: number;
};

/** First phase of an update: remove the role document behind an identity. */
export async function dropRoleForReplace(ctx: ReconcileContext, id: string): Promise<DropResult> {
  const { roleName, database } = parseRoleId(id);
  const deletedCount = await deleteRoleDocument(ctx.client, roleDocumentId(database, roleName), commandOptions(ctx));
  return { id, roleName, database, deletedCount };
}

/**
 * Roles have no partial update: drop the existing role, then create the new
 * definition. The pair is not atomic. If the create fails the role stays
 * absent (UpdateIncompleteError) and the whole update must be rerun; callers
 * must not reconcile the same identity concurrently.
 */
export async function updateRoleResource(
  ctx: ReconcileContext,
  id: string,
  state: RoleResourceState
): Promise<CreatedRoleState> {
  const definition = toRoleDefinition(state);
  // Both identities are validated before the drop.
  parseRoleId(id);
  encodeRoleId(definition.database, definition.name);

  await dropRoleForReplace(ctx, id);
  let newId: string;
  try {
    newId = await createAndIdentify(ctx, definition);
  } catch (e) {
    throw new UpdateIncompleteError(id, { cause: e });
  }
  return readRoleResource(ctx, newId);
}

export type DeleteResult = {
  id: string;
  /** False when there was no document to remove. */
  deleted: boolean;
};

export async function deleteRoleResource(ctx: ReconcileContext, id: string): Promise<DeleteResult> {
  const dropped = await dropRoleForReplace(ctx, id);
  try {
    await readRoleResource(ctx, id);
  } catch (e) {
    if (e instanceof RoleNotFoundError) {
      return { id, deleted: dropped.deletedCount > 0 };
    }
    throw e;
  }
  throw new Error(`role still exists after delete: ${roleDocumentId(dropped.database, dropped.roleName)}`);
}
