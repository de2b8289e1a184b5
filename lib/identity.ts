import { ConfigurationError, IdentityFormatError } from "./errors";

export type RoleId = {
  roleName: string;
  database: string;
};

const HEX_RE = /^(?:[0-9a-fA-F]{2})+$/;

/** The server-side _id of a role document: "<database>.<role>". */
export function roleDocumentId(database: string, roleName: string): string {
  return `${database}.${roleName}`;
}

/**
 * Opaque, URL-safe identity for a role: hex of "<database>.<role>".
 * Argument order is (database, role); parseRoleId returns named fields.
 */
export function encodeRoleId(database: string, roleName: string): string {
  if (!database) {
    throw new ConfigurationError("database", "database and role name must both be non-empty");
  }
  if (!roleName) {
    throw new ConfigurationError("name", "database and role name must both be non-empty");
  }
  // The first dot is the separator, so it cannot appear in the database name.
  if (database.includes(".")) {
    throw new ConfigurationError("database", `database name must not contain ".": ${database}`);
  }
  return Buffer.from(roleDocumentId(database, roleName), "utf8").toString("hex");
}

/** Decode a role identity back to the raw "<database>.<role>" string. */
export function decodeRoleDocumentId(id: string): string {
  if (!HEX_RE.test(id)) {
    throw new IdentityFormatError(id, `unexpected format of ID (${id}): not a hex string`);
  }
  const raw = Buffer.from(id, "hex").toString("utf8");
  if (Buffer.from(raw, "utf8").toString("hex") !== id.toLowerCase()) {
    throw new IdentityFormatError(id, `unexpected format of ID (${id}): not valid UTF-8`);
  }
  return raw;
}

export function parseRoleId(id: string): RoleId {
  const raw = decodeRoleDocumentId(id);
  const dot = raw.indexOf(".");
  const database = dot >= 0 ? raw.slice(0, dot) : "";
  const roleName = dot >= 0 ? raw.slice(dot + 1) : "";
  if (!database || !roleName) {
    throw new IdentityFormatError(id, `unexpected format of ID (${id}), expected database.roleName`);
  }
  return { roleName, database };
}
