import Ajv2020 from "ajv/dist/2020";
import * as fs from "fs";
import * as yaml from "js-yaml";
import roleDefinitionSchema from "../schemas/role-definition.schema.json";
import { ConfigurationError } from "./errors";
import { DEFAULT_ROLE_DATABASE, type RoleResourceState } from "./reconcile";

/** On-disk shape of a role definition (YAML or JSON), after defaults are applied. */
export interface RoleDefinitionFile {
  name: string;
  database: string;
  privilege: Array<{ db: string; collection: string; actions: string[] }>;
  inherited_role: Array<{ db: string; role: string }>;
}

const ajv = new Ajv2020({ allErrors: true, strict: false, useDefaults: true });
const validateRoleDefinition = ajv.compile<RoleDefinitionFile>(roleDefinitionSchema);

/**
 * Validate an already-parsed document and map it to declared role state.
 * Missing optional fields get their defaults (database "admin", empty lists).
 */
export function parseRoleDefinition(doc: unknown, source = "role definition"): RoleResourceState {
  // useDefaults mutates its input.
  const copy: unknown = doc && typeof doc === "object" ? structuredClone(doc) : doc;
  if (!validateRoleDefinition(copy)) {
    const errors = (validateRoleDefinition.errors ?? [])
      .map((e) => `${e.instancePath || "/"}: ${e.message ?? "invalid"}`)
      .join(", ");
    throw new ConfigurationError("definition", `${source} is invalid: ${errors}`);
  }
  return {
    database: copy.database || DEFAULT_ROLE_DATABASE,
    name: copy.name,
    privileges: copy.privilege.map((p) => ({ db: p.db, collection: p.collection, actions: [...p.actions] })),
    inheritedRoles: copy.inherited_role.map((r) => ({ db: r.db, role: r.role })),
  };
}

export function loadRoleDefinition(file: string): RoleResourceState {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError("definition", `Cannot read role definition ${file}: ${message}`);
  }
  let doc: unknown;
  try {
    // YAML is a superset of JSON, so .json files load the same way.
    doc = yaml.load(text, { filename: file });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError("definition", `Cannot parse role definition ${file}: ${message}`);
  }
  return parseRoleDefinition(doc, file);
}

/** Back to the on-disk shape, e.g. to print what the server reported. */
export function toRoleDefinitionFile(state: RoleResourceState): RoleDefinitionFile {
  return {
    name: state.name,
    database: state.database,
    privilege: state.privileges.map((p) => ({ db: p.db, collection: p.collection, actions: [...p.actions] })),
    inherited_role: state.inheritedRoles.map((r) => ({ db: r.db, role: r.role })),
  };
}
