/**
 * Configuration problems: conflicting or incomplete credential sources,
 * unparseable PEM material, bad flag values. Never retried.
 */
export class ConfigurationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ConfigurationError";
    this.field = field;
  }
}

/** A persisted role identity that cannot be decoded. */
export class IdentityFormatError extends ConfigurationError {
  readonly id: string;

  constructor(id: string, message: string) {
    super("id", message);
    this.name = "IdentityFormatError";
    this.id = id;
  }
}

export class RoleNotFoundError extends Error {
  readonly roleName: string;
  readonly database: string;

  constructor(roleName: string, database: string) {
    super(`role does not exist: ${database}.${roleName}`);
    this.name = "RoleNotFoundError";
    this.roleName = roleName;
    this.database = database;
  }
}

export class ServerCommandError extends Error {
  code?: number | string;
  codeName?: string;

  constructor(message: string, options: { cause: unknown }) {
    super(message, options);
    this.name = "ServerCommandError";
  }
}

/**
 * An update dropped the existing role but could not create its replacement.
 * The role is absent on the server until the update is rerun.
 */
export class UpdateIncompleteError extends Error {
  code?: number | string;
  codeName?: string;

  constructor(roleId: string, options: { cause: unknown }) {
    super(`update dropped role ${roleId} but could not recreate it: ${errorText(options.cause)}`, options);
    this.name = "UpdateIncompleteError";
    const cause = options.cause;
    if (cause instanceof ServerCommandError) {
      this.code = cause.code;
      this.codeName = cause.codeName;
    }
  }
}

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Wrap a driver/server failure with a short prefix. The original message is
 * kept verbatim; the driver's code/codeName are copied so callers can print hints.
 */
export function wrapServerError(prefix: string, e: unknown): Error {
  // Cancellation and our own errors pass through untouched.
  // (DOMException is an Error on Node 20.)
  if (e instanceof ConfigurationError || e instanceof RoleNotFoundError || e instanceof ServerCommandError) {
    return e;
  }
  if (isRecord(e) && (e.name === "AbortError" || e.name === "TimeoutError")) {
    return e instanceof Error ? e : new Error(String(e.message));
  }
  const wrapped = new ServerCommandError(`${prefix}: ${errorText(e)}`, { cause: e });
  if (isRecord(e)) {
    if (typeof e.code === "number" || typeof e.code === "string") wrapped.code = e.code;
    if (typeof e.codeName === "string") wrapped.codeName = e.codeName;
  }
  return wrapped;
}
