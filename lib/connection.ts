import { ConfigurationError } from "./errors";
import { resolveTlsSource, type RawTlsOptions, type TlsSource } from "./tls";
import { parseBool } from "./util";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 27017;
export const DEFAULT_AUTH_DATABASE = "admin";

export type ConnectionConfig = {
  host: string;
  port: number;
  /** Database the credentials authenticate against (authSource). */
  authDatabase: string;
  username?: string;
  password?: string;
  tls: boolean;
  /** Skip server certificate verification. */
  tlsInsecure: boolean;
  replicaSet?: string;
  /** Unset means "let the server/driver decide"; only explicit values reach the URI. */
  retryWrites?: boolean;
  tlsSource: TlsSource;
};

/**
 * One layer of user-supplied connection settings. Flags, environment and the
 * config file each produce one; values may still be strings at this point.
 */
export type ConnectionSettings = RawTlsOptions & {
  host?: string;
  port?: string | number;
  username?: string;
  password?: string;
  authDatabase?: string;
  replicaSet?: string;
  tls?: boolean | string;
  tlsInsecure?: boolean | string;
  retryWrites?: boolean | string;
};

export const ENV_PREFIX = "MONGO_ROLESYNC_";

const ENV_KEYS: Record<keyof ConnectionSettings, string> = {
  host: "HOST",
  port: "PORT",
  username: "USERNAME",
  password: "PASSWORD",
  authDatabase: "AUTH_DATABASE",
  replicaSet: "REPLICA_SET",
  tls: "TLS",
  tlsInsecure: "TLS_INSECURE",
  retryWrites: "RETRY_WRITES",
  caMaterial: "CA_MATERIAL",
  certMaterial: "CERT_MATERIAL",
  keyMaterial: "KEY_MATERIAL",
  certPath: "CERT_PATH",
};

export function settingsFromEnv(env: NodeJS.ProcessEnv): ConnectionSettings {
  const out: ConnectionSettings = {};
  for (const [field, suffix] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value !== undefined && value !== "") {
      Object.assign(out, { [field]: value });
    }
  }
  return out;
}

function pick<K extends keyof ConnectionSettings>(layers: ConnectionSettings[], key: K): ConnectionSettings[K] {
  for (const layer of layers) {
    const v = layer[key];
    if (v !== undefined && v !== "") return v;
  }
  return undefined;
}

function toBool(field: string, value: boolean | string | undefined): boolean | undefined {
  if (value === undefined || typeof value === "boolean") return value;
  const b = parseBool(value);
  if (b === undefined) {
    throw new ConfigurationError(field, `Invalid ${field} value: ${value} (expected true or false)`);
  }
  return b;
}

export function parsePort(value: string | number): number {
  const p = Number(value);
  if (!Number.isFinite(p) || !Number.isInteger(p) || p <= 0 || p > 65535) {
    throw new ConfigurationError("port", `Invalid port value: ${String(value)}`);
  }
  return p;
}

/**
 * Merge settings layers (earlier layers win) into a validated ConnectionConfig.
 * Typical order: command-line flags, environment, config file.
 */
export function resolveConnectionConfig(layers: ConnectionSettings[]): ConnectionConfig {
  const port = pick(layers, "port");
  const tlsSource = resolveTlsSource({
    caMaterial: pick(layers, "caMaterial"),
    certMaterial: pick(layers, "certMaterial"),
    keyMaterial: pick(layers, "keyMaterial"),
    certPath: pick(layers, "certPath"),
  });

  const config: ConnectionConfig = {
    host: (pick(layers, "host") || DEFAULT_HOST).trim(),
    port: port === undefined ? DEFAULT_PORT : parsePort(port),
    authDatabase: pick(layers, "authDatabase") || DEFAULT_AUTH_DATABASE,
    tls: toBool("tls", pick(layers, "tls")) ?? false,
    tlsInsecure: toBool("tlsInsecure", pick(layers, "tlsInsecure")) ?? false,
    tlsSource,
  };
  const username = pick(layers, "username");
  if (username) config.username = username;
  const password = pick(layers, "password");
  if (password) config.password = password;
  const replicaSet = pick(layers, "replicaSet");
  if (replicaSet) config.replicaSet = replicaSet;
  const retryWrites = toBool("retryWrites", pick(layers, "retryWrites"));
  if (retryWrites !== undefined) config.retryWrites = retryWrites;
  return config;
}

function addArg(args: string, next: string): string {
  return args ? `${args}&${next}` : `/?${next}`;
}

/**
 * mongodb://host:port plus the options derived from scalar settings.
 * Credentials are passed to the driver separately and never appear here.
 */
export function buildConnectionString(config: Pick<ConnectionConfig, "host" | "port" | "tls" | "replicaSet" | "retryWrites">): string {
  let args = "";
  if (config.retryWrites !== undefined) {
    args = addArg(args, `retrywrites=${String(config.retryWrites)}`);
  }
  if (config.tls) {
    args = addArg(args, "ssl=true");
  }
  if (config.replicaSet) {
    args = addArg(args, `replicaSet=${encodeURIComponent(config.replicaSet)}`);
  }
  return `mongodb://${config.host}:${config.port}${args}`;
}
