import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { parsePort, type ConnectionSettings } from "./connection";
import { ConfigurationError } from "./errors";
import { parseBool } from "./util";

/**
 * Connection defaults kept in the user-level config file.
 * Passwords and inline key material are never stored here.
 */
export interface Config {
  host: string | null;
  port: number | null;
  username: string | null;
  authDatabase: string | null;
  replicaSet: string | null;
  tls: boolean | null;
  tlsInsecure: boolean | null;
  /** Directory holding ca.pem / cert.pem / key.pem */
  certPath: string | null;
  retryWrites: boolean | null;
}

export const CONFIG_KEYS = [
  "host",
  "port",
  "username",
  "authDatabase",
  "replicaSet",
  "tls",
  "tlsInsecure",
  "certPath",
  "retryWrites",
] as const satisfies readonly (keyof Config)[];

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Get the user-level config directory path
 * @returns Path to ~/.config/mongo-rolesync
 */
export function getConfigDir(): string {
  const configHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(configHome, "mongo-rolesync");
}

/**
 * Get the user-level config file path
 * @returns Path to ~/.config/mongo-rolesync/config.json
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.json");
}

function emptyConfig(): Config {
  return {
    host: null,
    port: null,
    username: null,
    authDatabase: null,
    replicaSet: null,
    tls: null,
    tlsInsecure: null,
    certPath: null,
    retryWrites: null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOrNull(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

function boolOrNull(v: unknown): boolean | null {
  return typeof v === "boolean" ? v : null;
}

/**
 * Read configuration from the user-level config file.
 * A missing or unreadable file yields all-null defaults (with a warning for the latter).
 */
export function readConfig(): Config {
  const config = emptyConfig();

  const userConfigPath = getConfigPath();
  if (!fs.existsSync(userConfigPath)) return config;

  try {
    const content = fs.readFileSync(userConfigPath, "utf8");
    const p: unknown = JSON.parse(content);
    if (!isRecord(p)) return config;
    config.host = stringOrNull(p.host);
    config.port = typeof p.port === "number" ? p.port : null;
    config.username = stringOrNull(p.username);
    config.authDatabase = stringOrNull(p.authDatabase);
    config.replicaSet = stringOrNull(p.replicaSet);
    config.tls = boolOrNull(p.tls);
    config.tlsInsecure = boolOrNull(p.tlsInsecure);
    config.certPath = stringOrNull(p.certPath);
    config.retryWrites = boolOrNull(p.retryWrites);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Warning: Failed to read config from ${userConfigPath}: ${message}`);
  }

  return config;
}

/**
 * Write configuration to user-level config file
 * @param config - keys to set; merged over what is already stored
 */
export function writeConfig(config: Partial<Record<ConfigKey, string | number | boolean | null>>): void {
  const configDir = getConfigDir();
  const configPath = getConfigPath();

  // Ensure config directory exists
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }

  // Read existing config and merge
  let existingConfig: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    try {
      const content = fs.readFileSync(configPath, "utf8");
      existingConfig = JSON.parse(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Warning: Overwriting unreadable config ${configPath}: ${message}`);
    }
  }

  const mergedConfig = {
    ...existingConfig,
    ...config,
  };

  // Write config file with restricted permissions
  fs.writeFileSync(configPath, JSON.stringify(mergedConfig, null, 2) + "\n", {
    mode: 0o600,
  });
}

/**
 * Delete specific keys from configuration
 * @param keys - Array of keys to delete (e.g., ['certPath'])
 */
export function deleteConfigKeys(keys: string[]): void {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return;
  }

  try {
    const content = fs.readFileSync(configPath, "utf8");
    const config: Record<string, unknown> = JSON.parse(content);

    for (const key of keys) {
      delete config[key];
    }

    fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n", {
      mode: 0o600,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Warning: Failed to update config: ${message}`);
  }
}

/** The config file as the lowest-precedence settings layer. */
export function configToSettings(config: Config): ConnectionSettings {
  const out: ConnectionSettings = {};
  if (config.host !== null) out.host = config.host;
  if (config.port !== null) out.port = config.port;
  if (config.username !== null) out.username = config.username;
  if (config.authDatabase !== null) out.authDatabase = config.authDatabase;
  if (config.replicaSet !== null) out.replicaSet = config.replicaSet;
  if (config.tls !== null) out.tls = config.tls;
  if (config.tlsInsecure !== null) out.tlsInsecure = config.tlsInsecure;
  if (config.certPath !== null) out.certPath = config.certPath;
  if (config.retryWrites !== null) out.retryWrites = config.retryWrites;
  return out;
}

/** Parse a `config set` value for its key. */
export function parseConfigValue(key: ConfigKey, value: string): string | number | boolean {
  switch (key) {
    case "port":
      return parsePort(value);
    case "tls":
    case "tlsInsecure":
    case "retryWrites": {
      const b = parseBool(value);
      if (b === undefined) {
        throw new ConfigurationError(key, `Invalid ${key} value: ${value} (expected true or false)`);
      }
      return b;
    }
    default:
      return value;
  }
}
