import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configToSettings,
  deleteConfigKeys,
  getConfigPath,
  isConfigKey,
  parseConfigValue,
  readConfig,
  writeConfig,
} from "../lib/config";

describe("user config file", () => {
  let tmp: string;
  let savedXdg: string | undefined;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "mongo-rolesync-config-"));
    savedXdg = process.env.XDG_CONFIG_HOME;
    process.env.XDG_CONFIG_HOME = tmp;
  });

  afterEach(() => {
    if (savedXdg === undefined) delete process.env.XDG_CONFIG_HOME;
    else process.env.XDG_CONFIG_HOME = savedXdg;
    fs.rmSync(tmp, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  test("lives under XDG_CONFIG_HOME", () => {
    expect(getConfigPath()).toBe(path.join(tmp, "mongo-rolesync", "config.json"));
  });

  test("a missing file reads as all nulls", () => {
    expect(readConfig()).toEqual({
      host: null,
      port: null,
      username: null,
      authDatabase: null,
      replicaSet: null,
      tls: null,
      tlsInsecure: null,
      certPath: null,
      retryWrites: null,
    });
  });

  test("write merges over existing keys and restricts permissions", () => {
    writeConfig({ host: "db.internal", port: 27018 });
    writeConfig({ tls: true });

    const cfg = readConfig();
    expect(cfg.host).toBe("db.internal");
    expect(cfg.port).toBe(27018);
    expect(cfg.tls).toBe(true);
    expect(fs.statSync(getConfigPath()).mode & 0o777).toBe(0o600);
    expect(fs.statSync(path.dirname(getConfigPath())).mode & 0o777).toBe(0o700);
  });

  test("values of the wrong type are ignored", () => {
    fs.mkdirSync(path.dirname(getConfigPath()), { recursive: true });
    fs.writeFileSync(getConfigPath(), JSON.stringify({ host: 42, port: "27017", tls: "yes", certPath: "/certs" }));
    const cfg = readConfig();
    expect(cfg.host).toBeNull();
    expect(cfg.port).toBeNull();
    expect(cfg.tls).toBeNull();
    expect(cfg.certPath).toBe("/certs");
  });

  test("unreadable JSON warns and falls back to defaults", () => {
    const warn = vi.spyOn(console, "error").mockImplementation(() => {});
    fs.mkdirSync(path.dirname(getConfigPath()), { recursive: true });
    fs.writeFileSync(getConfigPath(), "{not json");
    expect(readConfig().host).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain(`Warning: Failed to read config from ${getConfigPath()}`);
  });

  test("deleteConfigKeys removes only the named keys", () => {
    writeConfig({ host: "db.internal", certPath: "/certs" });
    deleteConfigKeys(["certPath"]);
    const cfg = readConfig();
    expect(cfg.host).toBe("db.internal");
    expect(cfg.certPath).toBeNull();
  });

  test("deleteConfigKeys without a file does nothing", () => {
    deleteConfigKeys(["host"]);
    expect(fs.existsSync(getConfigPath())).toBe(false);
  });
});

describe("config helpers", () => {
  test("isConfigKey", () => {
    expect(isConfigKey("certPath")).toBe(true);
    expect(isConfigKey("password")).toBe(false);
  });

  test("parseConfigValue converts by key", () => {
    expect(parseConfigValue("port", "27018")).toBe(27018);
    expect(parseConfigValue("tlsInsecure", "yes")).toBe(true);
    expect(parseConfigValue("host", "db.internal")).toBe("db.internal");
    expect(() => parseConfigValue("tls", "maybe")).toThrow("Invalid tls value: maybe (expected true or false)");
    expect(() => parseConfigValue("port", "http")).toThrow("Invalid port value: http");
  });

  test("configToSettings keeps only set values", () => {
    expect(
      configToSettings({
        host: "db.internal",
        port: null,
        username: null,
        authDatabase: null,
        replicaSet: "rs0",
        tls: false,
        tlsInsecure: null,
        certPath: null,
        retryWrites: null,
      })
    ).toEqual({ host: "db.internal", replicaSet: "rs0", tls: false });
  });
});
