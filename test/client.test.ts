import { describe, test, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import type { MongoClientOptions } from "mongodb";
import { buildClient, clientOptions, describeClientPlan, type ClientFactoryDeps } from "../lib/client";
import { resolveConnectionConfig, type ConnectionConfig, type ConnectionSettings } from "../lib/connection";
import { ConfigurationError } from "../lib/errors";
import { TLS_FIXTURES_DIR } from "./test-utils";

const readFixture = (name: string) => fs.readFileSync(path.join(TLS_FIXTURES_DIR, name), "utf8");
const CA = readFixture("ca.pem");
const CERT = readFixture("cert.pem");
const KEY = readFixture("key.pem");

type Built = { uri: string; options: MongoClientOptions };

function recordingDeps(files: Record<string, string> = {}) {
  const built: Built[] = [];
  const warnings: string[] = [];
  const reads: string[] = [];
  const deps: ClientFactoryDeps<Built> = {
    createClient: (uri, options) => {
      const b = { uri, options };
      built.push(b);
      return b;
    },
    readFile: async (file) => {
      reads.push(file);
      const content = files[path.basename(file)];
      if (content === undefined) {
        throw Object.assign(new Error(`ENOENT: ${file}`), { code: "ENOENT" });
      }
      return content;
    },
    warn: (m) => warnings.push(m),
  };
  return { deps, built, warnings, reads };
}

function config(settings: ConnectionSettings): ConnectionConfig {
  return resolveConnectionConfig([{ host: "db.internal", username: "admin-user", password: "test-secret", ...settings }]);
}

describe("buildClient branch selection", () => {
  test("inline cert and key", async () => {
    const { deps, built, reads } = recordingDeps();
    const res = await buildClient(config({ caMaterial: CA, certMaterial: CERT, keyMaterial: KEY }), deps);

    expect(res.source).toBe("inline");
    expect(reads).toEqual([]);
    expect(built).toHaveLength(1);
    expect(built[0].options).toEqual({
      authSource: "admin",
      auth: { username: "admin-user", password: "test-secret" },
      tls: true,
      ca: [CA.trim()],
      cert: CERT,
      key: KEY,
    });
  });

  test("cert directory", async () => {
    const { deps, built, reads } = recordingDeps({ "ca.pem": CA, "cert.pem": CERT, "key.pem": KEY });
    const res = await buildClient(config({ certPath: "/etc/mongo-certs" }), deps);

    expect(res.source).toBe("directory");
    expect(reads.sort()).toEqual(["ca.pem", "cert.pem", "key.pem"].map((f) => path.join("/etc/mongo-certs", f)));
    expect(built[0].options.tls).toBe(true);
    expect(built[0].options.cert).toBe(CERT);
    expect(built[0].options.tlsInsecure).toBeUndefined();
  });

  test("CA only", async () => {
    const { deps, built } = recordingDeps();
    const res = await buildClient(config({ caMaterial: CA }), deps);

    expect(res.source).toBe("ca-only");
    expect(res.tlsPolicy).toEqual({ ca: [CA.trim()], insecure: false });
    expect(built[0].options).toEqual({
      authSource: "admin",
      auth: { username: "admin-user", password: "test-secret" },
      tls: true,
      ca: [CA.trim()],
    });
  });

  test("neither: no TLS policy at all", async () => {
    const { deps, built } = recordingDeps();
    const res = await buildClient(config({ replicaSet: "rs0", retryWrites: false }), deps);

    expect(res.source).toBe("none");
    expect(res.tlsPolicy).toBeUndefined();
    expect(built[0].uri).toBe("mongodb://db.internal:27017/?retrywrites=false&replicaSet=rs0");
    expect(built[0].options).toEqual({
      authSource: "admin",
      auth: { username: "admin-user", password: "test-secret" },
    });
  });

  test("inline material plus a directory fails before any client is built", async () => {
    const { deps, built, reads } = recordingDeps();
    await expect(
      (async () => buildClient(config({ certMaterial: CERT, keyMaterial: KEY, certPath: "/etc/mongo-certs" }), deps))()
    ).rejects.toThrow(ConfigurationError);
    expect(built).toHaveLength(0);
    expect(reads).toHaveLength(0);
  });

  test("malformed CA fails before any client is built", async () => {
    const { deps, built } = recordingDeps();
    await expect(buildClient(config({ caMaterial: "not a certificate" }), deps)).rejects.toThrow(
      /could not parse any CA certificate/
    );
    expect(built).toHaveLength(0);
  });
});

describe("buildClient TLS details", () => {
  test("directory without cert/key disables verification even with ca.pem, and warns", async () => {
    const { deps, built, warnings } = recordingDeps({ "ca.pem": CA });
    const res = await buildClient(config({ certPath: "/etc/mongo-certs" }), deps);

    expect(res.tlsPolicy?.insecure).toBe(true);
    expect(built[0].options.tlsInsecure).toBe(true);
    expect(built[0].options.cert).toBeUndefined();
    expect(warnings).toEqual([
      "No cert.pem/key.pem pair in /etc/mongo-certs: server certificate verification is disabled even though ca.pem is present",
    ]);
  });

  test("inline pair without CA disables verification", async () => {
    const { deps, built } = recordingDeps();
    await buildClient(config({ certMaterial: CERT, keyMaterial: KEY }), deps);
    expect(built[0].options.tlsInsecure).toBe(true);
    expect(built[0].options.ca).toBeUndefined();
  });

  test("skip-verify applies on the CA-only branch too", async () => {
    const { deps, built } = recordingDeps();
    await buildClient(config({ caMaterial: CA, tlsInsecure: true }), deps);
    expect(built[0].options.tlsInsecure).toBe(true);
  });

  test("ssl toggle without material leaves TLS to the driver", async () => {
    const { deps, built } = recordingDeps();
    await buildClient(config({ tls: true, tlsInsecure: true }), deps);
    expect(built[0].uri).toBe("mongodb://db.internal:27017/?ssl=true");
    expect(built[0].options.tls).toBeUndefined();
    expect(built[0].options.tlsInsecure).toBe(true);
  });

  test("no username means no auth block", () => {
    const cfg = resolveConnectionConfig([{ authDatabase: "ops" }]);
    expect(clientOptions(cfg, undefined)).toEqual({ authSource: "ops" });
  });
});

describe("buildClient with the real driver", () => {
  test("constructs a MongoClient without touching the network", async () => {
    const { client, source } = await buildClient(
      config({ caMaterial: CA, certMaterial: CERT, keyMaterial: KEY, replicaSet: "rs0", retryWrites: false })
    );
    expect(source).toBe("inline");
    expect(client.options.replicaSet).toBe("rs0");
    expect(client.options.retryWrites).toBe(false);
    expect(client.options.tls).toBe(true);
    await client.close();
  });
});

describe("describeClientPlan", () => {
  test("reports the branch and a masked address", async () => {
    const plan = await describeClientPlan(config({ caMaterial: CA, tls: true }));
    expect(plan).toEqual({
      source: "ca-only",
      connectionString: "mongodb://db.internal:27017/?ssl=true",
      authDatabase: "admin",
      username: "admin-user",
      tls: "1 CA certificate(s), no client certificate",
    });
  });

  test("plain connection", async () => {
    const plan = await describeClientPlan(resolveConnectionConfig([]));
    expect(plan).toEqual({
      source: "none",
      connectionString: "mongodb://localhost:27017",
      authDatabase: "admin",
      tls: "off",
    });
  });
});
