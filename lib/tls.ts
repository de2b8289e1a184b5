import { X509Certificate, createPrivateKey, type KeyObject } from "crypto";
import * as fs from "fs";
import * as path from "path";
import { ConfigurationError } from "./errors";

/**
 * Where client TLS material comes from. Exactly one variant applies; the flat
 * user-facing options are turned into this by resolveTlsSource().
 */
export type TlsSource =
  | { kind: "none"; ca?: string }
  | { kind: "inline"; ca?: string; cert: string; key: string }
  | { kind: "directory"; path: string };

/** The flat shape flags, env and config file produce. */
export type RawTlsOptions = {
  caMaterial?: string;
  certMaterial?: string;
  keyMaterial?: string;
  certPath?: string;
};

export type TlsMaterial = {
  ca: string;
  cert: string;
  key: string;
};

export type TlsPolicy = {
  /** Root CAs to trust; empty when verification is disabled. */
  ca: string[];
  clientCertificate?: { cert: string; key: string };
  /** Skip server certificate and hostname verification. */
  insecure: boolean;
};

export const CA_FILE = "ca.pem";
export const CERT_FILE = "cert.pem";
export const KEY_FILE = "key.pem";

export function resolveTlsSource(raw: RawTlsOptions): TlsSource {
  const ca = raw.caMaterial || undefined;
  const cert = raw.certMaterial || "";
  const key = raw.keyMaterial || "";
  const certPath = (raw.certPath || "").trim();

  if (cert || key) {
    if (!cert || !key) {
      throw new ConfigurationError(
        cert ? "keyMaterial" : "certMaterial",
        "cert and key material must be specified together"
      );
    }
    if (certPath) {
      throw new ConfigurationError("certPath", "cert_path must not be specified together with cert/key material");
    }
    return { kind: "inline", ca, cert, key };
  }
  if (certPath) {
    return { kind: "directory", path: certPath };
  }
  return { kind: "none", ca };
}

export type ReadTextFile = (file: string) => Promise<string>;

const readUtf8: ReadTextFile = (file) => fs.promises.readFile(file, "utf8");

async function readOptional(file: string, readFile: ReadTextFile): Promise<string> {
  try {
    return await readFile(file);
  } catch (e) {
    if (e && typeof e === "object" && "code" in e && e.code === "ENOENT") return "";
    throw e;
  }
}

/** Load raw PEM text for a source. Missing files in a cert directory read as empty. */
export async function loadTlsMaterial(source: TlsSource, readFile: ReadTextFile = readUtf8): Promise<TlsMaterial> {
  switch (source.kind) {
    case "inline":
      return { ca: source.ca ?? "", cert: source.cert, key: source.key };
    case "directory": {
      const [ca, cert, key] = await Promise.all([
        readOptional(path.join(source.path, CA_FILE), readFile),
        readOptional(path.join(source.path, CERT_FILE), readFile),
        readOptional(path.join(source.path, KEY_FILE), readFile),
      ]);
      return { ca, cert, key };
    }
    case "none":
      return { ca: source.ca ?? "", cert: "", key: "" };
  }
}

const PEM_CERT_RE = /-----BEGIN CERTIFICATE-----[\s\S]*?-----END CERTIFICATE-----/g;

/**
 * Split a PEM bundle into the certificates that actually parse.
 * Throws if the bundle holds none.
 */
export function parseCaBundle(pem: string): string[] {
  const parsed: string[] = [];
  for (const block of pem.match(PEM_CERT_RE) ?? []) {
    try {
      new X509Certificate(block);
      parsed.push(block);
    } catch {
      // not a certificate; skipped like any other junk in the bundle
    }
  }
  if (parsed.length === 0) {
    throw new ConfigurationError("ca", "could not parse any CA certificate from the supplied PEM");
  }
  return parsed;
}

function parseKeyPair(cert: string, key: string): { cert: string; key: string } {
  let x509: X509Certificate;
  try {
    x509 = new X509Certificate(cert);
  } catch (e) {
    throw new ConfigurationError("cert", `could not parse client certificate: ${e instanceof Error ? e.message : String(e)}`);
  }
  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey(key);
  } catch (e) {
    throw new ConfigurationError("key", `could not parse client key: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!x509.checkPrivateKey(privateKey)) {
    throw new ConfigurationError("key", "client certificate and key do not match");
  }
  return { cert, key };
}

export type TlsPolicyOptions = {
  /** Force skip-verify regardless of CA material. */
  insecure?: boolean;
  /**
   * Skip verification when no client cert/key pair is present. The cert
   * directory source has always behaved this way, even with a ca.pem.
   */
  insecureWithoutClientCert?: boolean;
};

export function buildTlsPolicy(material: TlsMaterial, opts: TlsPolicyOptions = {}): TlsPolicy {
  const policy: TlsPolicy = { ca: [], insecure: false };

  if (material.cert && material.key) {
    policy.clientCertificate = parseKeyPair(material.cert, material.key);
  } else if (opts.insecureWithoutClientCert) {
    policy.insecure = true;
  }

  if (!material.ca.trim()) {
    // No CA: explicit skip-verify rather than silently trusting system roots.
    policy.insecure = true;
  } else {
    policy.ca = parseCaBundle(material.ca);
  }

  if (opts.insecure) policy.insecure = true;
  return policy;
}

export function describeTlsPolicy(policy: TlsPolicy | undefined): string {
  if (!policy) return "driver default";
  const parts = [
    policy.ca.length > 0 ? `${policy.ca.length} CA certificate(s)` : "no CA",
    policy.clientCertificate ? "client certificate" : "no client certificate",
  ];
  if (policy.insecure) parts.push("verification disabled");
  return parts.join(", ");
}
