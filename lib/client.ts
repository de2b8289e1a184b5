import { MongoClient, type MongoClientOptions } from "mongodb";
import { buildConnectionString, type ConnectionConfig } from "./connection";
import {
  buildTlsPolicy,
  describeTlsPolicy,
  loadTlsMaterial,
  type ReadTextFile,
  type TlsPolicy,
  type TlsSource,
} from "./tls";
import { maskConnectionString } from "./util";

/** Which credential-source branch produced the client. */
export type ClientSource = "inline" | "directory" | "ca-only" | "none";

export type SecureClient<C = MongoClient> = {
  client: C;
  source: ClientSource;
  connectionString: string;
  tlsPolicy?: TlsPolicy;
};

export type ClientFactoryDeps<C> = {
  readFile?: ReadTextFile;
  createClient: (uri: string, options: MongoClientOptions) => C;
  /** Receives non-fatal warnings (e.g. verification disabled implicitly). */
  warn?: (message: string) => void;
};

export function sourceOf(tlsSource: TlsSource): ClientSource {
  switch (tlsSource.kind) {
    case "inline":
      return "inline";
    case "directory":
      return "directory";
    case "none":
      return tlsSource.ca ? "ca-only" : "none";
  }
}

export function clientOptions(config: ConnectionConfig, tlsPolicy: TlsPolicy | undefined): MongoClientOptions {
  const options: MongoClientOptions = { authSource: config.authDatabase };
  if (config.username) {
    options.auth = { username: config.username, password: config.password ?? "" };
  }
  if (tlsPolicy) {
    options.tls = true;
    if (tlsPolicy.ca.length > 0) options.ca = tlsPolicy.ca;
    if (tlsPolicy.clientCertificate) {
      options.cert = tlsPolicy.clientCertificate.cert;
      options.key = tlsPolicy.clientCertificate.key;
    }
    if (tlsPolicy.insecure) options.tlsInsecure = true;
  } else if (config.tls && config.tlsInsecure) {
    options.tlsInsecure = true;
  }
  return options;
}

async function resolvePolicy(
  config: ConnectionConfig,
  readFile: ReadTextFile | undefined,
  warn: (message: string) => void
): Promise<TlsPolicy | undefined> {
  const source = config.tlsSource;
  switch (source.kind) {
    case "inline":
      return buildTlsPolicy(await loadTlsMaterial(source, readFile), { insecure: config.tlsInsecure });
    case "directory": {
      const material = await loadTlsMaterial(source, readFile);
      const policy = buildTlsPolicy(material, { insecure: config.tlsInsecure, insecureWithoutClientCert: true });
      if (!policy.clientCertificate && policy.ca.length > 0 && !config.tlsInsecure) {
        warn(
          `No cert.pem/key.pem pair in ${source.path}: server certificate verification is disabled even though ca.pem is present`
        );
      }
      return policy;
    }
    case "none":
      if (!source.ca) return undefined;
      return buildTlsPolicy({ ca: source.ca, cert: "", key: "" }, { insecure: config.tlsInsecure });
  }
}

/**
 * Build a client handle for the configured deployment. Nothing is sent over
 * the network here; the driver connects on first use. All failures at this
 * stage are local (configuration, PEM parsing, reading the cert directory).
 */
export async function buildClient(config: ConnectionConfig): Promise<SecureClient>;
export async function buildClient<C>(config: ConnectionConfig, deps: ClientFactoryDeps<C>): Promise<SecureClient<C>>;
export async function buildClient<C>(
  config: ConnectionConfig,
  deps?: ClientFactoryDeps<C>
): Promise<SecureClient<C> | SecureClient> {
  const warn = deps?.warn ?? (() => undefined);
  const tlsPolicy = await resolvePolicy(config, deps?.readFile, warn);
  const connectionString = buildConnectionString(config);
  const options = clientOptions(config, tlsPolicy);
  const source = sourceOf(config.tlsSource);

  if (deps) {
    return { client: deps.createClient(connectionString, options), source, connectionString, tlsPolicy };
  }
  return { client: new MongoClient(connectionString, options), source, connectionString, tlsPolicy };
}

export type ClientPlan = {
  source: ClientSource;
  connectionString: string;
  authDatabase: string;
  username?: string;
  tls: string;
};

/** What buildClient would do, without constructing a client. */
export async function describeClientPlan(config: ConnectionConfig, readFile?: ReadTextFile): Promise<ClientPlan> {
  const tlsPolicy = await resolvePolicy(config, readFile, () => undefined);
  const plan: ClientPlan = {
    source: sourceOf(config.tlsSource),
    connectionString: maskConnectionString(buildConnectionString(config)),
    authDatabase: config.authDatabase,
    tls: tlsPolicy ? describeTlsPolicy(tlsPolicy) : config.tls ? "driver default (ssl=true)" : "off",
  };
  if (config.username) plan.username = config.username;
  return plan;
}
