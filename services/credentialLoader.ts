import { readFile, writeFile } from "node:fs/promises";
import type { ServerConfig, ServerEnv } from "../src/config/serverConfig";
import type { ServiceAccountCredential } from "../types";
import { ConfigurationError } from "../utils/errors";
import { getLogger } from "../utils/logger";

const log = getLogger("Credentials");

type CredentialField = keyof ServiceAccountCredential;

/** Credential field → environment variable it is read from. */
const CREDENTIAL_ENV: Record<CredentialField, string> = {
  type: "ACCOUNT_TYPE",
  project_id: "PROJECT_ID",
  private_key_id: "PRIVATE_KEY_ID",
  private_key: "PRIVATE_KEY",
  client_email: "CLIENT_EMAIL",
  client_id: "CLIENT_ID",
  auth_uri: "AUTH_URI",
  token_uri: "TOKEN_URI",
  auth_provider_x509_cert_url: "AUTH_PROVIDER_X509_CERT_URL",
  client_x509_cert_url: "CLIENT_X509_CERT_URL",
  universe_domain: "UNIVERSE_DOMAIN",
};

const REQUIRED_FIELDS: CredentialField[] = [
  "type",
  "project_id",
  "private_key_id",
  "private_key",
  "client_email",
  "client_id",
];

const SERVICE_ACCOUNT_TYPE = "service_account";

function defaultFor(field: CredentialField, clientEmail: string): string {
  switch (field) {
    case "auth_uri":
      return "https://accounts.google.com/o/oauth2/auth";
    case "token_uri":
      return "https://oauth2.googleapis.com/token";
    case "auth_provider_x509_cert_url":
      return "https://www.googleapis.com/oauth2/v1/certs";
    case "client_x509_cert_url":
      return `https://www.googleapis.com/robot/v1/metadata/x509/${encodeURIComponent(clientEmail)}`;
    case "universe_domain":
      return "googleapis.com";
    default:
      return "";
  }
}

/**
 * Builds the canonical credential from raw values. `label` maps a field to the
 * name shown in errors (an env variable or a JSON key).
 */
function buildCredential(
  read: (field: CredentialField) => string | undefined,
  label: (field: CredentialField) => string,
  source: string
): ServiceAccountCredential {
  const missing = REQUIRED_FIELDS.filter((field) => !read(field)?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing service account configuration: ${missing.map(label).join(", ")}`,
      { source, missing: missing.map(label) }
    );
  }

  const value = (field: CredentialField): string => read(field)?.trim() ?? "";
  const clientEmail = value("client_email");

  if (value("type") !== SERVICE_ACCOUNT_TYPE) {
    throw new ConfigurationError(
      `${label("type")} must be "${SERVICE_ACCOUNT_TYPE}", got "${value("type")}"`,
      { source }
    );
  }

  // Key material is kept verbatim apart from escaped newlines.
  const privateKey = (read("private_key") ?? "").replace(/\\n/g, "\n");
  if (!privateKey.includes("PRIVATE KEY")) {
    throw new ConfigurationError(`${label("private_key")} is not a PEM private key`, { source });
  }

  const pick = (field: CredentialField): string => value(field) || defaultFor(field, clientEmail);

  return {
    type: SERVICE_ACCOUNT_TYPE,
    project_id: pick("project_id"),
    private_key_id: pick("private_key_id"),
    private_key: privateKey,
    client_email: clientEmail,
    client_id: pick("client_id"),
    auth_uri: pick("auth_uri"),
    token_uri: pick("token_uri"),
    auth_provider_x509_cert_url: pick("auth_provider_x509_cert_url"),
    client_x509_cert_url: pick("client_x509_cert_url"),
    universe_domain: pick("universe_domain"),
  };
}

export function readCredentialFromEnv(env: ServerEnv): ServiceAccountCredential {
  return buildCredential(
    (field) => env[CREDENTIAL_ENV[field]],
    (field) => CREDENTIAL_ENV[field],
    "env"
  );
}

export async function readCredentialFromFile(path: string): Promise<ServiceAccountCredential> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (e) {
    throw new ConfigurationError(`Cannot read credential file ${path}`, { path }, e);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Credential file ${path} must contain a JSON object`, { path });
  }
  const record = new Map(Object.entries(parsed));
  return buildCredential(
    (field) => {
      const raw = record.get(field);
      return typeof raw === "string" ? raw : undefined;
    },
    (field) => field,
    path
  );
}

export type LoadedCredential = {
  credential: ServiceAccountCredential;
  /** Path of the written credential artifact, handed to authenticate(). */
  keyFile: string;
};

export async function loadCredential(
  config: ServerConfig["credentials"],
  env: ServerEnv
): Promise<LoadedCredential> {
  const credential = config.sourceFile
    ? await readCredentialFromFile(config.sourceFile)
    : readCredentialFromEnv(env);

  if (config.sourceFile === config.outputPath) {
    return { credential, keyFile: config.outputPath };
  }

  try {
    await writeFile(config.outputPath, JSON.stringify(credential), { encoding: "utf8", mode: 0o600 });
  } catch (e) {
    throw new ConfigurationError(
      `Cannot write credential file ${config.outputPath}`,
      { path: config.outputPath },
      e
    );
  }
  log.debug("credential.written", { path: config.outputPath, clientEmail: credential.client_email });
  return { credential, keyFile: config.outputPath };
}
