import { ConfigurationError } from "../../utils/errors";
import { isLogLevel, type LogLevel } from "../../utils/logger";

export type ServerEnv = Record<string, string | undefined>;

export type ServerConfig = {
  port: number;
  logLevel: LogLevel;
  profiles: string[];
  collaborators: string[];
  rootFolderName: string;
  credentials: {
    /** Pre-existing service-account JSON; when unset the credential comes from env. */
    sourceFile?: string;
    outputPath: string;
  };
  staticDir: string;
};

export function toList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function toNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function toOptional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadServerConfig(env: ServerEnv): ServerConfig {
  const profiles = toList(env.STATUS_PROFILES);
  if (profiles.length === 0) {
    throw new ConfigurationError("STATUS_PROFILES must list at least one profile", {
      variable: "STATUS_PROFILES",
    });
  }

  const logLevel = toOptional(env.LOG_LEVEL) ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL "${logLevel}" is not one of debug, info, warn, error`, {
      variable: "LOG_LEVEL",
    });
  }

  return {
    port: toNumber(env.PORT, 8787),
    logLevel,
    profiles: [...new Set(profiles)],
    collaborators: [...new Set(toList(env.COLLABORATOR_EMAILS))],
    rootFolderName: toOptional(env.STATUS_ROOT_FOLDER) ?? "status",
    credentials: {
      sourceFile: toOptional(env.GOOGLE_CREDENTIALS_FILE),
      outputPath: toOptional(env.CREDENTIALS_OUTPUT_PATH) ?? "./credentials.json",
    },
    staticDir: toOptional(env.STATIC_DIR) ?? "dist",
  };
}

export function getConfigDump(config: ServerConfig): Record<string, unknown> {
  return {
    port: config.port,
    logLevel: config.logLevel,
    profiles: config.profiles,
    collaboratorCount: config.collaborators.length,
    rootFolderName: config.rootFolderName,
    credentialSource: config.credentials.sourceFile ? "file" : "env",
  };
}
