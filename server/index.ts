import { loadEnv } from "vite";
import { getConfigDump, loadServerConfig, type ServerEnv } from "../src/config/serverConfig";
import { loadCredential } from "../services/credentialLoader";
import { createStorageConnector } from "../services/statusSubmission";
import { toUserMessage } from "../utils/errors";
import { getLogger, setLogLevel } from "../utils/logger";
import { createApp } from "./app";

const log = getLogger("Server");

function readEnv(): ServerEnv {
  const mode = process.env.NODE_ENV ?? "development";
  // .env files first, real environment wins.
  return { ...loadEnv(mode, process.cwd(), ""), ...process.env };
}

async function main(): Promise<void> {
  const env = readEnv();
  const config = loadServerConfig(env);
  setLogLevel(config.logLevel);

  // Fails startup on a missing or malformed credential.
  const { keyFile, credential } = await loadCredential(config.credentials, env);
  log.info("credential.loaded", { clientEmail: credential.client_email, keyFile });

  const app = createApp({
    config,
    connect: createStorageConnector(keyFile),
  });

  app.listen(config.port, () => {
    log.info("server.listening", getConfigDump(config));
  });
}

main().catch((err: unknown) => {
  log.error("server.startup_failed", { message: toUserMessage(err) });
  process.exitCode = 1;
});
