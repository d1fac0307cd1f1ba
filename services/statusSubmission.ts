import type { ServerConfig } from "../src/config/serverConfig";
import type { SubmissionResult } from "../types";
import { withKeyedLock } from "../utils/async";
import { toUserMessage } from "../utils/errors";
import { createCorrelationId, getLogger } from "../utils/logger";
import { toIsoDate } from "../utils/statusPeriod";
import { authenticate, type AuthenticateOptions, type StorageHandle } from "./driveAuth";
import { appendOrCreate } from "./documentWriter";
import { ensureFolder } from "./folderResolver";
import { validateStatusRequest } from "./statusValidation";

const log = getLogger("Submit");

export type StorageConnector = () => Promise<StorageHandle>;

export type SubmissionDeps = {
  config: Pick<ServerConfig, "profiles" | "collaborators" | "rootFolderName">;
  connect: StorageConnector;
  today?: () => string;
};

/** Authenticates with the credential artifact, once per call. */
export function createStorageConnector(keyFile: string, opts?: AuthenticateOptions): StorageConnector {
  return () => authenticate(keyFile, opts);
}

/**
 * Validates a status request and writes it to
 * `<root>/<profile>/<file name>`. Each find-or-create step holds an
 * in-process lock on its path.
 */
export async function submitStatus(input: unknown, deps: SubmissionDeps): Promise<SubmissionResult> {
  const today = deps.today ? deps.today() : toIsoDate(new Date());
  const entry = validateStatusRequest(input, { profiles: deps.config.profiles, today });
  const correlationId = createCorrelationId();
  const rootName = deps.config.rootFolderName;

  log.info("submit.start", { correlationId, profile: entry.profile, fileName: entry.fileName });

  try {
    const handle = await deps.connect();

    const rootId = await withKeyedLock(rootName, () =>
      ensureFolder(handle, rootName, undefined, deps.config.collaborators)
    );

    const profileKey = `${rootName}/${entry.profile}`;
    const profileFolderId = await withKeyedLock(profileKey, () =>
      ensureFolder(handle, entry.profile, rootId)
    );

    const result = await withKeyedLock(`${profileKey}/${entry.fileName}`, () =>
      appendOrCreate(handle, profileFolderId, entry.fileName, entry.content)
    );

    log.info("submit.done", { correlationId, documentId: result.documentId, created: result.created });
    return { ...result, fileName: entry.fileName, profileFolderId };
  } catch (err) {
    log.error("submit.failed", { correlationId, message: toUserMessage(err) });
    throw err;
  }
}
