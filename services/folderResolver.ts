import { getLogger } from "../utils/logger";
import type { StorageHandle } from "./driveAuth";
import { buildFileQuery, FOLDER_MIME } from "./driveService";

const log = getLogger("Folders");

/** First folder named exactly `name` under `parentId` (any parent when omitted). */
export async function findFolder(
  handle: StorageHandle,
  name: string,
  parentId?: string
): Promise<string | null> {
  const files = await handle.drive.listFiles(buildFileQuery(name, FOLDER_MIME, parentId));
  if (files.length > 1) {
    log.warn("folder.duplicates", { name, parentId, count: files.length, chosen: files[0].id });
  }
  return files.length > 0 ? files[0].id : null;
}

/**
 * Creates a folder and grants each collaborator write access, one request per
 * address. A failing grant propagates; grants already issued are kept.
 */
export async function createFolder(
  handle: StorageHandle,
  name: string,
  parentId?: string,
  collaborators: string[] = []
): Promise<string> {
  const folderId = await handle.drive.createFile({
    name,
    mimeType: FOLDER_MIME,
    parents: parentId ? [parentId] : undefined,
  });
  log.info("folder.created", { name, parentId, folderId });

  for (const emailAddress of collaborators) {
    await handle.drive.createPermission(folderId, { type: "user", role: "writer", emailAddress });
    log.info("folder.granted", { folderId, emailAddress });
  }

  return folderId;
}

/** Find-or-create. Collaborators are only granted when the folder is created. */
export async function ensureFolder(
  handle: StorageHandle,
  name: string,
  parentId?: string,
  collaborators?: string[]
): Promise<string> {
  const existing = await findFolder(handle, name, parentId);
  if (existing) return existing;
  return createFolder(handle, name, parentId, collaborators);
}
