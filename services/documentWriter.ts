import type { TextInsert, WriteResult } from "../types";
import { DocumentWriteError } from "../utils/errors";
import { getLogger } from "../utils/logger";
import type { StorageHandle } from "./driveAuth";
import { buildFileQuery, DOCUMENT_MIME } from "./driveService";

const log = getLogger("Documents");

export const SECTION_SEPARATOR = "-".repeat(39);

/** Docs offsets are 1-based; index 1 is the first content position. */
export const DOCUMENT_START_INDEX = 1;

export async function findDocument(
  handle: StorageHandle,
  name: string,
  folderId: string
): Promise<string | null> {
  const files = await handle.drive.listFiles(buildFileQuery(name, DOCUMENT_MIME, folderId));
  return files.length > 0 ? files[0].id : null;
}

/**
 * Inserts that append `content` as a new section. Both offsets refer to the
 * document before the batch is applied, so they are computed up front.
 */
export function planAppendRequests(endIndex: number, content: string): TextInsert[] {
  return [
    { index: endIndex - 1, text: "\n" },
    { index: endIndex, text: `\n${SECTION_SEPARATOR}\n\n${content}\n` },
  ];
}

export function planCreateRequests(content: string): TextInsert[] {
  return [{ index: DOCUMENT_START_INDEX, text: `${content}\n` }];
}

async function appendToDocument(handle: StorageHandle, documentId: string, name: string, content: string) {
  try {
    const endIndex = await handle.docs.getEndIndex(documentId);
    await handle.docs.batchInsert(documentId, planAppendRequests(endIndex, content));
    log.info("document.appended", { documentId, name, endIndex });
  } catch (err) {
    throw new DocumentWriteError(name, err, { documentId });
  }
}

async function createDocument(handle: StorageHandle, folderId: string, name: string, content: string) {
  let documentId: string | undefined;
  try {
    documentId = await handle.drive.createFile({ name, mimeType: DOCUMENT_MIME, parents: [folderId] });
    await handle.docs.batchInsert(documentId, planCreateRequests(content));
    log.info("document.created", { documentId, name, folderId });
    return documentId;
  } catch (err) {
    throw new DocumentWriteError(name, err, { folderId, documentId });
  }
}

/** Appends to the document named `name` in `folderId`, creating it first if absent. */
export async function appendOrCreate(
  handle: StorageHandle,
  folderId: string,
  name: string,
  content: string
): Promise<WriteResult> {
  const existing = await findDocument(handle, name, folderId);
  if (existing) {
    await appendToDocument(handle, existing, name, content);
    return { documentId: existing, created: false };
  }
  const documentId = await createDocument(handle, folderId, name, content);
  return { documentId, created: true };
}
