import type { TextInsert } from "../types";
import { DriveRequestError, StatusLedgerError } from "../utils/errors";
import type { AuthorizedFetch } from "./driveAuth";

export const DOCS_URL = "https://docs.googleapis.com/v1/documents";

/** Document content editing (Docs v1). */
export interface DocsClient {
  /** End offset of the body's last structural element. */
  getEndIndex(documentId: string): Promise<number>;
  /** Applies all inserts in one batchUpdate, in order. */
  batchInsert(documentId: string, inserts: TextInsert[]): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function readEndIndex(doc: unknown): number | null {
  if (!isRecord(doc) || !isRecord(doc.body) || !Array.isArray(doc.body.content)) return null;
  const last: unknown = doc.body.content[doc.body.content.length - 1];
  if (!isRecord(last) || typeof last.endIndex !== "number") return null;
  return last.endIndex;
}

export function toInsertRequests(inserts: TextInsert[]) {
  return inserts.map((insert) => ({
    insertText: {
      location: { index: insert.index },
      text: insert.text,
    },
  }));
}

export function createDocsClient(docsFetch: AuthorizedFetch): DocsClient {
  return {
    async getEndIndex(documentId) {
      const response = await docsFetch(`${DOCS_URL}/${encodeURIComponent(documentId)}`);
      if (!response.ok) {
        throw new DriveRequestError("documents.get", response.status, await response.text());
      }
      const endIndex = readEndIndex(await response.json());
      if (endIndex === null) {
        throw new StatusLedgerError("MalformedDocument", `Document ${documentId} has no body content`, {
          documentId,
        });
      }
      return endIndex;
    },

    async batchInsert(documentId, inserts) {
      const response = await docsFetch(`${DOCS_URL}/${encodeURIComponent(documentId)}:batchUpdate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ requests: toInsertRequests(inserts) }),
      });
      if (!response.ok) {
        throw new DriveRequestError("documents.batchUpdate", response.status, await response.text());
      }
    },
  };
}
