import type { DocsClient } from "../../services/docsService";
import type { StorageHandle } from "../../services/driveAuth";
import {
  DOCUMENT_MIME,
  type DriveFile,
  type DriveFilesClient,
  type NewFileMetadata,
  type WriterPermission,
} from "../../services/driveService";
import type { TextInsert } from "../../types";

type StoredFile = NewFileMetadata & { id: string; parents: string[] };

export type FakeCall =
  | { op: "listFiles"; query: string }
  | { op: "createFile"; metadata: NewFileMetadata }
  | { op: "createPermission"; fileId: string; permission: WriterPermission }
  | { op: "getEndIndex"; documentId: string }
  | { op: "batchInsert"; documentId: string; inserts: TextInsert[] };

export type FakeOp = FakeCall["op"];

const QUERY =
  /^name = '((?:\\.|[^'\\])*)' and mimeType = '([^']+)' and trashed = false(?: and '((?:\\.|[^'\\])*)' in parents)?$/;

function unescape(value: string): string {
  return value.replace(/\\(.)/g, "$1");
}

/**
 * In-memory Drive and Docs. Document bodies follow the Docs model: a new
 * document holds a single "\n", offsets are 1-based and the end index is
 * `text.length + 1`.
 */
export class FakeGoogle {
  readonly files = new Map<string, StoredFile>();
  readonly documents = new Map<string, string>();
  readonly permissions: { fileId: string; emailAddress: string }[] = [];
  readonly calls: FakeCall[] = [];
  private failures = new Map<FakeOp, { error: Error; afterCalls: number }>();
  private nextId = 1;

  /** Makes `op` throw `error` once it has succeeded `afterCalls` more times. */
  failOn(op: FakeOp, error: Error, afterCalls = 0): void {
    this.failures.set(op, { error, afterCalls });
  }

  seedFile(name: string, mimeType: string, parents: string[] = []): string {
    const id = `file_${this.nextId++}`;
    this.files.set(id, { id, name, mimeType, parents });
    if (mimeType === DOCUMENT_MIME) this.documents.set(id, "\n");
    return id;
  }

  callsOf<T extends FakeOp>(op: T): Extract<FakeCall, { op: T }>[] {
    return this.calls.filter((c): c is Extract<FakeCall, { op: T }> => c.op === op);
  }

  writeCalls(): FakeCall[] {
    return this.calls.filter((c) => c.op !== "listFiles" && c.op !== "getEndIndex");
  }

  private record(call: FakeCall): void {
    this.calls.push(call);
    const failure = this.failures.get(call.op);
    if (!failure) return;
    if (failure.afterCalls > 0) {
      failure.afterCalls -= 1;
      return;
    }
    this.failures.delete(call.op);
    throw failure.error;
  }

  readonly drive: DriveFilesClient = {
    listFiles: async (query: string): Promise<DriveFile[]> => {
      this.record({ op: "listFiles", query });
      const match = QUERY.exec(query);
      if (!match) throw new Error(`Unsupported query: ${query}`);
      const [, rawName, mimeType, rawParent] = match;
      const name = unescape(rawName);
      const parent = rawParent === undefined ? undefined : unescape(rawParent);
      return [...this.files.values()]
        .filter((f) => f.name === name && f.mimeType === mimeType)
        .filter((f) => parent === undefined || f.parents.includes(parent))
        .map((f) => ({ id: f.id, name: f.name }));
    },

    createFile: async (metadata: NewFileMetadata): Promise<string> => {
      this.record({ op: "createFile", metadata });
      return this.seedFile(metadata.name, metadata.mimeType, metadata.parents ?? []);
    },

    createPermission: async (fileId: string, permission: WriterPermission): Promise<string> => {
      this.record({ op: "createPermission", fileId, permission });
      this.permissions.push({ fileId, emailAddress: permission.emailAddress });
      return `perm_${this.permissions.length}`;
    },
  };

  readonly docs: DocsClient = {
    getEndIndex: async (documentId: string): Promise<number> => {
      this.record({ op: "getEndIndex", documentId });
      const text = this.documents.get(documentId);
      if (text === undefined) throw new Error(`No document ${documentId}`);
      return text.length + 1;
    },

    batchInsert: async (documentId: string, inserts: TextInsert[]): Promise<void> => {
      this.record({ op: "batchInsert", documentId, inserts });
      let text = this.documents.get(documentId);
      if (text === undefined) throw new Error(`No document ${documentId}`);
      for (const insert of inserts) {
        const endIndex = text.length + 1;
        if (insert.index < 1 || insert.index >= endIndex) {
          throw new Error(`Index ${insert.index} must be less than the end index ${endIndex}`);
        }
        const at = insert.index - 1;
        text = text.slice(0, at) + insert.text + text.slice(at);
      }
      this.documents.set(documentId, text);
    },
  };

  handle(): StorageHandle {
    return { drive: this.drive, docs: this.docs };
  }
}
