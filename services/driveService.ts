import { DriveRequestError } from "../utils/errors";
import type { AuthorizedFetch } from "./driveAuth";

export const DRIVE_FILES_URL = "https://www.googleapis.com/drive/v3/files";
export const FOLDER_MIME = "application/vnd.google-apps.folder";
export const DOCUMENT_MIME = "application/vnd.google-apps.document";

export type DriveFile = { id: string; name: string };

export type NewFileMetadata = {
  name: string;
  mimeType: string;
  parents?: string[];
};

export type WriterPermission = {
  type: "user";
  role: "writer";
  emailAddress: string;
};

/** File and folder management (Drive v3). */
export interface DriveFilesClient {
  listFiles(query: string): Promise<DriveFile[]>;
  createFile(metadata: NewFileMetadata): Promise<string>;
  createPermission(fileId: string, permission: WriterPermission): Promise<string>;
}

export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/** Drive search query for an exact name, mime type and optional parent. */
export function buildFileQuery(name: string, mimeType: string, parentId?: string): string {
  let q = `name = '${escapeQueryValue(name)}' and mimeType = '${mimeType}' and trashed = false`;
  if (parentId) q += ` and '${escapeQueryValue(parentId)}' in parents`;
  return q;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toDriveFile(value: unknown): DriveFile | null {
  if (!isRecord(value) || typeof value.id !== "string") return null;
  return { id: value.id, name: typeof value.name === "string" ? value.name : "" };
}

async function readJson(response: Response, operation: string): Promise<unknown> {
  if (!response.ok) {
    throw new DriveRequestError(operation, response.status, await response.text());
  }
  return response.json();
}

function readId(data: unknown, operation: string): string {
  if (isRecord(data) && typeof data.id === "string") return data.id;
  throw new DriveRequestError(operation, 200, "response carried no id");
}

export function createDriveClient(driveFetch: AuthorizedFetch): DriveFilesClient {
  return {
    async listFiles(query) {
      const params = new URLSearchParams({
        q: query,
        spaces: "drive",
        fields: "files(id, name)",
        supportsAllDrives: "true",
        includeItemsFromAllDrives: "true",
      });
      const response = await driveFetch(`${DRIVE_FILES_URL}?${params.toString()}`);
      const data = await readJson(response, "files.list");
      if (!isRecord(data) || !Array.isArray(data.files)) return [];
      return data.files.map(toDriveFile).filter((f): f is DriveFile => f !== null);
    },

    async createFile(metadata) {
      const response = await driveFetch(`${DRIVE_FILES_URL}?fields=id&supportsAllDrives=true`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(metadata),
      });
      return readId(await readJson(response, "files.create"), "files.create");
    },

    async createPermission(fileId, permission) {
      const url = `${DRIVE_FILES_URL}/${encodeURIComponent(fileId)}/permissions?fields=id&supportsAllDrives=true`;
      const response = await driveFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(permission),
      });
      return readId(await readJson(response, "permissions.create"), "permissions.create");
    },
  };
}
