import { appConfig } from "../src/config/appConfig";
import type { StatusConfigResponse, StatusRequest } from "../types";
import { StatusLedgerError } from "../utils/errors";

export type SubmitResponse = {
  fileName: string;
  documentId: string;
  created: boolean;
};

/** What the form needs from the server. */
export interface StatusApi {
  fetchConfig(): Promise<StatusConfigResponse>;
  submit(request: StatusRequest): Promise<SubmitResponse>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

async function readError(response: Response): Promise<StatusLedgerError> {
  let body: unknown = null;
  try {
    body = await response.json();
  } catch {
    // non-JSON error page
  }
  if (isRecord(body) && isRecord(body.error) && typeof body.error.message === "string") {
    const code = typeof body.error.code === "string" ? body.error.code : "HttpError";
    return new StatusLedgerError(code, body.error.message, { status: response.status });
  }
  return new StatusLedgerError("HttpError", `Request failed with status ${response.status}`, {
    status: response.status,
  });
}

function toConfig(data: unknown): StatusConfigResponse {
  if (!isRecord(data) || !Array.isArray(data.profiles) || typeof data.today !== "string") {
    throw new StatusLedgerError("HttpError", "Malformed configuration response");
  }
  return {
    profiles: data.profiles.filter((p): p is string => typeof p === "string"),
    statusTypes: ["Daily", "Weekly"],
    today: data.today,
  };
}

function toSubmitResponse(data: unknown): SubmitResponse {
  if (!isRecord(data) || typeof data.fileName !== "string" || typeof data.documentId !== "string") {
    throw new StatusLedgerError("HttpError", "Malformed submission response");
  }
  return { fileName: data.fileName, documentId: data.documentId, created: data.created === true };
}

export function createStatusApi(
  base: string = appConfig.api.base,
  fetchImpl: (input: string, init?: RequestInit) => Promise<Response> = (input, init) => fetch(input, init)
): StatusApi {
  return {
    async fetchConfig() {
      const response = await fetchImpl(`${base}/api/config`);
      if (!response.ok) throw await readError(response);
      return toConfig(await response.json());
    },

    async submit(request) {
      const response = await fetchImpl(`${base}/api/status`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(request),
      });
      if (!response.ok) throw await readError(response);
      return toSubmitResponse(await response.json());
    },
  };
}
