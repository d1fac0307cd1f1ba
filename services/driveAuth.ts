/**
 * Google service-account authentication and the authenticated fetch used by
 * the Drive and Docs clients.
 */

import { GoogleAuth } from "google-auth-library";
import { AuthenticationError, StatusLedgerError, toUserMessage } from "../utils/errors";
import { getLogger } from "../utils/logger";
import { createDocsClient, type DocsClient } from "./docsService";
import { createDriveClient, type DriveFilesClient } from "./driveService";

const log = getLogger("DriveAuth");

export const SCOPES = [
  "https://www.googleapis.com/auth/drive",
  "https://www.googleapis.com/auth/documents",
];

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type AccessTokenSource = {
  getAccessToken(): Promise<string | null | undefined>;
};

export type AuthorizedFetch = (url: string, init?: RequestInit) => Promise<Response>;

/** Authenticated access to file management and document editing. */
export type StorageHandle = {
  drive: DriveFilesClient;
  docs: DocsClient;
};

export type AuthenticateOptions = {
  fetchImpl?: FetchLike;
  createTokenSource?: (keyFile: string, scopes: string[]) => AccessTokenSource;
};

function defaultTokenSource(keyFile: string, scopes: string[]): AccessTokenSource {
  return new GoogleAuth({ keyFile, scopes });
}

async function requireToken(source: AccessTokenSource): Promise<string> {
  const token = await source.getAccessToken();
  if (!token) throw new StatusLedgerError("EmptyAccessToken", "Token endpoint returned no access token");
  return token;
}

/**
 * Wraps fetch so every request carries a bearer token from `source`.
 * The token source caches and refreshes tokens itself.
 */
export function createAuthorizedFetch(source: AccessTokenSource, fetchImpl: FetchLike): AuthorizedFetch {
  return async (url, init = {}) => {
    const token = await requireToken(source);
    const headers = new Headers(init.headers);
    headers.set("Authorization", `Bearer ${token}`);
    return fetchImpl(url, { ...init, headers });
  };
}

/**
 * Exchanges the credential file for an authenticated handle. The first token
 * is fetched eagerly so a rejected credential fails here.
 */
export async function authenticate(keyFile: string, opts: AuthenticateOptions = {}): Promise<StorageHandle> {
  const createTokenSource = opts.createTokenSource ?? defaultTokenSource;
  const fetchImpl = opts.fetchImpl ?? fetch;

  let source: AccessTokenSource;
  try {
    source = createTokenSource(keyFile, SCOPES);
    await requireToken(source);
  } catch (err) {
    log.error("authenticate.failed", { keyFile, message: toUserMessage(err) });
    throw new AuthenticationError(`Google authentication failed: ${toUserMessage(err)}`, { keyFile }, err);
  }

  const authorizedFetch = createAuthorizedFetch(source, fetchImpl);
  log.debug("authenticate.ok", { keyFile });
  return {
    drive: createDriveClient(authorizedFetch),
    docs: createDocsClient(authorizedFetch),
  };
}
