import { describe, it, expect, vi } from "vitest";
import { authenticate, createAuthorizedFetch, SCOPES } from "../services/driveAuth";
import { AuthenticationError } from "../utils/errors";

describe("createAuthorizedFetch", () => {
  it("adds a bearer token to every request", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response("{}"));
    const authorized = createAuthorizedFetch({ getAccessToken: async () => "test-token" }, fetchMock);

    await authorized("https://example.com/x", { headers: { "Content-Type": "application/json" } });

    const headers = new Headers(fetchMock.mock.calls[0][1]?.headers);
    expect(headers.get("Authorization")).toBe("Bearer test-token");
    expect(headers.get("Content-Type")).toBe("application/json");
  });
});

describe("authenticate", () => {
  it("requests both scopes and returns drive and docs clients", async () => {
    const createTokenSource = vi.fn((_keyFile: string, _scopes: string[]) => ({
      getAccessToken: async () => "test-token",
    }));

    const handle = await authenticate("./credentials.json", {
      createTokenSource,
      fetchImpl: async () => new Response("{}"),
    });

    expect(createTokenSource).toHaveBeenCalledWith("./credentials.json", SCOPES);
    expect(SCOPES).toEqual([
      "https://www.googleapis.com/auth/drive",
      "https://www.googleapis.com/auth/documents",
    ]);
    expect(typeof handle.drive.listFiles).toBe("function");
    expect(typeof handle.docs.batchInsert).toBe("function");
  });

  it("wraps a rejected credential in AuthenticationError", async () => {
    const promise = authenticate("./credentials.json", {
      createTokenSource: () => ({
        getAccessToken: async () => {
          throw new Error("invalid_grant: account not found");
        },
      }),
    });

    await expect(promise).rejects.toBeInstanceOf(AuthenticationError);
    await expect(promise).rejects.toThrow("Google authentication failed: invalid_grant: account not found");
  });

  it("treats an empty token as an authentication failure", async () => {
    await expect(
      authenticate("./credentials.json", { createTokenSource: () => ({ getAccessToken: async () => null }) })
    ).rejects.toThrow("Google authentication failed: Token endpoint returned no access token");
  });
});
