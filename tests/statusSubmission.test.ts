import { describe, it, expect, vi } from "vitest";
import { SECTION_SEPARATOR } from "../services/documentWriter";
import { DOCUMENT_MIME, FOLDER_MIME } from "../services/driveService";
import { submitStatus, type SubmissionDeps } from "../services/statusSubmission";
import { AuthenticationError, DocumentWriteError, ValidationError } from "../utils/errors";
import { FakeGoogle } from "./fakes/fakeGoogle";

function deps(google: FakeGoogle, collaborators: string[] = []): SubmissionDeps {
  return {
    config: { profiles: ["Alpha", "Beta"], collaborators, rootFolderName: "status" },
    connect: async () => google.handle(),
    today: () => "2024-06-10",
  };
}

function folderNamed(google: FakeGoogle, name: string) {
  return [...google.files.values()].filter((f) => f.name === name && f.mimeType === FOLDER_MIME);
}

describe("submitStatus", () => {
  it("creates status/<profile>/<date> with the content on first submission", async () => {
    const google = new FakeGoogle();

    const result = await submitStatus(
      { type: "Daily", profile: "Alpha", date: "2024-06-10", content: "wrote tests" },
      deps(google)
    );

    const [root] = folderNamed(google, "status");
    const [profile] = folderNamed(google, "Alpha");
    expect(root.parents).toEqual([]);
    expect(profile.parents).toEqual([root.id]);
    expect(result).toMatchObject({ fileName: "2024-06-10", created: true, profileFolderId: profile.id });
    expect(google.files.get(result.documentId)).toMatchObject({
      name: "2024-06-10",
      mimeType: DOCUMENT_MIME,
      parents: [profile.id],
    });
    expect(google.documents.get(result.documentId)).toBe("wrote tests\n\n");
  });

  it("appends a second daily status to the same document", async () => {
    const google = new FakeGoogle();
    const request = { type: "Daily", profile: "Alpha", date: "2024-06-10" };

    const first = await submitStatus({ ...request, content: "morning" }, deps(google));
    const second = await submitStatus({ ...request, content: "evening" }, deps(google));

    expect(second.documentId).toBe(first.documentId);
    expect(second.created).toBe(false);
    expect(folderNamed(google, "status")).toHaveLength(1);
    expect(folderNamed(google, "Alpha")).toHaveLength(1);
    expect(google.documents.get(first.documentId)).toBe(`morning\n\n\n${SECTION_SEPARATOR}\n\nevening\n\n`);
  });

  it("names weekly documents after the period", async () => {
    const google = new FakeGoogle();

    const result = await submitStatus(
      { type: "Weekly", profile: "Beta", startDate: "2024-01-01", endDate: "2024-01-07", content: "week" },
      deps(google)
    );

    expect(result.fileName).toBe("Weekly_2024-01-01_2024-01-07");
    expect(google.files.get(result.documentId)?.name).toBe("Weekly_2024-01-01_2024-01-07");
  });

  it("grants collaborators only when the root folder is first created", async () => {
    const google = new FakeGoogle();
    const collaborators = ["lead@example.com", "pm@example.com"];
    const request = { type: "Daily", profile: "Alpha", date: "2024-06-10", content: "x" };

    await submitStatus(request, deps(google, collaborators));
    await submitStatus({ ...request, profile: "Beta" }, deps(google, collaborators));

    const [root] = folderNamed(google, "status");
    expect(google.permissions).toEqual([
      { fileId: root.id, emailAddress: "lead@example.com" },
      { fileId: root.id, emailAddress: "pm@example.com" },
    ]);
  });

  it("makes no remote calls for blank content", async () => {
    const google = new FakeGoogle();
    const connect = vi.fn(async () => google.handle());

    await expect(
      submitStatus(
        { type: "Daily", profile: "Alpha", date: "2024-06-10", content: "   " },
        { ...deps(google), connect }
      )
    ).rejects.toBeInstanceOf(ValidationError);

    expect(connect).not.toHaveBeenCalled();
    expect(google.calls).toEqual([]);
  });

  it("propagates a batch update failure without reconciling created folders", async () => {
    const google = new FakeGoogle();
    google.failOn("batchInsert", new Error("internal error"));

    await expect(
      submitStatus({ type: "Daily", profile: "Alpha", date: "2024-06-10", content: "x" }, deps(google))
    ).rejects.toBeInstanceOf(DocumentWriteError);

    expect(folderNamed(google, "status")).toHaveLength(1);
    expect(folderNamed(google, "Alpha")).toHaveLength(1);
  });

  it("propagates authentication failures", async () => {
    const failing: SubmissionDeps = {
      ...deps(new FakeGoogle()),
      connect: async () => {
        throw new AuthenticationError("Google authentication failed: invalid_grant");
      },
    };

    await expect(
      submitStatus({ type: "Daily", profile: "Alpha", date: "2024-06-10", content: "x" }, failing)
    ).rejects.toThrow("Google authentication failed: invalid_grant");
  });

  it("serializes concurrent submissions inside one process", async () => {
    const google = new FakeGoogle();
    const request = { type: "Daily", profile: "Alpha", date: "2024-06-10" };

    const results = await Promise.all([
      submitStatus({ ...request, content: "one" }, deps(google)),
      submitStatus({ ...request, content: "two" }, deps(google)),
    ]);

    expect(folderNamed(google, "status")).toHaveLength(1);
    expect(folderNamed(google, "Alpha")).toHaveLength(1);
    expect(results[1].documentId).toBe(results[0].documentId);
    expect([
      `one\n\n\n${SECTION_SEPARATOR}\n\ntwo\n\n`,
      `two\n\n\n${SECTION_SEPARATOR}\n\none\n\n`,
    ]).toContain(google.documents.get(results[0].documentId));
    expect(results.filter((r) => r.created)).toHaveLength(1);
  });
});
