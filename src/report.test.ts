import { describe, expect, test } from "vitest";
import {
  AuthError,
  ConflictError,
  ImportMismatchError,
  MalformedDeckError,
  NotFoundError,
  ProtocolError,
  TransientError,
  WriteBackError,
} from "./errors.ts";
import { exitCodeFor, formatReport, nextActionFor } from "./report.ts";
import type { SyncOutcome, SyncReport } from "./types.ts";

const failedWith = (error: SyncOutcome["error"]): SyncOutcome => ({
  deck: "x.md",
  state: "failed",
  error,
  detail: error?.message,
});

describe("nextActionFor", () => {
  test("successful outcomes need nothing", () => {
    expect(nextActionFor({ deck: "a.md", state: "created", remoteId: "X9" })).toBeUndefined();
    expect(nextActionFor({ deck: "a.md", state: "unchanged", remoteId: "X9" })).toBeUndefined();
  });

  test("names one action per failure kind", () => {
    expect(nextActionFor(failedWith(new AuthError("expired")))).toBe(
      "re-authenticate: copy a fresh bearer token into MOXFIELD_BEARER_TOKEN",
    );
    expect(nextActionFor(failedWith(new MalformedDeckError("bad line", 3)))).toBe("fix file");
    expect(nextActionFor(failedWith(new NotFoundError("Q1")))).toBe(
      "confirm the deck was deleted on Moxfield, then re-run with --recreate-missing",
    );
    expect(nextActionFor(failedWith(new TransientError("timed out")))).toBe("retry later");
    expect(nextActionFor(failedWith(new ProtocolError("odd body")))).toBe("check the Moxfield response and retry");
    expect(nextActionFor(failedWith(new ConflictError("version mismatch")))).toBe(
      "check the Moxfield response and retry",
    );
  });

  test("a partial sync is retried whatever the error", () => {
    const outcome: SyncOutcome = { ...failedWith(new TransientError("timed out")), partial: true, remoteId: "Y2" };
    expect(nextActionFor(outcome)).toBe("retry import (re-run sync for this deck)");
  });

  test("a file left unwritten after the remote writes is fixed by hand, not re-run", () => {
    const outcome: SyncOutcome = {
      ...failedWith(new WriteBackError("cannot write deck file: EACCES: permission denied")),
      partial: true,
      remoteId: "X9",
    };
    expect(nextActionFor(outcome)).toBe("add Moxfield ID X9 to the file by hand");
  });

  test("cards renamed on import are fixed in the file", () => {
    const outcome: SyncOutcome = {
      ...failedWith(new ImportMismatchError("X9", ["+1 Delver of Secrets"])),
      partial: true,
      remoteId: "X9",
    };
    expect(outcome.detail).toBe("X9 does not match the file after import: +1 Delver of Secrets");
    expect(nextActionFor(outcome)).toBe(
      "rename the listed cards in the file to the names Moxfield uses, then re-run sync",
    );
  });
});

describe("formatReport", () => {
  test("prints one line per deck, then the totals", () => {
    const report: SyncReport = {
      outcomes: [
        { deck: "a.md", state: "created", remoteId: "X9" },
        { deck: "b.md", state: "unchanged", remoteId: "B1" },
        {
          deck: "c.md",
          state: "failed",
          error: new NotFoundError("Q1"),
          detail: "Moxfield deck Q1 no longer exists",
        },
        {
          deck: "d.md",
          state: "failed",
          partial: true,
          remoteId: "Y2",
          error: new TransientError("timed out", undefined, false),
          detail: "created Y2 but the card import failed: timed out",
        },
      ],
      skipped: [],
    };

    expect(formatReport(report).split("\n")).toEqual([
      "created          a.md  id=X9",
      "unchanged        b.md  id=B1",
      "failed           c.md  error: Moxfield deck Q1 no longer exists  " +
        "next: confirm the deck was deleted on Moxfield, then re-run with --recreate-missing",
      "failed (partial) d.md  id=Y2  error: created Y2 but the card import failed: timed out  " +
        "next: retry import (re-run sync for this deck)",
      "Done: 1 created, 1 unchanged, 0 superseded, 2 failed, 0 skipped",
    ]);
  });
});

describe("exitCodeFor", () => {
  test("is 0 when every deck succeeded", () => {
    expect(
      exitCodeFor({
        outcomes: [
          { deck: "a.md", state: "created", remoteId: "X9" },
          { deck: "b.md", state: "superseded", remoteId: "Y2", orphanedId: "X1" },
        ],
        skipped: [],
      }),
    ).toBe(0);
  });

  test("is 1 when any deck failed", () => {
    expect(exitCodeFor({ outcomes: [failedWith(new TransientError("timed out"))], skipped: [] })).toBe(1);
  });

  test("is 1 when decks were skipped", () => {
    expect(exitCodeFor({ outcomes: [], skipped: ["a.md"], abortReason: new AuthError("expired") })).toBe(1);
  });
});
