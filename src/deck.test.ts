import { describe, expect, test } from "vitest";
import { deckTitle, linkedRemoteId, parseDeck, renderDeck, serializeDeck } from "./deck.ts";
import { MalformedDeckError } from "./errors.ts";
import { deckDoc } from "./test-helpers.ts";
import type { DeckRecord, RemoteDeckSnapshot } from "./types.ts";

const ID_ROW = "| **Moxfield ID** | X9 |";
const NAME_ROW = "| **Moxfield Name** | Hakbal Merfolk |";

describe("parseDeck", () => {
  test("parses title, metadata and card lines", () => {
    const record = parseDeck(deckDoc());

    expect(record.metadata).toEqual({
      title: "Hakbal Merfolk",
      remoteId: undefined,
      displayName: "Hakbal Merfolk",
      visibility: "public",
      format: "commander",
      commanders: ["Hakbal of the Surging Soul"],
      supersededIds: [],
      syncStatus: undefined,
    });
    expect(record.cards).toEqual([
      { name: "Hakbal of the Surging Soul", quantity: 1, board: "commander" },
      { name: "Sol Ring", quantity: 1, board: "main" },
      { name: "Island", quantity: 10, board: "main" },
      { name: "Forest", quantity: 5, board: "main" },
    ]);
  });

  test("reads the Moxfield link rows", () => {
    const record = parseDeck(
      deckDoc(undefined, ["| **Moxfield ID** | X9 |", "| **Moxfield Name** | Hakbal Online |"]),
    );
    expect(record.metadata.remoteId).toBe("X9");
    expect(record.metadata.displayName).toBe("Hakbal Online");
  });

  test("reads superseded ids, sync status, visibility and format", () => {
    const record = parseDeck(
      deckDoc(undefined, [
        "| **Superseded IDs** | A1, B2 |",
        "| **Sync Status** | pending-import |",
        "| **Visibility** | Unlisted |",
        "| **Format** | Commander |",
      ]),
    );
    expect(record.metadata.supersededIds).toEqual(["A1", "B2"]);
    expect(record.metadata.syncStatus).toBe("pending-import");
    expect(record.metadata.visibility).toBe("unlisted");
    expect(record.metadata.format).toBe("commander");
  });

  test("reads a name-mismatch status and ignores unknown ones", () => {
    expect(parseDeck(deckDoc(undefined, ["| **Sync Status** | name-mismatch |"])).metadata.syncStatus).toBe(
      "name-mismatch",
    );
    expect(parseDeck(deckDoc(undefined, ["| **Sync Status** | done |"])).metadata.syncStatus).toBeUndefined();
  });

  test("treats empty and dash values as absent", () => {
    const record = parseDeck(deckDoc(undefined, ["| **Moxfield ID** |  |", "| **Moxfield Name** | — |"]));
    expect(record.metadata.remoteId).toBeUndefined();
    expect(record.metadata.displayName).toBe("Hakbal Merfolk");
  });

  test("allows a basic land on several lines", () => {
    const record = parseDeck(deckDoc(["1 Sol Ring", "6 Island", "4 Island", "2 Snow-Covered Forest", "1 Snow-Covered Forest"]));
    expect(record.cards.filter((card) => card.name === "Island")).toHaveLength(2);
    expect(record.cards.filter((card) => card.name === "Snow-Covered Forest")).toHaveLength(2);
  });

  test("accepts an x after the quantity and skips comments and blank lines", () => {
    const record = parseDeck(deckDoc(["// ramp", "2x Arcane Signet", "", "1 Xenagos, the Reveler"]));
    expect(record.cards).toEqual([
      { name: "Arcane Signet", quantity: 2, board: "main" },
      { name: "Xenagos, the Reveler", quantity: 1, board: "main" },
    ]);
  });

  test("puts every partner from the Commander row on the commander board", () => {
    const doc = deckDoc(["1 Tymna the Weaver", "1 Thrasios, Triton Hero", "1 Sol Ring"]).replace(
      "| **Commander** | Hakbal of the Surging Soul |",
      "| **Commander** | Tymna the Weaver & Thrasios, Triton Hero |",
    );
    const record = parseDeck(doc);
    expect(record.metadata.commanders).toEqual(["Tymna the Weaver", "Thrasios, Triton Hero"]);
    expect(record.cards.map((card) => card.board)).toEqual(["commander", "commander", "main"]);
  });

  test("handles CRLF line endings", () => {
    const record = parseDeck(deckDoc().replace(/\n/g, "\r\n"));
    expect(record.cards).toHaveLength(4);
    expect(record.cards[3]).toEqual({ name: "Forest", quantity: 5, board: "main" });
    expect(record.metadata.title).toBe("Hakbal Merfolk");
  });

  test("rejects a duplicate non-basic card with its line number", () => {
    const parse = () => parseDeck(deckDoc(["1 Sol Ring", "1 Arcane Signet", "1 sol ring"]));
    expect(parse).toThrow(MalformedDeckError);
    expect(parse).toThrow('line 17: "sol ring" is listed more than once');
  });

  test("rejects a line without a quantity", () => {
    expect(() => parseDeck(deckDoc(["Sol Ring"]))).toThrow(
      'line 15: cannot split "Sol Ring" into a quantity and a card name',
    );
  });

  test("rejects a zero quantity", () => {
    expect(() => parseDeck(deckDoc(["0 Sol Ring"]))).toThrow(
      'line 15: quantity for "Sol Ring" must be at least 1',
    );
  });

  test("rejects an empty decklist", () => {
    expect(() => parseDeck(deckDoc(["// nothing yet"]))).toThrow("decklist is empty");
  });

  test("rejects a document without a decklist block", () => {
    expect(() => parseDeck("# Just a title\n\nSome notes.\n")).toThrow("no decklist code block found");
  });

  test("rejects a decklist block that is never closed", () => {
    expect(() => parseDeck("# Open\n\n```\n1 Sol Ring\n")).toThrow(
      "line 3: decklist code block is never closed",
    );
  });

  test("rejects a linked deck with no name to resync under", () => {
    const doc = "| **Moxfield ID** | X9 |\n\n```\n1 Sol Ring\n```\n";
    expect(() => parseDeck(doc)).toThrow(MalformedDeckError);
    expect(parseDeck(doc, "hakbal").metadata.displayName).toBe("hakbal");
  });

  test("rejects an unknown visibility", () => {
    expect(() => parseDeck(deckDoc(undefined, ["| **Visibility** | secret |"]))).toThrow(
      'unknown visibility "secret"',
    );
  });
});

describe("serializeDeck", () => {
  function withMetadata(doc: string, changes: Partial<DeckRecord["metadata"]>): DeckRecord {
    const record = parseDeck(doc);
    return { ...record, metadata: { ...record.metadata, ...changes } };
  }

  test("inserts the link rows after the last metadata row", () => {
    const doc = deckDoc();
    const out = serializeDeck(withMetadata(doc, { remoteId: "X9" }), doc);
    expect(out).toBe(deckDoc(undefined, [ID_ROW, NAME_ROW]));
  });

  test("updates existing rows in place and appends new ones", () => {
    const doc = deckDoc(undefined, [ID_ROW, NAME_ROW]);
    const out = serializeDeck(withMetadata(doc, { remoteId: "Y2", supersededIds: ["X9"] }), doc);
    expect(out).toBe(
      deckDoc(undefined, ["| **Moxfield ID** | Y2 |", NAME_ROW, "| **Superseded IDs** | X9 |"]),
    );
  });

  test("removes the sync status row once the import has landed", () => {
    const doc = deckDoc(undefined, [ID_ROW, NAME_ROW, "| **Sync Status** | pending-import |"]);
    const out = serializeDeck(withMetadata(doc, { syncStatus: undefined }), doc);
    expect(out).toBe(deckDoc(undefined, [ID_ROW, NAME_ROW]));
  });

  test("leaves an unchanged document byte for byte", () => {
    const doc = deckDoc(undefined, [ID_ROW, NAME_ROW]);
    expect(serializeDeck(parseDeck(doc), doc)).toBe(doc);
  });

  test("creates a metadata table under the title when there is none", () => {
    const doc = "# Solo\n\n```\n1 Sol Ring\n```\n";
    const out = serializeDeck(withMetadata(doc, { remoteId: "Z1" }), doc);
    expect(out).toBe(
      [
        "# Solo",
        "",
        "| | |",
        "|---|---|",
        "| **Moxfield ID** | Z1 |",
        "| **Moxfield Name** | Solo |",
        "",
        "```",
        "1 Sol Ring",
        "```",
        "",
      ].join("\n"),
    );
  });

  test("keeps CRLF line endings", () => {
    const doc = deckDoc().replace(/\n/g, "\r\n");
    const out = serializeDeck(withMetadata(doc, { remoteId: "X9" }), doc);
    expect(out).toBe(deckDoc(undefined, [ID_ROW, NAME_ROW]).replace(/\n/g, "\r\n"));
  });

  test("parse reads back exactly the metadata that was written", () => {
    const doc = deckDoc();
    const record = withMetadata(doc, {
      remoteId: "Y2",
      displayName: "Hakbal Online",
      supersededIds: ["X9", "W1"],
      syncStatus: "pending-import",
    });
    const reparsed = parseDeck(serializeDeck(record, doc));
    expect(reparsed.metadata).toEqual(record.metadata);
    expect(reparsed.cards).toEqual(record.cards);
  });
});

describe("renderDeck", () => {
  const snapshot: RemoteDeckSnapshot = {
    remoteId: "P7",
    internalId: "int-P7",
    name: "Pulled Merfolk",
    version: 4,
    boards: {
      commander: [{ uniqueCardId: "u0", name: "Hakbal of the Surging Soul", quantity: 1 }],
      main: [
        { uniqueCardId: "u1", name: "Sol Ring", quantity: 1 },
        { uniqueCardId: "u2", name: "Island", quantity: 6 },
        { uniqueCardId: "u3", name: "Island", quantity: 4 },
      ],
    },
  };

  test("renders a linked document with merged card lines", () => {
    const doc = renderDeck(snapshot, "2026-10-18");
    expect(doc).toBe(
      [
        "# Pulled Merfolk",
        "",
        "| | |",
        "|---|---|",
        "| **Commander** | Hakbal of the Surging Soul |",
        "| **Date** | 2026-10-18 |",
        "| **Moxfield ID** | P7 |",
        "| **Moxfield Name** | Pulled Merfolk |",
        "",
        "## Strategy",
        "",
        "_Imported from Moxfield. Add strategy notes here._",
        "",
        "## Decklist",
        "",
        "```",
        "1 Hakbal of the Surging Soul",
        "1 Sol Ring",
        "10 Island",
        "```",
        "",
      ].join("\n"),
    );
  });

  test("renders a document that parses back to the same cards", () => {
    const record = parseDeck(renderDeck(snapshot, "2026-10-18"));
    expect(record.metadata.remoteId).toBe("P7");
    expect(record.cards).toEqual([
      { name: "Hakbal of the Surging Soul", quantity: 1, board: "commander" },
      { name: "Sol Ring", quantity: 1, board: "main" },
      { name: "Island", quantity: 10, board: "main" },
    ]);
  });
});

describe("lightweight readers", () => {
  test("deckTitle and linkedRemoteId ignore a broken decklist", () => {
    const doc = "# Broken\n\n| **Moxfield ID** | Q3 |\n\n```\nnot a card line\n```\n";
    expect(deckTitle(doc)).toBe("Broken");
    expect(linkedRemoteId(doc)).toBe("Q3");
  });
});
