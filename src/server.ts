import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { describeError } from "./errors.ts";
import type { DeckRemote } from "./moxfield.ts";
import { formatPreview, formatReport } from "./report.ts";
import { fileDeckSource, listDeckFiles, resolveDeckQuery } from "./store.ts";
import { previewSource, syncAll, syncSource } from "./sync.ts";

export type Exclusive = <T>(task: () => Promise<T>) => Promise<T>;

/** Shared by every MCP server instance, including the per-request HTTP ones. */
export type ToolContext = {
  remote: DeckRemote;
  owner: string;
  decksDir: string;
  /** Runs sync tasks one after another so two tool calls never write the same deck at once. */
  exclusive: Exclusive;
};

/** A queue that runs tasks strictly one at a time, in call order. */
export function createExclusive(): Exclusive {
  let tail: Promise<unknown> = Promise.resolve();
  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task, task);
    // The caller sees failures through `run`; the queue only needs to know it settled.
    tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };
}

function text(message: string): CallToolResult {
  return { content: [{ type: "text", text: message }] };
}

/**
 * Create an MCP server with the deck sync tools registered.
 * Returns a new McpServer instance -- call this once per transport.
 */
export function createMcpServer(context: ToolContext): McpServer {
  const { remote, owner, decksDir, exclusive } = context;
  const server = new McpServer({
    name: "deck-sync",
    version: "1.0.0",
  });

  const deckInput = z
    .string()
    .describe("Deck file path, file name or deck title (fuzzy matched against the decks directory)");

  server.registerTool(
    "list_remote_decks",
    {
      title: "List Moxfield Decks",
      description:
        `List every public deck ${owner} owns on Moxfield, with its public id and format. ` +
        "Only decks listed here can be verified or superseded by a sync.",
    },
    async () => {
      try {
        const decks = await remote.listOwnedDecks(owner);
        if (decks.length === 0) {
          return text(`No decks found on Moxfield for ${owner}.`);
        }
        return text(JSON.stringify(decks, null, 2));
      } catch (err) {
        return text(`Listing failed: ${describeError(err)}`);
      }
    },
  );

  server.registerTool(
    "plan_deck_sync",
    {
      title: "Plan Deck Sync",
      description:
        "Dry run for one local deck: reports whether a sync would create it on Moxfield, " +
        "skip it as up to date, or supersede the linked Moxfield deck (and which cards differ). " +
        "Writes nothing.",
      inputSchema: {
        deck: deckInput,
        recreateMissing: z
          .boolean()
          .optional()
          .default(false)
          .describe("Plan to re-create a linked deck that no longer exists on Moxfield"),
      },
    },
    async ({ deck, recreateMissing }) => {
      try {
        const filePath = await resolveDeckQuery(decksDir, deck);
        if (!filePath) {
          return text(`No deck found matching "${deck}" in ${decksDir}.`);
        }
        const preview = await previewSource(remote, fileDeckSource(filePath), { recreateMissing });
        return text(formatPreview([preview]));
      } catch (err) {
        return text(`Planning failed: ${describeError(err)}`);
      }
    },
  );

  server.registerTool(
    "sync_deck",
    {
      title: "Sync Deck",
      description:
        "Push one local deck to Moxfield. Unlinked decks are created; unchanged decks are left alone; " +
        "changed decks are re-created as a new Moxfield deck because Moxfield cannot remove cards. " +
        "The old deck is reported as orphaned, never deleted.",
      inputSchema: {
        deck: deckInput,
        recreateMissing: z
          .boolean()
          .optional()
          .default(false)
          .describe("Re-create a linked deck that was deleted on Moxfield (operator confirmed)"),
      },
    },
    async ({ deck, recreateMissing }) => {
      try {
        const filePath = await resolveDeckQuery(decksDir, deck);
        if (!filePath) {
          return text(`No deck found matching "${deck}" in ${decksDir}.`);
        }
        const outcome = await exclusive(() =>
          syncSource(remote, fileDeckSource(filePath), { recreateMissing }),
        );
        return text(formatReport({ outcomes: [outcome], skipped: [] }));
      } catch (err) {
        return text(`Sync failed: ${describeError(err)}`);
      }
    },
  );

  server.registerTool(
    "sync_all_decks",
    {
      title: "Sync All Decks",
      description:
        "Push every deck in the decks directory to Moxfield, one at a time. " +
        "Stops early if the bearer token has expired.",
      inputSchema: {
        recreateMissing: z.boolean().optional().default(false),
      },
    },
    async ({ recreateMissing }) => {
      try {
        const files = await listDeckFiles(decksDir);
        if (files.length === 0) {
          return text(`No deck files found in ${decksDir}.`);
        }
        const report = await exclusive(() =>
          syncAll(remote, owner, files.map(fileDeckSource), { recreateMissing }),
        );
        return text(formatReport(report));
      } catch (err) {
        return text(`Sync failed: ${describeError(err)}`);
      }
    },
  );

  return server;
}
