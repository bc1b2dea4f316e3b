import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import {
  AuthError,
  ConflictError,
  DeckSyncError,
  NotFoundError,
  ProtocolError,
  TransientError,
} from "./errors.ts";
import type {
  CardLine,
  RemoteCardEntry,
  RemoteDeckRef,
  RemoteDeckSnapshot,
  RemoteDeckSummary,
  Visibility,
} from "./types.ts";

export const MOXFIELD_API = "https://api2.moxfield.com";
export const MOXFIELD_WEB = "https://moxfield.com";
export const DEFAULT_CLIENT_VERSION = "2026.02.16.1";

/** The only visibility that makes a new deck appear in owner listings. */
export const DISCOVERABLE_VISIBILITY: Visibility = "public";

// Moxfield's edge rejects requests that do not look like they come from its web app.
const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_PAGE_SIZE = 100;
const MIN_REQUEST_INTERVAL_MS = 100;

// Write statuses that mean the request was turned away before it was processed.
const SAFE_WRITE_RETRY_STATUSES = new Set([429, 503]);

/** Everything the sync engine needs from the remote service. */
export interface DeckRemote {
  listOwnedDecks(owner: string): Promise<RemoteDeckSummary[]>;
  fetchDeck(remoteId: string): Promise<RemoteDeckSnapshot>;
  createDeck(name: string, format: string, visibility: Visibility): Promise<RemoteDeckRef>;
  importCards(ref: RemoteDeckRef, cards: CardLine[]): Promise<RemoteDeckSnapshot>;
}

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 3, baseDelayMs: 500 };

export type MoxfieldClientOptions = {
  /** Bearer token copied from a logged-in moxfield.com session. */
  token: string;
  apiBase?: string;
  clientVersion?: string;
  timeoutMs?: number;
  pageSize?: number;
  retry?: RetryPolicy;
  minRequestIntervalMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

// -- Response schemas --

const DeckSummarySchema = z.object({
  id: z.string().min(1),
  publicId: z.string().min(1),
  name: z.string(),
  format: z.string(),
  visibility: z.string().optional(),
});

const DeckListPageSchema = z.object({
  pageNumber: z.number().int(),
  totalPages: z.number().int(),
  data: z.array(DeckSummarySchema),
});

const CardEntrySchema = z.object({
  quantity: z.number().int().nonnegative(),
  card: z.object({
    name: z.string().min(1),
    uniqueCardId: z.string().min(1).optional(),
  }),
});

const BoardSchema = z.object({
  cards: z.record(z.string(), CardEntrySchema),
});

const DeckSchema = z.object({
  id: z.string().min(1),
  publicId: z.string().min(1),
  name: z.string(),
  version: z.number().int(),
  boards: z.object({
    mainboard: BoardSchema,
    commanders: BoardSchema,
  }),
});

const CreatedDeckSchema = z.object({
  id: z.string().min(1).optional(),
  publicId: z.string().min(1),
});

const ErrorBodySchema = z.object({
  title: z.string().optional(),
  detail: z.string().optional(),
  message: z.string().optional(),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ProtocolError(
      `Unexpected ${what} response from Moxfield${where}: ${issue?.message ?? "invalid body"}`,
    );
  }
  return result.data;
}

function toEntries(board: z.infer<typeof BoardSchema>): RemoteCardEntry[] {
  return Object.entries(board.cards)
    .filter(([, entry]) => entry.quantity > 0)
    .map(([key, entry]) => ({
      uniqueCardId: entry.card.uniqueCardId ?? key,
      name: entry.card.name,
      quantity: entry.quantity,
    }));
}

/** Convert a validated Moxfield deck body into a snapshot. Exported for testing. */
export function toSnapshot(raw: unknown): RemoteDeckSnapshot {
  const deck = parseBody(DeckSchema, raw, "deck");
  return {
    remoteId: deck.publicId,
    internalId: deck.id,
    name: deck.name,
    version: deck.version,
    boards: {
      main: toEntries(deck.boards.mainboard),
      commander: toEntries(deck.boards.commanders),
    },
  };
}

/**
 * Build the text body for Moxfield's bulk import. Commanders go under a
 * "Commander" header so the importer puts them in the command zone.
 */
export function formatImportText(cards: CardLine[]): string {
  for (const card of cards) {
    if (!Number.isInteger(card.quantity) || card.quantity < 1) {
      throw new RangeError(`Refusing to import ${card.quantity} ${card.name}: imports can only add cards`);
    }
  }
  const line = (card: CardLine) => `${card.quantity} ${card.name}`;
  const commanders = cards.filter((card) => card.board === "commander").map(line);
  const main = cards.filter((card) => card.board === "main").map(line);

  if (commanders.length === 0) return main.join("\n");
  return ["Commander", ...commanders, "", "Deck", ...main].join("\n");
}

/**
 * Run `operation`, retrying TransientErrors marked retryable with exponential
 * backoff. Every other error is rethrown immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  sleep: (ms: number) => Promise<void>,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!(err instanceof TransientError) || !err.retryable || attempt >= policy.attempts) {
        throw err;
      }
      await sleep(policy.baseDelayMs * 2 ** (attempt - 1));
    }
  }
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

type Method = "GET" | "POST";

/**
 * Typed client for the parts of Moxfield's API the sync engine uses.
 *
 * The bearer token is fixed at construction and never refreshed: an expired
 * token surfaces as AuthError and a human has to extract a new one.
 */
export class MoxfieldClient implements DeckRemote {
  private readonly apiBase: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly retry: RetryPolicy;
  private readonly minRequestIntervalMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRequestTime = 0;

  constructor(options: MoxfieldClientOptions) {
    if (!options.token) {
      throw new AuthError("A Moxfield bearer token is required");
    }
    this.apiBase = (options.apiBase ?? MOXFIELD_API).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.minRequestIntervalMs = options.minRequestIntervalMs ?? MIN_REQUEST_INTERVAL_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.headers = {
      Authorization: `Bearer ${options.token}`,
      Accept: "application/json, text/plain, */*",
      "Content-Type": "application/json",
      "User-Agent": BROWSER_USER_AGENT,
      Origin: MOXFIELD_WEB,
      Referer: `${MOXFIELD_WEB}/`,
      "x-moxfield-version": options.clientVersion ?? DEFAULT_CLIENT_VERSION,
    };
  }

  /** Every deck owned by `owner`, following pagination to the last page. */
  async listOwnedDecks(owner: string): Promise<RemoteDeckSummary[]> {
    const decks: RemoteDeckSummary[] = [];
    for (let pageNumber = 1; ; pageNumber++) {
      const params = new URLSearchParams({
        pageNumber: String(pageNumber),
        pageSize: String(this.pageSize),
      });
      const body = await this.request("GET", `/v2/users/${encodeURIComponent(owner)}/decks?${params}`);
      const page = parseBody(DeckListPageSchema, body, "deck list");

      for (const deck of page.data) {
        decks.push({
          remoteId: deck.publicId,
          internalId: deck.id,
          name: deck.name,
          format: deck.format,
          visibility: deck.visibility,
        });
      }
      if (page.data.length === 0 || page.pageNumber >= page.totalPages) {
        return decks;
      }
    }
  }

  /** Fetch a full deck by public (or internal) id. */
  async fetchDeck(remoteId: string): Promise<RemoteDeckSnapshot> {
    try {
      return toSnapshot(await this.request("GET", `/v3/decks/all/${encodeURIComponent(remoteId)}`));
    } catch (err) {
      if (err instanceof ProtocolError && err.status === 404) {
        throw new NotFoundError(remoteId);
      }
      throw err;
    }
  }

  /**
   * Create an empty deck. Only the discoverable visibility is accepted: a
   * deck created any other way could never be listed, verified or superseded.
   */
  async createDeck(name: string, format: string, visibility: Visibility): Promise<RemoteDeckRef> {
    if (visibility !== DISCOVERABLE_VISIBILITY) {
      throw new ProtocolError(
        `Decks must be created as "${DISCOVERABLE_VISIBILITY}" to stay discoverable, got "${visibility}"`,
      );
    }
    if (!name.trim()) {
      throw new ProtocolError("Cannot create a deck without a name");
    }

    const body = await this.request("POST", "/v3/decks", { name, format, visibility });
    const created = parseBody(CreatedDeckSchema, body, "create deck");
    if (created.id) {
      return { remoteId: created.publicId, internalId: created.id };
    }
    try {
      const deck = await this.fetchDeck(created.publicId);
      return { remoteId: deck.remoteId, internalId: deck.internalId };
    } catch (err) {
      if (!(err instanceof DeckSyncError)) throw err;
      // The deck exists now, so its public id must reach the caller; importCards retries the lookup.
      return { remoteId: created.publicId };
    }
  }

  /**
   * Append cards to a deck. This is the only card write Moxfield supports:
   * it cannot remove or shrink a line, and sending the same text twice
   * doubles every quantity.
   */
  async importCards(ref: RemoteDeckRef, cards: CardLine[]): Promise<RemoteDeckSnapshot> {
    const importText = formatImportText(cards);
    const internalId = ref.internalId ?? (await this.fetchDeck(ref.remoteId)).internalId;
    const body = await this.request(
      "POST",
      `/v2/decks/${encodeURIComponent(internalId)}/import`,
      { importText },
    );
    try {
      return toSnapshot(body);
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      // Import accepted but the body is not a full deck; read it back instead.
      return this.fetchDeck(ref.remoteId);
    }
  }

  private async throttle(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;
    if (elapsed < this.minRequestIntervalMs) {
      await this.sleep(this.minRequestIntervalMs - elapsed);
    }
    this.lastRequestTime = Date.now();
  }

  private request(method: Method, path: string, body?: unknown): Promise<unknown> {
    return withRetry(() => this.send(method, path, body), this.retry, this.sleep);
  }

  private async send(method: Method, path: string, body?: unknown): Promise<unknown> {
    await this.throttle();
    const label = `${method} ${path}`;

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(`${this.apiBase}${path}`, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (err) {
      // A write that timed out may still have been applied server-side.
      const retryable = method === "GET";
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new TransientError(`${label} timed out after ${this.timeoutMs}ms`, undefined, retryable);
      }
      throw new TransientError(
        `${label} failed: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        retryable,
      );
    }

    if (!response.ok) {
      throw this.errorFor(method, label, response.status, text);
    }
    if (text.trim() === "") {
      return undefined;
    }
    const parsed = tryParseJson(text);
    if (parsed === undefined) {
      throw new ProtocolError(`${label} returned a body that is not JSON`, response.status);
    }
    return parsed;
  }

  private errorFor(method: Method, label: string, status: number, text: string): DeckSyncError {
    const details = ErrorBodySchema.safeParse(tryParseJson(text));
    const reason = details.success
      ? details.data.detail ?? details.data.title ?? details.data.message
      : undefined;
    const message = `${label} returned ${status}${reason ? `: ${reason}` : ""}`;

    if (status === 401 || status === 403) {
      return new AuthError(`${message} (bearer token may be expired)`, status);
    }
    if (status === 409 || status === 412) {
      return new ConflictError(message, status);
    }
    if (status === 429 || status >= 500) {
      const retryable = method === "GET" || SAFE_WRITE_RETRY_STATUSES.has(status);
      return new TransientError(message, status, retryable);
    }
    return new ProtocolError(message, status);
  }
}
