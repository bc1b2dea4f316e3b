import { formatChanges } from "./diff.ts";
import type { DeckPreview, SyncOutcome, SyncReport } from "./types.ts";

/** The concrete thing an operator should do about a deck, if anything. */
export function nextActionFor(outcome: SyncOutcome): string | undefined {
  if (outcome.state !== "failed") return undefined;

  const kind = outcome.error?.kind;
  if (kind === "write-back") {
    // Re-running would create the deck a second time.
    return `add Moxfield ID ${outcome.remoteId ?? "?"} to the file by hand`;
  }
  if (kind === "import-mismatch") {
    return "rename the listed cards in the file to the names Moxfield uses, then re-run sync";
  }
  if (outcome.partial) return "retry import (re-run sync for this deck)";

  switch (kind) {
    case "auth":
      return "re-authenticate: copy a fresh bearer token into MOXFIELD_BEARER_TOKEN";
    case "malformed-deck":
      return "fix file";
    case "not-found":
      return "confirm the deck was deleted on Moxfield, then re-run with --recreate-missing";
    case "transient":
      return "retry later";
    case "conflict":
    case "protocol":
    case undefined:
      return "check the Moxfield response and retry";
  }
}

function outcomeLine(outcome: SyncOutcome): string {
  const state = outcome.partial ? "failed (partial)" : outcome.state;
  const parts = [`${state.padEnd(16)} ${outcome.deck}`];
  if (outcome.remoteId) parts.push(`id=${outcome.remoteId}`);
  if (outcome.orphanedId) parts.push(`orphaned=${outcome.orphanedId} (delete it on Moxfield if unwanted)`);
  if (outcome.state === "failed" && outcome.detail) parts.push(`error: ${outcome.detail}`);
  const action = nextActionFor(outcome);
  if (action) parts.push(`next: ${action}`);
  return parts.join("  ");
}

/** Summary table of a sync run: one line per deck, then skipped decks and totals. */
export function formatReport(report: SyncReport): string {
  const lines = report.outcomes.map(outcomeLine);

  if (report.abortReason) {
    lines.push(`Aborted: ${report.abortReason.message}`);
  }
  for (const deck of report.skipped) {
    lines.push(`${"skipped".padEnd(16)} ${deck}`);
  }

  const count = (state: SyncOutcome["state"]) =>
    report.outcomes.filter((outcome) => outcome.state === state).length;
  lines.push(
    `Done: ${count("created")} created, ${count("unchanged")} unchanged, ` +
      `${count("superseded")} superseded, ${count("failed")} failed, ${report.skipped.length} skipped`,
  );

  const orphaned = report.outcomes.flatMap((outcome) => (outcome.orphanedId ? [outcome.orphanedId] : []));
  if (orphaned.length > 0) {
    lines.push(`Orphaned Moxfield decks: ${orphaned.join(", ")}`);
  }
  return lines.join("\n");
}

/** Exit status for a run: 0 only when every deck ended created, unchanged or superseded. */
export function exitCodeFor(report: SyncReport): number {
  if (report.abortReason || report.skipped.length > 0) return 1;
  return report.outcomes.some((outcome) => outcome.state === "failed") ? 1 : 0;
}

/** Dry-run listing: the action each deck would take. */
export function formatPreview(previews: DeckPreview[]): string {
  return previews
    .map(({ deck, plan, record, error }) => {
      if (error || !plan) {
        return `${"error".padEnd(16)} ${deck}  ${error?.message ?? "no plan"}`;
      }
      const name = record ? `"${record.metadata.displayName}"` : "";
      switch (plan.action) {
        case "create":
          return `${"would create".padEnd(16)} ${deck}  ${name}${
            plan.reason === "missing-remote" ? " (linked deck is missing)" : ""
          }`;
        case "skip":
          return `${"up to date".padEnd(16)} ${deck}  id=${plan.snapshot.remoteId}`;
        case "complete-import":
          return `${"would import".padEnd(16)} ${deck}  id=${plan.snapshot.remoteId}`;
        case "hold":
          return `${"held".padEnd(16)} ${deck}  id=${plan.snapshot.remoteId}  ${formatChanges(
            plan.changes,
          ).join(", ")}`;
        case "supersede":
          return `${"would supersede".padEnd(16)} ${deck}  id=${plan.snapshot.remoteId}  ${formatChanges(
            plan.changes,
          ).join(", ")}`;
      }
    })
    .join("\n");
}
