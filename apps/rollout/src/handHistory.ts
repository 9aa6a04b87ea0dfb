import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { cardToString, type CardId } from "@holdem-rl/holdem-eval";
import type { Action, Chips, EngineEvent } from "@holdem-rl/holdem-engine";

export interface TranscriptOptions {
  /** When set, only this player's hole cards are shown before showdown. */
  trackPlayer?: number | null;
}

function cards(list: readonly CardId[]): string {
  return `[${list.map(cardToString).join(" ")}]`;
}

function allInSuffix(allIn: boolean): string {
  return allIn ? " and is all-in" : "";
}

function describeAction(action: Action, paid: Chips, allIn: boolean): string {
  const who = `player ${action.player}`;
  switch (action.kind) {
    case "Fold":
      return `${who} folds`;
    case "Check":
      return `${who} checks`;
    case "Call":
      return `${who} calls ${paid}${allInSuffix(allIn)}`;
    case "Bet":
      return `${who} bets to ${action.amount}${allInSuffix(allIn)}`;
  }
}

function describe(event: EngineEvent, opts: TranscriptOptions): string[] {
  switch (event.kind) {
    case "HandStarted":
      return [
        `Hand #${event.handId} (${event.seating.length} players)`,
        ...event.seating.map((id, pos) => `Seat ${pos}: player ${id} (${event.stacks[id] ?? 0n} in chips)`)
      ];
    case "BlindPosted":
      return [`player ${event.player} posts ${event.blind} blind ${event.amount}${allInSuffix(event.allIn)}`];
    case "HoleCardsDealt": {
      const track = opts.trackPlayer ?? null;
      if (track !== null && track !== event.player) return [];
      return [`Dealt to player ${event.player} ${cards(event.cards)}`];
    }
    case "ActionSanitized":
      return [`player ${event.player} submitted an invalid action (${event.reason}), penalty ${event.penalty}`];
    case "ActionApplied":
      return [describeAction(event.action, event.paid, event.allIn)];
    case "UncalledBetReturned":
      return [`Uncalled bet (${event.amount}) returned to player ${event.player}`];
    case "StreetAdvanced": {
      const previous = event.board.slice(0, event.board.length - event.cards.length);
      const shown = previous.length > 0 ? `${cards(previous)} ${cards(event.cards)}` : cards(event.cards);
      return [`*** ${event.street.toUpperCase()} *** ${shown}`];
    }
    case "ShowdownReached":
      return [
        "*** SHOWDOWN ***",
        ...event.players.map((p) => `player ${p.player} shows ${cards(p.holeCards)} (strength ${p.strength})`)
      ];
    case "PotAwarded": {
      const { award } = event;
      const shares = award.winners.map((w, i) => `player ${w} collects ${award.shares[i] ?? 0n}`);
      const label = event.potIndex === 0 ? "Main pot" : `Side pot ${event.potIndex}`;
      return [`${label} ${award.amount}: ${shares.join(", ")}`];
    }
    case "HandCompleted":
      return [`Hand complete (${event.reason})`];
  }
}

/** Renders a hand's event log as a human-readable transcript, one line per entry. */
export function formatHandHistory(events: readonly EngineEvent[], opts: TranscriptOptions = {}): string[] {
  return events.flatMap((e) => describe(e, opts));
}

/** Writes `hand-<id>.txt` under `dir`, creating it if needed; returns the file path. */
export function writeHandHistory(dir: string, handId: number, lines: readonly string[]): string {
  mkdirSync(dir, { recursive: true });
  const file = join(dir, `hand-${String(handId).padStart(6, "0")}.txt`);
  writeFileSync(file, `${lines.join("\n")}\n`, "utf8");
  return file;
}
