import { cardFromString, cardsFromString, orderedDeck, type CardId } from "@holdem-rl/holdem-eval";
import type { Chips, HandEvaluator, HandSetup, TableParams } from "../src/index.js";
import { defaultEvaluator } from "../src/index.js";

export const params: TableParams = { smallBlind: 5n, bigBlind: 10n, invalidActionPenalty: 0 };

/**
 * Deck that deals `holes[position]` to each position and then `board`. Dealing goes one card at a
 * time around the table, so first cards come first.
 */
export function riggedDeck(holes: readonly string[], board: string): CardId[] {
  const pairs = holes.map(cardsFromString);
  const top = [...pairs.map((p) => p[0]!), ...pairs.map((p) => p[1]!), ...cardsFromString(board)];
  const used = new Set(top);
  return [...top, ...orderedDeck().filter((c) => !used.has(c))];
}

export function setup(stacks: readonly Chips[], holes: readonly string[], board: string, seating?: readonly number[]): HandSetup {
  return {
    stacks,
    seating: seating ?? stacks.map((_, i) => i),
    deck: riggedDeck(holes, board)
  };
}

export function card(s: string): CardId {
  return cardFromString(s);
}

export function countingEvaluator(): HandEvaluator & { calls: number } {
  const ev = {
    calls: 0,
    strength(cards: readonly CardId[]): number {
      ev.calls += 1;
      return defaultEvaluator.strength(cards);
    }
  };
  return ev;
}

/** Deterministic generator for fuzz-style tests (mulberry32). */
export function prng(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}
