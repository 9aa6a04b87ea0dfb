import { readFileSync } from "node:fs";
import { cardRank, cardSuit, type CardId } from "@holdem-rl/holdem-eval";
import { z } from "zod";

export type PreflopTier = "premium" | "strong" | "playable" | "marginal" | "trash";

const TierFileSchema = z.object({
  premium: z.array(z.string()),
  strong: z.array(z.string()),
  playable: z.array(z.string()),
  marginal: z.array(z.string())
});

// Rank to display char, for lookup keys
const R = ["", "", "2", "3", "4", "5", "6", "7", "8", "9", "T", "J", "Q", "K", "A"] as const;

export function handKey(c1: CardId, c2: CardId): string {
  const r1 = cardRank(c1);
  const r2 = cardRank(c2);
  const hi = Math.max(r1, r2);
  const lo = Math.min(r1, r2);
  if (hi === lo) return `${R[hi]}${R[lo]}`;
  const suited = cardSuit(c1) === cardSuit(c2);
  return `${R[hi]}${R[lo]}${suited ? "s" : "o"}`;
}

function loadTiers(): Map<string, PreflopTier> {
  const raw: unknown = JSON.parse(readFileSync(new URL("../../data/preflop-tiers.json", import.meta.url), "utf8"));
  const file = TierFileSchema.parse(raw);
  const tiers = new Map<string, PreflopTier>();
  for (const tier of ["premium", "strong", "playable", "marginal"] as const) {
    for (const hand of file[tier]) tiers.set(hand, tier);
  }
  return tiers;
}

// Anything not listed is "trash".
const TIERS = loadTiers();

export function preflopTier(c1: CardId, c2: CardId): PreflopTier {
  return TIERS.get(handKey(c1, c2)) ?? "trash";
}
