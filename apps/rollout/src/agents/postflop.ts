import { cardRank, cardSuit, evaluateBest, HandCategory, type CardId } from "@holdem-rl/holdem-eval";

export type PostflopStrength = "monster" | "strong" | "medium" | "draw" | "weak";

// Four of one suit among hole and board cards.
function flushDraw(cards: readonly CardId[]): boolean {
  const bySuit = new Map<number, number>();
  for (const c of cards) bySuit.set(cardSuit(c), (bySuit.get(cardSuit(c)) ?? 0) + 1);
  return [...bySuit.values()].includes(4);
}

// Four ranks inside some five-rank window; the ace also counts low.
function straightDraw(cards: readonly CardId[]): boolean {
  let mask = 0;
  for (const c of cards) {
    const rank = cardRank(c);
    mask |= 1 << rank;
    if (rank === 14) mask |= 1 << 1;
  }
  for (let low = 1; low <= 10; low++) {
    const window = (mask >> low) & 0b11111;
    let bits = 0;
    for (let w = window; w > 0; w &= w - 1) bits++;
    if (bits === 4) return true;
  }
  return false;
}

/**
 * Buckets a made hand against the board: two pair or better is a monster, an overpair or top pair
 * with a queen-or-better kicker is strong, any other pair is medium.
 */
export function categorizePostflop(hole: readonly [CardId, CardId], board: readonly CardId[]): PostflopStrength {
  const cards = [...hole, ...board];
  if (cards.length < 5) return "weak";

  const { category, tiebreakers } = evaluateBest(cards);
  if (category >= HandCategory.TwoPair) return "monster";
  if (category === HandCategory.OnePair) {
    const [pair = 0, kicker = 0] = tiebreakers;
    const boardHigh = board.reduce((hi, c) => Math.max(hi, cardRank(c)), 0);
    if (pair > boardHigh || (pair === boardHigh && kicker >= 12)) return "strong";
    return "medium";
  }
  return flushDraw(cards) || straightDraw(cards) ? "draw" : "weak";
}
