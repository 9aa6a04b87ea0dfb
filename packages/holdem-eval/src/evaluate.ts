import { assertValidCardId, cardRank, cardSuit, type CardId, type Rank } from "./cards.js";
import { compareHandRank, strengthFromRank, type HandRank, HandCategory } from "./handRank.js";

function assertDistinct(cards: readonly CardId[], label: string): void {
  const seen = new Set<number>();
  for (const c of cards) {
    assertValidCardId(c);
    if (seen.has(c)) {
      throw new RangeError(`${label} contains duplicate card id ${c}.`);
    }
    seen.add(c);
  }
}

function straightHigh(uniqueRanksDesc: readonly Rank[]): Rank | null {
  if (uniqueRanksDesc.length !== 5) return null;

  // Wheel (A-5) plays the five as its high card.
  const [first, second, third, fourth, fifth] = uniqueRanksDesc;
  if (first === 14 && second === 5 && third === 4 && fourth === 3 && fifth === 2) return 5;

  for (let i = 1; i < uniqueRanksDesc.length; i += 1) {
    if (uniqueRanksDesc[i - 1]! - 1 !== uniqueRanksDesc[i]!) return null;
  }
  return first ?? null;
}

export function evaluate5(cards5: readonly CardId[]): HandRank {
  if (cards5.length !== 5) {
    throw new RangeError(`evaluate5 expected 5 cards, got ${cards5.length}.`);
  }
  assertDistinct(cards5, "cards5");

  const suits = cards5.map(cardSuit);
  const isFlush = suits.every((s) => s === suits[0]);

  const ranks = cards5.map(cardRank).sort((a, b) => b - a);
  const counts = new Map<Rank, number>();
  for (const r of ranks) counts.set(r, (counts.get(r) ?? 0) + 1);

  const uniqueRanksDesc = Array.from(counts.keys()).sort((a, b) => b - a);
  const high = straightHigh(uniqueRanksDesc);

  const groups = Array.from(counts.entries())
    .map(([rank, count]) => ({ rank, count }))
    .sort((a, b) => (b.count !== a.count ? b.count - a.count : b.rank - a.rank));
  const top = groups[0]!;
  const next = groups[1];
  const singles = groups.filter((g) => g.count === 1).map((g) => g.rank);

  if (high !== null && isFlush) {
    return { category: HandCategory.StraightFlush, tiebreakers: [high] };
  }
  if (top.count === 4) {
    return { category: HandCategory.Quads, tiebreakers: [top.rank, ...singles] };
  }
  if (top.count === 3 && next?.count === 2) {
    return { category: HandCategory.FullHouse, tiebreakers: [top.rank, next.rank] };
  }
  if (isFlush) {
    return { category: HandCategory.Flush, tiebreakers: ranks };
  }
  if (high !== null) {
    return { category: HandCategory.Straight, tiebreakers: [high] };
  }
  if (top.count === 3) {
    return { category: HandCategory.Trips, tiebreakers: [top.rank, ...singles] };
  }
  if (top.count === 2 && next?.count === 2) {
    return { category: HandCategory.TwoPair, tiebreakers: [top.rank, next.rank, ...singles] };
  }
  if (top.count === 2) {
    return { category: HandCategory.OnePair, tiebreakers: [top.rank, ...singles] };
  }
  return { category: HandCategory.HighCard, tiebreakers: ranks };
}

function* fiveCardSubsets(cards: readonly CardId[]): Generator<CardId[]> {
  const n = cards.length;
  for (let a = 0; a < n - 4; a += 1)
    for (let b = a + 1; b < n - 3; b += 1)
      for (let c = b + 1; c < n - 2; c += 1)
        for (let d = c + 1; d < n - 1; d += 1)
          for (let e = d + 1; e < n; e += 1) yield [cards[a]!, cards[b]!, cards[c]!, cards[d]!, cards[e]!];
}

/** Best five-card hand out of 5, 6 or 7 cards. */
export function evaluateBest(cards: readonly CardId[]): HandRank {
  if (cards.length < 5 || cards.length > 7) {
    throw new RangeError(`evaluateBest expected 5-7 cards, got ${cards.length}.`);
  }
  assertDistinct(cards, "cards");

  let best: HandRank | null = null;
  for (const five of fiveCardSubsets(cards)) {
    const rank = evaluate5(five);
    if (best === null || compareHandRank(rank, best) === 1) best = rank;
  }
  if (best === null) throw new RangeError("evaluateBest found no five-card subset.");
  return best;
}

export function evaluate7(cards7: readonly CardId[]): HandRank {
  if (cards7.length !== 7) {
    throw new RangeError(`evaluate7 expected 7 cards, got ${cards7.length}.`);
  }
  return evaluateBest(cards7);
}

/** Lower is stronger; see strengthFromRank. */
export function handStrength(cards: readonly CardId[]): number {
  return strengthFromRank(evaluateBest(cards));
}

export function winners(
  board5: readonly CardId[],
  holeCardsByPlayer: ReadonlyMap<number, readonly [CardId, CardId]>
): number[] {
  if (board5.length !== 5) {
    throw new RangeError(`winners expected 5 board cards, got ${board5.length}.`);
  }
  assertDistinct(board5, "board5");

  let best: HandRank | null = null;
  let bestPlayers: number[] = [];

  for (const [player, hole] of holeCardsByPlayer) {
    const rank = evaluate7([...board5, hole[0], hole[1]]);
    const cmp = best === null ? 1 : compareHandRank(rank, best);
    if (cmp === 1) {
      best = rank;
      bestPlayers = [player];
    } else if (cmp === 0) {
      bestPlayers.push(player);
    }
  }

  return bestPlayers.sort((a, b) => a - b);
}
