export type CardId = number; // 0..51, suit-major: suit * 13 + (rank - 2)

export type Suit = 0 | 1 | 2 | 3;

export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14; // 14 = Ace

export const DECK_SIZE = 52;

const RANK_CHARS = ["2", "3", "4", "5", "6", "7", "8", "9", "T", "J", "Q", "K", "A"] as const;
const SUIT_CHARS = ["c", "d", "h", "s"] as const;
const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];
const SUITS: readonly Suit[] = [0, 1, 2, 3];

export function isValidCardId(card: unknown): card is CardId {
  return typeof card === "number" && Number.isInteger(card) && card >= 0 && card < DECK_SIZE;
}

export function assertValidCardId(card: CardId): void {
  if (!isValidCardId(card)) {
    throw new RangeError(`Invalid card id ${card}; expected integer in [0, 51].`);
  }
}

export function cardSuit(card: CardId): Suit {
  assertValidCardId(card);
  return SUITS[Math.floor(card / 13)]!;
}

export function cardRank(card: CardId): Rank {
  assertValidCardId(card);
  return RANKS[card % 13]!;
}

export function cardIdFromRankSuit(rank: Rank, suit: Suit): CardId {
  if (!Number.isInteger(rank) || rank < 2 || rank > 14) {
    throw new RangeError(`Invalid rank ${rank}; expected integer in [2, 14].`);
  }
  if (!Number.isInteger(suit) || suit < 0 || suit > 3) {
    throw new RangeError(`Invalid suit ${suit}; expected integer in [0, 3].`);
  }
  return suit * 13 + (rank - 2);
}

export function cardToString(card: CardId): string {
  return `${RANK_CHARS[cardRank(card) - 2]}${SUIT_CHARS[cardSuit(card)]}`;
}

export function cardFromString(s: string): CardId {
  if (s.length !== 2) {
    throw new TypeError(`Invalid card string ${JSON.stringify(s)}; expected like "As" or "2c".`);
  }

  const rankIndex = RANK_CHARS.findIndex((c) => c === s[0]?.toUpperCase());
  if (rankIndex === -1) {
    throw new RangeError(`Invalid rank character in ${JSON.stringify(s)}.`);
  }
  const suitIndex = SUIT_CHARS.findIndex((c) => c === s[1]?.toLowerCase());
  if (suitIndex === -1) {
    throw new RangeError(`Invalid suit character in ${JSON.stringify(s)}.`);
  }
  return suitIndex * 13 + rankIndex;
}

/** Parses a whitespace-separated list such as "As Kd 7c". */
export function cardsFromString(s: string): CardId[] {
  return s
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map(cardFromString);
}

/** A fresh deck in id order; callers shuffle it themselves. */
export function orderedDeck(): CardId[] {
  return Array.from({ length: DECK_SIZE }, (_, i) => i);
}
