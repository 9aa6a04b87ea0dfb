export {
  type CardId,
  type Rank,
  type Suit,
  DECK_SIZE,
  assertValidCardId,
  cardFromString,
  cardIdFromRankSuit,
  cardRank,
  cardSuit,
  cardToString,
  cardsFromString,
  isValidCardId,
  orderedDeck
} from "./cards.js";
export { HandCategory, type HandRank, compareHandRank, handScore, strengthFromRank } from "./handRank.js";
export { evaluate5, evaluate7, evaluateBest, handStrength, winners } from "./evaluate.js";
