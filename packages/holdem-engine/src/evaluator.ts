import { handStrength, type CardId } from "@holdem-rl/holdem-eval";

/**
 * Narrow boundary to the hand ranker. `strength` receives a player's hole cards followed by the
 * board (up to seven cards) and returns a number where lower is stronger; equal hands must return
 * equal numbers.
 */
export interface HandEvaluator {
  strength(cards: readonly CardId[]): number;
}

export const defaultEvaluator: HandEvaluator = {
  strength: handStrength
};
