import { cardRank, cardSuit, type CardId } from "@holdem-rl/holdem-eval";
import { legalActionsFor } from "./betting.js";
import { MAX_PLAYERS, type ActionKind, type HandState, type PlayerId, type PlayerState, type Street } from "./types.js";

/** Order of the legal-action mask. */
export const ACTION_ORDER: readonly ActionKind[] = ["Check", "Fold", "Bet", "Call"];

export const STREET_INDEX: Readonly<Record<Street, number>> = { preflop: 0, flop: 1, turn: 2, river: 3 };

export const OPPONENT_FIELDS = 6; // position, status, stack, hand commitment, street commitment, all-in

export const ObsIndex = {
  ACTING_PLAYER: 0,
  VALID_ACTIONS: 1, // 4 slots, ACTION_ORDER
  VALID_BET_LOW: 5,
  VALID_BET_HIGH: 6,
  POSITION: 7,
  HOLE_CARDS: 8, // 2 cards x (rank, suit)
  STACK: 12,
  TOTAL_COMMIT: 13,
  STREET_COMMIT: 14,
  STREET: 15,
  BOARD: 16, // 5 cards x (rank, suit)
  POT: 26,
  BET_TO_MATCH: 27,
  MIN_RAISE: 28,
  OPPONENTS: 29
} as const;

export const OBSERVATION_SIZE = ObsIndex.OPPONENTS + OPPONENT_FIELDS * (MAX_PLAYERS - 1);

/** Opponent status codes; 0 marks an empty padding slot. */
export const OpponentStatus = { EMPTY: 0, ACTIVE: 1, FOLDED: 2 } as const;

// rank 2..14, suit 1..4; 0/0 for a card not dealt yet.
function writeCard(obs: Float64Array, offset: number, card: CardId | undefined): void {
  if (card === undefined) return;
  obs[offset] = cardRank(card);
  obs[offset + 1] = cardSuit(card) + 1;
}

/** Opponents of `player`, clockwise starting with the seat to their left. */
export function opponentsClockwise(hand: HandState, player: PlayerState): PlayerState[] {
  const n = hand.seating.length;
  const out: PlayerState[] = [];
  for (let offset = 1; offset < n; offset++) {
    const id = hand.seating[(player.position + offset) % n]!;
    out.push(hand.players[id]!);
  }
  return out;
}

/**
 * Fixed-width view of the hand from one player's seat. Pure: the state is only read. Legal-action
 * fields are filled only when that player is due to act.
 */
export function encodeObservation(hand: HandState, id: PlayerId): Float64Array {
  const obs = new Float64Array(OBSERVATION_SIZE);
  const player = hand.players[id];
  if (player === undefined) throw new RangeError(`Unknown player id ${id}.`);

  obs[ObsIndex.ACTING_PLAYER] = id;
  if (hand.phase === "betting" && hand.actionOn === id) {
    const legal = legalActionsFor(hand, player);
    ACTION_ORDER.forEach((kind, i) => {
      obs[ObsIndex.VALID_ACTIONS + i] = legal.kinds.includes(kind) ? 1 : 0;
    });
    obs[ObsIndex.VALID_BET_LOW] = Number(legal.betLow);
    obs[ObsIndex.VALID_BET_HIGH] = Number(legal.betHigh);
  }

  obs[ObsIndex.POSITION] = player.position;
  writeCard(obs, ObsIndex.HOLE_CARDS, player.holeCards?.[0]);
  writeCard(obs, ObsIndex.HOLE_CARDS + 2, player.holeCards?.[1]);
  obs[ObsIndex.STACK] = Number(player.stack);
  obs[ObsIndex.TOTAL_COMMIT] = Number(player.totalCommit);
  obs[ObsIndex.STREET_COMMIT] = Number(player.streetCommit);
  obs[ObsIndex.STREET] = STREET_INDEX[hand.street];
  for (let i = 0; i < 5; i++) writeCard(obs, ObsIndex.BOARD + 2 * i, hand.board[i]);
  obs[ObsIndex.POT] = Number(hand.pot);
  obs[ObsIndex.BET_TO_MATCH] = Number(hand.betTo);
  obs[ObsIndex.MIN_RAISE] = Number(hand.minRaise);

  opponentsClockwise(hand, player).forEach((opp, i) => {
    const base = ObsIndex.OPPONENTS + i * OPPONENT_FIELDS;
    obs[base] = opp.position;
    obs[base + 1] = opp.status === "active" ? OpponentStatus.ACTIVE : OpponentStatus.FOLDED;
    obs[base + 2] = Number(opp.stack);
    obs[base + 3] = Number(opp.totalCommit);
    obs[base + 4] = Number(opp.streetCommit);
    obs[base + 5] = opp.allIn ? 1 : 0;
  });

  return obs;
}
