import { cardIdFromRankSuit, type CardId, type Rank, type Suit } from "@holdem-rl/holdem-eval";
import {
  ACTION_ORDER,
  MAX_PLAYERS,
  OPPONENT_FIELDS,
  ObsIndex,
  OpponentStatus,
  type ActionKind,
  type Street
} from "@holdem-rl/holdem-engine";

export type PositionClass = "early" | "middle" | "late" | "blinds";

/** What an agent sees, decoded from the observation vector it was handed. */
export interface AgentView {
  player: number;
  street: Street;
  legal: ActionKind[];
  betLow: bigint;
  betHigh: bigint;
  position: number;
  positionClass: PositionClass;
  holeCards: [CardId, CardId] | null;
  board: CardId[];
  stack: bigint;
  streetCommit: bigint;
  pot: bigint;
  betTo: bigint;
  toCall: bigint;
  minRaise: bigint;
  bigBlind: bigint;
  numPlayers: number;
  playersInHand: number;
}

const STREETS: readonly Street[] = ["preflop", "flop", "turn", "river"];
const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];
const SUITS: readonly Suit[] = [0, 1, 2, 3];

function at(obs: Float64Array, i: number): number {
  return obs[i] ?? 0;
}

function chips(obs: Float64Array, i: number): bigint {
  return BigInt(Math.floor(at(obs, i)));
}

function readCard(obs: Float64Array, offset: number): CardId | null {
  const rank = RANKS.find((r) => r === at(obs, offset));
  const suit = SUITS.find((s) => s + 1 === at(obs, offset + 1));
  if (rank === undefined || suit === undefined) return null;
  return cardIdFromRankSuit(rank, suit);
}

export function positionClass(position: number, numPlayers: number): PositionClass {
  if (numPlayers === 2) return position === 0 ? "late" : "blinds";
  if (position < 2) return "blinds";
  if (position >= numPlayers - 2) return "late";
  return position === 2 && numPlayers >= 5 ? "early" : "middle";
}

export function decodeView(obs: Float64Array, bigBlind: bigint): AgentView {
  const legal = ACTION_ORDER.filter((_, i) => at(obs, ObsIndex.VALID_ACTIONS + i) === 1);

  const c1 = readCard(obs, ObsIndex.HOLE_CARDS);
  const c2 = readCard(obs, ObsIndex.HOLE_CARDS + 2);
  const board: CardId[] = [];
  for (let i = 0; i < 5; i++) {
    const card = readCard(obs, ObsIndex.BOARD + 2 * i);
    if (card !== null) board.push(card);
  }

  let numPlayers = 1;
  let playersInHand = 1;
  for (let i = 0; i < MAX_PLAYERS - 1; i++) {
    const status = at(obs, ObsIndex.OPPONENTS + i * OPPONENT_FIELDS + 1);
    if (status !== OpponentStatus.EMPTY) numPlayers++;
    if (status === OpponentStatus.ACTIVE) playersInHand++;
  }

  const position = at(obs, ObsIndex.POSITION);
  const streetCommit = chips(obs, ObsIndex.STREET_COMMIT);
  const betTo = chips(obs, ObsIndex.BET_TO_MATCH);

  return {
    player: at(obs, ObsIndex.ACTING_PLAYER),
    street: STREETS[at(obs, ObsIndex.STREET)] ?? "preflop",
    legal,
    betLow: chips(obs, ObsIndex.VALID_BET_LOW),
    betHigh: chips(obs, ObsIndex.VALID_BET_HIGH),
    position,
    positionClass: positionClass(position, numPlayers),
    holeCards: c1 !== null && c2 !== null ? [c1, c2] : null,
    board,
    stack: chips(obs, ObsIndex.STACK),
    streetCommit,
    pot: chips(obs, ObsIndex.POT),
    betTo,
    toCall: betTo > streetCommit ? betTo - streetCommit : 0n,
    minRaise: chips(obs, ObsIndex.MIN_RAISE),
    bigBlind,
    numPlayers,
    playersInHand
  };
}
