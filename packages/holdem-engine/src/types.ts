import type { CardId } from "@holdem-rl/holdem-eval";

export type Chips = bigint;

export type PlayerId = number; // 0..N-1, stable across hands

export type Street = "preflop" | "flop" | "turn" | "river";

export type HandPhase = "betting" | "complete";

export type PlayerStatus = "active" | "folded";

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 6;

export interface TableParams {
  smallBlind: Chips;
  bigBlind: Chips;
  invalidActionPenalty: number; // Reward units (chips); 0 disables.
}

/** Inputs the driver supplies for every hand; the core never shuffles or samples. */
export interface HandSetup {
  stacks: readonly Chips[]; // Indexed by player id.
  seating: readonly PlayerId[]; // Player ids in position order: [SB, BB, ..., button].
  deck: readonly CardId[]; // Already shuffled; dealt from the front.
  handId?: number;
}

export type ActionKind = "Check" | "Fold" | "Call" | "Bet";

export type Action =
  | { kind: "Fold"; player: PlayerId }
  | { kind: "Check"; player: PlayerId }
  | { kind: "Call"; player: PlayerId }
  | { kind: "Bet"; player: PlayerId; amount: Chips }; // Total street commitment, not an increment.

export interface PlayerState {
  id: PlayerId;
  position: number; // 0 = SB, 1 = BB, clockwise.
  stack: Chips;
  holeCards: readonly [CardId, CardId] | null;
  status: PlayerStatus;
  allIn: boolean;
  streetCommit: Chips;
  totalCommit: Chips;
  actedThisStreet: boolean;
  lastIntervalActed: number; // -1 means has not acted in any interval this street.
  pendingPenalty: number;
  reward: number; // Rewards delivered so far this hand.
  winnings: Chips; // Chips received from pots.
}

export interface Pot {
  amount: Chips;
  eligible: PlayerId[]; // Not folded and contributed to this tier, in player-id order.
}

export interface PotAward {
  amount: Chips;
  eligible: PlayerId[];
  winners: PlayerId[];
  shares: Chips[]; // Parallel to winners.
}

export type EngineEvent =
  | { kind: "HandStarted"; handId: number; seating: PlayerId[]; stacks: Chips[] }
  | { kind: "BlindPosted"; player: PlayerId; blind: "small" | "big"; amount: Chips; allIn: boolean }
  | { kind: "HoleCardsDealt"; player: PlayerId; cards: readonly [CardId, CardId] }
  | { kind: "ActionSanitized"; player: PlayerId; reason: string; penalty: number }
  | { kind: "ActionApplied"; action: Action; paid: Chips; allIn: boolean }
  | { kind: "UncalledBetReturned"; player: PlayerId; amount: Chips }
  | { kind: "StreetAdvanced"; street: Street; cards: CardId[]; board: CardId[] }
  | { kind: "ShowdownReached"; players: { player: PlayerId; holeCards: readonly [CardId, CardId]; strength: number }[] }
  | { kind: "PotAwarded"; potIndex: number; award: PotAward }
  | { kind: "HandCompleted"; reason: "all-folded" | "showdown" };

export interface HandState {
  handId: number;
  params: TableParams;
  phase: HandPhase;
  street: Street;

  players: PlayerState[]; // Indexed by player id.
  seating: PlayerId[]; // Position order.

  pot: Chips; // Sum of totalCommit while betting; 0 once awarded.
  betTo: Chips; // Bet-to-match: highest street contribution.
  minRaise: Chips; // Minimum increment for a full raise.
  intervalId: number; // Increments on each bet that reopens action.

  activeCount: number; // Players not folded.
  actionOn: PlayerId | null;
  lastAggressor: PlayerId | null;
  firstToAct: PlayerId | null;
  streetFinished: boolean;
  handOver: boolean;

  board: CardId[];
  deck: CardId[]; // Remaining undealt cards.

  startingChips: Chips; // Sum of stacks at hand start.
  pots: PotAward[]; // Populated once pots are awarded.
  stepRewards: number[]; // Rewards produced by the transition that led to this state.

  // Append-only; consumers translate to transcripts.
  events: EngineEvent[];
}
