import { isValidCardId, type CardId } from "@holdem-rl/holdem-eval";
import { sanitizeAction } from "./betting.js";
import { PokerEngineError, assertNever, invariant } from "./errors.js";
import type { HandEvaluator } from "./evaluator.js";
import { assertInvariants, assertTransition } from "./invariants.js";
import * as ledger from "./ledger.js";
import { computeSidePots, creditAwards, holeAndBoard, resolvePots, returnUncalledExcess, splitPot } from "./pots.js";
import {
  MAX_PLAYERS,
  MIN_PLAYERS,
  type Action,
  type Chips,
  type HandSetup,
  type HandState,
  type PlayerId,
  type PlayerState,
  type Street,
  type TableParams
} from "./types.js";

export function cloneHandState(hand: HandState): HandState {
  return {
    ...hand,
    params: { ...hand.params },
    players: hand.players.map((p) => ({ ...p })),
    seating: hand.seating.slice(),
    board: hand.board.slice(),
    deck: hand.deck.slice(),
    pots: hand.pots.map((a) => ({ ...a, eligible: a.eligible.slice(), winners: a.winners.slice(), shares: a.shares.slice() })),
    stepRewards: hand.stepRewards.slice(),
    events: hand.events.slice()
  };
}

export function validateParams(params: TableParams): void {
  if (params.smallBlind <= 0n || params.bigBlind <= 0n || params.smallBlind >= params.bigBlind) {
    throw new PokerEngineError("INVALID_PARAMS", "Invalid blind parameters.", {
      smallBlind: params.smallBlind,
      bigBlind: params.bigBlind
    });
  }
  if (!Number.isFinite(params.invalidActionPenalty) || params.invalidActionPenalty < 0) {
    throw new PokerEngineError("INVALID_PARAMS", "invalidActionPenalty must be a finite number >= 0.", {
      invalidActionPenalty: params.invalidActionPenalty
    });
  }
}

function validateSetup(setup: HandSetup): void {
  const n = setup.stacks.length;
  if (n < MIN_PLAYERS || n > MAX_PLAYERS) {
    throw new PokerEngineError("INVALID_PLAYER_COUNT", `Player count must be ${MIN_PLAYERS}..${MAX_PLAYERS}.`, {
      players: n
    });
  }
  setup.stacks.forEach((stack, player) => {
    if (typeof stack !== "bigint" || stack <= 0n) {
      throw new PokerEngineError("INVALID_STACK", "Every stack must be a positive chip count.", { player, stack });
    }
  });

  const seen = new Set<PlayerId>();
  for (const id of setup.seating) {
    if (!Number.isInteger(id) || id < 0 || id >= n || seen.has(id)) {
      throw new PokerEngineError("INVALID_SEATING", "Seating must list every player id exactly once.", {
        seating: setup.seating.slice()
      });
    }
    seen.add(id);
  }
  if (seen.size !== n) {
    throw new PokerEngineError("INVALID_SEATING", "Seating must list every player id exactly once.", {
      seating: setup.seating.slice()
    });
  }

  const cards = new Set<CardId>();
  for (const card of setup.deck) {
    if (!isValidCardId(card) || cards.has(card)) {
      throw new PokerEngineError("INVALID_DECK", "Deck must hold distinct card ids in [0, 51].", { card });
    }
    cards.add(card);
  }
  if (cards.size < 2 * n + 5) {
    throw new PokerEngineError("INVALID_DECK", "Deck is too short to deal the hand.", {
      cards: cards.size,
      needed: 2 * n + 5
    });
  }
}

function seatAt(hand: HandState, position: number): PlayerState {
  const n = hand.seating.length;
  return ledger.playerAt(hand, hand.seating[((position % n) + n) % n]!);
}

function countCapable(hand: HandState): number {
  let n = 0;
  for (const p of hand.players) if (p.status === "active" && !p.allIn) n++;
  return n;
}

/**
 * A player must act while they owe chips, or while they have not acted since betting was last
 * reopened and someone else could still respond to a raise.
 */
function needsToAct(hand: HandState, player: PlayerState): boolean {
  if (player.status !== "active" || player.allIn) return false;
  if (player.streetCommit < hand.betTo) return true;
  return player.lastIntervalActed !== hand.intervalId && countCapable(hand) >= 2;
}

/** The single place the turn moves: next player clockwise from `fromPosition` who must act, or null. */
function nextToAct(hand: HandState, fromPosition: number): PlayerId | null {
  const n = hand.seating.length;
  for (let offset = 1; offset <= n; offset++) {
    const player = seatAt(hand, fromPosition + offset);
    if (needsToAct(hand, player)) return player.id;
  }
  return null;
}

function buttonPosition(hand: HandState): number {
  const n = hand.seating.length;
  return n > 2 ? n - 1 : 0;
}

const NEXT_STREET: Record<Street, Street | null> = { preflop: "flop", flop: "turn", turn: "river", river: null };

function dealStreet(hand: HandState): void {
  const next = NEXT_STREET[hand.street];
  invariant(next !== null, "no street after the river");
  const count = next === "flop" ? 3 : 1;
  invariant(hand.deck.length >= count, "deck exhausted", { street: next });
  const cards = hand.deck.splice(0, count);
  hand.board.push(...cards);

  hand.street = next;
  hand.betTo = 0n;
  hand.minRaise = hand.params.bigBlind;
  hand.intervalId = 0;
  hand.lastAggressor = null;
  hand.streetFinished = false;
  for (const p of hand.players) ledger.resetForStreet(p);
  hand.events.push({ kind: "StreetAdvanced", street: next, cards, board: hand.board.slice() });
}

function completeByFolds(hand: HandState): void {
  const excess = returnUncalledExcess(hand);
  if (excess) hand.events.push({ kind: "UncalledBetReturned", ...excess });

  const survivor = hand.players.find((p) => p.status === "active");
  invariant(survivor !== undefined, "every player folded");

  const award = splitPot(hand, { amount: hand.pot, eligible: [survivor.id] }, [survivor.id]);
  creditAwards(hand, [award]);
  hand.pots = [award];
  hand.events.push({ kind: "PotAwarded", potIndex: 0, award });
  endHand(hand, "all-folded");
}

function showdown(hand: HandState, evaluator: HandEvaluator): void {
  const strengths = new Map<PlayerId, number>();
  const revealed: { player: PlayerId; holeCards: readonly [CardId, CardId]; strength: number }[] = [];
  for (const p of hand.players) {
    if (p.status !== "active") continue;
    const cards = holeAndBoard(p, hand.board);
    const strength = evaluator.strength(cards);
    strengths.set(p.id, strength);
    revealed.push({ player: p.id, holeCards: [cards[0]!, cards[1]!], strength });
  }
  hand.events.push({ kind: "ShowdownReached", players: revealed });

  const awards = resolvePots(hand, computeSidePots(hand.players), strengths);
  creditAwards(hand, awards);
  hand.pots = awards;
  awards.forEach((award, potIndex) => hand.events.push({ kind: "PotAwarded", potIndex, award }));
  endHand(hand, "showdown");
}

function endHand(hand: HandState, reason: "all-folded" | "showdown"): void {
  hand.phase = "complete";
  hand.handOver = true;
  hand.streetFinished = true;
  hand.actionOn = null;
  hand.events.push({ kind: "HandCompleted", reason });
}

/** Closes the betting round: next street, runout, or showdown. */
function finishRound(hand: HandState, evaluator: HandEvaluator): void {
  hand.streetFinished = true;
  const excess = returnUncalledExcess(hand);
  if (excess) hand.events.push({ kind: "UncalledBetReturned", ...excess });

  if (hand.street !== "river" && countCapable(hand) < 2) {
    // Nobody left to bet against: run out the board.
    while (hand.street !== "river") dealStreet(hand);
  }
  if (hand.street === "river") {
    showdown(hand, evaluator);
    return;
  }

  dealStreet(hand);
  hand.actionOn = nextToAct(hand, buttonPosition(hand));
  hand.firstToAct = hand.actionOn;
  invariant(hand.actionOn !== null, "new street with nobody to act", { street: hand.street });
}

function advance(hand: HandState, actor: PlayerState, evaluator: HandEvaluator): void {
  if (hand.activeCount <= 1) {
    completeByFolds(hand);
    return;
  }
  const next = nextToAct(hand, actor.position);
  if (next !== null) {
    hand.actionOn = next;
    return;
  }
  finishRound(hand, evaluator);
}

/** Returns the chips the action moved into the pot. */
function applyToLedger(hand: HandState, player: PlayerState, action: Action): Chips {
  switch (action.kind) {
    case "Fold":
      ledger.fold(hand, player);
      return 0n;
    case "Check":
      ledger.check(hand, player);
      return 0n;
    case "Call":
      return ledger.call(hand, player, hand.betTo - player.streetCommit);
    case "Bet":
      return ledger.bet(hand, player, action.amount);
    default:
      return assertNever(action, "action kind");
  }
}

/**
 * Rewards produced by one transition. Mid-hand only pending penalties are paid out; the terminal
 * transition pays each player's net chip result minus whatever penalty is still pending.
 */
function deliverRewards(hand: HandState): void {
  hand.stepRewards = hand.players.map((p) => {
    let amount = p.pendingPenalty === 0 ? 0 : -p.pendingPenalty;
    if (hand.handOver) amount += Number(p.winnings - p.totalCommit);
    p.pendingPenalty = 0;
    p.reward += amount;
    return amount;
  });
}

export function startHand(params: TableParams, setup: HandSetup, evaluator: HandEvaluator): HandState {
  validateParams(params);
  validateSetup(setup);

  const n = setup.stacks.length;
  const seating = setup.seating.slice();
  const deck = setup.deck.slice();
  const players = setup.stacks.map((stack, id) => ledger.resetForHand(id, stack, seating.indexOf(id)));
  let startingChips = 0n;
  for (const p of players) startingChips += p.stack;

  const hand: HandState = {
    handId: setup.handId ?? 1,
    params: { ...params },
    phase: "betting",
    street: "preflop",
    players,
    seating,
    pot: 0n,
    betTo: 0n,
    minRaise: params.bigBlind,
    intervalId: 0,
    activeCount: n,
    actionOn: null,
    lastAggressor: null,
    firstToAct: null,
    streetFinished: false,
    handOver: false,
    board: [],
    deck,
    startingChips,
    pots: [],
    stepRewards: players.map(() => 0),
    events: []
  };
  hand.events.push({
    kind: "HandStarted",
    handId: hand.handId,
    seating: seating.slice(),
    stacks: players.map((p) => p.stack)
  });

  const sb = seatAt(hand, 0);
  const bb = seatAt(hand, 1);
  const sbPaid = ledger.postBlind(hand, sb, params.smallBlind);
  hand.events.push({ kind: "BlindPosted", player: sb.id, blind: "small", amount: sbPaid, allIn: sb.allIn });
  const bbPaid = ledger.postBlind(hand, bb, params.bigBlind);
  hand.events.push({ kind: "BlindPosted", player: bb.id, blind: "big", amount: bbPaid, allIn: bb.allIn });
  hand.betTo = sbPaid > bbPaid ? sbPaid : bbPaid;

  // One card at a time around the table, starting with the small blind.
  const dealt = hand.deck.splice(0, 2 * n);
  for (let position = 0; position < n; position++) {
    const player = seatAt(hand, position);
    const cards = [dealt[position]!, dealt[n + position]!] as const;
    player.holeCards = cards;
    hand.events.push({ kind: "HoleCardsDealt", player: player.id, cards });
  }

  hand.actionOn = nextToAct(hand, 1);
  hand.firstToAct = hand.actionOn;
  if (hand.actionOn === null) finishRound(hand, evaluator);

  deliverRewards(hand);
  assertInvariants(hand);
  return hand;
}

export interface StepOutcome {
  state: HandState;
  applied: Action;
  sanitized: boolean;
}

/** Applies one decision by the player due to act. Never throws for bad agent input. */
export function applyAction(state: HandState, input: unknown, evaluator: HandEvaluator): StepOutcome {
  if (state.phase !== "betting" || state.actionOn === null) {
    throw new PokerEngineError("HAND_NOT_ACTIVE", "Hand is not in betting phase.", { handId: state.handId });
  }

  const hand = cloneHandState(state);
  const actor = ledger.playerAt(hand, state.actionOn);
  const decision = sanitizeAction(hand, actor, input);
  if (decision.sanitized) {
    const penalty = hand.params.invalidActionPenalty;
    actor.pendingPenalty += penalty;
    hand.events.push({ kind: "ActionSanitized", player: actor.id, reason: decision.reason, penalty });
  }

  const paid = applyToLedger(hand, actor, decision.action);
  hand.events.push({ kind: "ActionApplied", action: decision.action, paid, allIn: actor.allIn });
  advance(hand, actor, evaluator);

  deliverRewards(hand);
  assertInvariants(hand);
  assertTransition(state, hand);
  return { state: hand, applied: decision.action, sanitized: decision.sanitized };
}

/** Sum of stacks plus chips in the pot; constant for the whole hand. */
export function totalChips(hand: HandState): bigint {
  let sum = hand.pot;
  for (const p of hand.players) sum += p.stack;
  return sum;
}
