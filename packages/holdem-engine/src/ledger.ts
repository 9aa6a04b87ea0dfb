import { invariant } from "./errors.js";
import { registerBet } from "./pots.js";
import type { Chips, HandState, PlayerId, PlayerState } from "./types.js";

export function playerAt(hand: HandState, id: PlayerId): PlayerState {
  const player = hand.players[id];
  invariant(player !== undefined, "unknown player id", { id });
  return player;
}

function markActed(hand: HandState, player: PlayerState): void {
  player.actedThisStreet = true;
  player.lastIntervalActed = hand.intervalId;
}

// Never moves more than the stack holds; a short payment leaves the player all-in.
function moveToPot(hand: HandState, player: PlayerState, amount: Chips): Chips {
  invariant(amount >= 0n, "negative commitment", { player: player.id, amount });
  const pay = amount < player.stack ? amount : player.stack;
  player.stack -= pay;
  player.streetCommit += pay;
  player.totalCommit += pay;
  hand.pot += pay;
  if (player.stack === 0n) player.allIn = true;
  return pay;
}

export function postBlind(hand: HandState, player: PlayerState, amount: Chips): Chips {
  return moveToPot(hand, player, amount);
}

export function fold(hand: HandState, player: PlayerState): void {
  invariant(player.status === "active", "fold by a folded player", { player: player.id });
  player.status = "folded";
  hand.activeCount -= 1;
  markActed(hand, player);
}

export function check(hand: HandState, player: PlayerState): void {
  markActed(hand, player);
}

export function call(hand: HandState, player: PlayerState, amount: Chips): Chips {
  const paid = moveToPot(hand, player, amount);
  markActed(hand, player);
  return paid;
}

/** `totalTo` is the player's total commitment for the street after the bet. */
export function bet(hand: HandState, player: PlayerState, totalTo: Chips): Chips {
  const previousBetTo = hand.betTo;
  const paid = moveToPot(hand, player, totalTo - player.streetCommit);
  if (player.streetCommit > previousBetTo) registerBet(hand, player, previousBetTo);
  markActed(hand, player);
  return paid;
}

export function resetForStreet(player: PlayerState): void {
  player.streetCommit = 0n;
  player.actedThisStreet = false;
  player.lastIntervalActed = -1;
}

/** Fresh per-hand record; only id and stack carry over between hands. */
export function resetForHand(id: PlayerId, stack: Chips, position: number): PlayerState {
  return {
    id,
    position,
    stack,
    holeCards: null,
    status: "active",
    allIn: false,
    streetCommit: 0n,
    totalCommit: 0n,
    actedThisStreet: false,
    lastIntervalActed: -1,
    pendingPenalty: 0,
    reward: 0,
    winnings: 0n
  };
}
