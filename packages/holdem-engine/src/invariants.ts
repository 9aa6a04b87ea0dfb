import { invariant } from "./errors.js";
import type { HandState, PlayerId } from "./types.js";

function playersWhoFolded(hand: HandState): Set<PlayerId> {
  const folded = new Set<PlayerId>();
  for (const e of hand.events) {
    if (e.kind === "ActionApplied" && e.action.kind === "Fold") folded.add(e.action.player);
  }
  return folded;
}

/** Chip accounting checks run after every transition; a failure means the engine has a bug. */
export function assertInvariants(hand: HandState): void {
  let stacks = 0n;
  let committed = 0n;
  let active = 0;
  const folded = playersWhoFolded(hand);
  for (const p of hand.players) {
    invariant(!folded.has(p.id) || p.status === "folded", "folded player re-activated", { player: p.id });
    invariant(p.stack >= 0n, "negative stack", { player: p.id, stack: p.stack });
    invariant(p.totalCommit >= 0n && p.streetCommit >= 0n, "negative commitment", { player: p.id });
    invariant(p.streetCommit <= p.totalCommit, "street commitment above hand commitment", { player: p.id });
    invariant(!p.allIn || p.stack === 0n, "all-in player with chips behind", { player: p.id, stack: p.stack });
    if (p.status === "active") active++;
    stacks += p.stack;
    committed += p.totalCommit;
  }

  invariant(active === hand.activeCount, "active count out of sync", { active, activeCount: hand.activeCount });
  invariant(stacks + hand.pot === hand.startingChips, "chip conservation violated", {
    stacks,
    pot: hand.pot,
    startingChips: hand.startingChips
  });

  if (hand.phase === "betting") {
    invariant(hand.pot === committed, "pot differs from commitments", { pot: hand.pot, committed });
    invariant(hand.actionOn !== null, "betting with nobody to act", { handId: hand.handId });
    const actor = hand.players[hand.actionOn];
    invariant(actor !== undefined && actor.status === "active" && !actor.allIn, "action on a player who cannot act", {
      actionOn: hand.actionOn
    });
  } else {
    invariant(hand.pot === 0n, "undistributed chips after the hand", { pot: hand.pot });
    invariant(hand.actionOn === null, "action pending after the hand", { actionOn: hand.actionOn });
  }

  const boardSize = hand.board.length;
  const expected = { preflop: 0, flop: 3, turn: 4, river: 5 }[hand.street];
  invariant(boardSize === expected, "board size does not match street", { street: hand.street, boardSize });
}

/** Checks that hold between a state and the one an operation produced from it. */
export function assertTransition(before: HandState, after: HandState): void {
  invariant(before.players.length === after.players.length, "player count changed mid-hand", {
    before: before.players.length,
    after: after.players.length
  });
  for (const p of before.players) {
    if (p.status !== "folded") continue;
    invariant(after.players[p.id]?.status === "folded", "folded player re-activated", { player: p.id });
  }
}
