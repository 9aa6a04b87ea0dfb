import type { CardId } from "@holdem-rl/holdem-eval";
import { invariant } from "./errors.js";
import type { Chips, HandState, PlayerId, PlayerState, Pot, PotAward } from "./types.js";

/**
 * Raises bet-to-match after a bet that exceeded it. A bet that opens the street or raises by at
 * least the minimum increment starts a new interval, so everyone may act again; a short all-in
 * raise only moves bet-to-match.
 */
export function registerBet(hand: HandState, player: PlayerState, previousBetTo: Chips): void {
  const betTo = player.streetCommit;
  const bigBlind = hand.params.bigBlind;

  if (previousBetTo === 0n) {
    // Any opening bet creates a new betting interval, even if it's a short all-in.
    hand.intervalId += 1;
    hand.minRaise = betTo >= bigBlind ? betTo : bigBlind;
  } else if (betTo - previousBetTo >= hand.minRaise) {
    hand.intervalId += 1;
    hand.minRaise = betTo - previousBetTo;
  }
  hand.betTo = betTo;
  hand.lastAggressor = player.id;
}

/** Hands back the part of the single highest street commitment nobody matched. */
export function returnUncalledExcess(hand: HandState): { player: PlayerId; amount: Chips } | null {
  let top: PlayerState | null = null;
  let second = 0n;
  for (const p of hand.players) {
    if (top === null || p.streetCommit > top.streetCommit) {
      if (top !== null && top.streetCommit > second) second = top.streetCommit;
      top = p;
    } else if (p.streetCommit > second) {
      second = p.streetCommit;
    }
  }
  if (top === null || top.streetCommit <= second) return null;

  const excess = top.streetCommit - second;
  top.stack += excess;
  top.streetCommit -= excess;
  top.totalCommit -= excess;
  hand.pot -= excess;
  if (top.stack > 0n) top.allIn = false;
  return { player: top.id, amount: excess };
}

export function computeSidePots(players: readonly PlayerState[]): Pot[] {
  const remaining: Array<{ id: PlayerId; amount: Chips; eligible: boolean }> = [];
  for (const p of players) {
    if (p.totalCommit > 0n) remaining.push({ id: p.id, amount: p.totalCommit, eligible: p.status === "active" });
  }

  const potsByTier: Pot[] = [];
  while (remaining.length > 0) {
    let min = remaining[0]!.amount;
    for (const r of remaining) if (r.amount < min) min = r.amount;

    potsByTier.push({
      amount: min * BigInt(remaining.length),
      eligible: remaining.filter((r) => r.eligible).map((r) => r.id)
    });

    for (const r of remaining) r.amount -= min;
    for (let i = remaining.length - 1; i >= 0; i--) {
      if (remaining[i]!.amount === 0n) remaining.splice(i, 1);
    }
  }

  // Merge consecutive tiers that have identical eligibility sets. Folded "dead money" would
  // otherwise split one contest into several pots with the same winners. A tier nobody can win
  // joins the pot below it.
  const merged: Pot[] = [];
  for (const p of potsByTier) {
    const last = merged[merged.length - 1];
    if (last && (p.eligible.length === 0 || samePlayers(last.eligible, p.eligible))) {
      last.amount += p.amount;
      continue;
    }
    merged.push({ amount: p.amount, eligible: p.eligible.slice() });
  }
  return merged;
}

function samePlayers(a: readonly PlayerId[], b: readonly PlayerId[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

/** Seat order used for odd chips: clockwise starting with the seat after the button. */
export function oddChipOrder(hand: HandState, ids: readonly PlayerId[]): PlayerId[] {
  const n = hand.seating.length;
  const buttonPosition = n > 2 ? n - 1 : 0;
  const distance = (id: PlayerId): number => (hand.players[id]!.position - buttonPosition - 1 + n) % n;
  return ids.slice().sort((a, b) => distance(a) - distance(b));
}

export function splitPot(hand: HandState, pot: Pot, winners: readonly PlayerId[]): PotAward {
  invariant(winners.length > 0, "pot without winners", { amount: pot.amount });
  const ordered = oddChipOrder(hand, winners);
  const base = pot.amount / BigInt(ordered.length);
  const remainder = pot.amount % BigInt(ordered.length);
  return {
    amount: pot.amount,
    eligible: pot.eligible.slice(),
    winners: ordered,
    shares: ordered.map((_, i) => (BigInt(i) < remainder ? base + 1n : base))
  };
}

export function holeAndBoard(player: PlayerState, board: readonly CardId[]): CardId[] {
  invariant(player.holeCards !== null, "showdown without hole cards", { player: player.id });
  return [player.holeCards[0], player.holeCards[1], ...board];
}

/**
 * Awards every pot, lowest tier first, to the eligible players with the lowest strength value
 * (lower is stronger). A pot with one eligible player needs no comparison.
 */
export function resolvePots(
  hand: HandState,
  pots: readonly Pot[],
  strengths: ReadonlyMap<PlayerId, number>
): PotAward[] {
  const strengthOf = (id: PlayerId): number => {
    const s = strengths.get(id);
    invariant(s !== undefined, "eligible player without a hand strength", { player: id });
    return s;
  };

  return pots.map((pot) => {
    if (pot.eligible.length === 1) return splitPot(hand, pot, pot.eligible);
    let best = Number.POSITIVE_INFINITY;
    for (const id of pot.eligible) best = Math.min(best, strengthOf(id));
    return splitPot(
      hand,
      pot,
      pot.eligible.filter((id) => strengthOf(id) === best)
    );
  });
}

export function creditAwards(hand: HandState, awards: readonly PotAward[]): void {
  for (const award of awards) {
    award.winners.forEach((id, i) => {
      const player = hand.players[id]!;
      const share = award.shares[i]!;
      player.stack += share;
      player.winnings += share;
      hand.pot -= share;
      if (player.stack > 0n) player.allIn = false;
    });
  }
  invariant(hand.pot === 0n, "chips left in the pot after awarding", { pot: hand.pot });
}
