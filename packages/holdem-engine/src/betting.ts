import { z } from "zod";
import type { Action, ActionKind, Chips, HandState, PlayerId, PlayerState } from "./types.js";

/** What an agent may submit. Anything that does not parse is treated as an illegal action. */
export const agentActionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("Check") }),
  z.object({ kind: z.literal("Fold") }),
  z.object({ kind: z.literal("Call") }),
  z.object({ kind: z.literal("Bet"), amount: z.union([z.bigint(), z.number().finite()]) })
]);

export type AgentAction = z.infer<typeof agentActionSchema>;

export interface LegalActions {
  player: PlayerId;
  kinds: ActionKind[];
  toCall: Chips;
  // Inclusive bounds on the total street commitment; both 0 when Bet is not legal.
  betLow: Chips;
  betHigh: Chips;
}

export function toCall(hand: HandState, player: PlayerState): Chips {
  const need = hand.betTo - player.streetCommit;
  return need > 0n ? need : 0n;
}

export function legalActionsFor(hand: HandState, player: PlayerState): LegalActions {
  const need = toCall(hand, player);
  const kinds: ActionKind[] = ["Fold"];
  if (need === 0n) kinds.push("Check");
  if (need > 0n && player.stack > 0n) kinds.push("Call");

  let betLow = 0n;
  let betHigh = 0n;
  const maxTotal = player.streetCommit + player.stack;
  // A short all-in raise leaves the interval unchanged, so players who already acted in it may not re-raise.
  const reopened = player.lastIntervalActed !== hand.intervalId;
  if (player.stack > 0n && reopened && maxTotal > hand.betTo) {
    const raiseTo = hand.betTo + hand.minRaise;
    const minOpen = hand.params.bigBlind;
    const formalLow = raiseTo > minOpen ? raiseTo : minOpen;
    betLow = formalLow < maxTotal ? formalLow : maxTotal;
    betHigh = maxTotal;
    kinds.push("Bet");
  }

  return { player: player.id, kinds, toCall: need, betLow, betHigh };
}

/** Legal actions of whoever is due to act, or null once nobody is. */
export function legalActions(hand: HandState): LegalActions | null {
  if (hand.phase !== "betting" || hand.actionOn === null) return null;
  const player = hand.players[hand.actionOn];
  return player ? legalActionsFor(hand, player) : null;
}

export type SanitizedAction =
  | { action: Action; sanitized: false }
  | { action: Action; sanitized: true; reason: string };

function betAmount(amount: bigint | number): Chips {
  return typeof amount === "bigint" ? amount : BigInt(Math.floor(amount));
}

/**
 * Resolves any input to exactly one applicable action. Illegal or malformed input becomes a fold
 * when chips are owed and a check otherwise.
 */
export function sanitizeAction(hand: HandState, player: PlayerState, input: unknown): SanitizedAction {
  const legal = legalActionsFor(hand, player);
  const fallback: Action =
    legal.toCall > 0n ? { kind: "Fold", player: player.id } : { kind: "Check", player: player.id };
  const reject = (reason: string): SanitizedAction => ({ action: fallback, sanitized: true, reason });

  const parsed = agentActionSchema.safeParse(input);
  if (!parsed.success) return reject("malformed action");

  const requested = parsed.data;
  if (!legal.kinds.includes(requested.kind)) return reject(`${requested.kind} is not legal`);

  switch (requested.kind) {
    case "Fold":
    case "Check":
    case "Call":
      return { action: { kind: requested.kind, player: player.id }, sanitized: false };
    case "Bet": {
      const amount = betAmount(requested.amount);
      if (amount < legal.betLow || amount > legal.betHigh) {
        return reject(`bet ${amount} outside [${legal.betLow}, ${legal.betHigh}]`);
      }
      return { action: { kind: "Bet", player: player.id, amount }, sanitized: false };
    }
  }
}
