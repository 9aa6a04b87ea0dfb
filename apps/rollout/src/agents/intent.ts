import type { AgentAction } from "@holdem-rl/holdem-engine";
import type { AgentView } from "./view.js";

/** A strategy's decision before it is fitted to the legal-action set. */
export interface Intent {
  action: "fold" | "check" | "call" | "bet" | "raise";
  amount?: bigint; // Total street commitment for bet/raise.
}

export function clampBet(desired: bigint, low: bigint, high: bigint): bigint {
  if (desired > high) return high;
  if (desired < low) return low;
  return desired;
}

export function potFraction(pot: bigint, num: bigint, den: bigint): bigint {
  return (pot * num) / den;
}

function passive(view: AgentView): AgentAction {
  if (view.legal.includes("Call")) return { kind: "Call" };
  if (view.legal.includes("Check")) return { kind: "Check" };
  return { kind: "Fold" };
}

/** Maps an intent onto an action the engine will accept as-is. */
export function fitIntent(intent: Intent, view: AgentView): AgentAction {
  switch (intent.action) {
    case "fold":
      return view.toCall === 0n && view.legal.includes("Check") ? { kind: "Check" } : { kind: "Fold" };
    case "check":
      return view.legal.includes("Check") ? { kind: "Check" } : { kind: "Fold" };
    case "call":
      return passive(view);
    case "bet":
    case "raise":
      if (!view.legal.includes("Bet")) return passive(view);
      return { kind: "Bet", amount: clampBet(intent.amount ?? view.betLow, view.betLow, view.betHigh) };
  }
}
