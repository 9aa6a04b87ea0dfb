import type { AgentAction } from "@holdem-rl/holdem-engine";
import type { Agent } from "./agent.js";
import { fitIntent, potFraction, type Intent } from "./intent.js";
import { categorizePostflop } from "./postflop.js";
import { preflopTier } from "./preflopRanges.js";
import type { AgentView } from "./view.js";

/** Tight-aggressive: plays few starting hands and bets the ones it plays. */
export class TagAgent implements Agent {
  readonly name = "tag";

  act(view: AgentView): AgentAction {
    const intent = view.street === "preflop" ? this.preflop(view) : this.postflop(view);
    return fitIntent(intent, view);
  }

  private preflop(view: AgentView): Intent {
    if (!view.holeCards) {
      return view.toCall === 0n ? { action: "check" } : { action: "call" };
    }

    const facingBet = view.toCall > 0n;
    // A limp costs one big blind; anything above that is a raise.
    const facingRaise = view.betTo > view.bigBlind;

    switch (preflopTier(view.holeCards[0], view.holeCards[1])) {
      case "premium":
        return { action: "raise", amount: facingRaise ? view.betTo * 3n : view.bigBlind * 3n };

      case "strong":
        if (facingRaise) {
          if (view.toCall <= potFraction(view.pot, 1n, 3n)) return { action: "raise", amount: view.betTo * 3n };
          return { action: "call" };
        }
        return { action: "raise", amount: (view.bigBlind * 5n) / 2n };

      case "playable":
        if (facingRaise) {
          if (view.positionClass === "early" && view.toCall > potFraction(view.pot, 1n, 4n)) return { action: "fold" };
          return { action: "call" };
        }
        if (view.positionClass === "blinds") return facingBet ? { action: "call" } : { action: "check" };
        return { action: "raise", amount: (view.bigBlind * 5n) / 2n };

      case "marginal":
        if (!facingBet) return { action: "check" };
        if (view.positionClass === "late" && view.toCall <= potFraction(view.pot, 1n, 5n)) return { action: "call" };
        return { action: "fold" };

      case "trash":
        return facingBet ? { action: "fold" } : { action: "check" };
    }
  }

  private postflop(view: AgentView): Intent {
    if (!view.holeCards) {
      return view.toCall === 0n ? { action: "check" } : { action: "fold" };
    }

    const facingBet = view.toCall > 0n;

    switch (categorizePostflop(view.holeCards, view.board)) {
      case "monster":
        if (facingBet) return { action: "raise", amount: (view.betTo * 5n) / 2n };
        return { action: "bet", amount: potFraction(view.pot, 2n, 3n) };

      case "strong":
        if (facingBet) return { action: "call" };
        return { action: "bet", amount: potFraction(view.pot, 1n, 2n) };

      case "medium":
        if (facingBet) {
          return view.toCall <= potFraction(view.pot, 1n, 3n) ? { action: "call" } : { action: "fold" };
        }
        return { action: "check" };

      case "draw":
        if (facingBet) {
          // Roughly the price a flush or open-ended draw can pay.
          return view.toCall <= potFraction(view.pot, 2n, 5n) ? { action: "call" } : { action: "fold" };
        }
        // Semi-bluff about a third of the time, keyed off the pot so replays stay deterministic.
        if (view.pot % 3n === 0n) return { action: "bet", amount: potFraction(view.pot, 1n, 2n) };
        return { action: "check" };

      case "weak":
        return facingBet ? { action: "fold" } : { action: "check" };
    }
  }
}
