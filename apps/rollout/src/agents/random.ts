import type { AgentAction } from "@holdem-rl/holdem-engine";
import type { Prng } from "../prng.js";
import type { Agent } from "./agent.js";
import type { AgentView } from "./view.js";

/** Uniform over the legal kinds; bet sizes are drawn uniformly (and fractionally) from the legal range. */
export class RandomAgent implements Agent {
  readonly name = "random";

  constructor(private readonly rng: Prng) {}

  act(view: AgentView): AgentAction {
    if (view.legal.length === 0) return { kind: "Fold" };
    const kind = this.rng.pick(view.legal);
    if (kind === "Bet") {
      return { kind, amount: this.rng.float(Number(view.betLow), Number(view.betHigh)) };
    }
    return { kind };
  }
}
