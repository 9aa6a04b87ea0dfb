import type { AgentAction } from "@holdem-rl/holdem-engine";
import type { Agent } from "./agent.js";
import { fitIntent } from "./intent.js";
import type { AgentView } from "./view.js";

export class CallingStation implements Agent {
  readonly name = "calling-station";

  act(view: AgentView): AgentAction {
    return fitIntent(view.toCall === 0n ? { action: "check" } : { action: "call" }, view);
  }
}
