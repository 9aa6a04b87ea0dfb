import type { AgentAction } from "@holdem-rl/holdem-engine";
import type { AgentView } from "./view.js";

export interface Agent {
  readonly name: string;
  act(view: AgentView): AgentAction;
}
