import type { AgentKind } from "../config.js";
import type { Prng } from "../prng.js";
import type { Agent } from "./agent.js";
import { CallingStation } from "./callingStation.js";
import { RandomAgent } from "./random.js";
import { TagAgent } from "./tag.js";

export type { Agent } from "./agent.js";
export { decodeView, positionClass, type AgentView, type PositionClass } from "./view.js";
export { fitIntent, type Intent } from "./intent.js";
export { CallingStation, RandomAgent, TagAgent };

export function createAgent(kind: AgentKind, rng: Prng): Agent {
  switch (kind) {
    case "random":
      return new RandomAgent(rng);
    case "calling-station":
      return new CallingStation();
    case "tag":
      return new TagAgent();
  }
}
