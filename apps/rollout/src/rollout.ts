import { orderedDeck } from "@holdem-rl/holdem-eval";
import {
  HoldemTable,
  PokerEngineError,
  type EngineEvent,
  type HandSetup,
  type PlayerId,
  type TimeStep
} from "@holdem-rl/holdem-engine";
import { createAgent, decodeView, type Agent } from "./agents/index.js";
import type { RolloutConfig } from "./config.js";
import { formatHandHistory, writeHandHistory } from "./handHistory.js";
import { log } from "./log.js";
import { Prng } from "./prng.js";

// Far above what any legal hand needs; hitting it means the engine stopped making progress.
const MAX_STEPS_PER_HAND = 1000;

export interface AgentTotals {
  hands: number;
  reward: number;
  penalties: number;
}

export interface RolloutSummary {
  hands: number;
  steps: number;
  sanitized: number;
  showdowns: number;
  /** Summed reward per player id. */
  rewards: number[];
  byAgent: Record<string, AgentTotals>;
}

export interface HandResult {
  handId: number;
  setup: HandSetup;
  steps: number;
  rewards: number[];
  events: EngineEvent[];
}

export interface RolloutHooks {
  onHand?(result: HandResult): void;
}

/** Draws the per-hand inputs the engine expects from the driver. */
export function sampleSetup(config: RolloutConfig, rng: Prng, handId: number): HandSetup {
  const n = rng.int(config.minPlayers, config.maxPlayers + 1);
  const low = BigInt(config.stackLowBb) * config.bigBlind;
  const high = BigInt(config.stackHighBb) * config.bigBlind;
  const stacks = Array.from({ length: n }, () => rng.bigint(low, high));
  // The button moves one seat per hand.
  const seating = Array.from({ length: n }, (_, pos) => (pos + handId) % n);
  const deck = orderedDeck();
  rng.shuffleInPlace(deck);
  return { stacks, seating, deck, handId };
}

function agentFor(agents: readonly Agent[], id: PlayerId): Agent {
  const agent = agents[id];
  if (agent === undefined) throw new RangeError(`No agent for player ${id}.`);
  return agent;
}

/** Plays one hand to completion, driving every seat with its agent. */
export function playHand(table: HoldemTable, setup: HandSetup, agents: readonly Agent[]): HandResult {
  const bigBlind = table.params.bigBlind;
  const rewards = setup.stacks.map(() => 0);
  const events: EngineEvent[] = [];
  let steps = 0;

  const collect = (ts: TimeStep): void => {
    ts.rewards.forEach((r, id) => {
      rewards[id] = (rewards[id] ?? 0) + r;
    });
    events.push(...ts.info.events);
  };

  let ts = table.reset(setup);
  collect(ts);
  while (!ts.terminal) {
    if (ts.actingPlayer === null || ts.observation === null) {
      throw new PokerEngineError("INVARIANT_VIOLATION", "Non-terminal step without an acting player.", {
        handId: ts.info.handId
      });
    }
    if (++steps > MAX_STEPS_PER_HAND) {
      throw new PokerEngineError("INVARIANT_VIOLATION", "Hand exceeded the step limit.", { handId: ts.info.handId });
    }
    const view = decodeView(ts.observation, bigBlind);
    ts = table.step(agentFor(agents, ts.actingPlayer).act(view));
    collect(ts);
  }

  return { handId: ts.info.handId, setup, steps, rewards, events };
}

export function runRollouts(config: RolloutConfig, hooks: RolloutHooks = {}): RolloutSummary {
  const dealRng = new Prng(config.seed);
  const agentRng = new Prng(config.seed ^ 0x9e3779b9);
  const table = new HoldemTable({
    smallBlind: config.smallBlind,
    bigBlind: config.bigBlind,
    invalidActionPenalty: config.invalidActionPenalty
  });
  const agents = Array.from({ length: config.maxPlayers }, (_, id) =>
    createAgent(config.agents[id % config.agents.length] ?? "random", agentRng)
  );

  const summary: RolloutSummary = {
    hands: 0,
    steps: 0,
    sanitized: 0,
    showdowns: 0,
    rewards: agents.map(() => 0),
    byAgent: {}
  };

  for (let handId = 1; handId <= config.hands; handId++) {
    const result = playHand(table, sampleSetup(config, dealRng, handId), agents);

    summary.hands++;
    summary.steps += result.steps;
    const penalties = result.rewards.map(() => 0);
    for (const e of result.events) {
      if (e.kind === "ActionSanitized") {
        summary.sanitized++;
        penalties[e.player] = (penalties[e.player] ?? 0) + e.penalty;
      }
      if (e.kind === "ShowdownReached") summary.showdowns++;
    }
    result.rewards.forEach((r, id) => {
      summary.rewards[id] = (summary.rewards[id] ?? 0) + r;
      const name = agentFor(agents, id).name;
      const totals = (summary.byAgent[name] ??= { hands: 0, reward: 0, penalties: 0 });
      totals.hands++;
      totals.reward += r;
      totals.penalties += penalties[id] ?? 0;
    });

    if (config.handHistoryDir !== null && handId % config.handHistoryEvery === 0) {
      const lines = formatHandHistory(result.events, { trackPlayer: config.trackPlayer });
      const file = writeHandHistory(config.handHistoryDir, handId, lines);
      log(`hand ${handId}: wrote ${file}`);
    }
    hooks.onHand?.(result);
  }

  return summary;
}
