import { legalActions, type LegalActions } from "./betting.js";
import { applyAction, cloneHandState, startHand, validateParams } from "./engine.js";
import { PokerEngineError } from "./errors.js";
import { defaultEvaluator, type HandEvaluator } from "./evaluator.js";
import { assertInvariants } from "./invariants.js";
import { encodeObservation } from "./observation.js";
import type { Action, EngineEvent, HandSetup, HandState, PlayerId, PotAward, Street, TableParams } from "./types.js";

export interface StepInfo {
  handId: number;
  street: Street;
  applied: Action | null; // null for the reset transition
  sanitized: boolean;
  cumulativeRewards: number[];
  events: EngineEvent[]; // Events produced by this transition only.
  pots: PotAward[];
}

export interface TimeStep {
  observation: Float64Array | null; // For `actingPlayer`; null once the hand is over.
  actingPlayer: PlayerId | null;
  rewards: number[]; // Indexed by player id.
  terminal: boolean;
  info: StepInfo;
}

/**
 * Driver-facing wrapper around the functional core. One instance plays one hand at a time; run
 * independent instances for parallel rollouts.
 */
export class HoldemTable {
  readonly params: TableParams;
  private readonly evaluator: HandEvaluator;
  private hand: HandState | null = null;

  constructor(params: TableParams, evaluator: HandEvaluator = defaultEvaluator) {
    validateParams(params);
    this.params = { ...params };
    this.evaluator = evaluator;
  }

  /** A copy of the current hand; changing it does not affect the table. */
  get state(): HandState | null {
    return this.hand ? cloneHandState(this.hand) : null;
  }

  reset(setup: HandSetup): TimeStep {
    const hand = startHand(this.params, setup, this.evaluator);
    this.hand = hand;
    return this.timeStep(hand, 0, null, false);
  }

  step(action: unknown): TimeStep {
    if (this.hand === null) throw new PokerEngineError("NO_HAND", "step() called before reset().");
    const before = this.hand.events.length;
    const outcome = applyAction(this.hand, action, this.evaluator);
    this.hand = outcome.state;
    return this.timeStep(outcome.state, before, outcome.applied, outcome.sanitized);
  }

  legalActions(): LegalActions | null {
    return this.hand ? legalActions(this.hand) : null;
  }

  snapshot(): HandState {
    if (this.hand === null) throw new PokerEngineError("NO_HAND", "No hand to snapshot.");
    return cloneHandState(this.hand);
  }

  restore(state: HandState): void {
    assertInvariants(state);
    this.hand = cloneHandState(state);
  }

  private timeStep(hand: HandState, eventsFrom: number, applied: Action | null, sanitized: boolean): TimeStep {
    const actingPlayer = hand.actionOn;
    return {
      observation: actingPlayer === null ? null : encodeObservation(hand, actingPlayer),
      actingPlayer,
      rewards: hand.stepRewards.slice(),
      terminal: hand.handOver,
      info: {
        handId: hand.handId,
        street: hand.street,
        applied,
        sanitized,
        cumulativeRewards: hand.players.map((p) => p.reward),
        events: hand.events.slice(eventsFrom),
        pots: hand.pots
      }
    };
  }
}
