export * from "./types.js";
export * from "./errors.js";
export {
  agentActionSchema,
  legalActions,
  legalActionsFor,
  sanitizeAction,
  toCall,
  type AgentAction,
  type LegalActions,
  type SanitizedAction
} from "./betting.js";
export { computeSidePots, oddChipOrder, resolvePots, returnUncalledExcess, splitPot } from "./pots.js";
export { applyAction, cloneHandState, startHand, totalChips, validateParams, type StepOutcome } from "./engine.js";
export { defaultEvaluator, type HandEvaluator } from "./evaluator.js";
export { assertInvariants, assertTransition } from "./invariants.js";
export {
  ACTION_ORDER,
  OBSERVATION_SIZE,
  OPPONENT_FIELDS,
  ObsIndex,
  OpponentStatus,
  STREET_INDEX,
  encodeObservation,
  opponentsClockwise
} from "./observation.js";
export { HoldemTable, type StepInfo, type TimeStep } from "./table.js";
