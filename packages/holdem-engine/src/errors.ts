export type PokerEngineErrorCode =
  | "NO_HAND"
  | "HAND_NOT_ACTIVE"
  | "INVALID_PARAMS"
  | "INVALID_PLAYER_COUNT"
  | "INVALID_STACK"
  | "INVALID_SEATING"
  | "INVALID_DECK"
  | "INVARIANT_VIOLATION";

export class PokerEngineError extends Error {
  readonly code: PokerEngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: PokerEngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "PokerEngineError";
    this.code = code;
    this.details = details;
  }
}

export function assertNever(_value: never, what: string): never {
  throw new TypeError(`Unhandled ${what}.`);
}

export function invariant(condition: boolean, message: string, details?: Record<string, unknown>): asserts condition {
  if (!condition) throw new PokerEngineError("INVARIANT_VIOLATION", `invariant: ${message}`, details);
}
