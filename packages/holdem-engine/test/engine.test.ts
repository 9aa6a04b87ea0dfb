import assert from "node:assert/strict";
import test from "node:test";
import { orderedDeck } from "@holdem-rl/holdem-eval";
import {
  HoldemTable,
  PokerEngineError,
  applyAction,
  assertTransition,
  cloneHandState,
  legalActions,
  startHand,
  totalChips
} from "../src/index.js";
import type { AgentAction, HandState } from "../src/index.js";
import { countingEvaluator, params, prng, setup } from "./helpers.js";

const BOARD = "Qh 9s 5d 3c 8h";

function shuffledDeck(rand: () => number): number[] {
  const deck = orderedDeck();
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rand() * (i + 1));
    const tmp = deck[i]!;
    deck[i] = deck[j]!;
    deck[j] = tmp;
  }
  return deck;
}

function randomInput(state: HandState, rand: () => number): unknown {
  const legal = legalActions(state);
  const roll = rand();
  if (roll < 0.1) return { kind: "Raise", amount: 3 }; // garbage
  if (roll < 0.2) return { kind: "Bet", amount: -1 };
  const kinds = legal?.kinds ?? ["Fold"];
  const kind = kinds[Math.floor(rand() * kinds.length)]!;
  if (kind !== "Bet" || legal === null) return { kind };
  const low = Number(legal.betLow);
  const high = Number(legal.betHigh);
  return { kind, amount: low + rand() * (high - low) };
}

test("engine: chips are conserved and folded or all-in players never act", () => {
  const rand = prng(0xc0ffee);
  for (let handNo = 0; handNo < 200; handNo++) {
    const n = 2 + Math.floor(rand() * 5);
    const stacks = Array.from({ length: n }, () => BigInt(20 + Math.floor(rand() * 300)));
    const evaluator = countingEvaluator();
    let state = startHand(params, { stacks, seating: stacks.map((_, i) => i), deck: shuffledDeck(rand) }, evaluator);
    const initial = stacks.reduce((a, b) => a + b, 0n);

    let steps = 0;
    while (state.phase === "betting") {
      assert.equal(totalChips(state), initial);
      const actor = state.players[state.actionOn ?? -1];
      assert.ok(actor, "someone must be due to act");
      assert.equal(actor.status, "active");
      assert.equal(actor.allIn, false);

      state = applyAction(state, randomInput(state, rand), evaluator).state;
      steps++;
      assert.ok(steps < 500, "hand did not terminate");
    }

    assert.equal(state.handOver, true);
    assert.equal(state.pot, 0n);
    assert.equal(
      state.players.reduce((a, p) => a + p.stack, 0n),
      initial
    );
    assert.equal(
      state.players.reduce((a, p) => a + p.reward, 0),
      0
    );
  }
});

test("engine: passive play ends within players x streets x 2 steps", () => {
  const rand = prng(7);
  for (let n = 2; n <= 6; n++) {
    const stacks = Array.from({ length: n }, () => 200n);
    const table = new HoldemTable(params);
    let ts = table.reset({ stacks, seating: stacks.map((_, i) => i), deck: shuffledDeck(rand) });
    let steps = 0;
    while (!ts.terminal) {
      const legal = table.legalActions();
      const action: AgentAction = legal?.kinds.includes("Check") ? { kind: "Check" } : { kind: "Call" };
      ts = table.step(action);
      steps++;
    }
    assert.ok(steps <= n * 4 * 2, `${n} players took ${steps} steps`);
    assert.equal(table.state?.board.length, 5);
  }
});

test("engine: heads-up check-check advances the street exactly once", () => {
  const table = new HoldemTable(params);
  table.reset(setup([100n, 100n], ["As Kd", "7c 2h"], BOARD));
  table.step({ kind: "Call" });
  table.step({ kind: "Check" });
  assert.equal(table.state?.street, "flop");

  // Postflop the big blind acts first heads-up.
  assert.equal(table.state?.actionOn, 1);
  const first = table.step({ kind: "Check" });
  assert.equal(first.info.street, "flop");
  assert.equal(first.actingPlayer, 0);

  const second = table.step({ kind: "Check" });
  const advanced = second.info.events.filter((e) => e.kind === "StreetAdvanced");
  assert.equal(advanced.length, 1);
  assert.equal(second.info.street, "turn");
  assert.equal(table.state?.board.length, 4);
});

test("engine: single survivor takes the pot without a showdown", () => {
  const evaluator = countingEvaluator();
  const table = new HoldemTable(params, evaluator);
  table.reset(setup([100n, 100n], ["As Kd", "7c 2h"], BOARD));

  table.step({ kind: "Bet", amount: 30 });
  const ts = table.step({ kind: "Fold" });

  assert.equal(ts.terminal, true);
  assert.equal(ts.observation, null);
  assert.equal(ts.actingPlayer, null);
  assert.equal(evaluator.calls, 0);
  assert.deepEqual(
    ts.info.events.map((e) => e.kind),
    ["ActionApplied", "UncalledBetReturned", "PotAwarded", "HandCompleted"]
  );
  assert.deepEqual(ts.info.pots, [{ amount: 20n, eligible: [0], winners: [0], shares: [20n] }]);
  assert.deepEqual(
    table.state?.players.map((p) => p.stack),
    [110n, 90n]
  );
  assert.deepEqual(ts.rewards, [10, -10]);
  assert.equal(table.state?.board.length, 0);
});

test("engine: all-in players get a runout with no further betting", () => {
  const table = new HoldemTable(params);
  table.reset(setup([100n, 100n], ["As Ad", "7c 2h"], BOARD));
  table.step({ kind: "Bet", amount: 100 });
  const ts = table.step({ kind: "Call" });

  assert.equal(ts.terminal, true);
  const streets = ts.info.events.flatMap((e) => (e.kind === "StreetAdvanced" ? [e.street] : []));
  assert.deepEqual(streets, ["flop", "turn", "river"]);
  assert.equal(table.state?.board.length, 5);
  assert.deepEqual(
    table.state?.players.map((p) => p.stack),
    [200n, 0n]
  );
});

test("engine: blinds that put everyone all-in end the hand at reset", () => {
  const table = new HoldemTable(params);
  const ts = table.reset(setup([3n, 100n], ["As Ad", "7c 2h"], BOARD));

  assert.equal(ts.terminal, true);
  assert.equal(ts.observation, null);
  const returned = ts.info.events.find((e) => e.kind === "UncalledBetReturned");
  assert.deepEqual(returned, { kind: "UncalledBetReturned", player: 1, amount: 7n });
  // Aces hold: the small blind doubles through the 3 chips matched.
  assert.deepEqual(ts.rewards, [3, -3]);
  assert.deepEqual(
    table.state?.players.map((p) => p.stack),
    [6n, 97n]
  );
});

test("engine: a raise reopens action for players who already called", () => {
  const table = new HoldemTable(params);
  table.reset(setup([100n, 100n, 100n], ["2c 2d", "4c 4d", "6h 7h"], BOARD));
  table.step({ kind: "Call" }); // button
  table.step({ kind: "Call" }); // SB
  table.step({ kind: "Bet", amount: 40 }); // BB raises on the option
  assert.equal(table.state?.street, "preflop");
  assert.equal(table.state?.actionOn, 2);
  assert.equal(table.state?.lastAggressor, 1);
  table.step({ kind: "Call" });
  const ts = table.step({ kind: "Call" });
  assert.equal(ts.info.street, "flop");
  assert.equal(table.state?.pot, 120n);
  assert.equal(table.state?.firstToAct, 0);
});

test("engine: driver precondition violations throw", () => {
  const table = new HoldemTable(params);
  assert.throws(() => table.step({ kind: "Check" }), (e) => e instanceof PokerEngineError && e.code === "NO_HAND");

  assert.throws(
    () => table.reset({ stacks: [100n], seating: [0], deck: orderedDeck() }),
    (e) => e instanceof PokerEngineError && e.code === "INVALID_PLAYER_COUNT"
  );
  const seven = Array.from({ length: 7 }, () => 100n);
  assert.throws(
    () => table.reset({ stacks: seven, seating: seven.map((_, i) => i), deck: orderedDeck() }),
    (e) => e instanceof PokerEngineError && e.code === "INVALID_PLAYER_COUNT"
  );
  assert.throws(
    () => table.reset({ stacks: [100n, 100n], seating: [0, 0], deck: orderedDeck() }),
    (e) => e instanceof PokerEngineError && e.code === "INVALID_SEATING"
  );
  assert.throws(
    () => table.reset({ stacks: [100n, 0n], seating: [0, 1], deck: orderedDeck() }),
    (e) => e instanceof PokerEngineError && e.code === "INVALID_STACK"
  );
  assert.throws(
    () => table.reset({ stacks: [100n, 100n], seating: [0, 1], deck: [0, 1, 2, 3, 4, 5, 6, 7, 7] }),
    (e) => e instanceof PokerEngineError && e.code === "INVALID_DECK"
  );
  assert.throws(
    () => new HoldemTable({ smallBlind: 10n, bigBlind: 10n, invalidActionPenalty: 0 }),
    (e) => e instanceof PokerEngineError && e.code === "INVALID_PARAMS"
  );

  table.reset(setup([100n, 100n], ["As Kd", "7c 2h"], BOARD));
  table.step({ kind: "Fold" });
  assert.throws(() => table.step({ kind: "Check" }), (e) => e instanceof PokerEngineError && e.code === "HAND_NOT_ACTIVE");
});

test("engine: operations leave their input state untouched", () => {
  const evaluator = countingEvaluator();
  const before = startHand(params, setup([100n, 100n], ["As Kd", "7c 2h"], BOARD), evaluator);
  const stack = before.players[0]?.stack;
  const events = before.events.length;
  const after = applyAction(before, { kind: "Bet", amount: 50 }, evaluator).state;

  assert.equal(before.players[0]?.stack, stack);
  assert.equal(before.events.length, events);
  assert.equal(before.actionOn, 0);
  assert.equal(after.players[0]?.stack, 50n);
  assert.equal(after.actionOn, 1);
});

test("engine: seating decides positions and who acts first", () => {
  const table = new HoldemTable(params);
  // Player 2 is the small blind, player 0 the big blind, player 1 the button.
  const ts = table.reset(setup([100n, 100n, 100n], ["2c 2d", "4c 4d", "6h 7h"], BOARD, [2, 0, 1]));
  assert.deepEqual(
    table.state?.players.map((p) => p.position),
    [1, 2, 0]
  );
  assert.equal(ts.actingPlayer, 1);
  assert.deepEqual(
    table.state?.players.map((p) => p.streetCommit),
    [10n, 0n, 5n]
  );
  // Position 0 receives the first hole cards.
  assert.deepEqual(table.state?.players[2]?.holeCards, [0, 13]);
});

test("engine: an all-in player who wins at showdown keeps the pot", () => {
  const table = new HoldemTable(params);
  table.reset(setup([100n, 100n], ["As Ad", "7c 2h"], BOARD));
  table.step({ kind: "Bet", amount: 100 }); // SB shoves
  const ts = table.step({ kind: "Call" }); // BB calls all-in

  assert.equal(ts.terminal, true);
  assert.deepEqual(ts.rewards, [100, -100]);
  assert.deepEqual(
    table.state?.players.map((p) => [p.stack, p.allIn]),
    [
      [200n, false],
      [0n, true]
    ]
  );
});

test("engine: restoring a hand that un-folds a player is rejected", () => {
  const table = new HoldemTable(params);
  table.reset(setup([100n, 100n, 100n], ["2c 2d", "4c 4d", "6h 7h"], BOARD));
  table.step({ kind: "Fold" }); // button

  const tampered = table.snapshot();
  const button = tampered.players[2];
  assert.ok(button);
  button.status = "active";
  tampered.activeCount = 3;

  assert.throws(
    () => new HoldemTable(params).restore(tampered),
    (e) => e instanceof PokerEngineError && e.code === "INVARIANT_VIOLATION" && /folded player re-activated/.test(e.message)
  );
});

test("engine: a transition may not bring a folded player back", () => {
  const evaluator = countingEvaluator();
  const start = startHand(params, setup([100n, 100n, 100n], ["2c 2d", "4c 4d", "6h 7h"], BOARD), evaluator);
  const afterFold = applyAction(start, { kind: "Fold" }, evaluator).state;
  assert.doesNotThrow(() => assertTransition(start, afterFold));

  const revived = cloneHandState(afterFold);
  const button = revived.players[2];
  assert.ok(button);
  button.status = "active";
  assert.throws(
    () => assertTransition(afterFold, revived),
    (e) => e instanceof PokerEngineError && e.code === "INVARIANT_VIOLATION"
  );
});
