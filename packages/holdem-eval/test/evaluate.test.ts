import { describe, expect, test } from "vitest";
import { Hand } from "pokersolver";

import {
  HandCategory,
  cardToString,
  cardsFromString,
  compareHandRank,
  evaluate5,
  evaluate7,
  evaluateBest,
  handStrength,
  orderedDeck,
  winners
} from "../src/index.js";

const cs = cardsFromString;

function prng(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    // mulberry32
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

function shuffle<T>(arr: T[], rand: () => number): void {
  for (let i = arr.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rand() * (i + 1));
    const tmp = arr[i]!;
    arr[i] = arr[j]!;
    arr[j] = tmp;
  }
}

describe("evaluate7 known-answer", () => {
  test("straight flush (broadway)", () => {
    const r = evaluate7(cs("As Ks Qs Js Ts 2d 3c"));
    expect(r.category).toBe(HandCategory.StraightFlush);
    expect(r.tiebreakers).toEqual([14]);
  });

  test("wheel straight", () => {
    const r = evaluate7(cs("As 2d 3c 4h 5s Kd Qh"));
    expect(r.category).toBe(HandCategory.Straight);
    expect(r.tiebreakers).toEqual([5]);
  });

  test("quads keep the best kicker", () => {
    const r = evaluate7(cs("As Ad Ah Ac 2s 3d 4c"));
    expect(r.category).toBe(HandCategory.Quads);
    expect(r.tiebreakers).toEqual([14, 4]);
  });

  test("full house", () => {
    const r = evaluate7(cs("Ks Kd Kh 2c 2d 3h 4s"));
    expect(r.category).toBe(HandCategory.FullHouse);
    expect(r.tiebreakers).toEqual([13, 2]);
  });

  test("two pair tiebreakers", () => {
    const a = evaluate7(cs("As Ad Ks Kd Qc 2d 3c"));
    const b = evaluate7(cs("As Ad Ks Kd Jc 2d 3c"));
    expect(a.category).toBe(HandCategory.TwoPair);
    expect(a.tiebreakers).toEqual([14, 13, 12]);
    expect(compareHandRank(a, b)).toBe(1);
  });

  test("rejects duplicate cards", () => {
    expect(() => evaluate5(cs("As As Kd Qc Jh"))).toThrow(RangeError);
  });
});

describe("evaluateBest", () => {
  test("six cards pick the flush over the straight", () => {
    const r = evaluateBest(cs("9h 8h 7h 6c 5h 2h"));
    expect(r.category).toBe(HandCategory.Flush);
    expect(r.tiebreakers).toEqual([9, 8, 7, 5, 2]);
  });

  test("rejects fewer than five cards", () => {
    expect(() => evaluateBest(cs("As Kd Qc Jh"))).toThrow(RangeError);
  });
});

describe("handStrength", () => {
  test("royal flush is 1", () => {
    expect(handStrength(cs("As Ks Qs Js Ts 2d 3c"))).toBe(1);
  });

  test("lower is stronger", () => {
    const flush = handStrength(cs("As Qs 9s 4s 2s Kd 3c"));
    const straight = handStrength(cs("As Kd Qh Js Tc 2d 3c"));
    expect(flush).toBeLessThan(straight);
  });

  test("equal hands share a value", () => {
    const board = "As Ks Qs Js Ts";
    expect(handStrength(cs(`${board} 2c 3d`))).toBe(handStrength(cs(`${board} 4h 5h`)));
  });
});

describe("winners()", () => {
  test("ties on board", () => {
    const w = winners(
      cs("As Ks Qs Js Ts"),
      new Map([
        [0, [cs("2c")[0]!, cs("3d")[0]!] as const],
        [5, [cs("Ah")[0]!, cs("Ad")[0]!] as const]
      ])
    );
    expect(w).toEqual([0, 5]);
  });

  test("straight high wins", () => {
    const w = winners(
      cs("2c 3d 4h 5s 9c"),
      new Map([
        [0, [cs("6d")[0]!, cs("Kd")[0]!] as const],
        [1, [cs("Ad")[0]!, cs("7d")[0]!] as const]
      ])
    );
    expect(w).toEqual([0]);
  });
});

describe("randomized cross-check vs pokersolver", () => {
  test("handStrength ordering matches reference (seeded)", () => {
    const rand = prng(0x51c0_ffee);
    const deck = orderedDeck();

    for (let iter = 0; iter < 250; iter += 1) {
      shuffle(deck, rand);
      const cards7a = deck.slice(0, 7);
      const cards7b = deck.slice(7, 14);

      const a = handStrength(cards7a);
      const b = handStrength(cards7b);
      const oursCmp = a === b ? 0 : a < b ? 1 : -1;

      const refA = Hand.solve(cards7a.map(cardToString));
      const refB = Hand.solve(cards7b.map(cardToString));
      const winnersHands = Hand.winners([refA, refB]);
      const refCmp = winnersHands.length === 2 ? 0 : winnersHands[0] === refA ? 1 : -1;

      expect(oursCmp).toBe(refCmp);
    }
  });
});
