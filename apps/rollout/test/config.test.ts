import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults on an empty environment", () => {
    expect(loadConfig({})).toEqual({
      hands: 100,
      seed: 1,
      minPlayers: 2,
      maxPlayers: 6,
      smallBlind: 1n,
      bigBlind: 2n,
      stackLowBb: 50,
      stackHighBb: 200,
      invalidActionPenalty: 0,
      agents: ["random"],
      handHistoryDir: null,
      handHistoryEvery: 50,
      trackPlayer: null,
      quiet: false
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      ROLLOUT_HANDS: "25",
      ROLLOUT_SEED: "9",
      ROLLOUT_MIN_PLAYERS: "3",
      ROLLOUT_MAX_PLAYERS: "4",
      ROLLOUT_SMALL_BLIND: "5",
      ROLLOUT_BIG_BLIND: "10",
      ROLLOUT_STACK_LOW_BB: "20",
      ROLLOUT_STACK_HIGH_BB: "40",
      ROLLOUT_INVALID_ACTION_PENALTY: "2.5",
      ROLLOUT_AGENTS: "tag, calling-station ,random",
      ROLLOUT_HAND_HISTORY_DIR: "/tmp/histories",
      ROLLOUT_HAND_HISTORY_EVERY: "5",
      ROLLOUT_TRACK_PLAYER: "2",
      ROLLOUT_QUIET: "yes"
    });
    expect(config).toEqual({
      hands: 25,
      seed: 9,
      minPlayers: 3,
      maxPlayers: 4,
      smallBlind: 5n,
      bigBlind: 10n,
      stackLowBb: 20,
      stackHighBb: 40,
      invalidActionPenalty: 2.5,
      agents: ["tag", "calling-station", "random"],
      handHistoryDir: "/tmp/histories",
      handHistoryEvery: 5,
      trackPlayer: 2,
      quiet: true
    });
  });

  it("rejects out-of-range player counts", () => {
    expect(() => loadConfig({ ROLLOUT_MAX_PLAYERS: "7" })).toThrow(/maxPlayers/);
    expect(() => loadConfig({ ROLLOUT_MIN_PLAYERS: "5", ROLLOUT_MAX_PLAYERS: "3" })).toThrow(
      /ROLLOUT_MIN_PLAYERS must be <= ROLLOUT_MAX_PLAYERS/
    );
  });

  it("rejects blinds that are not increasing", () => {
    expect(() => loadConfig({ ROLLOUT_SMALL_BLIND: "2", ROLLOUT_BIG_BLIND: "2" })).toThrow(/SMALL_BLIND/);
    expect(() => loadConfig({ ROLLOUT_BIG_BLIND: "1.5" })).toThrow(/whole number/);
  });

  it("reports every bad variable in one message", () => {
    expect(() => loadConfig({ ROLLOUT_SMALL_BLIND: "x", ROLLOUT_HANDS: "ten" })).toThrow(
      /hands: .*; smallBlind: must be a whole number of chips/
    );
  });

  it("rejects unknown agents and non-integer counts", () => {
    expect(() => loadConfig({ ROLLOUT_AGENTS: "random,shark" })).toThrow(/agents/);
    expect(() => loadConfig({ ROLLOUT_HANDS: "ten" })).toThrow(/hands/);
  });
});
