import { MAX_PLAYERS, MIN_PLAYERS } from "@holdem-rl/holdem-engine";
import { z } from "zod";

export const AGENT_KINDS = ["random", "calling-station", "tag"] as const;
export type AgentKind = (typeof AGENT_KINDS)[number];

export interface RolloutConfig {
  hands: number;
  seed: number;
  minPlayers: number;
  maxPlayers: number;
  smallBlind: bigint;
  bigBlind: bigint;
  /** Stacks are drawn uniformly from [stackLowBb, stackHighBb] big blinds each hand. */
  stackLowBb: number;
  stackHighBb: number;
  invalidActionPenalty: number;
  /** Agent per player id; cycled when shorter than maxPlayers. */
  agents: AgentKind[];
  /** Directory for hand-history transcripts; null disables them. */
  handHistoryDir: string | null;
  handHistoryEvery: number;
  /** Only this player's hole cards go into transcripts; null shows everyone's. */
  trackPlayer: number | null;
  quiet: boolean;
}

type Env = Record<string, string | undefined>;

function envStr(env: Env, key: string, fallback: string): string {
  return (env[key] ?? "").trim() || fallback;
}

function envBool(env: Env, key: string, fallback: boolean): boolean {
  const v = (env[key] ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes";
}

function envInt(env: Env, key: string, fallback: number): number {
  const v = (env[key] ?? "").trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) ? n : Number.NaN;
}

const chipsSchema = z
  .string()
  .regex(/^\d+$/, "must be a whole number of chips")
  .transform((v) => BigInt(v))
  .pipe(z.bigint().positive());

const RolloutConfigSchema = z
  .object({
    hands: z.number().int().min(1),
    seed: z.number().int().min(0),
    minPlayers: z.number().int().min(MIN_PLAYERS).max(MAX_PLAYERS),
    maxPlayers: z.number().int().min(MIN_PLAYERS).max(MAX_PLAYERS),
    smallBlind: chipsSchema,
    bigBlind: chipsSchema,
    stackLowBb: z.number().int().min(1),
    stackHighBb: z.number().int().min(1),
    invalidActionPenalty: z.number().finite().min(0),
    agents: z.array(z.enum(AGENT_KINDS)).min(1),
    handHistoryDir: z.string().min(1).nullable(),
    handHistoryEvery: z.number().int().min(1),
    trackPlayer: z.number().int().min(0).max(MAX_PLAYERS - 1).nullable(),
    quiet: z.boolean()
  })
  .refine((c) => c.minPlayers <= c.maxPlayers, { message: "ROLLOUT_MIN_PLAYERS must be <= ROLLOUT_MAX_PLAYERS" })
  .refine((c) => c.smallBlind < c.bigBlind, { message: "ROLLOUT_SMALL_BLIND must be < ROLLOUT_BIG_BLIND" })
  .refine((c) => c.stackLowBb <= c.stackHighBb, { message: "ROLLOUT_STACK_LOW_BB must be <= ROLLOUT_STACK_HIGH_BB" });

export function loadConfig(env: Env = process.env): RolloutConfig {
  const trackPlayer = envStr(env, "ROLLOUT_TRACK_PLAYER", "");
  const handHistoryDir = envStr(env, "ROLLOUT_HAND_HISTORY_DIR", "");

  const parsed = RolloutConfigSchema.safeParse({
    hands: envInt(env, "ROLLOUT_HANDS", 100),
    seed: envInt(env, "ROLLOUT_SEED", 1),
    minPlayers: envInt(env, "ROLLOUT_MIN_PLAYERS", MIN_PLAYERS),
    maxPlayers: envInt(env, "ROLLOUT_MAX_PLAYERS", MAX_PLAYERS),
    smallBlind: envStr(env, "ROLLOUT_SMALL_BLIND", "1"),
    bigBlind: envStr(env, "ROLLOUT_BIG_BLIND", "2"),
    stackLowBb: envInt(env, "ROLLOUT_STACK_LOW_BB", 50),
    stackHighBb: envInt(env, "ROLLOUT_STACK_HIGH_BB", 200),
    invalidActionPenalty: Number(envStr(env, "ROLLOUT_INVALID_ACTION_PENALTY", "0")),
    agents: envStr(env, "ROLLOUT_AGENTS", "random")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    handHistoryDir: handHistoryDir || null,
    handHistoryEvery: envInt(env, "ROLLOUT_HAND_HISTORY_EVERY", 50),
    trackPlayer: trackPlayer ? Number(trackPlayer) : null,
    quiet: envBool(env, "ROLLOUT_QUIET", false)
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new Error(`Invalid rollout config: ${issues.join("; ")}`);
  }
  return parsed.data;
}
