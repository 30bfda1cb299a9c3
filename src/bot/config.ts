import type { AIDifficulty } from "../ai/aiTypes.ts";
import type { BoardSize } from "../game/state.ts";
import { isAIDifficulty } from "../ai/aiTypes.ts";
import { isBoardSize } from "../game/state.ts";
import { ConfigurationError } from "../shared/errors.ts";

export type BotConfig = {
  url: string;
  size: BoardSize;
  clockSeconds: number;
  incrementSeconds: number;
  halfKomi: number;
  difficulty: Exclude<AIDifficulty, "human">;
  /** Fixed search depth; overrides the difficulty when set. */
  depth: number | null;
};

export const DEFAULT_PLAYTAK_URL = "ws://playtak.com:9999/ws";

function intFromEnv(env: NodeJS.ProcessEnv, name: string, def: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return def;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const size = intFromEnv(env, "PLAYTAK_SIZE", 6, 3);
  if (!isBoardSize(size)) throw new ConfigurationError(`PLAYTAK_SIZE must be between 3 and 8, got ${size}`);

  const difficulty = env.TAK_DIFFICULTY?.trim() || "medium";
  if (!isAIDifficulty(difficulty) || difficulty === "human") {
    throw new ConfigurationError(`TAK_DIFFICULTY must be easy, medium or advanced, got "${difficulty}"`);
  }

  const depthRaw = env.TAK_DEPTH;
  return {
    url: env.PLAYTAK_URL?.trim() || DEFAULT_PLAYTAK_URL,
    size,
    clockSeconds: intFromEnv(env, "PLAYTAK_CLOCK", 300, 1),
    incrementSeconds: intFromEnv(env, "PLAYTAK_INCREMENT", 5, 0),
    halfKomi: intFromEnv(env, "TAK_KOMI", 0, 0),
    difficulty,
    depth: depthRaw === undefined || depthRaw.trim() === "" ? null : intFromEnv(env, "TAK_DEPTH", 0, 1),
  };
}
