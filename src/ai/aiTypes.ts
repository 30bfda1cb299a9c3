import type { Player } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";

export type AIDifficulty = "human" | "easy" | "medium" | "advanced";

export interface AISettings {
  white: AIDifficulty;
  black: AIDifficulty;
}

export function difficultyForPlayer(settings: AISettings, p: Player): AIDifficulty {
  return p === "W" ? settings.white : settings.black;
}

export function isAIDifficulty(raw: unknown): raw is AIDifficulty {
  return raw === "human" || raw === "easy" || raw === "medium" || raw === "advanced";
}

/** Search depth used by each searching difficulty. "easy" is the greedy policy. */
export const DIFFICULTY_DEPTH: Record<"medium" | "advanced", number> = {
  medium: 2,
  advanced: 3,
};

/** Heuristic weights for move ordering. Pass an alternate set to tune or test. */
export interface MoveRankWeights {
  readonly placement: number;
  readonly flat: number;
  readonly capstone: number;
  readonly wall: number;
  /** Per unit of Manhattan distance from the centre, placements only. */
  readonly centrality: number;
  /** Per road piece of the mover already in the target row and column. */
  readonly roadLine: number;
  readonly nobleNextToOpponent: number;
  /** Per piece in each occupied neighbour of a wall or capstone placement. */
  readonly nobleNeighborHeight: number;
  /** Subtracted when a spread lifts off a flat-topped stack. */
  readonly spreadFlatTop: number;
  /** Per intermediate drop that leaves the mover on top. */
  readonly spreadOwnTop: number;
}

export const DEFAULT_RANK_WEIGHTS: MoveRankWeights = Object.freeze({
  placement: 100,
  flat: 100,
  capstone: 50,
  wall: 0,
  centrality: 10,
  roadLine: 10,
  nobleNextToOpponent: 50,
  nobleNeighborHeight: 10,
  spreadFlatTop: 100,
  spreadOwnTop: 20,
});

// Far beyond any heuristic sum on an 8x8 board, and symmetric under negation.
export const WIN_SCORE = 1_000_000;
export const LOSS_SCORE = -WIN_SCORE;

export interface SearchOptions {
  weights?: MoveRankWeights;
}

export type SearchResult = {
  move: Move;
  /** Search value from White's point of view. */
  score: number;
  nodes: number;
  depth: number;
};
