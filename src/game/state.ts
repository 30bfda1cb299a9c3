import type { Stack, Player } from "../types.ts";

export type NodeId = string;
export type BoardState = Map<NodeId, Stack>;

export type BoardSize = 3 | 4 | 5 | 6 | 7 | 8;
export type GameResult = "ongoing" | "whiteWin" | "blackWin" | "draw";

export interface Reserves {
  stones: number;
  caps: number;
}

/**
 * A Tak position. The search treats it as immutable: `applyMove` returns a fresh
 * state and never touches the one it was given.
 */
export interface GameState {
  size: BoardSize;
  board: BoardState;
  toMove: Player;
  /** Plies played so far; plies 0 and 1 place the opponent's flat. */
  ply: number;
  /** Komi in half points, credited to Black when flats are counted. */
  halfKomi: number;
  reserves: Record<Player, Reserves>;
  result: GameResult;
}

export const RESERVES_BY_SIZE: Record<BoardSize, Readonly<Reserves>> = {
  3: { stones: 10, caps: 0 },
  4: { stones: 15, caps: 0 },
  5: { stones: 21, caps: 1 },
  6: { stones: 30, caps: 1 },
  7: { stones: 40, caps: 2 },
  8: { stones: 50, caps: 2 },
};

export function isBoardSize(raw: unknown): raw is BoardSize {
  return raw === 3 || raw === 4 || raw === 5 || raw === 6 || raw === 7 || raw === 8;
}

/** `pieces` overrides the standard supply for the board size, for games seeked with custom counts. */
export function createInitialGameState(
  size: BoardSize,
  opts: { halfKomi?: number; pieces?: Reserves } = {}
): GameState {
  const start = opts.pieces ?? RESERVES_BY_SIZE[size];
  return {
    size,
    board: new Map(),
    toMove: "W",
    ply: 0,
    halfKomi: opts.halfKomi ?? 0,
    reserves: {
      W: { stones: start.stones, caps: start.caps },
      B: { stones: start.stones, caps: start.caps },
    },
    result: "ongoing",
  };
}

/** During the first two plies each side places a flat of the opponent's colour. */
export function isOpeningPly(state: GameState): boolean {
  return state.ply < 2;
}

export function winnerOf(result: GameResult): Player | null {
  switch (result) {
    case "whiteWin":
      return "W";
    case "blackWin":
      return "B";
    case "draw":
    case "ongoing":
      return null;
  }
}
