import type { GameState } from "../game/state.ts";
import type { Move, PlaceMove, SpreadMove } from "../game/moveTypes.ts";
import type { Player } from "../types.ts";
import type { MoveRankWeights } from "./aiTypes.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { orthogonalNeighbors, parseNodeId } from "../game/coords.ts";
import { carriedCount } from "../game/moveTypes.ts";
import { isOpeningPly } from "../game/state.ts";
import { isRoadPiece, otherPlayer, topOf } from "../types.ts";
import { DEFAULT_RANK_WEIGHTS } from "./aiTypes.ts";

/** Everything `scoreMove` needs that depends only on the position, computed once. */
export interface RankContext {
  state: GameState;
  weights: MoveRankWeights;
  mover: Player;
  opponent: Player;
  /** Road pieces (flat or capstone on top) the mover has in each row / column. */
  rowRoad: number[];
  colRoad: number[];
  /** Opening plies place the opponent's piece, so the score is negated. */
  flip: boolean;
}

export function roadCounts(state: GameState, player: Player): { rows: number[]; cols: number[] } {
  const rows = new Array<number>(state.size).fill(0);
  const cols = new Array<number>(state.size).fill(0);
  for (const [nodeId, stack] of state.board.entries()) {
    const top = topOf(stack);
    if (!top || top.owner !== player || !isRoadPiece(top.kind)) continue;
    const { r, c } = parseNodeId(nodeId);
    rows[r]++;
    cols[c]++;
  }
  return { rows, cols };
}

export function distanceFromCenter(r: number, c: number, size: number): number {
  const mid = (size - 1) / 2;
  return Math.abs(r - mid) + Math.abs(c - mid);
}

export function createRankContext(state: GameState, weights: MoveRankWeights = DEFAULT_RANK_WEIGHTS): RankContext {
  const mover = state.toMove;
  const { rows, cols } = roadCounts(state, mover);
  return {
    state,
    weights,
    mover,
    opponent: otherPlayer(mover),
    rowRoad: rows,
    colRoad: cols,
    flip: isOpeningPly(state),
  };
}

function placementScore(ctx: RankContext, move: PlaceMove): number {
  const w = ctx.weights;
  const { r, c } = parseNodeId(move.to);
  let score = w.placement - w.centrality * distanceFromCenter(r, c, ctx.state.size);

  switch (move.piece) {
    case "F":
      score += w.flat;
      break;
    case "C":
      score += w.capstone;
      break;
    case "S":
      score += w.wall;
      break;
  }

  if (isRoadPiece(move.piece)) {
    score += w.roadLine * (ctx.rowRoad[r] + ctx.colRoad[c]);
  }

  if (move.piece === "S" || move.piece === "C") {
    for (const id of orthogonalNeighbors(move.to, ctx.state.size)) {
      const stack = ctx.state.board.get(id);
      const top = topOf(stack);
      if (!stack || !top) continue;
      if (top.owner === ctx.opponent) score += w.nobleNextToOpponent;
      score += w.nobleNeighborHeight * stack.length;
    }
  }

  return score;
}

function spreadScore(ctx: RankContext, move: SpreadMove): number {
  const w = ctx.weights;
  const stack = ctx.state.board.get(move.from) ?? [];
  let score = 0;

  if (topOf(stack)?.kind === "F") score -= w.spreadFlatTop;

  // Lifted pieces keep their bottom-to-top order; after `dropped` pieces have been
  // let go, the last one dropped is on top of that square.
  const lifted = stack.slice(stack.length - carriedCount(move));
  let dropped = 0;
  for (let i = 0; i < move.drops.length - 1; i++) {
    dropped += move.drops[i];
    if (lifted[dropped - 1]?.owner === ctx.mover) score += w.spreadOwnTop;
  }

  return score;
}

/** Heuristic desirability of `move`; higher is better for the side to move. */
export function scoreMove(ctx: RankContext, move: Move): number {
  const score = move.kind === "place" ? placementScore(ctx, move) : spreadScore(ctx, move);
  return ctx.flip ? -score : score;
}

/**
 * Legal moves best first. The sort is stable, so equal scores keep the rules
 * engine's enumeration order.
 */
export function rankMoves(state: GameState, weights: MoveRankWeights = DEFAULT_RANK_WEIGHTS): Move[] {
  const ctx = createRankContext(state, weights);
  return generateLegalMoves(state)
    .map((move) => ({ move, score: scoreMove(ctx, move) }))
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.move);
}
