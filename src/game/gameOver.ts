import type { BoardState, GameResult, GameState, NodeId } from "./state.ts";
import type { Player } from "../types.ts";
import { otherPlayer, topOf, isRoadPiece } from "../types.ts";
import { makeNodeId, orthogonalNeighbors, parseNodeId } from "./coords.ts";

function controlsRoadSquare(board: BoardState, id: NodeId, player: Player): boolean {
  const top = topOf(board.get(id));
  return top !== null && top.owner === player && isRoadPiece(top.kind);
}

/**
 * Flood fill from one edge looking for the opposite edge. `axis` "col" connects the
 * left and right edges, "row" connects the bottom and top.
 */
function connectsEdges(board: BoardState, size: number, player: Player, axis: "row" | "col"): boolean {
  const seen = new Set<NodeId>();
  const queue: NodeId[] = [];

  for (let i = 0; i < size; i++) {
    const start = axis === "col" ? makeNodeId(i, 0) : makeNodeId(0, i);
    if (controlsRoadSquare(board, start, player)) {
      seen.add(start);
      queue.push(start);
    }
  }

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    const { r, c } = parseNodeId(id);
    if ((axis === "col" ? c : r) === size - 1) return true;

    for (const next of orthogonalNeighbors(id, size)) {
      if (seen.has(next) || !controlsRoadSquare(board, next, player)) continue;
      seen.add(next);
      queue.push(next);
    }
  }

  return false;
}

export function hasRoad(board: BoardState, size: number, player: Player): boolean {
  return connectsEdges(board, size, player, "col") || connectsEdges(board, size, player, "row");
}

/** Flat-topped stacks per colour. Walls and capstones do not count. */
export function countFlats(board: BoardState): Record<Player, number> {
  const counts: Record<Player, number> = { W: 0, B: 0 };
  for (const stack of board.values()) {
    const top = topOf(stack);
    if (top && top.kind === "F") counts[top.owner]++;
  }
  return counts;
}

function isBoardFull(state: GameState): boolean {
  let filled = 0;
  for (const stack of state.board.values()) {
    if (stack.length > 0) filled++;
  }
  return filled === state.size * state.size;
}

function reservesEmpty(state: GameState, p: Player): boolean {
  const r = state.reserves[p];
  return r.stones + r.caps === 0;
}

function winFor(p: Player): GameResult {
  return p === "W" ? "whiteWin" : "blackWin";
}

/** Flat count with komi credited to Black; compared in half points so odd komi is exact. */
export function flatWinResult(state: GameState): GameResult {
  const flats = countFlats(state.board);
  const white = 2 * flats.W;
  const black = 2 * flats.B + state.halfKomi;
  if (white > black) return "whiteWin";
  if (black > white) return "blackWin";
  return "draw";
}

/**
 * Result of the position right after `mover` played. Roads are checked first; a
 * spread that completes roads for both colours wins for the mover.
 */
export function resolveResult(state: GameState, mover: Player): GameResult {
  const opponent = otherPlayer(mover);
  const moverRoad = hasRoad(state.board, state.size, mover);
  const opponentRoad = hasRoad(state.board, state.size, opponent);

  if (moverRoad) return winFor(mover);
  if (opponentRoad) return winFor(opponent);

  if (isBoardFull(state) || reservesEmpty(state, "W") || reservesEmpty(state, "B")) {
    return flatWinResult(state);
  }

  return "ongoing";
}
