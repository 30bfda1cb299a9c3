import type { GameState, BoardState } from "./state.ts";
import type { Move, PlaceMove, SpreadMove } from "./moveTypes.ts";
import type { Piece, Player } from "../types.ts";
import { otherPlayer, topOf } from "../types.ts";
import { isOpeningPly } from "./state.ts";
import { inBounds, parseNodeId, stepFrom } from "./coords.ts";
import { carriedCount, movesEqual } from "./moveTypes.ts";
import { resolveResult } from "./gameOver.ts";
import { generateLegalMoves } from "./movegen.ts";
import { IllegalMoveError } from "../shared/errors.ts";

function applyPlace(state: GameState, board: BoardState, move: PlaceMove): GameState["reserves"] {
  const { r, c } = parseNodeId(move.to);
  if (!inBounds(r, c, state.size)) {
    throw new IllegalMoveError(`applyMove: ${move.to} is off the board`, { move });
  }
  const existing = board.get(move.to);
  if (existing && existing.length > 0) {
    throw new IllegalMoveError(`applyMove: ${move.to} is occupied`, { move });
  }

  const opening = isOpeningPly(state);
  if (opening && move.piece !== "F") {
    throw new IllegalMoveError("applyMove: only flats may be placed in the first two plies", { move });
  }

  const owner: Player = opening ? otherPlayer(state.toMove) : state.toMove;
  const reserves = { W: { ...state.reserves.W }, B: { ...state.reserves.B } };
  const pool = reserves[owner];

  if (move.piece === "C") {
    if (pool.caps <= 0) throw new IllegalMoveError("applyMove: no capstones left", { move });
    pool.caps--;
  } else {
    if (pool.stones <= 0) throw new IllegalMoveError("applyMove: no stones left", { move });
    pool.stones--;
  }

  board.set(move.to, [{ owner, kind: move.piece }]);
  return reserves;
}

function applySpread(state: GameState, board: BoardState, move: SpreadMove): void {
  if (isOpeningPly(state)) {
    throw new IllegalMoveError("applyMove: no spreads in the first two plies", { move });
  }

  const origin = board.get(move.from);
  const top = topOf(origin);
  if (!origin || !top || top.owner !== state.toMove) {
    throw new IllegalMoveError(`applyMove: ${state.toMove} does not control ${move.from}`, { move });
  }

  const count = carriedCount(move);
  if (move.drops.length === 0 || move.drops.some((d) => !Number.isInteger(d) || d < 1)) {
    throw new IllegalMoveError("applyMove: every drop must be a positive integer", { move });
  }
  if (count > origin.length || count > state.size) {
    throw new IllegalMoveError(`applyMove: cannot carry ${count} from ${move.from}`, { move });
  }

  const lifted = origin.slice(origin.length - count);
  const remaining = origin.slice(0, origin.length - count);
  if (remaining.length > 0) board.set(move.from, remaining);
  else board.delete(move.from);

  let dropped = 0;
  move.drops.forEach((drop, i) => {
    const id = stepFrom(move.from, move.direction, i + 1, state.size);
    if (!id) throw new IllegalMoveError("applyMove: spread runs off the board", { move });

    const target = board.get(id) ?? [];
    const targetTop = topOf(target);
    const isLast = i === move.drops.length - 1;
    let below: Piece[] = target;

    if (targetTop && targetTop.kind === "C") {
      throw new IllegalMoveError(`applyMove: cannot spread onto the capstone at ${id}`, { move });
    }
    if (targetTop && targetTop.kind === "S") {
      const mover = lifted[lifted.length - 1];
      if (!isLast || drop !== 1 || !mover || mover.kind !== "C") {
        throw new IllegalMoveError(`applyMove: cannot spread onto the wall at ${id}`, { move });
      }
      below = [...target.slice(0, -1), { owner: targetTop.owner, kind: "F" }];
    }

    board.set(id, [...below, ...lifted.slice(dropped, dropped + drop)]);
    dropped += drop;
  });
}

/**
 * Clone-and-play: returns the position after `move`. The input state is never
 * mutated; unchanged stacks are shared between the two states.
 */
export function applyMove(state: GameState, move: Move): GameState {
  if (state.result !== "ongoing") {
    throw new IllegalMoveError("applyMove: the game is already over", { result: state.result });
  }

  const board: BoardState = new Map(state.board);
  let reserves = state.reserves;

  if (move.kind === "place") reserves = applyPlace(state, board, move);
  else applySpread(state, board, move);

  const next: GameState = {
    ...state,
    board,
    reserves,
    ply: state.ply + 1,
    toMove: otherPlayer(state.toMove),
  };
  next.result = resolveResult(next, state.toMove);
  return next;
}

export function isLegalMove(state: GameState, move: Move): boolean {
  return generateLegalMoves(state).some((m) => movesEqual(m, move));
}

/** Like `applyMove`, but first checks the move against the legal move list. For untrusted input. */
export function playMove(state: GameState, move: Move): GameState {
  if (!isLegalMove(state, move)) {
    throw new IllegalMoveError("move is not legal in this position", { move, ply: state.ply });
  }
  return applyMove(state, move);
}
