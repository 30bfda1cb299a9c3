import type { Piece, PieceKind, Player, Stack } from "../types.ts";
import type { BoardState, GameState } from "./state.ts";
import { otherPlayer, topOf } from "../types.ts";
import { isBoardSize, RESERVES_BY_SIZE } from "./state.ts";
import { makeNodeId } from "./coords.ts";
import { resolveResult } from "./gameOver.ts";
import { NotationError } from "../shared/errors.ts";

const EMPTY_RE = /^x(?<n>\d*)$/;
const STACK_RE = /^(?<colors>[12]+)(?<top>[SC])?$/;

function parseStack(text: string, tps: string): Stack {
  const m = STACK_RE.exec(text);
  if (!m || !m.groups) throw new NotationError(`invalid TPS square "${text}"`, { tps });

  const owners: Player[] = Array.from(m.groups.colors, (ch) => (ch === "1" ? "W" : "B"));
  const rawTop = m.groups.top;
  const topKind: PieceKind = rawTop === "S" || rawTop === "C" ? rawTop : "F";
  return owners.map((owner, i): Piece => ({ owner, kind: i === owners.length - 1 ? topKind : "F" }));
}

/**
 * Parse a TPS position ("x3/x3/x3 1 1"). Ranks are listed top to bottom. Reserves are
 * whatever the starting supply leaves after the pieces on the board.
 */
export function parseTps(tps: string, opts: { halfKomi?: number } = {}): GameState {
  const parts = tps.trim().split(/\s+/);
  if (parts.length !== 3) throw new NotationError("TPS needs a board, a player and a move number", { tps });
  const [boardText, playerText, moveText] = parts;

  const rows = boardText.split("/");
  const size = rows.length;
  if (!isBoardSize(size)) throw new NotationError(`unsupported TPS board size ${size}`, { tps });

  if (playerText !== "1" && playerText !== "2") throw new NotationError(`invalid TPS player "${playerText}"`, { tps });
  const moveNumber = Number(moveText);
  if (!Number.isInteger(moveNumber) || moveNumber < 1) {
    throw new NotationError(`invalid TPS move number "${moveText}"`, { tps });
  }

  const board: BoardState = new Map();
  rows.forEach((rowText, i) => {
    const r = size - 1 - i;
    let c = 0;
    for (const square of rowText.split(",")) {
      const empty = EMPTY_RE.exec(square);
      if (empty && empty.groups) {
        c += empty.groups.n ? Number(empty.groups.n) : 1;
        continue;
      }
      board.set(makeNodeId(r, c), parseStack(square, tps));
      c++;
    }
    if (c !== size) throw new NotationError(`TPS rank ${r + 1} has ${c} squares, expected ${size}`, { tps });
  });

  const start = RESERVES_BY_SIZE[size];
  const reserves = {
    W: { stones: start.stones, caps: start.caps },
    B: { stones: start.stones, caps: start.caps },
  };
  for (const stack of board.values()) {
    for (const piece of stack) {
      if (piece.kind === "C") reserves[piece.owner].caps--;
      else reserves[piece.owner].stones--;
    }
  }
  for (const p of ["W", "B"] as const) {
    if (reserves[p].stones < 0 || reserves[p].caps < 0) {
      throw new NotationError(`TPS uses more pieces than ${p} owns on a ${size}x${size} board`, { tps });
    }
  }

  const toMove: Player = playerText === "1" ? "W" : "B";
  const state: GameState = {
    size,
    board,
    toMove,
    ply: 2 * (moveNumber - 1) + (toMove === "B" ? 1 : 0),
    halfKomi: opts.halfKomi ?? 0,
    reserves,
    result: "ongoing",
  };
  state.result = resolveResult(state, otherPlayer(toMove));
  return state;
}

function formatStack(stack: Stack): string {
  const digits = stack.map((p) => (p.owner === "W" ? "1" : "2")).join("");
  const top = topOf(stack);
  return top && top.kind !== "F" ? `${digits}${top.kind}` : digits;
}

export function formatTps(state: GameState): string {
  const rows: string[] = [];
  for (let r = state.size - 1; r >= 0; r--) {
    const squares: string[] = [];
    let empties = 0;
    const flush = () => {
      if (empties === 0) return;
      squares.push(empties === 1 ? "x" : `x${empties}`);
      empties = 0;
    };
    for (let c = 0; c < state.size; c++) {
      const stack = state.board.get(makeNodeId(r, c));
      if (!stack || stack.length === 0) {
        empties++;
        continue;
      }
      flush();
      squares.push(formatStack(stack));
    }
    flush();
    rows.push(squares.join(","));
  }

  const player = state.toMove === "W" ? 1 : 2;
  const moveNumber = Math.floor(state.ply / 2) + 1;
  return `${rows.join("/")} ${player} ${moveNumber}`;
}
