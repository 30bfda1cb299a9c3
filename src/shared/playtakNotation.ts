import type { Direction, Move } from "../game/moveTypes.ts";
import type { NodeId } from "../game/state.ts";
import type { PieceKind } from "../types.ts";
import { DIRECTION_DELTAS, parseNodeId } from "../game/coords.ts";
import { squareToNodeId } from "../game/coordFormat.ts";
import { NotationError } from "./errors.ts";

// PlayTak writes squares with an upper-case file letter: "A1".."H8".
const FILES = "ABCDEFGH";
const DROP_RE = /^[1-8]$/;

function toPlaytakSquareAt(r: number, c: number): string {
  const file = c >= 0 && c < FILES.length ? FILES[c] : undefined;
  if (file === undefined || r < 0 || r >= 8) {
    throw new NotationError(`square r${r}c${c} cannot be written in PlayTak notation`);
  }
  return `${file}${r + 1}`;
}

export function toPlaytakSquare(nodeId: NodeId): string {
  const { r, c } = parseNodeId(nodeId);
  return toPlaytakSquareAt(r, c);
}

const PIECE_SUFFIX: Record<PieceKind, string> = {
  F: "",
  S: " W",
  C: " C",
};

export function encodePlaytakMove(move: Move): string {
  if (move.kind === "place") {
    return `P ${toPlaytakSquare(move.to)}${PIECE_SUFFIX[move.piece]}`;
  }

  const { r, c } = parseNodeId(move.from);
  const { dr, dc } = DIRECTION_DELTAS[move.direction];
  const steps = move.drops.length;
  const end = toPlaytakSquareAt(r + dr * steps, c + dc * steps);
  return `M ${toPlaytakSquare(move.from)} ${end} ${move.drops.join(" ")}`;
}

function parseSquare(text: string, line: string): { id: NodeId; r: number; c: number } {
  const id = squareToNodeId(text);
  if (!id) throw new NotationError(`invalid PlayTak square "${text}"`, { line });
  return { id, ...parseNodeId(id) };
}

function directionBetween(from: { r: number; c: number }, to: { r: number; c: number }, line: string): Direction {
  const fileDelta = to.c - from.c;
  const rankDelta = to.r - from.r;
  if (fileDelta !== 0 && rankDelta !== 0) {
    throw new NotationError("PlayTak spread must move along a rank or a file", { line });
  }
  if (fileDelta > 0) return "right";
  if (fileDelta < 0) return "left";
  if (rankDelta > 0) return "up";
  if (rankDelta < 0) return "down";
  throw new NotationError("PlayTak spread starts and ends on the same square", { line });
}

export function decodePlaytakMove(line: string): Move {
  const parts = line.trim().split(/\s+/);
  const [tag, ...rest] = parts;

  if (tag === "P" && (rest.length === 1 || rest.length === 2)) {
    const { id } = parseSquare(rest[0], line);
    const suffix = rest[1];
    let piece: PieceKind;
    if (suffix === undefined) piece = "F";
    else if (suffix === "W") piece = "S";
    else if (suffix === "C") piece = "C";
    else throw new NotationError(`invalid PlayTak piece "${suffix}"`, { line });
    return { kind: "place", piece, to: id };
  }

  if (tag === "M" && rest.length >= 3) {
    const [startText, endText, ...dropTexts] = rest;
    const start = parseSquare(startText, line);
    const end = parseSquare(endText, line);
    if (!dropTexts.every((d) => DROP_RE.test(d))) {
      throw new NotationError("invalid PlayTak drop counts", { line });
    }

    const direction = directionBetween(start, end, line);
    const distance = Math.abs(end.r - start.r) + Math.abs(end.c - start.c);
    if (distance !== dropTexts.length) {
      throw new NotationError(`PlayTak spread covers ${distance} squares but lists ${dropTexts.length} drops`, { line });
    }
    return { kind: "spread", from: start.id, direction, drops: dropTexts.map(Number) };
  }

  throw new NotationError(`unrecognized PlayTak move: ${line}`, { line });
}
