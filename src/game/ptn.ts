import type { Direction, Move } from "./moveTypes.ts";
import type { PieceKind } from "../types.ts";
import { nodeIdToSquare, squareToNodeId } from "./coordFormat.ts";
import { carriedCount } from "./moveTypes.ts";
import { NotationError } from "../shared/errors.ts";

const PLACE_RE = /^(?<piece>[FSC])?(?<square>[a-h][1-8])$/;
const SPREAD_RE = /^(?<count>[1-8])?(?<square>[a-h][1-8])(?<dir>[-+<>])(?<drops>[1-8]*)$/;
// Annotations such as "*" (wall smash) or "'" / "!" (tak, good move) carry no move data.
const ANNOTATIONS_RE = /[*'!?"]+$/;

const DIR_BY_SYMBOL: Record<string, Direction> = {
  "+": "up",
  "-": "down",
  "<": "left",
  ">": "right",
};

const SYMBOL_BY_DIR: Record<Direction, string> = {
  up: "+",
  down: "-",
  left: "<",
  right: ">",
};

function isPieceKind(raw: string): raw is PieceKind {
  return raw === "F" || raw === "S" || raw === "C";
}

export function parsePtnMove(text: string): Move {
  const trimmed = text.trim().replace(ANNOTATIONS_RE, "");

  const place = PLACE_RE.exec(trimmed);
  if (place && place.groups) {
    const to = squareToNodeId(place.groups.square);
    const raw = place.groups.piece ?? "F";
    if (!to || !isPieceKind(raw)) throw new NotationError(`invalid PTN placement: ${text}`);
    return { kind: "place", piece: raw, to };
  }

  const spread = SPREAD_RE.exec(trimmed);
  if (spread && spread.groups) {
    const from = squareToNodeId(spread.groups.square);
    const direction = DIR_BY_SYMBOL[spread.groups.dir];
    if (!from || !direction) throw new NotationError(`invalid PTN spread: ${text}`);

    const count = Number(spread.groups.count ?? "1");
    const drops = spread.groups.drops ? Array.from(spread.groups.drops, (ch) => Number(ch)) : [count];
    const total = drops.reduce((sum, d) => sum + d, 0);
    if (total !== count) {
      throw new NotationError(`invalid PTN spread: ${text} drops ${total} of ${count} pieces`);
    }
    return { kind: "spread", from, direction, drops };
  }

  throw new NotationError(`invalid PTN: ${text}`);
}

export function formatPtnMove(move: Move): string {
  if (move.kind === "place") {
    const prefix = move.piece === "F" ? "" : move.piece;
    return `${prefix}${nodeIdToSquare(move.to)}`;
  }

  const count = carriedCount(move);
  const countText = count > 1 ? String(count) : "";
  const dropsText = move.drops.length > 1 ? move.drops.join("") : "";
  return `${countText}${nodeIdToSquare(move.from)}${SYMBOL_BY_DIR[move.direction]}${dropsText}`;
}
