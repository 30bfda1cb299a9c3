import type { NodeId } from "./state.ts";
import type { PieceKind } from "../types.ts";

export type Direction = "up" | "down" | "left" | "right";

export interface PlaceMove {
  kind: "place";
  piece: PieceKind;
  to: NodeId;
}

export interface SpreadMove {
  kind: "spread";
  from: NodeId;
  direction: Direction;
  /** Pieces left on each successive square along `direction`; they sum to the lifted count. */
  drops: number[];
}

export type Move = PlaceMove | SpreadMove;

export function carriedCount(move: SpreadMove): number {
  return move.drops.reduce((sum, d) => sum + d, 0);
}

export function movesEqual(a: Move, b: Move): boolean {
  if (a.kind === "place" && b.kind === "place") {
    return a.piece === b.piece && a.to === b.to;
  }
  if (a.kind === "spread" && b.kind === "spread") {
    return (
      a.from === b.from &&
      a.direction === b.direction &&
      a.drops.length === b.drops.length &&
      a.drops.every((d, i) => d === b.drops[i])
    );
  }
  return false;
}
