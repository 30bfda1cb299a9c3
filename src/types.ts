export type Player = "W" | "B";
/** Flat, standing stone (wall), capstone. */
export type PieceKind = "F" | "S" | "C";

export interface Piece { readonly owner: Player; readonly kind: PieceKind; }
export type Stack = Piece[];

export function otherPlayer(p: Player): Player {
  return p === "W" ? "B" : "W";
}

export function topOf(stack: Stack | undefined): Piece | null {
  if (!stack || stack.length === 0) return null;
  return stack[stack.length - 1] ?? null;
}

/** Flats and capstones count towards roads; walls do not. */
export function isRoadPiece(kind: PieceKind | undefined): boolean {
  return kind === "F" || kind === "C";
}
