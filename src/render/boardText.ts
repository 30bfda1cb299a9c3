import type { GameResult, GameState } from "../game/state.ts";
import type { Piece } from "../types.ts";
import { makeNodeId } from "../game/coords.ts";
import { topOf } from "../types.ts";

const EMPTY = "🔳";

const SYMBOLS: Record<Piece["owner"], Record<Piece["kind"], string>> = {
  W: { F: "🟧", S: "🔶", C: "🟠" },
  B: { F: "🟦", S: "🔷", C: "🔵" },
};

const FILE_LABELS = "   a  b  c  d  e  f  g  h";

/** Top piece of every square, rank 1 at the bottom, followed by the file letters. */
export function renderBoardText(state: GameState): string {
  const lines: string[] = [];
  for (let r = state.size - 1; r >= 0; r--) {
    const cells: string[] = [];
    for (let c = 0; c < state.size; c++) {
      const top = topOf(state.board.get(makeNodeId(r, c)));
      cells.push(top ? SYMBOLS[top.owner][top.kind] : EMPTY);
    }
    lines.push(`${r + 1} ${cells.join(" ")}`);
  }
  lines.push(FILE_LABELS.slice(0, 1 + state.size * 3));
  return lines.join("\n");
}

export function describeResult(result: GameResult): string {
  switch (result) {
    case "whiteWin":
      return `${SYMBOLS.W.F} wins!`;
    case "blackWin":
      return `${SYMBOLS.B.F} wins!`;
    case "draw":
      return "It's a draw!";
    case "ongoing":
      return "The game is still going.";
  }
}
