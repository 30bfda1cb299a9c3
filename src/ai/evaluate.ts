import type { GameResult, GameState } from "../game/state.ts";
import type { Player } from "../types.ts";
import { parseNodeId } from "../game/coords.ts";
import { topOf } from "../types.ts";
import { LOSS_SCORE, WIN_SCORE } from "./aiTypes.ts";

/** Sentinel for a decided game, or null while it is still being played. */
export function terminalScore(result: GameResult): number | null {
  switch (result) {
    case "whiteWin":
      return WIN_SCORE;
    case "blackWin":
      return LOSS_SCORE;
    case "draw":
      return 0;
    case "ongoing":
      return null;
  }
}

/** Flat-count differential, starting from the komi Black is owed. */
export function flatCountDifferential(state: GameState): number {
  let fcd = -state.halfKomi / 2;
  for (const stack of state.board.values()) {
    const top = topOf(stack);
    if (!top || top.kind !== "F") continue;
    fcd += top.owner === "W" ? 1 : -1;
  }
  return fcd;
}

/**
 * Rows plus columns holding at least one stack `player` controls. Any top piece
 * counts here, walls included.
 */
export function lineControl(state: GameState, player: Player): number {
  const rows = new Set<number>();
  const cols = new Set<number>();
  for (const [nodeId, stack] of state.board.entries()) {
    const top = topOf(stack);
    if (!top || top.owner !== player) continue;
    const { r, c } = parseNodeId(nodeId);
    rows.add(r);
    cols.add(c);
  }
  return rows.size + cols.size;
}

/** Positive favours White, negative Black, zero is level or drawn. */
export function evaluateState(state: GameState): number {
  const terminal = terminalScore(state.result);
  if (terminal !== null) return terminal;

  return flatCountDifferential(state) + lineControl(state, "W") - lineControl(state, "B");
}
