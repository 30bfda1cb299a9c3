import type { GameState, NodeId } from "./state.ts";
import type { Move, PlaceMove, SpreadMove } from "./moveTypes.ts";
import { isOpeningPly } from "./state.ts";
import { DIRECTIONS, getAllNodes, stepFrom } from "./coords.ts";
import { topOf } from "../types.ts";

/**
 * Compositions of `count` into drops, in lexicographic order. The first `open`
 * squares of the path accept any drop; square `open + 1` is a wall that only a lone
 * capstone may flatten, so it is reachable with a final drop of exactly 1.
 */
export function dropSequences(count: number, open: number, canSmashWall: boolean): number[][] {
  const out: number[][] = [];

  const walk = (prefix: number[], remaining: number, step: number): void => {
    for (let d = 1; d <= remaining; d++) {
      const last = d === remaining;
      if (step <= open) {
        if (last) out.push([...prefix, d]);
        else walk([...prefix, d], remaining - d, step + 1);
      } else if (step === open + 1 && canSmashWall && last && d === 1) {
        out.push([...prefix, d]);
      }
    }
  };

  walk([], count, 1);
  return out;
}

export function generatePlacements(state: GameState): PlaceMove[] {
  const moves: PlaceMove[] = [];
  const opening = isOpeningPly(state);
  const reserves = state.reserves[state.toMove];

  for (const to of getAllNodes(state.size)) {
    const stack = state.board.get(to);
    if (stack && stack.length > 0) continue;

    if (opening) {
      moves.push({ kind: "place", piece: "F", to });
      continue;
    }
    if (reserves.stones > 0) {
      moves.push({ kind: "place", piece: "F", to });
      moves.push({ kind: "place", piece: "S", to });
    }
    if (reserves.caps > 0) {
      moves.push({ kind: "place", piece: "C", to });
    }
  }

  return moves;
}

/** How far a stack leaving `from` may travel: free squares, then whether a wall follows. */
function openPath(state: GameState, from: NodeId, direction: SpreadMove["direction"]): { open: number; wallNext: boolean } {
  let open = 0;
  for (let step = 1; ; step++) {
    const id = stepFrom(from, direction, step, state.size);
    if (!id) return { open, wallNext: false };
    const top = topOf(state.board.get(id));
    if (!top || top.kind === "F") {
      open++;
      continue;
    }
    return { open, wallNext: top.kind === "S" };
  }
}

export function generateSpreads(state: GameState): SpreadMove[] {
  if (isOpeningPly(state)) return [];

  const moves: SpreadMove[] = [];

  for (const from of getAllNodes(state.size)) {
    const stack = state.board.get(from);
    const top = topOf(stack);
    if (!stack || !top || top.owner !== state.toMove) continue;

    const maxLift = Math.min(stack.length, state.size);

    for (const direction of DIRECTIONS) {
      const { open, wallNext } = openPath(state, from, direction);
      const canSmashWall = wallNext && top.kind === "C";
      if (open === 0 && !canSmashWall) continue;

      for (let count = 1; count <= maxLift; count++) {
        for (const drops of dropSequences(count, open, canSmashWall)) {
          moves.push({ kind: "spread", from, direction, drops });
        }
      }
    }
  }

  return moves;
}

/**
 * All legal moves, placements first. The order is stable and is the tie-break order
 * the move ranker relies on. A finished game has no legal moves.
 */
export function generateLegalMoves(state: GameState): Move[] {
  if (state.result !== "ongoing") return [];
  return [...generatePlacements(state), ...generateSpreads(state)];
}
