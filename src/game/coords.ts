import type { NodeId } from "./state.ts";
import type { Direction } from "./moveTypes.ts";

export function parseNodeId(id: string): { r: number; c: number } {
  const m = /^r(\d+)c(\d+)$/.exec(id);
  if (!m) throw new Error(`Invalid node id: ${id}`);
  const r = Number(m[1]);
  const c = Number(m[2]);
  if (!Number.isInteger(r) || !Number.isInteger(c)) throw new Error(`Invalid node coordinates in id: ${id}`);
  return { r, c };
}

export function makeNodeId(r: number, c: number): NodeId {
  return `r${r}c${c}`;
}

export function inBounds(r: number, c: number, boardSize: number): boolean {
  return r >= 0 && r < boardSize && c >= 0 && c < boardSize;
}

// Row 0 is rank 1, so "up" walks towards higher ranks.
export const DIRECTION_DELTAS: Record<Direction, { dr: number; dc: number }> = {
  up: { dr: +1, dc: 0 },
  down: { dr: -1, dc: 0 },
  left: { dr: 0, dc: -1 },
  right: { dr: 0, dc: +1 },
};

export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

export function getAllNodes(boardSize: number): NodeId[] {
  const nodes: NodeId[] = [];
  for (let r = 0; r < boardSize; r++) {
    for (let c = 0; c < boardSize; c++) nodes.push(makeNodeId(r, c));
  }
  return nodes;
}

export function orthogonalNeighbors(id: NodeId, boardSize: number): NodeId[] {
  const { r, c } = parseNodeId(id);
  const res: NodeId[] = [];
  for (const dir of DIRECTIONS) {
    const { dr, dc } = DIRECTION_DELTAS[dir];
    const nr = r + dr;
    const nc = c + dc;
    if (inBounds(nr, nc, boardSize)) res.push(makeNodeId(nr, nc));
  }
  return res;
}

/** Node reached after `steps` squares in `direction`, or null when it falls off the board. */
export function stepFrom(id: NodeId, direction: Direction, steps: number, boardSize: number): NodeId | null {
  const { r, c } = parseNodeId(id);
  const { dr, dc } = DIRECTION_DELTAS[direction];
  const nr = r + dr * steps;
  const nc = c + dc * steps;
  return inBounds(nr, nc, boardSize) ? makeNodeId(nr, nc) : null;
}
