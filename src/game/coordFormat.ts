import type { NodeId } from "./state.ts";
import { parseNodeId, makeNodeId } from "./coords.ts";

const FILES = "abcdefgh";
const SQUARE_RE = /^(?<file>[a-hA-H])(?<rank>[1-8])$/;

/** PTN square for a node, e.g. r0c0 -> "a1". Files run left to right, ranks bottom to top. */
export function nodeIdToSquare(nodeId: NodeId): string {
  const { r, c } = parseNodeId(nodeId);
  const file = FILES[c];
  if (file === undefined) throw new Error(`Node ${nodeId} has no file letter`);
  return `${file}${r + 1}`;
}

/** Accepts either case ("a1" or "A1"). Returns null for anything that is not a square. */
export function squareToNodeId(square: string): NodeId | null {
  const match = SQUARE_RE.exec(square);
  if (!match || !match.groups) return null;

  const col = FILES.indexOf(match.groups.file.toLowerCase());
  const row = Number(match.groups.rank) - 1;
  return makeNodeId(row, col);
}
