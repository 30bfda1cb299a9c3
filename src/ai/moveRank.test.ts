import { describe, it, expect } from "vitest";
import { createRankContext, distanceFromCenter, rankMoves, scoreMove } from "./moveRank.ts";
import { DEFAULT_RANK_WEIGHTS } from "./aiTypes.ts";
import { createInitialGameState } from "../game/state.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { parseTps } from "../game/tps.ts";
import type { Move } from "../game/moveTypes.ts";

describe("rankMoves", () => {
  it("prefers central flats", () => {
    const state = parseTps("x4/x4/x4/x4 1 2");
    const ctx = createRankContext(state);

    expect(scoreMove(ctx, { kind: "place", piece: "F", to: "r1c1" })).toBe(190);
    expect(scoreMove(ctx, { kind: "place", piece: "F", to: "r0c0" })).toBe(170);
    expect(scoreMove(ctx, { kind: "place", piece: "S", to: "r1c1" })).toBe(90);
    expect(rankMoves(state)[0]).toEqual({ kind: "place", piece: "F", to: "r1c1" });
  });

  it("ranks a corner first on an empty board at ply 0, the centre at ply 2", () => {
    expect(rankMoves(createInitialGameState(4))[0]).toEqual({ kind: "place", piece: "F", to: "r0c0" });
    expect(rankMoves(parseTps("x4/x4/x4/x4 1 2"))[0]).toEqual({ kind: "place", piece: "F", to: "r1c1" });
  });

  it("negates scores during the opening", () => {
    const state = createInitialGameState(4);
    const ctx = createRankContext(state);

    expect(ctx.flip).toBe(true);
    expect(scoreMove(ctx, { kind: "place", piece: "F", to: "r0c0" })).toBe(-170);
    expect(rankMoves(state)[0]).toEqual({ kind: "place", piece: "F", to: "r0c0" });
  });

  it("rewards extending the mover's road lines", () => {
    const ctx = createRankContext(parseTps("x5/x5/x5/x5/1,1,x3 1 3"));
    expect(ctx.rowRoad).toEqual([2, 0, 0, 0, 0]);
    expect(scoreMove(ctx, { kind: "place", piece: "F", to: "r0c2" })).toBe(200);
    expect(scoreMove(ctx, { kind: "place", piece: "F", to: "r1c2" })).toBe(190);
  });

  it("rewards walls and capstones next to the opponent", () => {
    const ctx = createRankContext(parseTps("x5/x5/x2,12,x2/x5/x5 1 3"));
    expect(scoreMove(ctx, { kind: "place", piece: "C", to: "r1c2" })).toBe(210);
    expect(scoreMove(ctx, { kind: "place", piece: "S", to: "r1c2" })).toBe(160);
  });

  it("scores spreads by what they leave on top", () => {
    const ctx = createRankContext(parseTps("x5/x5/x5/x5/2121,x4 1 3"));
    expect(scoreMove(ctx, { kind: "spread", from: "r0c0", direction: "right", drops: [1, 1, 2] })).toBe(-80);
    expect(scoreMove(ctx, { kind: "spread", from: "r0c0", direction: "right", drops: [1, 2, 1] })).toBe(-100);
    expect(scoreMove(ctx, { kind: "spread", from: "r0c0", direction: "right", drops: [4] })).toBe(-100);
  });

  it("returns every legal move exactly once", () => {
    const state = parseTps("x5/x5/x2,12,x2/x5/x5 1 3");
    const key = (m: Move) => JSON.stringify(m);
    const ranked = rankMoves(state).map(key).sort();
    const legal = generateLegalMoves(state).map(key).sort();
    expect(ranked).toEqual(legal);
  });

  it("takes alternate weights", () => {
    const state = parseTps("x4/x4/x4/x4 1 2");
    const ranked = rankMoves(state, { ...DEFAULT_RANK_WEIGHTS, flat: -1000 });
    expect(ranked[0]).toEqual({ kind: "place", piece: "S", to: "r1c1" });
  });

  it("measures distance from the centre", () => {
    expect(distanceFromCenter(2, 2, 5)).toBe(0);
    expect(distanceFromCenter(0, 0, 4)).toBe(3);
    expect(distanceFromCenter(1, 2, 4)).toBe(1);
  });
});
