import { describe, it, expect } from "vitest";
import {
  chooseGreedyMove,
  chooseMove,
  chooseMoveByDifficulty,
  chooseStaticMove,
  searchBestMove,
  searchValue,
} from "./search.ts";
import { evaluateState, terminalScore } from "./evaluate.ts";
import { LOSS_SCORE, WIN_SCORE } from "./aiTypes.ts";
import { applyMove } from "../game/applyMove.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { createInitialGameState } from "../game/state.ts";
import { parseTps } from "../game/tps.ts";
import type { GameState } from "../game/state.ts";
import { ConfigurationError, InvariantViolationError } from "../shared/errors.ts";

function minimax(state: GameState, depth: number): number {
  const term = terminalScore(state.result);
  if (term !== null) return term;
  if (depth === 0) return evaluateState(state);
  const values = generateLegalMoves(state).map((m) => minimax(applyMove(state, m), depth - 1));
  return state.toMove === "W" ? Math.max(...values) : Math.min(...values);
}

const WHITE_ROAD_THREAT = "x4/x4/2,2,2,x/1,1,1,x 1 4";
const BLACK_ROAD_THREAT = "x4/x4/2,2,2,x/1,1,1,x 2 4";

describe("search", () => {
  it("depth 0 is the static evaluation", () => {
    const s = parseTps("x5/x5/x5/x5/1,1S,2,x2 2 2");
    expect(searchValue(s, 0)).toBe(evaluateState(s));

    const res = searchBestMove(s, 0);
    expect(res.score).toBe(1);
    expect(res.nodes).toBe(1);
    expect(res.depth).toBe(0);
  });

  it("pruning never changes the value", () => {
    for (const tps of ["x3/x,2,x/1,x2 1 2", "2,x2/x,1,x/x2,1 2 3"]) {
      const s = parseTps(tps);
      for (let depth = 0; depth <= 3; depth++) {
        const expected = minimax(s, depth);
        expect(searchValue(s, depth)).toBe(expected);
        if (depth > 0) expect(searchBestMove(s, depth).score).toBe(expected);
      }
    }
  });

  it("White completes a road at every depth", () => {
    const s = parseTps(WHITE_ROAD_THREAT);
    for (let depth = 1; depth <= 3; depth++) {
      const res = searchBestMove(s, depth);
      expect(res.move).toEqual({ kind: "place", piece: "F", to: "r0c3" });
      expect(res.score).toBe(WIN_SCORE);
    }
  });

  it("Black completes a road and scores a loss for White", () => {
    const s = parseTps(BLACK_ROAD_THREAT);
    for (let depth = 1; depth <= 2; depth++) {
      const res = searchBestMove(s, depth);
      expect(res.move).toEqual({ kind: "place", piece: "F", to: "r1c3" });
      expect(res.score).toBe(LOSS_SCORE);
    }
  });

  it("ties go to the first ranked move", () => {
    expect(chooseMove(parseTps("x4/x4/x4/x4 1 2"), 1)).toEqual({ kind: "place", piece: "F", to: "r1c1" });
  });

  it("on the very first ply the opponent's flat goes in a corner", () => {
    expect(searchBestMove(createInitialGameState(4), 1)).toMatchObject({
      move: { kind: "place", piece: "F", to: "r0c0" },
      score: -3,
    });
  });

  it("refuses finished games and positions without moves", () => {
    expect(() => searchBestMove(parseTps("1,2,1/2,1,2/1,2,1 1 6"), 2)).toThrow(InvariantViolationError);

    const stuck: GameState = { ...parseTps("2,2,2/2,2,2/2,2,2 1 6"), result: "ongoing" };
    expect(() => searchBestMove(stuck, 1)).toThrow(InvariantViolationError);
  });

  it("rejects bad depths", () => {
    const s = parseTps("x3/x3/x3 1 2");
    expect(() => searchBestMove(s, -1)).toThrow(ConfigurationError);
    expect(() => searchValue(s, 1.5)).toThrow(ConfigurationError);
  });
});

describe("policies", () => {
  it("greedy takes a win", () => {
    expect(chooseGreedyMove(parseTps(WHITE_ROAD_THREAT))).toEqual({ kind: "place", piece: "F", to: "r0c3" });
  });

  it("greedy blocks the opponent's road", () => {
    const s = parseTps("x4/x4/2,2,2,x/1,1,x2 1 4");
    expect(chooseGreedyMove(s)).toEqual({ kind: "place", piece: "F", to: "r1c3" });
  });

  it("static lookahead takes a win", () => {
    expect(chooseStaticMove(parseTps(WHITE_ROAD_THREAT))).toEqual({ kind: "place", piece: "F", to: "r0c3" });
  });

  it("difficulties pick greedy play or a search depth", () => {
    const s = parseTps(WHITE_ROAD_THREAT);

    const easy = chooseMoveByDifficulty(s, "easy");
    expect(easy.move).toEqual({ kind: "place", piece: "F", to: "r0c3" });
    expect(easy.info).toBeUndefined();

    const medium = chooseMoveByDifficulty(s, "medium");
    expect(medium.move).toEqual({ kind: "place", piece: "F", to: "r0c3" });
    expect(medium.info?.depth).toBe(2);
    expect(medium.info?.score).toBe(WIN_SCORE);
  });
});
