import { describe, it, expect } from "vitest";
import { countFlats, flatWinResult, hasRoad, resolveResult } from "./gameOver.ts";
import { parseTps } from "./tps.ts";

describe("roads", () => {
  it("finds horizontal and vertical roads", () => {
    expect(hasRoad(parseTps("x3/x3/1,1,1 2 3").board, 3, "W")).toBe(true);
    expect(hasRoad(parseTps("2,x2/2,x2/2,x2 1 4").board, 3, "B")).toBe(true);
    expect(hasRoad(parseTps("2,x2/2,x2/2,x2 1 4").board, 3, "W")).toBe(false);
  });

  it("follows bends but not diagonals", () => {
    expect(hasRoad(parseTps("x3/x,1,1/1,1,x 2 3").board, 3, "W")).toBe(true);
    expect(hasRoad(parseTps("x3/x,x,1/1,1,x 2 3").board, 3, "W")).toBe(false);
  });

  it("walls break a road, capstones complete one", () => {
    expect(hasRoad(parseTps("x3/x3/1,1S,1 2 3").board, 3, "W")).toBe(false);
    expect(hasRoad(parseTps("x5/x5/x5/x5/1,1,1C,1,1 2 3").board, 5, "W")).toBe(true);
  });

  it("the mover wins when both colours have a road", () => {
    const state = parseTps("2,2,2/x3/1,1,1 1 4");
    expect(resolveResult(state, "B")).toBe("blackWin");
    expect(resolveResult(state, "W")).toBe("whiteWin");
  });
});

describe("flat wins", () => {
  it("counts only flat tops", () => {
    expect(countFlats(parseTps("x3/1S,2,x/1,x,1 1 3").board)).toEqual({ W: 2, B: 1 });
  });

  it("a full board is decided on flats with komi for Black", () => {
    expect(parseTps("1,2,1/2,1,2/1,2,1 1 6").result).toBe("whiteWin");
    expect(parseTps("1,2,1/2,1,2/1,2,1 1 6", { halfKomi: 2 }).result).toBe("draw");
    expect(parseTps("1,2,1/2,1,2/1,2,1 1 6", { halfKomi: 4 }).result).toBe("blackWin");
  });

  it("an empty reserve also ends the game", () => {
    const state = parseTps("x3/x3/1,2,x 1 2");
    expect(resolveResult(state, "B")).toBe("ongoing");

    const drained = { ...state, reserves: { W: { stones: 0, caps: 0 }, B: state.reserves.B } };
    expect(resolveResult(drained, "B")).toBe("draw");
    expect(flatWinResult({ ...drained, halfKomi: 1 })).toBe("blackWin");
  });
});
