import { describe, it, expect } from "vitest";
import { decodePlaytakMove, encodePlaytakMove, toPlaytakSquare } from "./playtakNotation.ts";
import { NotationError } from "./errors.ts";

describe("PlayTak notation", () => {
  it("writes squares with an upper-case file", () => {
    expect(toPlaytakSquare("r0c0")).toBe("A1");
    expect(toPlaytakSquare("r7c7")).toBe("H8");
  });

  it("encodes placements", () => {
    expect(encodePlaytakMove({ kind: "place", piece: "F", to: "r0c0" })).toBe("P A1");
    expect(encodePlaytakMove({ kind: "place", piece: "S", to: "r1c1" })).toBe("P B2 W");
    expect(encodePlaytakMove({ kind: "place", piece: "C", to: "r4c2" })).toBe("P C5 C");
  });

  it("encodes spreads with the square the last drop lands on", () => {
    expect(encodePlaytakMove({ kind: "spread", from: "r0c0", direction: "up", drops: [1, 1] })).toBe("M A1 A3 1 1");
    expect(encodePlaytakMove({ kind: "spread", from: "r4c4", direction: "down", drops: [1, 2, 1] })).toBe(
      "M E5 E2 1 2 1"
    );
    expect(encodePlaytakMove({ kind: "spread", from: "r2c3", direction: "left", drops: [3] })).toBe("M D3 C3 3");
  });

  it("decodes what it encodes", () => {
    expect(decodePlaytakMove("P B2 W")).toEqual({ kind: "place", piece: "S", to: "r1c1" });
    expect(decodePlaytakMove("P a1")).toEqual({ kind: "place", piece: "F", to: "r0c0" });
    expect(decodePlaytakMove("P C5 C")).toEqual({ kind: "place", piece: "C", to: "r4c2" });
    expect(decodePlaytakMove("M E5 E2 1 2 1")).toEqual({ kind: "spread", from: "r4c4", direction: "down", drops: [1, 2, 1] });
    expect(decodePlaytakMove("M A1 C1 2 1")).toEqual({ kind: "spread", from: "r0c0", direction: "right", drops: [2, 1] });
  });

  it("rejects malformed moves", () => {
    expect(() => decodePlaytakMove("M A1 B2 1")).toThrow(NotationError);
    expect(() => decodePlaytakMove("M A1 A1 1")).toThrow(/same square/);
    expect(() => decodePlaytakMove("M A1 A3 1")).toThrow(/covers 2 squares/);
    expect(() => decodePlaytakMove("M A1 A2 0")).toThrow(/drop counts/);
    expect(() => decodePlaytakMove("P A1 X")).toThrow(/piece/);
    expect(() => decodePlaytakMove("P Z1")).toThrow(/square/);
    expect(() => decodePlaytakMove("Q A1")).toThrow(/unrecognized/);
  });
});
