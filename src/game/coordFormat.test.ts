import { describe, expect, test } from "vitest";
import { nodeIdToSquare, squareToNodeId } from "./coordFormat.ts";

describe("coordFormat", () => {
  test("nodeIdToSquare maps a-left / 1-bottom", () => {
    expect(nodeIdToSquare("r0c0")).toBe("a1");
    expect(nodeIdToSquare("r0c5")).toBe("f1");
    expect(nodeIdToSquare("r5c0")).toBe("a6");
    expect(nodeIdToSquare("r2c3")).toBe("d3");
  });

  test("squareToNodeId accepts either case", () => {
    expect(squareToNodeId("a1")).toBe("r0c0");
    expect(squareToNodeId("D3")).toBe("r2c3");
    expect(squareToNodeId("h8")).toBe("r7c7");
  });

  test("squareToNodeId rejects anything else", () => {
    expect(squareToNodeId("i1")).toBe(null);
    expect(squareToNodeId("a9")).toBe(null);
    expect(squareToNodeId("a10")).toBe(null);
    expect(squareToNodeId("")).toBe(null);
  });
});
