import { describe, it, expect } from "vitest";
import { BadRequestError, GameError, GameErrorCode, IllegalMoveError, InvariantViolationError, errorMessage } from "./errors.ts";

describe("GameError", () => {
  it("subclasses keep their identity and code", () => {
    const err = new IllegalMoveError("nope", { ply: 3 });
    expect(err).toBeInstanceOf(IllegalMoveError);
    expect(err).toBeInstanceOf(GameError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("IllegalMoveError");
    expect(err.code).toBe(GameErrorCode.MOVE_ILLEGAL);
    expect(err.toJSON()).toEqual({ code: "MOVE_ILLEGAL", message: "nope", context: { ply: 3 } });
  });

  it("maps codes to HTTP statuses", () => {
    expect(new BadRequestError("x").httpStatus).toBe(400);
    expect(new InvariantViolationError("x").httpStatus).toBe(500);
  });

  it("errorMessage reads anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
