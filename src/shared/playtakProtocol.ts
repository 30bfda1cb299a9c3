import type { Player } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GameResult, Reserves } from "../game/state.ts";
import { encodePlaytakMove } from "./playtakNotation.ts";

export type PlaytakGameStart = {
  kind: "gameStart";
  gameId: number;
  size: number;
  white: string;
  black: string;
  /** The colour this client plays. */
  color: Player;
  /** Komi in half points, when the server sent one. */
  halfKomi: number | null;
  /** Stones and capstones per side, when the server sent them. */
  pieces: Reserves | null;
};

export type PlaytakMessage =
  | { kind: "welcome"; name: string }
  | PlaytakGameStart
  | { kind: "gameMove"; gameId: number; notation: string }
  | { kind: "gameOver"; gameId: number; result: string }
  | { kind: "gameAbandoned"; gameId: number }
  | { kind: "other"; line: string };

const GAME_LINE_RE = /^Game#(?<id>\d+)\s+(?<rest>.*)$/;

function countAt(tokens: string[], i: number, min: number): number | null {
  const raw = tokens[i];
  if (raw === undefined) return null;
  const n = Number(raw);
  return Number.isInteger(n) && n >= min ? n : null;
}

function toColor(s: string): Player | null {
  if (s === "white") return "W";
  if (s === "black") return "B";
  return null;
}

/** Classify one server line. Anything the client does not act on comes back as "other". */
export function parsePlaytakLine(raw: string): PlaytakMessage {
  const line = raw.trim();
  const tokens = line.split(/\s+/);

  // Game Start 645331 6 Guest535 vs x57696c6c white 300 0 30 1 0 0
  // id, size, players, colour, clock, komi, stones, capstones, then flags.
  if (tokens[0] === "Game" && tokens[1] === "Start" && tokens[5] === "vs" && tokens.length >= 8) {
    const gameId = Number(tokens[2]);
    const size = Number(tokens[3]);
    const color = toColor(tokens[7]);
    if (Number.isInteger(gameId) && Number.isInteger(size) && color) {
      const stones = countAt(tokens, 10, 1);
      const caps = countAt(tokens, 11, 0);
      return {
        kind: "gameStart",
        gameId,
        size,
        white: tokens[4],
        black: tokens[6],
        color,
        halfKomi: countAt(tokens, 9, 0),
        pieces: stones !== null && caps !== null ? { stones, caps } : null,
      };
    }
    return { kind: "other", line };
  }

  if (tokens[0] === "Welcome" && tokens.length === 2) {
    return { kind: "welcome", name: tokens[1].replace(/!$/, "") };
  }

  const game = GAME_LINE_RE.exec(line);
  if (game && game.groups) {
    const gameId = Number(game.groups.id);
    const rest = game.groups.rest;
    if (rest.startsWith("P ") || rest.startsWith("M ")) return { kind: "gameMove", gameId, notation: rest };
    if (rest.startsWith("Over")) return { kind: "gameOver", gameId, result: rest.slice("Over".length).trim() };
    if (rest.startsWith("Abandoned")) return { kind: "gameAbandoned", gameId };
  }

  return { kind: "other", line };
}

export const LOGIN_GUEST = "Login Guest";
export const PING = "PING";
export const QUIT = "quit";

export function seekCommand(size: number, clockSeconds: number, incrementSeconds: number): string {
  return `Seek ${size} ${clockSeconds} ${incrementSeconds}`;
}

export function gameMoveCommand(gameId: number, move: Move): string {
  return `Game#${gameId} ${encodePlaytakMove(move)}`;
}

/**
 * Server result strings: "R-0", "0-F", "1-0" and so on for decisive games,
 * "1/2-1/2" for a draw. Null when the text is not a result.
 */
export function parsePlaytakResult(text: string): GameResult | null {
  if (text === "1/2-1/2") return "draw";
  const m = /^(?<white>[RF1]|0)-(?<black>[RF1]|0)$/.exec(text);
  if (!m || !m.groups) return null;
  if (m.groups.white !== "0" && m.groups.black === "0") return "whiteWin";
  if (m.groups.white === "0" && m.groups.black !== "0") return "blackWin";
  return null;
}
