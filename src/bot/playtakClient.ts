import WebSocket, { type RawData } from "ws";

import type { GameResult, GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Player } from "../types.ts";
import type { PlaytakGameStart, PlaytakMessage } from "../shared/playtakProtocol.ts";
import { applyMove, playMove } from "../game/applyMove.ts";
import { createInitialGameState, isBoardSize } from "../game/state.ts";
import { formatPtnMove } from "../game/ptn.ts";
import { formatTps } from "../game/tps.ts";
import { decodePlaytakMove } from "../shared/playtakNotation.ts";
import {
  LOGIN_GUEST,
  PING,
  QUIT,
  gameMoveCommand,
  parsePlaytakLine,
  parsePlaytakResult,
  seekCommand,
} from "../shared/playtakProtocol.ts";
import { ConfigurationError } from "../shared/errors.ts";

export type PlaytakClientOptions = {
  url: string;
  size: number;
  clockSeconds: number;
  incrementSeconds: number;
  /** Used when the server's game start carries no komi. */
  halfKomi?: number;
  chooseMove: (state: GameState) => Move;
  /** PlayTak drops idle connections; the client pings on this period. */
  pingIntervalMs?: number;
  log?: (line: string) => void;
};

export type PlaytakGameSummary = {
  gameId: number;
  color: Player;
  /** Result as far as this client knows; "abandoned" when the opponent left. */
  result: GameResult | "abandoned";
  /** Result text the server sent with "Over", if it sent one. */
  serverResult: string | null;
  plies: number;
  finalTps: string;
};

const DEFAULT_PING_INTERVAL_MS = 30_000;

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/** Server frames may carry several lines; this hands them out one at a time. */
class LineQueue {
  private readonly lines: string[] = [];
  private waiting: { resolve: (line: string) => void; reject: (err: Error) => void } | null = null;
  private closedWith: Error | null = null;

  push(chunk: string): void {
    for (const raw of chunk.split("\n")) {
      const line = raw.trim();
      if (!line) continue;
      const w = this.waiting;
      if (w) {
        this.waiting = null;
        w.resolve(line);
      } else {
        this.lines.push(line);
      }
    }
  }

  close(err: Error): void {
    if (this.closedWith) return;
    this.closedWith = err;
    const w = this.waiting;
    if (w) {
      this.waiting = null;
      w.reject(err);
    }
  }

  next(): Promise<string> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closedWith) return Promise.reject(this.closedWith);
    return new Promise<string>((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }
}

/** Plays one game on a PlayTak-compatible server as a guest. */
export class PlaytakClient {
  private readonly opts: PlaytakClientOptions;
  private readonly log: (line: string) => void;
  private readonly lines = new LineQueue();
  private ws: WebSocket | null = null;

  constructor(opts: PlaytakClientOptions) {
    this.opts = opts;
    this.log = opts.log ?? ((line) => console.log(`[playtak] ${line}`));
  }

  private send(text: string): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) throw new Error("PlayTak connection is not open");
    ws.send(text);
  }

  private async connect(): Promise<void> {
    // The server speaks its line protocol over the "binary" subprotocol.
    const ws = new WebSocket(this.opts.url, ["binary"]);
    this.ws = ws;

    ws.on("message", (data: RawData) => this.lines.push(rawDataToString(data)));
    ws.on("close", () => this.lines.close(new Error("PlayTak connection closed")));
    ws.on("error", (err: Error) => {
      this.log(`connection error: ${err.message}`);
      this.lines.close(err);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      ws.once("error", onError);
      ws.once("open", () => {
        ws.off("error", onError);
        resolve();
      });
    });
  }

  private async nextMessage(): Promise<PlaytakMessage> {
    return parsePlaytakLine(await this.lines.next());
  }

  private async waitForGameStart(): Promise<PlaytakGameStart> {
    while (true) {
      const msg = await this.nextMessage();
      if (msg.kind === "welcome") this.log(`logged in as ${msg.name}`);
      if (msg.kind === "gameStart") return msg;
    }
  }

  private async playGame(start: PlaytakGameStart): Promise<PlaytakGameSummary> {
    if (!isBoardSize(start.size)) {
      throw new ConfigurationError(`server started a game on an unsupported ${start.size}x${start.size} board`);
    }

    let state = createInitialGameState(start.size, {
      halfKomi: start.halfKomi ?? this.opts.halfKomi,
      pieces: start.pieces ?? undefined,
    });
    const summary = (result: GameResult | "abandoned", serverResult: string | null): PlaytakGameSummary => ({
      gameId: start.gameId,
      color: start.color,
      result,
      serverResult,
      plies: state.ply,
      finalTps: formatTps(state),
    });

    while (state.result === "ongoing") {
      if (state.toMove === start.color) {
        const move = this.opts.chooseMove(state);
        this.send(gameMoveCommand(start.gameId, move));
        this.log(`game ${start.gameId}: played ${formatPtnMove(move)}`);
        state = applyMove(state, move);
        continue;
      }

      const msg = await this.nextMessage();
      if (!("gameId" in msg) || msg.gameId !== start.gameId) continue;

      if (msg.kind === "gameMove") {
        state = playMove(state, decodePlaytakMove(msg.notation));
      } else if (msg.kind === "gameOver") {
        return summary(parsePlaytakResult(msg.result) ?? state.result, msg.result);
      } else if (msg.kind === "gameAbandoned") {
        return summary("abandoned", null);
      }
    }

    return summary(state.result, null);
  }

  /** Connect, log in, seek, play until the game ends, then quit. */
  async playOneGame(): Promise<PlaytakGameSummary> {
    await this.connect();
    const ping = setInterval(() => {
      if (this.ws?.readyState === WebSocket.OPEN) this.ws.send(PING);
    }, this.opts.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS);

    try {
      this.send(LOGIN_GUEST);
      this.send(seekCommand(this.opts.size, this.opts.clockSeconds, this.opts.incrementSeconds));

      const start = await this.waitForGameStart();
      this.log(`game ${start.gameId} started: ${start.white} vs ${start.black}, playing ${start.color === "W" ? "white" : "black"}`);
      return await this.playGame(start);
    } finally {
      clearInterval(ping);
      await this.close();
    }
  }

  async close(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;
    this.ws = null;

    if (ws.readyState === WebSocket.OPEN) ws.send(QUIT);
    if (ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>((resolve) => {
      ws.once("close", () => resolve());
      ws.close();
    });
  }
}
