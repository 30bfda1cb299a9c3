import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";

import { evaluateState, formatPtnMove, parseTps, searchBestMove } from "../../src/core/index.ts";
import { encodePlaytakMove } from "../../src/shared/playtakNotation.ts";
import { BadRequestError, GameError, errorMessage } from "../../src/shared/errors.ts";

export const DEFAULT_SEARCH_DEPTH = 2;
export const DEFAULT_MAX_DEPTH = 4;

export type TakServerOpts = {
  /** Depth used when a request does not name one. */
  defaultDepth?: number;
  /** Requests asking for more are rejected; search time grows steeply with depth. */
  maxDepth?: number;
  logRequests?: boolean;
};

export type MoveResponse = {
  move: string;
  playtak: string;
  score: number;
  nodes: number;
  depth: number;
};

export type EvaluateResponse = {
  score: number;
  result: string;
};

export type ErrorResponse = {
  error: { code: string; message: string };
};

type PositionRequest = { tps: string; halfKomi: number; depth: number | null };

function readPositionRequest(body: unknown): PositionRequest {
  if (typeof body !== "object" || body === null) throw new BadRequestError("request body must be a JSON object");

  const tps = "tps" in body ? body.tps : undefined;
  if (typeof tps !== "string" || tps.trim() === "") throw new BadRequestError("missing tps");

  let halfKomi = 0;
  if ("halfKomi" in body && body.halfKomi !== undefined) {
    const raw = body.halfKomi;
    if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 0) {
      throw new BadRequestError("halfKomi must be a non-negative integer");
    }
    halfKomi = raw;
  }

  let depth: number | null = null;
  if ("depth" in body && body.depth !== undefined) {
    const raw = body.depth;
    if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 1) {
      throw new BadRequestError("depth must be a positive integer");
    }
    depth = raw;
  }

  return { tps, halfKomi, depth };
}

export function createTakApp(opts: TakServerOpts = {}): express.Express {
  const defaultDepth = opts.defaultDepth ?? DEFAULT_SEARCH_DEPTH;
  const maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "64kb" }));

  if (opts.logRequests ?? true) {
    app.use((req, _res, next) => {
      console.log(`[tak-server] ${req.method} ${req.path}`);
      next();
    });
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/move", (req, res) => {
    const body = readPositionRequest(req.body);
    const depth = body.depth ?? defaultDepth;
    if (depth > maxDepth) throw new BadRequestError(`depth ${depth} exceeds the limit of ${maxDepth}`);

    const state = parseTps(body.tps, { halfKomi: body.halfKomi });
    if (state.result !== "ongoing") throw new BadRequestError(`game is already over (${state.result})`);
    const result = searchBestMove(state, depth);
    const response: MoveResponse = {
      move: formatPtnMove(result.move),
      playtak: encodePlaytakMove(result.move),
      score: result.score,
      nodes: result.nodes,
      depth: result.depth,
    };
    res.json(response);
  });

  app.post("/api/evaluate", (req, res) => {
    const body = readPositionRequest(req.body);
    const state = parseTps(body.tps, { halfKomi: body.halfKomi });
    const response: EvaluateResponse = { score: evaluateState(state), result: state.result };
    res.json(response);
  });

  // Express recognises error middleware by its four parameters.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof GameError) {
      const response: ErrorResponse = { error: { code: err.code, message: err.message } };
      if (err.httpStatus >= 500) console.error("[tak-server] request failed", err.message);
      res.status(err.httpStatus).json(response);
      return;
    }
    // Malformed JSON bodies surface here from express.json().
    if (err instanceof SyntaxError) {
      const response: ErrorResponse = { error: { code: "REQUEST_INVALID", message: err.message } };
      res.status(400).json(response);
      return;
    }
    console.error("[tak-server] request failed", errorMessage(err));
    const response: ErrorResponse = { error: { code: "INTERNAL_ERROR", message: errorMessage(err) } };
    res.status(500).json(response);
  });

  return app;
}

export async function startTakServer(args: TakServerOpts & { port?: number }): Promise<{
  app: express.Express;
  server: Server;
  url: string;
  close: () => Promise<void>;
}> {
  const app = createTakApp(args);
  const port = args.port ?? 8788;

  const server = createServer(app);
  server.listen(port);
  await new Promise<void>((resolve, reject) => {
    server.once("listening", () => resolve());
    server.once("error", reject);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;
  const close = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return { app, server, url: `http://localhost:${actualPort}`, close };
}
