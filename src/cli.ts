import minimist from "minimist";
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import type { GameState } from "./game/state.ts";
import type { Move } from "./game/moveTypes.ts";
import type { AIDifficulty, AISettings } from "./ai/aiTypes.ts";
import { createInitialGameState, isBoardSize } from "./game/state.ts";
import { playMove } from "./game/applyMove.ts";
import { formatPtnMove, parsePtnMove } from "./game/ptn.ts";
import { formatTps, parseTps } from "./game/tps.ts";
import { difficultyForPlayer, isAIDifficulty } from "./ai/aiTypes.ts";
import { evaluateState } from "./ai/evaluate.ts";
import { chooseMoveByDifficulty, searchBestMove } from "./ai/search.ts";
import { describeResult, renderBoardText } from "./render/boardText.ts";
import { ConfigurationError, GameError, errorMessage } from "./shared/errors.ts";

type Args = ReturnType<typeof minimist>;

type CliOptions = {
  settings: AISettings;
  depth: number | null;
  start: GameState;
};

function num(v: unknown, def: number): number {
  const n = typeof v === "string" ? Number(v) : typeof v === "number" ? v : NaN;
  return Number.isFinite(n) ? n : def;
}

function difficultyArg(v: unknown, def: AIDifficulty): AIDifficulty {
  if (v === undefined) return def;
  if (!isAIDifficulty(v)) throw new ConfigurationError(`expected human, easy, medium or advanced, got "${String(v)}"`);
  return v;
}

function parseOptions(argv: Args): CliOptions {
  const halfKomi = num(argv.komi, 0);
  const depth = argv.depth === undefined ? null : num(argv.depth, NaN);
  if (depth !== null && (!Number.isInteger(depth) || depth < 1)) {
    throw new ConfigurationError("--depth must be a positive integer");
  }

  let start: GameState;
  if (typeof argv.tps === "string") {
    start = parseTps(argv.tps, { halfKomi });
  } else {
    const size = num(argv.size, 6);
    if (!isBoardSize(size)) throw new ConfigurationError("--size must be between 3 and 8");
    start = createInitialGameState(size, { halfKomi });
  }

  return {
    settings: {
      white: difficultyArg(argv.white, "human"),
      black: difficultyArg(argv.black, "medium"),
    },
    depth,
    start,
  };
}

function botMove(state: GameState, difficulty: Exclude<AIDifficulty, "human">, depth: number | null): Move {
  if (depth !== null) {
    const res = searchBestMove(state, depth);
    console.log(`[tak-bot] the bot played ${formatPtnMove(res.move)} (score ${res.score}, ${res.nodes} nodes)`);
    return res.move;
  }
  const { move, info } = chooseMoveByDifficulty(state, difficulty);
  const details = info ? ` (score ${info.score}, ${info.nodes} nodes, ${info.ms} ms)` : "";
  console.log(`[tak-bot] the bot played ${formatPtnMove(move)}${details}`);
  return move;
}

async function main(): Promise<void> {
  const argv: Args = minimist(process.argv.slice(2), { string: ["tps", "white", "black"] });
  if (argv.help) {
    console.log("Usage:");
    console.log("  tsx src/cli.ts --size 6 --white human --black medium");
    console.log("  tsx src/cli.ts --tps \"x3/x3/x3 1 1\" --white easy --black advanced --depth 3 --komi 4");
    return;
  }

  const opts = parseOptions(argv);
  const rl = createInterface({ input, output });
  let state = opts.start;

  try {
    while (state.result === "ongoing") {
      console.log(formatTps(state));
      console.log(renderBoardText(state));

      const difficulty = difficultyForPlayer(opts.settings, state.toMove);
      if (difficulty !== "human") {
        state = playMove(state, botMove(state, difficulty, opts.depth));
        continue;
      }

      const text = await rl.question("enter move: ");
      try {
        state = playMove(state, parsePtnMove(text));
      } catch (err) {
        if (!(err instanceof GameError)) throw err;
        console.log(`invalid move: ${err.message}`);
      }
    }
  } finally {
    rl.close();
  }

  console.log(formatTps(state));
  console.log(renderBoardText(state));
  console.log(`${describeResult(state.result)} (evaluation ${evaluateState(state)})`);
}

main().catch((err) => {
  console.error("[tak-bot] failed", errorMessage(err));
  process.exitCode = 1;
});
