import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import { chooseMoveByDifficulty, searchBestMove } from "../ai/search.ts";
import { formatPtnMove } from "../game/ptn.ts";
import { errorMessage } from "../shared/errors.ts";
import { loadBotConfig, type BotConfig } from "./config.ts";
import { PlaytakClient } from "./playtakClient.ts";

function makeChooser(config: BotConfig): (state: GameState) => Move {
  return (state) => {
    const start = performance.now();
    if (config.depth !== null) {
      const res = searchBestMove(state, config.depth);
      const ms = Math.round(performance.now() - start);
      console.log(`[tak-bot] ${formatPtnMove(res.move)} score=${res.score} depth=${res.depth} nodes=${res.nodes} ms=${ms}`);
      return res.move;
    }
    const { move, info } = chooseMoveByDifficulty(state, config.difficulty);
    const details = info ? ` score=${info.score} depth=${info.depth} nodes=${info.nodes} ms=${info.ms}` : "";
    console.log(`[tak-bot] ${formatPtnMove(move)}${details}`);
    return move;
  };
}

async function main(): Promise<void> {
  const config = loadBotConfig();
  console.log(`[tak-bot] connecting to ${config.url} (${config.size}x${config.size}, ${config.clockSeconds}+${config.incrementSeconds})`);

  const client = new PlaytakClient({
    url: config.url,
    size: config.size,
    clockSeconds: config.clockSeconds,
    incrementSeconds: config.incrementSeconds,
    halfKomi: config.halfKomi,
    chooseMove: makeChooser(config),
  });

  const summary = await client.playOneGame();
  console.log(`[tak-bot] game ${summary.gameId} finished: ${summary.serverResult ?? summary.result} after ${summary.plies} plies`);
  console.log(`[tak-bot] final position: ${summary.finalTps}`);
}

main().catch((err) => {
  console.error("[tak-bot] failed", errorMessage(err));
  process.exitCode = 1;
});
