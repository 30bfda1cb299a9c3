// Public surface for the adapters (terminal, PlayTak client, move service).
// No I/O happens behind these exports.

export type { GameState, GameResult, BoardSize } from "../game/state.ts";
export type { Move, PlaceMove, SpreadMove, Direction } from "../game/moveTypes.ts";
export type { AIDifficulty, MoveRankWeights, SearchResult } from "../ai/aiTypes.ts";

export { createInitialGameState, isBoardSize, winnerOf } from "../game/state.ts";
export { generateLegalMoves } from "../game/movegen.ts";
export { applyMove, playMove, isLegalMove } from "../game/applyMove.ts";
export { parsePtnMove, formatPtnMove } from "../game/ptn.ts";
export { parseTps, formatTps } from "../game/tps.ts";

export { evaluateState } from "../ai/evaluate.ts";
export { rankMoves } from "../ai/moveRank.ts";
export { chooseMove, searchBestMove, chooseMoveByDifficulty } from "../ai/search.ts";
export { DEFAULT_RANK_WEIGHTS, WIN_SCORE, LOSS_SCORE } from "../ai/aiTypes.ts";
