import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { AIDifficulty, MoveRankWeights, SearchOptions, SearchResult } from "./aiTypes.ts";
import { applyMove } from "../game/applyMove.ts";
import { winnerOf } from "../game/state.ts";
import { formatTps } from "../game/tps.ts";
import { DEFAULT_RANK_WEIGHTS, DIFFICULTY_DEPTH } from "./aiTypes.ts";
import { evaluateState, terminalScore } from "./evaluate.ts";
import { rankMoves } from "./moveRank.ts";
import { ConfigurationError, InvariantViolationError } from "../shared/errors.ts";

type SearchStats = { nodes: number };

function rankedOrThrow(state: GameState, weights: MoveRankWeights): Move[] {
  const moves = rankMoves(state, weights);
  if (moves.length === 0) {
    throw new InvariantViolationError("rules engine reported no legal moves in an ongoing game", {
      tps: formatTps(state),
    });
  }
  return moves;
}

function assertDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new ConfigurationError(`search depth must be a non-negative integer, got ${depth}`);
  }
}

/**
 * Minimax with alpha-beta pruning. White maximises and Black minimises the same
 * White-positive score; the best value found is returned even when it falls
 * outside the window.
 */
export function alphaBeta(
  state: GameState,
  depth: number,
  alpha: number,
  beta: number,
  weights: MoveRankWeights,
  stats: SearchStats
): number {
  stats.nodes++;

  const term = terminalScore(state.result);
  if (term !== null) return term;

  if (depth <= 0) return evaluateState(state);

  const ordered = rankedOrThrow(state, weights);

  if (state.toMove === "W") {
    let best = -Infinity;
    for (const m of ordered) {
      const val = alphaBeta(applyMove(state, m), depth - 1, alpha, beta, weights, stats);
      if (val > best) best = val;
      if (best > alpha) alpha = best;
      if (best >= beta) break;
    }
    return best;
  }

  let best = Infinity;
  for (const m of ordered) {
    const val = alphaBeta(applyMove(state, m), depth - 1, alpha, beta, weights, stats);
    if (val < best) best = val;
    if (best < beta) beta = best;
    if (best <= alpha) break;
  }
  return best;
}

/** Search value of a position with a full window. Depth 0 is the static evaluation. */
export function searchValue(state: GameState, depth: number, options: SearchOptions = {}): number {
  assertDepth(depth);
  return alphaBeta(state, depth, -Infinity, Infinity, options.weights ?? DEFAULT_RANK_WEIGHTS, { nodes: 0 });
}

/**
 * Root of the search: the move whose subtree has the best value for the side to
 * move. The first move reaching the best value wins ties. With depth 0 there is no
 * lookahead; the top-ranked move is returned with the static evaluation.
 */
export function searchBestMove(state: GameState, depth: number, options: SearchOptions = {}): SearchResult {
  assertDepth(depth);
  if (state.result !== "ongoing") {
    throw new InvariantViolationError(`cannot choose a move, the game ended in ${state.result}`, {
      tps: formatTps(state),
    });
  }

  const weights = options.weights ?? DEFAULT_RANK_WEIGHTS;
  const stats: SearchStats = { nodes: 1 };
  const ordered = rankedOrThrow(state, weights);

  if (depth === 0) {
    return { move: ordered[0], score: evaluateState(state), nodes: stats.nodes, depth };
  }

  const maximizing = state.toMove === "W";
  let alpha = -Infinity;
  let beta = Infinity;
  let bestMove: Move | null = null;
  let bestScore = maximizing ? -Infinity : Infinity;

  for (const m of ordered) {
    const val = alphaBeta(applyMove(state, m), depth - 1, alpha, beta, weights, stats);
    if (maximizing) {
      if (bestMove === null || val > bestScore) {
        bestScore = val;
        bestMove = m;
      }
      if (bestScore > alpha) alpha = bestScore;
    } else {
      if (bestMove === null || val < bestScore) {
        bestScore = val;
        bestMove = m;
      }
      if (bestScore < beta) beta = bestScore;
    }
  }

  if (bestMove === null) {
    throw new InvariantViolationError("search finished without a move", { tps: formatTps(state) });
  }
  return { move: bestMove, score: bestScore, nodes: stats.nodes, depth };
}

export function chooseMove(state: GameState, depth: number, options: SearchOptions = {}): Move {
  return searchBestMove(state, depth, options).move;
}

function findWinningMove(state: GameState, moves: Move[]): Move | null {
  for (const m of moves) {
    const after = applyMove(state, m);
    if (winnerOf(after.result) === state.toMove) return m;
  }
  return null;
}

/**
 * Ranker-driven policy without search: take an immediate win, otherwise the best
 * ranked move that neither completes a road for the opponent nor leaves them an
 * immediate win.
 */
export function chooseGreedyMove(state: GameState, weights: MoveRankWeights = DEFAULT_RANK_WEIGHTS): Move {
  const ordered = rankedOrThrow(state, weights);

  const winning = findWinningMove(state, ordered);
  if (winning) return winning;

  for (const m of ordered) {
    const after = applyMove(state, m);
    if (winnerOf(after.result) === after.toMove) continue;
    if (after.result !== "ongoing") return m;
    if (findWinningMove(after, rankMoves(after, weights)) === null) return m;
  }

  return ordered[0];
}

/** One-ply lookahead on the static evaluation, seen from the side to move. */
export function chooseStaticMove(state: GameState, weights: MoveRankWeights = DEFAULT_RANK_WEIGHTS): Move {
  const ordered = rankedOrThrow(state, weights);
  const sign = state.toMove === "W" ? 1 : -1;

  let best = ordered[0];
  let bestEval = -Infinity;
  for (const m of ordered) {
    const current = sign * evaluateState(applyMove(state, m));
    if (current > bestEval) {
      best = m;
      bestEval = current;
    }
  }
  return best;
}

export function chooseMoveByDifficulty(
  state: GameState,
  difficulty: Exclude<AIDifficulty, "human">,
  options: SearchOptions = {}
): { move: Move; info?: { depth: number; nodes: number; score: number; ms: number } } {
  if (difficulty === "easy") {
    return { move: chooseGreedyMove(state, options.weights) };
  }

  const start = performance.now();
  const res = searchBestMove(state, DIFFICULTY_DEPTH[difficulty], options);
  const ms = Math.round(performance.now() - start);
  return { move: res.move, info: { depth: res.depth, nodes: res.nodes, score: res.score, ms } };
}
