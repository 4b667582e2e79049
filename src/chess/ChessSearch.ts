/**
 * ChessSearch - Fixed-depth negamax with alpha-beta pruning
 *
 * The fallback move selector used when no external engine answers.
 * Moves are examined in the order the rules engine generates them; there is
 * no move ordering, transposition table or quiescence. Depth is capped at 3
 * by the caller, which keeps the exponential cost acceptable.
 */

import { ChessEngine } from './ChessEngine.js';
import { ChessEvaluator } from './ChessEvaluator.js';
import { Move, PositionSnapshot, SearchResult } from './types.js';

// =============================================================================
// Constants
// =============================================================================

const INFINITY = 1_000_000_000;

/** +1 when White is to move, -1 when Black is */
type TurnSign = 1 | -1;

const flip = (color: TurnSign): TurnSign => (color === 1 ? -1 : 1);

// =============================================================================
// ChessSearch Class
// =============================================================================

export class ChessSearch {
  private evaluator: ChessEvaluator;
  private nodes = 0;
  private betaCutoffs = 0;

  constructor(evaluator?: ChessEvaluator) {
    this.evaluator = evaluator || new ChessEvaluator();
  }

  /**
   * Search for the best move
   * @param position - Position to search; searched on a private copy
   * @param depth - Plies to search (1..3 in practice)
   */
  search(position: ChessEngine | PositionSnapshot, depth: number): SearchResult {
    const engine = position instanceof ChessEngine
      ? position.clone()
      : ChessEngine.fromSnapshot(position);
    const startTime = Date.now();
    this.nodes = 0;
    this.betaCutoffs = 0;

    const rootDepth = Math.max(1, Math.floor(depth));
    const color: TurnSign = engine.turn() === 'w' ? 1 : -1;

    let bestMove: Move | null = null;
    let bestScore = -INFINITY;
    let alpha = -INFINITY;
    const beta = INFINITY;

    for (const move of engine.legalMoves()) {
      engine.play(move);
      const score = -this.negamax(engine, rootDepth - 1, -beta, -alpha, flip(color));
      engine.undo();

      // Strictly greater: ties keep the first move seen
      if (score > bestScore) {
        bestScore = score;
        bestMove = move;
      }
      alpha = Math.max(alpha, score);
    }

    return {
      bestMove,
      score: bestMove ? bestScore : color * this.evaluator.evaluate(engine),
      depth: rootDepth,
      nodes: this.nodes,
      betaCutoffs: this.betaCutoffs,
      time: Date.now() - startTime,
    };
  }

  /**
   * Negamax node. Returns the score from the side to move's perspective.
   */
  private negamax(engine: ChessEngine, depth: number, alpha: number, beta: number, color: TurnSign): number {
    this.nodes++;

    if (depth === 0) {
      return color * this.evaluator.evaluate(engine);
    }

    const moves = engine.legalMoves();
    // Checkmate, stalemate, or a draw by rule: evaluate like a leaf
    if (moves.length === 0 || engine.drawReason() !== null) {
      return color * this.evaluator.evaluate(engine);
    }

    let maxEval = -INFINITY;
    for (const move of moves) {
      engine.play(move);
      const score = -this.negamax(engine, depth - 1, -beta, -alpha, flip(color));
      engine.undo();

      if (score > maxEval) maxEval = score;
      alpha = Math.max(alpha, score);

      if (alpha >= beta) {
        this.betaCutoffs++;
        break;
      }
    }
    return maxEval;
  }
}
