/**
 * ChessEvaluator - Static position evaluation
 *
 * Pure material count in centipawns from White's perspective
 * (positive = White advantage). No positional or mobility terms.
 * The king carries a large value so that losing it dominates everything else.
 */

import { ChessEngine } from './ChessEngine.js';
import { Color, PIECE_VALUES, PieceType } from './types.js';

export interface EvaluatorConfig {
  /** Custom piece values (centipawns) */
  pieceValues?: Partial<Record<PieceType, number>>;
}

export class ChessEvaluator {
  private readonly values: Record<PieceType, number>;

  constructor(config: EvaluatorConfig = {}) {
    this.values = { ...PIECE_VALUES, ...config.pieceValues };
  }

  /**
   * Evaluate a position
   * @param position - Engine or FEN string
   * @returns Score in centipawns (+ = White advantage)
   */
  evaluate(position: ChessEngine | string): number {
    const engine = typeof position === 'string'
      ? new ChessEngine({ initialFen: position })
      : position;

    let score = 0;
    for (const row of engine.board()) {
      for (const piece of row) {
        if (!piece) continue;
        const value = this.values[piece.type];
        score += piece.color === 'w' ? value : -value;
      }
    }
    return score;
  }

  /**
   * Score from one side's perspective
   */
  evaluateFor(position: ChessEngine | string, color: Color): number {
    const score = this.evaluate(position);
    return color === 'w' ? score : -score;
  }
}
