/**
 * Negamax Search Tests
 */

import { describe, it, expect } from 'vitest';
import { ChessEngine } from '../src/chess/ChessEngine.js';
import { ChessEvaluator } from '../src/chess/ChessEvaluator.js';
import { ChessSearch } from '../src/chess/ChessSearch.js';
import { Move, STARTING_FEN } from '../src/chess/types.js';

const FREE_QUEEN = 'k7/8/8/8/8/2p5/3Q4/K7 b - - 0 1';
const STALEMATE = 'k7/8/1Q6/8/8/8/8/7K b - - 0 1';

/** Plain negamax without pruning, same leaf rules as ChessSearch */
function plainNegamax(fen: string, depth: number) {
  const evaluator = new ChessEvaluator();
  const engine = new ChessEngine({ initialFen: fen });
  let nodes = 0;

  const visit = (d: number, sign: number): number => {
    nodes++;
    const moves = engine.legalMoves();
    if (d === 0 || moves.length === 0 || engine.drawReason() !== null) {
      return sign * evaluator.evaluate(engine);
    }
    let best = -Infinity;
    for (const move of moves) {
      engine.play(move);
      best = Math.max(best, -visit(d - 1, -sign));
      engine.undo();
    }
    return best;
  };

  const sign = engine.turn() === 'w' ? 1 : -1;
  let bestMove: Move | null = null;
  let bestScore = -Infinity;
  for (const move of engine.legalMoves()) {
    engine.play(move);
    const score = -visit(depth - 1, -sign);
    engine.undo();
    if (score > bestScore) {
      bestScore = score;
      bestMove = move;
    }
  }
  return { bestMove, score: bestScore, nodes };
}

describe('ChessSearch', () => {
  const search = new ChessSearch();

  it('should return a legal move', () => {
    const engine = new ChessEngine();
    const result = search.search(engine, 2);
    expect(result.bestMove).not.toBeNull();
    if (result.bestMove) expect(engine.isLegal(result.bestMove)).toBe(true);
    expect(result.depth).toBe(2);
  });

  it('should keep the first generated move when every score ties', () => {
    const engine = new ChessEngine();
    const result = search.search(engine, 1);
    expect(result.bestMove).toEqual(engine.legalMoves()[0]);
    expect(result.score).toBe(0);
    expect(result.nodes).toBe(20);
  });

  it('should take a free queen', () => {
    const result = search.search(new ChessEngine({ initialFen: FREE_QUEEN }), 1);
    expect(result.bestMove).toEqual({ from: 'c3', to: 'd2' });
    expect(result.score).toBe(100);
  });

  it('should return no move when the side to move has none', () => {
    const result = search.search(new ChessEngine({ initialFen: STALEMATE }), 2);
    expect(result.bestMove).toBeNull();
    expect(result.nodes).toBe(0);
    // Static score from Black's side: White is a queen up
    expect(result.score).toBe(-900);
  });

  it('should leave the caller\'s position untouched', () => {
    const engine = new ChessEngine();
    engine.apply({ from: 'e2', to: 'e4' });
    const before = engine.fen();
    search.search(engine, 2);
    expect(engine.fen()).toBe(before);
    expect(engine.history()).toHaveLength(1);
  });

  it('should search from a snapshot', () => {
    const result = search.search({ initialFen: FREE_QUEEN, moves: [] }, 2);
    expect(result.bestMove).toEqual({ from: 'c3', to: 'd2' });
  });

  it('should clamp depth below one to one', () => {
    const result = search.search({ initialFen: STARTING_FEN, moves: [] }, 0);
    expect(result.depth).toBe(1);
    expect(result.nodes).toBe(20);
  });

  it('should agree with plain negamax while visiting no more nodes', () => {
    const cases: Array<[string, number]> = [
      [STARTING_FEN, 2],
      [FREE_QUEEN, 3],
      ['k7/8/8/3p4/4P3/8/8/K7 w - - 0 1', 3],
      ['4k3/8/8/3n4/4P3/2N5/8/4K3 w - - 0 1', 2],
    ];
    for (const [fen, depth] of cases) {
      const pruned = search.search(new ChessEngine({ initialFen: fen }), depth);
      const plain = plainNegamax(fen, depth);
      expect(pruned.bestMove).toEqual(plain.bestMove);
      expect(pruned.score).toBe(plain.score);
      expect(pruned.nodes).toBeLessThanOrEqual(plain.nodes);
    }
  });
});
