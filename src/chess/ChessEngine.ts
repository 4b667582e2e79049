/**
 * ChessEngine - Rules engine adapter around chess.js
 *
 * The session core never looks inside a position beyond what this class
 * exposes: legal moves, apply/undo, terminal status, notation and FEN.
 */

import { Chess, type Move as ChessJsMove } from 'chess.js';
import {
  AppliedMove,
  Board,
  CapturedPieces,
  Color,
  GameEndReason,
  GameResult,
  Move,
  Piece,
  PositionSnapshot,
  PromotionPiece,
  Result,
  SQUARES,
  STARTING_FEN,
  Square,
} from './types.js';

export interface ChessEngineConfig {
  /** Initial FEN position */
  initialFen?: string;
}

/** Where a replayed move list stopped being legal */
export interface ReplayFailure {
  index: number;
  move: Move;
}

export class ChessEngine {
  private chess: Chess;
  private readonly initialFen: string;
  private moveHistory: AppliedMove[] = [];
  private capturedPieces: CapturedPieces = { white: [], black: [] };

  constructor(config: ChessEngineConfig = {}) {
    this.initialFen = config.initialFen || STARTING_FEN;
    this.chess = new Chess(this.initialFen);
  }

  /**
   * Rebuild a position from a snapshot by replaying its moves.
   * Throws if the snapshot does not describe a legal game.
   */
  static fromSnapshot(snapshot: PositionSnapshot): ChessEngine {
    const moves: Move[] = [];
    for (const text of snapshot.moves) {
      const move = parseUciMove(text);
      if (!move) throw new Error(`Malformed move in snapshot: ${text}`);
      moves.push(move);
    }
    const replayed = ChessEngine.replay(moves, snapshot.initialFen);
    if (!replayed.ok) {
      throw new Error(`Illegal move in snapshot at ${replayed.error.index}: ${moveToUci(replayed.error.move)}`);
    }
    return replayed.value;
  }

  /**
   * Replay a move list from a starting position
   * @returns the resulting engine, or the first move that was not legal
   */
  static replay(moves: readonly Move[], initialFen: string = STARTING_FEN): Result<ChessEngine, ReplayFailure> {
    const engine = new ChessEngine({ initialFen });
    for (let index = 0; index < moves.length; index++) {
      if (!engine.apply(moves[index])) {
        return { ok: false, error: { index, move: moves[index] } };
      }
    }
    return { ok: true, value: engine };
  }

  // ===========================================================================
  // Moves
  // ===========================================================================

  /** All legal moves, in chess.js generation order */
  legalMoves(): Move[] {
    return this.chess.moves({ verbose: true }).map(toMove);
  }

  /** Legal moves starting on a square */
  legalMovesFrom(square: Square): Move[] {
    return this.chess.moves({ square, verbose: true }).map(toMove);
  }

  /** Is this exact move (including promotion piece) legal here */
  isLegal(move: Move): boolean {
    return this.legalMovesFrom(move.from).some(m => movesEqual(m, move));
  }

  /**
   * Apply a move after checking it against the legal set
   * @returns what happened, or null if the move is not legal
   */
  apply(move: Move): AppliedMove | null {
    if (!this.isLegal(move)) return null;
    return this.play(move);
  }

  /**
   * Apply a move taken from legalMoves() without re-checking it.
   * Used by the search, which only ever plays generated moves.
   */
  play(move: Move): AppliedMove | null {
    let result: ChessJsMove;
    try {
      result = this.chess.move({ from: move.from, to: move.to, promotion: move.promotion });
    } catch {
      return null;
    }

    const applied: AppliedMove = {
      move: toMove(result),
      san: result.san,
      color: result.color,
      piece: result.piece,
      captured: result.captured,
    };

    if (applied.captured) {
      if (applied.color === 'w') {
        this.capturedPieces.white.push(applied.captured);
      } else {
        this.capturedPieces.black.push(applied.captured);
      }
    }
    this.moveHistory.push(applied);
    return applied;
  }

  /**
   * Undo the last move
   * @returns The undone move, or null if no moves to undo
   */
  undo(): AppliedMove | null {
    const result = this.chess.undo();
    if (!result) return null;

    const undone = this.moveHistory.pop() ?? null;
    if (undone?.captured) {
      const list = undone.color === 'w' ? this.capturedPieces.white : this.capturedPieces.black;
      const idx = list.lastIndexOf(undone.captured);
      if (idx !== -1) list.splice(idx, 1);
    }
    return undone;
  }

  /** SAN for a legal move in the current position; the position is unchanged */
  toNotation(move: Move): string | null {
    const match = this.chess
      .moves({ square: move.from, verbose: true })
      .find(m => movesEqual(toMove(m), move));
    return match ? match.san : null;
  }

  // ===========================================================================
  // Game State Queries
  // ===========================================================================

  /** Get FEN string */
  fen(): string {
    return this.chess.fen();
  }

  /** Get current turn */
  turn(): Color {
    return this.chess.turn();
  }

  private halfMoveClock(): number {
    const parts = this.chess.fen().split(' ');
    return parseInt(parts[4] || '0', 10);
  }

  /** Get the board as 2D array */
  board(): Board {
    return this.chess.board().map(row =>
      row.map(sq => (sq ? { type: sq.type, color: sq.color } : null))
    );
  }

  /** Get piece at a square */
  pieceAt(square: Square): Piece | null {
    const piece = this.chess.get(square);
    return piece ? { type: piece.type, color: piece.color } : null;
  }

  /** Applied moves since the initial position */
  history(): AppliedMove[] {
    return [...this.moveHistory];
  }

  /** Move history as SAN strings */
  sanHistory(): string[] {
    return this.moveHistory.map(m => m.san);
  }

  /** Get captured pieces */
  getCapturedPieces(): CapturedPieces {
    return {
      white: [...this.capturedPieces.white],
      black: [...this.capturedPieces.black],
    };
  }

  /** Frozen copy of the position for background move selection */
  snapshot(): PositionSnapshot {
    return Object.freeze({
      initialFen: this.initialFen,
      moves: Object.freeze(this.moveHistory.map(m => moveToUci(m.move))),
    });
  }

  // ===========================================================================
  // Game Status
  // ===========================================================================

  /** Is the current player in check */
  isCheck(): boolean {
    return this.chess.isCheck();
  }

  /** Is the 50-move rule in effect */
  isFiftyMoveRule(): boolean {
    return this.halfMoveClock() >= 100;
  }

  /**
   * First terminal condition that holds, in fixed priority:
   * checkmate, stalemate, insufficient material, threefold repetition, fifty-move rule.
   */
  terminalReason(): GameEndReason | null {
    if (this.chess.isCheckmate()) return 'checkmate';
    if (this.chess.isStalemate()) return 'stalemate';
    return this.drawReason();
  }

  /**
   * Draw conditions that do not depend on move generation.
   * The search checks these only when the side to move has legal moves.
   */
  drawReason(): GameEndReason | null {
    if (this.chess.isInsufficientMaterial()) return 'insufficient_material';
    if (this.chess.isThreefoldRepetition()) return 'threefold_repetition';
    if (this.isFiftyMoveRule()) return 'fifty_move_rule';
    return null;
  }

  /** Is the game over */
  isGameOver(): boolean {
    return this.terminalReason() !== null;
  }

  /** Get game result if game is over */
  gameResult(): GameResult | null {
    const reason = this.terminalReason();
    if (!reason) return null;

    if (reason === 'checkmate') {
      const winner: Color = this.turn() === 'w' ? 'b' : 'w';
      return { winner, reason, score: winner === 'w' ? '1-0' : '0-1' };
    }
    return { winner: null, reason, score: '1/2-1/2' };
  }

  /**
   * Clone the engine (same initial position, same moves)
   */
  clone(): ChessEngine {
    return ChessEngine.fromSnapshot(this.snapshot());
  }
}

// =============================================================================
// Move helpers
// =============================================================================

const SQUARE_SET: ReadonlySet<string> = new Set(SQUARES);

export function isSquare(value: string): value is Square {
  return SQUARE_SET.has(value);
}

export function isPromotionPiece(value: string | undefined): value is PromotionPiece {
  return value === 'q' || value === 'r' || value === 'b' || value === 'n';
}

function toMove(m: ChessJsMove): Move {
  return isPromotionPiece(m.promotion)
    ? { from: m.from, to: m.to, promotion: m.promotion }
    : { from: m.from, to: m.to };
}

/** Field-by-field move equality */
export function movesEqual(a: Move, b: Move): boolean {
  return a.from === b.from && a.to === b.to && a.promotion === b.promotion;
}

/** UCI long algebraic notation ("e2e4", "e7e8q") */
export function moveToUci(move: Move): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

/**
 * Parse UCI long algebraic notation
 * @returns the move, or null if the text is not a well-formed move
 */
export function parseUciMove(text: string): Move | null {
  const match = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/.exec(text.trim());
  if (!match) return null;
  const [, from, to, promotion] = match;
  if (!isSquare(from) || !isSquare(to)) return null;
  return isPromotionPiece(promotion) ? { from, to, promotion } : { from, to };
}

/** "1. e4 e5" lines from a SAN list */
export function formatMoveList(sans: readonly string[]): string[] {
  const lines: string[] = [];
  for (let i = 0; i < sans.length; i += 2) {
    const moveNo = i / 2 + 1;
    lines.push(i + 1 < sans.length
      ? `${moveNo}. ${sans[i]} ${sans[i + 1]}`
      : `${moveNo}. ${sans[i]}`);
  }
  return lines;
}

/** Piece symbol: uppercase for white, lowercase for black */
export function pieceSymbol(piece: Piece): string {
  return piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
}

/**
 * Plain-text board, rank 8 first, "." for empty squares:
 *
 *   8 r n b q k b n r
 *   ...
 *     a b c d e f g h
 */
export function boardToText(board: Board): string {
  const rows = board.map((row, i) =>
    `${8 - i} ${row.map(piece => (piece ? pieceSymbol(piece) : '.')).join(' ')}`
  );
  rows.push('  a b c d e f g h');
  return rows.join('\n');
}

/**
 * Validate a FEN string
 */
export function isValidFen(fen: string): boolean {
  try {
    new Chess(fen);
    return true;
  } catch {
    return false;
  }
}

/**
 * Colour-flipped position: ranks reversed, piece colours swapped,
 * side to move swapped. Material evaluation negates under this mapping.
 */
export function mirrorFen(fen: string): string {
  const [placement, turn, castling, enPassant, halfMove = '0', fullMove = '1'] = fen.split(' ');
  const swapCase = (s: string) =>
    s.replace(/[a-zA-Z]/g, c => (c === c.toUpperCase() ? c.toLowerCase() : c.toUpperCase()));

  const mirroredPlacement = placement.split('/').reverse().map(swapCase).join('/');
  const mirroredTurn = turn === 'w' ? 'b' : 'w';

  let mirroredCastling = '-';
  if (castling && castling !== '-') {
    const swapped = swapCase(castling);
    mirroredCastling = ['K', 'Q', 'k', 'q'].filter(c => swapped.includes(c)).join('');
  }

  let mirroredEp = '-';
  if (enPassant && enPassant !== '-') {
    mirroredEp = `${enPassant[0]}${9 - parseInt(enPassant[1], 10)}`;
  }

  return [mirroredPlacement, mirroredTurn, mirroredCastling, mirroredEp, halfMove, fullMove].join(' ');
}
