/**
 * Chess Module Type Definitions
 *
 * TypeScript interfaces for the move-selection subsystem.
 * Based on chess.js conventions (colors, piece letters, algebraic squares).
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Pieces a pawn may promote to */
export type PromotionPiece = 'q' | 'r' | 'b' | 'n';

/** Square notation (a1-h8) */
export type Square =
  | 'a1' | 'a2' | 'a3' | 'a4' | 'a5' | 'a6' | 'a7' | 'a8'
  | 'b1' | 'b2' | 'b3' | 'b4' | 'b5' | 'b6' | 'b7' | 'b8'
  | 'c1' | 'c2' | 'c3' | 'c4' | 'c5' | 'c6' | 'c7' | 'c8'
  | 'd1' | 'd2' | 'd3' | 'd4' | 'd5' | 'd6' | 'd7' | 'd8'
  | 'e1' | 'e2' | 'e3' | 'e4' | 'e5' | 'e6' | 'e7' | 'e8'
  | 'f1' | 'f2' | 'f3' | 'f4' | 'f5' | 'f6' | 'f7' | 'f8'
  | 'g1' | 'g2' | 'g3' | 'g4' | 'g5' | 'g6' | 'g7' | 'g8'
  | 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6' | 'h7' | 'h8';

// =============================================================================
// Piece Representation
// =============================================================================

/** A piece on the board */
export interface Piece {
  type: PieceType;
  color: Color;
}

/** 8x8 board array (rank 8 to rank 1, file a to file h) */
export type Board = (Piece | null)[][];

// =============================================================================
// Move Representation
// =============================================================================

/** A move value. Two moves are equal when all three fields match. */
export interface Move {
  readonly from: Square;
  readonly to: Square;
  readonly promotion?: PromotionPiece;
}

/** What actually happened when a move was applied */
export interface AppliedMove {
  move: Move;
  /** Standard Algebraic Notation (e.g., "Nf3", "O-O") */
  san: string;
  /** Color of the player who made the move */
  color: Color;
  /** Piece type that moved */
  piece: PieceType;
  /** Piece type captured (if any) */
  captured?: PieceType;
}

/**
 * Immutable hand-off of a position to background move selection.
 * Rebuilt by replay so repetition history is preserved.
 */
export interface PositionSnapshot {
  readonly initialFen: string;
  /** Moves in UCI long algebraic notation ("e2e4", "e7e8q") */
  readonly moves: readonly string[];
}

// =============================================================================
// Game State
// =============================================================================

/** Captured pieces tracking */
export interface CapturedPieces {
  white: PieceType[];  // Pieces captured BY white (black's pieces)
  black: PieceType[];  // Pieces captured BY black (white's pieces)
}

/** Game termination reasons, in reporting priority order */
export type GameEndReason =
  | 'checkmate'
  | 'stalemate'
  | 'insufficient_material'
  | 'threefold_repetition'
  | 'fifty_move_rule';

/** Game result */
export interface GameResult {
  /** Winner color (null for draw) */
  winner: Color | null;
  /** Reason for game end */
  reason: GameEndReason;
  /** Final score string */
  score: '1-0' | '0-1' | '1/2-1/2';
}

// =============================================================================
// Search Types
// =============================================================================

/** Search result */
export interface SearchResult {
  /** Best move, null when the side to move has no legal moves */
  bestMove: Move | null;
  /** Score of the best move from the side to move's perspective */
  score: number;
  /** Depth searched (plies) */
  depth: number;
  /** Nodes visited */
  nodes: number;
  /** Beta cutoffs taken */
  betaCutoffs: number;
  /** Search time in ms */
  time: number;
}

/** Difficulty labels offered to the player */
export type Difficulty = 'easy' | 'medium' | 'hard';

/** Search depth, in plies */
export type SearchDepth = 1 | 2 | 3;

// =============================================================================
// Outcomes
// =============================================================================

/** Result-or-error value used at module boundaries instead of exceptions */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** No external engine could be started, or none was resolved */
export interface EngineUnavailable {
  kind: 'EngineUnavailable';
  message: string;
}

/** A single external-engine call failed */
export interface EngineProtocolError {
  kind: 'EngineProtocolError';
  message: string;
}

export type EngineFailure = EngineUnavailable | EngineProtocolError;

/** Which move source produced a move */
export type MoveSourceKind = 'external' | 'fallback';

/** Move returned by the move provider */
export interface MoveSelection {
  /** Chosen move, null when there was nothing to play */
  move: Move | null;
  source: MoveSourceKind;
  /** Why the external engine was skipped for this move */
  fallbackReason?: string;
  /** Search score (fallback only) */
  score?: number;
  /** Nodes searched (fallback only) */
  nodes?: number;
}

// =============================================================================
// Configuration Types
// =============================================================================

/** External engine resolution, fixed after startup probing */
export interface EngineConfig {
  /** An engine answered the startup probe */
  available: boolean;
  /** Executable path that answered */
  path: string | null;
  /** Use the engine before the fallback search */
  preferOverFallback: boolean;
}

/** Timing knobs for the UCI bridge */
export interface UciBridgeConfig {
  /** Handshake deadline for the startup probe (ms) */
  probeTimeoutMs: number;
  /** Guard on a whole per-move exchange (ms) */
  moveTimeoutMs: number;
  /** Wait after `quit` before the process is killed (ms) */
  quitGraceMs: number;
}

// =============================================================================
// Constants
// =============================================================================

/** Standard starting position FEN */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Material values in centipawns */
export const PIECE_VALUES: Record<PieceType, number> = {
  p: 100,
  n: 320,
  b: 330,
  r: 500,
  q: 900,
  k: 20000,
};

/** File letters */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Rank numbers */
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

const toSquare = (file: typeof FILES[number], rank: typeof RANKS[number]): Square => `${file}${rank}`;

/** All squares */
export const SQUARES: Square[] = FILES.flatMap(f => RANKS.map(r => toSquare(f, r)));

/** Difficulty → search depth */
export const DIFFICULTY_DEPTH: Record<Difficulty, SearchDepth> = {
  easy: 1,
  medium: 2,
  hard: 3,
};

/** Search depth → difficulty */
export const DEPTH_DIFFICULTY: Record<SearchDepth, Difficulty> = {
  1: 'easy',
  2: 'medium',
  3: 'hard',
};

export const DEFAULT_SEARCH_DEPTH: SearchDepth = 2;

/** Default UCI bridge timings */
export const DEFAULT_UCI_BRIDGE_CONFIG: UciBridgeConfig = {
  probeTimeoutMs: 5000,
  moveTimeoutMs: 30000,
  quitGraceMs: 500,
};
