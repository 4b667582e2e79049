/**
 * Session types shared by the controller, the codec and the UI
 */

import type {
  Board,
  CapturedPieces,
  Color,
  Difficulty,
  GameResult,
  Move,
  SearchDepth,
  Square,
} from '../chess/types.js';

/** Where the session is in its turn cycle */
export type SessionPhase = 'idle' | 'selecting' | 'awaitingAI' | 'gameOver';

/** Player-facing settings that survive a restart */
export interface SessionSettings {
  humanColor: Color;
  aiEnabled: boolean;
  searchDepth: SearchDepth;
}

/** The persisted part of a session */
export interface SessionRecord extends SessionSettings {
  /** Position after `moves`, in FEN */
  fen: string;
  moves: readonly Move[];
  captured: CapturedPieces;
}

/** Read-only picture of the session for rendering */
export interface SessionView {
  fen: string;
  board: Board;
  turn: Color;
  phase: SessionPhase;
  selected: Square | null;
  legalTargets: Square[];
  lastMove: Move | null;
  /** "1. e4 e5" lines */
  moveList: string[];
  status: string;
  inCheck: boolean;
  captured: CapturedPieces;
  result: GameResult | null;
  humanColor: Color;
  aiEnabled: boolean;
  aiBusy: boolean;
  searchDepth: SearchDepth;
  difficulty: Difficulty;
  engineLabel: string;
}

/** Window/terminal geometry written beside the game */
export interface SessionGeometry {
  size: string;
  state: string;
}

/** A click that did not produce a move; never shown as an error */
export interface IllegalMove {
  kind: 'IllegalMove';
  move: Move;
}

/** The saved session cannot be trusted and was discarded */
export interface PersistenceCorrupt {
  kind: 'PersistenceCorrupt';
  message: string;
}
