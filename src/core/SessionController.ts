/**
 * SessionController - Owns the one live chess session
 *
 * All session state lives here and is changed only from event-loop
 * callbacks: input handlers and the continuation of the single in-flight
 * AI request. The move provider sees nothing but a frozen snapshot.
 *
 * Events:
 * - `render` (SessionView) after every transition
 * - `notice` (string) for short user-facing messages
 * - `aiMove` (AiMoveEvent) when a computer move is applied
 * - `gameOver` (GameResult) when a move ends the game
 */

import { EventEmitter } from 'node:events';
import { ChessEngine, formatMoveList, moveToUci } from '../chess/ChessEngine.js';
import type { MoveSelector } from '../chess/MoveProvider.js';
import {
  AppliedMove,
  Color,
  DEFAULT_SEARCH_DEPTH,
  DEPTH_DIFFICULTY,
  DIFFICULTY_DEPTH,
  Difficulty,
  GameResult,
  Move,
  MoveSelection,
  MoveSourceKind,
  Result,
  SearchDepth,
  Square,
} from '../chess/types.js';
import type { SessionStore } from '../services/SessionStore.js';
import { createLogger } from './logger.js';
import type { DecodedSession } from './sessionCodec.js';
import type {
  IllegalMove,
  SessionGeometry,
  SessionPhase,
  SessionRecord,
  SessionSettings,
  SessionView,
} from './types.js';

const log = createLogger('SESSION');

export const AI_BUSY_NOTICE = 'AI is thinking. Try again shortly.';

export interface AiMoveEvent {
  move: Move;
  san: string;
  source: MoveSourceKind;
  fallbackReason?: string;
}

export interface SessionControllerOptions {
  provider: MoveSelector;
  /** Where the session is saved on shutdown; omit to never save */
  store?: SessionStore | null;
  /** Settings for a fresh session */
  settings?: Partial<SessionSettings>;
  /** Continue a saved session instead of starting fresh */
  resume?: DecodedSession;
}

const SIDE_NAME: Record<Color, string> = { w: 'White', b: 'Black' };

export class SessionController extends EventEmitter {
  private readonly provider: MoveSelector;
  private readonly store: SessionStore | null;

  private position: ChessEngine;
  private humanColor: Color;
  private aiEnabled: boolean;
  private searchDepth: SearchDepth;
  private phase: SessionPhase = 'idle';
  private selected: Square | null = null;
  private legalTargets = new Set<Square>();
  private aiBusy = false;
  private aiTask: Promise<void> | null = null;
  private closed = false;

  constructor(options: SessionControllerOptions) {
    super();
    this.provider = options.provider;
    this.store = options.store ?? null;

    const saved = options.resume?.record;
    this.position = options.resume?.position ?? new ChessEngine();
    this.humanColor = saved?.humanColor ?? options.settings?.humanColor ?? 'w';
    this.aiEnabled = saved?.aiEnabled ?? options.settings?.aiEnabled ?? true;
    this.searchDepth = saved?.searchDepth ?? options.settings?.searchDepth ?? DEFAULT_SEARCH_DEPTH;

    if (this.position.isGameOver()) this.phase = 'gameOver';
  }

  /**
   * First render; lets the AI move if it is on turn
   */
  start(): void {
    this.emitRender();
    if (this.phase !== 'gameOver' && this.isAiTurn()) {
      this.requestAiMove();
    }
  }

  // ===========================================================================
  // Input
  // ===========================================================================

  /**
   * A click on a board square. Ignored while the AI is thinking, after
   * the game ended, or when the side to move is not human.
   */
  clickSquare(square: Square): void {
    if (this.aiBusy || this.phase === 'gameOver' || !this.isHumanTurn()) return;

    const piece = this.position.pieceAt(square);
    const ownPiece = piece !== null && piece.color === this.position.turn();

    if (this.selected === null) {
      if (ownPiece) this.select(square);
      this.emitRender();
      return;
    }

    const played = this.playHumanMove(this.selected, square);
    if (played.ok) {
      this.clearSelection();
      this.afterMove();
      return;
    }

    log.debug(`Rejected ${moveToUci(played.error.move)}`);
    if (ownPiece) {
      this.select(square);
    } else {
      this.clearSelection();
      this.phase = 'idle';
    }
    this.emitRender();
  }

  /**
   * Both clicks of a move at once, whatever was selected before
   */
  playMove(from: Square, to: Square): void {
    if (this.selected !== null && this.selected !== from && !this.aiBusy) {
      this.clearSelection();
      this.phase = 'idle';
    }
    if (this.selected !== from) this.clickSquare(from);
    if (this.selected === from) this.clickSquare(to);
  }

  /**
   * Start a new game. Refused while an AI move is pending.
   */
  newGame(): boolean {
    if (this.aiBusy) {
      this.notice(AI_BUSY_NOTICE);
      return false;
    }
    this.position = new ChessEngine();
    this.clearSelection();
    this.phase = 'idle';
    this.emitRender();
    if (this.isAiTurn()) this.requestAiMove();
    return true;
  }

  /**
   * Drop the saved game, then start a new one
   */
  startFresh(): boolean {
    if (this.aiBusy) {
      this.notice(AI_BUSY_NOTICE);
      return false;
    }
    this.store?.clearGameState();
    return this.newGame();
  }

  toggleAi(): void {
    this.aiEnabled = !this.aiEnabled;
    this.notice(this.aiEnabled ? 'AI opponent on' : 'AI opponent off: both sides are yours');

    if (this.aiEnabled && this.phase !== 'gameOver' && this.isAiTurn() && !this.aiBusy) {
      this.requestAiMove();
      return;
    }
    this.emitRender();
  }

  /**
   * Play the other colour. Starts a new game.
   */
  setHumanColor(color: Color): boolean {
    if (this.aiBusy) {
      this.notice(AI_BUSY_NOTICE);
      return false;
    }
    this.humanColor = color;
    return this.newGame();
  }

  setDifficulty(difficulty: Difficulty): void {
    this.searchDepth = DIFFICULTY_DEPTH[difficulty];
    this.notice(`Difficulty ${difficulty} (depth ${this.searchDepth})`);
    this.emitRender();
  }

  // ===========================================================================
  // AI
  // ===========================================================================

  /**
   * Ask the move provider for a move for the side to move.
   * @returns false when a request is already pending or the game is over
   */
  requestAiMove(): boolean {
    if (this.aiBusy || this.closed || this.phase === 'gameOver' || this.position.isGameOver()) {
      return false;
    }

    this.aiBusy = true;
    this.phase = 'awaitingAI';
    this.clearSelection();
    const snapshot = this.position.snapshot();
    this.emitRender();

    this.aiTask = this.provider.selectMove(snapshot, this.searchDepth)
      .then(
        selection => this.applyAiSelection(selection),
        error => {
          log.error('Move selection failed', error);
          this.finishAiTurn();
        },
      )
      .catch(error => {
        log.error('Could not apply the AI move', error);
        this.finishAiTurn();
      });
    return true;
  }

  /**
   * Resolves once the pending AI request, if any, has been applied
   */
  waitForAi(): Promise<void> {
    return this.aiTask ?? Promise.resolve();
  }

  private applyAiSelection(selection: MoveSelection): void {
    if (this.closed) return;

    const move = selection.move;
    if (!move) {
      log.warn('Move provider returned no move');
      this.finishAiTurn();
      return;
    }

    // The provider works on a snapshot; check again against the live position
    const applied = this.position.apply(move);
    if (!applied) {
      log.error(`Move provider returned ${moveToUci(move)}, which is not legal here`);
      this.finishAiTurn();
      return;
    }

    this.aiBusy = false;
    this.aiTask = null;
    const event: AiMoveEvent = { move: applied.move, san: applied.san, source: selection.source };
    if (selection.fallbackReason) event.fallbackReason = selection.fallbackReason;
    this.emit('aiMove', event);
    this.afterMove();
  }

  private finishAiTurn(): void {
    this.aiBusy = false;
    this.aiTask = null;
    if (this.closed) return;
    this.phase = 'idle';
    this.emitRender();
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Save the session and release the move provider
   */
  async shutdown(geometry?: SessionGeometry): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.store) {
      try {
        this.store.save(this.toRecord(), geometry);
        log.debug(`Saved session to ${this.store.configFile}`);
      } catch (error) {
        log.error('Could not save session', error);
      }
    }
    await this.provider.dispose();
  }

  toRecord(): SessionRecord {
    return {
      fen: this.position.fen(),
      moves: this.position.history().map(applied => applied.move),
      humanColor: this.humanColor,
      aiEnabled: this.aiEnabled,
      searchDepth: this.searchDepth,
      captured: this.position.getCapturedPieces(),
    };
  }

  getView(): SessionView {
    const history = this.position.history();
    const last = history.length > 0 ? history[history.length - 1] : null;
    return {
      fen: this.position.fen(),
      board: this.position.board(),
      turn: this.position.turn(),
      phase: this.phase,
      selected: this.selected,
      legalTargets: [...this.legalTargets],
      lastMove: last ? last.move : null,
      moveList: formatMoveList(this.position.sanHistory()),
      status: this.statusText(),
      inCheck: this.position.isCheck(),
      captured: this.position.getCapturedPieces(),
      result: this.position.gameResult(),
      humanColor: this.humanColor,
      aiEnabled: this.aiEnabled,
      aiBusy: this.aiBusy,
      searchDepth: this.searchDepth,
      difficulty: DEPTH_DIFFICULTY[this.searchDepth],
      engineLabel: this.provider.engineLabel,
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private isAiTurn(): boolean {
    return this.aiEnabled && this.position.turn() !== this.humanColor;
  }

  private isHumanTurn(): boolean {
    return !this.aiEnabled || this.position.turn() === this.humanColor;
  }

  private select(square: Square): void {
    this.selected = square;
    this.legalTargets = new Set(this.position.legalMovesFrom(square).map(m => m.to));
    this.phase = 'selecting';
  }

  private clearSelection(): void {
    this.selected = null;
    this.legalTargets = new Set();
  }

  /**
   * Apply a human move; a pawn reaching the last rank becomes a queen
   */
  private playHumanMove(from: Square, to: Square): Result<AppliedMove, IllegalMove> {
    const piece = this.position.pieceAt(from);
    const lastRank = to.endsWith('8') || to.endsWith('1');
    const move: Move = piece?.type === 'p' && lastRank
      ? { from, to, promotion: 'q' }
      : { from, to };

    const applied = this.position.apply(move);
    return applied
      ? { ok: true, value: applied }
      : { ok: false, error: { kind: 'IllegalMove', move } };
  }

  /**
   * After any applied move: game over, or hand the turn on
   */
  private afterMove(): void {
    const result = this.position.gameResult();
    if (result) {
      this.phase = 'gameOver';
      this.clearSelection();
      this.emitRender();
      log.info(`Game over: ${result.reason} (${result.score})`);
      this.emit('gameOver', result);
      return;
    }

    this.phase = 'idle';
    this.emitRender();
    if (this.isAiTurn()) this.requestAiMove();
  }

  private statusText(): string {
    const result = this.position.gameResult();
    if (result) return describeResult(result);

    const side = SIDE_NAME[this.position.turn()];
    if (this.aiBusy) return `AI thinking — ${side} to move`;
    if (this.position.isCheck()) return `Check — ${side} to move`;
    return `Ready — ${side} to move`;
  }

  private notice(message: string): void {
    this.emit('notice', message);
  }

  private emitRender(): void {
    this.emit('render', this.getView());
  }
}

/**
 * Status line for a finished game
 */
export function describeResult(result: GameResult): string {
  switch (result.reason) {
    case 'checkmate':
      return `Checkmate — ${SIDE_NAME[result.winner ?? 'w']} wins`;
    case 'stalemate':
      return 'Stalemate — draw';
    case 'insufficient_material':
      return 'Draw — insufficient material';
    case 'threefold_repetition':
      return 'Draw — threefold repetition';
    case 'fifty_move_rule':
      return 'Draw — fifty-move rule';
  }
}
