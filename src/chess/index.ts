/**
 * Chess Module
 *
 * Move selection for the session:
 * - Rules engine adapter over chess.js
 * - Material evaluation
 * - Negamax search with alpha-beta pruning, on a worker thread
 * - External UCI engine bridge
 * - Move provider choosing between the two
 *
 * @module chess
 */

// Core Engine
export {
  ChessEngine,
  boardToText,
  formatMoveList,
  isSquare,
  isValidFen,
  mirrorFen,
  moveToUci,
  movesEqual,
  parseUciMove,
  pieceSymbol,
} from './ChessEngine.js';
export type { ChessEngineConfig, ReplayFailure } from './ChessEngine.js';

// Evaluation
export { ChessEvaluator } from './ChessEvaluator.js';

// Search
export { ChessSearch } from './ChessSearch.js';
export { FallbackSearch } from './FallbackSearch.js';

// External engine
export { UciEngineBridge } from './UciEngine.js';
export type { EngineProcess, SpawnEngine } from './UciEngine.js';

// Move provider
export {
  MoveProvider,
  clampDepth,
  createMoveProvider,
} from './MoveProvider.js';
export type { ExternalEngineSource, MoveSelector, MoveSource } from './MoveProvider.js';

// Types
export * from './types.js';
