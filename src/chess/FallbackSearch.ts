/**
 * FallbackSearch - Runs ChessSearch off the main thread
 *
 * The search is CPU-bound, so it runs on a worker_threads worker and the
 * event loop stays free for input. When the compiled worker script is not
 * present (running from TypeScript sources) or the worker fails, the search
 * runs on the main thread instead.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Worker } from 'worker_threads';
import { createLogger } from '../core/logger.js';
import { moveToUci, parseUciMove } from './ChessEngine.js';
import { ChessSearch } from './ChessSearch.js';
import { MoveSelection, PositionSnapshot } from './types.js';
import { WorkerReplySchema, type SearchTask } from './workers/protocol.js';

const log = createLogger('SEARCH');

const DEFAULT_WORKER_URL = new URL('./workers/search.worker.js', import.meta.url);

export interface FallbackSearchOptions {
  /** Run the search on a worker thread when possible (default: true) */
  useWorker?: boolean;
  /** Location of the compiled worker script */
  workerUrl?: URL;
  /** Search used on the main thread */
  search?: ChessSearch;
}

export class FallbackSearch {
  readonly kind = 'fallback' as const;
  private readonly search: ChessSearch;
  private readonly workerUrl: URL;
  private useWorker: boolean;
  private worker: Worker | null = null;
  private disposed = false;

  constructor(options: FallbackSearchOptions = {}) {
    this.search = options.search ?? new ChessSearch();
    this.workerUrl = options.workerUrl ?? DEFAULT_WORKER_URL;
    this.useWorker = options.useWorker ?? true;
  }

  /**
   * Pick a move for the snapshot position at the given depth
   */
  async selectMove(snapshot: PositionSnapshot, depth: number): Promise<MoveSelection> {
    if (this.disposed) throw new Error('Search has been disposed');

    if (this.useWorker && this.workerScriptExists()) {
      try {
        return await this.runWorkerSearch(snapshot, depth);
      } catch (error) {
        // Worker was stopped by dispose()
        if (this.disposed) throw error;
        log.error('Worker search failed, falling back to main thread', error);
      }
    }
    return this.runMainThreadSearch(snapshot, depth);
  }

  /**
   * Stop the worker, if one was started
   */
  async dispose(): Promise<void> {
    this.disposed = true;
    const worker = this.worker;
    this.worker = null;
    if (worker) await worker.terminate();
  }

  // ===========================================================================
  // Worker Management
  // ===========================================================================

  private workerScriptExists(): boolean {
    if (fs.existsSync(fileURLToPath(this.workerUrl))) return true;
    log.debug(`No compiled search worker at ${this.workerUrl.href}; searching on the main thread`);
    this.useWorker = false;
    return false;
  }

  /**
   * Get or create worker instance
   */
  private getWorker(): Worker {
    if (!this.worker) {
      const worker = new Worker(this.workerUrl);

      // Handle worker errors
      worker.on('error', (err) => {
        log.error('Search worker error', err);
        // Terminate and clear so we recreate on next request
        void worker.terminate();
        if (this.worker === worker) this.worker = null;
      });

      worker.on('exit', (code) => {
        if (code !== 0) log.warn(`Search worker stopped with exit code ${code}`);
        if (this.worker === worker) this.worker = null;
      });
      this.worker = worker;
    }
    return this.worker;
  }

  /**
   * Run search in worker thread
   */
  private runWorkerSearch(snapshot: PositionSnapshot, depth: number): Promise<MoveSelection> {
    return new Promise((resolve, reject) => {
      const worker = this.getWorker();

      const handleMessage = (raw: unknown) => {
        cleanup();
        const parsed = WorkerReplySchema.safeParse(raw);
        if (!parsed.success) {
          reject(new Error(`Malformed worker reply: ${parsed.error.message}`));
          return;
        }
        const msg = parsed.data;
        if (msg.type === 'ERROR') {
          reject(new Error(msg.error));
          return;
        }
        const move = msg.move === null ? null : parseUciMove(msg.move);
        if (msg.move !== null && !move) {
          reject(new Error(`Worker returned unreadable move: ${msg.move}`));
          return;
        }
        resolve({
          move,
          source: 'fallback',
          score: msg.evaluation,
          nodes: msg.stats.nodes,
        });
      };

      const handleError = (err: Error) => {
        cleanup();
        reject(err);
      };

      const handleExit = (code: number) => {
        cleanup();
        reject(new Error(`Search worker exited with code ${code} before replying`));
      };

      const cleanup = () => {
        worker.off('message', handleMessage);
        worker.off('error', handleError);
        worker.off('exit', handleExit);
      };

      worker.on('message', handleMessage);
      worker.on('error', handleError);
      worker.on('exit', handleExit);

      const task: SearchTask = {
        type: 'SEARCH',
        snapshot: { initialFen: snapshot.initialFen, moves: [...snapshot.moves] },
        depth,
      };
      worker.postMessage(task);
    });
  }

  /**
   * Run search in main thread (fallback)
   */
  private async runMainThreadSearch(snapshot: PositionSnapshot, depth: number): Promise<MoveSelection> {
    // Let pending I/O and renders run before the search takes the thread
    await new Promise<void>(resolve => setImmediate(resolve));

    const result = this.search.search(snapshot, depth);
    log.debug(
      `depth ${result.depth}: ${result.bestMove ? moveToUci(result.bestMove) : 'no move'} ` +
      `(score ${result.score}, ${result.nodes} nodes, ${result.time} ms)`
    );
    return {
      move: result.bestMove,
      source: 'fallback',
      score: result.score,
      nodes: result.nodes,
    };
  }
}
