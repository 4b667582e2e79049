/**
 * MoveProvider - One move-selection contract over two sources
 *
 * The external UCI engine is preferred while it is available. Any failure of
 * a single external call is answered by the built-in search with the same
 * snapshot and depth, so callers always get the same kind of result.
 */

import path from 'node:path';
import { createLogger } from '../core/logger.js';
import { FallbackSearch } from './FallbackSearch.js';
import { SpawnEngine, UciEngineBridge } from './UciEngine.js';
import {
  DEFAULT_SEARCH_DEPTH,
  MoveSelection,
  PositionSnapshot,
  SearchDepth,
  UciBridgeConfig,
} from './types.js';

const log = createLogger('AI');

/** External UCI engine as a move source */
export interface ExternalEngineSource {
  readonly kind: 'external';
  readonly bridge: UciEngineBridge;
}

/** The two move sources, told apart by `kind` */
export type MoveSource = ExternalEngineSource | FallbackSearch;

/** What the session controller needs from move selection */
export interface MoveSelector {
  readonly engineLabel: string;
  selectMove(snapshot: PositionSnapshot, depth: number): Promise<MoveSelection>;
  dispose(): Promise<void>;
}

/**
 * Clamp any requested depth into the supported 1..3 range
 */
export function clampDepth(depth: number): SearchDepth {
  if (!Number.isFinite(depth)) return DEFAULT_SEARCH_DEPTH;
  if (depth <= 1) return 1;
  if (depth >= 3) return 3;
  return 2;
}

export class MoveProvider implements MoveSelector {
  constructor(
    private readonly fallback: FallbackSearch,
    private readonly external: ExternalEngineSource | null = null,
  ) {}

  /** Source tried first for the next move */
  get preferredSource(): MoveSource {
    const external = this.external;
    if (external) {
      const config = external.bridge.getConfig();
      if (config.available && config.preferOverFallback) return external;
    }
    return this.fallback;
  }

  get engineLabel(): string {
    const source = this.preferredSource;
    switch (source.kind) {
      case 'external': {
        const enginePath = source.bridge.getConfig().path;
        return enginePath ? `UCI engine (${path.basename(enginePath)})` : 'UCI engine';
      }
      case 'fallback':
        return 'Built-in search';
    }
  }

  /**
   * Choose a move for the snapshot position
   * @param depth - Search depth; clamped to 1..3
   */
  async selectMove(snapshot: PositionSnapshot, depth: number): Promise<MoveSelection> {
    const searchDepth = clampDepth(depth);
    const source = this.preferredSource;

    switch (source.kind) {
      case 'external': {
        const result = await source.bridge.requestMove(snapshot, searchDepth);
        if (result.ok) {
          return { move: result.value, source: 'external' };
        }
        log.warn(`${result.error.kind}: ${result.error.message}. Using built-in search for this move`);
        const selection = await this.fallback.selectMove(snapshot, searchDepth);
        return { ...selection, fallbackReason: result.error.message };
      }
      case 'fallback':
        return this.fallback.selectMove(snapshot, searchDepth);
    }
  }

  async dispose(): Promise<void> {
    await this.fallback.dispose();
  }
}

export interface MoveProviderOptions {
  /** Ordered executables to probe; empty entries are skipped */
  candidates: readonly (string | null | undefined)[];
  /** Probe for an external engine at all (default: true) */
  probe?: boolean;
  timings?: Partial<UciBridgeConfig>;
  spawnEngine?: SpawnEngine;
  /** Run the built-in search on a worker thread (default: true) */
  useWorker?: boolean;
}

/**
 * Resolve the external engine once and build the provider
 */
export async function createMoveProvider(options: MoveProviderOptions): Promise<MoveProvider> {
  const fallback = new FallbackSearch({ useWorker: options.useWorker });

  if (options.probe === false) {
    log.info('External engine disabled; using built-in search');
    return new MoveProvider(fallback);
  }

  const bridge = new UciEngineBridge({
    spawnEngine: options.spawnEngine,
    timings: options.timings,
  });
  await bridge.resolve(options.candidates);
  return new MoveProvider(fallback, { kind: 'external', bridge });
}
