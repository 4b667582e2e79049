/**
 * UciEngine - Bridge to an external UCI engine process
 *
 * Every request is a full process lifecycle: spawn, handshake, one search,
 * quit. No session is kept between moves. Whatever happens, the child is
 * gone before the call returns.
 */

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { createLogger } from '../core/logger.js';
import { ChessEngine, moveToUci, parseUciMove } from './ChessEngine.js';
import {
  DEFAULT_UCI_BRIDGE_CONFIG,
  EngineConfig,
  EngineFailure,
  EngineUnavailable,
  Move,
  PositionSnapshot,
  Result,
  UciBridgeConfig,
} from './types.js';

const log = createLogger('ENGINE');

/** The parts of a child process the bridge talks to */
export interface EngineProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnEngine = (executable: string) => EngineProcess;

const spawnEngineProcess: SpawnEngine = (executable) =>
  spawn(executable, [], { stdio: ['pipe', 'pipe', 'ignore'], windowsHide: true });

export interface UciEngineBridgeOptions {
  /** Process launcher (tests pass an in-process fake) */
  spawnEngine?: SpawnEngine;
  timings?: Partial<UciBridgeConfig>;
  /** Prefer the engine over the fallback search once resolved (default: true) */
  preferOverFallback?: boolean;
}

// =============================================================================
// UCI line channel
// =============================================================================

interface Waiter {
  pred: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Line-oriented conversation with one engine process.
 * Lines nobody waits for (info output) are dropped.
 */
class UciChannel {
  private waiters: Waiter[] = [];
  private failure: Error | null = null;
  private started = false;
  private spawnFailed = false;
  private hasExited = false;
  private readonly exited: Promise<void>;
  private readonly lastOutput: string[] = [];

  constructor(private readonly proc: EngineProcess, private readonly label: string) {
    this.exited = new Promise<void>(resolve => {
      proc.once('exit', () => {
        this.hasExited = true;
        resolve();
      });
      proc.once('spawn', () => {
        this.started = true;
      });
      proc.on('error', (err: Error) => {
        if (!this.started) {
          this.spawnFailed = true;
          resolve();
        }
        this.fail(err);
      });
    });

    proc.stdin.on('error', (err: Error) => this.fail(err));

    const lines = createInterface({ input: proc.stdout, crlfDelay: Infinity });
    lines.on('line', (raw) => this.onLine(raw.trim()));
    lines.on('close', () => this.fail(new Error(`${this.label} closed its output`)));
  }

  send(command: string): void {
    if (this.failure || !this.proc.stdin.writable) return;
    log.debug(`> ${command}`);
    this.proc.stdin.write(`${command}\n`);
  }

  /**
   * Send a command and wait for the first line matching `pred`
   */
  request(command: string, pred: (line: string) => boolean, deadline: number, what: string): Promise<string> {
    const reply = this.waitFor(pred, deadline, what);
    this.send(command);
    return reply;
  }

  waitFor(pred: (line: string) => boolean, deadline: number, what: string): Promise<string> {
    if (this.failure) return Promise.reject(this.failure);

    return new Promise<string>((resolve, reject) => {
      const waiter: Waiter = {
        pred,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          reject(new Error(`${this.label} did not answer with ${what} in time${this.tail()}`));
        }, Math.max(0, deadline - Date.now())),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Ask the process to quit, then kill it if it lingers
   */
  async terminate(graceMs: number): Promise<void> {
    if (this.spawnFailed || this.hasExited) return;

    this.send('quit');
    await Promise.race([this.exited, delay(graceMs)]);
    if (this.hasExited) return;

    log.debug(`${this.label} ignored quit; killing it`);
    this.proc.kill('SIGKILL');
    await Promise.race([this.exited, delay(graceMs)]);
    if (!this.hasExited) log.warn(`${this.label} did not report exit after SIGKILL`);
  }

  private onLine(line: string): void {
    if (!line) return;
    log.debug(`< ${line}`);
    this.lastOutput.push(line);
    if (this.lastOutput.length > 5) this.lastOutput.shift();

    const waiter = this.waiters.find(w => w.pred(line));
    if (waiter) {
      this.removeWaiter(waiter);
      waiter.resolve(line);
    }
  }

  private fail(err: Error): void {
    if (!this.failure) this.failure = err;
    const pending = this.waiters;
    this.waiters = [];
    for (const waiter of pending) {
      clearTimeout(waiter.timer);
      waiter.reject(err);
    }
  }

  private removeWaiter(waiter: Waiter): void {
    clearTimeout(waiter.timer);
    this.waiters = this.waiters.filter(w => w !== waiter);
  }

  private tail(): string {
    return this.lastOutput.length > 0 ? ` (last output: ${this.lastOutput.join(' | ')})` : '';
  }
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// =============================================================================
// Bridge
// =============================================================================

export class UciEngineBridge {
  private readonly spawnEngine: SpawnEngine;
  private readonly timings: UciBridgeConfig;
  private config: EngineConfig;
  private resolved = false;
  private unavailable: EngineUnavailable | null = null;

  constructor(options: UciEngineBridgeOptions = {}) {
    this.spawnEngine = options.spawnEngine ?? spawnEngineProcess;
    this.timings = { ...DEFAULT_UCI_BRIDGE_CONFIG, ...options.timings };
    this.config = {
      available: false,
      path: null,
      preferOverFallback: options.preferOverFallback ?? true,
    };
  }

  /** Resolution result; fixed after resolve() */
  getConfig(): EngineConfig {
    return { ...this.config };
  }

  get available(): boolean {
    return this.config.available;
  }

  /**
   * Probe candidate executables once, in order. The first that completes the
   * UCI handshake becomes the active engine. Later calls return the first answer.
   */
  async resolve(candidates: readonly (string | null | undefined)[]): Promise<Result<EngineConfig, EngineUnavailable>> {
    if (this.resolved) {
      return this.unavailable
        ? { ok: false, error: this.unavailable }
        : { ok: true, value: this.getConfig() };
    }
    this.resolved = true;

    for (const candidate of candidates) {
      if (!candidate) continue;
      if (await this.probe(candidate)) {
        this.config = { ...this.config, available: true, path: candidate };
        log.info(`Using external engine at ${candidate}`);
        return { ok: true, value: this.getConfig() };
      }
    }

    this.unavailable = {
      kind: 'EngineUnavailable',
      message: 'No external engine answered; using the built-in search for every move',
    };
    log.warn(this.unavailable.message);
    return { ok: false, error: this.unavailable };
  }

  /**
   * Start the executable, complete the UCI handshake, stop it again
   */
  async probe(executable: string): Promise<boolean> {
    let channel: UciChannel | null = null;
    try {
      channel = new UciChannel(this.spawnEngine(executable), executable);
      const deadline = Date.now() + this.timings.probeTimeoutMs;
      await channel.request('uci', line => line === 'uciok', deadline, 'uciok');
      return true;
    } catch (error) {
      log.debug(`Probe of ${executable} failed: ${describe(error)}`);
      return false;
    } finally {
      await channel?.terminate(this.timings.quitGraceMs);
    }
  }

  /**
   * Ask a fresh engine process for a move
   * @param snapshot - Position to search
   * @param depth - Search depth limit passed as `go depth N`
   */
  async requestMove(snapshot: PositionSnapshot, depth: number): Promise<Result<Move, EngineFailure>> {
    const path = this.config.path;
    if (!this.config.available || !path) {
      return {
        ok: false,
        error: this.unavailable ?? { kind: 'EngineUnavailable', message: 'External engine not resolved' },
      };
    }

    let channel: UciChannel | null = null;
    try {
      const position = ChessEngine.fromSnapshot(snapshot);
      channel = new UciChannel(this.spawnEngine(path), path);
      const deadline = Date.now() + this.timings.moveTimeoutMs;

      await channel.request('uci', line => line === 'uciok', deadline, 'uciok');
      await channel.request('isready', line => line === 'readyok', deadline, 'readyok');
      channel.send(`position fen ${position.fen()}`);
      const reply = await channel.request(
        `go depth ${Math.max(1, Math.floor(depth))}`,
        line => line.startsWith('bestmove'),
        deadline,
        'bestmove',
      );

      const token = reply.split(/\s+/)[1];
      if (!token || token === '(none)') {
        throw new Error('engine returned no move');
      }
      const move = parseUciMove(token);
      if (!move) {
        throw new Error(`unreadable move "${token}"`);
      }
      if (!position.isLegal(move)) {
        throw new Error(`illegal move ${moveToUci(move)} for ${position.fen()}`);
      }
      return { ok: true, value: move };
    } catch (error) {
      return {
        ok: false,
        error: { kind: 'EngineProtocolError', message: describe(error) },
      };
    } finally {
      await channel?.terminate(this.timings.quitGraceMs);
    }
  }
}
