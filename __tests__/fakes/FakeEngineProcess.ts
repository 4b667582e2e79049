/**
 * In-process stand-in for a UCI engine child process.
 * Reads commands from stdin, answers through a script, exits on `quit`.
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { EngineProcess, SpawnEngine } from '../../src/chess/UciEngine.js';

export type Responder = (command: string, engine: FakeEngineProcess) => string[];

export interface FakeEngineScript {
  respond?: Responder;
  /** Stay alive after `quit` until killed */
  ignoreQuit?: boolean;
  /** Emit a spawn error instead of starting */
  failToSpawn?: boolean;
}

/** Replies of a well-behaved engine that always plays `bestmove` */
export const uciReplies = (bestmove: string): Responder => (command) => {
  if (command === 'uci') return ['id name FakeFish', 'id author test', 'uciok'];
  if (command === 'isready') return ['readyok'];
  if (command.startsWith('go')) return ['info depth 1 score cp 12 pv ' + bestmove, `bestmove ${bestmove}`];
  return [];
};

export class FakeEngineProcess extends EventEmitter implements EngineProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly received: string[] = [];
  exited = false;
  killedWith: NodeJS.Signals | null = null;

  constructor(readonly executable: string, private readonly script: FakeEngineScript = {}) {
    super();

    if (script.failToSpawn) {
      process.nextTick(() => {
        this.exited = true;
        this.emit('error', new Error(`spawn ${executable} ENOENT`));
        this.stdout.end();
      });
      return;
    }

    process.nextTick(() => this.emit('spawn'));

    let pending = '';
    this.stdin.on('data', (chunk: Buffer) => {
      pending += chunk.toString();
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        this.handle(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }
    });
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    if (this.exited) return false;
    this.killedWith = signal;
    this.exit(null, signal);
    return true;
  }

  /** Terminate as if the engine crashed */
  crash(): void {
    this.exit(1, null);
  }

  private handle(command: string): void {
    this.received.push(command);
    if (command === 'quit') {
      if (!this.script.ignoreQuit) this.exit(0, null);
      return;
    }
    const respond = this.script.respond ?? uciReplies('e2e4');
    for (const line of respond(command, this)) {
      if (this.exited) return;
      this.stdout.write(`${line}\n`);
    }
  }

  private exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) return;
    this.exited = true;
    this.stdout.end();
    setImmediate(() => {
      this.emit('exit', code, signal);
      this.emit('close', code, signal);
    });
  }
}

/**
 * Spawner that records every process it starts.
 * `scriptFor` picks the behaviour per executable.
 */
export function createFakeSpawner(scriptFor: (executable: string) => FakeEngineScript) {
  const processes: FakeEngineProcess[] = [];
  const spawnEngine: SpawnEngine = (executable) => {
    const proc = new FakeEngineProcess(executable, scriptFor(executable));
    processes.push(proc);
    return proc;
  };
  return { spawnEngine, processes };
}
