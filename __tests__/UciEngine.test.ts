/**
 * UCI Engine Bridge Tests
 *
 * Uses an in-process fake engine; no executable is started.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { UciEngineBridge } from '../src/chess/UciEngine.js';
import { STARTING_FEN } from '../src/chess/types.js';
import { setLogSink } from '../src/core/logger.js';
import { createFakeSpawner, uciReplies } from './fakes/FakeEngineProcess.js';

const TIMINGS = { probeTimeoutMs: 200, moveTimeoutMs: 200, quitGraceMs: 20 };
const START = { initialFen: STARTING_FEN, moves: [] };

beforeEach(() => {
  setLogSink(() => {});
});

afterEach(() => {
  setLogSink(null);
});

// =============================================================================
// Resolution
// =============================================================================

describe('UciEngineBridge.resolve', () => {
  it('should pick the first candidate that completes the handshake', async () => {
    const { spawnEngine, processes } = createFakeSpawner(path =>
      path === '/missing/stockfish' ? { failToSpawn: true } : {}
    );
    const bridge = new UciEngineBridge({ spawnEngine, timings: TIMINGS });

    const result = await bridge.resolve(['', '/missing/stockfish', '/opt/engine', '/never/tried']);

    expect(result).toEqual({
      ok: true,
      value: { available: true, path: '/opt/engine', preferOverFallback: true },
    });
    expect(processes.map(p => p.executable)).toEqual(['/missing/stockfish', '/opt/engine']);
    expect(processes[1].received).toEqual(['uci', 'quit']);
    expect(processes.every(p => p.exited)).toBe(true);
  });

  it('should report EngineUnavailable when no candidate answers', async () => {
    const { spawnEngine, processes } = createFakeSpawner(() => ({ failToSpawn: true }));
    const bridge = new UciEngineBridge({ spawnEngine, timings: TIMINGS });

    const result = await bridge.resolve(['/a', null, '/b']);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('EngineUnavailable');
    expect(bridge.available).toBe(false);
    expect(processes).toHaveLength(2);
  });

  it('should treat a silent process as unavailable and stop it', async () => {
    const { spawnEngine, processes } = createFakeSpawner(() => ({ respond: () => [] }));
    const bridge = new UciEngineBridge({ spawnEngine, timings: TIMINGS });

    const result = await bridge.resolve(['/silent']);

    expect(result.ok).toBe(false);
    expect(processes[0].exited).toBe(true);
  });

  it('should not probe again after the first resolution', async () => {
    const { spawnEngine, processes } = createFakeSpawner(() => ({ failToSpawn: true }));
    const bridge = new UciEngineBridge({ spawnEngine, timings: TIMINGS });

    await bridge.resolve(['/a']);
    const again = await bridge.resolve(['/a', '/b']);

    expect(again.ok).toBe(false);
    expect(processes).toHaveLength(1);
  });
});

// =============================================================================
// Per-move requests
// =============================================================================

describe('UciEngineBridge.requestMove', () => {
  const resolvedBridge = async (respond = uciReplies('e2e4'), ignoreQuit = false) => {
    const fake = createFakeSpawner(() => ({ respond, ignoreQuit }));
    const bridge = new UciEngineBridge({ spawnEngine: fake.spawnEngine, timings: TIMINGS });
    await bridge.resolve(['/opt/engine']);
    return { bridge, processes: fake.processes };
  };

  it('should run the full exchange in a fresh process', async () => {
    const { bridge, processes } = await resolvedBridge();

    const result = await bridge.requestMove(START, 2);

    expect(result).toEqual({ ok: true, value: { from: 'e2', to: 'e4' } });
    expect(processes).toHaveLength(2);
    expect(processes[1].received).toEqual([
      'uci',
      'isready',
      `position fen ${STARTING_FEN}`,
      'go depth 2',
      'quit',
    ]);
    expect(processes[1].exited).toBe(true);
  });

  it('should send the position reached by the snapshot moves', async () => {
    const { bridge, processes } = await resolvedBridge(uciReplies('e7e5'));

    const result = await bridge.requestMove({ initialFen: STARTING_FEN, moves: ['e2e4'] }, 1);

    expect(result).toEqual({ ok: true, value: { from: 'e7', to: 'e5' } });
    const position = processes[1].received.find(line => line.startsWith('position fen '));
    expect(position).toMatch(/^position fen rnbqkbnr\/pppppppp\/8\/8\/4P3\/8\/PPPP1PPP\/RNBQKBNR b KQkq /);
  });

  it('should reject an illegal best move', async () => {
    const { bridge, processes } = await resolvedBridge(uciReplies('e2e5'));

    const result = await bridge.requestMove(START, 2);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'EngineProtocolError', message: `illegal move e2e5 for ${STARTING_FEN}` },
    });
    expect(processes[1].exited).toBe(true);
  });

  it('should treat "bestmove (none)" as a failure', async () => {
    const { bridge } = await resolvedBridge(uciReplies('(none)'));

    const result = await bridge.requestMove(START, 2);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'EngineProtocolError', message: 'engine returned no move' },
    });
  });

  it('should fail when the engine exits before answering', async () => {
    const { bridge, processes } = await resolvedBridge((command, engine) => {
      if (command.startsWith('go')) {
        engine.crash();
        return [];
      }
      return uciReplies('e2e4')(command, engine);
    });

    const result = await bridge.requestMove(START, 2);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'EngineProtocolError', message: '/opt/engine closed its output' },
    });
    expect(processes[1].exited).toBe(true);
  });

  it('should fail after the guard timeout and still stop the process', async () => {
    const { bridge, processes } = await resolvedBridge((command, engine) =>
      command.startsWith('go') ? ['info depth 1 score cp 0'] : uciReplies('e2e4')(command, engine)
    );

    const result = await bridge.requestMove(START, 2);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('EngineProtocolError');
      expect(result.error.message).toContain('did not answer with bestmove in time');
    }
    expect(processes[1].received[processes[1].received.length - 1]).toBe('quit');
    expect(processes[1].exited).toBe(true);
  });

  it('should kill an engine that ignores quit', async () => {
    const { bridge, processes } = await resolvedBridge(uciReplies('g1f3'), true);

    const result = await bridge.requestMove(START, 1);

    expect(result).toEqual({ ok: true, value: { from: 'g1', to: 'f3' } });
    expect(processes[1].killedWith).toBe('SIGKILL');
    expect(processes[1].exited).toBe(true);
  });

  it('should keep the engine available after a failed call', async () => {
    const { bridge } = await resolvedBridge(uciReplies('a1a1'));

    await bridge.requestMove(START, 2);

    expect(bridge.available).toBe(true);
  });

  it('should not spawn anything when unavailable', async () => {
    const { spawnEngine, processes } = createFakeSpawner(() => ({ failToSpawn: true }));
    const bridge = new UciEngineBridge({ spawnEngine, timings: TIMINGS });
    await bridge.resolve(['/a']);

    const result = await bridge.requestMove(START, 2);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('EngineUnavailable');
    expect(processes).toHaveLength(1);
  });
});
