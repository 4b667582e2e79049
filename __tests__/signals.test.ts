/**
 * Termination Signal Tests
 */

import { EventEmitter } from 'node:events';
import { describe, it, expect } from 'vitest';
import { onTermination, TerminationSignal } from '../src/core/signals.js';

describe('onTermination', () => {
  it('should hand SIGTERM and SIGHUP to the handler', () => {
    for (const signal of ['SIGTERM', 'SIGHUP'] as const) {
      const source = new EventEmitter();
      const received: TerminationSignal[] = [];
      onTermination(s => received.push(s), source);

      source.emit(signal);
      expect(received).toEqual([signal]);
    }
  });

  it('should deliver only the first signal', () => {
    const source = new EventEmitter();
    const received: TerminationSignal[] = [];
    onTermination(s => received.push(s), source);

    source.emit('SIGINT');
    source.emit('SIGTERM');
    source.emit('SIGINT');

    expect(received).toEqual(['SIGINT']);
  });

  it('should remove its listeners when detached', () => {
    const source = new EventEmitter();
    const received: TerminationSignal[] = [];
    const detach = onTermination(s => received.push(s), source);
    expect(source.listenerCount('SIGHUP')).toBe(1);

    detach();
    source.emit('SIGHUP');

    expect(received).toEqual([]);
    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(source.listenerCount('SIGTERM')).toBe(0);
    expect(source.listenerCount('SIGHUP')).toBe(0);
  });
});
