/**
 * Prompt Command Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { COMMAND_HELP, parseCommand } from '../src/ui/commands.js';

describe('parseCommand', () => {
  it('should read a square as a click', () => {
    expect(parseCommand('e2')).toEqual({ type: 'click', square: 'e2' });
    expect(parseCommand('  H8 ')).toEqual({ type: 'click', square: 'h8' });
  });

  it('should read a UCI move', () => {
    expect(parseCommand('e2e4')).toEqual({ type: 'move', from: 'e2', to: 'e4' });
    expect(parseCommand('a7a8q')).toEqual({ type: 'move', from: 'a7', to: 'a8' });
  });

  it('should read the plain commands', () => {
    expect(parseCommand('new')).toEqual({ type: 'new' });
    expect(parseCommand('AI')).toEqual({ type: 'ai' });
    expect(parseCommand('quit')).toEqual({ type: 'quit' });
    expect(parseCommand('exit')).toEqual({ type: 'quit' });
    expect(parseCommand('q')).toEqual({ type: 'quit' });
  });

  it('should read the side to play', () => {
    expect(parseCommand('side black')).toEqual({ type: 'side', color: 'b' });
    expect(parseCommand('side w')).toEqual({ type: 'side', color: 'w' });
    expect(parseCommand('side')).toEqual({ type: 'invalid', message: 'Usage: side white|black' });
    expect(parseCommand('side red')).toEqual({ type: 'invalid', message: 'Usage: side white|black' });
  });

  it('should read the difficulty by name or depth', () => {
    expect(parseCommand('difficulty hard')).toEqual({ type: 'difficulty', difficulty: 'hard' });
    expect(parseCommand('difficulty 1')).toEqual({ type: 'difficulty', difficulty: 'easy' });
    expect(parseCommand('difficulty 9')).toEqual({
      type: 'invalid',
      message: 'Usage: difficulty easy|medium|hard',
    });
  });

  it('should explain empty and unknown input', () => {
    expect(parseCommand('   ')).toEqual({ type: 'invalid', message: `Type a square or a command: ${COMMAND_HELP}` });
    expect(parseCommand('castle')).toEqual({ type: 'invalid', message: `Unknown command "castle". ${COMMAND_HELP}` });
    expect(parseCommand('e2 e4 now')).toEqual({ type: 'invalid', message: 'Too many words in "e2 e4 now"' });
  });

  it('should not treat a square with an argument as a click', () => {
    expect(parseCommand('e2 e4')).toEqual({ type: 'invalid', message: `Unknown command "e2 e4". ${COMMAND_HELP}` });
  });
});
