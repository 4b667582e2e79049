/**
 * Logger Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    createLogger,
    logSessionState,
    setFileLoggingEnabled,
    setLogLevel,
    setLogSink,
    type LogLevel,
} from '../src/core/logger.js';

describe('createLogger', () => {
    let lines: Array<[LogLevel, string, string]>;

    beforeEach(() => {
        lines = [];
        setLogSink((level, tag, message) => {
            lines.push([level, tag, message]);
        });
    });

    afterEach(() => {
        setLogSink(null);
        setLogLevel('info');
    });

    it('should tag every line', () => {
        const log = createLogger('ENGINE');
        log.info('ready');
        log.warn('slow');
        expect(lines).toEqual([
            ['info', 'ENGINE', 'ready'],
            ['warn', 'ENGINE', 'slow'],
        ]);
    });

    it('should drop lines below the level', () => {
        const log = createLogger('SEARCH');
        log.debug('hidden');
        setLogLevel('debug');
        log.debug('shown');
        setLogLevel('error');
        log.warn('hidden too');
        expect(lines).toEqual([['debug', 'SEARCH', 'shown']]);
    });

    it('should append the error message', () => {
        const log = createLogger('MAIN');
        log.error('Fatal error', new Error('boom'));
        log.error('Odd failure', 'plain text');
        log.error('No cause');
        expect(lines.map(line => line[2])).toEqual([
            'Fatal error: boom',
            'Odd failure: plain text',
            'No cause',
        ]);
    });
});

describe('logSessionState', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chess-log-'));
    });

    afterEach(() => {
        setFileLoggingEnabled(true);
        fs.rmSync(dir, { recursive: true, force: true });
    });

    const dump = {
        fen: 'fen-text',
        status: 'Ready — White to move',
        board: '8 . . . . . . . .',
        moves: ['1. e4 e5'],
        engine: 'Built-in search',
    };

    it('should write the session to the state file', () => {
        const file = path.join(dir, 'state.txt');
        logSessionState(dump, file);

        const lines = fs.readFileSync(file, 'utf-8').split('\n');
        expect(lines[0]).toBe(`PROCESS ID: ${process.pid}`);
        expect(lines[1]).toMatch(/^TIMESTAMP: \d+$/);
        expect(lines.slice(2)).toEqual([
            'FEN: fen-text',
            'STATUS: Ready — White to move',
            'ENGINE: Built-in search',
            '',
            'VISUAL STATE:',
            '8 . . . . . . . .',
            '',
            'MOVES:',
            '1. e4 e5',
            '',
        ]);
    });

    it('should mark an empty move list', () => {
        const file = path.join(dir, 'state.txt');
        logSessionState({ ...dump, moves: [] }, file);
        expect(fs.readFileSync(file, 'utf-8').endsWith('MOVES:\n(none)\n')).toBe(true);
    });

    it('should write nothing when disabled', () => {
        const file = path.join(dir, 'state.txt');
        setFileLoggingEnabled(false);
        logSessionState(dump, file);
        expect(fs.existsSync(file)).toBe(false);
    });
});
