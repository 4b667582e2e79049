import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Receives every log line that passes the level filter */
export type LogSink = (level: LogLevel, tag: string, message: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

const consoleSink: LogSink = (level, tag, message) => {
    const line = `${LEVEL_STYLE[level](`[${tag}]`)} ${message}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
};

// Configuration flags
let minLevel: LogLevel = 'info';
let sink: LogSink = consoleSink;
let fileLoggingEnabled = true;

/**
 * Set the lowest level that is emitted
 */
export const setLogLevel = (level: LogLevel): void => {
    minLevel = level;
};

/**
 * Route log output somewhere other than the console (TUI buffer, tests).
 * Pass null to restore console output.
 */
export const setLogSink = (next: LogSink | null): void => {
    sink = next ?? consoleSink;
};

/**
 * Enable or disable the session state file
 */
export const setFileLoggingEnabled = (enabled: boolean): void => {
    fileLoggingEnabled = enabled;
};

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, error?: unknown): void;
}

const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

/**
 * Tagged logger, e.g. createLogger('ENGINE') prints "[ENGINE] ..."
 */
export const createLogger = (tag: string): Logger => {
    const emit = (level: LogLevel, message: string) => {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
        sink(level, tag, message);
    };
    return {
        debug: (message) => emit('debug', message),
        info: (message) => emit('info', message),
        warn: (message) => emit('warn', message),
        error: (message, error) =>
            emit('error', error === undefined ? message : `${message}: ${describeError(error)}`),
    };
};

/** What the state file shows */
export interface SessionStateDump {
    fen: string;
    status: string;
    board: string;
    moves: string[];
    engine: string;
}

/**
 * Writes the current session to a file so an outside agent can follow the game.
 *
 * @param dump - Current position and status
 * @param stateFile - Target path (default: ./chess-session-state.txt)
 */
export const logSessionState = (
    dump: SessionStateDump,
    stateFile: string = path.join(process.cwd(), 'chess-session-state.txt'),
): void => {
    if (!fileLoggingEnabled) return;

    let content = `PROCESS ID: ${process.pid}\n`;
    content += `TIMESTAMP: ${Date.now()}\n`;
    content += `FEN: ${dump.fen}\n`;
    content += `STATUS: ${dump.status}\n`;
    content += `ENGINE: ${dump.engine}\n`;
    content += `\nVISUAL STATE:\n`;
    content += `${dump.board}\n`;
    content += `\nMOVES:\n`;
    content += dump.moves.length > 0 ? `${dump.moves.join('\n')}\n` : '(none)\n';

    try {
        fs.writeFileSync(stateFile, content, 'utf-8');
    } catch (err) {
        // Keep the game loop alive; the file is only a side channel
        createLogger('STATE').debug(`Could not write ${stateFile}: ${describeError(err)}`);
    }
};
