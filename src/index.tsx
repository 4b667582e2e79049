#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import meow from 'meow';
import { boardToText, createMoveProvider, DIFFICULTY_DEPTH, DEFAULT_SEARCH_DEPTH } from './chess/index.js';
import { loadConfig } from './core/config.js';
import {
	createLogger,
	logSessionState,
	setFileLoggingEnabled,
	setLogLevel,
	setLogSink,
	type LogLevel,
} from './core/logger.js';
import { SessionController } from './core/SessionController.js';
import { onTermination } from './core/signals.js';
import type { SessionView } from './core/types.js';
import { SessionStore } from './services/SessionStore.js';
import ChessSession from './ui/ChessSession.js';
import { isDifficulty } from './ui/commands.js';

// ============================================================
// ANSI Escape Codes for Terminal Control
// ============================================================
const ANSI = {
	CURSOR_HIDE: '\x1b[?25l',
	CURSOR_SHOW: '\x1b[?25h',
	ALT_BUFFER_ON: '\x1b[?1049h',
	ALT_BUFFER_OFF: '\x1b[?1049l',
	CLEAR_SCREEN: '\x1b[2J',
	CURSOR_HOME: '\x1b[H',
	SET_TITLE: (title: string) => `\x1b]0;${title}\x07`,
};

const cli = meow(`
	Usage
	  $ chess-session

	Description
	  Terminal chess against a UCI engine or the built-in search.
	  The game is saved on exit and offered again on the next start.

	Options
		--new                     Start a new game, discarding the saved one
		--color <white|black>     Side you play (default: white)
		--difficulty <level>      easy, medium or hard (default: medium)
		--no-ai                   Play both sides yourself
		--no-engine               Never start an external engine
		--no-file                 Disable the chess-session-state.txt file
		--verbose                 Debug logging

	Environment
		CHESS_SESSION_HOME        Directory for config.ini (default: ~/.chess-session)
		STOCKFISH_PATH            Engine executable tried first
		CHESS_SESSION_LOG_LEVEL   debug, info, warn or error

	Examples
	  $ chess-session
	  $ chess-session --color black --difficulty hard
	  $ chess-session --no-engine --new
`, {
	importMeta: import.meta,
	flags: {
		new: {
			type: 'boolean',
			default: false,
		},
		color: {
			type: 'string',
			choices: ['white', 'black'],
		},
		difficulty: {
			type: 'string',
			choices: ['easy', 'medium', 'hard'],
		},
		ai: {
			type: 'boolean',
			default: true,
		},
		engine: {
			type: 'boolean',
			default: true,
		},
		file: {
			type: 'boolean',
			default: true,
		},
		verbose: {
			type: 'boolean',
			default: false,
		},
	},
});

const log = createLogger('MAIN');

// ============================================================
// Stream Guard - log lines go to a buffer while Ink owns the screen
// ============================================================
const logsBuffer: string[] = [];

const guardLogs = () => {
	setLogSink((level: LogLevel, tag, message) => {
		logsBuffer.push(`${level.toUpperCase()} [${tag}] ${message}`);
	});
};

const flushLogs = () => {
	setLogSink(null);
	for (const line of logsBuffer) {
		if (line.startsWith('WARN') || line.startsWith('ERROR')) console.error(line);
	}
	logsBuffer.length = 0;
};

const initFullscreen = () => {
	if (!process.stdout.isTTY) return;
	process.stdout.write(ANSI.ALT_BUFFER_ON);
	process.stdout.write(ANSI.CURSOR_HIDE);
	process.stdout.write(ANSI.CLEAR_SCREEN + ANSI.CURSOR_HOME);
	process.stdout.write(ANSI.SET_TITLE(`Chess Session [${process.pid}]`));
};

const exitFullscreen = () => {
	if (!process.stdout.isTTY) return;
	process.stdout.write(ANSI.CURSOR_SHOW);
	process.stdout.write(ANSI.ALT_BUFFER_OFF);
};

const publishState = (view: SessionView) => {
	logSessionState({
		fen: view.fen,
		status: view.status,
		board: boardToText(view.board),
		moves: view.moveList,
		engine: view.engineLabel,
	});
};

const main = async (): Promise<void> => {
	const config = loadConfig();
	setLogLevel(cli.flags.verbose ? 'debug' : config.logLevel);
	setFileLoggingEnabled(cli.flags.file);

	const store = new SessionStore(config.dataDir);
	if (cli.flags.new) store.clearGameState();
	const saved = cli.flags.new ? { status: 'none' as const } : store.load();

	const provider = await createMoveProvider({
		candidates: config.engineCandidates,
		probe: cli.flags.engine,
		timings: config.uci,
	});

	const difficulty = cli.flags.difficulty;
	const controller = new SessionController({
		provider,
		store,
		settings: {
			humanColor: cli.flags.color === 'black' ? 'b' : 'w',
			aiEnabled: cli.flags.ai,
			searchDepth: difficulty && isDifficulty(difficulty) ? DIFFICULTY_DEPTH[difficulty] : DEFAULT_SEARCH_DEPTH,
		},
		resume: saved.status === 'loaded' ? saved.session : undefined,
	});
	controller.on('render', publishState);

	initFullscreen();
	guardLogs();

	const inkInstance = render(
		<ChessSession
			controller={controller}
			askToResume={saved.status === 'loaded'}
			onExit={() => inkInstance.unmount()}
		/>,
		{ patchConsole: false },
	);

	// A killed terminal still saves: unmounting resolves waitUntilExit below
	const detachSignals = onTermination(signal => {
		log.info(`Received ${signal}, saving session`);
		inkInstance.unmount();
	});

	await inkInstance.waitUntilExit();
	exitFullscreen();

	await controller.shutdown({
		size: `${process.stdout.columns ?? 80}x${process.stdout.rows ?? 24}`,
		state: 'normal',
	});
	detachSignals();
	flushLogs();
};

main().then(
	() => process.exit(0),
	(err: unknown) => {
		exitFullscreen();
		flushLogs();
		log.error('Fatal error', err);
		process.exit(1);
	},
);
