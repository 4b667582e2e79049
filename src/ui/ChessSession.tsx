/**
 * ChessSession.tsx - Terminal front end for one chess session
 *
 * Rendering only: every decision goes through SessionController.
 * - Board with highlights: selected piece, legal targets, last move
 * - Status panel: turn, AI state, captured pieces, move list
 * - Prompt: a square is a click, plus a few commands (see COMMAND_HELP)
 */

import React, { useState, useEffect, useCallback } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import chalk, { type ChalkInstance } from 'chalk';
import { pieceSymbol, FILES } from '../chess/index.js';
import type { GameResult, PieceType } from '../chess/index.js';
import {
  AiMoveEvent,
  SessionController,
  describeResult,
} from '../core/SessionController.js';
import type { SessionView } from '../core/types.js';
import { COMMAND_HELP, parseCommand } from './commands.js';

// =============================================================================
// Types
// =============================================================================

interface ChessSessionProps {
  controller: SessionController;
  /** Show the continue / new screen first */
  askToResume: boolean;
  onExit: () => void;
}

type Screen = 'start' | 'board';

// =============================================================================
// Constants
// =============================================================================

// White pieces outlined, Black pieces filled
const DISPLAY_PIECES: Record<string, string> = {
  R: '♖', N: '♘', B: '♗', Q: '♕', K: '♔', P: '♙',
  r: '♜', n: '♞', b: '♝', q: '♛', k: '♚', p: '♟',
};

const LIGHT_SQUARE = chalk.bgWhite;
const DARK_SQUARE = chalk.bgGray;
const SELECTED_SQUARE = chalk.bgYellow;
const TARGET_SQUARE = chalk.bgCyan;
const LAST_MOVE_SQUARE = chalk.bgBlue;

// =============================================================================
// Board
// =============================================================================

function ChessBoard({ view }: { view: SessionView }) {
  // Board from the human's side when playing Black against the AI
  const flipped = view.aiEnabled && view.humanColor === 'b';
  const order = flipped ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];
  const targets = new Set<string>(view.legalTargets);
  const lastSquares = view.lastMove ? [view.lastMove.from, view.lastMove.to] : [];

  const squareStyle = (row: number, col: number): ChalkInstance => {
    const square = `${FILES[col]}${8 - row}`;
    if (square === view.selected) return SELECTED_SQUARE;
    if (targets.has(square)) return TARGET_SQUARE;
    if (lastSquares.some(s => s === square)) return LAST_MOVE_SQUARE;
    return (row + col) % 2 === 0 ? LIGHT_SQUARE : DARK_SQUARE;
  };

  const buildRow = (row: number): string => {
    let line = chalk.dim(`${8 - row} `);
    for (const col of order) {
      const piece = view.board[row][col];
      const symbol = piece ? DISPLAY_PIECES[pieceSymbol(piece)] : ' ';
      line += squareStyle(row, col)(chalk.black(` ${symbol} `));
    }
    return line;
  };

  const fileLabels = `  ${order.map(col => ` ${FILES[col]} `).join('')}`;

  return (
    <Box flexDirection="column">
      {order.map(row => (
        <Text key={row}>{buildRow(row)}</Text>
      ))}
      <Text dimColor>{fileLabels}</Text>
    </Box>
  );
}

// =============================================================================
// Status Panel
// =============================================================================

const capturedText = (pieces: PieceType[], upper: boolean): string =>
  pieces.map(p => DISPLAY_PIECES[upper ? p.toUpperCase() : p]).join('') || '-';

function StatusPanel({ view }: { view: SessionView }) {
  return (
    <Box flexDirection="column" marginLeft={2} width={34}>
      <Box borderStyle="round" borderColor="cyan" paddingX={1} marginBottom={1}>
        <Text bold color="cyan">{view.status}</Text>
      </Box>

      <Text>You: <Text bold>{view.aiEnabled ? (view.humanColor === 'w' ? 'White' : 'Black') : 'both sides'}</Text></Text>
      <Text>Difficulty: {view.difficulty} <Text dimColor>(depth {view.searchDepth})</Text></Text>
      <Text dimColor>Engine: {view.engineLabel}</Text>
      {view.aiBusy && <Text color="yellow">AI thinking...</Text>}
      {view.inCheck && !view.result && <Text color="red" bold>CHECK</Text>}

      {view.selected && (
        <Box marginTop={1}>
          <Text color="green">Selected: <Text bold>{view.selected}</Text></Text>
        </Box>
      )}

      <Box marginTop={1} flexDirection="column">
        <Text dimColor>Captured:</Text>
        <Text>White took {capturedText(view.captured.white, false)}</Text>
        <Text>Black took {capturedText(view.captured.black, true)}</Text>
      </Box>

      {view.moveList.length > 0 && (
        <Box marginTop={1} flexDirection="column">
          <Text dimColor>Moves:</Text>
          {view.moveList.slice(-8).map(line => (
            <Text key={line} dimColor>{line}</Text>
          ))}
        </Box>
      )}
    </Box>
  );
}

// =============================================================================
// Main Component
// =============================================================================

export default function ChessSession({ controller, askToResume, onExit }: ChessSessionProps) {
  const [screen, setScreen] = useState<Screen>(askToResume ? 'start' : 'board');
  const [view, setView] = useState<SessionView>(() => controller.getView());
  const [notice, setNotice] = useState<string | null>(null);
  const [input, setInput] = useState('');

  // Controller → React state
  useEffect(() => {
    const onRender = (next: SessionView) => setView(next);
    const onNotice = (message: string) => setNotice(message);
    const onAiMove = (event: AiMoveEvent) =>
      setNotice(event.fallbackReason
        ? `AI played ${event.san} (built-in search: ${event.fallbackReason})`
        : `AI played ${event.san}`);
    const onGameOver = (result: GameResult) => setNotice(`${describeResult(result)}. Type "new" to play again.`);

    controller.on('render', onRender);
    controller.on('notice', onNotice);
    controller.on('aiMove', onAiMove);
    controller.on('gameOver', onGameOver);
    return () => {
      controller.off('render', onRender);
      controller.off('notice', onNotice);
      controller.off('aiMove', onAiMove);
      controller.off('gameOver', onGameOver);
    };
  }, [controller]);

  // Without a start screen the game begins on mount
  useEffect(() => {
    if (!askToResume) controller.start();
  }, [controller, askToResume]);

  useInput((pressed) => {
    const choice = pressed.toLowerCase();
    if (choice === 'c') {
      setScreen('board');
      controller.start();
    } else if (choice === 'n') {
      setScreen('board');
      controller.startFresh();
    }
  }, { isActive: screen === 'start' });

  const handleSubmit = useCallback((text: string) => {
    setInput('');
    const command = parseCommand(text);
    switch (command.type) {
      case 'click':
        setNotice(null);
        controller.clickSquare(command.square);
        break;
      case 'move':
        setNotice(null);
        controller.playMove(command.from, command.to);
        break;
      case 'new':
        controller.newGame();
        break;
      case 'ai':
        controller.toggleAi();
        break;
      case 'side':
        controller.setHumanColor(command.color);
        break;
      case 'difficulty':
        controller.setDifficulty(command.difficulty);
        break;
      case 'quit':
        onExit();
        break;
      case 'invalid':
        setNotice(command.message);
        break;
    }
  }, [controller, onExit]);

  if (screen === 'start') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text bold color="cyan">Chess Session</Text>
        <Box marginTop={1} flexDirection="column">
          <Text>A saved game was found.</Text>
          <Text dimColor>{view.status}, {view.moveList.length} turn(s) played</Text>
        </Box>
        <Box marginTop={1}>
          <Text>[<Text bold color="green">C</Text>] Continue   [<Text bold color="yellow">N</Text>] New game</Text>
        </Box>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">Chess Session</Text>
        <Text dimColor> • {view.engineLabel}</Text>
      </Box>

      <Box>
        <ChessBoard view={view} />
        <StatusPanel view={view} />
      </Box>

      {notice && <Text color="yellow">{notice}</Text>}

      <Box marginTop={1}>
        <Text color={view.aiBusy ? 'gray' : 'green'}>&gt; </Text>
        <TextInput
          value={input}
          onChange={setInput}
          onSubmit={handleSubmit}
          placeholder="e2, e2e4, new, ai, side black, difficulty hard, quit"
        />
      </Box>
      <Text dimColor>{COMMAND_HELP}</Text>
    </Box>
  );
}
