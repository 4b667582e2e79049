import { isSquare, parseUciMove } from '../chess/ChessEngine.js';
import { Color, DEPTH_DIFFICULTY, Difficulty, Square } from '../chess/types.js';

/** What a line typed at the prompt asks for */
export type SessionCommand =
  | { type: 'click'; square: Square }
  | { type: 'move'; from: Square; to: Square }
  | { type: 'new' }
  | { type: 'ai' }
  | { type: 'side'; color: Color }
  | { type: 'difficulty'; difficulty: Difficulty }
  | { type: 'quit' }
  | { type: 'invalid'; message: string };

export const COMMAND_HELP =
  'e2 = click square, e2e4 = move, new, ai, side white|black, difficulty easy|medium|hard, quit';

export function isDifficulty(value: string): value is Difficulty {
  return value === 'easy' || value === 'medium' || value === 'hard';
}

const COLOR_WORDS: Record<string, Color> = { white: 'w', w: 'w', black: 'b', b: 'b' };

const DEPTH_WORDS: Record<string, Difficulty> = {
  '1': DEPTH_DIFFICULTY[1],
  '2': DEPTH_DIFFICULTY[2],
  '3': DEPTH_DIFFICULTY[3],
};

export function parseCommand(text: string): SessionCommand {
  const [word = '', arg = '', ...rest] = text.trim().toLowerCase().split(/\s+/);
  if (word === '') return { type: 'invalid', message: `Type a square or a command: ${COMMAND_HELP}` };
  if (rest.length > 0) return { type: 'invalid', message: `Too many words in "${text.trim()}"` };

  if (arg === '') {
    if (isSquare(word)) return { type: 'click', square: word };
    const move = parseUciMove(word);
    if (move) return { type: 'move', from: move.from, to: move.to };
  }

  switch (word) {
    case 'new':
      return { type: 'new' };
    case 'ai':
      return { type: 'ai' };
    case 'quit':
    case 'exit':
    case 'q':
      return { type: 'quit' };
    case 'side': {
      const color = Object.hasOwn(COLOR_WORDS, arg) ? COLOR_WORDS[arg] : undefined;
      return color
        ? { type: 'side', color }
        : { type: 'invalid', message: 'Usage: side white|black' };
    }
    case 'difficulty': {
      const difficulty = isDifficulty(arg)
        ? arg
        : Object.hasOwn(DEPTH_WORDS, arg) ? DEPTH_WORDS[arg] : undefined;
      return difficulty
        ? { type: 'difficulty', difficulty }
        : { type: 'invalid', message: 'Usage: difficulty easy|medium|hard' };
    }
    default:
      return { type: 'invalid', message: `Unknown command "${text.trim()}". ${COMMAND_HELP}` };
  }
}
