/**
 * Session persistence codec
 *
 * Text format is a plain INI file (`[Section]`, `key = value`). The [GameState] section holds the game;
 * other sections belong to the UI and pass through untouched.
 *
 * A saved game is trusted only if every value parses, every move replays
 * legally from the starting position, and the replay lands exactly on the
 * stored FEN. Anything else is PersistenceCorrupt.
 */

import { z } from 'zod';
import { ChessEngine, isValidFen, moveToUci, parseUciMove } from '../chess/ChessEngine.js';
import {
  DEFAULT_SEARCH_DEPTH,
  DEPTH_DIFFICULTY,
  DIFFICULTY_DEPTH,
  Move,
  PieceType,
  Result,
  SearchDepth,
} from '../chess/types.js';
import type { PersistenceCorrupt, SessionRecord } from './types.js';

export type IniSection = Record<string, string>;
export type IniDocument = Record<string, IniSection>;

export const GAME_STATE_SECTION = 'GameState';
export const GEOMETRY_SECTION = 'Geometry';

const corrupt = (message: string): { ok: false; error: PersistenceCorrupt } => ({
  ok: false,
  error: { kind: 'PersistenceCorrupt', message },
});

// =============================================================================
// INI text
// =============================================================================

/**
 * Parse INI text. Keys are lower-cased, values trimmed; indented lines
 * continue the previous value. Repeated sections merge.
 *
 * The document and its sections have no prototype, so names such as
 * `__proto__` or `constructor` are ordinary entries.
 */
export function parseIni(text: string): Result<IniDocument, PersistenceCorrupt> {
  const doc: IniDocument = Object.create(null);
  let current: IniSection | null = null;
  let lastKey: string | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const line = raw.trim();

    if (line === '') {
      lastKey = null;
      continue;
    }
    if (line.startsWith('#') || line.startsWith(';')) continue;

    if (/^\s/.test(raw) && current && lastKey !== null) {
      current[lastKey] = `${current[lastKey]}\n${line}`;
      continue;
    }

    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header) {
      const name = header[1];
      if (!Object.hasOwn(doc, name)) doc[name] = Object.create(null);
      current = doc[name];
      lastKey = null;
      continue;
    }

    if (!current) return corrupt(`line ${i + 1}: entry before any [section]`);

    const at = line.search(/[=:]/);
    if (at <= 0) return corrupt(`line ${i + 1}: expected "key = value"`);

    const key = line.slice(0, at).trim().toLowerCase();
    current[key] = line.slice(at + 1).trim();
    lastKey = key;
  }

  return { ok: true, value: doc };
}

/**
 * Write INI text: `key = value`, a blank line after each section,
 * multi-line values continued with a tab.
 */
export function stringifyIni(doc: IniDocument): string {
  let out = '';
  for (const [name, section] of Object.entries(doc)) {
    out += `[${name}]\n`;
    for (const [key, value] of Object.entries(section)) {
      out += `${key} = ${value.replace(/\n/g, '\n\t')}\n`;
    }
    out += '\n';
  }
  return out;
}

// =============================================================================
// [GameState]
// =============================================================================

/** Accepted boolean spellings, case-insensitive */
const BOOLEAN_STATES: Record<string, boolean> = {
  '1': true, yes: true, true: true, on: true,
  '0': false, no: false, false: false, off: false,
};

const DEPTH_BY_TEXT = { '1': 1, '2': 2, '3': 3 } as const satisfies Record<string, SearchDepth>;

const DIFFICULTY_LABEL = { easy: 'Easy', medium: 'Medium', hard: 'Hard' } as const;

const GameStateSchema = z.object({
  fen: z.string().min(1, 'missing').refine(isValidFen, 'not a valid FEN'),
  moves: z.string().default('').transform((text, ctx) => {
    const moves: Move[] = [];
    for (const token of text.split(/\s+/).filter(Boolean)) {
      const move = parseUciMove(token);
      if (!move) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `malformed move "${token}"` });
        return z.NEVER;
      }
      moves.push(move);
    }
    return moves;
  }),
  human_color: z.enum(['white', 'black']).default('white'),
  ai_enabled: z.string().default('True').transform((text, ctx) => {
    const key = text.toLowerCase();
    if (!Object.hasOwn(BOOLEAN_STATES, key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a boolean: "${text}"` });
      return z.NEVER;
    }
    return BOOLEAN_STATES[key];
  }),
  search_depth: z.enum(['1', '2', '3']).optional(),
  difficulty: z.string()
    .transform(text => text.toLowerCase())
    .pipe(z.enum(['easy', 'medium', 'hard']))
    .optional(),
  captured_by_white: z.string().regex(/^[pnbrq]*$/, 'expected black piece codes (pnbrq)').optional(),
  captured_by_black: z.string().regex(/^[PNBRQ]*$/, 'expected white piece codes (PNBRQ)').optional(),
});

export interface DecodedSession {
  record: SessionRecord;
  /** Position rebuilt by replaying the saved moves */
  position: ChessEngine;
}

const isPieceType = (code: string): code is PieceType => /^[pnbrqk]$/.test(code);

const toPieces = (codes: string): PieceType[] => [...codes.toLowerCase()].filter(isPieceType);

const sameTally = (a: readonly PieceType[], b: readonly PieceType[]): boolean =>
  a.length === b.length && [...a].sort().join('') === [...b].sort().join('');

/**
 * Section contents for a session
 */
export function encodeGameState(record: SessionRecord): IniSection {
  return {
    fen: record.fen,
    moves: record.moves.map(moveToUci).join(' '),
    human_color: record.humanColor === 'w' ? 'white' : 'black',
    ai_enabled: record.aiEnabled ? 'True' : 'False',
    search_depth: String(record.searchDepth),
    difficulty: DIFFICULTY_LABEL[DEPTH_DIFFICULTY[record.searchDepth]],
    captured_by_white: record.captured.white.join(''),
    captured_by_black: record.captured.black.map(p => p.toUpperCase()).join(''),
  };
}

/**
 * Validate a [GameState] section and rebuild its position
 */
export function decodeGameState(section: IniSection | undefined): Result<DecodedSession, PersistenceCorrupt> {
  if (!section) return corrupt(`no [${GAME_STATE_SECTION}] section`);

  const parsed = GameStateSchema.safeParse(section);
  if (!parsed.success) {
    return corrupt(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
  }
  const data = parsed.data;

  const replayed = ChessEngine.replay(data.moves);
  if (!replayed.ok) {
    const { index, move } = replayed.error;
    return corrupt(`move ${index + 1} (${moveToUci(move)}) is not legal`);
  }
  const position = replayed.value;

  if (position.fen() !== data.fen) {
    return corrupt(`moves replay to "${position.fen()}" but the saved position is "${data.fen}"`);
  }

  const captured = position.getCapturedPieces();
  if (data.captured_by_white !== undefined && !sameTally(toPieces(data.captured_by_white), captured.white)) {
    return corrupt('captured_by_white does not match the move list');
  }
  if (data.captured_by_black !== undefined && !sameTally(toPieces(data.captured_by_black), captured.black)) {
    return corrupt('captured_by_black does not match the move list');
  }

  let searchDepth: SearchDepth = DEFAULT_SEARCH_DEPTH;
  if (data.search_depth !== undefined) searchDepth = DEPTH_BY_TEXT[data.search_depth];
  else if (data.difficulty !== undefined) searchDepth = DIFFICULTY_DEPTH[data.difficulty];

  return {
    ok: true,
    value: {
      position,
      record: {
        fen: data.fen,
        moves: data.moves,
        humanColor: data.human_color === 'white' ? 'w' : 'b',
        aiEnabled: data.ai_enabled,
        searchDepth,
        captured,
      },
    },
  };
}
