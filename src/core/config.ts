/**
 * Runtime configuration from the environment
 */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_UCI_BRIDGE_CONFIG, UciBridgeConfig } from '../chess/types.js';
import { createLogger, type LogLevel } from './logger.js';

const log = createLogger('CONFIG');

export interface AppConfig {
  /** Directory holding config.ini */
  dataDir: string;
  logLevel: LogLevel;
  /** External engine executables, probed in order */
  engineCandidates: string[];
  uci: UciBridgeConfig;
}

/** Install locations tried after $STOCKFISH_PATH; the bare name goes through PATH */
export const COMMON_ENGINE_PATHS = [
  '/usr/bin/stockfish',
  '/usr/local/bin/stockfish',
  'C:\\Program Files\\Stockfish\\stockfish.exe',
  'C:\\Program Files (x86)\\Stockfish\\stockfish.exe',
  'stockfish',
] as const;

// Unset and empty variables read the same
const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(value => (value === '' ? undefined : value), schema.optional());

const EnvSchema = z.object({
  CHESS_SESSION_HOME: optionalEnv(z.string()),
  STOCKFISH_PATH: optionalEnv(z.string()),
  CHESS_SESSION_LOG_LEVEL: optionalEnv(z.enum(['debug', 'info', 'warn', 'error'])),
  CHESS_SESSION_ENGINE_TIMEOUT_MS: optionalEnv(z.coerce.number().int().positive()),
});

type Env = z.infer<typeof EnvSchema>;

/**
 * Validate the environment. Variables that fail validation are reported
 * and then ignored.
 */
function readEnv(env: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(env);
  if (parsed.success) return parsed.data;

  const rejected = new Set<string>();
  for (const issue of parsed.error.issues) {
    const name = String(issue.path[0]);
    rejected.add(name);
    log.warn(`Ignoring ${name}: ${issue.message}`);
  }
  const kept = Object.fromEntries(Object.entries(env).filter(([name]) => !rejected.has(name)));
  return EnvSchema.parse(kept);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const vars = readEnv(env);

  return {
    dataDir: vars.CHESS_SESSION_HOME ?? path.join(os.homedir(), '.chess-session'),
    logLevel: vars.CHESS_SESSION_LOG_LEVEL ?? 'info',
    engineCandidates: [
      ...(vars.STOCKFISH_PATH ? [vars.STOCKFISH_PATH] : []),
      ...COMMON_ENGINE_PATHS,
    ],
    uci: {
      ...DEFAULT_UCI_BRIDGE_CONFIG,
      moveTimeoutMs: vars.CHESS_SESSION_ENGINE_TIMEOUT_MS ?? DEFAULT_UCI_BRIDGE_CONFIG.moveTimeoutMs,
    },
  };
}
