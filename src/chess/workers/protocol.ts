/**
 * Messages exchanged with the search worker.
 * Both directions are validated; a malformed message is a worker failure.
 */

import { z } from 'zod';

export const SearchTaskSchema = z.object({
  type: z.literal('SEARCH'),
  snapshot: z.object({
    initialFen: z.string(),
    moves: z.array(z.string()),
  }),
  depth: z.number().int().min(1),
});

export const WorkerReplySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('RESULT'),
    /** Best move in UCI notation, null when there was none */
    move: z.string().nullable(),
    evaluation: z.number(),
    stats: z.object({
      nodes: z.number(),
      depth: z.number(),
      time: z.number(),
    }),
  }),
  z.object({
    type: z.literal('ERROR'),
    error: z.string(),
  }),
]);

export type SearchTask = z.infer<typeof SearchTaskSchema>;
export type WorkerReply = z.infer<typeof WorkerReplySchema>;
