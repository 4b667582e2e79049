import { parentPort } from 'worker_threads';
import { ChessSearch } from '../ChessSearch.js';
import { moveToUci } from '../ChessEngine.js';
import { SearchTaskSchema, type WorkerReply } from './protocol.js';

// Ensure we have a parent port to communicate with
if (!parentPort) {
  throw new Error('This file must be run as a worker thread');
}

const port = parentPort;
const search = new ChessSearch();

port.on('message', (raw: unknown) => {
  let reply: WorkerReply;
  try {
    const task = SearchTaskSchema.parse(raw);

    // The search is synchronous but running in this separate thread
    const result = search.search(task.snapshot, task.depth);

    reply = {
      type: 'RESULT',
      move: result.bestMove ? moveToUci(result.bestMove) : null,
      evaluation: result.score,
      stats: {
        nodes: result.nodes,
        depth: result.depth,
        time: result.time,
      },
    };
  } catch (error) {
    reply = {
      type: 'ERROR',
      error: error instanceof Error ? error.message : String(error),
    };
  }
  port.postMessage(reply);
});
