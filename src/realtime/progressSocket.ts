import { IncomingMessage, Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import logger from '../utils/logger';
import { ProgressBus, RunMessage } from '../utils/progressBus';

export const PROGRESS_PATH = '/ws/progress';

function runIdFrom(req: IncomingMessage): string | null {
  const url = new URL(req.url || '/', 'http://localhost');
  return url.searchParams.get('runId');
}

/**
 * Streams run messages to WebSocket clients. `?runId=` narrows the stream
 * to one run; without it a client sees every run.
 */
export function attachProgressSocket(server: Server, bus: ProgressBus): WebSocketServer {
  const wss = new WebSocketServer({ server, path: PROGRESS_PATH });

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    const runId = runIdFrom(req);
    logger.info('Progress viewer connected', { runId });

    const forward = (message: RunMessage) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(message));
      }
    };
    const unsubscribe = runId ? bus.subscribeToRun(runId, forward) : bus.subscribeToAll(forward);

    ws.on('close', () => {
      unsubscribe();
      logger.info('Progress viewer disconnected', { runId });
    });

    ws.on('error', (error) => {
      logger.error('Progress WebSocket error', { runId, error: error.message });
    });
  });

  return wss;
}
