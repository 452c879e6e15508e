import { createServer, Server } from 'http';
import { AddressInfo } from 'net';
import { WebSocket, WebSocketServer } from 'ws';
import { attachProgressSocket, PROGRESS_PATH } from '../../src/realtime/progressSocket';
import { ProgressBus } from '../../src/utils/progressBus';

function nextMessage(ws: WebSocket): Promise<unknown> {
  return new Promise((resolve) => {
    ws.once('message', (data) => resolve(JSON.parse(data.toString())));
  });
}

function closed(ws: WebSocket): Promise<void> {
  return new Promise((resolve) => {
    ws.once('close', () => resolve());
    ws.close();
  });
}

async function until(check: () => boolean): Promise<void> {
  for (let attempt = 0; attempt < 50 && !check(); attempt++) {
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

function opened(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });
}

describe('progress socket', () => {
  let server: Server;
  let wss: WebSocketServer;
  let bus: ProgressBus;
  let baseURL: string;

  beforeAll((done) => {
    bus = new ProgressBus();
    server = createServer();
    wss = attachProgressSocket(server, bus);
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      if (address === null || typeof address === 'string') {
        done(new Error('Server has no TCP address'));
        return;
      }
      baseURL = `ws://127.0.0.1:${address.port}${PROGRESS_PATH}`;
      done();
    });
  });

  afterAll((done) => {
    for (const client of wss.clients) {
      client.terminate();
    }
    wss.close(() => server.close(() => done()));
  });

  it('streams only the subscribed run', async () => {
    const ws = new WebSocket(`${baseURL}?runId=run-a`);
    await opened(ws);

    const received = nextMessage(ws);
    bus.publishFinished('run-b', 'completed', null);
    bus.publishFinished('run-a', 'failed', { code: 'STEP_LIMIT', message: 'too long', node: 'judge' });

    expect(await received).toEqual({
      type: 'finished',
      runId: 'run-a',
      status: 'failed',
      error: { code: 'STEP_LIMIT', message: 'too long', node: 'judge' },
    });
    await closed(ws);
  });

  it('streams every run without a run id and unsubscribes on close', async () => {
    const ws = new WebSocket(baseURL);
    await opened(ws);

    const received = nextMessage(ws);
    bus.publishFinished('run-c', 'completed', null);
    expect(await received).toEqual({ type: 'finished', runId: 'run-c', status: 'completed', error: null });

    await closed(ws);
    await until(() => bus.listenerCount('run') === 0);
    expect(bus.listenerCount('run')).toBe(0);
  });
});
