/**
 * Replay Compare - Server Tests
 *
 * Runs the HTTP API and the socket channel on an ephemeral port in this
 * process. Assertions wait for actual responses and socket events.
 */

import { AddressInfo } from 'net';
import { io as Client, Socket as ClientSocket } from 'socket.io-client';
import { createReplayServer, ReplayServer } from '../src/server';
import { ComparisonOutcome, Sample } from '../src/types';

// Mock Logger
jest.mock('../src/logger', () => ({
  __esModule: true,
  default: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    comparison: jest.fn(),
    batchEvent: jest.fn(),
    security: jest.fn(),
  },
}));

jest.setTimeout(15000);

interface CompleteResponse {
  compared: number;
  skipped: number;
  flagged: number;
}

interface ErrorResponse {
  message: string;
  code: string;
}

// HTTP response bodies
interface CompareBody {
  mode: string;
  threshold: number;
  compared: number;
  skipped: number;
  outcomes: ComparisonOutcome[];
  code?: string;
  error?: string;
}

interface AlignBody {
  clean: Sample[];
  interpolated: Sample[];
  similarity: { mean: number; std: number } | null;
}

interface TimelineBody {
  owner: string;
  frequency?: number;
  breakThreshold?: number;
  samples: Sample[];
}

/**
 * Ten samples 16ms apart along a diagonal, shifted right by `dx`
 */
function traceJson(owner: string, dx = 0) {
  return {
    owner,
    samples: Array.from({ length: 10 }, (_, i) => [i * 16, i * 10 + dx, i * 5]),
  };
}

/**
 * Wait for a specific socket event
 */
const waitFor = <T = unknown>(socket: ClientSocket, event: string, timeout = 5000): Promise<T> => {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Timeout waiting for event: ${event}`));
    }, timeout);
    socket.once(event, (data: T) => {
      clearTimeout(timer);
      resolve(data);
    });
  });
};

describe('Replay Compare Server', () => {
  let replayServer: ReplayServer;
  let serverUrl: string;
  const connectedClients: ClientSocket[] = [];

  const readJson = async <T>(response: Response): Promise<T> => (await response.json()) as T;

  const post = async <T>(path: string, body: unknown): Promise<{ status: number; body: T }> => {
    const response = await fetch(`${serverUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    return { status: response.status, body: await readJson<T>(response) };
  };

  const connect = async (): Promise<ClientSocket> => {
    const client = Client(serverUrl, { transports: ['websocket'], forceNew: true });
    connectedClients.push(client);
    await waitFor(client, 'connect');
    return client;
  };

  beforeAll((done) => {
    replayServer = createReplayServer();
    replayServer.server.listen(0, '127.0.0.1', () => {
      const { port } = replayServer.server.address() as AddressInfo;
      serverUrl = `http://127.0.0.1:${port}`;
      done();
    });
  });

  afterEach(() => {
    while (connectedClients.length > 0) {
      connectedClients.pop()?.disconnect();
    }
  });

  afterAll((done) => {
    replayServer.io.close(() => done());
  });

  describe('HTTP API', () => {
    it('reports health', async () => {
      const response = await fetch(`${serverUrl}/health`);
      const body = await readJson<{ status: string }>(response);

      expect(response.status).toBe(200);
      expect(body.status).toBe('healthy');
      expect(response.headers.get('cache-control')).toBe('no-store');
    });

    it('exposes public defaults', async () => {
      const response = await fetch(`${serverUrl}/api/config`);
      const body = await readJson<{ outlierBound: number; breakThresholdMs: number; modes: string[] }>(response);

      expect(body.outlierBound).toBe(600);
      expect(body.breakThresholdMs).toBe(1000);
      expect(body.modes).toEqual(['double', 'single']);
    });

    it('flags similar pairs in single mode', async () => {
      const { status, body } = await post<CompareBody>('/api/compare', {
        mode: 'single',
        threshold: 18,
        replays1: [traceJson('p1'), traceJson('p2'), traceJson('p3', 100)],
      });

      expect(status).toBe(200);
      expect(body).toEqual({
        mode: 'single',
        threshold: 18,
        compared: 3,
        skipped: 0,
        outcomes: [{ ownerA: 'p1', ownerB: 'p2', mean: 0, std: 0 }],
      });
    });

    it('compares two sets in double mode', async () => {
      const { status, body } = await post<CompareBody>('/api/compare', {
        mode: 'double',
        threshold: 60,
        replays1: [traceJson('p1')],
        replays2: [traceJson('p2', 50), traceJson('p3', 100)],
      });

      expect(status).toBe(200);
      expect(body.outcomes).toEqual([{ ownerA: 'p1', ownerB: 'p2', mean: 50, std: 0 }]);
      expect(body.compared).toBe(2);
    });

    it('rejects an unknown mode', async () => {
      const { status, body } = await post<CompareBody>('/api/compare', { mode: 'triple', replays1: [] });

      expect(status).toBe(400);
      expect(body.code).toBe('INVALID_MODE');
    });

    it('rejects malformed traces', async () => {
      const { status, body } = await post<CompareBody>('/api/compare', { mode: 'single', replays1: [{ owner: 'p1', events: [] }] });

      expect(status).toBe(400);
      expect(body).toEqual({ error: 'Trace for "p1" has no events', code: 'INPUT_ERROR' });
    });

    it('rejects invalid JSON', async () => {
      const response = await fetch(`${serverUrl}/api/compare`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"mode":',
      });

      expect(response.status).toBe(400);
    });

    it('aligns two traces', async () => {
      const { status, body } = await post<AlignBody>('/api/align', {
        a: { owner: 'a', samples: [[0, 0, 0], [10, 100, 0], [20, 200, 0], [30, 300, 0]] },
        b: { owner: 'b', samples: [[5, 0, 50], [15, 0, 150], [25, 0, 250]] },
      });

      expect(status).toBe(200);
      expect(body.clean).toEqual([{ t: 5, x: 0, y: 50 }, { t: 15, x: 0, y: 150 }]);
      expect(body.interpolated).toEqual([{ t: 5, x: 50, y: 0 }, { t: 15, x: 150, y: 0 }]);
      expect(body.similarity?.mean).toBeCloseTo(100 * Math.SQRT2);
    });

    it('returns no similarity for traces that never overlap', async () => {
      const { body } = await post<AlignBody>('/api/align', {
        a: { owner: 'a', samples: [[0, 0, 0], [10, 1, 1]] },
        b: { owner: 'b', samples: [[20, 0, 0], [30, 1, 1]] },
      });

      expect(body).toEqual({ clean: [], interpolated: [], similarity: null });
    });

    it('resamples a trace', async () => {
      const { status, body } = await post<TimelineBody>('/api/resample', {
        trace: { owner: 'a', samples: [[0, 0, 0], [40, 40, 80]] },
        frequency: 100,
      });

      expect(status).toBe(200);
      expect(body.owner).toBe('a');
      expect(body.frequency).toBe(100);
      expect(body.samples.map((s) => s.t)).toEqual([0, 10, 20, 30]);
    });

    it('collapses breaks in a trace', async () => {
      const { body } = await post<TimelineBody>('/api/skip-breaks', {
        trace: { owner: 'a', samples: [[0, 0, 0], [100, 1, 1], [2100, 2, 2]] },
      });

      expect(body.breakThreshold).toBe(1000);
      expect(body.samples).toEqual([{ t: 0, x: 0, y: 0 }, { t: 100, x: 1, y: 1 }, { t: 100, x: 2, y: 2 }]);
    });

    it('returns 404 for unknown routes', async () => {
      const response = await fetch(`${serverUrl}/api/nothing`);

      expect(response.status).toBe(404);
    });
  });

  describe('socket channel', () => {
    it('streams each flagged pair then a summary', async () => {
      const client = await connect();
      const outcomes: ComparisonOutcome[] = [];
      client.on('outcome', (outcome: ComparisonOutcome) => outcomes.push(outcome));

      const complete = waitFor<CompleteResponse>(client, 'complete');
      client.emit('compare', {
        mode: 'single',
        replays1: [traceJson('p1'), traceJson('p2'), traceJson('p3'), traceJson('p4', 100)],
      });

      expect(await complete).toEqual({ compared: 6, skipped: 0, flagged: 3 });
      expect(outcomes.map((o) => [o.ownerA, o.ownerB])).toEqual([['p1', 'p2'], ['p1', 'p3'], ['p2', 'p3']]);
    });

    it('reports an invalid mode', async () => {
      const client = await connect();

      const error = waitFor<ErrorResponse>(client, 'compareError');
      client.emit('compare', { mode: 'triple', replays1: [] });

      expect(await error).toEqual({
        message: '`mode` must be one of \'double\' or \'single\', got "triple"',
        code: 'INVALID_MODE',
      });
    });

    it('reports a numeric fault for traces that never overlap', async () => {
      const client = await connect();

      const error = waitFor<ErrorResponse>(client, 'compareError');
      client.emit('compare', {
        mode: 'single',
        replays1: [
          { owner: 'early', samples: [[0, 0, 0], [10, 1, 1]] },
          { owner: 'late', samples: [[20, 0, 0], [30, 1, 1]] },
        ],
      });

      expect((await error).code).toBe('NUMERIC_FAULT');
    });
  });
});
