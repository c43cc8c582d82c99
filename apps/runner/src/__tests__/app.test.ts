import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { SuiteLoadError } from '@courier/catalog';
import { createApp } from '../server/app.js';
import { SuiteNotFoundError } from '../server/engine.js';

// ── Mocks ─────────────────────────────────────────────────────────────

const mockCatalog = {
  size: 1,
  listSuites: vi.fn(),
  getSuite: vi.fn(),
} as any;

const mockEngine = {
  startRun: vi.fn(),
  runRequest: vi.fn(),
  generateCurl: vi.fn(),
  cancelRun: vi.fn(),
  getRun: vi.fn(),
} as any;

let server: Server;
let baseUrl: string;

async function call(method: string, path: string, body?: unknown) {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: response.status, body: await response.json() };
}

beforeAll(async () => {
  server = createApp(mockCatalog, mockEngine).listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  baseUrl = `http://127.0.0.1:${(server.address() as AddressInfo).port}`;
});

afterAll(async () => {
  await new Promise((resolve) => server.close(resolve));
});

beforeEach(() => {
  vi.clearAllMocks();
});

// ── Tests ─────────────────────────────────────────────────────────────

describe('runner routes', () => {
  it('reports health with the suite count', async () => {
    const { status, body } = await call('GET', '/health');
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', suites: 1 });
  });

  it('lists and fetches suites', async () => {
    mockCatalog.listSuites.mockReturnValue([{ id: 'users', name: 'Users' }]);
    mockCatalog.getSuite.mockImplementation((id: string) => (id === 'users' ? { Name: 'Users', Requests: ['a.yaml'] } : undefined));

    expect((await call('GET', '/api/suites')).body).toEqual([{ id: 'users', name: 'Users' }]);
    expect((await call('GET', '/api/suites/users')).body).toEqual({ id: 'users', Name: 'Users', Requests: ['a.yaml'] });

    const missing = await call('GET', '/api/suites/nope');
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'Suite "nope" not found' });
  });

  describe('POST /api/runs', () => {
    it('starts a run', async () => {
      mockEngine.startRun.mockResolvedValue('run-1');

      const { status, body } = await call('POST', '/api/runs', { suiteId: 'users', variables: { n: 1 }, configs: ['dev'] });

      expect(status).toBe(200);
      expect(body).toEqual({ executionId: 'run-1' });
      expect(mockEngine.startRun).toHaveBeenCalledWith('users', { variables: { n: 1 }, configs: ['dev'] });
    });

    it('validates the body', async () => {
      const { status, body } = await call('POST', '/api/runs', { configs: 'dev' });

      expect(status).toBe(400);
      expect(body).toEqual({ error: 'configs: Expected array, received string; suiteId: Required' });
      expect(mockEngine.startRun).not.toHaveBeenCalled();
    });

    it('maps engine errors to status codes', async () => {
      mockEngine.startRun.mockRejectedValueOnce(new SuiteNotFoundError('nope'));
      expect(await call('POST', '/api/runs', { suiteId: 'nope' })).toEqual({
        status: 404,
        body: { error: 'Suite nope not found' },
      });

      mockEngine.startRun.mockRejectedValueOnce(new SuiteLoadError('Config not found: /work/configs/x.yaml'));
      expect(await call('POST', '/api/runs', { suiteId: 'users' })).toEqual({
        status: 400,
        body: { error: 'Config not found: /work/configs/x.yaml' },
      });

      mockEngine.startRun.mockRejectedValueOnce(new Error('boom'));
      expect((await call('POST', '/api/runs', { suiteId: 'users' })).status).toBe(500);
    });
  });

  it('runs a single request', async () => {
    mockEngine.runRequest.mockResolvedValue({ status: 'complete', file: '/work/requests/ping.yaml' });

    const { status, body } = await call('POST', '/api/requests/run', { path: 'requests/ping.yaml' });

    expect(status).toBe(200);
    expect(body).toEqual({ status: 'complete', file: '/work/requests/ping.yaml' });
    expect(mockEngine.runRequest).toHaveBeenCalledWith('requests/ping.yaml', {});
  });

  it('answers with a curl command when asked to generate', async () => {
    mockEngine.generateCurl.mockReturnValue('curl http://dev/ping');

    const { status, body } = await call('POST', '/api/requests/run', {
      path: 'requests/ping.yaml',
      generate: true,
      configs: ['dev'],
    });

    expect(status).toBe(200);
    expect(body).toEqual({ curl: 'curl http://dev/ping' });
    expect(mockEngine.generateCurl).toHaveBeenCalledWith('requests/ping.yaml', { configs: ['dev'] });
    expect(mockEngine.runRequest).not.toHaveBeenCalled();
  });

  it('rejects request paths outside the working directory', async () => {
    mockEngine.runRequest.mockRejectedValueOnce(new SuiteLoadError('Path outside working directory: /etc/passwd'));

    expect(await call('POST', '/api/requests/run', { path: '/etc/passwd' })).toEqual({
      status: 400,
      body: { error: 'Path outside working directory: /etc/passwd' },
    });
  });

  describe('run control and reports', () => {
    it('cancels active runs and explains refusals', async () => {
      mockEngine.cancelRun.mockImplementation((id: string) => id === 'run-1');
      mockEngine.getRun.mockImplementation((id: string) => (id === 'done' ? { id, status: 'completed' } : undefined));

      expect(await call('POST', '/api/runs/run-1/cancel')).toEqual({ status: 200, body: { ok: true } });
      expect(await call('POST', '/api/runs/done/cancel')).toEqual({
        status: 409,
        body: { error: 'Cannot cancel run in completed state' },
      });
      expect((await call('POST', '/api/runs/none/cancel')).status).toBe(404);
    });

    it('returns 202 while a run is in progress and the result once done', async () => {
      const result = { name: 'Users', status: 'completed', rows: [] };
      mockEngine.getRun.mockImplementation((id: string) => {
        if (id === 'live') return { id, status: 'running' };
        if (id === 'done') return { id, status: 'completed', result };
        return undefined;
      });

      expect(await call('GET', '/api/reports/live')).toEqual({ status: 202, body: { id: 'live', status: 'running' } });
      expect(await call('GET', '/api/reports/done')).toEqual({ status: 200, body: result });
      expect((await call('GET', '/api/reports/none')).status).toBe(404);
      expect((await call('GET', '/api/runs/done')).body).toEqual({ id: 'done', status: 'completed', result });
    });
  });
});
