import { AxiosError } from 'axios';
import { createServer, IncomingHttpHeaders, Server } from 'http';
import { classifyHttpStatus, classifyRequestError, YoutubeHttpService } from './http.service';

function listen(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Dirección de escucha inesperada'));
        return;
      }
      resolve(`http://127.0.0.1:${address.port}`);
    });
  });
}

function close(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise(resolve => server.close(() => resolve()));
}

describe('YoutubeHttpService.getText', () => {
  const service = new YoutubeHttpService();
  const seenHeaders: IncomingHttpHeaders[] = [];
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = createServer((req, res) => {
      seenHeaders.push(req.headers);
      switch (req.url) {
        case '/json':
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end('{"title":"Test Video"}');
          return;
        case '/missing':
          res.writeHead(404);
          res.end('not found');
          return;
        case '/limited':
          res.writeHead(429);
          res.end();
          return;
        case '/slow':
          // Nunca responde
          return;
        default:
          res.writeHead(500);
          res.end();
      }
    });
    baseUrl = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  it('returns the body as raw text and forwards headers', async () => {
    const outcome = await service.getText(`${baseUrl}/json`, {
      timeoutMs: 2000,
      headers: { 'Accept-Language': 'es-ES' },
    });

    expect(outcome).toEqual({ ok: true, status: 200, body: '{"title":"Test Video"}' });
    expect(seenHeaders[seenHeaders.length - 1]['accept-language']).toBe('es-ES');
  });

  it('turns a 404 into a not-found failure', async () => {
    const outcome = await service.getText(`${baseUrl}/missing`, { timeoutMs: 2000 });

    expect(outcome).toEqual({ ok: false, failure: { kind: 'not-found', detail: 'HTTP 404 desde 127.0.0.1' } });
  });

  it('turns a 429 into a rate-limited failure', async () => {
    const outcome = await service.getText(`${baseUrl}/limited`, { timeoutMs: 2000 });

    expect(outcome).toEqual({ ok: false, failure: { kind: 'rate-limited', detail: 'HTTP 429 desde 127.0.0.1' } });
  });

  it('gives up after timeoutMs', async () => {
    const outcome = await service.getText(`${baseUrl}/slow`, { timeoutMs: 100 });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe('timeout');
      expect(outcome.failure.detail).toBe('timeout of 100ms exceeded');
    }
  });

  it('reports a refused connection as a network error', async () => {
    const closed = createServer();
    const closedUrl = await listen(closed);
    await close(closed);

    const outcome = await service.getText(`${closedUrl}/json`, { timeoutMs: 2000 });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe('network-error');
    }
  });
});

describe('classifyHttpStatus', () => {
  it.each([
    [404, 'not-found'],
    [410, 'not-found'],
    [401, 'restricted'],
    [403, 'restricted'],
    [429, 'rate-limited'],
    [500, 'upstream-error'],
    [302, 'upstream-error'],
  ])('maps %i to %s', (status, kind) => {
    expect(classifyHttpStatus(status)).toBe(kind);
  });
});

describe('classifyRequestError', () => {
  it('reports axios timeouts as timeout', () => {
    const error = new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED');
    expect(classifyRequestError(error)).toEqual({ kind: 'timeout', detail: 'timeout of 10000ms exceeded' });
  });

  it('reports other axios errors as network errors', () => {
    const error = new AxiosError('getaddrinfo ENOTFOUND www.youtube.com', 'ENOTFOUND');
    expect(classifyRequestError(error)).toEqual({
      kind: 'network-error',
      detail: 'getaddrinfo ENOTFOUND www.youtube.com',
    });
  });

  it('handles plain errors and non-error values', () => {
    expect(classifyRequestError(new Error('boom'))).toEqual({ kind: 'network-error', detail: 'boom' });
    expect(classifyRequestError('boom')).toEqual({ kind: 'network-error', detail: 'boom' });
  });
});
