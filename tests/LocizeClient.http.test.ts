import { createServer, IncomingHttpHeaders, Server, ServerResponse } from 'http';
import { LocizeClient, LocizeRequestError } from '../src/clients/LocizeClient';
import { createConfig } from './helpers';

type Handler = (url: string, headers: IncomingHttpHeaders, res: ServerResponse) => void;

/**
 * Local HTTP server standing in for the locize API
 */
async function startServer(handler: Handler): Promise<{ server: Server; baseUrl: string }> {
  const server = createServer((req, res) => handler(req.url ?? '', req.headers, res));
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

async function stopServer(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>(resolve => server.close(() => resolve()));
}

describe('LocizeClient over HTTP', () => {
  let server: Server | null = null;

  afterEach(async () => {
    if (server) {
      await stopServer(server);
      server = null;
    }
  });

  it('should download a private namespace with the bearer token', async () => {
    const requests: Array<{ url: string; authorization: string | undefined }> = [];
    const started = await startServer((url, headers, res) => {
      requests.push({ url, authorization: headers.authorization });
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end('{"title":"Title"}');
    });
    server = started.server;
    const client = new LocizeClient(
      createConfig({ locizeApiUrl: started.baseUrl, projectId: 'test-project', apiKey: 'test-api-key' })
    );

    await expect(client.downloadNamespace('en', 'frontend')).resolves.toBe('{"title":"Title"}');
    expect(requests).toEqual([
      { url: '/private/test-project/latest/en/frontend', authorization: 'Bearer test-api-key' },
    ]);
  });

  it('should map a 404 to a LocizeRequestError', async () => {
    const started = await startServer((_url, _headers, res) => {
      res.writeHead(404);
      res.end('not found');
    });
    server = started.server;
    const client = new LocizeClient(createConfig({ locizeApiUrl: started.baseUrl }));

    await expect(client.downloadNamespace('en', 'frontend')).rejects.toMatchObject({
      name: 'LocizeRequestError',
      status: 404,
      message: 'locize has no en/frontend in version latest',
    });
  });

  it('should abort an attempt that keeps trickling data past the timeout', async () => {
    const started = await startServer((_url, _headers, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.write('{');
      const timer = setInterval(() => res.write(' '), 100);
      const stop = setTimeout(() => {
        clearInterval(timer);
        res.end('}');
      }, 3000);
      res.on('close', () => {
        clearInterval(timer);
        clearTimeout(stop);
      });
    });
    server = started.server;
    const client = new LocizeClient(
      createConfig({ locizeApiUrl: started.baseUrl, requestTimeoutSeconds: 0.5 })
    );

    const startedAt = Date.now();
    const promise = client.downloadNamespace('en', 'frontend');

    await expect(promise).rejects.toBeInstanceOf(LocizeRequestError);
    await expect(promise).rejects.toThrow('locize request for en/frontend timed out after 0.5s');
    expect(Date.now() - startedAt).toBeLessThan(2000);
  });
});
