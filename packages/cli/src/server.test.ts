import { fileURLToPath } from 'node:url';
import { test, expect, describe } from 'vitest';
import { createConfig, createServer } from '@inkpress/framework';
import type { ServerType } from '@hono/node-server';
import { isServer, listRoutes, loadApp, resolvePort, startServer } from './server';

const BLOG_DIR = fileURLToPath(new URL('../../blog', import.meta.url));

describe('resolvePort', () => {
  const config = createConfig({ port: 4000 });

  test('prefers the --port option', () => {
    expect(resolvePort('5000', { PORT: '6000' }, config)).toBe(5000);
  });

  test('falls back to the PORT environment variable', () => {
    expect(resolvePort(undefined, { PORT: '6000' }, config)).toBe(6000);
  });

  test('falls back to the config port', () => {
    expect(resolvePort(undefined, {}, config)).toBe(4000);
  });

  test('rejects values that are not ports', () => {
    expect(() => resolvePort('http', {}, config)).toThrow('Invalid port: http');
    expect(() => resolvePort('70000', {}, config)).toThrow('Invalid port: 70000');
  });
});

describe('isServer', () => {
  test('accepts a server', async () => {
    expect(isServer(await createServer(createConfig()))).toBe(true);
  });

  test('rejects other values', () => {
    expect(isServer(null)).toBe(false);
    expect(isServer({ _routes: [] })).toBe(false);
    expect(isServer(() => {})).toBe(false);
  });
});

describe('listRoutes', () => {
  test('lists every operation with its schema visibility', async () => {
    const server = await createServer(createConfig());
    const getUsers = () => [];
    server.get('/users', getUsers);
    server.get('/about', () => '<h1>About</h1>', { includeInSchema: false });

    expect(listRoutes(server)).toEqual([
      { method: 'GET', path: '/users', handler: 'getUsers', schema: 'yes' },
      { method: 'GET', path: '/about', handler: '(anonymous)', schema: 'no' },
    ]);
  });
});

describe('loadApp', () => {
  test('loads the blog app server', async () => {
    const server = await loadApp(BLOG_DIR);

    expect(listRoutes(server).map((row) => row.path)).toEqual(['/', '/api/v1/posts', '/about', '/page', '/home']);
  });

  test('rejects a directory without app/server.ts', async () => {
    await expect(loadApp('/nonexistent-project')).rejects.toThrow('Could not find app/server.ts');
  });
});

describe('startServer', () => {
  const stop = (httpServer: ServerType) => new Promise<void>((resolve) => httpServer.close(() => resolve()));

  function listeningPort(httpServer: ServerType): number {
    const address = httpServer.address();
    return typeof address === 'object' && address !== null ? address.port : 0;
  }

  test('listens on a free port', async () => {
    const server = await createServer(createConfig());
    const httpServer = await startServer(server, 0);

    expect(listeningPort(httpServer)).toBeGreaterThan(0);
    await stop(httpServer);
  });

  test('rejects when the port is already in use', async () => {
    const server = await createServer(createConfig());
    const first = await startServer(server, 0);

    await expect(startServer(server, listeningPort(first))).rejects.toThrow('EADDRINUSE');
    await stop(first);
  });
});
