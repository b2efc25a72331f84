import type { EventEmitter } from 'node:events';
import fs from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { serve, type ServerType } from '@hono/node-server';
import debug from 'debug';
import * as z from 'zod/v4';
import type { Inkpress as IP } from '@inkpress/framework';

const log = debug('inkpress:cli');

export const SERVER_FILE = 'app/server.ts';

const PortSchema = z.coerce.number().int().min(1).max(65535);

export type RouteTableRow = {
  method: string;
  path: string;
  handler: string;
  schema: 'yes' | 'no';
};

/**
 * Check a module export is an Inkpress server
 */
export function isServer(value: unknown): value is IP.Server {
  return (
    typeof value === 'object' &&
    value !== null &&
    '_routes' in value &&
    Array.isArray(value._routes) &&
    'fetch' in value &&
    typeof value.fetch === 'function'
  );
}

/**
 * Load the app server (default export of app/server.ts) from a project directory
 * @throws Error if there is no server file or it does not export a server
 */
export async function loadApp(dir: string): Promise<IP.Server> {
  const serverFile = resolve(join(dir, SERVER_FILE));

  if (!fs.existsSync(serverFile)) {
    throw new Error(`Could not find ${SERVER_FILE} in ${resolve(dir)} - Are you in an Inkpress project directory?`);
  }

  log('Loading app from %s', serverFile);
  const module: unknown = await import(pathToFileURL(serverFile).href);

  if (typeof module === 'object' && module !== null && 'default' in module && isServer(module.default)) {
    return module.default;
  }

  throw new Error(`${SERVER_FILE} must export a server by default. Use "export default await createServer(config)".`);
}

/**
 * Port from the --port option, else the PORT environment variable, else the config
 * @throws Error if the chosen value is not a valid port
 */
export function resolvePort(option: string | undefined, env: NodeJS.ProcessEnv, config: IP.Config): number {
  const value = option ?? env.PORT ?? config.port;
  const parsed = PortSchema.safeParse(value);

  if (!parsed.success) {
    throw new Error(`Invalid port: ${String(value)}`);
  }

  return parsed.data;
}

/**
 * Rows for the route table printed by the CLI
 */
export function listRoutes(server: IP.Server): RouteTableRow[] {
  return server._routes.flatMap((route) =>
    route._operations().map((operation) => ({
      method: operation.method,
      path: route._path(),
      handler: operation.handler.name || '(anonymous)',
      schema: operation.includeInSchema ? ('yes' as const) : ('no' as const),
    }))
  );
}

/**
 * Listen for HTTP requests with the Node.js adapter
 * @throws Error if the server cannot listen (port in use, no permission)
 */
export function startServer(server: IP.Server, port: number): Promise<ServerType> {
  return new Promise((resolveServer, reject) => {
    const onError = (err: Error) => {
      log('Unable to listen on port %d: %s', port, err.message);
      reject(err);
    };

    const httpServer = serve({ fetch: server.fetch, port }, (info) => {
      events.off('error', onError);
      log('Listening on port %d', info.port);
      resolveServer(httpServer);
    });

    const events: EventEmitter = httpServer;
    events.once('error', onError);
  });
}
