import config from '../inkpress.config';
import { createServer, requestLogger } from '@inkpress/framework';
import type { Inkpress as IP } from '@inkpress/framework';
import { getAbout } from './routes/about';
import { getHome } from './routes/home';
import { getRoot, RootSchema } from './routes/index';
import { getPosts, PostsResponseSchema } from './routes/posts';

/**
 * Route table. /about and /page share one handler.
 */
export const ROUTES: ReadonlyArray<IP.RouteDefinition> = [
  { method: 'GET', path: '/', handler: getRoot, options: { responseSchema: RootSchema } },
  { method: 'GET', path: '/api/v1/posts', handler: getPosts, options: { responseSchema: PostsResponseSchema } },
  { method: 'GET', path: '/about', handler: getAbout, options: { includeInSchema: false } },
  { method: 'GET', path: '/page', handler: getAbout, options: { includeInSchema: false } },
  { method: 'GET', path: '/home', handler: getHome, options: { includeInSchema: false } },
];

const server = await createServer(config);

server.use(requestLogger());
server.addRoutes(ROUTES);

export default server;
