import debug from 'debug';
import { Hono } from 'hono';
import { trimTrailingSlash } from 'hono/trailing-slash';
import { executeMiddleware } from './middleware';
import { buildOpenAPIDocument } from './openapi';
import { createTemplateRenderer, renderDocsPage, renderErrorPage } from './templates';
import { IS_PROD, normalizePath } from './utils';
import type { Inkpress as IP } from './types';

export type { IP as Inkpress };
export { IS_PROD, normalizePath } from './utils';
export { executeMiddleware, requestLogger } from './middleware';
export { buildOpenAPIDocument, humanizeName } from './openapi';
export type { OpenAPIDocument, OpenAPIOperation } from './openapi';
export { createTemplateRenderer, renderDocsPage, renderErrorPage } from './templates';

const log = debug('inkpress:server');

export class HTTPException extends Error {
  constructor(public status: number, message?: string) {
    super(message);
    this.name = 'HTTPException';
  }
}

/**
 * Ensures a valid config object is returned, even with an empty object or partial object passed in
 */
export function createConfig(config: Partial<IP.Config> = {}): IP.Config {
  return {
    title: config.title ?? 'Inkpress',
    version: config.version ?? '0.1.0',
    templatesDir: config.templatesDir ?? null,
    openapiPath: config.openapiPath === undefined ? '/openapi.json' : config.openapiPath,
    docsPath: config.docsPath === undefined ? '/docs' : config.docsPath,
    port: config.port ?? 3000,
  };
}

/**
 * Creates a context object for a request
 */
export function createContext(
  req: Request,
  route?: IP.Route,
  templates: IP.TemplateRenderer | null = null
): IP.Context {
  const url = new URL(req.url);
  const method = req.method.toUpperCase();
  const headers = new Headers(req.headers);

  const html = (html: string, options?: IP.ResponseOptions) =>
    new Response(html, { ...options, headers: { 'Content-Type': 'text/html; charset=UTF-8', ...options?.headers } });
  const json = (json: unknown, options?: IP.ResponseOptions) =>
    new Response(JSON.stringify(json), { ...options, headers: { 'Content-Type': 'application/json', ...options?.headers } });

  return {
    route: {
      path: route?._path() ?? url.pathname,
      name: route?._name,
    },
    req: {
      raw: req,
      url,
      method,
      headers,
      query: url.searchParams,
    },
    res: {
      html,
      json,
      text: (text: string, options?: IP.ResponseOptions) =>
        new Response(text, { ...options, headers: { 'Content-Type': 'text/plain; charset=UTF-8', ...options?.headers } }),
      redirect: (url: string, options?: IP.ResponseOptions) =>
        new Response(null, { status: options?.status ?? 302, headers: { Location: url, ...options?.headers } }),
      error: (error: Error, options?: IP.ResponseOptions) => showErrorResponse(html, error, options),
      notFound: (options?: IP.ResponseOptions) => json({ detail: 'Not Found' }, { status: 404, ...options }),
      async render(name: string, data: Record<string, unknown> = {}, options?: IP.ResponseOptions) {
        if (!templates) {
          throw new Error(`Unable to render "${name}": no templatesDir configured`);
        }

        return html(await templates.render(name, data), options);
      },
    },
  };
}

/**
 * Define a route that can handle a direct HTTP request.
 * Route handlers may return a Response, an HTML string or any JSON-serializable value
 */
export function createRoute(config: IP.RouteConfig = {}): IP.Route {
  const _operations = new Map<string, IP.RouteOperation>();
  let _middleware: Array<IP.MiddlewareFunction> = [];

  const addOperation = (method: IP.HTTPMethod, handler: IP.RouteHandler, handlerOptions: IP.RouteHandlerOptions = {}) => {
    _operations.set(method, {
      method,
      handler,
      middleware: handlerOptions.middleware || [],
      includeInSchema: handlerOptions.includeInSchema ?? true,
      summary: handlerOptions.summary,
      responseSchema: handlerOptions.responseSchema,
    });

    return api;
  };

  const api: IP.Route = {
    _kind: 'inkRoute',
    _name: config.name,
    _config: config,
    _methods: () => Array.from(_operations.keys()),
    _operations: () => Array.from(_operations.values()),
    _path() {
      return this._config.path ? normalizePath(this._config.path) : '/';
    },
    /**
     * Add a GET route handler (primary page display)
     */
    get(handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addOperation('GET', handler, handlerOptions);
    },
    /**
     * Add a POST route handler (typically to process form data)
     */
    post(handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addOperation('POST', handler, handlerOptions);
    },
    /**
     * Add a PUT route handler (typically to update existing data)
     */
    put(handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addOperation('PUT', handler, handlerOptions);
    },
    /**
     * Add a DELETE route handler (typically to delete existing data)
     */
    delete(handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addOperation('DELETE', handler, handlerOptions);
    },
    /**
     * Add a PATCH route handler (typically to update existing data)
     */
    patch(handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addOperation('PATCH', handler, handlerOptions);
    },
    /**
     * Add a OPTIONS route handler
     */
    options(handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addOperation('OPTIONS', handler, handlerOptions);
    },
    /**
     * Add middleware specific to this route
     */
    middleware(middleware: Array<IP.MiddlewareFunction>) {
      _middleware = middleware;
      return api;
    },

    /**
     * Fetch - handle a direct HTTP request
     */
    async fetch(request: Request, fetchOptions: IP.FetchOptions = {}) {
      const context = createContext(request, api, fetchOptions.templates ?? null);
      const method = context.req.method;
      const operation = _operations.get(method === 'HEAD' ? 'GET' : method);

      if (!operation) {
        return context.res.json(
          { detail: 'Method Not Allowed' },
          { status: 405, headers: { Allow: api._methods().join(', ') } }
        );
      }

      const methodHandler = async (context: IP.Context) => {
        const routeContent = await operation.handler(context);
        return toResponse(context, routeContent);
      };

      try {
        return await executeMiddleware(
          context,
          [...(fetchOptions.middleware ?? []), ..._middleware, ...operation.middleware],
          methodHandler
        );
      } catch (e) {
        const err = e instanceof Error ? e : new Error(String(e));
        !IS_PROD && console.error(err);
        return context.res.error(err);
      }
    },
  };

  return api;
}

/**
 * Creates a server object that can compose routes and middleware
 */
export async function createServer(config: IP.Config = createConfig()): Promise<IP.Server> {
  const _middleware: IP.MiddlewareFunction[] = [];
  const _routes: IP.Route[] = [];
  const _templates = config.templatesDir ? createTemplateRenderer(config.templatesDir) : null;
  let _app: Hono | null = null;

  const addRoute = (
    method: IP.HTTPMethod,
    path: string,
    handler: IP.RouteHandler,
    handlerOptions?: IP.RouteHandlerOptions
  ) => {
    const route = createRoute({ path, name: handler.name || undefined });
    switch (method) {
      case 'GET':
        route.get(handler, handlerOptions);
        break;
      case 'POST':
        route.post(handler, handlerOptions);
        break;
      case 'PUT':
        route.put(handler, handlerOptions);
        break;
      case 'PATCH':
        route.patch(handler, handlerOptions);
        break;
      case 'DELETE':
        route.delete(handler, handlerOptions);
        break;
      case 'OPTIONS':
        route.options(handler, handlerOptions);
        break;
    }

    _routes.push(route);
    _app = null;
    log('Route added: %s %s', method, route._path());
    return route;
  };

  const api: IP.Server = {
    _config: config,
    _routes: _routes,
    _middleware: _middleware,
    _templates: _templates,
    use(middleware: IP.MiddlewareFunction) {
      _middleware.push(middleware);
      return this;
    },
    get(path: string, handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addRoute('GET', path, handler, handlerOptions);
    },
    post(path: string, handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addRoute('POST', path, handler, handlerOptions);
    },
    put(path: string, handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addRoute('PUT', path, handler, handlerOptions);
    },
    delete(path: string, handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addRoute('DELETE', path, handler, handlerOptions);
    },
    patch(path: string, handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addRoute('PATCH', path, handler, handlerOptions);
    },
    options(path: string, handler: IP.RouteHandler, handlerOptions?: IP.RouteHandlerOptions) {
      return addRoute('OPTIONS', path, handler, handlerOptions);
    },
    addRoute,
    addRoutes(definitions: ReadonlyArray<IP.RouteDefinition>) {
      for (const { method, path, handler, options } of definitions) {
        addRoute(method, path, handler, options);
      }
      return this;
    },
    fetch(request: Request) {
      if (!_app) {
        _app = buildApp(api);
      }

      return Promise.resolve(_app.fetch(request));
    },
  };

  return api;
}

/**
 * Build the Hono app that dispatches requests to the server's routes
 * Routes sharing a path are grouped so a method mismatch gets a 405 instead of a 404
 */
function buildApp(server: IP.Server): Hono {
  const app = new Hono();
  const config = server._config;
  const fetchOptions: IP.FetchOptions = { middleware: server._middleware, templates: server._templates };
  const routesByPath = new Map<string, IP.Route[]>();

  for (const route of [...server._routes, ...builtinRoutes(server)]) {
    const path = route._path();
    routesByPath.set(path, [...(routesByPath.get(path) ?? []), route]);
  }

  app.use(trimTrailingSlash());

  for (const [path, routes] of routesByPath) {
    app.all(path, (c) => {
      const request = c.req.raw;
      const method = request.method.toUpperCase() === 'HEAD' ? 'GET' : request.method.toUpperCase();
      const route = routes.find((r) => r._methods().includes(method)) ?? routes[0];

      return route.fetch(request, fetchOptions);
    });
  }

  app.notFound((c) => {
    log('Not found: %s %s', c.req.method, c.req.path);
    return createContext(c.req.raw).res.notFound();
  });

  log('Routes table built with %d path(s) for %s', routesByPath.size, config.title);
  return app;
}

/**
 * Schema and docs routes, never listed in the schema themselves
 */
function builtinRoutes(server: IP.Server): IP.Route[] {
  const { openapiPath, docsPath, title } = server._config;
  const routes: IP.Route[] = [];

  if (openapiPath) {
    routes.push(
      createRoute({ path: openapiPath, name: 'openapi' }).get((c) => c.res.json(buildOpenAPIDocument(server)), {
        includeInSchema: false,
      })
    );

    if (docsPath) {
      routes.push(
        createRoute({ path: docsPath, name: 'docs' }).get((c) => c.res.html(renderDocsPage(title, openapiPath)), {
          includeInSchema: false,
        })
      );
    }
  }

  return routes;
}

/**
 * Checks if content is an HTML string
 */
function isHTMLString(content: unknown): content is string {
  return typeof content === 'string' && content.trim().startsWith('<');
}

/**
 * Convert whatever a route handler returned into a Response
 */
function toResponse(context: IP.Context, routeContent: unknown): Response {
  // Return Response if returned from route handler
  if (routeContent instanceof Response) {
    return routeContent;
  }

  if (isHTMLString(routeContent)) {
    return context.res.html(routeContent);
  }

  if (typeof routeContent === 'string') {
    return context.res.text(routeContent);
  }

  return context.res.json(routeContent ?? null);
}

/**
 * Basic error handling
 * Renders the error page with the HTTPException status, else 500, unless options give a status
 */
function showErrorResponse(
  html: (html: string, options?: IP.ResponseOptions) => Response,
  err: Error,
  options?: IP.ResponseOptions
): Response {
  let status: number = 500;
  const message = err.message || 'Internal Server Error';

  // Send correct status code if HTTPException
  if (err instanceof HTTPException) {
    status = err.status;
  }

  const stack = !IS_PROD && err.stack ? err.stack.split('\n').slice(1).join('\n') : undefined;

  return html(renderErrorPage(message, stack), { status, ...options });
}
