import type { ZodType } from 'zod/v4';

/**
 * Inkpress Types
 */
export namespace Inkpress {
  export type HTTPMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

  export interface Server {
    _config: Inkpress.Config;
    _routes: Array<Inkpress.Route>;
    _middleware: Array<Inkpress.MiddlewareFunction>;
    _templates: Inkpress.TemplateRenderer | null;
    use: (middleware: Inkpress.MiddlewareFunction) => Inkpress.Server;
    get: (path: string, handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    post: (path: string, handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    put: (path: string, handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    patch: (path: string, handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    delete: (path: string, handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    options: (path: string, handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    addRoute: (
      method: Inkpress.HTTPMethod,
      path: string,
      handler: Inkpress.RouteHandler,
      handlerOptions?: Inkpress.RouteHandlerOptions
    ) => Inkpress.Route;
    addRoutes: (definitions: ReadonlyArray<Inkpress.RouteDefinition>) => Inkpress.Server;
    fetch: (request: Request) => Promise<Response>;
  }

  export type Config = {
    title: string;
    version: string;
    templatesDir: string | null;
    openapiPath: string | null; // null = no schema route
    docsPath: string | null; // null = no docs page
    port: number;
  };

  export type ResponseOptions = { status?: number; headers?: Record<string, string> };

  export interface Context {
    route: {
      path: string;
      name: string | undefined;
    };
    req: {
      url: URL;
      raw: Request;
      method: string; // Always uppercase
      headers: Headers; // Case-insensitive
      query: URLSearchParams;
    };
    res: {
      html: (html: string, options?: ResponseOptions) => Response;
      json: (json: unknown, options?: ResponseOptions) => Response;
      text: (text: string, options?: ResponseOptions) => Response;
      redirect: (url: string, options?: ResponseOptions) => Response;
      error: (error: Error, options?: ResponseOptions) => Response;
      notFound: (options?: ResponseOptions) => Response;
      render: (name: string, data?: Record<string, unknown>, options?: ResponseOptions) => Promise<Response>;
    };
  }

  export type RouteConfig = {
    name?: string;
    path?: string;
  };
  export type RouteHandler = (context: Inkpress.Context) => unknown;
  export type RouteHandlerOptions = {
    middleware?: Inkpress.MiddlewareFunction[];
    includeInSchema?: boolean; // Defaults to true
    summary?: string;
    responseSchema?: ZodType;
  };

  /**
   * One method of a route, as registered
   */
  export type RouteOperation = {
    method: Inkpress.HTTPMethod;
    handler: Inkpress.RouteHandler;
    middleware: Inkpress.MiddlewareFunction[];
    includeInSchema: boolean;
    summary?: string;
    responseSchema?: ZodType;
  };

  /**
   * Entry in an explicit route table
   */
  export type RouteDefinition = {
    method: Inkpress.HTTPMethod;
    path: string;
    handler: Inkpress.RouteHandler;
    options?: Inkpress.RouteHandlerOptions;
  };

  /**
   * Next function type for middleware
   */
  export type NextFunction = () => Promise<Response>;

  /**
   * Middleware function signature
   * Accepts context and next function, returns a Response
   */
  export type MiddlewareFunction = (
    context: Inkpress.Context,
    next: Inkpress.NextFunction
  ) => Promise<Response> | Response;

  export type FetchOptions = {
    middleware?: Inkpress.MiddlewareFunction[]; // Server middleware, runs before route middleware
    templates?: Inkpress.TemplateRenderer | null;
  };

  export interface Route {
    _kind: 'inkRoute';
    _name: string | undefined;
    _config: Inkpress.RouteConfig;
    _path(): string;
    _methods(): string[];
    _operations(): Inkpress.RouteOperation[];
    get: (handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    post: (handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    put: (handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    patch: (handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    delete: (handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    options: (handler: Inkpress.RouteHandler, handlerOptions?: Inkpress.RouteHandlerOptions) => Inkpress.Route;
    middleware: (middleware: Array<Inkpress.MiddlewareFunction>) => Inkpress.Route;
    fetch: (request: Request, options?: Inkpress.FetchOptions) => Promise<Response>;
  }

  export interface TemplateRenderer {
    render: (name: string, data?: Record<string, unknown>) => Promise<string>;
  }
}
