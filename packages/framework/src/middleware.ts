import debug from 'debug';
import type { Inkpress as IP } from './types';

export type LogFunction = (formatter: string, ...args: unknown[]) => void;

/**
 * Execute an array of middleware functions, ending with the route handler
 * Middleware functions receive (context, next) and can call next() to continue
 * The handler receives (context) and runs at the end of the chain
 *
 * @param context - The Inkpress context
 * @param middleware - Middleware functions, in the order they should run
 * @param handler - Final handler that produces the response
 */
export async function executeMiddleware(
  context: IP.Context,
  middleware: Array<IP.MiddlewareFunction>,
  handler: (context: IP.Context) => Promise<Response>
): Promise<Response> {
  /**
   * Create the next function for middleware
   * This function will execute the next handler in the chain
   */
  const createNext = (index: number): IP.NextFunction => {
    return async (): Promise<Response> => {
      if (index >= middleware.length) {
        return handler(context);
      }

      return await middleware[index](context, createNext(index + 1));
    };
  };

  // Start execution from the first middleware
  return await createNext(0)();
}

/**
 * Log each request as "METHOD path status durationms"
 */
export function requestLogger(log: LogFunction = debug('inkpress:http')): IP.MiddlewareFunction {
  return async (context: IP.Context, next: IP.NextFunction) => {
    const start = performance.now();
    const response = await next();
    const ms = Math.round(performance.now() - start);

    log('%s %s %d %dms', context.req.method, context.req.url.pathname, response.status, ms);

    return response;
  };
}
