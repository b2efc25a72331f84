import * as z from 'zod/v4';
import type { Inkpress as IP } from './types';

export type OpenAPIOperation = {
  summary: string;
  operationId: string;
  responses: Record<
    string,
    {
      description: string;
      content: Record<string, { schema: unknown }>;
    }
  >;
};

export type OpenAPIDocument = {
  openapi: string;
  info: { title: string; version: string };
  paths: Record<string, Record<string, OpenAPIOperation>>;
};

/**
 * Build an OpenAPI 3.1 document from the routes registered on a server
 * Operations registered with includeInSchema: false are left out
 */
export function buildOpenAPIDocument(server: IP.Server): OpenAPIDocument {
  const paths: OpenAPIDocument['paths'] = {};

  for (const route of server._routes) {
    const path = route._path();

    for (const operation of route._operations()) {
      if (!operation.includeInSchema) {
        continue;
      }

      paths[path] = {
        ...paths[path],
        [operation.method.toLowerCase()]: describeOperation(route, operation),
      };
    }
  }

  return {
    openapi: '3.1.0',
    info: { title: server._config.title, version: server._config.version },
    paths,
  };
}

function describeOperation(route: IP.Route, operation: IP.RouteOperation): OpenAPIOperation {
  const path = route._path();
  const method = operation.method.toLowerCase();
  const name = operation.handler.name || route._name || `${method} ${path}`;

  return {
    summary: operation.summary ?? humanizeName(name),
    operationId: `${name}${path.replace(/\W/g, '_')}_${method}`,
    responses: {
      '200': {
        description: 'Successful Response',
        content: {
          'application/json': { schema: operation.responseSchema ? toJSONSchema(operation.responseSchema) : {} },
        },
      },
    },
  };
}

/**
 * JSON Schema for a zod schema, without the draft marker (OpenAPI 3.1 implies it)
 */
function toJSONSchema(schema: z.ZodType): unknown {
  const { $schema, ...jsonSchema } = z.toJSONSchema(schema);
  return jsonSchema;
}

/**
 * "getPosts" -> "Get Posts", "get_about" -> "Get About"
 */
export function humanizeName(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
