import { test, expect, describe } from 'vitest';
import * as z from 'zod/v4';
import { buildOpenAPIDocument, humanizeName } from './openapi';
import { createConfig, createServer } from './server';

describe('humanizeName', () => {
  test('splits camelCase handler names', () => {
    expect(humanizeName('getPosts')).toBe('Get Posts');
  });

  test('splits snake_case handler names', () => {
    expect(humanizeName('get_root')).toBe('Get Root');
  });
});

describe('buildOpenAPIDocument', () => {
  test('lists visible operations and leaves hidden ones out', async () => {
    const server = await createServer(createConfig({ title: 'Blog API', version: '1.2.3' }));
    const getRoot = () => ({ message: 'hi' });
    const getAbout = () => '<h1>About</h1>';

    server.get('/', getRoot);
    server.get('/about', getAbout, { includeInSchema: false });

    const document = buildOpenAPIDocument(server);

    expect(document.openapi).toBe('3.1.0');
    expect(document.info).toEqual({ title: 'Blog API', version: '1.2.3' });
    expect(Object.keys(document.paths)).toEqual(['/']);
    expect(document.paths['/'].get.summary).toBe('Get Root');
    expect(document.paths['/'].get.operationId).toBe('getRoot__get');
  });

  test('leaves out a path when every operation on it is hidden', async () => {
    const server = await createServer(createConfig());
    const getPage = () => '<p>page</p>';

    server.get('/about', getPage, { includeInSchema: false });
    server.get('/page', getPage, { includeInSchema: false });

    expect(buildOpenAPIDocument(server).paths).toEqual({});
  });

  test('merges several methods on one path', async () => {
    const server = await createServer(createConfig());
    const listUsers = () => [];
    const addUser = () => ({});

    server.get('/users', listUsers);
    server.post('/users', addUser, { summary: 'Create a user' });

    const operations = buildOpenAPIDocument(server).paths['/users'];

    expect(Object.keys(operations)).toEqual(['get', 'post']);
    expect(operations.get.operationId).toBe('listUsers_users_get');
    expect(operations.post.summary).toBe('Create a user');
  });

  test('uses the response schema as JSON Schema', async () => {
    const server = await createServer(createConfig());
    const ItemSchema = z.object({ id: z.number(), name: z.string() });
    const listItems = () => [];

    server.get('/items', listItems, { responseSchema: z.array(ItemSchema) });

    const response = buildOpenAPIDocument(server).paths['/items'].get.responses['200'];
    const schema = response.content['application/json'].schema;

    expect(response.description).toBe('Successful Response');
    expect(schema).toMatchObject({
      type: 'array',
      items: {
        type: 'object',
        properties: { id: { type: 'number' }, name: { type: 'string' } },
        required: ['id', 'name'],
      },
    });
    expect(schema).not.toHaveProperty('$schema');
  });
});
