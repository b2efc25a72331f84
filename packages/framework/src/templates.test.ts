import { fileURLToPath } from 'node:url';
import { test, expect, describe } from 'vitest';
import { createTemplateRenderer, renderDocsPage, renderErrorPage } from './templates';

const FIXTURE_TEMPLATES = fileURLToPath(new URL('./__fixtures__/templates', import.meta.url));

describe('createTemplateRenderer', () => {
  const templates = createTemplateRenderer(FIXTURE_TEMPLATES);

  test('renders a named template with context values', async () => {
    expect(await templates.render('greeting.html', { name: 'Ada' })).toBe('<p>Hello, Ada!</p>\n');
  });

  test('escapes HTML content from context values', async () => {
    const content = await templates.render('greeting.html', { name: '<b>Ada</b>' });

    expect(content).toBe('<p>Hello, &lt;b&gt;Ada&lt;/b&gt;!</p>\n');
  });

  test('rejects when the template does not exist', async () => {
    await expect(templates.render('missing.html')).rejects.toThrow('template not found: missing.html');
  });

  test('rejects when the template does not compile', async () => {
    await expect(templates.render('broken.html')).rejects.toThrow();
  });
});

describe('built-in pages', () => {
  test('error page escapes the message and omits the stack when not given', () => {
    const page = renderErrorPage('<oops>');

    expect(page).toContain('<strong>&lt;oops&gt;</strong>');
    expect(page).not.toContain('<pre>');
  });

  test('error page includes the stack when given', () => {
    expect(renderErrorPage('Boom', 'at handler (server.ts:1:1)')).toContain('<pre>at handler (server.ts:1:1)</pre>');
  });

  test('docs page points at the OpenAPI document', () => {
    const page = renderDocsPage('Blog API', '/openapi.json');

    expect(page).toContain('<title>Blog API - Docs</title>');
    expect(page).toContain('url: "/openapi.json"');
  });
});
