import debug from 'debug';
import nunjucks from 'nunjucks';
import { IS_PROD } from './utils';
import type { Inkpress as IP } from './types';

const log = debug('inkpress:templates');

/**
 * Inline templates for pages the framework renders itself
 */
const ERROR_PAGE = `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>Application Error</title>
  </head>
  <body>
    <main>
      <h1>Application Error</h1>
      <strong>{{ message }}</strong>
      {% if stack %}<pre>{{ stack }}</pre>{% endif %}
    </main>
  </body>
</html>
`;

const DOCS_PAGE = `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <title>{{ title }} - Docs</title>
    <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/swagger-ui-dist@5/swagger-ui.css" />
  </head>
  <body>
    <div id="swagger-ui"></div>
    <script src="https://cdn.jsdelivr.net/npm/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
    <script>
      window.ui = SwaggerUIBundle({ url: {{ openapiUrl | dump | safe }}, dom_id: '#swagger-ui' });
    </script>
  </body>
</html>
`;

const builtins = new nunjucks.Environment(null, { autoescape: true });

/**
 * Create a renderer for templates in a directory
 * Rendering fails if the template is missing or does not compile
 */
export function createTemplateRenderer(
  templatesDir: string,
  options: { noCache?: boolean } = {}
): IP.TemplateRenderer {
  const loader = new nunjucks.FileSystemLoader(templatesDir, { noCache: options.noCache ?? !IS_PROD });
  const env = new nunjucks.Environment(loader, { autoescape: true, trimBlocks: true });

  return {
    render(name: string, data: Record<string, unknown> = {}) {
      log('Rendering template: %s', name);

      return new Promise<string>((resolve, reject) => {
        env.render(name, { page_name: name.split('.')[0], ...data }, (err, res) => {
          if (err) {
            reject(err);
          } else {
            resolve(res ?? '');
          }
        });
      });
    },
  };
}

/**
 * Error page, with the stack trace only when one is given
 */
export function renderErrorPage(message: string, stack?: string): string {
  return builtins.renderString(ERROR_PAGE, { message, stack });
}

/**
 * Interactive API docs page for an OpenAPI document URL
 */
export function renderDocsPage(title: string, openapiUrl: string): string {
  return builtins.renderString(DOCS_PAGE, { title, openapiUrl });
}
