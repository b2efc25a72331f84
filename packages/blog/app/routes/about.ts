import type { Inkpress as IP } from '@inkpress/framework';

export const ABOUT_HTML = `
    <html>
        <head>
            <title>About Page</title>
        </head>
        <body>
            <h1>About This Blog</h1>
            <p>This blog is created using Inkpress.</p>
        </body>
    </html>
    `;

/**
 * About page. Registered under more than one path, so it must not depend on the route.
 */
export function getAbout(context: IP.Context) {
  return context.res.html(ABOUT_HTML);
}
