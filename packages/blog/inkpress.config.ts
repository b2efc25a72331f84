import { fileURLToPath } from 'node:url';
import { createConfig } from '@inkpress/framework';

/**
 * Inkpress config
 * Paths are resolved from this file so the app runs from any working directory.
 */
export default createConfig({
  title: 'Blog API',
  version: '0.1.0',
  templatesDir: fileURLToPath(new URL('./app/templates', import.meta.url)),
  port: 3000,
});
