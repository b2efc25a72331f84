#!/usr/bin/env tsx

import { Command } from 'commander';
import { buildOpenAPIDocument } from '@inkpress/framework';
import packageJson from '../package.json';
import { listRoutes, loadApp, resolvePort, startServer } from './server';

const program = new Command();

program.name('inkpress').description('CLI for @inkpress/framework').version(packageJson.version);

/**
 * Start the server
 */
program
  .command('start')
  .option('--dir <path>', 'directory of your inkpress project', './')
  .option('--port <port>', 'port to listen on (default: PORT or config port)')
  .description('Start the server')
  .action(async (options: { dir: string; port?: string }) => {
    console.log('\n========================================');
    console.log('[Inkpress] Starting...');

    const server = await loadApp(options.dir);
    const port = resolvePort(options.port, process.env, server._config);
    const httpServer = await startServer(server, port);

    console.table(listRoutes(server));
    console.log(`[Inkpress] Server started on http://localhost:${port} (Press Ctrl+C to stop)`);
    console.log('========================================\n');

    const shutdown = () => {
      console.log('[Inkpress] Stopping...');
      httpServer.close(() => process.exit(0));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

/**
 * Print the route table
 */
program
  .command('routes')
  .option('--dir <path>', 'directory of your inkpress project', './')
  .description('Print the route table')
  .action(async (options: { dir: string }) => {
    const server = await loadApp(options.dir);
    console.table(listRoutes(server));
  });

/**
 * Print the OpenAPI document
 */
program
  .command('openapi')
  .option('--dir <path>', 'directory of your inkpress project', './')
  .description('Print the OpenAPI document as JSON')
  .action(async (options: { dir: string }) => {
    const server = await loadApp(options.dir);
    console.log(JSON.stringify(buildOpenAPIDocument(server), null, 2));
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
