/**
 * Node.js entry point.
 * Loads `.env`, builds the production container and serves the router over
 * node:http through @hono/node-server's fetch adapter.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createRouter } from './api/router.js';
import { loadConfig } from './config.js';
import { createProductionContainer } from './container.production.js';
import { createContext } from './middleware/pipeline.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const { container, dispose } = createProductionContainer(config);
  const router = createRouter(container);
  const log = container.logProvider;

  const server = serve(
    {
      fetch: (req: Request) => router.handle(req, createContext()),
      hostname: config.host,
      port: config.port,
    },
    (info) => {
      log.info(`Listening on ${config.host}:${info.port}`, {
        host: config.host,
        port: info.port,
      });
    }
  );

  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal });
    server.close(() => {
      dispose().then(
        () => process.exit(0),
        (err: unknown) => {
          process.stderr.write(`shutdown failed: ${String(err)}\n`);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  process.stderr.write(`startup failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  process.exit(1);
});
