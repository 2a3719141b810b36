/**
 * Fulfillment backend entry point. Configured from FULFILLMENT_* variables.
 */

import { loadServerConfigFromEnv } from '@shared/schemas';
import { createRequestHandler } from './http/routes';
import { createHttpServer, listen } from './http/server';
import { FulfillmentOrchestrator } from './services/fulfillment/FulfillmentOrchestrator';
import { createSampleFulfillers } from './services/fulfillment/sampleFulfillers';
import { SessionRegistry } from './services/session/SessionRegistry';

async function main(): Promise<void> {
  const config = loadServerConfigFromEnv(process.env);

  const sessions = new SessionRegistry({ ttlMs: config.sessionTtlMs });
  sessions.startSweeper();

  const orchestrator = new FulfillmentOrchestrator({
    sessions,
    fulfillers: createSampleFulfillers(),
    fulfillerTimeoutMs: config.fulfillerTimeoutMs,
    cardsPerKind: config.cardsPerKind,
  });

  const server = createHttpServer(createRequestHandler(orchestrator));
  await listen(server, config.port, config.host);
  console.log(`[Server] Listening on http://${config.host}:${config.port}`);

  const shutdown = () => {
    console.log('[Server] Shutting down');
    sessions.stopSweeper();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exitCode = 1;
});
