// =============================================================================
// CASE EVALUATION — Main Server
// Multi-rater evaluation of synthetic cases.
// =============================================================================

import { createApp } from './app';
import { config } from './config';
import { createStore } from './db';
import { createServices } from './services';

const store = createStore();
const services = createServices(store);
const app = createApp(services);

const server = app.listen(config.port, () => {
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║  CASE EVALUATION SERVICE                                     ║
║                                                              ║
║  Port:     ${String(config.port).padEnd(51)}║
║  Env:      ${config.nodeEnv.padEnd(51)}║
║  Store:    ${store.name.padEnd(51)}║
║                                                              ║
║    /api/profiles/*  → Role Directory                         ║
║    /api/cases/*     → Case Catalog                           ║
║    /api/sessions/*  → Sessions and ratings                   ║
║    /api/progress/*  → Dashboards                             ║
║    /api/audit/*     → Admin audit trail                      ║
║    /api/health      → Unauthenticated health probe           ║
╚══════════════════════════════════════════════════════════════╝
  `);
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down`);
  server.close(() => {
    store
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[Server] Error closing store:', err instanceof Error ? err.message : err);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
