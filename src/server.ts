// =============================================================================
// BASTION — Main Server
//
// Process entrypoint: configuration, pg pool, services, HTTP listener.
// Everything below createApp() is dependency injected; this file is the
// only place the real stores are chosen.
// =============================================================================

import { createApp, SERVICE_VERSION } from './app';
import { loadConfig } from './config';
import { createPool } from './db/pool';
import { createPgServices } from './services';

const config = loadConfig();
const pool = createPool(config.db);
const services = createPgServices(pool, config);

const app = createApp({
  services,
  healthCheck: async () => {
    await pool.query('SELECT 1');
  },
});

const server = app.listen(config.port, () => {
  const t = config.policy;
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║  BASTION — Request Governance for Banking Agents             ║
║  Version ${SERVICE_VERSION.padEnd(52)}║
║                                                              ║
║  Port:     ${String(config.port).padEnd(50)}║
║  Env:      ${config.nodeEnv.padEnd(50)}║
║  Scorer:   ${(config.scorer.url || 'unconfigured (fail closed)').padEnd(50)}║
║  Policy:   ${`conf<${t.confidenceFloor} reject<${t.rejectFloor} approve>=${t.approveCeiling} rewrite>=${t.rewriteLow}`.padEnd(50)}║
╚══════════════════════════════════════════════════════════════╝
  `);
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down`);
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Server] Error closing pool:', err);
        process.exit(1);
      }
    );
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
