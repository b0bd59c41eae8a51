/**
 * Main Express Server
 * Boots the session from the environment and serves the login routes
 */

import { config, isProduction } from './config.js';
import { closePool } from './db/pg.js';
import { createApp } from './app.js';
import { GraphSession } from './session/graphSession.js';
import { createSessionConfig } from './session/sessionConfig.js';
import { FetchTokenEndpointClient } from './session/tokenClient.js';
import {
  createSessionStateRepository,
  ensureSessionStateSchema,
  getStorageDriver,
} from './session/repositories/index.js';

console.log('🚀 Starting server...\n');

const driver = getStorageDriver();
const stateRepository = createSessionStateRepository(driver, {
  stateDir: config.sessionStorage.stateDir,
});
if (driver === 'postgres') {
  await ensureSessionStateSchema();
}

// Undefined entries fall back to the session defaults
const overrides = Object.fromEntries(
  Object.entries(config.oauth).filter(([, value]) => value !== undefined)
);

const session = await GraphSession.open(createSessionConfig(overrides), {
  tokenClient: new FetchTokenEndpointClient(config.http.tokenRequestTimeoutMs),
  stateRepository,
});
console.log(`✓ Session ready: ${session.toString()}`);

const app = createApp(session, {
  logRequests: config.server.logRequests,
  apiTimeoutMs: config.http.apiRequestTimeoutMs,
});

const server = app.listen(config.server.port, () => {
  console.log(`
╔════════════════════════════════════════════╗
║   Graph Auth Session (${(isProduction ? 'Production' : 'Development').padEnd(11)})        ║
╠════════════════════════════════════════════╣
║  Port:      ${config.server.port.toString().padEnd(30)} ║
║  Storage:   ${driver.padEnd(30)} ║
║                                            ║
║  Endpoints:                                ║
║  • Login:   /login, /logout                ║
║  • API:     /me, /api/*                    ║
║  • Health:  /health                        ║
╚════════════════════════════════════════════╝
  `);
});

function shutdown(signal: string) {
  console.log(`\n${signal} received, shutting down`);
  server.close(() => {
    closePool()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Failed to close database pool:', error);
        process.exit(1);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
