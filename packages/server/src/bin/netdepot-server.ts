#!/usr/bin/env node
/**
 * netdepot-server executable
 */

import { main } from './server.js';

main().catch((err: unknown) => {
  console.error('[NetDepot:Server] Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});
