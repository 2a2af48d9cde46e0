// ============================================================
// Deepsky Chart - Express Server Entry Point
// ============================================================

import { createApp } from './app';
import { loadCatalogs } from './catalog/loader';
import { loadConfig } from './config';
import { errorMessage } from './errors';

const config = loadConfig();

try {
  const catalogs = loadCatalogs(config.catalogDir);
  createApp(catalogs).listen(config.port, () => {
    console.log(`\n  Deepsky chart server running at http://localhost:${config.port}\n`);
  });
} catch (err) {
  console.error('[server] Failed to start:', errorMessage(err));
  process.exitCode = 1;
}
