#!/usr/bin/env node
/**
 * DSR synchronizer executable entry point
 * Called when issues are closed or reopened
 */

import { DsrSynchronizer, dsrSyncContext } from './index.js';
import { loadConfig } from '../shared/config.js';

async function main() {
  const config = await loadConfig();
  const synchronizer = new DsrSynchronizer(dsrSyncContext(config));
  const result = await synchronizer.run();

  console.log(`Checked ${result.checked} reports, updated ${result.updated.length}, failed ${result.failed}`);
  if (result.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('DSR sync failed:', error);
  process.exit(1);
});
