#!/usr/bin/env node
/**
 * Daily reporter executable entry point
 * Called by GitHub Actions workflow on push
 */

import { DailyReporter, dailyReporterContext } from './index.js';
import { loadConfig } from '../shared/config.js';

async function main() {
  const config = await loadConfig();
  if (!config.branch) {
    throw new Error('GITHUB_REF is required');
  }

  const reporter = new DailyReporter(dailyReporterContext(config));
  const result = await reporter.run();

  console.log(`Daily report ${result.status}${result.issueNumber ? ` (#${result.issueNumber})` : ''}`);
}

main().catch(error => {
  console.error('Daily reporter failed:', error);
  process.exit(1);
});
