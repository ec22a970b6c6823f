#!/usr/bin/env node
/**
 * Slack notifier executable entry point
 */

import { SlackNotifier, notifierContext } from './index.js';
import { loadConfig } from '../shared/config.js';
import { readEventPayload } from '../utils.js';

async function main() {
  const config = await loadConfig();
  const notifier = new SlackNotifier(notifierContext(config));
  await notifier.notify(config.eventName, await readEventPayload(config.eventPath));
}

main().catch(error => {
  console.error('Slack notifier failed:', error);
  process.exit(1);
});
