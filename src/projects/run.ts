#!/usr/bin/env node
/**
 * Project board sync executable entry point
 * Issue events move one card; any other event syncs all TODO issues
 */

import { ProjectBoardSync, projectSyncContext } from './index.js';
import { loadConfig } from '../shared/config.js';
import { IssuePayloadSchema } from '../shared/payload.js';
import { readEventPayload } from '../utils.js';

async function main() {
  const config = await loadConfig();
  const sync = new ProjectBoardSync(projectSyncContext(config));

  const event = IssuePayloadSchema.safeParse(await readEventPayload(config.eventPath));
  if (event.success) {
    const { number, state } = event.data.issue;
    await sync.updateIssueStatus(number, state === 'closed' ? 'closed' : 'open');
    return;
  }

  const result = await sync.syncTodoIssues();
  console.log(`Added ${result.added.length} issues to the board, ${result.failed.length} failed`);
  if (result.failed.length > 0) {
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('Project board sync failed:', error);
  process.exit(1);
});
