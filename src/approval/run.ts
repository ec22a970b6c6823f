#!/usr/bin/env node
/**
 * Approval processor executable entry point
 * Called when an issue is labelled or edited
 */

import { ApprovalProcessor, approvalContext, approvalTrigger } from './index.js';
import { loadConfig } from '../shared/config.js';
import { IssuePayloadSchema } from '../shared/payload.js';
import { readEventPayload } from '../utils.js';

async function main() {
  const config = await loadConfig();
  const event = IssuePayloadSchema.safeParse(await readEventPayload(config.eventPath));
  if (!event.success) {
    throw new Error('Event payload does not reference an issue');
  }

  const issueNumber = event.data.issue.number;
  const processor = new ApprovalProcessor(approvalContext(config));
  const result = await processor.process(issueNumber, approvalTrigger(event.data));
  console.log(`Approval result for #${issueNumber}: ${result.action}`);
}

main().catch(error => {
  console.error('Approval processor failed:', error);
  process.exit(1);
});
