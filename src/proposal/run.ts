#!/usr/bin/env node
/**
 * Proposal processor executable entry point
 * Called on pushes that touch proposal files
 */

import { ProposalProcessor, proposalContext } from './index.js';
import { loadConfig } from '../shared/config.js';

async function main() {
  const config = await loadConfig();
  const processor = new ProposalProcessor(proposalContext(config));
  const result = await processor.run();

  console.log(`Created ${result.created.length} proposal issues`);
  if (result.failed.length > 0) {
    throw new Error(`Could not process: ${result.failed.join(', ')}`);
  }
}

main().catch(error => {
  console.error('Proposal processor failed:', error);
  process.exit(1);
});
