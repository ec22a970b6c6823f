import * as core from '@actions/core';
import { loadConfig, type AutomationConfig } from './shared/config.js';
import { DailyReporter, dailyReporterContext } from './dsr/index.js';
import { DsrSynchronizer, dsrSyncContext } from './dsr-sync/index.js';
import { ApprovalProcessor, approvalContext, approvalTrigger } from './approval/index.js';
import { ProposalProcessor, proposalContext } from './proposal/index.js';
import { ProjectBoardSync, projectSyncContext } from './projects/index.js';
import { SlackNotifier, notifierContext } from './notifier/index.js';
import { IssuePayloadSchema } from './shared/payload.js';
import { errorMessage, readEventPayload } from './utils.js';

export const MODES = ['dsr', 'sync-dsr', 'approval', 'proposal', 'project-sync', 'notify'] as const;
export type Mode = typeof MODES[number];

function isMode(value: string): value is Mode {
  return MODES.some(mode => mode === value);
}

async function runMode(mode: Mode, config: AutomationConfig): Promise<void> {
  switch (mode) {
    case 'dsr': {
      if (!config.branch) {
        throw new Error('GITHUB_REF is required');
      }
      const result = await new DailyReporter(dailyReporterContext(config)).run();
      core.setOutput('status', result.status);
      if (result.issueNumber) {
        core.setOutput('issue-number', String(result.issueNumber));
      }
      core.setOutput('todo-issues', result.todoIssues.join(','));
      break;
    }
    case 'sync-dsr': {
      const result = await new DsrSynchronizer(dsrSyncContext(config)).run();
      core.setOutput('updated-reports', result.updated.join(','));
      if (result.failed > 0) {
        throw new Error(`Could not sync ${result.failed} reports`);
      }
      break;
    }
    case 'approval': {
      const event = IssuePayloadSchema.safeParse(await readEventPayload(config.eventPath));
      if (!event.success) {
        throw new Error('Event payload does not reference an issue');
      }
      const result = await new ApprovalProcessor(approvalContext(config)).process(
        event.data.issue.number,
        approvalTrigger(event.data)
      );
      core.setOutput('status', result.action);
      break;
    }
    case 'proposal': {
      const result = await new ProposalProcessor(proposalContext(config)).run();
      core.setOutput('proposal-issues', result.created.join(','));
      if (result.failed.length > 0) {
        throw new Error(`Could not process: ${result.failed.join(', ')}`);
      }
      break;
    }
    case 'project-sync': {
      const sync = new ProjectBoardSync(projectSyncContext(config));
      const event = IssuePayloadSchema.safeParse(await readEventPayload(config.eventPath));
      if (event.success) {
        const { number, state } = event.data.issue;
        await sync.updateIssueStatus(number, state === 'closed' ? 'closed' : 'open');
        break;
      }
      const result = await sync.syncTodoIssues();
      core.setOutput('added-items', result.added.join(','));
      if (result.failed.length > 0) {
        throw new Error(`Could not add issues to the board: ${result.failed.map(n => `#${n}`).join(', ')}`);
      }
      break;
    }
    case 'notify': {
      const sent = await new SlackNotifier(notifierContext(config)).notify(
        config.eventName,
        await readEventPayload(config.eventPath)
      );
      core.setOutput('status', sent ? 'sent' : 'skipped');
      break;
    }
  }
}

async function run() {
  const mode = core.getInput('mode') || 'dsr';
  console.log(`📋 Running mode: [${mode}]`);

  try {
    if (!isMode(mode)) {
      throw new Error(`Unknown mode: ${mode}`);
    }
    const config = await loadConfig();

    core.startGroup(`Mode ${mode}`);
    try {
      await runMode(mode, config);
    } finally {
      core.endGroup();
    }
  } catch (error) {
    console.error(error);
    core.setFailed(errorMessage(error));
  }
}

run();

export { run };
