/**
 * Integration Tests for proposal approval
 *
 * Approve a proposal, then report its completion from the daily report
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { addIssue, createMockGitHubClient, createMockState, type MockState } from './mocks.js';
import { ApprovalProcessor } from '../../src/approval/index.js';
import { buildReportBody, parseReportBody } from '../../src/dsr/format.js';
import { TodoList } from '../../src/todos/index.js';

const NOW = new Date('2024-03-05T03:00:00Z');
const DSR_TITLE = '📅 Development Status Report (2024-03-05) - repo';
const APPROVED = { action: 'labeled', label: '✅ Approved' };
const EDITED = { action: 'edited' };
const PROPOSAL_BODY = [
  '## 5. Schedule',
  '',
  '```mermaid',
  'gantt',
  '    title Task Implementation Schedule',
  '    dateFormat YYYY-MM-DD',
  '    section Development',
  '    Design :2024-03-04, 3d',
  '    Build :2024-03-07, 5d',
  '```'
].join('\n');

describe('ApprovalProcessor', () => {
  let state: MockState;

  beforeEach(() => {
    state = createMockState();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  function processor() {
    const github = createMockGitHubClient(state);
    return new ApprovalProcessor(
      { repo: state.repo, token: 'test-token', dsrLabel: 'DSR', timezone: 'Asia/Seoul' },
      github
    );
  }

  it('should add an approved task to the progress report and the daily report', async () => {
    addIssue(state, {
      number: 1,
      title: '[repo] Search indexing',
      body: PROPOSAL_BODY,
      labels: ['✅ Approved', '🎨 UI/UX'],
      assignees: ['jane']
    });
    addIssue(state, { number: 2, title: DSR_TITLE, body: buildReportBody(DSR_TITLE, [], new TodoList()), labels: ['DSR'] });

    const result = await processor().process(1, APPROVED, NOW);

    expect(result).toEqual({ action: 'approved', reportNumber: 3, completedTasks: [] });

    const report = state.issues.get(3);
    expect(report?.title).toBe('[repo] Project Progress Report');
    expect(report?.labels).toEqual(['📊 In Progress']);
    expect(report?.body).toContain('**Report Date**: 2024-03-05');
    expect(report?.body).toContain(
      '| [TSK-1](https://github.com/test/repo/issues/1) | Search indexing | jane | 8d | - | 🟡 In Progress | - |'
    );
    expect(report?.body).toContain('Progress Status: 0/1 completed (0.0%)');
    expect(state.comments.get(3)).toEqual(['✅ Task #1 has been added to the 🎨 UI/UX category.']);

    const daily = parseReportBody(state.issues.get(2)?.body ?? '');
    expect(daily.todos.getCategories()).toEqual([
      {
        name: 'UI/UX',
        items: [{ text: '[TSK-1] Search indexing', checked: false, issueNumber: 1, requestIssue: false }]
      }
    ]);
    expect(state.comments.get(2)).toEqual(['New task has been added: [TSK-1] Search indexing (#1)']);
    expect(state.comments.get(1)).toEqual(['✅ Task has been approved and added to the report.']);
  });

  it('should mark tasks completed from checked daily report items', async () => {
    addIssue(state, { number: 1, title: '[repo] Search indexing', body: PROPOSAL_BODY, labels: ['✅ Approved'] });
    const approval = processor();
    await approval.process(1, APPROVED, NOW);

    addIssue(state, {
      number: 4,
      title: DSR_TITLE,
      body: '- [x] [TSK-1] Search indexing (spent: 6h) (#1)',
      labels: ['DSR']
    });
    const result = await approval.process(4, EDITED, NOW);

    expect(result).toEqual({ action: 'completions', reportNumber: 2, completedTasks: [1] });
    expect(state.issues.get(2)?.body).toContain('| 8d | 6h | ✅ Completed | - |');
    expect(state.issues.get(2)?.body).toContain('Progress Status: 1/1 completed (100.0%)');
    expect(state.comments.get(2)).toEqual([
      '✅ Task #1 has been added to the 🔧 Development category.',
      '✅ Task TSK-1 has been completed. (Time spent: 6h)'
    ]);

    const again = await approval.process(4, EDITED, NOW);
    expect(again).toEqual({ action: 'none', reportNumber: 2, completedTasks: [] });
  });

  it('should only comment on rejected and held proposals', async () => {
    addIssue(state, { number: 1, title: '[repo] Rejected idea', labels: ['❌ Rejected'] });
    addIssue(state, { number: 2, title: '[repo] Held idea', labels: ['⏸️ On Hold'] });
    addIssue(state, { number: 3, title: 'Unrelated', labels: ['bug'] });
    const approval = processor();

    expect(await approval.process(1, { action: 'labeled', label: '❌ Rejected' }, NOW)).toEqual({
      action: 'rejected',
      reportNumber: undefined,
      completedTasks: []
    });
    expect(await approval.process(2, { action: 'labeled', label: '⏸️ On Hold' }, NOW)).toEqual({
      action: 'on-hold',
      reportNumber: undefined,
      completedTasks: []
    });
    expect(await approval.process(3, { action: 'labeled', label: 'bug' }, NOW)).toEqual({
      action: 'none',
      completedTasks: []
    });

    expect(state.comments.get(1)).toEqual(['❌ Task has been rejected. Please revise and resubmit.']);
    expect(state.comments.get(2)).toEqual(['⏸️ Task has been put on hold. Further discussion needed.']);
    expect(state.comments.has(3)).toBe(false);
    expect(state.issues.size).toBe(3);
  });

  it('should ignore edits and unrelated labels on an approved proposal', async () => {
    addIssue(state, { number: 1, title: '[repo] Search indexing', body: PROPOSAL_BODY, labels: ['✅ Approved'] });
    const approval = processor();
    await approval.process(1, APPROVED, NOW);

    expect(await approval.process(1, EDITED, NOW)).toEqual({ action: 'none', completedTasks: [] });
    expect(await approval.process(1, { action: 'labeled', label: 'bug' }, NOW)).toEqual({
      action: 'none',
      completedTasks: []
    });

    expect(state.comments.get(1)).toEqual(['✅ Task has been approved and added to the report.']);
    expect(state.comments.get(2)).toEqual(['✅ Task #1 has been added to the 🔧 Development category.']);
  });

  it('should only scan reports for completions when they are edited', async () => {
    addIssue(state, {
      number: 4,
      title: DSR_TITLE,
      body: '- [x] [TSK-1] Search indexing (spent: 6h) (#1)',
      labels: ['DSR']
    });
    const github = createMockGitHubClient(state);
    const approval = new ApprovalProcessor(
      { repo: state.repo, token: 'test-token', dsrLabel: 'DSR', timezone: 'Asia/Seoul' },
      github
    );

    expect(await approval.process(4, { action: 'labeled', label: 'DSR' }, NOW)).toEqual({
      action: 'none',
      completedTasks: []
    });
    expect(github.listOpenIssuesByLabel).not.toHaveBeenCalled();
  });
});
