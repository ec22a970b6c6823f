/**
 * Unit tests for approval helpers and the progress report
 */

import { describe, it, expect, vi } from 'vitest';
import {
  TASK_TABLE_HEADER,
  TASK_TABLE_SEPARATOR,
  buildProgressSection,
  buildReportTemplate,
  buildTaskRow,
  calculateProgress,
  findCompletedTasks,
  getTaskDuration,
  getTaskName,
  insertTaskRow,
  markTaskCompleted,
  resolveDecision,
  resolveTaskCategory,
  taskCategoryName,
  updateProgressSection
} from '../../src/approval/index.js';
import type { Issue } from '../../src/shared/github.js';

const GANTT_BODY = [
  '## 5. Schedule',
  '',
  '```mermaid',
  'gantt',
  '    title Task Implementation Schedule',
  '    dateFormat YYYY-MM-DD',
  '    section Development',
  '    Design :2024-03-04, 3d',
  '    Build :2024-03-07, 5d',
  '```',
  '',
  'Later: 10d'
].join('\n');

function task(overrides: Partial<Issue> = {}): Issue {
  return {
    number: 7,
    title: '[repo] Search indexing',
    body: GANTT_BODY,
    state: 'open',
    labels: [],
    assignees: [],
    url: 'https://github.com/test/repo/issues/7',
    nodeId: 'I_7',
    createdAt: '2024-03-01T00:00:00Z',
    ...overrides
  };
}

const ROW_7 = '| [TSK-7](https://github.com/test/repo/issues/7) | Search indexing | TBD | 8d | - | 🟡 In Progress | - |';

describe('labels', () => {
  it('should resolve the strongest decision', () => {
    expect(resolveDecision(['⏸️ On Hold', '❌ Rejected'])).toBe('rejected');
    expect(resolveDecision(['❌ Rejected', '✅ Approved'])).toBe('approved');
    expect(resolveDecision(['⏸️ On Hold'])).toBe('on-hold');
    expect(resolveDecision(['bug'])).toBeNull();
  });

  it('should resolve the task category with a default', () => {
    expect(resolveTaskCategory(['bug', '📚 Documentation'])).toBe('📚 Documentation');
    expect(resolveTaskCategory([])).toBe('🔧 Development');
    expect(taskCategoryName('🛠️ Maintenance')).toBe('Maintenance');
    expect(taskCategoryName('🔍 QA/Testing')).toBe('QA/Testing');
  });
});

describe('task rows', () => {
  it('should sum gantt durations only', () => {
    expect(getTaskDuration(GANTT_BODY)).toBe('8d');
    expect(getTaskDuration('no chart')).toBe('0d');
  });

  it('should strip the project prefix from the task name', () => {
    expect(getTaskName('[repo] Search indexing')).toBe('Search indexing');
    expect(getTaskName('Plain title')).toBe('Plain title');
  });

  it('should build a row with assignees or TBD', () => {
    expect(buildTaskRow(task())).toBe(ROW_7);
    expect(buildTaskRow(task({ assignees: ['jane', 'kim'] }))).toContain('| Search indexing | jane, kim | 8d |');
  });

  it('should add rows to the right category and replace rows of the same task', () => {
    const template = buildReportTemplate('repo', '2024-03-05');
    const once = insertTaskRow(template, '🎨 UI/UX', ROW_7);

    expect(once).toContain(
      `<summary><h3>🎨 UI/UX</h3></summary>\n\n${TASK_TABLE_HEADER}\n${TASK_TABLE_SEPARATOR}\n${ROW_7}\n\n</details>`
    );

    const replacement = ROW_7.replace('TBD', 'jane');
    const twice = insertTaskRow(once, '🎨 UI/UX', replacement);
    expect(twice).toBe(once.replace(ROW_7, replacement));
  });

  it('should leave the body alone when the category is missing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(insertTaskRow('no tables here', '🎨 UI/UX', ROW_7)).toBe('no tables here');
    expect(warn).toHaveBeenCalledWith('Category section not found: 🎨 UI/UX');
    warn.mockRestore();
  });
});

describe('progress', () => {
  it('should count task rows by status', () => {
    const body = [ROW_7, ROW_7.replace('TSK-7', 'TSK-8').replace('| - | 🟡 In Progress |', '| 2h | ✅ Completed |'), '| - | - | - |'].join('\n');
    expect(calculateProgress(body)).toEqual({ completed: 1, inProgress: 1, total: 2 });
  });

  it('should render percentages with one decimal', () => {
    expect(buildProgressSection({ completed: 1, inProgress: 2, total: 3 })).toBe(
      [
        '### Overall Progress',
        '',
        'Progress Status: 1/3 completed (33.3%)',
        '',
        '```mermaid',
        'pie title Task Progress Status',
        '    "Completed" : 33.3',
        '    "In Progress" : 66.7',
        '```'
      ].join('\n')
    );
  });

  it('should refresh the progress section of a report', () => {
    const body = updateProgressSection(insertTaskRow(buildReportTemplate('repo', '2024-03-05'), '🔧 Development', ROW_7));
    expect(body).toContain(
      'Progress Status: 0/1 completed (0.0%)\n\n```mermaid\npie title Task Progress Status\n    "Completed" : 0.0\n    "In Progress" : 100.0\n```\n\n## 📝 Issues and Risks'
    );
  });
});

describe('completions', () => {
  it('should find checked items with a task id and time spent', () => {
    const body = [
      '- [x] [TSK-7] Search indexing (spent: 6h) (#7)',
      '- [ ] [TSK-8] Not done (spent: 1h)',
      '- [x] [TSK-9] No time recorded',
      '- [X] TSK-10 upper case (spent: 12h)'
    ].join('\n');

    expect(findCompletedTasks(body)).toEqual([
      { taskNumber: 7, spent: '6h' },
      { taskNumber: 10, spent: '12h' }
    ]);
  });

  it('should mark only in-progress rows completed', () => {
    expect(markTaskCompleted(ROW_7, 7, '6h')).toBe(
      '| [TSK-7](https://github.com/test/repo/issues/7) | Search indexing | TBD | 8d | 6h | ✅ Completed | - |'
    );
    expect(markTaskCompleted(ROW_7, 8, '6h')).toBe(ROW_7);
  });
});
