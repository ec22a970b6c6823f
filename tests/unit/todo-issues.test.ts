/**
 * Unit tests for TODO issue creation
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  TodoIssueCreator,
  buildTodoIssueBody,
  buildTodoIssueTitle,
  getTodoIssueLabels,
  getTodoPriority
} from '../../src/todo-issues/index.js';
import { parseCommitMessage } from '../../src/commits/parser.js';
import { TodoList } from '../../src/todos/index.js';
import type { ReportEntry } from '../../src/dsr/format.js';
import { addIssue, createMockGitHubClient, createMockState, type MockState } from '../integration/mocks.js';

function sourceEntry(): ReportEntry {
  const parsed = parseCommitMessage('[feat] Add search\n\n[Todo]\n@Backend\n- (issue) Cache results');
  if (!parsed) throw new Error('unparseable test message');
  return {
    sha: 'abcdef1234567890',
    authorName: 'Jane Doe',
    authorLogin: 'jane',
    authorDate: new Date('2024-03-05T01:00:00Z'),
    parsed
  };
}

describe('TODO issue helpers', () => {
  it('should derive priority from category then text', () => {
    expect(getTodoPriority('Security', 'anything')).toBe('high');
    expect(getTodoPriority('Backend', 'fix vulnerability in parser')).toBe('high');
    expect(getTodoPriority('API', 'add endpoint')).toBe('medium');
    expect(getTodoPriority('Backend', 'optimize query')).toBe('medium');
    expect(getTodoPriority('Cleanup', 'remove files')).toBe('low');
    expect(getTodoPriority('Backend', 'add endpoint')).toBeNull();
  });

  it('should truncate long titles', () => {
    expect(buildTodoIssueTitle('Backend', 'Cache results')).toBe('[Backend] Cache results');
    expect(buildTodoIssueTitle('A', 'x'.repeat(81))).toBe(`[A] ${'x'.repeat(80)}...`);
  });

  it('should label by category and priority', () => {
    expect(getTodoIssueLabels('Backend', 'Cache results')).toEqual(['todo-generated', 'category:backend']);
    expect(getTodoIssueLabels('Testing', 'more cases')).toEqual([
      'todo-generated',
      'category:testing',
      'priority:medium'
    ]);
  });

  it('should describe where the item came from', () => {
    expect(buildTodoIssueBody('Backend', 'Cache results', 3, sourceEntry())).toBe(
      [
        '## 📝 Task Description',
        '',
        'Cache results',
        '',
        '## 🔗 Context',
        '',
        '- **Category:** `Backend`',
        '- **Daily report:** #3',
        '- **Source commit:** [feat] Add search (`abcdef1`)',
        '- **Author:** @jane',
        '',
        '---',
        '',
        '_Generated from a commit TODO item. Closing this issue checks the item in the daily report._'
      ].join('\n')
    );
  });
});

describe('TodoIssueCreator', () => {
  let state: MockState;

  beforeEach(() => {
    state = createMockState();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  function creator(assignIssues = true) {
    const github = createMockGitHubClient(state);
    return {
      github,
      instance: new TodoIssueCreator(
        { repo: state.repo, token: 'test-token', dsrLabel: 'DSR', assignIssues },
        github
      )
    };
  }

  it('should create, assign and link an issue per request', async () => {
    addIssue(state, { number: 3, title: 'report', labels: ['DSR'] });
    const todos = new TodoList();
    todos.add('Backend', { text: 'Cache results', requestIssue: true });
    todos.add('Backend', { text: 'Plain item' });
    const { instance } = creator();

    const created = await instance.createFromTodos(todos, 3, [sourceEntry()]);

    expect(created).toEqual([{ category: 'Backend', text: 'Cache results', issueNumber: 4, reused: false }]);
    expect(state.issues.get(4)?.labels).toEqual(['todo-generated', 'category:backend']);
    expect(state.issues.get(4)?.assignees).toEqual(['jane']);
    expect(state.comments.get(3)).toEqual(['Created issue #4 from todo item: Cache results']);
    expect(todos.render()).toContain('- [ ] Cache results (#4)');
  });

  it('should reuse an open issue with the same title', async () => {
    addIssue(state, { number: 3, title: 'report', labels: ['DSR'] });
    addIssue(state, { number: 9, title: '[Backend] Cache results', labels: ['todo-generated'] });
    const todos = new TodoList();
    todos.add('Backend', { text: 'Cache results', requestIssue: true });
    const { github, instance } = creator();

    const created = await instance.createFromTodos(todos, 3, []);

    expect(created).toEqual([{ category: 'Backend', text: 'Cache results', issueNumber: 9, reused: true }]);
    expect(github.createIssue).not.toHaveBeenCalled();
    expect(todos.render()).toContain('- [ ] Cache results (#9)');
  });

  it('should keep going when one issue fails and skip assignment when disabled', async () => {
    addIssue(state, { number: 3, title: 'report', labels: ['DSR'] });
    const todos = new TodoList();
    todos.add('Backend', { text: 'First', requestIssue: true });
    todos.add('Backend', { text: 'Second', requestIssue: true });
    const { github, instance } = creator(false);
    github.createIssue.mockRejectedValueOnce(new Error('Failed to create issue "[Backend] First": boom'));

    const created = await instance.createFromTodos(todos, 3, [sourceEntry()]);

    expect(created.map(c => c.text)).toEqual(['Second']);
    expect(github.addAssignees).not.toHaveBeenCalled();
    expect(todos.pendingIssueRequests().map(r => r.item.text)).toEqual(['First']);
  });
});
