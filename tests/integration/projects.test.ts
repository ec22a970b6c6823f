/**
 * Integration Tests for project board sync
 *
 * GraphQL requests are answered by an in-memory board
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { addIssue, createMockGitHubClient, createMockState, type MockState } from './mocks.js';
import { ProjectBoardSync, resolveFieldValue, type ProjectSyncContext } from '../../src/projects/index.js';

interface FieldUpdate {
  itemId: unknown;
  fieldId: unknown;
  value: unknown;
}

const FIELDS = [
  {
    id: 'F_status',
    name: 'Status',
    dataType: 'SINGLE_SELECT',
    options: [
      { id: 'opt_todo', name: 'Todo' },
      { id: 'opt_done', name: 'Done' }
    ]
  },
  { id: 'F_category', name: 'Category', dataType: 'TEXT' }
];

function installBoard(state: MockState, updates: FieldUpdate[], project: unknown = { id: 'PVT_1', title: 'Roadmap', fields: { nodes: FIELDS } }) {
  state.graphql = (query, variables) => {
    if (query.includes('repositoryOwner')) {
      return { repositoryOwner: { projectV2: project } };
    }
    if (query.includes('items(first')) {
      if (variables.cursor === null) {
        return {
          node: {
            items: {
              pageInfo: { hasNextPage: true, endCursor: 'cursor-1' },
              nodes: [
                { id: 'PVTI_10', content: { number: 10, repository: { nameWithOwner: 'test/repo' } } },
                { id: 'PVTI_other', content: { number: 11, repository: { nameWithOwner: 'other/repo' } } }
              ]
            }
          }
        };
      }
      return {
        node: {
          items: {
            pageInfo: { hasNextPage: false, endCursor: null },
            nodes: [{ id: 'PVTI_draft', content: {} }, null]
          }
        }
      };
    }
    if (query.includes('addProjectV2ItemById')) {
      return { addProjectV2ItemById: { item: { id: `PVTI_${String(variables.contentId)}` } } };
    }
    if (query.includes('updateProjectV2ItemFieldValue')) {
      updates.push({ itemId: variables.itemId, fieldId: variables.fieldId, value: variables.value });
      return { updateProjectV2ItemFieldValue: { projectV2Item: { id: variables.itemId } } };
    }
    throw new Error(`Unexpected query: ${query}`);
  };
}

describe('ProjectBoardSync', () => {
  let state: MockState;
  let updates: FieldUpdate[];

  beforeEach(() => {
    state = createMockState();
    updates = [];
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  function context(projectNumber: number | null = 5): ProjectSyncContext {
    return { repo: state.repo, token: 'test-token', projectNumber, projectOwner: 'test' };
  }

  it('should add TODO issues missing from the board with status and category', async () => {
    installBoard(state, updates);
    addIssue(state, { number: 10, title: '[Backend] On board', labels: ['todo-generated', 'category:backend'] });
    addIssue(state, { number: 11, title: '[Frontend] New', labels: ['todo-generated', 'category:frontend'] });
    addIssue(state, { number: 12, title: '[General] Plain', labels: ['todo-generated'] });
    addIssue(state, { number: 13, title: 'Not a TODO', labels: ['bug'] });
    const github = createMockGitHubClient(state);

    const result = await new ProjectBoardSync(context(), github).syncTodoIssues();

    expect(result).toEqual({ added: [12, 11], failed: [] });
    expect(updates).toEqual([
      { itemId: 'PVTI_I_12', fieldId: 'F_status', value: { singleSelectOptionId: 'opt_todo' } },
      { itemId: 'PVTI_I_11', fieldId: 'F_status', value: { singleSelectOptionId: 'opt_todo' } },
      { itemId: 'PVTI_I_11', fieldId: 'F_category', value: { text: 'frontend' } }
    ]);
  });

  it('should record issues that could not be added and continue', async () => {
    installBoard(state, updates);
    addIssue(state, { number: 11, title: '[Frontend] New', labels: ['todo-generated'] });
    addIssue(state, { number: 12, title: '[General] Plain', labels: ['todo-generated'] });
    const github = createMockGitHubClient(state);
    const handler = state.graphql;
    state.graphql = (query, variables) => {
      if (query.includes('addProjectV2ItemById') && variables.contentId === 'I_12') {
        throw new Error('Failed to run GraphQL request: forbidden');
      }
      return handler(query, variables);
    };

    const result = await new ProjectBoardSync(context(), github).syncTodoIssues();

    expect(result).toEqual({ added: [11], failed: [12] });
  });

  it('should move cards by issue state, adding issues that are not on the board', async () => {
    installBoard(state, updates);
    addIssue(state, { number: 10, title: '[Backend] On board', state: 'closed', labels: ['todo-generated'] });
    addIssue(state, { number: 13, title: '[General] Reopened', labels: ['todo-generated'] });
    const github = createMockGitHubClient(state);
    const sync = new ProjectBoardSync(context(), github);

    expect(await sync.updateIssueStatus(10, 'closed')).toBe(true);
    expect(await sync.updateIssueStatus(13, 'open')).toBe(true);

    expect(updates).toEqual([
      { itemId: 'PVTI_10', fieldId: 'F_status', value: { singleSelectOptionId: 'opt_done' } },
      { itemId: 'PVTI_I_13', fieldId: 'F_status', value: { singleSelectOptionId: 'opt_todo' } }
    ]);
    expect(github.graphql.mock.calls.filter(([query]) => query.includes('repositoryOwner'))).toHaveLength(1);
  });

  it('should keep reports and proposals off the board', async () => {
    installBoard(state, updates);
    addIssue(state, { number: 7, title: '📅 Development Status Report (2024-03-05) - repo', state: 'closed', labels: ['DSR'] });
    addIssue(state, { number: 8, title: '[repo] Search indexing', labels: ['✅ Approved'] });
    const github = createMockGitHubClient(state);
    const sync = new ProjectBoardSync(context(), github);

    expect(await sync.updateIssueStatus(7, 'closed')).toBe(false);
    expect(await sync.updateIssueStatus(8, 'open')).toBe(false);
    expect(github.graphql).not.toHaveBeenCalled();
    expect(updates).toEqual([]);
  });

  it('should do nothing without a project number', async () => {
    const github = createMockGitHubClient(state);
    const sync = new ProjectBoardSync(context(null), github);

    expect(sync.enabled).toBe(false);
    expect(await sync.syncTodoIssues()).toEqual({ added: [], failed: [] });
    expect(await sync.updateIssueStatus(1, 'closed')).toBe(false);
    expect(github.graphql).not.toHaveBeenCalled();
  });

  it('should fail when the project does not exist', async () => {
    installBoard(state, updates, null);
    const github = createMockGitHubClient(state);

    await expect(new ProjectBoardSync(context(), github).syncTodoIssues()).rejects.toThrow(
      'Project #5 not found for test'
    );
  });
});

describe('resolveFieldValue', () => {
  it('should map values onto text and single-select fields', () => {
    const select = { id: 'F', name: 'Category', dataType: 'SINGLE_SELECT', options: [{ id: 'o1', name: 'Backend' }] };

    expect(resolveFieldValue(select, 'backend')).toEqual({ singleSelectOptionId: 'o1' });
    expect(resolveFieldValue(select, 'frontend')).toBeNull();
    expect(resolveFieldValue({ id: 'T', name: 'Notes', dataType: 'TEXT' }, 'x')).toEqual({ text: 'x' });
    expect(resolveFieldValue({ id: 'I', name: 'Sprint', dataType: 'ITERATION' }, 'x')).toBeNull();
  });
});
