/**
 * Project board sync component
 * Mirrors TODO issues onto a GitHub Projects (v2) board through GraphQL
 */

import { z } from 'zod';
import type { AutomationConfig } from '../shared/config.js';
import { GitHubClient, type GitHubApi, type Issue, type IssueState, type RepoContext } from '../shared/github.js';
import { TODO_ISSUE_LABEL, getCategoryFromLabels } from '../shared/labels.js';
import { errorMessage } from '../utils.js';

export const STATUS_FIELD = 'Status';
export const CATEGORY_FIELD = 'Category';
export const STATUS_OPTIONS: Record<IssueState, string> = {
  open: 'Todo',
  closed: 'Done'
};

export interface ProjectSyncContext {
  repo: RepoContext;
  token: string;
  projectNumber: number | null;
  projectOwner: string;
}

export interface ProjectSyncResult {
  added: number[];
  failed: number[];
}

const FieldSchema = z.object({
  id: z.string(),
  name: z.string(),
  dataType: z.string(),
  options: z.array(z.object({ id: z.string(), name: z.string() })).optional()
});

const ProjectResponseSchema = z.object({
  repositoryOwner: z
    .object({
      projectV2: z
        .object({
          id: z.string(),
          title: z.string(),
          fields: z.object({ nodes: z.array(FieldSchema.nullable()) })
        })
        .nullish()
    })
    .nullable()
});

const ItemsResponseSchema = z.object({
  node: z.object({
    items: z.object({
      pageInfo: z.object({ hasNextPage: z.boolean(), endCursor: z.string().nullable() }),
      nodes: z.array(
        z
          .object({
            id: z.string(),
            content: z
              .object({
                number: z.number().optional(),
                repository: z.object({ nameWithOwner: z.string() }).optional()
              })
              .nullable()
          })
          .nullable()
      )
    })
  })
});

const AddItemResponseSchema = z.object({
  addProjectV2ItemById: z.object({ item: z.object({ id: z.string() }) })
});

export type ProjectField = z.infer<typeof FieldSchema>;

export interface ProjectBoard {
  id: string;
  title: string;
  fields: ProjectField[];
}

export type FieldValue = { text: string } | { singleSelectOptionId: string };

const PROJECT_QUERY = `
  query($owner: String!, $number: Int!) {
    repositoryOwner(login: $owner) {
      ... on User { projectV2(number: $number) { ...BoardFields } }
      ... on Organization { projectV2(number: $number) { ...BoardFields } }
    }
  }
  fragment BoardFields on ProjectV2 {
    id
    title
    fields(first: 50) {
      nodes {
        ... on ProjectV2FieldCommon { id name dataType }
        ... on ProjectV2SingleSelectField { options { id name } }
      }
    }
  }
`;

const ITEMS_QUERY = `
  query($projectId: ID!, $cursor: String) {
    node(id: $projectId) {
      ... on ProjectV2 {
        items(first: 100, after: $cursor) {
          pageInfo { hasNextPage endCursor }
          nodes {
            id
            content { ... on Issue { number repository { nameWithOwner } } }
          }
        }
      }
    }
  }
`;

const ADD_ITEM_MUTATION = `
  mutation($projectId: ID!, $contentId: ID!) {
    addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
      item { id }
    }
  }
`;

const UPDATE_FIELD_MUTATION = `
  mutation($projectId: ID!, $itemId: ID!, $fieldId: ID!, $value: ProjectV2FieldValue!) {
    updateProjectV2ItemFieldValue(
      input: { projectId: $projectId, itemId: $itemId, fieldId: $fieldId, value: $value }
    ) {
      projectV2Item { id }
    }
  }
`;

function findField(board: ProjectBoard, name: string): ProjectField | undefined {
  return board.fields.find(field => field.name.toLowerCase() === name.toLowerCase());
}

/**
 * Value to write into a field: text fields take the value as is,
 * single-select fields take the option whose name matches (case-insensitive)
 */
export function resolveFieldValue(field: ProjectField, value: string): FieldValue | null {
  if (field.dataType === 'TEXT') {
    return { text: value };
  }
  if (field.dataType === 'SINGLE_SELECT') {
    const option = field.options?.find(o => o.name.toLowerCase() === value.toLowerCase());
    return option ? { singleSelectOptionId: option.id } : null;
  }
  return null;
}

/**
 * Project board sync class
 */
export class ProjectBoardSync {
  private context: ProjectSyncContext;
  private github: GitHubApi;
  private board: ProjectBoard | null = null;

  constructor(context: ProjectSyncContext, github?: GitHubApi) {
    this.context = context;
    this.github = github ?? new GitHubClient(context.token, context.repo);
  }

  get enabled(): boolean {
    return this.context.projectNumber !== null;
  }

  /**
   * Put every open TODO issue that is not on the board yet onto it
   */
  async syncTodoIssues(): Promise<ProjectSyncResult> {
    const result: ProjectSyncResult = { added: [], failed: [] };
    if (!this.enabled) {
      console.log('Project board sync is disabled');
      return result;
    }

    const board = await this.loadBoard();
    const items = await this.listBoardItems(board);
    const issues = await this.github.listOpenIssuesByLabel(TODO_ISSUE_LABEL);
    console.log(`Found ${issues.length} open TODO issues, ${items.size} issues on "${board.title}"`);

    for (const issue of issues) {
      if (items.has(issue.number)) continue;
      try {
        const itemId = await this.addItem(board, issue);
        await this.setField(board, itemId, STATUS_FIELD, STATUS_OPTIONS.open);
        const category = getCategoryFromLabels(issue.labels);
        if (category) {
          await this.setField(board, itemId, CATEGORY_FIELD, category);
        }
        result.added.push(issue.number);
        console.log(`Added #${issue.number} to "${board.title}"`);
      } catch (error) {
        result.failed.push(issue.number);
        console.error(`Failed to add #${issue.number} to the board: ${errorMessage(error)}`);
      }
    }

    return result;
  }

  /**
   * Move a TODO issue's card to Done when closed and back to Todo when reopened.
   * TODO issues not on the board are added first; other issues are left off it.
   * @returns false when board sync is disabled or the issue is not a TODO issue
   */
  async updateIssueStatus(issueNumber: number, state: IssueState): Promise<boolean> {
    if (!this.enabled) {
      console.log('Project board sync is disabled');
      return false;
    }

    const issue = await this.github.getIssue(issueNumber);
    if (!issue.labels.includes(TODO_ISSUE_LABEL)) {
      console.log(`#${issueNumber} is not a TODO issue; leaving the board alone`);
      return false;
    }

    const board = await this.loadBoard();
    const items = await this.listBoardItems(board);
    const itemId = items.get(issueNumber) ?? (await this.addItem(board, issue));

    await this.setField(board, itemId, STATUS_FIELD, STATUS_OPTIONS[state]);
    console.log(`Set #${issueNumber} to ${STATUS_OPTIONS[state]} on "${board.title}"`);
    return true;
  }

  private async loadBoard(): Promise<ProjectBoard> {
    if (this.board) {
      return this.board;
    }

    const response = ProjectResponseSchema.parse(
      await this.github.graphql(PROJECT_QUERY, {
        owner: this.context.projectOwner,
        number: this.context.projectNumber
      })
    );
    const project = response.repositoryOwner?.projectV2;
    if (!project) {
      throw new Error(`Project #${this.context.projectNumber} not found for ${this.context.projectOwner}`);
    }

    this.board = {
      id: project.id,
      title: project.title,
      fields: project.fields.nodes.filter((field): field is ProjectField => field !== null)
    };
    return this.board;
  }

  /**
   * Board item ids keyed by the number of the issue they hold, for this repository only
   */
  private async listBoardItems(board: ProjectBoard): Promise<Map<number, string>> {
    const repository = `${this.context.repo.owner}/${this.context.repo.repo}`;
    const items = new Map<number, string>();
    let cursor: string | null = null;

    do {
      const response = ItemsResponseSchema.parse(
        await this.github.graphql(ITEMS_QUERY, { projectId: board.id, cursor })
      );
      const page = response.node.items;
      for (const node of page.nodes) {
        const content = node?.content;
        if (node && content?.number !== undefined && content.repository?.nameWithOwner === repository) {
          items.set(content.number, node.id);
        }
      }
      cursor = page.pageInfo.hasNextPage ? page.pageInfo.endCursor : null;
    } while (cursor);

    return items;
  }

  private async addItem(board: ProjectBoard, issue: Issue): Promise<string> {
    const response = AddItemResponseSchema.parse(
      await this.github.graphql(ADD_ITEM_MUTATION, { projectId: board.id, contentId: issue.nodeId })
    );
    return response.addProjectV2ItemById.item.id;
  }

  private async setField(board: ProjectBoard, itemId: string, fieldName: string, value: string): Promise<void> {
    const field = findField(board, fieldName);
    if (!field) {
      console.warn(`Board "${board.title}" has no ${fieldName} field`);
      return;
    }

    const fieldValue = resolveFieldValue(field, value);
    if (!fieldValue) {
      console.warn(`No "${value}" value for the ${fieldName} field`);
      return;
    }

    await this.github.graphql(UPDATE_FIELD_MUTATION, {
      projectId: board.id,
      itemId,
      fieldId: field.id,
      value: fieldValue
    });
  }
}

export function projectSyncContext(config: AutomationConfig): ProjectSyncContext {
  return {
    repo: config.repository,
    token: config.token,
    projectNumber: config.projectNumber,
    projectOwner: config.projectOwner
  };
}
