/**
 * TODO issue creator
 * Turns "(issue)" TODO items into GitHub issues and links them back into the report
 */

import { GitHubClient, type GitHubApi, type RepoContext } from '../shared/github.js';
import {
  TODO_ISSUE_LABEL,
  categoryLabel,
  describeLabel,
  priorityLabel,
  type Priority
} from '../shared/labels.js';
import { shortSha, type ReportEntry } from '../dsr/format.js';
import type { PendingIssueRequest, TodoList } from '../todos/index.js';
import { errorMessage } from '../utils.js';

const MAX_TITLE_TASK_LENGTH = 80;

export interface TodoIssueContext {
  repo: RepoContext;
  token: string;
  dsrLabel: string;
  assignIssues: boolean;
}

export interface CreatedTodoIssue {
  category: string;
  text: string;
  issueNumber: number;
  reused: boolean;
}

const HIGH_PRIORITY_CATEGORIES = ['security', 'critical', 'bugfix'];
const MEDIUM_PRIORITY_CATEGORIES = ['performance', 'testing', 'api'];
const LOW_PRIORITY_CATEGORIES = ['documentation', 'cleanup', 'maintenance'];

/**
 * Priority from the category name first, then keywords in the task text
 */
export function getTodoPriority(category: string, text: string): Priority | null {
  const cat = category.toLowerCase();
  const task = text.toLowerCase();

  if (HIGH_PRIORITY_CATEGORIES.includes(cat) ||
      ['urgent', 'critical', 'security', 'vulnerability'].some(word => task.includes(word))) {
    return 'high';
  }
  if (MEDIUM_PRIORITY_CATEGORIES.includes(cat) ||
      ['performance', 'optimize', 'test', 'important'].some(word => task.includes(word))) {
    return 'medium';
  }
  if (LOW_PRIORITY_CATEGORIES.includes(cat)) {
    return 'low';
  }
  return null;
}

export function buildTodoIssueTitle(category: string, text: string): string {
  const task = text.length > MAX_TITLE_TASK_LENGTH ? `${text.slice(0, MAX_TITLE_TASK_LENGTH)}...` : text;
  return `[${category}] ${task}`;
}

export function getTodoIssueLabels(category: string, text: string): string[] {
  const labels = [TODO_ISSUE_LABEL, categoryLabel(category)];
  const priority = getTodoPriority(category, text);
  if (priority) {
    labels.push(priorityLabel(priority));
  }
  return labels;
}

export function buildTodoIssueBody(
  category: string,
  text: string,
  reportNumber: number,
  source?: ReportEntry
): string {
  const lines = [
    '## 📝 Task Description',
    '',
    text,
    '',
    '## 🔗 Context',
    '',
    `- **Category:** \`${category}\``,
    `- **Daily report:** #${reportNumber}`
  ];

  if (source) {
    lines.push(`- **Source commit:** [${source.parsed.type}] ${source.parsed.title} (\`${shortSha(source.sha)}\`)`);
    if (source.authorLogin) {
      lines.push(`- **Author:** @${source.authorLogin}`);
    }
  }

  lines.push(
    '',
    '---',
    '',
    '_Generated from a commit TODO item. Closing this issue checks the item in the daily report._'
  );
  return lines.join('\n');
}

/**
 * The commit whose [Todo] section carried the item
 */
export function findSourceEntry(request: PendingIssueRequest, entries: ReportEntry[]): ReportEntry | undefined {
  const category = request.category.toLowerCase();
  return entries.find(entry =>
    entry.parsed.todos.some(
      todo => todo.category.toLowerCase() === category && todo.text === request.item.text
    )
  );
}

export class TodoIssueCreator {
  private context: TodoIssueContext;
  private github: GitHubApi;

  constructor(context: TodoIssueContext, github?: GitHubApi) {
    this.context = context;
    this.github = github ?? new GitHubClient(context.token, context.repo);
  }

  /**
   * Create (or reuse) an issue for every pending request and link it in the list.
   * One failing item does not stop the others.
   */
  async createFromTodos(todos: TodoList, reportNumber: number, entries: ReportEntry[]): Promise<CreatedTodoIssue[]> {
    const requests = todos.pendingIssueRequests();
    if (requests.length === 0) {
      return [];
    }

    console.log(`Creating issues for ${requests.length} TODO items`);
    const existing = await this.github.listOpenIssuesByLabel(TODO_ISSUE_LABEL);
    const created: CreatedTodoIssue[] = [];

    for (const request of requests) {
      const { category } = request;
      const { text } = request.item;
      const title = buildTodoIssueTitle(category, text);

      try {
        const match = existing.find(issue => issue.title === title);
        if (match) {
          console.log(`Reusing issue #${match.number} for TODO: ${text}`);
          todos.linkIssue(category, text, match.number);
          created.push({ category, text, issueNumber: match.number, reused: true });
          continue;
        }

        const source = findSourceEntry(request, entries);
        const labels = getTodoIssueLabels(category, text);
        await this.github.ensureLabels(labels.map(name => describeLabel(name, this.context.dsrLabel)));

        const issue = await this.github.createIssue({
          title,
          body: buildTodoIssueBody(category, text, reportNumber, source),
          labels
        });
        existing.push(issue);
        console.log(`Created issue #${issue.number} for TODO: ${text}`);

        if (this.context.assignIssues && source?.authorLogin) {
          try {
            await this.github.addAssignees(issue.number, [source.authorLogin]);
          } catch (error) {
            console.warn(errorMessage(error));
          }
        }

        await this.github.addComment(reportNumber, `Created issue #${issue.number} from todo item: ${text}`);
        todos.linkIssue(category, text, issue.number);
        created.push({ category, text, issueNumber: issue.number, reused: false });
      } catch (error) {
        console.error(`Failed to create issue for TODO "${text}": ${errorMessage(error)}`);
      }
    }

    return created;
  }
}
