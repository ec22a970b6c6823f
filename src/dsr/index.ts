/**
 * Daily reporter component
 * Logs the pushed branch's commits of the day into one report issue per day,
 * carrying open TODOs over from earlier reports.
 */

import type { AutomationConfig } from '../shared/config.js';
import { GitHubClient, type CommitInfo, type GitHubApi, type Issue, type RepoContext } from '../shared/github.js';
import {
  SKIP_MARKER,
  branchLabel,
  describeLabel,
  isAutomationActor
} from '../shared/labels.js';
import { formatLocalDate, getLookbackStart, isSameLocalDay } from '../shared/time.js';
import { isExcludedCommit, isMergeCommitMessage, parseCommitMessage } from '../commits/parser.js';
import { TodoList } from '../todos/index.js';
import { TodoIssueCreator } from '../todo-issues/index.js';
import {
  appendCommits,
  buildReportBody,
  buildReportTitle,
  formatCommitSection,
  isCommitLogged,
  isReportTitle,
  parseReportBody,
  type ParsedReport,
  type ReportEntry
} from './format.js';
import { upsertLatestReportLink } from './readme.js';
import { errorMessage } from '../utils.js';

const README_PATH = 'README.md';

// Daily reporter context
export interface DailyReporterContext {
  repo: RepoContext;
  token: string;
  branch: string;
  sha: string;
  actor: string;
  timezone: string;
  issuePrefix: string;
  dsrLabel: string;
  excludedPattern: RegExp | null;
  excludedTypes: string[];
  updateReadme: boolean;
  assignTodoIssues: boolean;
}

export interface DailyReportResult {
  status: 'skipped' | 'no-changes' | 'created' | 'updated';
  reason?: string;
  title?: string;
  issueNumber?: number;
  commitsLogged: number;
  todoIssues: number[];
  closedReports: number[];
}

function emptyResult(status: DailyReportResult['status'], reason?: string): DailyReportResult {
  return { status, reason, commitsLogged: 0, todoIssues: [], closedReports: [] };
}

/**
 * Daily reporter class
 */
export class DailyReporter {
  private context: DailyReporterContext;
  private github: GitHubApi;
  private todoIssues: TodoIssueCreator;

  constructor(context: DailyReporterContext, github?: GitHubApi) {
    this.context = context;
    this.github = github ?? new GitHubClient(context.token, context.repo);
    this.todoIssues = new TodoIssueCreator(
      {
        repo: context.repo,
        token: context.token,
        dsrLabel: context.dsrLabel,
        assignIssues: context.assignTodoIssues
      },
      this.github
    );
  }

  /**
   * Create or update today's report for the pushed branch
   */
  async run(now: Date = new Date()): Promise<DailyReportResult> {
    const { branch, timezone, dsrLabel } = this.context;

    const skipReason = await this.getSkipReason();
    if (skipReason) {
      console.log(`Skipping daily report: ${skipReason}`);
      return emptyResult('skipped', skipReason);
    }

    const entries = await this.collectTodayCommits(now);
    console.log(`Found ${entries.length} reportable commits on ${branch} today`);

    const title = buildReportTitle(this.context.issuePrefix, formatLocalDate(now, timezone), this.context.repo.repo);
    const reports = (await this.github.listOpenIssuesByLabel(dsrLabel)).filter(issue => isReportTitle(issue.title));
    const today = reports.find(issue => issue.title === title);
    const previous = reports.filter(issue => issue.number !== today?.number);

    const report: ParsedReport = today
      ? parseReportBody(today.body)
      : { branches: [], todos: new TodoList() };

    const newEntries: ReportEntry[] = [];
    for (const entry of entries) {
      if (isCommitLogged(report, { sha: entry.sha, title: entry.parsed.title })) {
        continue;
      }
      appendCommits(report, branch, [formatCommitSection(entry, timezone)]);
      newEntries.push(entry);
    }

    if (newEntries.length === 0) {
      console.log('No new commits to report');
      return { ...emptyResult('no-changes'), title, issueNumber: today?.number };
    }

    const todos = report.todos;
    todos.merge(TodoList.fromEntries(newEntries.flatMap(entry => entry.parsed.todos)));
    for (const issue of previous) {
      todos.merge(parseReportBody(issue.body).todos.unchecked());
    }

    const labels = [...new Set([...(today?.labels ?? []), dsrLabel, branchLabel(branch)])];
    await this.github.ensureLabels(labels.map(name => describeLabel(name, dsrLabel)));

    let issue: Issue;
    if (today) {
      issue = await this.github.updateIssue(today.number, {
        body: buildReportBody(title, report.branches, todos),
        labels
      });
      console.log(`Updated report #${issue.number}`);
    } else {
      issue = await this.github.createIssue({
        title,
        body: buildReportBody(title, report.branches, todos),
        labels
      });
      console.log(`Created report #${issue.number}`);
    }

    const todoIssues = await this.todoIssues.createFromTodos(todos, issue.number, newEntries);
    if (todoIssues.length > 0) {
      await this.github.updateIssue(issue.number, { body: buildReportBody(title, report.branches, todos) });
    }

    const closedReports = await this.closePreviousReports(previous, issue.number);

    if (this.context.updateReadme) {
      await this.updateReadmeLink(title, issue.number);
    }

    return {
      status: today ? 'updated' : 'created',
      title,
      issueNumber: issue.number,
      commitsLogged: newEntries.length,
      todoIssues: todoIssues.map(created => created.issueNumber),
      closedReports
    };
  }

  private async getSkipReason(): Promise<string | null> {
    if (isAutomationActor(this.context.actor)) {
      return `push by ${this.context.actor}`;
    }
    if (this.context.sha) {
      const head = await this.github.getCommit(this.context.sha);
      if (head.message.includes(SKIP_MARKER)) {
        return `head commit contains ${SKIP_MARKER}`;
      }
    }
    return null;
  }

  /**
   * Today's reportable commits on the branch, oldest first, merge commits
   * replaced by the commits they bring in
   */
  async collectTodayCommits(now: Date): Promise<ReportEntry[]> {
    const { branch, timezone } = this.context;
    const isToday = (commit: CommitInfo) =>
      commit.authorDate !== '' && isSameLocalDay(new Date(commit.authorDate), now, timezone);

    const listed = (await this.github.listCommitsSince(branch, getLookbackStart(now))).filter(isToday).reverse();

    const expanded: CommitInfo[] = [];
    for (const commit of listed) {
      if (commit.parents.length > 1) {
        try {
          const merged = await this.github.compareCommits(commit.parents[0], commit.sha);
          expanded.push(...merged.filter(isToday));
        } catch (error) {
          console.warn(`Could not expand merge ${commit.sha.slice(0, 7)}: ${errorMessage(error)}`);
        }
      }
      expanded.push(commit);
    }

    const seenShas = new Set<string>();
    const seenMessages = new Set<string>();
    const entries: ReportEntry[] = [];

    for (const commit of expanded) {
      const message = commit.message.trim();
      if (seenShas.has(commit.sha) || seenMessages.has(message)) continue;
      seenShas.add(commit.sha);
      seenMessages.add(message);

      if (isMergeCommitMessage(message)) continue;

      const parsed = parseCommitMessage(message);
      if (!parsed) {
        console.log(`Skipping commit ${commit.sha.slice(0, 7)}: not in [type] Title format`);
        continue;
      }
      if (isExcludedCommit(message, parsed, this.context)) {
        console.log(`Skipping excluded commit ${commit.sha.slice(0, 7)}: ${parsed.title}`);
        continue;
      }

      entries.push({
        sha: commit.sha,
        authorName: commit.authorName,
        authorLogin: commit.authorLogin,
        authorDate: new Date(commit.authorDate),
        parsed
      });
    }

    return entries;
  }

  private async closePreviousReports(previous: Issue[], currentNumber: number): Promise<number[]> {
    const closed: number[] = [];
    for (const issue of previous) {
      try {
        await this.github.addComment(
          issue.number,
          `Continued in #${currentNumber}. Unchecked todos were carried over.`
        );
        await this.github.closeIssue(issue.number);
        closed.push(issue.number);
        console.log(`Closed previous report #${issue.number}`);
      } catch (error) {
        console.error(`Failed to close previous report #${issue.number}: ${errorMessage(error)}`);
      }
    }
    return closed;
  }

  private async updateReadmeLink(title: string, issueNumber: number): Promise<void> {
    try {
      const readme = await this.github.getFileContent(README_PATH, this.context.branch);
      if (!readme) {
        console.log('No README.md found, skipping latest report link');
        return;
      }
      const updated = upsertLatestReportLink(readme.content, title, issueNumber);
      if (updated === readme.content) return;

      await this.github.updateFile(
        README_PATH,
        updated,
        `docs: link latest development status report ${SKIP_MARKER}`,
        readme.sha,
        this.context.branch
      );
      console.log('Updated latest report link in README.md');
    } catch (error) {
      console.error(`Failed to update README.md: ${errorMessage(error)}`);
    }
  }
}

export function dailyReporterContext(config: AutomationConfig): DailyReporterContext {
  return {
    repo: config.repository,
    token: config.token,
    branch: config.branch,
    sha: config.sha,
    actor: config.actor,
    timezone: config.timezone,
    issuePrefix: config.issuePrefix,
    dsrLabel: config.dsrLabel,
    excludedPattern: config.excludedPattern,
    excludedTypes: config.excludedTypes,
    updateReadme: config.updateReadme,
    assignTodoIssues: config.assignTodoIssues
  };
}
