/**
 * Approval processor component
 * Reacts to approval labels on task proposals and keeps the project progress report
 */

import type { AutomationConfig } from '../shared/config.js';
import { GitHubClient, type GitHubApi, type Issue, type RepoContext } from '../shared/github.js';
import {
  APPROVAL_LABELS,
  DEFAULT_TASK_CATEGORY,
  REPORT_LABEL,
  TASK_CATEGORIES,
  describeLabel,
  isApprovalLabel,
  isTaskCategory,
  type TaskCategory
} from '../shared/labels.js';
import { buildReportBody, getReportDate, isReportTitle, parseReportBody } from '../dsr/format.js';
import type { IssuePayload } from '../shared/payload.js';
import { formatLocalDate } from '../shared/time.js';
import { errorMessage } from '../utils.js';

export type Decision = 'approved' | 'rejected' | 'on-hold';

export interface ApprovalContext {
  repo: RepoContext;
  token: string;
  dsrLabel: string;
  timezone: string;
}

export interface ApprovalResult {
  action: Decision | 'completions' | 'none';
  reportNumber?: number;
  completedTasks: number[];
}

/**
 * The issues event that triggered a run
 */
export interface ApprovalTrigger {
  action: string;
  label?: string;
}

export interface TaskCompletion {
  taskNumber: number;
  spent: string;
}

export interface ProgressStats {
  completed: number;
  inProgress: number;
  total: number;
}

export const TASK_TABLE_HEADER = '| Task ID | Task Name | Assignee | Expected Time | Actual Time | Status | Priority |';
export const TASK_TABLE_SEPARATOR = '| ------- | --------- | -------- | ------------- | ----------- | ------ | -------- |';

const IN_PROGRESS = '🟡 In Progress';
const COMPLETED = '✅ Completed';
const PROGRESS_HEADER = '### Overall Progress';
const ISSUES_HEADER = '## 📝 Issues';

const DECISION_COMMENTS: Record<Decision, string> = {
  approved: '✅ Task has been approved and added to the report.',
  rejected: '❌ Task has been rejected. Please revise and resubmit.',
  'on-hold': '⏸️ Task has been put on hold. Further discussion needed.'
};

export function resolveDecision(labels: string[]): Decision | null {
  if (labels.includes(APPROVAL_LABELS.APPROVED)) return 'approved';
  if (labels.includes(APPROVAL_LABELS.REJECTED)) return 'rejected';
  if (labels.includes(APPROVAL_LABELS.ON_HOLD)) return 'on-hold';
  return null;
}

export function approvalTrigger(payload: IssuePayload): ApprovalTrigger {
  return { action: payload.action, label: payload.label?.name };
}

export function resolveTaskCategory(labels: string[]): TaskCategory {
  return labels.find(isTaskCategory) ?? DEFAULT_TASK_CATEGORY;
}

/**
 * "🔧 Development" → "Development"
 */
export function taskCategoryName(category: TaskCategory): string {
  return category.slice(category.indexOf(' ') + 1);
}

/**
 * Task name from a "[project] Task name" proposal title
 */
export function getTaskName(title: string): string {
  return title.replace(/^\[[^\]]*\]\s*/, '');
}

export function buildReportTitle(repo: string): string {
  return `[${repo}] Project Progress Report`;
}

/**
 * Sum of the "Nd" durations in the proposal's gantt chart
 */
export function getTaskDuration(body: string): string {
  let days = 0;
  let inGantt = false;

  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === 'gantt') {
      inGantt = true;
      continue;
    }
    if (!inGantt || !line) continue;
    if (line.startsWith('```')) {
      inGantt = false;
      continue;
    }
    if (/^(title|dateFormat|section)\b/.test(line) || !line.includes(':')) continue;

    const duration = line.split(',').pop()?.trim() ?? '';
    const match = duration.match(/^(\d+)d$/);
    if (match) {
      days += parseInt(match[1], 10);
    }
  }

  return `${days}d`;
}

export function buildTaskRow(issue: Issue): string {
  const assignees = issue.assignees.length > 0 ? issue.assignees.join(', ') : 'TBD';
  return `| [TSK-${issue.number}](${issue.url}) | ${getTaskName(issue.title)} | ${assignees} | ${getTaskDuration(issue.body)} | - | ${IN_PROGRESS} | - |`;
}

/**
 * Add a row to a category's table, replacing the row of the same task
 * @returns the body unchanged when the category table is missing
 */
export function insertTaskRow(body: string, category: TaskCategory, row: string): string {
  const categoryStart = body.indexOf(`<h3>${category}</h3>`);
  if (categoryStart === -1) {
    console.warn(`Category section not found: ${category}`);
    return body;
  }
  const headerPos = body.indexOf(TASK_TABLE_HEADER, categoryStart);
  const tableEnd = headerPos === -1 ? -1 : body.indexOf('</details>', headerPos);
  if (tableEnd === -1) {
    console.warn(`Task table not found: ${category}`);
    return body;
  }

  const lines = body.slice(headerPos, tableEnd).trim().split('\n');
  const taskId = row.match(/\[TSK-(\d+)\]/)?.[0];
  const existing = taskId ? lines.findIndex(line => line.includes(taskId)) : -1;

  if (existing !== -1) {
    lines[existing] = row;
  } else if (lines.length >= 2) {
    lines.push(row);
  } else {
    lines.splice(0, lines.length, TASK_TABLE_HEADER, TASK_TABLE_SEPARATOR, row);
  }

  return `${body.slice(0, headerPos)}${lines.join('\n')}\n\n${body.slice(tableEnd)}`;
}

export function calculateProgress(body: string): ProgressStats {
  const stats: ProgressStats = { completed: 0, inProgress: 0, total: 0 };
  for (const line of body.split('\n')) {
    if (!line.trim().startsWith('|') || !line.includes('[TSK-')) continue;
    stats.total++;
    if (line.includes(COMPLETED)) stats.completed++;
    else if (line.includes(IN_PROGRESS)) stats.inProgress++;
  }
  return stats;
}

export function buildProgressSection(stats: ProgressStats): string {
  if (stats.total === 0) {
    return [
      PROGRESS_HEADER,
      '',
      '```mermaid',
      'pie title Task Progress Status',
      '    "In Progress" : 0',
      '    "Completed" : 0',
      '```'
    ].join('\n');
  }

  const completed = ((stats.completed / stats.total) * 100).toFixed(1);
  const inProgress = ((stats.inProgress / stats.total) * 100).toFixed(1);
  return [
    PROGRESS_HEADER,
    '',
    `Progress Status: ${stats.completed}/${stats.total} completed (${completed}%)`,
    '',
    '```mermaid',
    'pie title Task Progress Status',
    `    "Completed" : ${completed}`,
    `    "In Progress" : ${inProgress}`,
    '```'
  ].join('\n');
}

/**
 * Recompute the progress chart from the task tables
 */
export function updateProgressSection(body: string): string {
  const start = body.indexOf(PROGRESS_HEADER);
  const end = start === -1 ? -1 : body.indexOf(ISSUES_HEADER, start);
  if (end === -1) {
    console.warn('Progress section not found');
    return body;
  }
  return `${body.slice(0, start)}${buildProgressSection(calculateProgress(body))}\n\n${body.slice(end)}`;
}

export function buildReportTemplate(project: string, date: string): string {
  const categories = TASK_CATEGORIES
    .map(category => [
      '<details>',
      `<summary><h3>${category}</h3></summary>`,
      '',
      TASK_TABLE_HEADER,
      TASK_TABLE_SEPARATOR,
      '',
      '</details>'
    ].join('\n'))
    .join('\n\n');

  return `<div align="center">

# 📊 Project Progress Report

</div>

## 📌 Basic Information

**Project Name**: ${project}
**Report Date**: ${date}
**Report Period**: ${date} ~ Ongoing

## 📋 Task Details

${categories}

## 📊 Progress Summary

${buildProgressSection({ completed: 0, inProgress: 0, total: 0 })}

${ISSUES_HEADER} and Risks

| Type | Content | Mitigation Plan |
| ---- | ------- | --------------- |
| - | - | - |

## 📈 Next Steps

1. Initial Setup and Environment Configuration
2. Define Detailed Work Items
3. Regular Progress Updates

---
> This report is automatically generated and will be continuously updated by the assignee.
`;
}

/**
 * Checked TODO lines of the form "[TSK-12] ... (spent: 3h)"
 */
export function findCompletedTasks(body: string): TaskCompletion[] {
  const completions: TaskCompletion[] = [];
  for (const line of body.split('\n')) {
    if (!/^\s*-\s*\[[xX]\]/.test(line)) continue;
    const task = line.match(/TSK-(\d+)/);
    const spent = line.match(/\(spent:\s*(\d+)h\)/);
    if (task && spent) {
      completions.push({ taskNumber: parseInt(task[1], 10), spent: `${spent[1]}h` });
    }
  }
  return completions;
}

/**
 * Mark an in-progress task row completed with its actual time
 */
export function markTaskCompleted(body: string, taskNumber: number, spent: string): string {
  return body
    .split('\n')
    .map(line =>
      line.includes(`[TSK-${taskNumber}]`) && line.includes(`| - | ${IN_PROGRESS} |`)
        ? line.replace(`| - | ${IN_PROGRESS} |`, `| ${spent} | ${COMPLETED} |`)
        : line
    )
    .join('\n');
}

/**
 * Approval processor class
 */
export class ApprovalProcessor {
  private context: ApprovalContext;
  private github: GitHubApi;

  constructor(context: ApprovalContext, github?: GitHubApi) {
    this.context = context;
    this.github = github ?? new GitHubClient(context.token, context.repo);
  }

  /**
   * Handle a labelled proposal, or completion notes in a report issue.
   * With a trigger, proposals react only to an approval label being added and
   * reports only to edits; without one the issue's current labels decide.
   */
  async process(issueNumber: number, trigger?: ApprovalTrigger, now: Date = new Date()): Promise<ApprovalResult> {
    const issue = await this.github.getIssue(issueNumber);

    if (issue.labels.includes(this.context.dsrLabel)) {
      if (trigger && trigger.action !== 'edited') {
        console.log(`Report #${issueNumber} was ${trigger.action}; nothing to do`);
        return { action: 'none', completedTasks: [] };
      }
      return this.processCompletions(issue);
    }

    if (trigger && (trigger.action !== 'labeled' || !trigger.label || !isApprovalLabel(trigger.label))) {
      console.log(`Issue #${issueNumber} was ${trigger.action} without an approval label`);
      return { action: 'none', completedTasks: [] };
    }

    const decision = resolveDecision(trigger?.label ? [trigger.label] : issue.labels);
    if (!decision) {
      console.log(`Issue #${issueNumber} has no approval label`);
      return { action: 'none', completedTasks: [] };
    }
    console.log(`Issue #${issueNumber}: ${decision}`);

    let reportNumber: number | undefined;
    if (decision === 'approved') {
      const category = resolveTaskCategory(issue.labels);
      const report = await this.findOrCreateReport(now);
      const body = updateProgressSection(insertTaskRow(report.body, category, buildTaskRow(issue)));
      await this.github.updateIssue(report.number, { body });
      await this.github.addComment(report.number, `✅ Task #${issue.number} has been added to the ${category} category.`);
      reportNumber = report.number;

      await this.addToDailyReport(issue, category);
    }

    await this.github.addComment(issue.number, DECISION_COMMENTS[decision]);
    return { action: decision, reportNumber, completedTasks: [] };
  }

  private async findReport(): Promise<Issue | undefined> {
    const title = buildReportTitle(this.context.repo.repo);
    const reports = await this.github.listOpenIssuesByLabel(REPORT_LABEL);
    return reports.find(issue => issue.title === title);
  }

  private async findOrCreateReport(now: Date): Promise<Issue> {
    const existing = await this.findReport();
    if (existing) {
      return existing;
    }

    await this.github.ensureLabels([describeLabel(REPORT_LABEL, this.context.dsrLabel)]);
    const report = await this.github.createIssue({
      title: buildReportTitle(this.context.repo.repo),
      body: buildReportTemplate(this.context.repo.repo, formatLocalDate(now, this.context.timezone)),
      labels: [REPORT_LABEL]
    });
    console.log(`Created progress report #${report.number}`);
    return report;
  }

  /**
   * Add the approved task to the newest open daily report as a linked TODO
   */
  private async addToDailyReport(task: Issue, category: TaskCategory): Promise<void> {
    try {
      const reports = (await this.github.listOpenIssuesByLabel(this.context.dsrLabel))
        .filter(issue => isReportTitle(issue.title))
        .sort((a, b) => (getReportDate(b.title) ?? '').localeCompare(getReportDate(a.title) ?? ''));
      const latest = reports[0];
      if (!latest) {
        console.log('No open daily report to add the task to');
        return;
      }

      const report = parseReportBody(latest.body);
      const text = `[TSK-${task.number}] ${getTaskName(task.title)}`;
      report.todos.add(taskCategoryName(category), { text, issueNumber: task.number });

      await this.github.updateIssue(latest.number, {
        body: buildReportBody(latest.title, report.branches, report.todos)
      });
      await this.github.addComment(latest.number, `New task has been added: ${text} (#${task.number})`);
    } catch (error) {
      console.error(`Failed to add task #${task.number} to the daily report: ${errorMessage(error)}`);
    }
  }

  private async processCompletions(dsrIssue: Issue): Promise<ApprovalResult> {
    const completions = findCompletedTasks(dsrIssue.body);
    if (completions.length === 0) {
      return { action: 'none', completedTasks: [] };
    }

    const report = await this.findReport();
    if (!report) {
      console.log('No progress report found for completed tasks');
      return { action: 'none', completedTasks: [] };
    }

    let body = report.body;
    const completed: number[] = [];
    for (const { taskNumber, spent } of completions) {
      const updated = markTaskCompleted(body, taskNumber, spent);
      if (updated !== body) {
        body = updated;
        completed.push(taskNumber);
      }
    }

    if (completed.length === 0) {
      return { action: 'none', reportNumber: report.number, completedTasks: [] };
    }

    await this.github.updateIssue(report.number, { body: updateProgressSection(body) });
    for (const { taskNumber, spent } of completions.filter(c => completed.includes(c.taskNumber))) {
      await this.github.addComment(
        report.number,
        `✅ Task TSK-${taskNumber} has been completed. (Time spent: ${spent})`
      );
    }

    return { action: 'completions', reportNumber: report.number, completedTasks: completed };
  }
}

export function approvalContext(config: AutomationConfig): ApprovalContext {
  return {
    repo: config.repository,
    token: config.token,
    dsrLabel: config.dsrLabel,
    timezone: config.timezone
  };
}
