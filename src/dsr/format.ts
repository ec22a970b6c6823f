/**
 * Daily Status Report issue title and body
 *
 * The issue body is the report's only storage: every run parses the
 * previous body, appends what is new and renders it again.
 */

import type { ParsedCommit } from '../commits/parser.js';
import { TodoList } from '../todos/index.js';
import { formatLocalTime } from '../shared/time.js';

// A commit as it is written into a report
export interface ReportEntry {
  sha: string;
  authorName: string;
  authorLogin: string | null;
  authorDate: Date;
  parsed: ParsedCommit;
}

// A commit block read back from a report body
export interface LoggedCommit {
  raw: string;
  shortSha: string | null;
  title: string | null;
}

export interface ReportBranch {
  name: string;
  commits: LoggedCommit[];
}

export interface ParsedReport {
  branches: ReportBranch[];
  todos: TodoList;
}

const TITLE_DATE_PATTERN = /Development Status Report \((\d{4}-\d{2}-\d{2})\)/;
const BRANCH_SUMMARY_HEADER = '## 📊 Branch Summary';
const TODO_HEADER = '## 📝 Todo';
const EMPTY_TODOS = 'No todos at this time.';

const BRANCH_PATTERN = /^<summary><h3[^>]*>✨\s*(.+?)<\/h3><\/summary>$/;
const COMMIT_TITLE_PATTERN = /^>\s*<summary>💫\s*\S+\s+-\s+(.*)<\/summary>$/;
const COMMIT_SHA_PATTERN = /^>\s*Commit:\s*`([0-9a-fA-F]+)`/;

export function shortSha(sha: string): string {
  return sha.slice(0, 7);
}

/**
 * "{prefix} Development Status Report (YYYY-MM-DD) - {repo}", leading dot of the repo dropped
 */
export function buildReportTitle(prefix: string, date: string, repo: string): string {
  const head = prefix.trim() ? `${prefix.trim()} ` : '';
  return `${head}Development Status Report (${date}) - ${repo.replace(/^\./, '')}`;
}

export function isReportTitle(title: string): boolean {
  return TITLE_DATE_PATTERN.test(title);
}

export function getReportDate(title: string): string | null {
  const match = title.match(TITLE_DATE_PATTERN);
  return match ? match[1] : null;
}

/**
 * Commit text goes inside an HTML block, so tags in it must not close the block
 */
function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;');
}

/**
 * Quoted collapsible block for one commit.
 * Body and footer lines are prefixed so none of them reads back as block markup.
 */
export function formatCommitSection(entry: ReportEntry, timeZone: string): string {
  const { parsed } = entry;
  const lines = [
    '> <details>',
    `> <summary>💫 ${formatLocalTime(entry.authorDate, timeZone)} - ${parsed.title}</summary>`,
    '>',
    `> Type: ${parsed.type} (${parsed.typeInfo.description})`,
    `> Commit: \`${shortSha(entry.sha)}\``,
    `> Author: ${entry.authorName}`,
    '>'
  ];

  if (parsed.body.length === 0 && parsed.footer.length === 0) {
    lines.push('> No additional details provided.');
  }
  for (const line of parsed.body) {
    lines.push(`> • ${escapeHtml(line)}`);
  }
  if (parsed.footer.length > 0) {
    lines.push('> **Related Issues:**');
    for (const line of parsed.footer) {
      lines.push(`> - ${escapeHtml(line)}`);
    }
  }

  lines.push('> </details>');
  return lines.join('\n');
}

/**
 * Read the title and short SHA back out of a rendered commit block
 */
export function toLoggedCommit(raw: string): LoggedCommit {
  let sha: string | null = null;
  let title: string | null = null;
  for (const line of raw.split('\n')) {
    const titleMatch = line.match(COMMIT_TITLE_PATTERN);
    if (titleMatch) {
      title = titleMatch[1].trim();
      continue;
    }
    const shaMatch = line.match(COMMIT_SHA_PATTERN);
    if (shaMatch) {
      sha = shaMatch[1].toLowerCase();
    }
  }
  return { raw, shortSha: sha, title };
}

export function formatBranchSection(branch: string, sections: string[]): string {
  return [
    '<details>',
    `<summary><h3 style="display: inline;">✨ ${branch}</h3></summary>`,
    '',
    sections.join('\n\n'),
    '',
    '</details>'
  ].join('\n');
}

function centeredHeader(header: string): string {
  return ['<div align="center">', '', header, '', '</div>'].join('\n');
}

export function buildReportBody(title: string, branches: ReportBranch[], todos: TodoList): string {
  const branchSections = branches
    .filter(branch => branch.commits.length > 0)
    .map(branch => formatBranchSection(branch.name, branch.commits.map(c => c.raw)));

  return [
    `# ${title}`,
    centeredHeader(BRANCH_SUMMARY_HEADER),
    ...branchSections,
    centeredHeader(TODO_HEADER),
    todos.isEmpty() ? EMPTY_TODOS : todos.render()
  ].join('\n\n') + '\n';
}

/**
 * Parse a report body produced by buildReportBody
 */
export function parseReportBody(body: string): ParsedReport {
  const branches: ReportBranch[] = [];
  const todoLines: string[] = [];
  let section: 'none' | 'branches' | 'todo' = 'none';
  let branch: ReportBranch | null = null;
  let block: string[] | null = null;

  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (line === BRANCH_SUMMARY_HEADER) {
      section = 'branches';
      continue;
    }
    if (line === TODO_HEADER) {
      section = 'todo';
      continue;
    }

    if (section === 'todo') {
      todoLines.push(line);
      continue;
    }
    if (section !== 'branches') continue;

    const branchMatch = line.match(BRANCH_PATTERN);
    if (branchMatch) {
      const name = branchMatch[1].trim();
      branch = branches.find(b => b.name === name) ?? null;
      if (!branch) {
        branch = { name, commits: [] };
        branches.push(branch);
      }
      continue;
    }

    if (!branch) continue;

    if (/^>\s*<details>$/.test(line)) {
      block = [line];
      continue;
    }
    if (block) {
      block.push(line);
      if (/^>\s*<\/details>$/.test(line)) {
        branch.commits.push(toLoggedCommit(block.join('\n')));
        block = null;
      }
    }
  }

  return { branches, todos: TodoList.parse(todoLines.join('\n')) };
}

/**
 * A commit is already logged when its short SHA or its exact title appears in the report
 */
export function isCommitLogged(report: ParsedReport, commit: { sha: string; title: string }): boolean {
  const sha = shortSha(commit.sha).toLowerCase();
  return report.branches.some(branch =>
    branch.commits.some(logged => logged.shortSha === sha || logged.title === commit.title)
  );
}

/**
 * Append new commit blocks under their branch, creating the branch section if needed
 */
export function appendCommits(report: ParsedReport, branchName: string, blocks: string[]): void {
  let branch = report.branches.find(b => b.name === branchName);
  if (!branch) {
    branch = { name: branchName, commits: [] };
    report.branches.push(branch);
  }
  branch.commits.push(...blocks.map(toLoggedCommit));
}
