/**
 * DSR synchronizer component
 * Keeps linked TODO checkboxes in report issues in step with their issues' state
 */

import type { AutomationConfig } from '../shared/config.js';
import { GitHubClient, type GitHubApi, type IssueState, type RepoContext } from '../shared/github.js';
import { isReportTitle } from '../dsr/format.js';
import { TODO_ISSUE_LABEL } from '../shared/labels.js';
import { errorMessage } from '../utils.js';

// "- [ ] text (#12)" with the box and the number captured
const LINKED_ITEM_PATTERN = /^(\s*-\s*\[)([ xX])(\].*\(#(\d+)\)\s*)$/;
const CATEGORY_SUMMARY_PATTERN = /^(.*📑.*?)\(\d+\/\d+\)(.*<\/summary>\s*)$/;
const CHECKBOX_PATTERN = /^\s*-\s*\[([ xX])\]/;

export interface DsrSyncContext {
  repo: RepoContext;
  token: string;
  dsrLabel: string;
}

export interface DsrSyncResult {
  checked: number;
  updated: number[];
  failed: number;
}

/**
 * Issue numbers linked from checklist items, in order of first appearance
 */
export function collectLinkedIssues(body: string): number[] {
  const numbers: number[] = [];
  for (const line of body.split('\n')) {
    const match = line.match(LINKED_ITEM_PATTERN);
    if (match) {
      const issueNumber = parseInt(match[4], 10);
      if (!numbers.includes(issueNumber)) {
        numbers.push(issueNumber);
      }
    }
  }
  return numbers;
}

/**
 * Rewrite the "(done/total)" count of every TODO category summary
 */
export function refreshCategoryCounts(body: string): string {
  const lines = body.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const summary = lines[i].match(CATEGORY_SUMMARY_PATTERN);
    if (!summary) continue;

    let done = 0;
    let total = 0;
    for (let j = i + 1; j < lines.length && lines[j].trim() !== '</details>'; j++) {
      const box = lines[j].match(CHECKBOX_PATTERN);
      if (box) {
        total++;
        if (box[1] !== ' ') done++;
      }
    }
    lines[i] = `${summary[1]}(${done}/${total})${summary[2]}`;
  }

  return lines.join('\n');
}

/**
 * Check linked items whose issue is closed and uncheck those whose issue is open.
 * Items linked to issues missing from the map are left as they are.
 */
export function syncCheckboxes(body: string, states: Map<number, IssueState>): string {
  const lines = body.split('\n').map(line => {
    const match = line.match(LINKED_ITEM_PATTERN);
    if (!match) return line;

    const state = states.get(parseInt(match[4], 10));
    if (!state) return line;

    const isChecked = match[2] !== ' ';
    if (state === 'closed' && !isChecked) return `${match[1]}x${match[3]}`;
    if (state === 'open' && isChecked) return `${match[1]} ${match[3]}`;
    return line;
  });

  return refreshCategoryCounts(lines.join('\n'));
}

/**
 * DSR synchronizer class
 */
export class DsrSynchronizer {
  private context: DsrSyncContext;
  private github: GitHubApi;

  constructor(context: DsrSyncContext, github?: GitHubApi) {
    this.context = context;
    this.github = github ?? new GitHubClient(context.token, context.repo);
  }

  /**
   * Sync every open report issue.
   * Only items linked to TODO issues follow their issue's state; task items
   * linked to proposals are checked by hand to report completion.
   */
  async run(): Promise<DsrSyncResult> {
    const reports = (await this.github.listOpenIssuesByLabel(this.context.dsrLabel))
      .filter(issue => isReportTitle(issue.title));
    console.log(`Found ${reports.length} open report issues`);

    const states = new Map<number, IssueState>();
    const looked = new Set<number>();
    const result: DsrSyncResult = { checked: reports.length, updated: [], failed: 0 };

    for (const report of reports) {
      try {
        for (const issueNumber of collectLinkedIssues(report.body)) {
          if (looked.has(issueNumber)) continue;
          looked.add(issueNumber);
          try {
            const linked = await this.github.getIssue(issueNumber);
            if (linked.labels.includes(TODO_ISSUE_LABEL)) {
              states.set(issueNumber, linked.state);
            }
          } catch (error) {
            console.warn(`Could not read linked issue #${issueNumber}: ${errorMessage(error)}`);
          }
        }

        const body = syncCheckboxes(report.body, states);
        if (body !== report.body) {
          await this.github.updateIssue(report.number, { body });
          result.updated.push(report.number);
          console.log(`Synced checkboxes in report #${report.number}`);
        }
      } catch (error) {
        result.failed++;
        console.error(`Failed to sync report #${report.number}: ${errorMessage(error)}`);
      }
    }

    return result;
  }
}

export function dsrSyncContext(config: AutomationConfig): DsrSyncContext {
  return {
    repo: config.repository,
    token: config.token,
    dsrLabel: config.dsrLabel
  };
}
