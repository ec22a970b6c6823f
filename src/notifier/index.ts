/**
 * Slack notifier component
 * Posts push, report, task and TODO events to a Slack channel
 */

import { WebClient, type KnownBlock } from '@slack/web-api';
import type { AutomationConfig } from '../shared/config.js';
import { IssuePayloadSchema, PushPayloadSchema, type IssuePayload, type PushCommit } from '../shared/payload.js';
import { LABEL_PREFIXES, TODO_ISSUE_LABEL, isTaskCategory, isTaskIssue } from '../shared/labels.js';
import { isReportTitle, shortSha } from '../dsr/format.js';
import { errorMessage } from '../utils.js';

type IssueData = IssuePayload['issue'];

export interface SlackMessage {
  text: string;
  blocks: KnownBlock[];
}

export interface NotifierContext {
  slackToken?: string;
  slackChannel?: string;
  dsrLabel: string;
}

function header(text: string): KnownBlock {
  return { type: 'header', text: { type: 'plain_text', text } };
}

function fields(...entries: Array<[string, string]>): KnownBlock {
  return {
    type: 'section',
    fields: entries.map(([name, value]) => ({ type: 'mrkdwn', text: `*${name}:*\n${value}` }))
  };
}

function link(url: string, label: string): KnownBlock {
  return { type: 'section', text: { type: 'mrkdwn', text: `👉 <${url}|${label}>` } };
}

const DIVIDER: KnownBlock = { type: 'divider' };

export function buildPushMessage(commit: PushCommit, repoName: string): SlackMessage {
  const title = commit.message.split('\n')[0];
  const text = '🔨 New commit pushed';
  return {
    text,
    blocks: [
      header(text),
      fields(['Commit', title], ['Author', commit.author.name]),
      fields(['Repository', repoName], ['Commit ID', `\`${shortSha(commit.id)}\``]),
      link(commit.url, 'View commit'),
      DIVIDER
    ]
  };
}

export function buildReportMessage(issue: IssueData): SlackMessage {
  const text = '📅 New development status report';
  return {
    text,
    blocks: [
      header(text),
      { type: 'section', text: { type: 'mrkdwn', text: `*${issue.title}*\n\n👉 <${issue.html_url}|View report>` } },
      DIVIDER
    ]
  };
}

function taskHeader(action: string, labels: string[]): string {
  if (action === 'opened') return '🎯 New task created';
  if (action !== 'labeled') return 'ℹ️ Task updated';
  if (labels.some(l => l.startsWith(LABEL_PREFIXES.TASK))) return '📋 New task registered';
  if (labels.includes('in-progress')) return '▶️ Task in progress';
  if (labels.includes('done')) return '✅ Task completed';
  return '🏷 Task status updated';
}

function taskCategory(labels: string[]): string {
  const prefixed = labels.find(l => l.startsWith(LABEL_PREFIXES.TASK));
  if (prefixed) return prefixed.slice(LABEL_PREFIXES.TASK.length);
  return labels.find(isTaskCategory) ?? 'Uncategorized';
}

function taskStatus(labels: string[]): string {
  if (labels.includes('in-progress')) return 'In progress';
  if (labels.includes('done')) return 'Done';
  return 'Waiting';
}

export function buildTaskMessage(issue: IssueData, action: string): SlackMessage {
  const labels = issue.labels.map(l => l.name);
  const text = taskHeader(action, labels);
  return {
    text,
    blocks: [
      header(text),
      fields(['Title', issue.title], ['Assignee', issue.user?.login ?? 'unknown']),
      fields(['Category', taskCategory(labels)], ['Status', taskStatus(labels)]),
      link(issue.html_url, 'View task'),
      DIVIDER
    ]
  };
}

/**
 * "#N" references on body lines that mention a report or a task
 */
export function findLinkedReferences(body: string): string[] {
  const refs: string[] = [];
  for (const line of body.split('\n')) {
    if (!/report|task:/i.test(line)) continue;
    for (const match of line.matchAll(/#(\d+)/g)) {
      const ref = `#${match[1]}`;
      if (!refs.includes(ref)) refs.push(ref);
    }
  }
  return refs;
}

export function buildTodoMessage(issue: IssueData, action: string): SlackMessage {
  const text =
    action === 'opened' ? '🎯 New TODO created' : action === 'labeled' ? '🔄 TODO status updated' : 'ℹ️ TODO updated';
  const blocks: KnownBlock[] = [
    header(text),
    fields(['Title', issue.title], ['Author', issue.user?.login ?? 'unknown'])
  ];

  const linked = findLinkedReferences(issue.body ?? '');
  if (linked.length > 0) {
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: `*Linked:*\n${linked.join(', ')}` } });
  }

  blocks.push(link(issue.html_url, 'View TODO'), DIVIDER);
  return { text, blocks };
}

/**
 * Message for a webhook event, or null when the event is not worth a notification.
 * Report issues are announced only when opened.
 */
export function selectMessage(eventName: string, payload: unknown, dsrLabel: string): SlackMessage | null {
  if (eventName === 'push') {
    const push = PushPayloadSchema.safeParse(payload);
    if (!push.success) return null;
    const latest = push.data.commits.at(-1);
    return latest ? buildPushMessage(latest, push.data.repository.name) : null;
  }

  if (eventName === 'issues') {
    const event = IssuePayloadSchema.safeParse(payload);
    if (!event.success) return null;

    const { action, issue } = event.data;
    const labels = issue.labels.map(l => l.name);
    if (isTaskIssue(labels)) return buildTaskMessage(issue, action);
    if (labels.includes(TODO_ISSUE_LABEL)) return buildTodoMessage(issue, action);
    if (action === 'opened' && (labels.includes(dsrLabel) || isReportTitle(issue.title))) {
      return buildReportMessage(issue);
    }
  }

  return null;
}

/**
 * Slack notifier class
 */
export class SlackNotifier {
  private context: NotifierContext;
  private client: WebClient | null;

  constructor(context: NotifierContext, client?: WebClient) {
    this.context = context;
    this.client = client ?? (context.slackToken ? new WebClient(context.slackToken) : null);
  }

  get enabled(): boolean {
    return this.client !== null && Boolean(this.context.slackChannel);
  }

  /**
   * Post a message; delivery failures are logged
   * @returns whether Slack accepted the message
   */
  async send(message: SlackMessage): Promise<boolean> {
    if (!this.client || !this.context.slackChannel) {
      console.log('Slack notifications are disabled');
      return false;
    }

    try {
      const response = await this.client.chat.postMessage({
        channel: this.context.slackChannel,
        text: message.text,
        blocks: message.blocks
      });
      console.log(`Slack message sent: ${response.ts ?? 'no timestamp'}`);
      return true;
    } catch (error) {
      console.error(`Failed to send Slack message: ${errorMessage(error)}`);
      return false;
    }
  }

  async notify(eventName: string, payload: unknown): Promise<boolean> {
    const message = selectMessage(eventName, payload, this.context.dsrLabel);
    if (!message) {
      console.log(`No notification for ${eventName} event`);
      return false;
    }
    return this.send(message);
  }
}

export function notifierContext(config: AutomationConfig): NotifierContext {
  return {
    slackToken: config.slackToken,
    slackChannel: config.slackChannel,
    dsrLabel: config.dsrLabel
  };
}
