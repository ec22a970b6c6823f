/**
 * Proposal processor component
 * Turns task proposal files into issues waiting for review
 *
 * File format:
 *   Proposer,Jane Doe
 *   Proposal Date,2024-03-01
 *   Target Date,2024-03-31
 *   [Task Name]
 *   Search indexing
 *   [Task Purpose]
 *   ...
 *   [Schedule]
 *   Design, 2024-03-04, 3d
 */

import path from 'path';
import fs from 'fs-extra';
import type { AutomationConfig } from '../shared/config.js';
import { GitHubClient, type GitHubApi, type RepoContext } from '../shared/github.js';
import { APPROVAL_LABELS, PROPOSAL_LABELS, SKIP_MARKER, describeLabel } from '../shared/labels.js';
import { errorMessage } from '../utils.js';

export interface Proposal {
  taskName: string;
  proposer: string;
  proposalDate: string;
  targetDate: string;
  purpose: string;
  scope: string;
  requiredFeatures: string;
  optionalFeatures: string;
  schedule: string[];
}

export interface ProposalContext {
  repo: RepoContext;
  token: string;
  proposalDir: string;
  workspace: string;
  branch: string;
  dsrLabel: string;
}

export interface ProposalResult {
  created: number[];
  failed: string[];
}

const REQUIRED_HEADERS = ['Proposer', 'Proposal Date', 'Target Date'] as const;
const REQUIRED_SECTIONS = ['[Task Name]', '[Task Purpose]', '[Task Scope]', '[Required Features]', '[Schedule]'] as const;

/**
 * Parse a proposal file into its header values and sections
 * @throws Error naming every missing header or section
 */
export function parseProposal(text: string): Proposal {
  const headers = new Map<string, string>();
  const sections = new Map<string, string[]>();
  let current: string[] | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith('[') && line.endsWith(']')) {
      current = sections.get(line) ?? [];
      sections.set(line, current);
      continue;
    }

    if (current) {
      current.push(line);
    } else if (line.includes(',')) {
      const index = line.indexOf(',');
      headers.set(line.slice(0, index).trim(), line.slice(index + 1).trim());
    }
  }

  const missing = [
    ...REQUIRED_HEADERS.filter(key => !headers.get(key)),
    ...REQUIRED_SECTIONS.filter(key => !sections.get(key)?.length)
  ];
  if (missing.length > 0) {
    throw new Error(`Proposal is missing: ${missing.join(', ')}`);
  }

  const section = (name: string) => (sections.get(name) ?? []).join('\n');

  return {
    taskName: section('[Task Name]'),
    proposer: headers.get('Proposer') ?? '',
    proposalDate: headers.get('Proposal Date') ?? '',
    targetDate: headers.get('Target Date') ?? '',
    purpose: section('[Task Purpose]'),
    scope: section('[Task Scope]'),
    requiredFeatures: section('[Required Features]'),
    optionalFeatures: section('[Optional Features]') || 'None',
    schedule: sections.get('[Schedule]') ?? []
  };
}

/**
 * Repository name as a project name: no leading dots, punctuation turned into spaces
 */
export function sanitizeProjectName(name: string): string {
  return name
    .replace(/^\.+/, '')
    .replace(/[^\p{L}\p{N}_\s-]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

/**
 * "task, start, duration" lines as Mermaid gantt tasks
 */
export function scheduleToMermaid(lines: string[]): string {
  return lines
    .map(line => {
      const parts = line.split(',').map(part => part.trim());
      if (parts.length !== 3 || parts.some(part => !part)) {
        throw new Error(`Invalid schedule line: ${line}`);
      }
      const [task, start, duration] = parts;
      return `    ${task} :${start}, ${duration}`;
    })
    .join('\n');
}

export function buildProposalTitle(project: string, proposal: Proposal): string {
  return `[${project}] ${proposal.taskName}`;
}

export function buildProposalBody(proposal: Proposal, project: string): string {
  return `# Project Task Proposal

## 1. Proposal Overview

**Project Name**: ${project}
**Task Name**: ${proposal.taskName}
**Proposer**: ${proposal.proposer}
**Proposal Date**: ${proposal.proposalDate}
**Target Date**: ${proposal.targetDate}

## 2. Task Summary

### 2.1 Purpose

${proposal.purpose}

### 2.2 Scope

${proposal.scope}

## 3. Details

### Required Features

${proposal.requiredFeatures}

### Optional Features

${proposal.optionalFeatures}

## 4. Approval Process

Please add one of the following labels to approve this task:
- \`${APPROVAL_LABELS.APPROVED}\`: Task is approved and ready to start.
- \`${APPROVAL_LABELS.REJECTED}\`: Task is rejected and needs revision.
- \`${APPROVAL_LABELS.ON_HOLD}\`: Task is on hold and needs further discussion.

## 5. Schedule

\`\`\`mermaid
gantt
    title Task Implementation Schedule
    dateFormat YYYY-MM-DD
    section Development
${scheduleToMermaid(proposal.schedule)}
\`\`\`
`;
}

/**
 * Proposal processor class
 */
export class ProposalProcessor {
  private context: ProposalContext;
  private github: GitHubApi;

  constructor(context: ProposalContext, github?: GitHubApi) {
    this.context = context;
    this.github = github ?? new GitHubClient(context.token, context.repo);
  }

  /**
   * Create an issue per proposal file and delete the files that were processed
   */
  async run(): Promise<ProposalResult> {
    const dir = path.resolve(this.context.workspace, this.context.proposalDir);
    const result: ProposalResult = { created: [], failed: [] };

    if (!(await fs.pathExists(dir))) {
      console.log(`No proposal directory at ${this.context.proposalDir}`);
      return result;
    }

    const files = (await fs.readdir(dir)).filter(name => name.toLowerCase().endsWith('.csv')).sort();
    console.log(`Found ${files.length} proposal files`);
    if (files.length === 0) {
      return result;
    }

    const project = sanitizeProjectName(this.context.repo.repo);
    await this.github.ensureLabels([describeLabel(PROPOSAL_LABELS.PENDING, this.context.dsrLabel)]);

    for (const file of files) {
      const filePath = path.join(dir, file);
      try {
        const proposal = parseProposal(await fs.readFile(filePath, 'utf-8'));
        const issue = await this.github.createIssue({
          title: buildProposalTitle(project, proposal),
          body: buildProposalBody(proposal, project),
          labels: [PROPOSAL_LABELS.PENDING]
        });
        console.log(`Created proposal issue #${issue.number} from ${file}`);

        await this.removeProposal(file);
        await fs.remove(filePath);
        result.created.push(issue.number);
      } catch (error) {
        console.error(`Failed to process proposal ${file}: ${errorMessage(error)}`);
        result.failed.push(file);
      }
    }

    return result;
  }

  /**
   * Delete a processed file from the branch so later pushes do not file it again
   */
  private async removeProposal(file: string): Promise<void> {
    const repoPath = path.posix.join(this.context.proposalDir, file);
    const existing = await this.github.getFileContent(repoPath, this.context.branch);
    if (!existing) {
      console.warn(`${repoPath} is not on ${this.context.branch}; nothing to delete`);
      return;
    }
    await this.github.deleteFile(
      repoPath,
      `chore: remove processed proposal ${file} ${SKIP_MARKER}`,
      existing.sha,
      this.context.branch
    );
    console.log(`Deleted ${repoPath} from ${this.context.branch}`);
  }
}

export function proposalContext(config: AutomationConfig): ProposalContext {
  return {
    repo: config.repository,
    token: config.token,
    proposalDir: config.proposalDir,
    workspace: config.workspace,
    branch: config.branch,
    dsrLabel: config.dsrLabel
  };
}
