/**
 * GitHub API client wrapper
 * Provides the REST and GraphQL operations used by every mode
 */

import { getOctokit } from '@actions/github';
import type { RepoContext } from './config.js';
import type { LabelDefinition } from './labels.js';
import { errorMessage, getErrorStatus } from '../utils.js';

export type { RepoContext };

export type IssueState = 'open' | 'closed';

export interface Issue {
  number: number;
  title: string;
  body: string;
  state: IssueState;
  labels: string[];
  assignees: string[];
  url: string;
  nodeId: string;
  createdAt: string;
}

export interface CommitInfo {
  sha: string;
  message: string;
  authorName: string;
  authorLogin: string | null;
  authorDate: string;
  parents: string[];
  url: string;
}

export interface CreateIssueParams {
  title: string;
  body: string;
  labels?: string[];
  assignees?: string[];
}

export interface UpdateIssueParams {
  title?: string;
  body?: string;
  labels?: string[];
  state?: IssueState;
}

export interface FileContent {
  content: string;
  sha: string;
}

interface RawIssue {
  number: number;
  title: string;
  body?: string | null;
  state: string;
  labels: Array<string | { name?: string }>;
  assignees?: Array<{ login: string }> | null;
  html_url: string;
  node_id: string;
  created_at: string;
}

interface RawCommit {
  sha: string;
  html_url: string;
  commit: {
    message: string;
    author: { name?: string; date?: string } | null;
  };
  author: unknown;
  parents: Array<{ sha: string }>;
}

function toIssue(data: RawIssue): Issue {
  return {
    number: data.number,
    title: data.title,
    body: data.body || '',
    state: data.state === 'closed' ? 'closed' : 'open',
    labels: data.labels.map(l => (typeof l === 'string' ? l : l.name || '')).filter(Boolean),
    assignees: (data.assignees ?? []).map(a => a.login),
    url: data.html_url,
    nodeId: data.node_id,
    createdAt: data.created_at
  };
}

function loginOf(author: unknown): string | null {
  if (typeof author === 'object' && author !== null && 'login' in author && typeof author.login === 'string') {
    return author.login;
  }
  return null;
}

function toCommit(data: RawCommit): CommitInfo {
  return {
    sha: data.sha,
    message: data.commit.message,
    authorName: data.commit.author?.name || 'unknown',
    authorLogin: loginOf(data.author),
    authorDate: data.commit.author?.date || '',
    parents: data.parents.map(p => p.sha),
    url: data.html_url
  };
}

/**
 * GitHub API client scoped to one repository
 */
export class GitHubClient {
  private octokit: ReturnType<typeof getOctokit>;
  private owner: string;
  private repo: string;

  /**
   * @param token - GitHub token (PAT or GITHUB_TOKEN)
   */
  constructor(token: string, context: RepoContext) {
    this.octokit = getOctokit(token);
    this.owner = context.owner;
    this.repo = context.repo;
  }

  /**
   * List open issues (pull requests excluded) carrying a label
   */
  async listOpenIssuesByLabel(label: string): Promise<Issue[]> {
    try {
      const data = await this.octokit.paginate(this.octokit.rest.issues.listForRepo, {
        owner: this.owner,
        repo: this.repo,
        labels: label,
        state: 'open',
        per_page: 100
      });

      return data.filter(issue => !issue.pull_request).map(toIssue);
    } catch (error) {
      throw new Error(`Failed to list issues with label ${label}: ${errorMessage(error)}`);
    }
  }

  async getIssue(issueNumber: number): Promise<Issue> {
    try {
      const { data } = await this.octokit.rest.issues.get({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber
      });
      return toIssue(data);
    } catch (error) {
      throw new Error(`Failed to get issue #${issueNumber}: ${errorMessage(error)}`);
    }
  }

  async createIssue(params: CreateIssueParams): Promise<Issue> {
    try {
      const { data } = await this.octokit.rest.issues.create({
        owner: this.owner,
        repo: this.repo,
        title: params.title,
        body: params.body,
        labels: params.labels,
        assignees: params.assignees
      });
      return toIssue(data);
    } catch (error) {
      throw new Error(`Failed to create issue "${params.title}": ${errorMessage(error)}`);
    }
  }

  async updateIssue(issueNumber: number, params: UpdateIssueParams): Promise<Issue> {
    try {
      const { data } = await this.octokit.rest.issues.update({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber,
        ...params
      });
      return toIssue(data);
    } catch (error) {
      throw new Error(`Failed to update issue #${issueNumber}: ${errorMessage(error)}`);
    }
  }

  async closeIssue(issueNumber: number): Promise<void> {
    await this.updateIssue(issueNumber, { state: 'closed' });
  }

  async addComment(issueNumber: number, body: string): Promise<void> {
    try {
      await this.octokit.rest.issues.createComment({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber,
        body
      });
    } catch (error) {
      throw new Error(`Failed to comment on issue #${issueNumber}: ${errorMessage(error)}`);
    }
  }

  async addAssignees(issueNumber: number, assignees: string[]): Promise<void> {
    try {
      await this.octokit.rest.issues.addAssignees({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber,
        assignees
      });
    } catch (error) {
      throw new Error(`Failed to assign issue #${issueNumber}: ${errorMessage(error)}`);
    }
  }

  /**
   * Create any of the given labels that do not exist yet
   * Creation failures are logged; the issue can still be labelled by name.
   */
  async ensureLabels(labels: LabelDefinition[]): Promise<void> {
    for (const label of labels) {
      try {
        await this.octokit.rest.issues.getLabel({
          owner: this.owner,
          repo: this.repo,
          name: label.name
        });
      } catch (error) {
        if (getErrorStatus(error) !== 404) {
          throw new Error(`Failed to look up label ${label.name}: ${errorMessage(error)}`);
        }
        try {
          await this.octokit.rest.issues.createLabel({
            owner: this.owner,
            repo: this.repo,
            name: label.name,
            color: label.color,
            description: label.description
          });
          console.log(`Created label: ${label.name}`);
        } catch (createError) {
          console.warn(`Failed to create label ${label.name}: ${errorMessage(createError)}`);
        }
      }
    }
  }

  /**
   * List commits on a branch authored at or after a point in time
   */
  async listCommitsSince(branch: string, since: Date): Promise<CommitInfo[]> {
    try {
      const data = await this.octokit.paginate(this.octokit.rest.repos.listCommits, {
        owner: this.owner,
        repo: this.repo,
        sha: branch,
        since: since.toISOString(),
        per_page: 100
      });
      return data.map(toCommit);
    } catch (error) {
      throw new Error(`Failed to list commits on ${branch}: ${errorMessage(error)}`);
    }
  }

  async getCommit(sha: string): Promise<CommitInfo> {
    try {
      const { data } = await this.octokit.rest.repos.getCommit({
        owner: this.owner,
        repo: this.repo,
        ref: sha
      });
      return toCommit(data);
    } catch (error) {
      throw new Error(`Failed to get commit ${sha}: ${errorMessage(error)}`);
    }
  }

  /**
   * Commits reachable from head but not from base
   */
  async compareCommits(base: string, head: string): Promise<CommitInfo[]> {
    try {
      const { data } = await this.octokit.rest.repos.compareCommitsWithBasehead({
        owner: this.owner,
        repo: this.repo,
        basehead: `${base}...${head}`
      });
      return data.commits.map(toCommit);
    } catch (error) {
      throw new Error(`Failed to compare ${base}...${head}: ${errorMessage(error)}`);
    }
  }

  /**
   * Read a text file from the repository
   * @returns null when the file does not exist
   */
  async getFileContent(filePath: string, ref?: string): Promise<FileContent | null> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path: filePath,
        ref
      });

      if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
        return null;
      }
      return {
        content: Buffer.from(data.content, 'base64').toString('utf-8'),
        sha: data.sha
      };
    } catch (error) {
      if (getErrorStatus(error) === 404) {
        return null;
      }
      throw new Error(`Failed to read ${filePath}: ${errorMessage(error)}`);
    }
  }

  async updateFile(
    filePath: string,
    content: string,
    message: string,
    sha: string,
    branch?: string
  ): Promise<void> {
    try {
      await this.octokit.rest.repos.createOrUpdateFileContents({
        owner: this.owner,
        repo: this.repo,
        path: filePath,
        message,
        content: Buffer.from(content, 'utf-8').toString('base64'),
        sha,
        branch
      });
    } catch (error) {
      throw new Error(`Failed to update ${filePath}: ${errorMessage(error)}`);
    }
  }

  async deleteFile(filePath: string, message: string, sha: string, branch?: string): Promise<void> {
    try {
      await this.octokit.rest.repos.deleteFile({
        owner: this.owner,
        repo: this.repo,
        path: filePath,
        message,
        sha,
        branch
      });
    } catch (error) {
      throw new Error(`Failed to delete ${filePath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Run a GraphQL query; callers validate the shape of the result
   */
  async graphql(query: string, variables: Record<string, unknown>): Promise<unknown> {
    try {
      return await this.octokit.graphql<unknown>(query, variables);
    } catch (error) {
      throw new Error(`Failed to run GraphQL request: ${errorMessage(error)}`);
    }
  }
}

// Public surface of GitHubClient, implemented by in-memory fakes in tests
export type GitHubApi = Pick<GitHubClient, keyof GitHubClient>;
