/**
 * Configuration loading
 *
 * Precedence (lowest first):
 *   1. built-in defaults
 *   2. optional YAML file (config_path input or AUTOMATION_CONFIG)
 *   3. action inputs (INPUT_*) and plain environment variables
 *
 * YAML values may reference the environment as ${VAR} or ${VAR:default}.
 */

import path from 'path';
import fs from 'fs-extra';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { isValidTimeZone } from './time.js';
import { errorMessage } from '../utils.js';

export type Env = Record<string, string | undefined>;

export interface RepoContext {
  owner: string;
  repo: string;
}

export interface AutomationConfig {
  token: string;
  repository: RepoContext;
  ref: string;
  branch: string;
  sha: string;
  actor: string;
  eventName: string;
  eventPath?: string;
  workspace: string;
  timezone: string;
  issuePrefix: string;
  dsrLabel: string;
  excludedPattern: RegExp | null;
  excludedTypes: string[];
  updateReadme: boolean;
  assignTodoIssues: boolean;
  proposalDir: string;
  projectNumber: number | null;
  projectOwner: string;
  slackToken?: string;
  slackChannel?: string;
}

/**
 * Settings that can come from the YAML file or the environment.
 * The YAML key is the environment name in lower case.
 */
const FILE_SETTINGS = [
  'TIMEZONE',
  'ISSUE_PREFIX',
  'ISSUE_LABEL',
  'EXCLUDED_COMMITS',
  'EXCLUDED_TYPES',
  'UPDATE_README',
  'ASSIGN_TODO_ISSUES',
  'PROPOSAL_DIR',
  'PROJECT_NUMBER',
  'PROJECT_OWNER',
  'SLACK_CHANNEL_ID'
] as const;

const DEFAULTS: Record<string, unknown> = {
  TIMEZONE: 'Asia/Seoul',
  ISSUE_PREFIX: '📅',
  ISSUE_LABEL: 'DSR',
  EXCLUDED_COMMITS: '^(chore|docs|style):',
  EXCLUDED_TYPES: [],
  UPDATE_README: false,
  ASSIGN_TODO_ISSUES: true,
  PROPOSAL_DIR: 'TaskProposals'
};

const booleanSetting = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value),
  z.boolean()
);

const listSetting = z.union([
  z.array(z.string()),
  z.string().transform(value => value.split(',').map(s => s.trim()).filter(Boolean))
]);

const optionalString = z.preprocess(
  value => (value === '' || value === null ? undefined : value),
  z.string().optional()
);

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const ConfigSchema = z.object({
  TOKEN: z.string({ required_error: 'GITHUB_TOKEN or PAT is required' }).min(1, 'GITHUB_TOKEN or PAT is required'),
  GITHUB_REPOSITORY: z
    .string({ required_error: 'GITHUB_REPOSITORY is required' })
    .regex(/^[^/\s]+\/[^/\s]+$/, 'GITHUB_REPOSITORY must look like owner/repo'),
  GITHUB_REF: z.string().default(''),
  GITHUB_SHA: z.string().default(''),
  GITHUB_ACTOR: z.string().default(''),
  GITHUB_EVENT_NAME: z.string().default(''),
  GITHUB_EVENT_PATH: optionalString,
  GITHUB_WORKSPACE: optionalString,
  TIMEZONE: z.string().refine(isValidTimeZone, tz => ({ message: `Unknown timezone: ${tz}` })),
  ISSUE_PREFIX: z.string(),
  ISSUE_LABEL: z.string().min(1),
  EXCLUDED_COMMITS: z
    .string()
    .refine(isValidPattern, pattern => ({ message: `Invalid EXCLUDED_COMMITS pattern: ${pattern}` })),
  EXCLUDED_TYPES: listSetting,
  UPDATE_README: booleanSetting,
  ASSIGN_TODO_ISSUES: booleanSetting,
  PROPOSAL_DIR: z.string().min(1),
  PROJECT_NUMBER: z.preprocess(
    value => (value === '' || value === null ? undefined : value),
    z.coerce.number().int().positive().optional()
  ),
  PROJECT_OWNER: optionalString,
  SLACK_BOT_TOKEN: optionalString,
  SLACK_CHANNEL_ID: optionalString
});

/**
 * Read an action input, falling back to the plain environment variable
 */
export function getInput(name: string, env: Env = process.env): string | undefined {
  return env[`INPUT_${name}`] || env[name] || undefined;
}

/**
 * Replace ${VAR} and ${VAR:default} with environment values
 */
export function substituteEnv(text: string, env: Env): string {
  return text.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::([^}]*))?\}/g,
    (_match, name: string, fallback: string | undefined) => env[name] ?? fallback ?? ''
  );
}

/**
 * Parse a YAML config file body into settings keyed by environment name
 */
export function parseConfigFile(text: string, env: Env): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(substituteEnv(text, env));
  } catch (error) {
    throw new Error(`Failed to parse config file: ${errorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Failed to parse config file: top level must be a mapping');
  }

  const values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    const name = FILE_SETTINGS.find(setting => setting.toLowerCase() === key.toLowerCase());
    if (!name) {
      console.warn(`Ignoring unknown config key: ${key}`);
      continue;
    }
    values[name] = value;
  }
  return values;
}

async function readConfigFile(env: Env): Promise<Record<string, unknown>> {
  const configPath = getInput('CONFIG_PATH', env) || env.AUTOMATION_CONFIG;
  if (!configPath) {
    return {};
  }

  const resolved = path.resolve(env.GITHUB_WORKSPACE || process.cwd(), configPath);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  console.log(`Loading config from ${configPath}`);
  return parseConfigFile(await fs.readFile(resolved, 'utf-8'), env);
}

/**
 * Build the validated configuration for one run
 * @throws Error describing every invalid setting
 */
export async function loadConfig(env: Env = process.env): Promise<AutomationConfig> {
  const raw: Record<string, unknown> = { ...DEFAULTS, ...(await readConfigFile(env)) };

  for (const name of [...FILE_SETTINGS, 'SLACK_BOT_TOKEN']) {
    const value = getInput(name, env);
    if (value !== undefined) {
      raw[name] = value;
    }
  }
  for (const name of ['GITHUB_REPOSITORY', 'GITHUB_REF', 'GITHUB_SHA', 'GITHUB_ACTOR', 'GITHUB_EVENT_NAME', 'GITHUB_EVENT_PATH', 'GITHUB_WORKSPACE']) {
    raw[name] = env[name];
  }
  raw.TOKEN = getInput('PAT', env) || getInput('GITHUB_TOKEN', env);

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = result.data;
  const [owner, repo] = values.GITHUB_REPOSITORY.split('/');

  return {
    token: values.TOKEN,
    repository: { owner, repo },
    ref: values.GITHUB_REF,
    branch: values.GITHUB_REF.replace(/^refs\/heads\//, ''),
    sha: values.GITHUB_SHA,
    actor: values.GITHUB_ACTOR,
    eventName: values.GITHUB_EVENT_NAME,
    eventPath: values.GITHUB_EVENT_PATH,
    workspace: values.GITHUB_WORKSPACE ?? process.cwd(),
    timezone: values.TIMEZONE,
    issuePrefix: values.ISSUE_PREFIX,
    dsrLabel: values.ISSUE_LABEL,
    excludedPattern: values.EXCLUDED_COMMITS ? new RegExp(values.EXCLUDED_COMMITS) : null,
    excludedTypes: values.EXCLUDED_TYPES,
    updateReadme: values.UPDATE_README,
    assignTodoIssues: values.ASSIGN_TODO_ISSUES,
    proposalDir: values.PROPOSAL_DIR,
    projectNumber: values.PROJECT_NUMBER ?? null,
    projectOwner: values.PROJECT_OWNER ?? owner,
    slackToken: values.SLACK_BOT_TOKEN,
    slackChannel: values.SLACK_CHANNEL_ID
  };
}
