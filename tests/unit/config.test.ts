/**
 * Unit tests for config loading
 */

import path from 'path';
import fs from 'fs-extra';
import { dir as tmpDir } from 'tmp-promise';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getInput, loadConfig, parseConfigFile, substituteEnv, type Env } from '../../src/shared/config.js';

describe('loadConfig', () => {
  let tmp: Awaited<ReturnType<typeof tmpDir>>;
  let env: Env;

  beforeEach(async () => {
    tmp = await tmpDir({ unsafeCleanup: true });
    env = {
      GITHUB_TOKEN: 'test-token',
      GITHUB_REPOSITORY: 'test/repo',
      GITHUB_REF: 'refs/heads/feature/search',
      GITHUB_WORKSPACE: tmp.path
    };
  });

  afterEach(async () => {
    await tmp.cleanup();
    vi.restoreAllMocks();
  });

  it('should apply defaults', async () => {
    const config = await loadConfig(env);

    expect(config.token).toBe('test-token');
    expect(config.repository).toEqual({ owner: 'test', repo: 'repo' });
    expect(config.branch).toBe('feature/search');
    expect(config.timezone).toBe('Asia/Seoul');
    expect(config.issuePrefix).toBe('📅');
    expect(config.dsrLabel).toBe('DSR');
    expect(config.excludedPattern?.source).toBe('^(chore|docs|style):');
    expect(config.excludedTypes).toEqual([]);
    expect(config.updateReadme).toBe(false);
    expect(config.assignTodoIssues).toBe(true);
    expect(config.proposalDir).toBe('TaskProposals');
    expect(config.projectNumber).toBeNull();
    expect(config.projectOwner).toBe('test');
    expect(config.slackToken).toBeUndefined();
    expect(config.workspace).toBe(tmp.path);
  });

  it('should prefer PAT over GITHUB_TOKEN and inputs over plain variables', async () => {
    const config = await loadConfig({
      ...env,
      PAT: 'test-pat',
      ISSUE_LABEL: 'Other',
      INPUT_ISSUE_LABEL: 'Daily',
      UPDATE_README: 'TRUE',
      EXCLUDED_TYPES: 'test, chore'
    });

    expect(config.token).toBe('test-pat');
    expect(config.dsrLabel).toBe('Daily');
    expect(config.updateReadme).toBe(true);
    expect(config.excludedTypes).toEqual(['test', 'chore']);
  });

  it('should layer the YAML file between defaults and the environment', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await fs.writeFile(
      path.join(tmp.path, 'ledger.yml'),
      [
        'timezone: UTC',
        'issue_label: ${LABEL_NAME:Daily}',
        'excluded_commits: ""',
        'excluded_types: [test, chore]',
        'update_readme: true',
        'project_number: 3',
        'unknown_key: 1'
      ].join('\n')
    );

    const config = await loadConfig({ ...env, CONFIG_PATH: 'ledger.yml', TIMEZONE: 'Europe/Berlin' });

    expect(config.timezone).toBe('Europe/Berlin');
    expect(config.dsrLabel).toBe('Daily');
    expect(config.excludedPattern).toBeNull();
    expect(config.excludedTypes).toEqual(['test', 'chore']);
    expect(config.updateReadme).toBe(true);
    expect(config.projectNumber).toBe(3);
    expect(warn).toHaveBeenCalledWith('Ignoring unknown config key: unknown_key');
  });

  it('should reject a missing token', async () => {
    await expect(loadConfig({ ...env, GITHUB_TOKEN: undefined })).rejects.toThrow(
      'Invalid configuration: TOKEN: GITHUB_TOKEN or PAT is required'
    );
  });

  it('should reject invalid settings', async () => {
    await expect(loadConfig({ ...env, TIMEZONE: 'Mars/Olympus' })).rejects.toThrow('Unknown timezone: Mars/Olympus');
    await expect(loadConfig({ ...env, EXCLUDED_COMMITS: '(' })).rejects.toThrow('Invalid EXCLUDED_COMMITS pattern: (');
    await expect(loadConfig({ ...env, GITHUB_REPOSITORY: 'repo-only' })).rejects.toThrow(
      'GITHUB_REPOSITORY must look like owner/repo'
    );
  });

  it('should reject a config path that does not exist', async () => {
    await expect(loadConfig({ ...env, AUTOMATION_CONFIG: 'missing.yml' })).rejects.toThrow(
      'Config file not found: missing.yml'
    );
  });
});

describe('config helpers', () => {
  it('should substitute variables with optional defaults', () => {
    expect(substituteEnv('${A} ${B:x} ${C}', { A: '1' })).toBe('1 x ');
  });

  it('should require a mapping at the top of the file', () => {
    expect(() => parseConfigFile('- a\n- b', {})).toThrow('Failed to parse config file: top level must be a mapping');
    expect(parseConfigFile('', {})).toEqual({});
  });

  it('should read inputs before plain variables', () => {
    expect(getInput('TIMEZONE', { INPUT_TIMEZONE: 'UTC', TIMEZONE: 'Asia/Seoul' })).toBe('UTC');
    expect(getInput('TIMEZONE', { INPUT_TIMEZONE: '', TIMEZONE: 'Asia/Seoul' })).toBe('Asia/Seoul');
    expect(getInput('TIMEZONE', {})).toBeUndefined();
  });
});
