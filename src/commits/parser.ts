/**
 * Commit message envelope parser
 *
 * Format:
 *   [type(scope)] Title
 *
 *   [Body]
 *   free text
 *
 *   [Todo]
 *   @Category
 *   - item
 *   - (issue) item that becomes a GitHub issue
 *
 *   [Footer]
 *   Closes #12
 */

export interface CommitTypeInfo {
  emoji: string;
  label: string;
  description: string;
}

// One checklist entry taken from a [Todo] section
export interface TodoEntry {
  category: string;
  text: string;
  checked: boolean;
  requestIssue: boolean;
}

export interface ParsedCommit {
  type: string;
  scope: string | null;
  title: string;
  breaking: boolean;
  typeInfo: CommitTypeInfo;
  body: string[];
  todos: TodoEntry[];
  footer: string[];
}

export interface IssueReferences {
  closes: number[];
  fixes: number[];
  related: number[];
}

export const DEFAULT_CATEGORY = 'General';

export const COMMIT_TYPES: Record<string, CommitTypeInfo> = {
  feat: { emoji: '✨', label: 'feature', description: 'New Feature' },
  fix: { emoji: '🐛', label: 'bug', description: 'Bug Fix' },
  refactor: { emoji: '♻️', label: 'refactor', description: 'Code Refactoring' },
  docs: { emoji: '📝', label: 'documentation', description: 'Documentation Update' },
  test: { emoji: '✅', label: 'test', description: 'Test Update' },
  chore: { emoji: '🔧', label: 'chore', description: 'Build/Config Update' },
  style: { emoji: '💄', label: 'style', description: 'Code Style Update' },
  perf: { emoji: '⚡️', label: 'performance', description: 'Performance Improvement' },
  design: { emoji: '🎨', label: 'design', description: 'Design Changes' },
  comment: { emoji: '💡', label: 'comment', description: 'Comments' },
  rename: { emoji: '🚚', label: 'rename', description: 'Rename/Move' },
  remove: { emoji: '🔥', label: 'remove', description: 'File Removal' },
  debug: { emoji: '🔍', label: 'debug', description: 'Debugging' },
  '!HOTFIX': { emoji: '🚑', label: 'hotfix', description: 'Hotfix' },
  '!BREAKING CHANGE': { emoji: '💥', label: 'breaking-change', description: 'Breaking Change' }
};

const OTHER_TYPE: CommitTypeInfo = { emoji: '🔍', label: 'other', description: 'Other' };

const TITLE_PATTERN = /^\[([^\]()]+)(?:\(([^)]+)\))?\]\s*(.+)$/;
const SECTION_PATTERN = /^\[(body|todo|footer)\](.*)$/i;
const CHECKBOX_PATTERN = /^\[([ xX])\]\s*/;
const ISSUE_MARKER_PATTERN = /^\(issue\)\s*/i;

type Section = 'body' | 'todo' | 'footer';

function toSection(name: string): Section {
  const lower = name.toLowerCase();
  if (lower === 'todo' || lower === 'footer') return lower;
  return 'body';
}

/**
 * Merge commits are logged through the commits they bring in, never by themselves
 */
export function isMergeCommitMessage(message: string): boolean {
  return message.trimStart().startsWith('Merge');
}

/**
 * Look up display info for a commit type, falling back to "Other"
 */
export function getCommitTypeInfo(type: string): CommitTypeInfo {
  return COMMIT_TYPES[type] ?? OTHER_TYPE;
}

/**
 * Parse a commit message into its envelope
 * @returns null for merge commits and messages without a [type] title
 */
export function parseCommitMessage(message: string): ParsedCommit | null {
  if (isMergeCommitMessage(message)) {
    return null;
  }

  const lines = message.trim().split(/\r?\n/);
  const titleMatch = lines[0].trim().match(TITLE_PATTERN);
  if (!titleMatch) {
    return null;
  }

  const rawType = titleMatch[1].trim();
  const type = rawType.startsWith('!') ? rawType.toUpperCase() : rawType.toLowerCase();

  const sections: Record<Section, string[]> = {
    body: [],
    todo: [],
    footer: []
  };
  let current: Section = 'body';

  for (const rawLine of lines.slice(1)) {
    const line = rawLine.trim();
    const header = line.match(SECTION_PATTERN);
    if (header) {
      current = toSection(header[1]);
      const rest = header[2].trim();
      if (rest) {
        sections[current].push(rest);
      }
      continue;
    }
    if (line) {
      sections[current].push(line);
    }
  }

  return {
    type,
    scope: titleMatch[2]?.trim() || null,
    title: titleMatch[3].trim(),
    breaking: type.startsWith('!'),
    typeInfo: getCommitTypeInfo(type),
    body: sections.body,
    todos: parseTodoLines(sections.todo),
    footer: sections.footer
  };
}

/**
 * Parse the lines of a [Todo] section.
 * Categories are matched case-insensitively and keep the casing they were first written with.
 */
export function parseTodoLines(lines: string[]): TodoEntry[] {
  const casing = new Map<string, string>([[DEFAULT_CATEGORY.toLowerCase(), DEFAULT_CATEGORY]]);
  const entries: TodoEntry[] = [];
  let category = DEFAULT_CATEGORY;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith('@')) {
      const name = line.slice(1).replace(/:\s*$/, '').trim() || DEFAULT_CATEGORY;
      const key = name.toLowerCase();
      if (!casing.has(key)) {
        casing.set(key, name);
      }
      category = casing.get(key) ?? name;
      continue;
    }

    if (!line.startsWith('-') && !line.startsWith('*')) {
      continue;
    }

    let text = line.slice(1).trim();
    let checked = false;
    const checkbox = text.match(CHECKBOX_PATTERN);
    if (checkbox) {
      checked = checkbox[1].toLowerCase() === 'x';
      text = text.slice(checkbox[0].length);
    }

    let requestIssue = false;
    const marker = text.match(ISSUE_MARKER_PATTERN);
    if (marker) {
      requestIssue = true;
      text = text.slice(marker[0].length);
    }

    text = text.trim();
    if (text) {
      entries.push({ category, text, checked, requestIssue });
    }
  }

  return entries;
}

/**
 * Extract "#N" references from footer lines, grouped by leading keyword.
 * Lines without a keyword count as related.
 */
export function extractIssueReferences(footer: string[]): IssueReferences {
  const refs: IssueReferences = { closes: [], fixes: [], related: [] };

  for (const line of footer) {
    const numbers = [...line.matchAll(/#(\d+)/g)].map(m => parseInt(m[1], 10));
    if (numbers.length === 0) continue;

    const keyword = line.trim().toLowerCase();
    if (/^close[sd]?\b/.test(keyword)) {
      refs.closes.push(...numbers);
    } else if (/^fix(e[sd])?\b/.test(keyword)) {
      refs.fixes.push(...numbers);
    } else {
      refs.related.push(...numbers);
    }
  }

  return refs;
}

/**
 * Validate a message without keeping the parse result
 */
export function validateCommitMessage(message: string): { valid: boolean; error?: string } {
  if (!message.trim()) {
    return { valid: false, error: 'Empty commit message' };
  }
  if (isMergeCommitMessage(message)) {
    return { valid: false, error: 'Merge commit message' };
  }
  if (!parseCommitMessage(message)) {
    return { valid: false, error: `Invalid commit title format: ${message.trim().split(/\r?\n/)[0]}` };
  }
  return { valid: true };
}

export interface CommitExclusionRules {
  excludedPattern: RegExp | null;
  excludedTypes: string[];
}

/**
 * Check whether a commit should stay out of the daily report
 */
export function isExcludedCommit(
  message: string,
  parsed: ParsedCommit | null,
  rules: CommitExclusionRules
): boolean {
  if (rules.excludedPattern && rules.excludedPattern.test(message)) {
    return true;
  }
  return parsed !== null && rules.excludedTypes.includes(parsed.type);
}
