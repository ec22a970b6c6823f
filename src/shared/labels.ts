/**
 * Label vocabulary
 *
 * Issue labels carry all state outside issue bodies:
 * - DSR label (configurable, default "DSR") + branch:{name} on report issues
 * - todo-generated, category:*, priority:* on issues created from TODO items
 * - ⌛/✅/❌/⏸️ on task proposals, 📊 on the progress report
 */

// Head commit messages containing this marker never trigger automation
export const SKIP_MARKER = '[skip-automation]';

// Pushes by these actors are ignored
export const AUTOMATION_ACTORS = ['github-actions[bot]', 'dependabot[bot]', 'renovate[bot]'] as const;

export const TODO_ISSUE_LABEL = 'todo-generated';

export const LABEL_PREFIXES = {
  BRANCH: 'branch:',
  CATEGORY: 'category:',
  PRIORITY: 'priority:',
  TASK: 'task:'
} as const;

export const PROPOSAL_LABELS = {
  PENDING: '⌛ Pending Review'
} as const;

export const APPROVAL_LABELS = {
  APPROVED: '✅ Approved',
  REJECTED: '❌ Rejected',
  ON_HOLD: '⏸️ On Hold'
} as const;

export const REPORT_LABEL = '📊 In Progress';

export const TASK_CATEGORIES = ['🔧 Development', '🎨 UI/UX', '🔍 QA/Testing', '📚 Documentation', '🛠️ Maintenance'] as const;

export const DEFAULT_TASK_CATEGORY: TaskCategory = '🔧 Development';

export type ApprovalLabel = typeof APPROVAL_LABELS[keyof typeof APPROVAL_LABELS];
export type TaskCategory = typeof TASK_CATEGORIES[number];
export type Priority = 'high' | 'medium' | 'low';

export interface LabelDefinition {
  name: string;
  color: string;
  description: string;
}

const DEFAULT_COLOR = '0969DA';

const PRIORITY_COLORS: Record<Priority, string> = {
  high: 'FF6900',
  medium: 'FBCA04',
  low: '0E8A16'
};

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function isAutomationActor(actor: string): boolean {
  return AUTOMATION_ACTORS.some(name => name === actor);
}

// GitHub rejects longer label names
export const MAX_LABEL_LENGTH = 50;

/**
 * Cut a label name down to the length GitHub accepts, marking the cut with "…"
 */
export function fitLabel(name: string): string {
  const chars = Array.from(name);
  return chars.length <= MAX_LABEL_LENGTH ? name : `${chars.slice(0, MAX_LABEL_LENGTH - 1).join('')}…`;
}

export function branchLabel(branch: string): string {
  return fitLabel(`${LABEL_PREFIXES.BRANCH}${branch}`);
}

export function categoryLabel(category: string): string {
  return fitLabel(`${LABEL_PREFIXES.CATEGORY}${category.toLowerCase()}`);
}

export function priorityLabel(priority: Priority): string {
  return `${LABEL_PREFIXES.PRIORITY}${priority}`;
}

/**
 * Colour and description for any label this action applies
 */
export function describeLabel(name: string, dsrLabel: string): LabelDefinition {
  if (name === dsrLabel) {
    return { name, color: 'D73A49', description: 'Daily Status Report' };
  }
  if (name === TODO_ISSUE_LABEL) {
    return { name, color: '0E8A16', description: 'TODO item extracted from commit' };
  }
  if (name.startsWith(LABEL_PREFIXES.BRANCH)) {
    return { name, color: '0052CC', description: `Branch: ${name.slice(LABEL_PREFIXES.BRANCH.length)}` };
  }
  if (name.startsWith(LABEL_PREFIXES.CATEGORY)) {
    return { name, color: '5319E7', description: `Category: ${titleCase(name.slice(LABEL_PREFIXES.CATEGORY.length))}` };
  }
  if (name.startsWith(LABEL_PREFIXES.PRIORITY)) {
    const priority = name.slice(LABEL_PREFIXES.PRIORITY.length);
    const color = priority === 'high' || priority === 'medium' || priority === 'low'
      ? PRIORITY_COLORS[priority]
      : DEFAULT_COLOR;
    return { name, color, description: `Priority: ${titleCase(priority)}` };
  }
  switch (name) {
    case PROPOSAL_LABELS.PENDING:
      return { name, color: 'FBCA04', description: 'Task proposal waiting for review' };
    case APPROVAL_LABELS.APPROVED:
      return { name, color: '0E8A16', description: 'Task proposal approved' };
    case APPROVAL_LABELS.REJECTED:
      return { name, color: 'B60205', description: 'Task proposal rejected' };
    case APPROVAL_LABELS.ON_HOLD:
      return { name, color: 'CCCCCC', description: 'Task proposal on hold' };
    case REPORT_LABEL:
      return { name, color: '1D76DB', description: 'Project progress report' };
  }
  return { name, color: DEFAULT_COLOR, description: `Auto-generated label: ${name}` };
}

/**
 * Value of the first category: label, lower-cased as stored
 */
export function getCategoryFromLabels(labels: string[]): string | null {
  const label = labels.find(l => l.startsWith(LABEL_PREFIXES.CATEGORY));
  return label ? label.slice(LABEL_PREFIXES.CATEGORY.length) : null;
}

export function isApprovalLabel(label: string): label is ApprovalLabel {
  return Object.values(APPROVAL_LABELS).some(value => value === label);
}

/**
 * Task issues are proposals and anything labelled task:*
 */
export function isTaskIssue(labels: string[]): boolean {
  return labels.some(
    l => l.startsWith(LABEL_PREFIXES.TASK) || l === PROPOSAL_LABELS.PENDING || isApprovalLabel(l)
  );
}

export function isTaskCategory(label: string): label is TaskCategory {
  return TASK_CATEGORIES.some(category => category === label);
}
