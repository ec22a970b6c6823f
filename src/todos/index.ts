/**
 * Categorised TODO checklist kept in the Todo section of a report issue
 */

import { DEFAULT_CATEGORY, type TodoEntry } from '../commits/parser.js';

export interface TodoItem {
  text: string;
  checked: boolean;
  issueNumber?: number;
  requestIssue: boolean;
}

export interface TodoCategory {
  name: string;
  items: TodoItem[];
}

export interface TodoStats {
  done: number;
  total: number;
}

export interface PendingIssueRequest {
  category: string;
  item: TodoItem;
}

const SUMMARY_PATTERN = /📑\s*(.+?)(?:\s*\(\d+\/\d+\))?\s*(?:<\/h3>)?\s*<\/summary>/;
const ITEM_PATTERN = /^-\s*\[([ xX])\]\s*(.*)$/;
const LINK_PATTERN = /\s*\(#(\d+)\)$/;
// "(#12)" typed at the end of an item is kept as text, not read as a link
const TRAILING_REFERENCE = /\(#(\d+)\)$/;
const ESCAPED_REFERENCE = /\(\\#(\d+)\)$/;
const REQUEST_PATTERN = /^\(issue\)\s*/i;

function countDone(items: TodoItem[]): TodoStats {
  return {
    done: items.filter(item => item.checked).length,
    total: items.length
  };
}

function renderItem(item: TodoItem): string {
  const box = item.checked ? '[x]' : '[ ]';
  const text = item.text.replace(TRAILING_REFERENCE, '(\\#$1)');
  if (item.issueNumber !== undefined) {
    return `- ${box} ${text} (#${item.issueNumber})`;
  }
  if (item.requestIssue) {
    return `- ${box} (issue) ${text}`;
  }
  return `- ${box} ${text}`;
}

export class TodoList {
  private categories: TodoCategory[] = [];

  /**
   * Build a list from parsed commit entries, in commit order
   */
  static fromEntries(entries: TodoEntry[]): TodoList {
    const list = new TodoList();
    for (const entry of entries) {
      list.add(entry.category, {
        text: entry.text,
        checked: entry.checked,
        requestIssue: entry.requestIssue
      });
    }
    return list;
  }

  /**
   * Parse a rendered Todo section back into a list
   */
  static parse(markdown: string): TodoList {
    const list = new TodoList();
    let category = DEFAULT_CATEGORY;

    for (const rawLine of markdown.split(/\r?\n/)) {
      const line = rawLine.trim();

      const summary = line.match(SUMMARY_PATTERN);
      if (summary) {
        category = summary[1].trim();
        continue;
      }

      const item = line.match(ITEM_PATTERN);
      if (!item) continue;

      let text = item[2].trim();
      let issueNumber: number | undefined;
      const link = text.match(LINK_PATTERN);
      if (link) {
        issueNumber = parseInt(link[1], 10);
        text = text.slice(0, link.index).trim();
      }
      text = text.replace(ESCAPED_REFERENCE, '(#$1)');

      let requestIssue = false;
      const request = text.match(REQUEST_PATTERN);
      if (request) {
        requestIssue = true;
        text = text.slice(request[0].length).trim();
      }

      list.add(category, {
        text,
        checked: item[1].toLowerCase() === 'x',
        issueNumber,
        requestIssue
      });
    }

    return list;
  }

  private findCategory(name: string): TodoCategory | undefined {
    const key = name.trim().toLowerCase();
    return this.categories.find(c => c.name.toLowerCase() === key);
  }

  /**
   * Add an item, merging with an existing one of the same text.
   * Merging never unchecks an item and never drops a known issue link.
   */
  add(categoryName: string, item: Partial<TodoItem> & { text: string }): void {
    const text = item.text.trim();
    if (!text) return;

    const name = categoryName.trim() || DEFAULT_CATEGORY;
    let category = this.findCategory(name);
    if (!category) {
      category = { name, items: [] };
      this.categories.push(category);
    }

    const existing = category.items.find(i => i.text === text);
    if (existing) {
      existing.checked = existing.checked || Boolean(item.checked);
      existing.issueNumber = existing.issueNumber ?? item.issueNumber;
      existing.requestIssue =
        existing.issueNumber === undefined && (existing.requestIssue || Boolean(item.requestIssue));
      return;
    }

    category.items.push({
      text,
      checked: Boolean(item.checked),
      issueNumber: item.issueNumber,
      requestIssue: item.issueNumber === undefined && Boolean(item.requestIssue)
    });
  }

  /**
   * Add every item of another list, keeping this list's category order first
   */
  merge(other: TodoList): void {
    for (const category of other.getCategories()) {
      for (const item of category.items) {
        this.add(category.name, item);
      }
    }
  }

  /**
   * Copy containing only the unchecked items, for migration
   */
  unchecked(): TodoList {
    const list = new TodoList();
    for (const category of this.categories) {
      for (const item of category.items) {
        if (!item.checked) {
          list.add(category.name, item);
        }
      }
    }
    return list;
  }

  pendingIssueRequests(): PendingIssueRequest[] {
    const requests: PendingIssueRequest[] = [];
    for (const category of this.categories) {
      for (const item of category.items) {
        if (item.requestIssue && item.issueNumber === undefined) {
          requests.push({ category: category.name, item: { ...item } });
        }
      }
    }
    return requests;
  }

  /**
   * Attach an issue number to an item
   * @returns false when no such item exists
   */
  linkIssue(categoryName: string, text: string, issueNumber: number): boolean {
    const item = this.findCategory(categoryName)?.items.find(i => i.text === text.trim());
    if (!item) return false;
    item.issueNumber = issueNumber;
    item.requestIssue = false;
    return true;
  }

  stats(): TodoStats {
    return countDone(this.categories.flatMap(c => c.items));
  }

  isEmpty(): boolean {
    return this.categories.every(c => c.items.length === 0);
  }

  /**
   * Categories in render order: General first, then first-seen order
   */
  getCategories(): TodoCategory[] {
    const general = this.categories.filter(c => c.name.toLowerCase() === DEFAULT_CATEGORY.toLowerCase());
    const rest = this.categories.filter(c => c.name.toLowerCase() !== DEFAULT_CATEGORY.toLowerCase());
    return [...general, ...rest]
      .filter(c => c.items.length > 0)
      .map(c => ({ name: c.name, items: c.items.map(item => ({ ...item })) }));
  }

  render(): string {
    return this.getCategories()
      .map(category => {
        const { done, total } = countDone(category.items);
        return [
          '<details>',
          `<summary><h3 style="display: inline;">📑 ${category.name} (${done}/${total})</h3></summary>`,
          '',
          ...category.items.map(renderItem),
          '',
          '</details>'
        ].join('\n');
      })
      .join('\n\n');
  }
}
