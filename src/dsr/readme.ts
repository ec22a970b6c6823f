export const LATEST_REPORT_HEADER = '## 📌 Latest Development Status Report';

/**
 * Point the README's "latest report" section at a report issue.
 * The section runs from its header to the next level 1-2 heading; it is
 * appended when missing.
 */
export function upsertLatestReportLink(readme: string, title: string, issueNumber: number): string {
  const section = [LATEST_REPORT_HEADER, `[${title}](../../issues/${issueNumber})`];
  const lines = readme.split('\n');
  const start = lines.findIndex(line => line.trim() === LATEST_REPORT_HEADER);

  if (start === -1) {
    const base = readme.trimEnd();
    return base ? `${base}\n\n${section.join('\n')}\n` : `${section.join('\n')}\n`;
  }

  let end = start + 1;
  while (end < lines.length && !/^#{1,2}\s/.test(lines[end])) {
    end++;
  }

  return [...lines.slice(0, start), ...section, '', ...lines.slice(end)].join('\n');
}
