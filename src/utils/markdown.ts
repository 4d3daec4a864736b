/**
 * Escaping for the Markdown report artifacts. Scenario ids, diff paths and
 * server error messages are copied into reports verbatim, so anything that
 * could close a code span, start a list or split a table row is escaped.
 */

export type ColumnAlignment = 'left' | 'center' | 'right';

/**
 * Escape text for a table cell: pipes are escaped and line breaks become
 * `<br>`.
 */
export function escapeTableCell(text: string): string {
  if (!text) return '';

  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>').trim();
}

/**
 * Wrap text in a code span. Text containing backticks gets a double-backtick
 * fence with padding, which CommonMark strips.
 */
export function escapeInlineCode(text: string): string {
  if (!text) return '``';

  if (text.includes('`')) {
    return `\`\` ${text} \`\``;
  }
  return `\`${text}\``;
}

/**
 * Escape text placed after a list bullet so it cannot start a nested list.
 */
export function escapeListItem(text: string): string {
  if (!text) return '';

  let escaped = text;
  if (/^[-*+]\s/.test(escaped)) {
    escaped = '\\' + escaped;
  }
  if (/^\d+\.\s/.test(escaped)) {
    escaped = escaped.replace(/^(\d+)\./, '$1\\.');
  }
  // Continuation lines stay inside the item
  return escaped.replace(/\r?\n/g, '  \n  ');
}

const SEPARATORS: Record<ColumnAlignment, string> = {
  left: '---',
  center: ':---:',
  right: '---:',
};

/**
 * Build a Markdown table. Cells are escaped; short rows are padded.
 */
export function buildTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  alignments: readonly ColumnAlignment[] = []
): string {
  const lines = [
    `| ${headers.map(escapeTableCell).join(' | ')} |`,
    `| ${headers.map((_, i) => SEPARATORS[alignments[i] ?? 'left']).join(' | ')} |`,
  ];

  for (const row of rows) {
    const cells = headers.map((_, i) => escapeTableCell(row[i] ?? ''));
    lines.push(`| ${cells.join(' | ')} |`);
  }
  return lines.join('\n');
}
