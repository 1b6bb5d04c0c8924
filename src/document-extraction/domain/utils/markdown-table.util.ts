import { TableResultRow } from '../entities/extraction-result.entity';

const SEPARATOR_CELL = /^:?-+:?$/;

/**
 * Split one pipe-table line into trimmed cells. Leading/trailing pipes are
 * optional and `\|` is a literal pipe inside a cell.
 */
export function splitTableRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith('|')) {
    row = row.slice(1);
  }
  if (row.endsWith('|') && !row.endsWith('\\|')) {
    row = row.slice(0, -1);
  }

  const cells: string[] = [];
  let current = '';
  for (let index = 0; index < row.length; index++) {
    const char = row[index];
    if (char === '\\' && row[index + 1] === '|') {
      current += '|';
      index++;
      continue;
    }
    if (char === '|') {
      cells.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }
  cells.push(current.trim());

  return cells;
}

export function isSeparatorRow(cells: string[]): boolean {
  return (
    cells.length > 0 &&
    cells.every((cell) => SEPARATOR_CELL.test(cell.replace(/\s+/g, '')))
  );
}

/**
 * Blank header cells become `column_<n>`, repeated names get a `.1`, `.2`
 * suffix so every row key stays addressable.
 */
export function uniqueColumnNames(header: string[]): string[] {
  const seen = new Map<string, number>();

  return header.map((cell, index) => {
    const base = cell === '' ? `column_${index + 1}` : cell;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Serialize rows as a markdown pipe table (header, separator, body)
 */
export function toMarkdownTable(
  columns: string[],
  rows: TableResultRow[] = [],
): string {
  const header = `| ${columns.map(escapeCell).join(' | ')} |`;
  const separator = `| ${columns.map(() => '---').join(' | ')} |`;
  const body = rows.map(
    (row) =>
      `| ${columns.map((column) => escapeCell(row[column] ?? '')).join(' | ')} |`,
  );

  return [header, separator, ...body].join('\n');
}
