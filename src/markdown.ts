import { format } from 'date-fns';
import { TreeValue } from './types.js';

export const NOT_SET = '*(not set)*';

const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

// The one line that differs between runs over unchanged input
const TIMESTAMP_LINE_PATTERN = /^\*Generated: \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\*$/gm;

export function timestampLine(generatedAt: Date): string {
  return `*Generated: ${format(generatedAt, TIMESTAMP_FORMAT)}*`;
}

/**
 * Replace the timestamp line with a placeholder so two renderings can be compared.
 */
export function normalizeTimestamp(content: string): string {
  return content.replace(TIMESTAMP_LINE_PATTERN, '*Generated: TIMESTAMP*');
}

/**
 * Generate a URL-safe slug from text
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, '') // Remove non-word chars except spaces and hyphens
    .trim()
    .replace(/\s+/g, '-')     // Replace spaces with hyphens
    .replace(/-+/g, '-');     // Collapse multiple hyphens
}

export function code(text: string): string {
  return `\`${text.replace(/`/g, "'")}\``;
}

export function link(text: string, anchor: string): string {
  return `[${text}](#${anchor})`;
}

/**
 * Escape text for a table cell: pipes escaped, newlines folded.
 */
export function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ').trim();
}

/**
 * Render a decoded value the way it appears in a table.
 */
export function formatValue(value: TreeValue | undefined): string {
  if (value === undefined || value === null) return NOT_SET;
  if (typeof value === 'boolean') return value ? '`true`' : '`false`';
  if (typeof value === 'string' || typeof value === 'number') return code(String(value));
  if (Array.isArray(value)) {
    if (value.length === 0) return '*(empty)*';
    return value.map(formatValue).join(', ');
  }
  return `*(${value.size} ${value.size === 1 ? 'entry' : 'entries'})*`;
}

export function table(headers: string[], rows: string[][]): string[] {
  return [
    tableRow(headers),
    tableRow(headers.map(() => '---')),
    ...rows.map(row => tableRow(row.map(cell)))
  ];
}

function tableRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}
