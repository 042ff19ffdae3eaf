import type { PageLink } from './types.js';

function field(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Links as CSV with a `text,href,same_host` header and CRLF line endings.
 */
export function linksToCsv(links: PageLink[]): string {
  const rows = [['text', 'href', 'same_host'], ...links.map((l) => [l.text, l.href, l.sameHost ? 'True' : 'False'])];
  return rows.map((row) => `${row.map(field).join(',')}\r\n`).join('');
}
