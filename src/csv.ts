/**
 * CSV serialization for prediction uploads.
 */

import type { Table } from './types';

const NEEDS_QUOTES = /[",\r\n]/;

export function escapeField(value: string | number): string {
  const text = String(value);
  return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serialize a table to CSV: a header row of the table's columns followed by
 * one line per row, in column order, each line ending with `\n`.
 */
export function toCsv(table: Table<Record<string, string | number>>): string {
  const lines = [table.columns.map(escapeField).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((name) => escapeField(row[name] ?? '')).join(','));
  }
  return `${lines.join('\n')}\n`;
}
