/**
 * Row-oriented table helpers.
 *
 * The API answers with nested JSON records. These helpers flatten them into
 * rows with snake_case column names and collect the column list in first-seen
 * order.
 */

import type { Cell, Table } from './types';

/**
 * Convert a camelCase, PascalCase or dashed key to snake_case.
 *
 * @example
 * ```typescript
 * toSnakeCase('uploadedAt');      // 'uploaded_at'
 * toSnakeCase('HTTPStatus');      // 'http_status'
 * toSnakeCase('first-of-round');  // 'first_of_round'
 * ```
 */
export function toSnakeCase(key: string): string {
  return key
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}

export function snakeCaseKeys<T>(record: Record<string, T>): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    result[toSnakeCase(key)] = value;
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

export interface FlattenOptions {
  /** Nested objects whose fields become `<prefix>_<field>` columns */
  prefixed?: string[];
  /** Nested objects whose fields are lifted without prefix */
  merged?: string[];
  /** Renames applied to keys before snake-casing, per nested object ('' = top level) */
  renames?: Record<string, Record<string, string>>;
  /** Keys dropped, per nested object ('' = top level) */
  drop?: Record<string, string[]>;
}

/**
 * Flatten one API record into a single row.
 *
 * Top-level scalars are kept, objects named in `merged` are lifted into the
 * row, objects named in `prefixed` become `<name>_<field>` columns, and any
 * other nested value is serialized as JSON. Every key ends up snake_cased.
 */
export function flattenRecord(record: Record<string, unknown>, options: FlattenOptions = {}): Record<string, Cell> {
  const prefixed = new Set(options.prefixed ?? []);
  const merged = new Set(options.merged ?? []);
  const row: Record<string, Cell> = {};

  const put = (scope: string, key: string, value: unknown, prefix?: string) => {
    if (options.drop?.[scope]?.includes(key)) return;
    const renamed = options.renames?.[scope]?.[key] ?? key;
    const column = toSnakeCase(prefix ? `${prefix}_${renamed}` : renamed);
    row[column] = toCell(value);
  };

  // Nested objects first so that top-level fields win on a name clash
  for (const [key, value] of Object.entries(record)) {
    if (!isPlainObject(value)) continue;
    if (merged.has(key)) {
      for (const [inner, innerValue] of Object.entries(value)) put(key, inner, innerValue);
    } else if (prefixed.has(key)) {
      for (const [inner, innerValue] of Object.entries(value)) put(key, inner, innerValue, key);
    }
  }

  for (const [key, value] of Object.entries(record)) {
    if (isPlainObject(value) && (merged.has(key) || prefixed.has(key))) continue;
    put('', key, value);
  }

  return row;
}

/**
 * Build a table from rows, collecting columns in first-seen order. Rows that
 * lack a column get `null` for it.
 */
export function toTable<Row extends Record<string, unknown>>(
  rows: Row[],
  leading: string[] = []
): Table<Row> {
  const seen = new Set<string>(leading);
  const columns = [...leading];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const filled = rows.map((row) => {
    const copy = { ...row };
    for (const name of columns) {
      if (!Object.hasOwn(copy, name)) Object.assign(copy, { [name]: null });
    }
    return copy;
  });

  return { columns, rows: filled };
}

/**
 * Values of one column.
 */
export function column<Row extends Record<string, unknown>, K extends keyof Row & string>(
  table: Table<Row>,
  name: K
): Array<Row[K]> {
  return table.rows.map((row) => row[name]);
}

/**
 * Largest numeric value in a column, or undefined for an empty or
 * non-numeric column.
 */
export function maxOf<Row extends Record<string, unknown>>(table: Table<Row>, name: keyof Row & string): number | undefined {
  let max: number | undefined;
  for (const row of table.rows) {
    const value = row[name];
    if (typeof value === 'number' && Number.isFinite(value) && (max === undefined || value > max)) {
      max = value;
    }
  }
  return max;
}
