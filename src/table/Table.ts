/**
 * Row/column projection handed to analysis tooling.
 */

import type { ScalarKind } from '../codec/types.js';
import { VendorTimestamp } from '../codec/VendorTimestamp.js';

export interface ColumnSpec {
  name: string;
  kind: ScalarKind;
  nullable: boolean;
}

export type Cell = string | number | Date | null;
export type Row = Record<string, Cell>;

export interface Table {
  columns: ColumnSpec[];
  rows: Row[];
}

export function toCell(column: ColumnSpec, value: unknown): Cell {
  if (value === undefined || value === null) return null;
  if (value instanceof VendorTimestamp) return value.toDate();
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Date) return value;
  throw new TypeError(`Column "${column.name}" cannot hold a value of type ${typeof value}`);
}

/**
 * One row per record. `broadcast` columns are appended to every row with the
 * same value.
 */
export function projectRows(
  columns: readonly ColumnSpec[],
  records: ReadonlyArray<Record<string, unknown>>,
  broadcast?: { columns: readonly ColumnSpec[]; values: Record<string, unknown> }
): Table {
  const constants: Row = {};
  for (const column of broadcast?.columns ?? []) {
    constants[column.name] = toCell(column, broadcast?.values[column.name]);
  }

  const rows = records.map((record) => {
    const row: Row = {};
    for (const column of columns) {
      row[column.name] = toCell(column, record[column.name]);
    }
    return { ...row, ...constants };
  });

  return {
    columns: [...columns, ...(broadcast?.columns ?? [])],
    rows,
  };
}

export interface DelimitedOptions {
  /** Field separator (default: ",") */
  delimiter?: ',' | '\t';
}

function formatCell(cell: Cell | undefined, delimiter: string): string {
  if (cell === null || cell === undefined) return '';
  const text = cell instanceof Date ? cell.toISOString() : String(cell);
  if (text.includes(delimiter) || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replaceAll('"', '""')}"`;
  }
  return text;
}

/**
 * CSV (or TSV) text with a header line and a trailing newline.
 */
export function toDelimited(table: Table, options: DelimitedOptions = {}): string {
  const delimiter = options.delimiter ?? ',';
  const lines = [table.columns.map((c) => formatCell(c.name, delimiter)).join(delimiter)];
  for (const row of table.rows) {
    lines.push(table.columns.map((c) => formatCell(row[c.name], delimiter)).join(delimiter));
  }
  return `${lines.join('\n')}\n`;
}
