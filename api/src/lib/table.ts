import { CellValue, StudentRow, Table } from '../types';

export function createTable(indexName: string, columns: string[] = []): Table {
  return { indexName, columns: [...columns], rows: new Map() };
}

export function addColumn(table: Table, column: string): void {
  if (!table.columns.includes(column)) {
    table.columns.push(column);
  }
}

/** Adds or replaces a derived column, computed row by row. */
export function setColumn(
  table: Table,
  column: string,
  compute: (row: StudentRow, id: string) => CellValue,
): void {
  addColumn(table, column);
  for (const [id, row] of table.rows) {
    row[column] = compute(row, id);
  }
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column);
}

export function columnValues(table: Table, column: string): CellValue[] {
  return [...table.rows.values()].map((row) => row[column] ?? null);
}

export function numericOrNull(value: CellValue | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function columnMax(table: Table, column: string): number | null {
  let max: number | null = null;
  for (const value of columnValues(table, column)) {
    const n = numericOrNull(value);
    if (n !== null && (max === null || n > max)) max = n;
  }
  return max;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Rows with `filter` true, in table order, sharing row objects with the source table. */
export function subset(table: Table, filter: (row: StudentRow, id: string) => boolean): Table {
  const out = createTable(table.indexName, table.columns);
  for (const [id, row] of table.rows) {
    if (filter(row, id)) out.rows.set(id, row);
  }
  return out;
}
