import { NotFoundError } from '../errors';
import { parseCsv, parseNumber, toCsv } from '../lib/csv';
import { createTable, subset } from '../lib/table';
import { logger } from '../logger';
import { CellValue, SectionExport, Table } from '../types';
import { ROSTER_SECTION } from './normalizerService';

export const FULL_EXPORT_FILE = 'grades.csv';

export function sectionFileName(section: string): string {
  return `Section_${section}.csv`;
}

export function generateCSV(table: Table): string {
  const csv = toCsv(table);
  logger.info({ module: 'services.export', row_count: table.rows.size, size_bytes: csv.length }, 'Export generated');
  return csv;
}

/** Partitions by section, sorted by section name. */
export function partitionBySection(table: Table): Map<string, Table> {
  const names = [...new Set([...table.rows.values()].map((row) => String(row[ROSTER_SECTION] ?? '')))]
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

  return new Map(names.map((name) => [name, subset(table, (row) => String(row[ROSTER_SECTION] ?? '') === name)]));
}

export function generateSectionCSVs(table: Table): SectionExport[] {
  const exports = [...partitionBySection(table)].map(([section, rows]) => ({
    section,
    file_name: sectionFileName(section),
    row_count: rows.rows.size,
    csv: toCsv(rows),
  }));

  logger.info({ module: 'services.export', section_count: exports.length }, 'Section exports generated');
  return exports;
}

export function generateSectionCSV(table: Table, section: string): string {
  const rows = partitionBySection(table).get(section);
  if (!rows) throw new NotFoundError(`Section ${section} not found`);
  return toCsv(rows);
}

/** Reads an export back: first column is the index, numeric text becomes numbers. */
export function parseGradebookCSV(csv: string, source: string = FULL_EXPORT_FILE): Table {
  const sheet = parseCsv(csv, source);
  const [indexName = '', ...columns] = sheet.headers;
  const table = createTable(indexName, columns);

  for (const cells of sheet.rows) {
    const [id, ...values] = cells;
    const row: Record<string, CellValue> = {};
    columns.forEach((column, i) => {
      const n = parseNumber(values[i]);
      row[column] = n === undefined ? values[i] : n;
    });
    table.rows.set(id, row);
  }
  return table;
}
