import * as XLSX from 'xlsx';
import { SchemaMismatchError } from '../errors';
import { CellValue, RawSheet, Table } from '../types';

/**
 * Decodes CSV text into a header row and string cells. Cells are read as
 * plain text; typing happens in the normalizer, where the column's role is known.
 */
export function parseCsv(text: string, source: string): RawSheet {
  if (text.trim() === '') {
    return { source, headers: [], rows: [] };
  }

  let grid: unknown[][];
  try {
    const workbook = XLSX.read(text, { type: 'string', raw: true });
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) return { source, headers: [], rows: [] };
    grid = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
      header: 1,
      defval: '',
      blankrows: false,
      raw: true,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SchemaMismatchError(`Unreadable CSV (${message})`, source);
  }

  const [headerRow = [], ...body] = grid;
  const headers = headerRow.map(cellText);
  const rows = body.map((row) => headers.map((_, i) => cellText(row[i])));
  return { source, headers, rows };
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** `''` is absent; anything else must be a finite decimal or the result is `undefined`. */
export function parseNumber(cell: string): number | null | undefined {
  if (cell === '') return null;
  if (!DECIMAL.test(cell)) return undefined;
  const n = Number(cell);
  return Number.isFinite(n) ? n : undefined;
}

export function csvEscape(val: unknown): string {
  const str = String(val ?? '');
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return String(value);
  return csvEscape(value);
}

/** Comma-separated, header row first, index column first. */
export function toCsv(table: Table): string {
  const headers = [table.indexName, ...table.columns].map(csvEscape).join(',');
  const rows = [...table.rows].map(([id, row]) =>
    [csvEscape(id), ...table.columns.map((c) => formatCell(row[c]))].join(','),
  );
  return [headers, ...rows].join('\n');
}
