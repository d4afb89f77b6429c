import { MissingColumnError, SchemaMismatchError } from '../errors';
import { parseCsv, parseNumber } from '../lib/csv';
import { createTable } from '../lib/table';
import { logger } from '../logger';
import { CellValue, RawSheet, SourceFile, Table } from '../types';

export const ROSTER_ID = 'NetID';
export const ROSTER_SECTION = 'Section';
export const ROSTER_EMAIL = 'Email Address';
export const GRADES_ID = 'SID';
export const QUIZ_EMAIL = 'Email';
export const QUIZ_GRADE = 'Grade';

const EXCLUDED_GRADE_COLUMN = 'Submission';

function requireColumns(sheet: RawSheet, columns: string[]): number[] {
  return columns.map((column) => {
    const idx = sheet.headers.indexOf(column);
    if (idx === -1) throw new MissingColumnError(column, sheet.source);
    return idx;
  });
}

function assertUniqueKey(table: Table, key: string, sheet: RawSheet, keyColumn: string): void {
  if (key === '') {
    throw new SchemaMismatchError(`Empty ${keyColumn} value`, sheet.source);
  }
  if (table.rows.has(key)) {
    throw new SchemaMismatchError(`Duplicate ${keyColumn} "${key}"`, sheet.source);
  }
}

export function normalizeRoster(file: SourceFile): Table {
  const sheet = parseCsv(file.content, file.file_name);
  const [idIdx, sectionIdx, emailIdx] = requireColumns(sheet, [ROSTER_ID, ROSTER_SECTION, ROSTER_EMAIL]);

  const table = createTable(ROSTER_ID, [ROSTER_SECTION, ROSTER_EMAIL]);
  for (const cells of sheet.rows) {
    const id = cells[idIdx].toLowerCase();
    assertUniqueKey(table, id, sheet, ROSTER_ID);
    table.rows.set(id, {
      [ROSTER_SECTION]: cells[sectionIdx],
      [ROSTER_EMAIL]: cells[emailIdx].toLowerCase(),
    });
  }

  logger.info({ module: 'services.normalizer', source: file.file_name, student_count: table.rows.size }, 'Roster loaded');
  return table;
}

/** A column is numeric when every non-empty cell parses; otherwise it stays text. */
function typeColumn(sheet: RawSheet, idx: number): CellValue[] {
  const cells = sheet.rows.map((row) => row[idx]);
  const numbers = cells.map(parseNumber);
  if (numbers.every((n) => n !== undefined)) {
    return numbers.map((n) => n ?? null);
  }
  return cells.map((c) => (c === '' ? null : c));
}

export function normalizeGrades(file: SourceFile): Table {
  const sheet = parseCsv(file.content, file.file_name);
  const [idIdx] = requireColumns(sheet, [GRADES_ID]);

  const kept = sheet.headers
    .map((header, idx) => ({ header, idx }))
    .filter(({ header, idx }) => idx !== idIdx && header !== '' && !header.includes(EXCLUDED_GRADE_COLUMN));

  const seen = new Set<string>();
  for (const { header } of kept) {
    if (seen.has(header)) throw new SchemaMismatchError(`Duplicate column "${header}"`, sheet.source);
    seen.add(header);
  }

  const typed = kept.map(({ idx }) => typeColumn(sheet, idx));
  const table = createTable(GRADES_ID, kept.map(({ header }) => header));

  sheet.rows.forEach((cells, rowIdx) => {
    const id = cells[idIdx].toLowerCase();
    assertUniqueKey(table, id, sheet, GRADES_ID);
    const row: Record<string, CellValue> = {};
    kept.forEach(({ header }, colIdx) => {
      row[header] = typed[colIdx][rowIdx];
    });
    table.rows.set(id, row);
  });

  logger.info({
    module: 'services.normalizer',
    source: file.file_name,
    student_count: table.rows.size,
    column_count: table.columns.length,
    dropped_columns: sheet.headers.length - kept.length - 1,
  }, 'Grades loaded');
  return table;
}

function titleCase(text: string): string {
  let out = '';
  let prevIsLetter = false;
  for (const ch of text) {
    const isLetter = ch.toLowerCase() !== ch.toUpperCase();
    out += isLetter && !prevIsLetter ? ch.toUpperCase() : ch.toLowerCase();
    prevIsLetter = isLetter;
  }
  return out;
}

/** `uploads/quiz_3_makeup.csv` -> `Quiz 3` */
export function quizLabel(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const stem = base.replace(/\.csv$/i, '');
  return titleCase(stem.replace(/_/g, ' ')).split(/\s+/).filter(Boolean).slice(0, 2).join(' ');
}

export function normalizeQuiz(file: SourceFile): Table {
  const sheet = parseCsv(file.content, file.file_name);
  const [emailIdx, gradeIdx] = requireColumns(sheet, [QUIZ_EMAIL, QUIZ_GRADE]);
  const label = quizLabel(file.file_name);

  const table = createTable(QUIZ_EMAIL, [label]);
  for (const cells of sheet.rows) {
    const email = cells[emailIdx].toLowerCase();
    assertUniqueKey(table, email, sheet, QUIZ_EMAIL);
    const grade = parseNumber(cells[gradeIdx]);
    if (grade === undefined) {
      throw new SchemaMismatchError(`Non-numeric ${QUIZ_GRADE} "${cells[gradeIdx]}" for ${email}`, sheet.source);
    }
    table.rows.set(email, { [label]: grade });
  }
  return table;
}

/**
 * Aligns every quiz on email. A student missing from a quiz has no value for
 * it. Files sharing a label collapse into one column, the later file winning.
 */
export function combineQuizzes(files: SourceFile[]): Table {
  const combined = createTable(QUIZ_EMAIL);

  for (const file of files) {
    const quiz = normalizeQuiz(file);
    const [label] = quiz.columns;

    if (combined.columns.includes(label)) {
      logger.warn({ module: 'services.normalizer', source: file.file_name, quiz_label: label }, 'Quiz label collision, later file replaces column');
      for (const row of combined.rows.values()) {
        row[label] = null;
      }
    } else {
      combined.columns.push(label);
    }

    for (const [email, values] of quiz.rows) {
      const row = combined.rows.get(email);
      if (row) {
        row[label] = values[label];
      } else {
        combined.rows.set(email, { [label]: values[label] });
      }
    }
  }

  for (const row of combined.rows.values()) {
    for (const column of combined.columns) {
      row[column] = row[column] ?? null;
    }
  }

  logger.info({ module: 'services.normalizer', quiz_count: files.length, quiz_labels: combined.columns }, 'Quizzes loaded');
  return combined;
}
