import { createTable } from '../lib/table';
import { logger } from '../logger';
import { CellValue, ColumnSchema, StudentRow, Table } from '../types';
import { ROSTER_EMAIL } from './normalizerService';

/**
 * Inner join on the identifier, roster order kept. Students in only one of
 * the two sources are dropped. A grade column whose name the roster already
 * uses is kept with a `_y` suffix.
 */
export function joinRosterGrades(roster: Table, grades: Table): Table {
  const rightName = (c: string) => (roster.columns.includes(c) ? `${c}_y` : c);

  const table = createTable(roster.indexName, [...roster.columns, ...grades.columns.map(rightName)]);

  for (const [id, left] of roster.rows) {
    const right = grades.rows.get(id);
    if (!right) continue;
    const row: StudentRow = {};
    for (const c of roster.columns) row[c] = left[c] ?? null;
    for (const c of grades.columns) row[rightName(c)] = right[c] ?? null;
    table.rows.set(id, row);
  }

  const dropped = roster.rows.size + grades.rows.size - 2 * table.rows.size;
  if (dropped > 0) {
    logger.warn({
      module: 'services.merge',
      roster_only: roster.rows.size - table.rows.size,
      grades_only: grades.rows.size - table.rows.size,
    }, 'Students missing from roster or grades dropped');
  }
  return table;
}

/** Left join: every student stays, quiz cells absent when the email has no entry. */
export function joinQuizzes(table: Table, quizzes: Table, emailColumn: string = ROSTER_EMAIL): Table {
  for (const column of quizzes.columns) {
    if (!table.columns.includes(column)) table.columns.push(column);
  }

  let matched = 0;
  for (const row of table.rows.values()) {
    const email = row[emailColumn];
    const quizRow = typeof email === 'string' ? quizzes.rows.get(email) : undefined;
    if (quizRow) matched++;
    for (const column of quizzes.columns) {
      row[column] = quizRow?.[column] ?? null;
    }
  }

  logger.info({ module: 'services.merge', quiz_columns: quizzes.columns.length, matched_students: matched }, 'Quizzes joined');
  return table;
}

export function mergeSources(roster: Table, grades: Table, quizzes: Table | null): Table {
  const merged = joinRosterGrades(roster, grades);
  if (quizzes && quizzes.columns.length > 0) {
    joinQuizzes(merged, quizzes);
  }

  logger.info({ module: 'services.merge', student_count: merged.rows.size, column_count: merged.columns.length }, 'Sources merged');
  return merged;
}

/**
 * Absent earned points count as zero. Max points and quizzes stay absent: a
 * missing maximum means no score, and quiz averages skip missing attempts.
 */
export function fillCategoryGaps(table: Table, schema: ColumnSchema): Table {
  const earned = [...schema.exams.map((e) => e.earned), ...schema.homework.earned];
  for (const row of table.rows.values()) {
    for (const column of earned) {
      const value: CellValue = row[column] ?? null;
      if (value === null) row[column] = 0;
    }
  }
  return table;
}
