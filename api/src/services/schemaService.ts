import { SchemaMismatchError } from '../errors';
import { hasColumn, numericOrNull } from '../lib/table';
import { ColumnSchema, ExamColumns, Table } from '../types';

export const EXAM_COUNT = 3;
export const MAX_POINTS_SUFFIX = ' - Max Points';

const HOMEWORK_EARNED = /^Homework \d\d?$/;
const HOMEWORK_MAX = /^Homework \d\d? - Max Points$/;
const QUIZ_PREFIX = /^Quiz/;

/**
 * Declares which raw columns feed which category, based on the column naming
 * of the grades export. Callers with differently named exports pass their own
 * ColumnSchema instead.
 */
export function describeColumns(columns: string[]): ColumnSchema {
  const exams: ExamColumns[] = [];
  for (let n = 1; n <= EXAM_COUNT; n++) {
    const earned = `Exam ${n}`;
    const max = `${earned}${MAX_POINTS_SUFFIX}`;
    if (columns.includes(earned) && columns.includes(max)) {
      exams.push({ earned, max, score: `${earned} Score` });
    }
  }

  return {
    exams,
    homework: {
      earned: columns.filter((c) => HOMEWORK_EARNED.test(c)),
      max: columns.filter((c) => HOMEWORK_MAX.test(c)),
    },
    quizzes: columns.filter((c) => QUIZ_PREFIX.test(c)),
  };
}

export function schemaColumns(schema: ColumnSchema): string[] {
  return [
    ...schema.exams.flatMap((e) => [e.earned, e.max]),
    ...schema.homework.earned,
    ...schema.homework.max,
    ...schema.quizzes,
  ];
}

/** Every declared column must exist and hold only numbers or absent cells. */
export function assertNumericColumns(table: Table, schema: ColumnSchema, source: string): void {
  for (const column of schemaColumns(schema)) {
    if (!hasColumn(table, column)) {
      throw new SchemaMismatchError(`Declared category column "${column}" not found`, source);
    }
    for (const [id, row] of table.rows) {
      const value = row[column] ?? null;
      if (value !== null && numericOrNull(value) === null) {
        throw new SchemaMismatchError(`Non-numeric value "${value}" in column "${column}" for ${id}`, source);
      }
    }
  }
}
