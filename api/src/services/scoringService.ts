import { SchemaMismatchError } from '../errors';
import { columnMax, hasColumn, mean, numericOrNull, setColumn } from '../lib/table';
import { logger } from '../logger';
import { ColumnSchema, GradeThreshold, LetterGrade, StudentRow, Table, WeightConfig } from '../types';
import { describeColumns } from './schemaService';

export const HOMEWORK_SCORE = 'Homework Score';
export const QUIZ_SCORE = 'Quiz Score';
export const FINAL_SCORE = 'Final Score';
export const CEILING_SCORE = 'Ceiling Score';
export const FINAL_GRADE = 'Final Grade';

// Evaluated top to bottom; order matters.
export const GRADE_THRESHOLDS: readonly GradeThreshold[] = [
  { min: 90, grade: 'A' },
  { min: 80, grade: 'B' },
  { min: 70, grade: 'C' },
  { min: 60, grade: 'D' },
  { min: 0, grade: 'F' },
];

export function computeGrade(ceilingScore: number): LetterGrade {
  for (const { min, grade } of GRADE_THRESHOLDS) {
    if (ceilingScore >= min) return grade;
  }
  return 'F';
}

export function ceilingScore(finalScore: number): number {
  return Math.ceil(finalScore * 100);
}

function ratio(earned: number | null, max: number | null): number | null {
  if (earned === null || max === null || max === 0) return null;
  return earned / max;
}

function sumPresent(row: StudentRow, columns: string[]): number {
  return columns.reduce((sum, c) => sum + (numericOrNull(row[c]) ?? 0), 0);
}

export function computeExamScores(table: Table, schema: ColumnSchema): void {
  for (const exam of schema.exams) {
    setColumn(table, exam.score, (row) => ratio(numericOrNull(row[exam.earned]), numericOrNull(row[exam.max])));
  }
}

/** One combined score: maxima only need to balance in aggregate. */
export function computeHomeworkScore(table: Table, schema: ColumnSchema): void {
  const { earned, max } = schema.homework;
  setColumn(table, HOMEWORK_SCORE, (row) => ratio(sumPresent(row, earned), sumPresent(row, max)));
}

/**
 * Quiz files carry no maximum, so each quiz is scaled by the best observed
 * grade. Missing attempts are left out of the average rather than counted as 0.
 */
export function computeQuizScore(table: Table, schema: ColumnSchema): void {
  if (schema.quizzes.length === 0) {
    setColumn(table, QUIZ_SCORE, () => 0);
    return;
  }

  const maxima = schema.quizzes.map((column) => ({ column, max: columnMax(table, column) }));
  setColumn(table, QUIZ_SCORE, (row) => {
    const fractions: number[] = [];
    for (const { column, max } of maxima) {
      const fraction = ratio(numericOrNull(row[column]), max);
      if (fraction !== null) fractions.push(fraction);
    }
    return mean(fractions);
  });
}

/**
 * Weight keys without a matching column are skipped; absent cells weigh as 0.
 * Categories are summed in name order so the result does not depend on key order.
 */
export function computeFinalScore(table: Table, weights: WeightConfig): void {
  const applied = Object.entries(weights)
    .filter(([category]) => hasColumn(table, category))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  setColumn(table, FINAL_SCORE, (row, id) =>
    applied.reduce((total, [category, weight]) => {
      const value = row[category] ?? null;
      if (typeof value === 'string') {
        throw new SchemaMismatchError(`Weighted column "${category}" holds text "${value}" for ${id}`, 'merged gradebook');
      }
      return total + (value ?? 0) * weight;
    }, 0),
  );

  const skipped = Object.keys(weights).filter((category) => !hasColumn(table, category));
  if (skipped.length > 0) {
    logger.debug({ module: 'services.scoring', skipped_categories: skipped }, 'Weights without matching column skipped');
  }
}

export function computeLetterGrades(table: Table): void {
  setColumn(table, CEILING_SCORE, (row) => ceilingScore(numericOrNull(row[FINAL_SCORE]) ?? 0));
  setColumn(table, FINAL_GRADE, (row) => computeGrade(numericOrNull(row[CEILING_SCORE]) ?? 0));
}

export function scoreGradebook(table: Table, weights: WeightConfig, schema: ColumnSchema = describeColumns(table.columns)): Table {
  computeExamScores(table, schema);
  computeHomeworkScore(table, schema);
  computeQuizScore(table, schema);
  computeFinalScore(table, weights);
  computeLetterGrades(table);

  logger.info({
    module: 'services.scoring',
    student_count: table.rows.size,
    exam_count: schema.exams.length,
    homework_count: schema.homework.earned.length,
    quiz_count: schema.quizzes.length,
    weighted_categories: Object.keys(weights).filter((c) => hasColumn(table, c)),
  }, 'Gradebook scored');
  return table;
}
