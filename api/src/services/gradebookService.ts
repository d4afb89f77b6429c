import { logger } from '../logger';
import { ColumnSchema, GradebookInput, Table } from '../types';
import { fillCategoryGaps, mergeSources } from './mergeService';
import { combineQuizzes, normalizeGrades, normalizeRoster } from './normalizerService';
import { assertNumericColumns, describeColumns } from './schemaService';
import { scoreGradebook } from './scoringService';

export interface Gradebook {
  table: Table;
  schema: ColumnSchema;
}

/** Load, merge and score one dataset. Any failure aborts the whole run. */
export function runGradebook(input: GradebookInput): Gradebook {
  const started = Date.now();
  const quizFiles = input.quizzes ?? [];

  const roster = normalizeRoster(input.roster);
  const grades = normalizeGrades(input.grades);
  const quizzes = quizFiles.length > 0 ? combineQuizzes(quizFiles) : null;

  const table = mergeSources(roster, grades, quizzes);
  const schema = input.schema ?? describeColumns(table.columns);
  assertNumericColumns(table, schema, input.grades.file_name);

  fillCategoryGaps(table, schema);
  scoreGradebook(table, input.weights, schema);

  logger.info({
    module: 'services.gradebook',
    roster_file: input.roster.file_name,
    grades_file: input.grades.file_name,
    quiz_files: quizFiles.map((f) => f.file_name),
    student_count: table.rows.size,
    duration_ms: Date.now() - started,
  }, 'Gradebook computed');

  return { table, schema };
}
