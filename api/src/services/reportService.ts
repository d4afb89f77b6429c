import { StudentNotFoundError } from '../errors';
import { columnValues, hasColumn, mean, numericOrNull } from '../lib/table';
import { CellValue, GradeCount, LetterGrade, ReportBar, ScoreBin, StudentReport, SummaryRow, Table } from '../types';
import { ROSTER_EMAIL } from './normalizerService';
import { CEILING_SCORE, FINAL_GRADE, FINAL_SCORE, GRADE_THRESHOLDS, HOMEWORK_SCORE, QUIZ_SCORE } from './scoringService';

export const FIRST_NAME = 'First Name';
export const LAST_NAME = 'Last Name';

export const SUMMARY_COLUMNS = [FIRST_NAME, LAST_NAME, ROSTER_EMAIL, CEILING_SCORE, FINAL_GRADE];

const DEFAULT_BIN_COUNT = 20;
const REPORT_RULE = '-'.repeat(35);

/** Identity and outcome columns per student; columns the table lacks are left out. */
export function summarize(table: Table, columns: string[] = SUMMARY_COLUMNS): SummaryRow[] {
  const present = columns.filter((c) => hasColumn(table, c));
  return [...table.rows].map(([id, row]) => {
    const out: SummaryRow = { id };
    for (const c of present) out[c] = row[c] ?? null;
    return out;
  });
}

function isLetterGrade(value: CellValue): value is LetterGrade {
  return GRADE_THRESHOLDS.some(({ grade }) => grade === value);
}

export function gradeHistogram(table: Table, options: { includeEmpty?: boolean } = {}): GradeCount[] {
  const counts = new Map<LetterGrade, number>();
  if (options.includeEmpty) {
    for (const { grade } of GRADE_THRESHOLDS) counts.set(grade, 0);
  }
  for (const value of columnValues(table, FINAL_GRADE)) {
    if (isLetterGrade(value)) counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts]
    .map(([grade, count]) => ({ grade, count }))
    .sort((a, b) => a.grade.localeCompare(b.grade));
}

export function scoreDistribution(table: Table): number[] {
  return columnValues(table, FINAL_SCORE)
    .map(numericOrNull)
    .filter((v): v is number => v !== null);
}

/**
 * Equal-width bins over [min, max]; the last bin is closed on the right.
 * Density is normalized so that the bin areas sum to 1.
 */
export function binScores(values: number[], binCount: number = DEFAULT_BIN_COUNT): ScoreBin[] {
  if (values.length === 0 || binCount < 1) return [];

  let lo = Math.min(...values);
  let hi = Math.max(...values);
  if (lo === hi) {
    lo -= 0.5;
    hi += 0.5;
  }
  const width = (hi - lo) / binCount;

  const bins: ScoreBin[] = Array.from({ length: binCount }, (_, i) => ({
    start: lo + i * width,
    end: i === binCount - 1 ? hi : lo + (i + 1) * width,
    count: 0,
    density: 0,
  }));

  for (const v of values) {
    const idx = Math.min(Math.floor((v - lo) / width), binCount - 1);
    bins[idx].count++;
  }
  for (const bin of bins) {
    bin.density = bin.count / (values.length * width);
  }
  return bins;
}

function percent(value: CellValue | undefined): number {
  return (numericOrNull(value ?? null) ?? 0) * 100;
}

function displayText(value: CellValue | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

export function studentReport(table: Table, studentId: string): StudentReport {
  const student = table.rows.get(studentId.toLowerCase());
  if (!student) throw new StudentNotFoundError(studentId);
  const id = studentId.toLowerCase();

  const categories = {
    exam_1: percent(student['Exam 1 Score']),
    exam_2: percent(student['Exam 2 Score']),
    exam_3: percent(student['Exam 3 Score']),
    homework: percent(student[HOMEWORK_SCORE]),
    quiz: percent(student[QUIZ_SCORE]),
  };
  const classAverage = (mean(scoreDistribution(table)) ?? 0) * 100;

  const name = [displayText(student[FIRST_NAME]), displayText(student[LAST_NAME])].filter(Boolean).join(' ');
  const ceiling = numericOrNull(student[CEILING_SCORE] ?? null) ?? 0;

  const text = [
    `STUDENT: ${name ? `${name} (${id})` : id}`,
    `GRADE:   ${displayText(student[FINAL_GRADE])} (${ceiling.toFixed(0)}%)`,
    `AVG:     ${classAverage.toFixed(1)}%`,
    REPORT_RULE,
    `Exam 1: ${categories.exam_1.toFixed(1)}%`,
    `Exam 2: ${categories.exam_2.toFixed(1)}%`,
    `Exam 3: ${categories.exam_3.toFixed(1)}%`,
    `HW:     ${categories.homework.toFixed(1)}%`,
    `Quiz:   ${categories.quiz.toFixed(1)}%`,
  ].join('\n');

  const bars: ReportBar[] = [
    { label: 'Ex1', value: categories.exam_1 },
    { label: 'Ex2', value: categories.exam_2 },
    { label: 'Ex3', value: categories.exam_3 },
    { label: 'HW', value: categories.homework },
    { label: 'QZ', value: categories.quiz },
  ];

  const lastName = displayText(student[LAST_NAME]);
  return {
    student_id: id,
    name,
    final_grade: student[FINAL_GRADE] ?? null,
    ceiling_score: student[CEILING_SCORE] ?? null,
    class_average: classAverage,
    categories,
    bars,
    text,
    file_name: `${lastName || id}_Report.txt`,
  };
}
