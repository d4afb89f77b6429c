export type CellValue = string | number | null;

export type StudentRow = Record<string, CellValue>;

/** Rows keyed by index value; Map keeps insertion order, columns keep declaration order. */
export interface Table {
  indexName: string;
  columns: string[];
  rows: Map<string, StudentRow>;
}

export interface SourceFile {
  file_name: string;
  content: string;
}

export interface RawSheet {
  source: string;
  headers: string[];
  rows: string[][];
}

export type WeightConfig = Record<string, number>;

export type LetterGrade = 'A' | 'B' | 'C' | 'D' | 'F';

export interface GradeThreshold {
  min: number;
  grade: LetterGrade;
}

export interface ExamColumns {
  earned: string;
  max: string;
  score: string;
}

export interface ColumnSchema {
  exams: ExamColumns[];
  homework: {
    earned: string[];
    max: string[];
  };
  quizzes: string[];
}

export interface GradebookInput {
  roster: SourceFile;
  grades: SourceFile;
  quizzes?: SourceFile[];
  weights: WeightConfig;
  schema?: ColumnSchema;
}

export interface SummaryRow {
  id: string;
  [column: string]: CellValue;
}

export interface GradeCount {
  grade: LetterGrade;
  count: number;
}

export interface ScoreBin {
  start: number;
  end: number;
  count: number;
  density: number;
}

export interface SectionExport {
  section: string;
  file_name: string;
  row_count: number;
  csv: string;
}

export interface ReportBar {
  label: 'Ex1' | 'Ex2' | 'Ex3' | 'HW' | 'QZ';
  value: number;
}

export interface StudentReport {
  student_id: string;
  name: string;
  final_grade: CellValue;
  ceiling_score: CellValue;
  class_average: number;
  categories: {
    exam_1: number;
    exam_2: number;
    exam_3: number;
    homework: number;
    quiz: number;
  };
  bars: ReportBar[];
  text: string;
  file_name: string;
}
