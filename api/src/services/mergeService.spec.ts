import { createTable } from '../lib/table';
import { StudentRow, Table } from '../types';
import { fillCategoryGaps, joinQuizzes, mergeSources } from './mergeService';
import { describeColumns } from './schemaService';

function tableOf(indexName: string, columns: string[], rows: Record<string, StudentRow>): Table {
  const table = createTable(indexName, columns);
  for (const [id, row] of Object.entries(rows)) table.rows.set(id, { ...row });
  return table;
}

const roster = () => tableOf('NetID', ['Section', 'Email Address'], {
  a: { Section: '101', 'Email Address': 'a@school.edu' },
  b: { Section: '101', 'Email Address': 'b@school.edu' },
  c: { Section: '102', 'Email Address': 'c@school.edu' },
});

const grades = () => tableOf('SID', ['Exam 1'], {
  d: { 'Exam 1': 30 },
  c: { 'Exam 1': 40 },
  b: { 'Exam 1': 45 },
});

describe('mergeSources', () => {
  it('keeps only students present in both roster and grades, in roster order', () => {
    const merged = mergeSources(roster(), grades(), null);

    expect(merged.indexName).toBe('NetID');
    expect([...merged.rows.keys()]).toEqual(['b', 'c']);
    expect(merged.columns).toEqual(['Section', 'Email Address', 'Exam 1']);
    expect(merged.rows.get('c')).toEqual({ Section: '102', 'Email Address': 'c@school.edu', 'Exam 1': 40 });
  });

  it('suffixes grade columns that the roster already has', () => {
    const withSection = tableOf('SID', ['Section'], { a: { Section: 'L01' } });
    const merged = mergeSources(roster(), withSection, null);

    expect(merged.columns).toEqual(['Section', 'Email Address', 'Section_y']);
    expect(merged.rows.get('a')).toEqual({ Section: '101', 'Email Address': 'a@school.edu', Section_y: 'L01' });
  });

  it('left-joins quizzes on email', () => {
    const quizzes = tableOf('Email', ['Quiz 1'], {
      'b@school.edu': { 'Quiz 1': 7 },
      'z@school.edu': { 'Quiz 1': 9 },
    });
    const merged = mergeSources(roster(), grades(), quizzes);

    expect([...merged.rows.keys()]).toEqual(['b', 'c']);
    expect(merged.rows.get('b')?.['Quiz 1']).toBe(7);
    expect(merged.rows.get('c')?.['Quiz 1']).toBeNull();
  });
});

describe('joinQuizzes', () => {
  it('leaves every student in place when nobody matches', () => {
    const table = tableOf('NetID', ['Email Address'], { a: { 'Email Address': 'a@school.edu' } });
    joinQuizzes(table, tableOf('Email', ['Quiz 2'], {}));

    expect(table.columns).toEqual(['Email Address', 'Quiz 2']);
    expect(table.rows.get('a')).toEqual({ 'Email Address': 'a@school.edu', 'Quiz 2': null });
  });
});

describe('fillCategoryGaps', () => {
  it('zeroes missing earned points but leaves maxima and quizzes absent', () => {
    const table = tableOf('NetID', ['Exam 1', 'Exam 1 - Max Points', 'Homework 1', 'Quiz 1'], {
      a: { 'Exam 1': null, 'Exam 1 - Max Points': null, 'Homework 1': null, 'Quiz 1': null },
    });
    fillCategoryGaps(table, describeColumns(table.columns));

    expect(table.rows.get('a')).toEqual({ 'Exam 1': 0, 'Exam 1 - Max Points': null, 'Homework 1': 0, 'Quiz 1': null });
  });
});
