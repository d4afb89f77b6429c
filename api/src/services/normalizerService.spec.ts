import { MissingColumnError, SchemaMismatchError } from '../errors';
import { combineQuizzes, normalizeGrades, normalizeQuiz, normalizeRoster, quizLabel } from './normalizerService';

const file = (file_name: string, content: string) => ({ file_name, content });

describe('normalizeRoster', () => {
  it('indexes by lowercased NetID and keeps section and lowercased email', () => {
    const roster = normalizeRoster(file('roster.csv', [
      'NetID,Section,Email Address,Major',
      'JDoe25,101,JDoe@School.EDU,Math',
      'asmith,102,asmith@school.edu,Art',
    ].join('\n')));

    expect(roster.indexName).toBe('NetID');
    expect(roster.columns).toEqual(['Section', 'Email Address']);
    expect([...roster.rows.keys()]).toEqual(['jdoe25', 'asmith']);
    expect(roster.rows.get('jdoe25')).toEqual({ Section: '101', 'Email Address': 'jdoe@school.edu' });
  });

  it('names the missing column and the file', () => {
    const run = () => normalizeRoster(file('roster.csv', 'NetID,Section\njdoe,101'));

    expect(run).toThrow(MissingColumnError);
    expect(run).toThrow('Missing required column "Email Address" in roster.csv');
  });

  it('rejects identifiers that collide after case folding', () => {
    const run = () => normalizeRoster(file('roster.csv', [
      'NetID,Section,Email Address',
      'JDoe,101,a@school.edu',
      'jdoe,101,b@school.edu',
    ].join('\n')));

    expect(run).toThrow(SchemaMismatchError);
    expect(run).toThrow('Duplicate NetID "jdoe" in roster.csv');
  });
});

describe('normalizeGrades', () => {
  it('drops submission metadata and types numeric columns', () => {
    const grades = normalizeGrades(file('grades.csv', [
      'First Name,Last Name,SID,Exam 1,Exam 1 - Max Points,Exam 1 - Submission Time,Homework 1',
      'Jane,Doe,JDOE25,45,50,2024-01-01 10:00:00,',
    ].join('\n')));

    expect(grades.indexName).toBe('SID');
    expect(grades.columns).toEqual(['First Name', 'Last Name', 'Exam 1', 'Exam 1 - Max Points', 'Homework 1']);
    expect(grades.rows.get('jdoe25')).toEqual({
      'First Name': 'Jane',
      'Last Name': 'Doe',
      'Exam 1': 45,
      'Exam 1 - Max Points': 50,
      'Homework 1': null,
    });
  });

  it('keeps hexadecimal-looking cells as text', () => {
    const grades = normalizeGrades(file('grades.csv', 'Last Name,SID,Exam 1\nDoe,a,0x10'));

    expect(grades.rows.get('a')?.['Exam 1']).toBe('0x10');
  });

  it('keeps a column with non-numeric cells as text', () => {
    const grades = normalizeGrades(file('grades.csv', 'Last Name,SID,Exam 1\nDoe,a,45\nRoe,b,excused'));

    expect(grades.rows.get('a')?.['Exam 1']).toBe('45');
    expect(grades.rows.get('b')?.['Exam 1']).toBe('excused');
  });

  it('requires SID', () => {
    expect(() => normalizeGrades(file('grades.csv', 'Last Name,NetID\nDoe,a'))).toThrow(
      'Missing required column "SID" in grades.csv',
    );
  });
});

describe('quizLabel', () => {
  it('keeps the first two title-cased words of the file name', () => {
    expect(quizLabel('quiz_3_makeup.csv')).toBe('Quiz 3');
    expect(quizLabel('uploads/QUIZ_1.CSV')).toBe('Quiz 1');
    expect(quizLabel('midterm_quiz_review.csv')).toBe('Midterm Quiz');
    expect(quizLabel('quiz10.csv')).toBe('Quiz10');
  });
});

describe('normalizeQuiz', () => {
  it('renames Grade to the quiz label and indexes by lowercased email', () => {
    const quiz = normalizeQuiz(file('quiz_1.csv', 'Email,Grade,Duration\nA@School.edu,8,120'));

    expect(quiz.indexName).toBe('Email');
    expect(quiz.columns).toEqual(['Quiz 1']);
    expect(quiz.rows.get('a@school.edu')).toEqual({ 'Quiz 1': 8 });
  });

  it('rejects non-numeric grades', () => {
    expect(() => normalizeQuiz(file('quiz_1.csv', 'Email,Grade\na@school.edu,n/a'))).toThrow(
      'Non-numeric Grade "n/a" for a@school.edu in quiz_1.csv',
    );
  });
});

describe('empty sources', () => {
  it('reports the first required column of an empty roster', () => {
    const run = () => normalizeRoster(file('roster.csv', ''));

    expect(run).toThrow(MissingColumnError);
    expect(run).toThrow('Missing required column "NetID" in roster.csv');
  });

  it('reports the identifier column of an empty grades file', () => {
    expect(() => normalizeGrades(file('grades.csv', ''))).toThrow('Missing required column "SID" in grades.csv');
  });

  it('reports the email column of an empty quiz file', () => {
    expect(() => normalizeQuiz(file('quiz_1.csv', ''))).toThrow('Missing required column "Email" in quiz_1.csv');
  });
});

describe('combineQuizzes', () => {
  it('aligns quizzes by email, leaving missing attempts absent', () => {
    const quizzes = combineQuizzes([
      file('quiz_1.csv', 'Email,Grade\nA@school.edu,8\nb@school.edu,6'),
      file('quiz_2.csv', 'Email,Grade\nb@school.edu,9\nc@school.edu,7'),
    ]);

    expect(quizzes.columns).toEqual(['Quiz 1', 'Quiz 2']);
    expect(quizzes.rows.get('a@school.edu')).toEqual({ 'Quiz 1': 8, 'Quiz 2': null });
    expect(quizzes.rows.get('b@school.edu')).toEqual({ 'Quiz 1': 6, 'Quiz 2': 9 });
    expect(quizzes.rows.get('c@school.edu')).toEqual({ 'Quiz 1': null, 'Quiz 2': 7 });
  });

  it('lets a later file with the same label replace the earlier column', () => {
    const quizzes = combineQuizzes([
      file('quiz_1_first.csv', 'Email,Grade\na@school.edu,8\nb@school.edu,6'),
      file('quiz_1_second.csv', 'Email,Grade\nb@school.edu,9'),
    ]);

    expect(quizzes.columns).toEqual(['Quiz 1']);
    expect(quizzes.rows.get('a@school.edu')).toEqual({ 'Quiz 1': null });
    expect(quizzes.rows.get('b@school.edu')).toEqual({ 'Quiz 1': 9 });
  });
});
