import { parseCsv, parseNumber, toCsv, csvEscape } from './csv';
import { createTable } from './table';

describe('parseCsv', () => {
  it('reads headers and text cells, dropping blank rows', () => {
    const sheet = parseCsv('Name,Score\n"Doe, Jane",42\n\nRoe,\n', 'scores.csv');

    expect(sheet.source).toBe('scores.csv');
    expect(sheet.headers).toEqual(['Name', 'Score']);
    expect(sheet.rows).toEqual([
      ['Doe, Jane', '42'],
      ['Roe', ''],
    ]);
  });

  it('returns an empty sheet for empty input', () => {
    expect(parseCsv('   \n', 'empty.csv')).toEqual({ source: 'empty.csv', headers: [], rows: [] });
  });
});

describe('parseNumber', () => {
  it('treats empty cells as absent', () => {
    expect(parseNumber('')).toBeNull();
  });

  it('parses numeric text', () => {
    expect(parseNumber('4.5')).toBe(4.5);
    expect(parseNumber('-3')).toBe(-3);
  });

  it('flags text that is not a number', () => {
    expect(parseNumber('excused')).toBeUndefined();
  });

  it('accepts decimal and exponent notation only', () => {
    expect(parseNumber('.5')).toBe(0.5);
    expect(parseNumber('1e2')).toBe(100);
    expect(parseNumber('0x10')).toBeUndefined();
    expect(parseNumber('0b11')).toBeUndefined();
    expect(parseNumber('0o7')).toBeUndefined();
    expect(parseNumber('Infinity')).toBeUndefined();
  });
});

describe('toCsv', () => {
  it('writes the index first and leaves absent cells empty', () => {
    const table = createTable('NetID', ['Name', 'Score']);
    table.rows.set('a', { Name: 'Doe, Jane', Score: 0.5 });
    table.rows.set('b', { Name: 'Roe', Score: null });

    expect(toCsv(table)).toBe('NetID,Name,Score\na,"Doe, Jane",0.5\nb,Roe,');
  });

  it('escapes embedded quotes', () => {
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
  });
});
