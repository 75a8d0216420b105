import { describe, it, expect } from 'vitest';
import { escapeCsvField, parseCsv, parseCsvRecords, stringifyCsv } from '../../src/persistence/csv.js';

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('plain text')).toBe('plain text');
    expect(escapeCsvField('')).toBe('');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsvField('cr\rhere')).toBe('"cr\rhere"');
  });
});

describe('stringifyCsv', () => {
  it('ends every row with CRLF', () => {
    expect(stringifyCsv([['a', 'b'], ['1', 'x,y']])).toBe('a,b\r\n1,"x,y"\r\n');
  });
});

describe('parseCsv', () => {
  it('splits rows and cells', () => {
    expect(parseCsv('a,b\r\n1,2\r\n')).toEqual([['a', 'b'], ['1', '2']]);
  });

  it('accepts LF endings and a missing final newline', () => {
    expect(parseCsv('a,b\n1,2')).toEqual([['a', 'b'], ['1', '2']]);
  });

  it('keeps empty cells', () => {
    expect(parseCsv(',,\n')).toEqual([['', '', '']]);
  });

  it('unescapes quoted cells spanning lines', () => {
    expect(parseCsv('"x ""y""","multi\r\nline",z\n')).toEqual([['x "y"', 'multi\r\nline', 'z']]);
  });

  it('treats a quote after the start of a cell as a literal', () => {
    expect(parseCsv('1,27" monitor,x\r\n2,Second,y\r\n')).toEqual([
      ['1', '27" monitor', 'x'],
      ['2', 'Second', 'y'],
    ]);
  });

  it('strips a byte-order mark', () => {
    expect(parseCsv('\uFEFFtitle\nA\n')).toEqual([['title'], ['A']]);
  });

  it('returns no rows for empty input', () => {
    expect(parseCsv('')).toEqual([]);
  });
});

describe('parseCsvRecords', () => {
  it('keys cells by header', () => {
    expect(parseCsvRecords('title,category\nA,work\n')).toEqual([{ title: 'A', category: 'work' }]);
  });

  it('drops blank lines and leaves out missing trailing cells', () => {
    expect(parseCsvRecords('title,category\n\nB\n')).toEqual([{ title: 'B' }]);
  });

  it('keeps a __proto__ column as plain data', () => {
    const [record] = parseCsvRecords('title,__proto__\nA,x\n');
    expect(Object.entries(record ?? {})).toEqual([['title', 'A'], ['__proto__', 'x']]);
  });

  it('returns nothing without a header', () => {
    expect(parseCsvRecords('')).toEqual([]);
  });
});
