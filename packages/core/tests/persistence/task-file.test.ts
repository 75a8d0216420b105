import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readTaskFile, writeTaskFile, readTextFile } from '../../src/persistence/task-file.js';
import { NotFoundError, ParseError, SchemaError } from '../../src/errors.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'taskdeck-file-test-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('readTaskFile', () => {
  it('returns the raw records', () => {
    const path = join(tmpDir, 'tasks.json');
    writeFileSync(path, JSON.stringify({ tasks: [{ title: 'A', extra: 1 }] }));
    expect(readTaskFile(path)).toEqual([{ title: 'A', extra: 1 }]);
  });

  it('throws NotFoundError carrying the path', () => {
    const path = join(tmpDir, 'missing.json');
    try {
      readTaskFile(path);
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(NotFoundError);
      if (err instanceof NotFoundError) {
        expect(err.path).toBe(path);
        expect(err.code).toBe('FILE_NOT_FOUND');
      }
    }
  });

  it('throws ParseError for invalid JSON', () => {
    const path = join(tmpDir, 'bad.json');
    writeFileSync(path, '');
    expect(() => readTaskFile(path)).toThrow(ParseError);
  });

  it('throws SchemaError when tasks is missing or not an array of objects', () => {
    const noKey = join(tmpDir, 'nokey.json');
    writeFileSync(noKey, '{"todo": []}');
    expect(() => readTaskFile(noKey)).toThrow(`Invalid task file: ${noKey}. Missing 'tasks' key.`);

    const wrongType = join(tmpDir, 'wrong.json');
    writeFileSync(wrongType, '{"tasks": "nope"}');
    expect(() => readTaskFile(wrongType)).toThrow(SchemaError);

    const wrongItems = join(tmpDir, 'items.json');
    writeFileSync(wrongItems, '{"tasks": [1]}');
    expect(() => readTaskFile(wrongItems)).toThrow(SchemaError);
  });
});

describe('writeTaskFile', () => {
  it('creates parent directories', () => {
    const path = join(tmpDir, 'a', 'b', 'tasks.json');
    writeTaskFile(path, []);
    expect(readFileSync(path, 'utf8')).toBe('{\n    "tasks": []\n}');
  });
});

describe('readTextFile', () => {
  it('rethrows errors other than a missing file', () => {
    expect(() => readTextFile(tmpDir)).toThrow(/EISDIR/);
  });
});
