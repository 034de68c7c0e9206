import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parse } from 'csv-parse/sync';
import { emit, serializeCsv, BOM } from '../../src/emit/csv-emitter.js';
import { Column } from '../../src/types/columns.js';

const columns = [Column.Name, Column.Notes, Column.Priority];

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'remport-emit-test-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('serializeCsv', () => {
  it('quotes every field, including empty ones', () => {
    const csv = serializeCsv([{ Name: 'Buy milk', Notes: '', Priority: 'High' }], columns);
    expect(csv).toBe(`${BOM}"Name","Notes","Priority"\r\n"Buy milk","","High"\r\n`);
  });

  it('escapes quotes and keeps embedded delimiters and newlines', () => {
    const csv = serializeCsv([{ Name: 'Say "hi", then leave', Notes: 'line 1\nline 2', Priority: '' }], columns);
    expect(csv).toBe(`${BOM}"Name","Notes","Priority"\r\n"Say ""hi"", then leave","line 1\nline 2",""\r\n`);
  });

  it('writes missing columns as empty fields', () => {
    const csv = serializeCsv([{ Name: 'Only name' }], columns);
    expect(csv.split('\r\n')[1]).toBe('"Only name","",""');
  });

  it('produces a header-only file for no rows', () => {
    expect(serializeCsv([], columns)).toBe(`${BOM}"Name","Notes","Priority"\r\n`);
  });
});

describe('emit', () => {
  it('writes a file that reads back to the same rows', () => {
    const path = join(tmpDir, 'out.csv');
    const rows = [
      { Name: 'Prüfen', Notes: '⭐ Flagged\n🔗 URL: https://example.com', Priority: 'Hoch' },
      { Name: 'Second', Notes: '', Priority: '' },
    ];
    expect(emit(path, rows, columns, false)).toBe(2);

    const content = readFileSync(path, 'utf-8');
    expect(content.startsWith(BOM)).toBe(true);
    expect(parse(content, { bom: true, columns: true })).toEqual(rows);
  });

  it('writes a header-only file for no rows', () => {
    const path = join(tmpDir, 'empty.csv');
    expect(emit(path, [], columns, false)).toBe(0);
    expect(readFileSync(path, 'utf-8')).toBe(`${BOM}"Name","Notes","Priority"\r\n`);
  });

  it('does not touch the filesystem on a dry run', () => {
    const path = join(tmpDir, 'dry.csv');
    expect(emit(path, [{ Name: 'x' }], columns, true)).toBe(1);
    expect(existsSync(path)).toBe(false);
  });

  it('throws when the target cannot be written', () => {
    expect(() => emit(join(tmpDir, 'missing', 'out.csv'), [], columns, false)).toThrow();
  });
});
