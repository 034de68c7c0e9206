import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parse } from 'csv-parse/sync';
import { createConvertCommand } from '../src/commands/convert.js';
import { createBatchCommand } from '../src/commands/batch.js';
import { createDetectCommand } from '../src/commands/detect.js';

const legacy = { Title: 'Call plumber', Notes: '', List: 'Home', 'Due Date': '', Priority: 'Mittel', 'Is Completed': false };
const current = { title: 'Renew passport #admin', notes: '', list: 'Errands:', due_date: '2025-06-01T08:00:00Z', prio: 'Hoch', done: 'Nein', tags: [] };

describe('commands', () => {
  let dir: string;
  let logSpy: MockInstance<Parameters<typeof console.log>, void>;

  const printed = (): string => logSpy.mock.calls.map(call => String(call[0])).join('\n');

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'remport-cli-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  describe('convert', () => {
    it('writes the CSV to --output', () => {
      const input = join(dir, 'export.json');
      const output = join(dir, 'tasks.csv');
      writeFileSync(input, JSON.stringify({ reminders: [current] }));

      createConvertCommand().parse([input, '-o', output, '-l', 'de'], { from: 'user' });

      const records: string[][] = parse(readFileSync(output, 'utf-8'), { bom: true });
      expect(records[0]).toEqual(['Name', 'Assignee Email', 'Due Date', 'Tags', 'Notes', 'Section/Column', 'Parent task', 'Priorität']);
      expect(records[1]).toEqual(['Renew passport', '', '06/01/2025', 'admin', '', 'Errands', '', 'Hoch']);
      expect(printed()).toContain(`Wrote 1 rows to ${output}`);
      expect(process.exitCode).toBeUndefined();
    });

    it('lists each converted task with --verbose', () => {
      const input = join(dir, 'export.json');
      writeFileSync(input, JSON.stringify({ reminders: [legacy, current] }));

      createConvertCommand().parse([input, '-o', join(dir, 'tasks.csv'), '--verbose'], { from: 'user' });

      const output = printed();
      expect(output).toContain('✓ Converted [1/2]: Call plumber');
      expect(output).toContain('✓ Converted [2/2]: Renew passport');
    });

    it('leaves the filesystem alone with --dry-run', () => {
      const input = join(dir, 'export.json');
      const output = join(dir, 'tasks.csv');
      writeFileSync(input, JSON.stringify(legacy));

      createConvertCommand().parse([input, '-o', output, '--dry-run'], { from: 'user' });

      expect(existsSync(output)).toBe(false);
      expect(printed()).toContain(`[DRY RUN] Would write 1 rows to ${output}`);
    });

    it('sets exit code 1 for an unknown format', () => {
      const input = join(dir, 'export.json');
      writeFileSync(input, JSON.stringify([1, 2, 3]));

      createConvertCommand().parse([input, '-o', join(dir, 'tasks.csv')], { from: 'user' });

      expect(process.exitCode).toBe(1);
      expect(printed()).toContain('Unknown JSON format');
    });

    it('sets exit code 1 for an unsupported language', () => {
      const input = join(dir, 'export.json');
      writeFileSync(input, JSON.stringify(legacy));

      createConvertCommand().parse([input, '-l', 'fr'], { from: 'user' });

      expect(process.exitCode).toBe(1);
      expect(printed()).toContain("Unsupported language 'fr'");
    });
  });

  describe('batch', () => {
    it('sets exit code 1 when any file fails', () => {
      writeFileSync(join(dir, 'good.json'), JSON.stringify(legacy));
      writeFileSync(join(dir, 'bad.json'), '{');

      createBatchCommand().parse([dir], { from: 'user' });

      expect(existsSync(join(dir, 'good.csv'))).toBe(true);
      expect(process.exitCode).toBe(1);
      expect(printed()).toContain('Summary');
    });

    it('writes into a new --out-dir', () => {
      writeFileSync(join(dir, 'good.json'), JSON.stringify(legacy));
      const outDir = join(dir, 'csv');

      createBatchCommand().parse([dir, '--out-dir', outDir], { from: 'user' });

      expect(existsSync(join(outDir, 'good.csv'))).toBe(true);
      expect(process.exitCode).toBeUndefined();
    });

    it('leaves the exit code alone when every file converts', () => {
      writeFileSync(join(dir, 'good.json'), JSON.stringify(legacy));

      createBatchCommand().parse([dir], { from: 'user' });

      expect(process.exitCode).toBeUndefined();
    });
  });

  describe('detect', () => {
    it('counts schema variants of a mixed bulk export', () => {
      const input = join(dir, 'export.json');
      writeFileSync(input, JSON.stringify({ reminders: [legacy, current, current] }));

      createDetectCommand().parse([input], { from: 'user' });

      const output = printed();
      expect(output).toContain('bulk');
      expect(output).toContain('1 legacy, 2 current');
    });
  });
});
