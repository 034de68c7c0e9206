import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { detectSchema, extractRecords, parseDocument } from '@remport/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createDetectCommand(): Command {
  return new Command('detect')
    .description('Show the format and schema variants of a JSON export')
    .argument('<input>', 'JSON export file')
    .action((input: string) => $try(() => {
      const { format, records, warnings } = extractRecords(parseDocument(readFileSync(input, 'utf-8')));
      if (format === 'unknown') {
        out.error(`✗ Unknown JSON format: ${input}`);
        process.exitCode = 1;
        return;
      }

      let legacy = 0;
      for (const record of records) {
        if (detectSchema(record) === 'legacy') legacy++;
      }

      console.log(`${chalk.bold('Format:')}  ${format}`);
      console.log(`${chalk.bold('Records:')} ${records.length}`);
      out.detail(`${legacy} legacy, ${records.length - legacy} current`);
      out.printWarnings(warnings);
    }));
}
