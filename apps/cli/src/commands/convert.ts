import { Command } from 'commander';
import { convertFile } from '@remport/core';
import * as out from '../output.js';
import type { ConversionFlags } from '../helpers.js';
import { $try, addConversionOptions, resolveCliOptions, DEFAULT_OUTPUT } from '../helpers.js';

interface ConvertFlags extends ConversionFlags {
  output: string;
}

export function createConvertCommand(): Command {
  const cmd = new Command('convert')
    .description('Convert a reminders JSON export to a CSV import file')
    .argument('<input>', 'JSON export file')
    .option('-o, --output <file>', 'CSV file to write', DEFAULT_OUTPUT);

  return addConversionOptions(cmd)
    .action((input: string, opts: ConvertFlags) => $try(() => {
      const options = resolveCliOptions(opts);

      out.banner();
      if (options.dryRun) out.dryRunNotice();

      const result = convertFile(input, opts.output, options);
      if (result.type === 'error') {
        out.error(`✗ ${result.message}`);
        process.exitCode = 1;
        return;
      }

      out.printConversion(result.data, options.verbose);
      out.success(`✓ ${result.message}`);
      if (!options.dryRun) out.printImportHints();
    }));
}
