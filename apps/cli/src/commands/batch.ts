import { Command } from 'commander';
import { anyFailed } from '@remport/core';
import * as out from '../output.js';
import type { ConversionFlags } from '../helpers.js';
import { $try, addConversionOptions, resolveCliOptions } from '../helpers.js';
import { convertDirectory, tallyBatch } from '../batch.js';

interface BatchFlags extends ConversionFlags {
  outDir?: string;
}

export function createBatchCommand(): Command {
  const cmd = new Command('batch')
    .description('Convert every *.json export in a directory')
    .argument('<dir>', 'Directory containing JSON exports')
    .option('--out-dir <dir>', 'Directory for the CSV files (default: the input directory)');

  return addConversionOptions(cmd)
    .action((dir: string, opts: BatchFlags) => $try(() => {
      const options = resolveCliOptions(opts);

      out.banner();
      if (options.dryRun) out.dryRunNotice();

      const batch = convertDirectory(dir, opts.outDir ?? dir, options, ({ file, result }) => {
        if (result.type === 'error') {
          out.error(`✗ ${file}: ${result.message}`);
          return;
        }
        out.printConversion(result.data, options.verbose);
        out.success(`✓ ${result.message}`);
      });

      if (batch.results.length === 0) {
        out.warning(`No JSON files found in ${dir}`);
        return;
      }

      out.printTally(tallyBatch(batch));
      if (anyFailed(batch)) process.exitCode = 1;
    }));
}
