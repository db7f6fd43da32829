/**
 * Compile command - definition file to IL assembly text
 */

import { Command } from 'commander';
import { compileAction, exitWithCode, type CompileCommandOptions } from './compileAction.js';

export const compileCommand = new Command('compile')
  .description('Compile a definition file (and its includes) to IL assembly text')
  .argument('<input>', 'Definition file to compile')
  .argument('<output>', 'IL file to write')
  .option('-c, --config <path>', 'Config file (default: apimeta.config.yaml next to the input)')
  .option('-q, --quiet', 'Only report errors')
  .option('-v, --verbose', 'Show progress logging')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Write all log output to a file')
  .addHelpText('after', `
Examples:
  apimeta sevenzip.txt sevenzip.il              Compile to IL
  apimeta sevenzip.txt out/sevenzip.il -v       Show what was collected
  apimeta sevenzip.txt sevenzip.il --log-file compile.log
                                                Keep a debug trace of the run

Then assemble the metadata module with:
  ilasm /dll /output=SevenZip.winmd sevenzip.il
`)
  .action((input: string, output: string, options: CompileCommandOptions) => {
    exitWithCode(compileAction(input, output, options));
  });
