#!/usr/bin/env node

import { Command } from 'commander';
import { generateCommand, type GenerateOptions, printError } from './commands/generate';
import { describeError } from './types/generation-result';

const program = new Command();

program
  .name('randfile')
  .description('Generate a file of random bytes for I/O and storage benchmarking')
  .version('1.0.0')
  .argument('<filename>', 'Name of the file to create')
  .argument('<size>', 'Size of the file (e.g., 1MB, 2.5GB, 1000 for bytes)')
  .option('-o, --output-dir <dir>', 'Directory to create the file in (default: test_files)')
  .option('--chunk-size <size>', 'Bytes written per chunk (default: 1MB)')
  .action((filename: string, size: string, options: GenerateOptions) => {
    try {
      const exitCode = generateCommand(filename, size, options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    } catch (error) {
      printError(describeError(error));
      process.exit(1);
    }
  });

// Parse arguments
program.parse();
