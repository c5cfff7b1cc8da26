import chalk from 'chalk';
import { parseSize } from '../lib/size-parser';
import { DEFAULT_CHUNK_SIZE, FileGenerator } from '../lib/file-generator';
import { createProgressDisplay } from '../lib/progress-display';
import { DEFAULT_OUTPUT_DIR } from '../utils/file-utils';
import { formatGigabytes, formatSeconds } from '../utils/format-utils';

export interface GenerateOptions {
  outputDir?: string;
  chunkSize?: string;
}

/**
 * Generate `<outputDir>/<filename>` with `size` random bytes
 * @returns process exit code
 */
export function generateCommand(filename: string, size: string, options: GenerateOptions = {}): number {
  const parsedSize = parseSize(size);
  if (!parsedSize.success) {
    printError(parsedSize.error.message);
    return 1;
  }

  let chunkSize = DEFAULT_CHUNK_SIZE;
  if (options.chunkSize !== undefined) {
    const parsedChunkSize = parseSize(options.chunkSize);
    if (!parsedChunkSize.success) {
      printError(parsedChunkSize.error.message);
      return 1;
    }
    if (parsedChunkSize.value < 1) {
      printError(`Invalid chunk size: ${options.chunkSize}. Must be at least 1 byte.`);
      return 1;
    }
    chunkSize = parsedChunkSize.value;
  }

  const sizeBytes = parsedSize.value;
  const generator = new FileGenerator({
    outputDir: options.outputDir ?? DEFAULT_OUTPUT_DIR,
    chunkSize,
  });

  console.log('Starting file generation...');
  console.log('='.repeat(50));
  console.log(chalk.blue(`Generating ${filename} (${formatGigabytes(sizeBytes)} GB)...`));

  const progress = createProgressDisplay(sizeBytes);
  const result = generator.generate(filename, sizeBytes, progress?.update);
  const skipped = result.success && result.value.status === 'skipped';
  if (progress && !skipped) {
    progress.finish();
  }

  if (!result.success) {
    printError(`Error creating ${filename}: ${result.error.message}`);
    return 1;
  }

  const outcome = result.value;
  if (outcome.status === 'skipped') {
    console.log(chalk.yellow(`${filename} already exists, skipping...`));
  } else {
    console.log(chalk.dim(`Completed ${filename} in ${formatSeconds(outcome.elapsedMs)} seconds`));
  }

  console.log(chalk.green(`Successfully created ${filename}`));
  console.log(chalk.green('File generation completed!'));
  return 0;
}

export function printError(message: string): void {
  console.log(chalk.red('Error:'), message);
}
