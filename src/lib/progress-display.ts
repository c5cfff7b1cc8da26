import chalk from 'chalk';
import { BYTES_PER_GB } from './size-parser';
import { formatBytes } from '../utils/format-utils';
import type { GenerationProgress } from '../types/generation-result';

/**
 * Files up to this size are written without progress output
 */
export const PROGRESS_THRESHOLD_BYTES = BYTES_PER_GB;

export interface ProgressStream {
  write(chunk: string): unknown;
}

export interface ProgressDisplay {
  update: (progress: GenerationProgress) => void;
  finish: () => void;
}

/**
 * Single-line progress readout, rewritten in place after every chunk
 * Returns null for sizes that don't need one
 */
export function createProgressDisplay(
  totalBytes: number,
  stream: ProgressStream = process.stdout
): ProgressDisplay | null {
  if (totalBytes <= PROGRESS_THRESHOLD_BYTES) {
    return null;
  }

  return {
    update: (progress) => {
      const percentFormatted = progress.percentage.toFixed(1);
      const writtenFormatted = formatBytes(progress.bytesWritten);
      const totalFormatted = formatBytes(progress.totalBytes);

      // Clear line and print progress
      stream.write(
        '\r\x1b[K' + chalk.blue(`Progress: ${percentFormatted}% | ${writtenFormatted} / ${totalFormatted}`)
      );
    },
    finish: () => {
      stream.write('\n');
    },
  };
}
