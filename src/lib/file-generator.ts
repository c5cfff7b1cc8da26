import * as fs from 'fs';
import { randomBytes } from 'crypto';
import { pathExists, resolveOutputPath } from '../utils/file-utils';
import { BYTES_PER_MB } from './size-parser';
import {
  type GenerationOutcome,
  IOFailureError,
  type ProgressObserver,
  type Result,
  failure,
  ok,
} from '../types/generation-result';

export const DEFAULT_CHUNK_SIZE = BYTES_PER_MB;

export type RandomSource = (size: number) => Buffer;

export interface FileGeneratorOptions {
  outputDir: string;
  chunkSize?: number;
  randomSource?: RandomSource;
  now?: () => number;
}

/**
 * Writes files of random bytes into a single output directory.
 *
 * An existing target is never touched: generate() reports it as skipped.
 * A failed write may leave a truncated file behind.
 */
export class FileGenerator {
  private readonly outputDir: string;
  private readonly chunkSize: number;
  private readonly randomSource: RandomSource;
  private readonly now: () => number;

  constructor(options: FileGeneratorOptions) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`Invalid chunk size: ${chunkSize}. Must be a positive integer.`);
    }

    this.outputDir = options.outputDir;
    this.chunkSize = chunkSize;
    this.randomSource = options.randomSource ?? randomBytes;
    this.now = options.now ?? Date.now;
  }

  /**
   * Ensure `<outputDir>/<filename>` exists, writing `sizeBytes` random bytes if it doesn't
   * @param onProgress - Called once after every chunk
   */
  generate(
    filename: string,
    sizeBytes: number,
    onProgress?: ProgressObserver
  ): Result<GenerationOutcome, IOFailureError> {
    const filePath = resolveOutputPath(this.outputDir, filename);

    if (pathExists(filePath)) {
      return ok({ status: 'skipped', filename, filePath });
    }

    const startTime = this.now();
    let bytesWritten = 0;
    let chunks = 0;

    try {
      const fd = fs.openSync(filePath, 'w');
      try {
        while (bytesWritten < sizeBytes) {
          const writeSize = Math.min(this.chunkSize, sizeBytes - bytesWritten);
          this.writeChunk(fd, this.randomSource(writeSize));
          bytesWritten += writeSize;
          chunks++;

          onProgress?.({
            filename,
            bytesWritten,
            totalBytes: sizeBytes,
            percentage: (bytesWritten / sizeBytes) * 100,
          });
        }
      } finally {
        fs.closeSync(fd);
      }
    } catch (error) {
      return failure(new IOFailureError(filePath, error));
    }

    return ok({
      status: 'completed',
      filename,
      filePath,
      bytesWritten,
      chunks,
      elapsedMs: this.now() - startTime,
    });
  }

  /**
   * writeSync may write less than asked; keep going until the chunk is on disk
   */
  private writeChunk(fd: number, chunk: Buffer): void {
    let offset = 0;
    while (offset < chunk.length) {
      offset += fs.writeSync(fd, chunk, offset, chunk.length - offset);
    }
  }
}
