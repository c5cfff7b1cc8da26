/**
 * Outcome of an operation that can fail with a known error kind.
 * Callers branch on `success` instead of catching.
 */
export type Result<T, E extends Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function failure<E extends Error>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Size expression could not be parsed
 * Example: "abcGB", "", "1.5" (plain sizes must be integers)
 */
export class InvalidSizeFormatError extends Error {
  readonly kind = 'InvalidSizeFormat' as const;

  constructor(
    readonly input: string,
    message: string
  ) {
    super(message);
    this.name = 'InvalidSizeFormatError';
  }
}

/**
 * Opening, writing or closing the target file failed.
 * The message is the underlying cause; the cause itself is kept on `cause`.
 */
export class IOFailureError extends Error {
  readonly kind = 'IOFailure' as const;

  constructor(
    readonly filePath: string,
    cause: unknown
  ) {
    super(describeError(cause), { cause });
    this.name = 'IOFailureError';
  }
}

export type GenerationError = InvalidSizeFormatError | IOFailureError;

export interface SkippedGeneration {
  status: 'skipped';
  filename: string;
  filePath: string;
}

export interface CompletedGeneration {
  status: 'completed';
  filename: string;
  filePath: string;
  bytesWritten: number;
  chunks: number;
  elapsedMs: number;
}

export type GenerationOutcome = SkippedGeneration | CompletedGeneration;

export interface GenerationProgress {
  filename: string;
  bytesWritten: number;
  totalBytes: number;
  percentage: number;
}

export type ProgressObserver = (progress: GenerationProgress) => void;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
