import { InvalidSizeFormatError, type Result, ok, failure } from '../types/generation-result';

export const BYTES_PER_MB = 1024 * 1024;
export const BYTES_PER_GB = 1024 * 1024 * 1024;

const UNIT_SUFFIXES: ReadonlyArray<{ suffix: string; multiplier: number }> = [
  { suffix: 'GB', multiplier: BYTES_PER_GB },
  { suffix: 'MB', multiplier: BYTES_PER_MB },
];

// Single underscores may separate digits: "1_000", "1_0.5MB"
const DIGITS = String.raw`\d(?:_?\d)*`;
const DECIMAL_PATTERN = new RegExp(`^[+-]?(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:E[+-]?${DIGITS})?$`);
const INTEGER_PATTERN = new RegExp(`^[+-]?${DIGITS}$`);
const USAGE_HINT = ". Use format like '1MB', '2.5GB', or plain number for bytes";

/**
 * Parse a size expression into a byte count
 *
 * Examples:
 *   "1000"  → 1000
 *   "1MB"   → 1048576
 *   "2.5GB" → 2684354560
 *   " 1gb " → 1073741824
 *
 * Fractional MB/GB values are truncated toward zero, never rounded.
 * Zero and negative results are returned as-is.
 */
export function parseSize(input: string): Result<number, InvalidSizeFormatError> {
  const normalized = input.toUpperCase().trim();

  for (const { suffix, multiplier } of UNIT_SUFFIXES) {
    if (!normalized.endsWith(suffix)) continue;

    const numeric = normalized.slice(0, -suffix.length).trim();
    if (!DECIMAL_PATTERN.test(numeric)) {
      return failure(invalidSize(input, normalized));
    }

    const bytes = Math.trunc(parseFloat(stripSeparators(numeric)) * multiplier);
    if (!Number.isSafeInteger(bytes)) {
      return failure(invalidSize(input, normalized));
    }
    // -0 from e.g. "-0MB" or "-0.0000001MB"
    return ok(bytes === 0 ? 0 : bytes);
  }

  if (!INTEGER_PATTERN.test(normalized)) {
    return failure(invalidSize(input, normalized, USAGE_HINT));
  }

  const bytes = parseInt(stripSeparators(normalized), 10);
  if (!Number.isSafeInteger(bytes)) {
    return failure(invalidSize(input, normalized, USAGE_HINT));
  }
  return ok(bytes === 0 ? 0 : bytes);
}

function stripSeparators(numeric: string): string {
  return numeric.replace(/_/g, '');
}

function invalidSize(input: string, normalized: string, hint = ''): InvalidSizeFormatError {
  return new InvalidSizeFormatError(input, `Invalid size format: ${normalized}${hint}`);
}
