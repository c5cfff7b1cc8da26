import { describe, test, expect } from 'vitest';
import { parseSize, BYTES_PER_GB, BYTES_PER_MB } from './size-parser';
import { InvalidSizeFormatError } from '../types/generation-result';

function expectBytes(input: string): number {
  const result = parseSize(input);
  if (!result.success) {
    throw new Error(`expected "${input}" to parse, got: ${result.error.message}`);
  }
  return result.value;
}

function expectInvalid(input: string): InvalidSizeFormatError {
  const result = parseSize(input);
  if (result.success) {
    throw new Error(`expected "${input}" to be rejected, got ${result.value}`);
  }
  return result.error;
}

describe('parseSize', () => {
  describe('plain byte counts', () => {
    test('parses integers as raw bytes', () => {
      expect(expectBytes('1000')).toBe(1000);
      expect(expectBytes('1')).toBe(1);
    });

    test('passes zero and negative values through', () => {
      expect(expectBytes('0')).toBe(0);
      expect(expectBytes('-5')).toBe(-5);
    });

    test('accepts underscores between digits', () => {
      expect(expectBytes('1_000')).toBe(1000);
      expect(expectBytes('1_0MB')).toBe(10 * BYTES_PER_MB);
      expect(expectBytes('1_0.2_5GB')).toBe(Math.trunc(10.25 * BYTES_PER_GB));
    });

    test('accepts a leading plus sign', () => {
      expect(expectBytes('+42')).toBe(42);
    });
  });

  describe('unit suffixes', () => {
    test('parses MB as 1024² bytes', () => {
      expect(expectBytes('1MB')).toBe(1048576);
      expect(expectBytes('5MB')).toBe(5242880);
    });

    test('parses GB as 1024³ bytes', () => {
      expect(expectBytes('1GB')).toBe(1073741824);
      expect(expectBytes('2.5GB')).toBe(2684354560);
    });

    test('truncates fractional byte counts instead of rounding', () => {
      // 0.1 * 1048576 = 104857.6
      expect(expectBytes('0.1MB')).toBe(104857);
    });

    test('truncates negative fractions toward zero', () => {
      // -0.1 * 1048576 = -104857.6
      expect(expectBytes('-0.1MB')).toBe(-104857);
      expect(expectBytes('-1.5MB')).toBe(-1572864);
    });

    test('returns positive zero for negative values that truncate to zero', () => {
      expect(expectBytes('-0MB')).toBe(0);
      expect(expectBytes('-0.0000001MB')).toBe(0);
      expect(expectBytes('-0')).toBe(0);
    });

    test('accepts decimals without a leading digit and exponents', () => {
      expect(expectBytes('.5GB')).toBe(BYTES_PER_GB / 2);
      expect(expectBytes('1e1MB')).toBe(10 * BYTES_PER_MB);
    });

    test('allows whitespace between number and unit', () => {
      expect(expectBytes('2.5 GB')).toBe(2684354560);
    });
  });

  describe('normalization', () => {
    test('is case-insensitive and ignores surrounding whitespace', () => {
      expect(expectBytes(' 1gb ')).toBe(expectBytes('1GB'));
      expect(expectBytes('3mB')).toBe(3 * BYTES_PER_MB);
      expect(expectBytes('\t1000\n')).toBe(1000);
    });
  });

  describe('invalid input', () => {
    test('rejects non-numeric text with a usage hint', () => {
      const error = expectInvalid('notasize');

      expect(error).toBeInstanceOf(InvalidSizeFormatError);
      expect(error.kind).toBe('InvalidSizeFormat');
      expect(error.input).toBe('notasize');
      expect(error.message).toBe(
        "Invalid size format: NOTASIZE. Use format like '1MB', '2.5GB', or plain number for bytes"
      );
    });

    test('rejects a non-numeric value before a unit', () => {
      const error = expectInvalid('abcGB');

      expect(error.input).toBe('abcGB');
      expect(error.message).toBe('Invalid size format: ABCGB');
    });

    test('rejects a unit with no number', () => {
      expect(expectInvalid('GB').message).toBe('Invalid size format: GB');
      expect(expectInvalid(' mb').message).toBe('Invalid size format: MB');
    });

    test('rejects empty and blank strings', () => {
      expect(expectInvalid('').message).toBe(
        "Invalid size format: . Use format like '1MB', '2.5GB', or plain number for bytes"
      );
      expect(expectInvalid('   ').input).toBe('   ');
    });

    test('rejects decimals without a unit', () => {
      expect(expectInvalid('1.5').message).toBe(
        "Invalid size format: 1.5. Use format like '1MB', '2.5GB', or plain number for bytes"
      );
    });

    test('rejects malformed numbers', () => {
      expectInvalid('1.2.3MB');
      expectInvalid('1,5GB');
      expectInvalid('12abc');
      expectInvalid('10KB');
    });

    test('rejects infinite and unrepresentable sizes', () => {
      expectInvalid('InfinityGB');
      expectInvalid('NaNMB');
      expectInvalid('1e400GB');
    });

    test('rejects unrepresentable plain byte counts with a usage hint', () => {
      expect(expectInvalid('99999999999999999999').message).toBe(
        "Invalid size format: 99999999999999999999. Use format like '1MB', '2.5GB', or plain number for bytes"
      );
    });

    test('rejects misplaced underscores', () => {
      expectInvalid('_1000');
      expectInvalid('1000_');
      expectInvalid('1__000');
      expectInvalid('1_.5MB');
    });
  });
});
