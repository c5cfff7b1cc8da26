import { BYTES_PER_GB } from '../lib/size-parser';

/**
 * Format bytes to human-readable size
 * Example: 1900000000 → "1.8 GB"
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Format bytes as gigabytes with two decimals, no unit
 * Example: 2684354560 → "2.50"
 */
export function formatGigabytes(bytes: number): string {
  return (bytes / BYTES_PER_GB).toFixed(2);
}

/**
 * Format a millisecond duration as seconds with two decimals
 * Example: 1234 → "1.23"
 */
export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}
