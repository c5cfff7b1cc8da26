import * as fs from 'fs';
import * as path from 'path';

/**
 * Directory generated files land in when none is given (relative to cwd)
 */
export const DEFAULT_OUTPUT_DIR = 'test_files';

/**
 * Check if a path exists (file, directory or anything else)
 */
export function pathExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Resolve the target path of a generated file
 */
export function resolveOutputPath(outputDir: string, filename: string): string {
  return path.join(outputDir, filename);
}
