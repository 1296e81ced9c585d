/**
 * File system operations - reading and globbing.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';

const BOM = '\uFEFF';

/**
 * Read a UTF-8 text file. A leading byte order mark is dropped so that it
 * does not end up in the first key.
 */
export async function readFile(filePath: string): Promise<string> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return content.startsWith(BOM) ? content.slice(BOM.length) : content;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/target/**', '**/build/**'],
    absolute: options.absolute ?? false,
    onlyFiles: true,
  });
}

export function isGlobPattern(pattern: string): boolean {
  return /[*?[\]{}]/.test(pattern);
}
