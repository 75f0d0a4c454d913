/**
 * Shared path helpers
 */

import path from 'path';
import { CONVERTED_SUFFIX, GLOB_MAGIC, OUTPUT_EXTENSION } from './constants';

/**
 * Lower-cased extension without the leading dot ("" when there is none)
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

export function hasGlobMagic(pattern: string): boolean {
  return GLOB_MAGIC.test(pattern);
}

/**
 * Path of the Markdown file written for a source document.
 *
 * report.pdf -> report.md; notes.md -> notes.converted.md (never the source itself)
 */
export function generateOutputPath(inputPath: string): string {
  const dir = path.dirname(inputPath);
  const ext = path.extname(inputPath);
  const stem = path.basename(inputPath, ext);

  if (ext.slice(1).toLowerCase() === OUTPUT_EXTENSION) {
    return path.join(dir, `${stem}${CONVERTED_SUFFIX}.${OUTPUT_EXTENSION}`);
  }
  return path.join(dir, `${stem}.${OUTPUT_EXTENSION}`);
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
