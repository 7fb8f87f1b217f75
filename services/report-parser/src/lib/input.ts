/**
 * Input Discovery
 *
 * Resolves the CLI input path into the ordered list of PDFs to process.
 */

import fs from 'fs';
import path from 'path';
import { InputError } from '@labparse/shared';

export interface ResolvedInput {
  /** PDFs to process, in sorted-name order */
  files: string[];
  /** Directory outputs default to */
  baseDir: string;
  isDirectory: boolean;
}

function isPdfName(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() === '.pdf';
}

/**
 * @throws InputError if the path is missing, is a non-PDF file, or is a
 *   directory without PDFs
 */
export function resolveInputFiles(inputPath: string): ResolvedInput {
  const resolved = path.resolve(inputPath);

  if (!fs.existsSync(resolved)) {
    throw new InputError(`Input path does not exist: ${inputPath}`, inputPath);
  }

  const stats = fs.statSync(resolved);

  if (stats.isFile()) {
    if (!isPdfName(resolved)) {
      throw new InputError(`Input file is not a PDF: ${inputPath}`, inputPath);
    }
    return { files: [resolved], baseDir: path.dirname(resolved), isDirectory: false };
  }

  if (!stats.isDirectory()) {
    throw new InputError(`Input path is neither a file nor a directory: ${inputPath}`, inputPath);
  }

  const files = fs
    .readdirSync(resolved, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isPdfName(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(resolved, name));

  if (files.length === 0) {
    throw new InputError(`No PDF files found in directory: ${inputPath}`, inputPath);
  }

  return { files, baseDir: resolved, isDirectory: true };
}
