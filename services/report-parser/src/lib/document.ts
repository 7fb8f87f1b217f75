/**
 * Document Input Types and Checks
 *
 * pdfjs-dist is only loaded by ./pdf.
 */

import fs from 'fs';
import path from 'path';
import { InputError } from '@labparse/shared';

const PDF_HEADER = '%PDF-';

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  combinedText: string;
}

/**
 * Converts a document file into the plain text handed to the model.
 */
export interface DocumentTextExtractor {
  extract(filePath: string): Promise<PdfTextResult>;
}

/**
 * Check that a path points at a non-empty file carrying a PDF header.
 *
 * @throws InputError naming the first failed check
 */
export function assertReadablePdf(filePath: string): void {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`File does not exist: ${filePath}`, filePath);
  }

  const stats = fs.statSync(filePath);
  if (!stats.isFile()) {
    throw new InputError(`Path is not a file: ${filePath}`, filePath);
  }
  if (path.extname(filePath).toLowerCase() !== '.pdf') {
    throw new InputError(`File is not a PDF: ${filePath}`, filePath);
  }
  if (stats.size === 0) {
    throw new InputError(`PDF file is empty: ${filePath}`, filePath);
  }

  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`Cannot read file: ${filePath} (${reason})`, filePath);
  }
  try {
    const header = Buffer.alloc(PDF_HEADER.length);
    fs.readSync(fd, header, 0, PDF_HEADER.length, 0);
    if (header.toString('latin1') !== PDF_HEADER) {
      throw new InputError(`Invalid PDF header: ${filePath}`, filePath);
    }
  } finally {
    fs.closeSync(fd);
  }
}
