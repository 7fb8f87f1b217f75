/**
 * PDF Text Extraction
 *
 * Extracts text from PDF files using pdfjs-dist.
 */

import fs from 'fs';
import path from 'path';
import * as pdfjsLib from 'pdfjs-dist';
import { logger } from '@labparse/shared';
import type { DocumentTextExtractor, PageText, PdfTextResult } from './document';

const PDFJS_ROOT = path.dirname(require.resolve('pdfjs-dist/package.json'));

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(PDFJS_ROOT, 'build/pdf.worker.js');

// Must end with a separator; pdfjs appends the font file name
const STANDARD_FONT_DATA_URL = path.join(PDFJS_ROOT, 'standard_fonts') + path.sep;

/**
 * Extract text from a PDF file, preserving line structure.
 *
 * Groups text items by Y position to maintain document layout, so that an
 * analyte's name, result, unit and reference stay on one line.
 */
export async function extractTextFromPdf(filePath: string): Promise<PdfTextResult> {
  logger.info('Extracting text from PDF', { filePath });

  const data = new Uint8Array(fs.readFileSync(filePath));
  const pdf = await pdfjsLib.getDocument({
    data,
    isEvalSupported: false,
    standardFontDataUrl: STANDARD_FONT_DATA_URL,
    // pdfjs writes warnings straight to stdout, outside the JSON log stream
    verbosity: pdfjsLib.VerbosityLevel.ERRORS,
  }).promise;

  const totalPages = pdf.numPages;
  const pages: PageText[] = [];
  let combinedText = '';

  try {
    for (let pageNum = 1; pageNum <= totalPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Group text items by Y position to preserve line structure
      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Round Y position to group items on the same line
        // (text on the same visual line may have slight Y variations)
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // Sort Y positions descending (top to bottom on page)
      const sortedYPositions = Array.from(itemsByY.keys()).sort((a, b) => b - a);

      const lines: string[] = [];
      for (const y of sortedYPositions) {
        const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
        const lineText = lineItems.map((item) => item.str).join(' ').trim();
        if (lineText) {
          lines.push(lineText);
        }
      }

      const pageText = lines.join('\n');
      pages.push({ pageNumber: pageNum, text: pageText });
      combinedText += `--- Page ${pageNum} ---\n${pageText}\n\n`;
    }
  } finally {
    await pdf.destroy();
  }

  logger.info('PDF text extraction complete', {
    filePath,
    totalPages,
    totalChars: combinedText.length,
  });

  return {
    pages,
    totalPages,
    combinedText,
  };
}

export const pdfTextExtractor: DocumentTextExtractor = {
  extract: extractTextFromPdf,
};
