/**
 * Single-File Processing
 *
 * PDF -> text -> structured report -> JSON file. Every error raised while
 * handling one file is caught here and turned into a failed FileResult, so
 * nothing escapes into the batch loop.
 */

import fs from 'fs';
import path from 'path';
import { ulid } from 'ulid';
import {
  logger,
  getContext,
  runWithContextAsync,
  extractStructured,
  type ExtractionTarget,
  type ModelConnection,
  type StructuredExtractionOptions,
  type StructuredGenerationBackend,
  type TokenUsage,
} from '@labparse/shared';
import { assertReadablePdf, type DocumentTextExtractor } from './document';
import { detectReportType, type DetectionOptions } from './report-type';

export interface ProcessFileOptions {
  outputDir: string;
  /** Also write the extracted text next to the JSON output */
  saveTxt: boolean;
  /** Forced report type; detected from the filename when omitted */
  reportType?: ExtractionTarget;
  detection: DetectionOptions;
  connection: ModelConnection;
  extraction: Omit<StructuredExtractionOptions, 'backend' | 'sourceFilename'>;
}

export interface ProcessFileDeps {
  textExtractor: DocumentTextExtractor;
  /** Generation backend override; an OpenAI-compatible client otherwise */
  backend?: StructuredGenerationBackend;
}

export interface FileResult {
  file: string;
  success: boolean;
  reportType?: ExtractionTarget;
  jsonPath?: string;
  txtPath?: string;
  usage?: TokenUsage;
  durationMs: number;
  error?: Error;
}

export function outputPathsFor(pdfPath: string, outputDir: string): { txtPath: string; jsonPath: string } {
  const baseName = path.parse(pdfPath).name;
  return {
    txtPath: path.join(outputDir, `${baseName}.txt`),
    jsonPath: path.join(outputDir, `${baseName}.json`),
  };
}

/**
 * Process one PDF. Never throws.
 */
export async function processFile(
  pdfPath: string,
  options: ProcessFileOptions,
  deps: ProcessFileDeps
): Promise<FileResult> {
  const fileName = path.basename(pdfPath);

  return runWithContextAsync({ correlationId: ulid(), documentId: fileName }, async () => {
    const startTime = Date.now();
    const { txtPath, jsonPath } = outputPathsFor(pdfPath, options.outputDir);

    try {
      const reportType = options.reportType ?? detectReportType(pdfPath, options.detection).reportType;
      const context = getContext();
      if (context) {
        context.reportType = reportType;
      }

      logger.info('Starting PDF parsing', { file: fileName, report_type: reportType });

      // Step 1: Validate and convert PDF to text
      assertReadablePdf(pdfPath);
      const pdfResult = await deps.textExtractor.extract(pdfPath);
      const rawText = pdfResult.combinedText;

      logger.info('Text extraction completed', {
        file: fileName,
        pages: pdfResult.totalPages,
        characters: rawText.length,
      });

      // Step 2: Save raw text if requested
      if (options.saveTxt) {
        fs.writeFileSync(txtPath, rawText, 'utf-8');
        logger.info('Raw text saved', { path: txtPath });
      }

      // Step 3: Extract structured data
      const extraction = await extractStructured(rawText, reportType, options.connection, {
        ...options.extraction,
        backend: deps.backend,
        sourceFilename: fileName,
      });

      // Step 4: Save JSON output
      fs.writeFileSync(jsonPath, JSON.stringify(extraction.report, null, 2), 'utf-8');

      const durationMs = Date.now() - startTime;
      logger.info('Structured data saved', {
        path: jsonPath,
        attempts: extraction.attempts,
        total_tokens: extraction.usage.totalTokens,
        duration_ms: durationMs,
      });

      return {
        file: pdfPath,
        success: true,
        reportType,
        jsonPath,
        txtPath: options.saveTxt ? txtPath : undefined,
        usage: extraction.usage,
        durationMs,
      };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Processing failed', err, { file: fileName });

      return {
        file: pdfPath,
        success: false,
        durationMs: Date.now() - startTime,
        error: err,
      };
    }
  });
}
