/**
 * Batch Orchestrator
 *
 * Processes files one after another in the order given. A failed file is
 * counted and the batch moves on.
 */

import path from 'path';
import { logger, addUsage, emptyUsage, type TokenUsage } from '@labparse/shared';
import { processFile, type FileResult, type ProcessFileDeps, type ProcessFileOptions } from './process-file';

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  results: FileResult[];
  usage: TokenUsage;
  durationMs: number;
}

/** Called before each file starts; index is 1-based */
export type ProgressListener = (index: number, total: number, file: string) => void;

export async function runBatch(
  files: string[],
  options: ProcessFileOptions,
  deps: ProcessFileDeps,
  onProgress?: ProgressListener
): Promise<BatchSummary> {
  const startTime = Date.now();
  const results: FileResult[] = [];
  let usage = emptyUsage();

  logger.info('Starting batch', { total: files.length, output_dir: options.outputDir });

  for (const [index, file] of files.entries()) {
    onProgress?.(index + 1, files.length, file);
    logger.debug('Processing file', { index: index + 1, total: files.length, file: path.basename(file) });

    const result = await processFile(file, options, deps);
    results.push(result);
    usage = addUsage(usage, result.usage);
  }

  const succeeded = results.filter((r) => r.success).length;
  const summary: BatchSummary = {
    total: files.length,
    succeeded,
    failed: files.length - succeeded,
    results,
    usage,
    durationMs: Date.now() - startTime,
  };

  logger.info('Batch complete', {
    total: summary.total,
    succeeded: summary.succeeded,
    failed: summary.failed,
    total_tokens: usage.totalTokens,
    duration_ms: summary.durationMs,
  });

  return summary;
}
