/**
 * Report Type Detection
 *
 * Infers the report-type tag from a file name: "IKC_" or "AKH_" anywhere in
 * the name, case-insensitive. Names carrying neither go through the
 * configured unknown-type policy.
 */

import path from 'path';
import {
  logger,
  UnknownReportTypeError,
  GENERIC_REPORT,
  type ExtractionTarget,
  type ReportType,
  type UnknownReportTypePolicy,
} from '@labparse/shared';

const FILENAME_MARKERS: ReadonlyArray<{ marker: string; reportType: ReportType }> = [
  { marker: 'IKC_', reportType: 'IKC' },
  { marker: 'AKH_', reportType: 'AKH' },
];

export interface DetectionOptions {
  policy: UnknownReportTypePolicy;
  defaultReportType: ReportType;
}

export interface DetectionResult {
  reportType: ExtractionTarget;
  /** False when the tag came from the unknown-type policy */
  detected: boolean;
}

/**
 * Find the report-type marker in a file name, if any.
 */
export function matchReportType(filePath: string): ReportType | undefined {
  const name = path.basename(filePath).toUpperCase();
  return FILENAME_MARKERS.find(({ marker }) => name.includes(marker))?.reportType;
}

/**
 * @throws UnknownReportTypeError when nothing matches and the policy is 'fail'
 */
export function detectReportType(filePath: string, options: DetectionOptions): DetectionResult {
  const matched = matchReportType(filePath);
  if (matched) {
    logger.debug('Detected report type from filename', { file: path.basename(filePath), report_type: matched });
    return { reportType: matched, detected: true };
  }

  const fileName = path.basename(filePath);

  switch (options.policy) {
    case 'fail':
      throw new UnknownReportTypeError(
        fileName,
        `Cannot detect report type from filename "${fileName}" (expected IKC_ or AKH_ in the name)`
      );

    case 'generic':
      logger.warn('Report type not detected from filename, using generic report', { file: fileName });
      return { reportType: GENERIC_REPORT, detected: false };

    case 'default':
      logger.warn('Report type not detected from filename, using default', {
        file: fileName,
        report_type: options.defaultReportType,
      });
      return { reportType: options.defaultReportType, detected: false };
  }
}
