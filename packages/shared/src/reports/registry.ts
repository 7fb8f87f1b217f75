/**
 * Report Schema Registry
 *
 * Maps each report-type tag to the contract its extraction output must
 * satisfy. The mapping is exhaustive over the closed set of targets; an
 * unrecognized tag is an error, never a silent default.
 */

import { UnknownReportTypeError } from '../errors';
import {
  compileSchema,
  formatValidationErrors,
  loadSchema,
  validateAgainstSchema,
  type JsonSchema,
  type ValidationResult,
} from '../schemas';
import { getTemplateForReportType, type ExtractionTemplate } from '../templates';
import {
  GENERIC_REPORT,
  REPORT_TYPES,
  type ExtractionTarget,
  type ReportByTarget,
  type ReportType,
} from '../types';

export interface ReportDefinition<T extends ExtractionTarget = ExtractionTarget> {
  readonly reportType: T;
  readonly description: string;
  /** Contract file under packages/shared/contracts/ */
  readonly schemaFile: string;
  /** Name sent as json_schema.name in the response format */
  readonly schemaName: string;
}

const REPORT_DEFINITIONS: { [K in ExtractionTarget]: ReportDefinition<K> } = {
  IKC: {
    reportType: 'IKC',
    description: 'Clinical chemistry panel with thirteen fixed sections',
    schemaFile: 'ikc_report.schema.json',
    schemaName: 'ikc_lab_report',
  },
  AKH: {
    reportType: 'AKH',
    description: 'Hematology and hemostasis panel',
    schemaFile: 'akh_report.schema.json',
    schemaName: 'akh_lab_report',
  },
  GENERIC: {
    reportType: 'GENERIC',
    description: 'Lab report with a dynamic list of sections',
    schemaFile: 'generic_report.schema.json',
    schemaName: 'generic_lab_report',
  },
};

export function isReportType(value: string): value is ReportType {
  return (REPORT_TYPES as readonly string[]).includes(value);
}

export function isExtractionTarget(value: string): value is ExtractionTarget {
  return value === GENERIC_REPORT || isReportType(value);
}

/**
 * Normalize a user-supplied tag ("ikc", " AKH ") to an extraction target.
 *
 * @throws UnknownReportTypeError if the tag is not in the enumeration
 */
export function parseReportType(tag: string): ExtractionTarget {
  const normalized = tag.trim().toUpperCase();
  if (!isExtractionTarget(normalized)) {
    throw new UnknownReportTypeError(
      tag,
      `Unknown report type "${tag}". Expected one of: ${getAvailableReportTypes().join(', ')}`
    );
  }
  return normalized;
}

/**
 * Get the definition for a report type.
 *
 * @throws UnknownReportTypeError if the tag is not in the enumeration
 */
export function getReportDefinition(tag: string): ReportDefinition {
  return REPORT_DEFINITIONS[parseReportType(tag)];
}

/**
 * Get the JSON Schema the extraction output for a report type must match.
 */
export function getReportSchema(tag: string): JsonSchema {
  return loadSchema(getReportDefinition(tag).schemaFile);
}

export function getReportTemplate(tag: string): ExtractionTemplate {
  return getTemplateForReportType(parseReportType(tag));
}

/**
 * Validate (and normalize in place) a candidate record for a report type.
 */
export function validateReport(tag: string, data: unknown): ValidationResult {
  return validateAgainstSchema(getReportDefinition(tag).schemaFile, data);
}

export type ReportCheck<T extends ExtractionTarget> =
  | { valid: true; report: ReportByTarget[T] }
  | { valid: false; errors: string[] };

/**
 * Validate a candidate record and hand it back typed for its target.
 */
export function checkReport<T extends ExtractionTarget>(reportType: T, data: unknown): ReportCheck<T> {
  const validate = compileSchema<ReportByTarget[T]>(REPORT_DEFINITIONS[reportType].schemaFile);
  if (validate(data)) {
    return { valid: true, report: data };
  }
  return { valid: false, errors: formatValidationErrors(validate.errors) };
}

/**
 * All report-type tags, the generic fallback last.
 */
export function getAvailableReportTypes(): ExtractionTarget[] {
  return [...REPORT_TYPES, GENERIC_REPORT];
}
