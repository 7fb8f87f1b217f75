/**
 * Lab Report Extraction Templates
 */

import type { ExtractionTarget } from '../types';
import type { ExtractionTemplate } from './types';
import { IKC_TEMPLATE } from './ikc.template';
import { AKH_TEMPLATE } from './akh.template';
import { GENERIC_TEMPLATE } from './generic.template';

export type { ExtractionTemplate } from './types';
export { BASE_EXTRACTION_RULES, BASE_USER_PROMPT } from './base';
export { IKC_TEMPLATE, AKH_TEMPLATE, GENERIC_TEMPLATE };

const TEMPLATES: Record<ExtractionTarget, ExtractionTemplate> = {
  IKC: IKC_TEMPLATE,
  AKH: AKH_TEMPLATE,
  GENERIC: GENERIC_TEMPLATE,
};

/**
 * Get the extraction template for a report type.
 */
export function getTemplateForReportType(reportType: ExtractionTarget): ExtractionTemplate {
  return TEMPLATES[reportType];
}

/**
 * Fill a user prompt template's placeholders.
 */
export function renderUserPrompt(
  template: ExtractionTemplate,
  values: { sourceFilename: string; documentText: string }
): string {
  // Function replacers keep `$` sequences in the document text literal
  return template.userPromptTemplate
    .replace('{{report_type}}', () => template.reportType)
    .replace('{{source_filename}}', () => values.sourceFilename)
    .replace('{{document_text}}', () => values.documentText);
}
