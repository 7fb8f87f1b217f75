/**
 * Lab Report Extraction Template Types
 */

import type { ExtractionTarget } from '../types';

/**
 * Extraction template for a specific report type.
 */
export interface ExtractionTemplate {
  /** The report type this template handles */
  reportType: ExtractionTarget;

  /** System prompt with report-specific extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{report_type}}: The report-type tag
   * - {{source_filename}}: The PDF file name
   * - {{document_text}}: The extracted text content
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}
