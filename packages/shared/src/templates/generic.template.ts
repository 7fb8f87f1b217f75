/**
 * Generic Lab Report Template
 *
 * Used when the panel composition is not known in advance: sections are
 * extracted as a list in the order they are printed.
 */

import type { ExtractionTemplate } from './types';
import { BASE_EXTRACTION_RULES, BASE_USER_PROMPT } from './base';

export const GENERIC_TEMPLATE: ExtractionTemplate = {
  reportType: 'GENERIC',
  description: 'Lab report of unknown type - every section and analyte as a list',

  systemPrompt: `${BASE_EXTRACTION_RULES}

GENERIC RULES:
- Create one entry in sections per printed section heading, in document order.
- Add every test available; put the analyte name as printed in the analyte field.`,

  userPromptTemplate: BASE_USER_PROMPT,
};
