/**
 * AKH (hematology) Extraction Template
 *
 * Report semantics:
 * - Blood status plus automatic differential blood count, absolute and relative
 * - The same cell types appear twice: once with absolute units, once in percent
 */

import type { ExtractionTemplate } from './types';
import { BASE_EXTRACTION_RULES, BASE_USER_PROMPT } from './base';

export const AKH_TEMPLATE: ExtractionTemplate = {
  reportType: 'AKH',
  description: 'AKH hematology report - blood status, differential blood count and coagulation',

  systemPrompt: `${BASE_EXTRACTION_RULES}

REPORT STRUCTURE (AKH):
- Hämatologische Untersuchungen: Blutstatus, Blutbild automatisch absolut, Blutbild automatisch relativ
- Hämostase Untersuchungen: Gerinnungsfaktoren

AKH RULES:
- Values with absolute units (e.g. G/L) belong to blood_count_absolute; values in % belong to blood_count_relative.
- Do not copy a value from one differential block into the other.`,

  userPromptTemplate: BASE_USER_PROMPT,
};
