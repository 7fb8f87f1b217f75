/**
 * IKC (clinical chemistry) Extraction Template
 *
 * Report semantics:
 * - Thirteen fixed panels, from electrolytes to sexual hormones
 * - Section captions are printed in German
 * - LH, FSH and progesterone only appear on female patients' reports
 */

import type { ExtractionTemplate } from './types';
import { BASE_EXTRACTION_RULES, BASE_USER_PROMPT } from './base';

export const IKC_TEMPLATE: ExtractionTemplate = {
  reportType: 'IKC',
  description: 'IKC clinical chemistry report - electrolytes, kidney, liver, lipids, iron, vitamins, thyroid and hormones',

  systemPrompt: `${BASE_EXTRACTION_RULES}

REPORT STRUCTURE (IKC):
- Elektrolyt- und Wasserhaushalt, Niere, Aminosäure-/Bilirubin-/Hämstoffwechsel, Proteine, Enzyme
- Entzündung, Herz und Muskel, Diabetes und Energiestoffwechsel, Lipidstoffwechsel und Arteriosklerose
- Eisenstoffwechsel, Vitamine, Schilddrüse, Sexualhormone

IKC RULES:
- Map each printed analyte to its field in lab_result by meaning, even when the printed caption is abbreviated.
- lh, fsh and progesterone are null when the report does not list them.`,

  userPromptTemplate: BASE_USER_PROMPT,
};
