/**
 * PDF Text Extraction Tests
 *
 * Runs pdfjs-dist on small PDFs written by the test itself.
 */

import { logger } from '@labparse/shared';
import { extractTextFromPdf } from '../../services/report-parser/src/lib/pdf';
import { makeTempDir, removeDir, silenceConsole, writeTextPdf } from './helpers';

describe('extractTextFromPdf', () => {
  let consoleSpies: ReturnType<typeof silenceConsole>;
  let dir: string;

  beforeEach(() => {
    consoleSpies = silenceConsole();
    logger.setLevel('info');
    dir = makeTempDir('labparse-pdf-');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(dir);
  });

  it('should extract page text under a page header', async () => {
    const pdf = writeTextPdf(dir, 'IKC_1.pdf', ['Sodium 140 mmol/L 135-145']);

    const result = await extractTextFromPdf(pdf);

    expect(result.totalPages).toBe(1);
    expect(result.pages).toEqual([{ pageNumber: 1, text: 'Sodium 140 mmol/L 135-145' }]);
    expect(result.combinedText).toBe('--- Page 1 ---\nSodium 140 mmol/L 135-145\n\n');
  });

  it('should keep lines in top-to-bottom order', async () => {
    const pdf = writeTextPdf(dir, 'IKC_2.pdf', ['Sodium 140 mmol/L 135-145', 'Potassium 4.1 mmol/L 3.5-5.1']);

    const result = await extractTextFromPdf(pdf);

    expect(result.pages[0].text).toBe('Sodium 140 mmol/L 135-145\nPotassium 4.1 mmol/L 3.5-5.1');
  });

  it('should only write JSON log lines to stdout for standard-font PDFs', async () => {
    const pdf = writeTextPdf(dir, 'IKC_3.pdf', ['Sodium 140 mmol/L 135-145']);

    await extractTextFromPdf(pdf);

    const stdout = consoleSpies.log.mock.calls.map((args: unknown[]) => String(args[0]));
    expect(stdout.length).toBeGreaterThan(0);
    expect(stdout.filter((line) => !line.startsWith('{'))).toEqual([]);
  });
});
