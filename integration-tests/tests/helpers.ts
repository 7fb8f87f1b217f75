/**
 * Test Helpers
 *
 * In-process stand-ins for the model endpoint and the PDF text extractor.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type {
  GenerationRequest,
  GenerationResponse,
  StructuredGenerationBackend,
} from '@labparse/shared';
import type { DocumentTextExtractor, PdfTextResult } from '../../services/report-parser/src/lib/document';

const FIXTURES_DIR = path.join(__dirname, '../fixtures');

/**
 * Load a fixture as a fresh object; validation normalizes records in place.
 */
export function loadFixture(name: string): Record<string, unknown> {
  return JSON.parse(fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8'));
}

export function loadFixtureText(name: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8');
}

type ScriptedReply = string | null | Error | ((request: GenerationRequest) => string);

/**
 * Backend that answers with scripted replies in order and records every
 * request. The last reply repeats once the script runs out.
 */
export class ScriptedBackend implements StructuredGenerationBackend {
  readonly provider = 'scripted';
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly replies: ScriptedReply[]) {}

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    // Snapshot the messages; the dispatcher keeps appending to the array
    this.requests.push({ ...request, messages: [...request.messages] });

    const reply = this.replies[Math.min(this.requests.length, this.replies.length) - 1];
    if (reply instanceof Error) {
      throw reply;
    }

    return {
      content: typeof reply === 'function' ? reply(request) : reply,
      requestId: `req_${this.requests.length}`,
      model: request.model,
      usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 },
    };
  }
}

/**
 * Text extractor that returns a fixed text per file name, without pdfjs.
 */
export class StaticTextExtractor implements DocumentTextExtractor {
  readonly calls: string[] = [];

  constructor(private readonly text: string = 'Natrium 140 mmol/L 135-145') {}

  async extract(filePath: string): Promise<PdfTextResult> {
    this.calls.push(filePath);
    return {
      pages: [{ pageNumber: 1, text: this.text }],
      totalPages: 1,
      combinedText: `--- Page 1 ---\n${this.text}\n\n`,
    };
  }
}

export function makeTempDir(prefix: string = 'labparse-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file that passes the PDF header check.
 */
export function writeFakePdf(dir: string, name: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, '%PDF-1.4\n% test document\n');
  return filePath;
}

/**
 * Silence console output for the current test file and return the spies.
 */
export function silenceConsole(): {
  log: jest.SpyInstance;
  warn: jest.SpyInstance;
  error: jest.SpyInstance;
  debug: jest.SpyInstance;
} {
  return {
    log: jest.spyOn(console, 'log').mockImplementation(() => undefined),
    warn: jest.spyOn(console, 'warn').mockImplementation(() => undefined),
    error: jest.spyOn(console, 'error').mockImplementation(() => undefined),
    debug: jest.spyOn(console, 'debug').mockImplementation(() => undefined),
  };
}

/**
 * Parse the JSON log lines written through a console spy.
 */
export function loggedLines(spy: jest.SpyInstance): Array<Record<string, unknown>> {
  return spy.mock.calls
    .map((args: unknown[]) => args[0])
    .filter((line): line is string => typeof line === 'string' && line.startsWith('{'))
    .map((line) => JSON.parse(line));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Delete a nested property, e.g. unsetPath(report, ['lab_result', 'kidney', 'urea']).
 */
export function unsetPath(target: Record<string, unknown>, keys: string[]): void {
  const parentKeys = keys.slice(0, -1);
  let node: unknown = target;
  for (const key of parentKeys) {
    node = isRecord(node) ? node[key] : undefined;
  }
  if (!isRecord(node)) {
    throw new Error(`No object at ${parentKeys.join('.')}`);
  }
  delete node[keys[keys.length - 1]];
}

/**
 * Set a nested property, e.g. setPath(report, ['lab_result', 'sexual_hormones', 'lh'], null).
 */
export function setPath(target: Record<string, unknown>, keys: string[], value: unknown): void {
  const parentKeys = keys.slice(0, -1);
  let node: unknown = target;
  for (const key of parentKeys) {
    node = isRecord(node) ? node[key] : undefined;
  }
  if (!isRecord(node)) {
    throw new Error(`No object at ${parentKeys.join('.')}`);
  }
  node[keys[keys.length - 1]] = value;
}

/**
 * Write a one-page PDF that prints each line in Helvetica, top to bottom.
 */
export function writeTextPdf(dir: string, name: string, lines: string[]): string {
  const content = lines.map((line, i) => `BT /F1 12 Tf 72 ${720 - i * 20} Td (${line}) Tj ET`).join('\n');
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${Buffer.byteLength(content, 'latin1')} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(Buffer.byteLength(body, 'latin1'));
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(body, 'latin1');
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, body, 'latin1');
  return filePath;
}
