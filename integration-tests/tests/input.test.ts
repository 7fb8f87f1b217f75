/**
 * Input Discovery and PDF Checks
 */

import * as fs from 'fs';
import * as path from 'path';
import { InputError } from '@labparse/shared';
import { resolveInputFiles } from '../../services/report-parser/src/lib/input';
import { assertReadablePdf } from '../../services/report-parser/src/lib/document';
import { makeTempDir, removeDir, writeFakePdf } from './helpers';

describe('resolveInputFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should resolve a single PDF with its directory as base', () => {
    const pdf = writeFakePdf(dir, 'IKC_1.pdf');

    const input = resolveInputFiles(pdf);

    expect(input).toEqual({ files: [pdf], baseDir: dir, isDirectory: false });
  });

  it('should list the PDFs of a directory in sorted order', () => {
    writeFakePdf(dir, 'b.pdf');
    writeFakePdf(dir, 'a.PDF');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'not a report');
    fs.mkdirSync(path.join(dir, 'nested.pdf'));

    const input = resolveInputFiles(dir);

    expect(input.isDirectory).toBe(true);
    expect(input.baseDir).toBe(dir);
    expect(input.files).toEqual([path.join(dir, 'a.PDF'), path.join(dir, 'b.pdf')]);
  });

  it('should reject a missing path', () => {
    const missing = path.join(dir, 'missing.pdf');

    expect(() => resolveInputFiles(missing)).toThrow(`Input path does not exist: ${missing}`);
  });

  it('should reject a file without the .pdf extension', () => {
    const txt = path.join(dir, 'report.txt');
    fs.writeFileSync(txt, 'text');

    expect(() => resolveInputFiles(txt)).toThrow(InputError);
  });

  it('should reject a directory without PDFs', () => {
    expect(() => resolveInputFiles(dir)).toThrow(`No PDF files found in directory: ${dir}`);
  });
});

describe('assertReadablePdf', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should accept a file with a PDF header', () => {
    const pdf = writeFakePdf(dir, 'IKC_1.pdf');

    expect(() => assertReadablePdf(pdf)).not.toThrow();
  });

  it('should reject an empty file', () => {
    const pdf = path.join(dir, 'empty.pdf');
    fs.writeFileSync(pdf, '');

    expect(() => assertReadablePdf(pdf)).toThrow(`PDF file is empty: ${pdf}`);
  });

  it('should reject a file without a PDF header', () => {
    const pdf = path.join(dir, 'fake.pdf');
    fs.writeFileSync(pdf, 'hello world');

    expect(() => assertReadablePdf(pdf)).toThrow(`Invalid PDF header: ${pdf}`);
  });
});
